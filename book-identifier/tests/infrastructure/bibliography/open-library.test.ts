import { describe, expect, it } from "vitest";

import {
  FakeHttpClient,
  httpFailure,
  paramOf,
  reply,
  TRANSPORT_FAILURES,
  type FakeReply,
  type RecordedRequest
} from "../../helpers/fake-http-client";
import { createTestLogger } from "../../helpers/test-logger";

import { BookNotFoundError, isErr, isOk, ParseError } from "@/domain/error";
import {
  mapOpenLibraryDoc,
  OpenLibraryProvider,
  readWorkDescription
} from "@/infrastructure/bibliography/open-library";

const duneDoc = {
  key: "/works/OL893415W",
  title: "Dune",
  author_name: ["Frank Herbert"],
  publisher: ["Chilton Books", "Ace"],
  first_publish_year: 1965,
  number_of_pages_median: 412,
  isbn: ["0441172717", "9780441172719"],
  cover_i: 11481354
};

const createProvider = (handler: (request: RecordedRequest) => FakeReply) => {
  const httpClient = new FakeHttpClient(handler);
  const logger = createTestLogger();
  return { httpClient, logger, provider: new OpenLibraryProvider({ httpClient, logger }, { limit: 3 }) };
};

describe("mapOpenLibraryDoc", () => {
  it("maps a search document", () => {
    expect(mapOpenLibraryDoc(duneDoc)).toMatchObject({
      title: "Dune",
      authors: ["Frank Herbert"],
      publisher: "Chilton Books",
      publishYear: 1965,
      pageCount: 412,
      isbn: "9780441172719",
      coverImageUrl: "https://covers.openlibrary.org/b/id/11481354-L.jpg",
      source: "OpenLibrary",
      externalId: "/works/OL893415W"
    });
  });

  it("falls back to publish_date for the year", () => {
    expect(mapOpenLibraryDoc({ title: "Old Notes", publish_date: ["1990-03", "1991"] })?.publishYear).toBe(1990);
  });
});

describe("readWorkDescription", () => {
  it("reads both description shapes", () => {
    expect(readWorkDescription({ description: "plain" })).toBe("plain");
    expect(readWorkDescription({ description: { type: "/type/text", value: "typed" } })).toBe("typed");
    expect(readWorkDescription({})).toBeNull();
  });
});

describe("OpenLibraryProvider.lookupByIsbn", () => {
  it("adds the work description from a second request", async () => {
    const { httpClient, provider } = createProvider((request) =>
      request.url.endsWith("/search.json")
        ? reply({ numFound: 1, docs: [duneDoc] })
        : reply({ description: { type: "/type/text", value: " A desert planet. " } })
    );

    const result = await provider.lookupByIsbn("978-0-441-17271-9");

    expect(isOk(result) && result.value).toMatchObject({
      isbn: "9780441172719",
      description: "A desert planet."
    });
    expect(paramOf(httpClient.requests[0], "isbn")).toBe("9780441172719");
    expect(paramOf(httpClient.requests[0], "limit")).toBe(1);
    expect(httpClient.requests[1].url).toBe("https://openlibrary.org/works/OL893415W.json");
  });

  it("keeps the book when the work request fails", async () => {
    const { provider, logger } = createProvider((request) =>
      request.url.endsWith("/search.json") ? reply({ docs: [duneDoc] }) : httpFailure(502)
    );

    const result = await provider.lookupByIsbn("9780441172719");

    expect(isOk(result) && result.value.description).toBeNull();
    expect(isOk(result) && result.value.title).toBe("Dune");
    expect(logger.warn).toHaveBeenCalledWith("OpenLibrary: failed to fetch the work description", {
      workKey: "/works/OL893415W",
      error: expect.any(Error)
    });
  });

  it("reports no documents as not found", async () => {
    const { httpClient, provider } = createProvider(() => reply({ numFound: 0, docs: [] }));

    const result = await provider.lookupByIsbn("9780000000002");

    expect(isErr(result) && result.err).toBeInstanceOf(BookNotFoundError);
    expect(httpClient.requests).toHaveLength(1);
  });

  it("rejects a body that is not JSON", async () => {
    const { provider } = createProvider(() => reply("not json"));

    const result = await provider.lookupByIsbn("9780441172719");

    expect(isErr(result) && result.err).toBeInstanceOf(ParseError);
  });
});

describe("OpenLibraryProvider.searchByText", () => {
  it("searches with the configured limit", async () => {
    const { httpClient, provider } = createProvider(() => reply({ docs: [duneDoc, { key: "/works/OL0W" }] }));

    const books = await provider.searchByText("dune herbert");

    expect(books.map((book) => book.title)).toEqual(["Dune"]);
    expect(paramOf(httpClient.requests[0], "q")).toBe("dune herbert");
    expect(paramOf(httpClient.requests[0], "limit")).toBe(3);
  });
});

describe("OpenLibraryProvider transport failures", () => {
  it.each(TRANSPORT_FAILURES)("returns an Err for $name on an ISBN lookup", async ({ answer, error, warning }) => {
    const { httpClient, logger, provider } = createProvider(() => answer);

    const result = await provider.lookupByIsbn("9780441172719");

    expect(isErr(result) && result.err).toBeInstanceOf(error);
    expect(logger.warn).toHaveBeenCalledWith(
      `OpenLibrary: ${warning}`,
      expect.objectContaining({ query: "9780441172719" })
    );
    expect(httpClient.requests).toHaveLength(1);
  });

  it.each(TRANSPORT_FAILURES)("returns no books for $name on a text search", async ({ answer, warning }) => {
    const { logger, provider } = createProvider(() => answer);

    const books = await provider.searchByText("dune herbert");

    expect(books).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      `OpenLibrary: ${warning}`,
      expect.objectContaining({ query: "dune herbert" })
    );
  });
});
