import { describe, expect, it } from "vitest";

import { FakeHttpClient, paramOf, reply, TRANSPORT_FAILURES, type FakeReply } from "../../helpers/fake-http-client";
import { createTestLogger } from "../../helpers/test-logger";

import { BookNotFoundError, isErr, isOk } from "@/domain/error";
import {
  InventaireProvider,
  mapInventaireEdition,
  mapInventaireSearchResult
} from "@/infrastructure/bibliography/inventaire";

const entities = {
  "isbn:9782070360024": {
    uri: "isbn:9782070360024",
    type: "edition",
    labels: { fr: "L'Étranger" },
    claims: {
      "wdt:P1476": ["L'Étranger"],
      "wdt:P629": ["wd:Q181795"],
      "wdt:P123": ["wd:Q2"],
      "wdt:P577": ["1972-01-01"],
      "wdt:P1104": [186],
      "wdt:P212": ["978-2-07-036002-4"]
    },
    image: { url: "/img/entities/0123abcd" }
  },
  "wd:Q181795": {
    uri: "wd:Q181795",
    type: "work",
    labels: { en: "The Stranger", fr: "L'Étranger" },
    descriptions: { en: "1942 novel by Albert Camus" },
    claims: { "wdt:P50": ["wd:Q34670"] }
  },
  "wd:Q2": { uri: "wd:Q2", labels: { fr: "Gallimard" } },
  "wd:Q34670": { uri: "wd:Q34670", type: "human", labels: { en: "Albert Camus" } }
};

const createProvider = (answer: FakeReply) => {
  const httpClient = new FakeHttpClient(() => answer);
  const logger = createTestLogger();
  return { httpClient, logger, provider: new InventaireProvider({ httpClient, logger }, { limit: 4 }) };
};

describe("mapInventaireEdition", () => {
  it("resolves authors and publisher through the related entities", () => {
    expect(mapInventaireEdition(entities["isbn:9782070360024"], entities)).toMatchObject({
      title: "L'Étranger",
      authors: ["Albert Camus"],
      publisher: "Gallimard",
      publishYear: 1972,
      pageCount: 186,
      isbn: "9782070360024",
      description: "1942 novel by Albert Camus",
      coverImageUrl: "https://inventaire.io/img/entities/0123abcd",
      source: "Inventaire",
      externalId: "isbn:9782070360024"
    });
  });
});

describe("mapInventaireSearchResult", () => {
  it("maps a work hit and drops one without a label", () => {
    expect(
      mapInventaireSearchResult({ uri: "wd:Q190192", label: "Dune", description: "novel", image: ["/img/dune"] })
    ).toMatchObject({
      title: "Dune",
      description: "novel",
      coverImageUrl: "https://inventaire.io/img/dune",
      externalId: "wd:Q190192",
      isbn: null
    });
    expect(mapInventaireSearchResult({ uri: "wd:Q0" })).toBeNull();
  });
});

describe("InventaireProvider.lookupByIsbn", () => {
  it("asks for the edition with its relatives", async () => {
    const { httpClient, provider } = createProvider(reply({ entities, redirects: {} }));

    const result = await provider.lookupByIsbn("978-2-07-036002-4");

    expect(isOk(result) && result.value.authors).toEqual(["Albert Camus"]);
    expect(httpClient.requests[0].url).toBe("https://inventaire.io/api/entities");
    expect(paramOf(httpClient.requests[0], "uris")).toBe("isbn:9782070360024");
    expect(paramOf(httpClient.requests[0], "relatives")).toBe("wdt:P629|wdt:P50|wdt:P123");
  });

  it("follows a redirect to the edition entity", async () => {
    const { provider } = createProvider(
      reply({
        entities: { "inv:0f1e": { uri: "inv:0f1e", labels: { en: "Self-published Notes" }, claims: {} } },
        redirects: { "isbn:9780000000002": "inv:0f1e" }
      })
    );

    const result = await provider.lookupByIsbn("9780000000002");

    expect(isOk(result) && result.value).toMatchObject({
      title: "Self-published Notes",
      isbn: "9780000000002",
      externalId: "inv:0f1e"
    });
  });

  it("reports a missing edition as not found", async () => {
    const { provider } = createProvider(reply({ entities: {}, notFound: ["isbn:9780000000002"] }));

    const result = await provider.lookupByIsbn("9780000000002");

    expect(isErr(result) && result.err).toBeInstanceOf(BookNotFoundError);
  });
});

describe("InventaireProvider.searchByText", () => {
  it("searches works in English", async () => {
    const { httpClient, provider } = createProvider(reply({ results: [{ uri: "wd:Q190192", label: "Dune" }] }));

    const books = await provider.searchByText("dune");

    expect(books.map((book) => book.title)).toEqual(["Dune"]);
    expect(httpClient.requests[0].config?.params).toEqual({ types: "works", search: "dune", lang: "en", limit: 4 });
  });
});

describe("InventaireProvider transport failures", () => {
  it.each(TRANSPORT_FAILURES)("returns an Err for $name on an ISBN lookup", async ({ answer, error, warning }) => {
    const { httpClient, logger, provider } = createProvider(answer);

    const result = await provider.lookupByIsbn("9782070360024");

    expect(isErr(result) && result.err).toBeInstanceOf(error);
    expect(logger.warn).toHaveBeenCalledWith(
      `Inventaire: ${warning}`,
      expect.objectContaining({ query: "9782070360024" })
    );
    expect(httpClient.requests).toHaveLength(1);
  });

  it.each(TRANSPORT_FAILURES)("returns no books for $name on a text search", async ({ answer, warning }) => {
    const { logger, provider } = createProvider(answer);

    const books = await provider.searchByText("dune");

    expect(books).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`Inventaire: ${warning}`, expect.objectContaining({ query: "dune" }));
  });
});
