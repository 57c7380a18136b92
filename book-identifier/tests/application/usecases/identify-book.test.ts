import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createFakeProvider, makeBook } from "../../helpers/books";
import { FakeHttpClient, paramOf, reply } from "../../helpers/fake-http-client";
import { createTestLogger } from "../../helpers/test-logger";

import { ProviderRegistry } from "@/application/provider-registry";
import { BookIdentifier } from "@/application/usecases/identify-book";
import { GoogleBooksProvider } from "@/infrastructure/bibliography/google-books";

describe("BookIdentifier.identifyByIsbn", () => {
  it("returns the first hit and never calls later providers", async () => {
    const first = createFakeProvider({ name: "GoogleBooks", byIsbn: () => null });
    const second = createFakeProvider({
      name: "OpenLibrary",
      byIsbn: () => makeBook({ id: "x", source: "OpenLibrary" })
    });
    const third = createFakeProvider({ name: "ISBNdb", byIsbn: () => makeBook({ id: "y", source: "ISBNdb" }) });
    const logger = createTestLogger();
    const identifier = new BookIdentifier(new ProviderRegistry([first, second, third]), logger);

    const book = await identifier.identifyByIsbn("978-0-13-235088-4");

    expect(book?.id).toBe("x");
    expect(first.lookupByIsbn).toHaveBeenCalledWith("9780132350884", {});
    expect(second.lookupByIsbn).toHaveBeenCalledTimes(1);
    expect(third.lookupByIsbn).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("Found by OpenLibrary", {
      capability: "isbn-lookup",
      query: "9780132350884",
      title: "Clean Code"
    });
  });

  it("follows the configured base order", async () => {
    const google = createFakeProvider({ name: "GoogleBooks", byIsbn: () => makeBook({ id: "g" }) });
    const wikidata = createFakeProvider({ name: "Wikidata", byIsbn: () => makeBook({ id: "w", source: "Wikidata" }) });
    const identifier = new BookIdentifier(new ProviderRegistry([google, wikidata]), createTestLogger(), {
      baseOrder: ["Wikidata", "GoogleBooks"]
    });

    const book = await identifier.identifyByIsbn("9780132350884");

    expect(book?.id).toBe("w");
    expect(google.lookupByIsbn).not.toHaveBeenCalled();
  });

  it("returns null when every provider misses", async () => {
    const providers = [
      createFakeProvider({ name: "GoogleBooks" }),
      createFakeProvider({ name: "OpenLibrary" })
    ];
    const logger = createTestLogger();
    const identifier = new BookIdentifier(new ProviderRegistry(providers), logger);

    expect(await identifier.identifyByIsbn("9780000000002")).toBeNull();
    expect(logger.info).toHaveBeenCalledWith("No provider found the book", {
      capability: "isbn-lookup",
      query: "9780000000002"
    });
  });

  it("moves on when a provider throws", async () => {
    const broken = createFakeProvider({ name: "GoogleBooks" });
    broken.lookupByIsbn.mockRejectedValueOnce(new Error("boom"));
    const fallback = createFakeProvider({ name: "OpenLibrary", byIsbn: () => makeBook({ id: "fallback" }) });
    const logger = createTestLogger();
    const identifier = new BookIdentifier(new ProviderRegistry([broken, fallback]), logger);

    expect((await identifier.identifyByIsbn("9780132350884"))?.id).toBe("fallback");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("skips providers without ISBN lookup", async () => {
    const vision = createFakeProvider({ name: "AzureVision", capabilities: ["image-identification"] });
    const google = createFakeProvider({ name: "GoogleBooks", byIsbn: () => makeBook() });
    const identifier = new BookIdentifier(new ProviderRegistry([vision, google]), createTestLogger());

    await identifier.identifyByIsbn("9780132350884");

    expect(vision.lookupByIsbn).not.toHaveBeenCalled();
  });

  it("does nothing for a blank ISBN", async () => {
    const google = createFakeProvider({ name: "GoogleBooks" });
    const identifier = new BookIdentifier(new ProviderRegistry([google]), createTestLogger());

    expect(await identifier.identifyByIsbn(" - ")).toBeNull();
    expect(google.lookupByIsbn).not.toHaveBeenCalled();
  });

  it("stops before the first call when already cancelled", async () => {
    const google = createFakeProvider({ name: "GoogleBooks", byIsbn: () => makeBook() });
    const identifier = new BookIdentifier(new ProviderRegistry([google]), createTestLogger());
    const controller = new AbortController();
    controller.abort();

    expect(await identifier.identifyByIsbn("9780132350884", { signal: controller.signal })).toBeNull();
    expect(google.lookupByIsbn).not.toHaveBeenCalled();
  });

  it("identifies a hyphenated ISBN through Google Books", async () => {
    const httpClient = new FakeHttpClient(() =>
      reply({
        items: [{ volumeInfo: { title: "Clean Code", authors: ["Robert C. Martin"], publishedDate: "2008" } }]
      })
    );
    const logger = createTestLogger();
    const google = new GoogleBooksProvider({ httpClient, logger });
    const identifier = new BookIdentifier(new ProviderRegistry([google]), logger);

    const book = await identifier.identifyByIsbn("978-0-13-235088-4");

    expect(book).toMatchObject({
      title: "Clean Code",
      authors: ["Robert C. Martin"],
      publishYear: 2008,
      isbn: "9780132350884",
      source: "GoogleBooks"
    });
    expect(paramOf(httpClient.requests[0], "q")).toBe("isbn:9780132350884");
  });
});

describe("BookIdentifier.identifyByText", () => {
  it("takes the first book of the first non-empty result", async () => {
    const empty = createFakeProvider({ name: "GoogleBooks", byText: () => [] });
    const hit = createFakeProvider({
      name: "OpenLibrary",
      byText: () => [makeBook({ id: "a" }), makeBook({ id: "b" })]
    });
    const identifier = new BookIdentifier(new ProviderRegistry([empty, hit]), createTestLogger());

    expect((await identifier.identifyByText("  clean code  "))?.id).toBe("a");
    expect(empty.searchByText).toHaveBeenCalledWith("clean code", {});
  });

  it("ignores a blank query", async () => {
    const google = createFakeProvider({ name: "GoogleBooks" });
    const identifier = new BookIdentifier(new ProviderRegistry([google]), createTestLogger());

    expect(await identifier.identifyByText("   ")).toBeNull();
    expect(google.searchByText).not.toHaveBeenCalled();
  });
});

describe("BookIdentifier.candidates", () => {
  it("keeps only providers with the capability", () => {
    const identifier = new BookIdentifier(
      new ProviderRegistry([
        createFakeProvider({ name: "Wikidata", capabilities: ["isbn-lookup"] }),
        createFakeProvider({ name: "GoogleBooks" })
      ]),
      createTestLogger()
    );

    expect(identifier.candidates("text-search").map((provider) => provider.name)).toEqual(["GoogleBooks"]);
  });
});

describe("BookIdentifier throttling and cancellation", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(Math, "random").mockReturnValue(0);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("waits between providers and not after a hit", async () => {
    const first = createFakeProvider({ name: "GoogleBooks" });
    const second = createFakeProvider({ name: "OpenLibrary", byIsbn: () => makeBook({ source: "OpenLibrary" }) });
    const third = createFakeProvider({ name: "ISBNdb", byIsbn: () => makeBook({ source: "ISBNdb" }) });
    const identifier = new BookIdentifier(new ProviderRegistry([first, second, third]), createTestLogger(), {
      interProviderDelayMs: 1000
    });

    const pending = identifier.identifyByIsbn("9780132350884");
    // 1000ms x0.8
    await vi.advanceTimersByTimeAsync(799);
    expect(first.lookupByIsbn).toHaveBeenCalledTimes(1);
    expect(second.lookupByIsbn).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);

    expect((await pending)?.source).toBe("OpenLibrary");
    expect(third.lookupByIsbn).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not wait when no delay is configured", async () => {
    const first = createFakeProvider({ name: "GoogleBooks" });
    const second = createFakeProvider({ name: "OpenLibrary", byIsbn: () => makeBook({ source: "OpenLibrary" }) });
    const identifier = new BookIdentifier(new ProviderRegistry([first, second]), createTestLogger());

    expect((await identifier.identifyByIsbn("9780132350884"))?.source).toBe("OpenLibrary");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("stops when cancelled while waiting for the next provider", async () => {
    const first = createFakeProvider({ name: "GoogleBooks" });
    const second = createFakeProvider({ name: "OpenLibrary", byIsbn: () => makeBook() });
    const logger = createTestLogger();
    const identifier = new BookIdentifier(new ProviderRegistry([first, second]), logger, {
      interProviderDelayMs: 60_000
    });
    const controller = new AbortController();

    const pending = identifier.identifyByIsbn("9780132350884", { signal: controller.signal });
    await vi.advanceTimersByTimeAsync(0);
    expect(first.lookupByIsbn).toHaveBeenCalledTimes(1);

    controller.abort();

    expect(await pending).toBeNull();
    expect(second.lookupByIsbn).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("Lookup was cancelled", {
      capability: "isbn-lookup",
      query: "9780132350884"
    });
  });

  it("does not call the next provider when cancelled during a lookup", async () => {
    const controller = new AbortController();
    const first = createFakeProvider({
      name: "GoogleBooks",
      byIsbn: () => {
        controller.abort();
        return null;
      }
    });
    const second = createFakeProvider({ name: "OpenLibrary", byIsbn: () => makeBook() });
    const identifier = new BookIdentifier(new ProviderRegistry([first, second]), createTestLogger());

    expect(await identifier.identifyByIsbn("9780132350884", { signal: controller.signal })).toBeNull();
    expect(second.lookupByIsbn).not.toHaveBeenCalled();
  });
});
