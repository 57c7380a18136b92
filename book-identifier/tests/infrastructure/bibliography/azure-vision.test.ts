import { describe, expect, it, vi } from "vitest";

import { FakeHttpClient, reply, type FakeReply } from "../../helpers/fake-http-client";
import { createTestLogger } from "../../helpers/test-logger";

import { BookNotFoundError, ConfigError, isErr, isOk, ParseError } from "@/domain/error";
import {
  AzureVisionProvider,
  mapVisionAnalysis,
  readRecognizedLines,
  type AzureVisionOptions
} from "@/infrastructure/bibliography/azure-vision";

const analysis = {
  modelVersion: "2023-10-01",
  captionResult: { text: "a book cover with a dragon", confidence: 0.8 },
  readResult: {
    blocks: [{ lines: [{ text: "The Hobbit" }, { text: " J. R. R. Tolkien " }, { text: " " }] }]
  }
};

const createProvider = (answer: FakeReply, options: AzureVisionOptions) => {
  const httpClient = new FakeHttpClient(() => answer);
  const logger = createTestLogger();
  return { httpClient, logger, provider: new AzureVisionProvider({ httpClient, logger }, options) };
};

describe("readRecognizedLines", () => {
  it("collects non-blank lines across blocks", () => {
    expect(
      readRecognizedLines({ readResult: { blocks: [{ lines: [{ text: "A" }] }, { lines: [{ text: " B " }] }] } })
    ).toEqual(["A", "B"]);
    expect(readRecognizedLines({})).toEqual([]);
  });
});

describe("mapVisionAnalysis", () => {
  it("takes the first line as title and the second as author", () => {
    expect(mapVisionAnalysis(analysis)).toMatchObject({
      book: {
        title: "The Hobbit",
        authors: ["J. R. R. Tolkien"],
        description: "a book cover with a dragon",
        source: "AzureVision"
      },
      recognizedText: "The Hobbit\nJ. R. R. Tolkien"
    });
  });

  it("falls back to the caption when no text was read", () => {
    expect(mapVisionAnalysis({ captionResult: { text: "a red book" } })?.book.title).toBe("a red book");
    expect(mapVisionAnalysis({})).toBeNull();
  });
});

describe("AzureVisionProvider", () => {
  it("requires an endpoint", () => {
    const httpClient = new FakeHttpClient(() => reply({}));

    expect(() => new AzureVisionProvider({ httpClient, logger: createTestLogger() }, { endpoint: " " })).toThrow(
      ConfigError
    );
  });

  it("posts the image with the subscription key", async () => {
    const { httpClient, provider } = createProvider(reply(analysis), {
      endpoint: "https://vision.example.test/",
      apiKey: "test-secret"
    });

    const result = await provider.identifyFromImage(new Uint8Array([1, 2, 3]));

    expect(isOk(result) && result.value.book.title).toBe("The Hobbit");
    const request = httpClient.requests[0];
    expect(request.method).toBe("POST");
    expect(request.url).toBe("https://vision.example.test/computervision/imageanalysis:analyze");
    expect(request.body).toEqual(Buffer.from([1, 2, 3]));
    expect(request.config?.headers).toEqual({
      "Ocp-Apim-Subscription-Key": "test-secret",
      "Content-Type": "application/octet-stream"
    });
    expect(request.config?.params).toEqual({ "api-version": "2024-02-01", features: "read,caption", language: "en" });
  });

  it("uses a bearer token when no key is configured", async () => {
    const getToken = vi.fn(async () => "test-token");
    const { httpClient, provider } = createProvider(reply(analysis), {
      endpoint: "https://vision.example.test",
      tokenSource: { getToken }
    });

    await provider.identifyFromImage(new Uint8Array([1]));

    expect(getToken).toHaveBeenCalledTimes(1);
    expect(httpClient.requests[0].config?.headers?.["Authorization"]).toBe("Bearer test-token");
  });

  it("reports a token failure as a configuration error", async () => {
    const { httpClient, provider } = createProvider(reply(analysis), {
      endpoint: "https://vision.example.test",
      tokenSource: {
        getToken: async () => {
          throw new Error("no credential available");
        }
      }
    });

    const result = await provider.identifyFromImage(new Uint8Array([1]));

    expect(isErr(result) && result.err.message).toBe(
      "Configuration Error: Failed to acquire an Azure token: no credential available"
    );
    expect(httpClient.requests).toHaveLength(0);
  });

  it("rejects an empty image without a request", async () => {
    const { httpClient, provider } = createProvider(reply(analysis), {
      endpoint: "https://vision.example.test",
      apiKey: "test-secret"
    });

    const result = await provider.identifyFromImage(new Uint8Array());

    expect(isErr(result) && result.err).toBeInstanceOf(ParseError);
    expect(httpClient.requests).toHaveLength(0);
  });

  it("reports a cover without text as not found", async () => {
    const { provider } = createProvider(reply({ readResult: { blocks: [] } }), {
      endpoint: "https://vision.example.test",
      apiKey: "test-secret"
    });

    const result = await provider.identifyFromImage(new Uint8Array([1]));

    expect(isErr(result) && result.err).toBeInstanceOf(BookNotFoundError);
  });
});
