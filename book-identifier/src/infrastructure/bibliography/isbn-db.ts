import type { BookProvider, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { isRecord, readArray, readRecord, readScalar, readString, readStrings } from "./json-reader";

import { createBook, type Book } from "@/domain/entities/book";
import {
  BookNotFoundError,
  ConfigError,
  Err,
  InvalidIsbnError,
  isErr,
  Ok,
  ParseError,
  type LookupError,
  type Result
} from "@/domain/error";
import { extractPublishYear, preferHttps, toPageCount } from "@/domain/services/canonicalize";
import { normalizeIsbn, pickPreferredIsbn } from "@/domain/services/isbn-service";

const ISBNDB_API_URI = "https://api2.isbndb.com";
const DEFAULT_PAGE_SIZE = 20;

export type IsbnDbOptions = {
  readonly apiKey?: string | null;
  readonly pageSize?: number;
};

/**
 * @link https://isbndb.com/apidocs/v2
 */
export const mapIsbnDbBook = (bookinfo: unknown): Book | null => {
  const image = readString(bookinfo, "image");
  return createBook({
    title: readString(bookinfo, "title") ?? readString(bookinfo, "title_long"),
    authors: readStrings(bookinfo, "authors"),
    publisher: readString(bookinfo, "publisher"),
    publishYear: extractPublishYear(readScalar(bookinfo, "date_published")),
    pageCount: toPageCount(readScalar(bookinfo, "pages")),
    isbn: pickPreferredIsbn([readString(bookinfo, "isbn13"), readString(bookinfo, "isbn")]),
    description: readString(bookinfo, "synopsis") ?? readString(bookinfo, "overview"),
    coverImageUrl: image === null ? null : preferHttps(image),
    source: "ISBNdb",
    externalId: readString(bookinfo, "isbn13")
  });
};

/**
 * ISBNdb は API キー必須
 * キーが無ければ警告だけ出して何もしない (リクエストも送らない)
 */
export class IsbnDbProvider implements BookProvider {
  readonly name = "ISBNdb";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["isbn-lookup", "text-search"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly apiKey: string | null;
  private readonly pageSize: number;

  constructor(dependencies: ProviderDependencies, options: IsbnDbOptions = {}) {
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
    const apiKey = options.apiKey?.trim() ?? "";
    this.apiKey = apiKey === "" ? null : apiKey;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<Result<Book, LookupError>> {
    if (this.apiKey === null) {
      this.logger.warn("ISBNdb: API key is not configured; skipping", { isbn });
      return Err(new ConfigError("IsbnDB API key is missing"));
    }
    const normalized = normalizeIsbn(isbn);
    if (normalized === "") {
      return lookupFailure(this.logger, this.name, isbn, new InvalidIsbnError(isbn), options);
    }

    const response = await this.httpClient.get(`${ISBNDB_API_URI}/book/${encodeURIComponent(normalized)}`, {
      headers: this.headers(this.apiKey),
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, normalized, response.err, options);
    }

    const data = response.value.data;
    if (response.value.status === 404 || readString(data, "errorMessage") !== null) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }
    if (!isRecord(data)) {
      return lookupFailure(
        this.logger,
        this.name,
        normalized,
        new ParseError("ISBNdb response is not an object"),
        options
      );
    }

    const book = mapIsbnDbBook(readRecord(data, "book"));
    if (book === null) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }
    return Ok({ ...book, isbn: book.isbn ?? normalized });
  }

  async searchByText(query: string, options: LookupOptions = {}): Promise<Book[]> {
    if (this.apiKey === null) {
      this.logger.warn("ISBNdb: API key is not configured; skipping", { query });
      return [];
    }

    const response = await this.httpClient.get(`${ISBNDB_API_URI}/books/${encodeURIComponent(query)}`, {
      headers: this.headers(this.apiKey),
      params: { page: 1, pageSize: this.pageSize },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      lookupFailure(this.logger, this.name, query, response.err, options);
      return [];
    }
    if (!isRecord(response.value.data)) {
      lookupFailure(
        this.logger,
        this.name,
        query,
        new ParseError("ISBNdb response is not an object"),
        options
      );
      return [];
    }
    return readArray(response.value.data, "books")
      .map(mapIsbnDbBook)
      .filter((book): book is Book => book !== null);
  }

  private headers(apiKey: string): Record<string, string> {
    return {
      Authorization: apiKey,
      "Content-Type": "application/json"
    };
  }
}
