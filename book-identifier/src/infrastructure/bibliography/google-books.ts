import type { BookProvider, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { isRecord, readArray, readRecord, readScalar, readString, readStrings } from "./json-reader";

import { createBook, type Book } from "@/domain/entities/book";
import {
  BookNotFoundError,
  InvalidIsbnError,
  isErr,
  Ok,
  ParseError,
  type LookupError,
  type Result
} from "@/domain/error";
import { extractPublishYear, preferHttps, toPageCount } from "@/domain/services/canonicalize";
import { normalizeIsbn, pickPreferredIsbn } from "@/domain/services/isbn-service";

const GOOGLE_BOOKS_API_URI = "https://www.googleapis.com/books/v1";
const DEFAULT_MAX_RESULTS = 10;

/**
 * imageLinks のうち大きいものから採用する
 * @link https://developers.google.com/books/docs/v1/reference/volumes
 */
const IMAGE_SIZE_PRIORITY = ["extraLarge", "large", "medium", "small", "thumbnail", "smallThumbnail"] as const;

export type GoogleBooksOptions = {
  readonly apiKey?: string | null;
  readonly maxResults?: number;
};

export const pickGoogleCover = (imageLinks: unknown): string | null => {
  for (const size of IMAGE_SIZE_PRIORITY) {
    const url = readString(imageLinks, size);
    if (url !== null && url.trim() !== "") {
      return preferHttps(url).replace("&edge=curl", "");
    }
  }
  return null;
};

const pickGoogleIsbn = (identifiers: readonly unknown[]): string | null => {
  const ofType = (type: string): (string | null)[] =>
    identifiers.filter((entry) => readString(entry, "type") === type).map((entry) => readString(entry, "identifier"));
  return pickPreferredIsbn([...ofType("ISBN_13"), ...ofType("ISBN_10")]);
};

/**
 * volumes の1件を Book に変換する。タイトルが無ければ null
 */
export const mapGoogleBookItem = (item: unknown): Book | null => {
  const volumeInfo = readRecord(item, "volumeInfo");
  if (volumeInfo === null) {
    return null;
  }
  const title = readString(volumeInfo, "title");
  const subtitle = readString(volumeInfo, "subtitle") ?? "";

  return createBook({
    title: title === null ? null : `${title}${subtitle === "" ? subtitle : " " + subtitle}`,
    authors: readStrings(volumeInfo, "authors"),
    publisher: readString(volumeInfo, "publisher"),
    publishYear: extractPublishYear(readString(volumeInfo, "publishedDate")),
    pageCount: toPageCount(readScalar(volumeInfo, "pageCount")),
    isbn: pickGoogleIsbn(readArray(volumeInfo, "industryIdentifiers")),
    description: readString(volumeInfo, "description"),
    coverImageUrl: pickGoogleCover(readRecord(volumeInfo, "imageLinks")),
    source: "GoogleBooks",
    externalId: readString(item, "id")
  });
};

const mapItems = (data: unknown): Book[] =>
  readArray(data, "items")
    .map(mapGoogleBookItem)
    .filter((book): book is Book => book !== null);

/**
 * Google Booksの検索
 * API キーは無くても動く (匿名のクォータになる)
 * @link https://developers.google.com/books/docs/v1/reference/volumes/list?hl=en
 */
export class GoogleBooksProvider implements BookProvider {
  readonly name = "GoogleBooks";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["isbn-lookup", "text-search"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly apiKey: string | null;
  private readonly maxResults: number;

  constructor(dependencies: ProviderDependencies, options: GoogleBooksOptions = {}) {
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
    this.apiKey = options.apiKey ?? null;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<Result<Book, LookupError>> {
    const normalized = normalizeIsbn(isbn);
    if (normalized === "") {
      return lookupFailure(this.logger, this.name, isbn, new InvalidIsbnError(isbn), options);
    }

    const response = await this.httpClient.get(`${GOOGLE_BOOKS_API_URI}/volumes`, {
      params: { q: `isbn:${normalized}`, key: this.apiKey ?? undefined },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, normalized, response.err, options);
    }
    if (response.value.status === 404) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }

    const data = response.value.data;
    if (!isRecord(data)) {
      return lookupFailure(
        this.logger,
        this.name,
        normalized,
        new ParseError("GoogleBooks response is not an object"),
        options
      );
    }

    //本の情報があった
    const book = mapItems(data)[0];
    if (book === undefined) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }
    return Ok({ ...book, isbn: book.isbn ?? normalized });
  }

  async searchByText(query: string, options: LookupOptions = {}): Promise<Book[]> {
    const response = await this.httpClient.get(`${GOOGLE_BOOKS_API_URI}/volumes`, {
      params: { q: query, maxResults: this.maxResults, key: this.apiKey ?? undefined },
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
        new ParseError("GoogleBooks response is not an object"),
        options
      );
      return [];
    }
    return mapItems(response.value.data);
  }
}
