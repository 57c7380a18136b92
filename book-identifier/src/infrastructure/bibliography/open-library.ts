import type { BookProvider, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { firstString, isRecord, readArray, readNumber, readScalar, readString, readStrings } from "./json-reader";

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
import { extractPublishYear, toPageCount } from "@/domain/services/canonicalize";
import { normalizeIsbn, pickPreferredIsbn } from "@/domain/services/isbn-service";

const OPEN_LIBRARY_URI = "https://openlibrary.org";
const OPEN_LIBRARY_COVERS_URI = "https://covers.openlibrary.org";
const DEFAULT_LIMIT = 10;
const SEARCH_FIELDS = [
  "key",
  "title",
  "subtitle",
  "author_name",
  "publisher",
  "first_publish_year",
  "publish_date",
  "number_of_pages_median",
  "isbn",
  "cover_i"
].join(",");

export type OpenLibraryOptions = {
  readonly limit?: number;
};

export const openLibraryCoverUrl = (coverId: number): string => `${OPEN_LIBRARY_COVERS_URI}/b/id/${coverId}-L.jpg`;

/**
 * search.json の docs 1件を Book に変換する。タイトルが無ければ null
 * @link https://openlibrary.org/dev/docs/api/search
 */
export const mapOpenLibraryDoc = (doc: unknown): Book | null => {
  const title = readString(doc, "title");
  const subtitle = readString(doc, "subtitle") ?? "";
  const coverId = readNumber(doc, "cover_i");

  return createBook({
    title: title === null ? null : `${title}${subtitle === "" ? subtitle : " " + subtitle}`,
    authors: readStrings(doc, "author_name"),
    publisher: firstString(readArray(doc, "publisher")),
    publishYear:
      extractPublishYear(readNumber(doc, "first_publish_year")) ??
      extractPublishYear(firstString(readArray(doc, "publish_date"))),
    pageCount: toPageCount(readScalar(doc, "number_of_pages_median")),
    isbn: pickPreferredIsbn(readStrings(doc, "isbn")),
    coverImageUrl: coverId === null ? null : openLibraryCoverUrl(coverId),
    source: "OpenLibrary",
    externalId: readString(doc, "key")
  });
};

/**
 * works の description は文字列か { type, value } のどちらか
 */
export const readWorkDescription = (work: unknown): string | null => {
  if (!isRecord(work)) return null;
  const description = work["description"];
  if (typeof description === "string") {
    return description;
  }
  return readString(description, "value");
};

const mapDocs = (data: unknown): Book[] =>
  readArray(data, "docs")
    .map(mapOpenLibraryDoc)
    .filter((book): book is Book => book !== null);

/**
 * Open Library の検索API
 * ISBN検索では works から説明文をもう一度取りに行く
 */
export class OpenLibraryProvider implements BookProvider {
  readonly name = "OpenLibrary";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["isbn-lookup", "text-search"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly limit: number;

  constructor(dependencies: ProviderDependencies, options: OpenLibraryOptions = {}) {
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
    this.limit = options.limit ?? DEFAULT_LIMIT;
  }

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<Result<Book, LookupError>> {
    const normalized = normalizeIsbn(isbn);
    if (normalized === "") {
      return lookupFailure(this.logger, this.name, isbn, new InvalidIsbnError(isbn), options);
    }

    const response = await this.httpClient.get(`${OPEN_LIBRARY_URI}/search.json`, {
      params: { isbn: normalized, fields: SEARCH_FIELDS, limit: 1 },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, normalized, response.err, options);
    }
    if (!isRecord(response.value.data)) {
      return lookupFailure(
        this.logger,
        this.name,
        normalized,
        new ParseError("OpenLibrary response is not an object"),
        options
      );
    }

    const book = mapDocs(response.value.data)[0];
    if (book === undefined) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }

    const description = await this.fetchWorkDescription(book.externalId, options);
    return Ok({ ...book, isbn: normalized, description: book.description ?? description });
  }

  async searchByText(query: string, options: LookupOptions = {}): Promise<Book[]> {
    const response = await this.httpClient.get(`${OPEN_LIBRARY_URI}/search.json`, {
      params: { q: query, fields: SEARCH_FIELDS, limit: this.limit },
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
        new ParseError("OpenLibrary response is not an object"),
        options
      );
      return [];
    }
    return mapDocs(response.value.data);
  }

  /**
   * 失敗しても本体の結果は捨てない
   */
  private async fetchWorkDescription(workKey: string | null, options: LookupOptions): Promise<string | null> {
    if (workKey === null || !workKey.startsWith("/works/")) {
      return null;
    }
    const response = await this.httpClient.get(`${OPEN_LIBRARY_URI}${workKey}.json`, {
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      this.logger.warn("OpenLibrary: failed to fetch the work description", { workKey, error: response.err });
      return null;
    }
    if (response.value.status === 404) {
      return null;
    }
    const description = readWorkDescription(response.value.data);
    return description !== null && description.trim() !== "" ? description.trim() : null;
  }
}
