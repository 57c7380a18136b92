import type { BookProvider, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { isRecord, readArray, readRecord, readString } from "./json-reader";

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
import { convertIsbn10To13, isIsbn10, isIsbn13, normalizeIsbn } from "@/domain/services/isbn-service";

const WIKIDATA_SPARQL_URI = "https://query.wikidata.org/sparql";
const COMMONS_API_URI = "https://commons.wikimedia.org/w/api.php";
const LABEL_LANGUAGES = "en,es,de,fr";
const USER_AGENT = "book-identifier/0.1";

/**
 * P212 (ISBN-13) / P957 (ISBN-10) はハイフン付きで登録されているので、ハイフンを除いて比較する
 * 著者が複数いると行が増えるので LIMIT は余裕を持たせる
 */
export const buildIsbnQuery = (isbns: readonly string[]): string => `
SELECT ?item ?itemLabel ?authorLabel ?publisherLabel ?publicationDate ?pages ?coverImage ?description WHERE {
  VALUES ?target { ${isbns.map((isbn) => `"${isbn}"`).join(" ")} }
  ?item wdt:P212|wdt:P957 ?rawIsbn .
  FILTER(REPLACE(STR(?rawIsbn), "-", "") = ?target)
  OPTIONAL { ?item wdt:P50 ?author . }
  OPTIONAL { ?item wdt:P123 ?publisher . }
  OPTIONAL { ?item wdt:P577 ?publicationDate . }
  OPTIONAL { ?item wdt:P1104 ?pages . }
  OPTIONAL { ?item wdt:P18 ?coverImage . }
  OPTIONAL { ?item schema:description ?description . FILTER(LANG(?description) = "en") }
  SERVICE wikibase:label { bd:serviceParam wikibase:language "${LABEL_LANGUAGES}". }
}
LIMIT 20`;

const bindingValue = (binding: unknown, name: string): string | null => {
  const value = readString(readRecord(binding, name), "value");
  return value === null || value.trim() === "" ? null : value;
};

/** ラベルが無いとラベルサービスは "Q12345" をそのまま返す */
const isEntityIdLabel = (label: string): boolean => /^Q\d+$/.test(label);

export type WikidataMatch = {
  readonly book: Book;
  /** Commons のファイル名 (P18) */
  readonly coverFile: string | null;
};

/**
 * SPARQL の結果行を1冊にまとめる (最初の ?item の行だけを使う)
 */
export const mapWikidataBindings = (bindings: readonly unknown[], isbn: string): WikidataMatch | null => {
  const first = bindings[0];
  const item = bindingValue(first, "item");
  if (item === null) {
    return null;
  }
  const rows = bindings.filter((binding) => bindingValue(binding, "item") === item);

  const authors = new Set<string>();
  for (const row of rows) {
    const author = bindingValue(row, "authorLabel");
    if (author !== null && !isEntityIdLabel(author)) {
      authors.add(author);
    }
  }
  const label = bindingValue(first, "itemLabel");
  const publisher = bindingValue(first, "publisherLabel");

  const book = createBook({
    title: label === null || isEntityIdLabel(label) ? null : label,
    authors: [...authors],
    publisher: publisher === null || isEntityIdLabel(publisher) ? null : publisher,
    publishYear: extractPublishYear(bindingValue(first, "publicationDate")),
    pageCount: toPageCount(bindingValue(first, "pages")),
    isbn,
    description: bindingValue(first, "description"),
    source: "Wikidata",
    externalId: item.split("/").pop() ?? item
  });
  if (book === null) {
    return null;
  }

  const coverImage = rows.map((row) => bindingValue(row, "coverImage")).find((value) => value !== null) ?? null;
  return { book, coverFile: coverImage === null ? null : commonsFileName(coverImage) };
};

/**
 * "http://commons.wikimedia.org/wiki/Special:FilePath/Foo%20Bar.jpg" -> "Foo Bar.jpg"
 */
export const commonsFileName = (commonsUrl: string): string => {
  const last = commonsUrl.split("/").pop() ?? commonsUrl;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
};

/**
 * imageinfo API の query.pages は pageid をキーにしたオブジェクト
 */
export const readCommonsImageUrl = (data: unknown): string | null => {
  const pages = readRecord(readRecord(data, "query"), "pages");
  if (pages === null) {
    return null;
  }
  for (const page of Object.values(pages)) {
    const url = readString(readArray(page, "imageinfo")[0], "url");
    if (url !== null) {
      return url;
    }
  }
  return null;
};

/**
 * Wikidata の SPARQL エンドポイント (API キー不要)
 * 表紙は Commons のファイル名しか返らないので、imageinfo API で直接のURLを引く
 */
export class WikidataProvider implements BookProvider {
  readonly name = "Wikidata";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["isbn-lookup"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;

  constructor(dependencies: ProviderDependencies) {
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
  }

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<Result<Book, LookupError>> {
    const normalized = normalizeIsbn(isbn);
    const isbns = isIsbn10(normalized)
      ? [convertIsbn10To13(normalized), normalized]
      : isIsbn13(normalized)
        ? [normalized]
        : null;
    if (isbns === null) {
      return lookupFailure(this.logger, this.name, isbn, new InvalidIsbnError(isbn), options);
    }
    const isbn13 = isbns[0];

    const response = await this.httpClient.get(WIKIDATA_SPARQL_URI, {
      params: { query: buildIsbnQuery(isbns), format: "json" },
      headers: { Accept: "application/sparql-results+json", "User-Agent": USER_AGENT },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, isbn13, response.err, options);
    }
    if (!isRecord(response.value.data)) {
      return lookupFailure(
        this.logger,
        this.name,
        isbn13,
        new ParseError("Wikidata response is not an object"),
        options
      );
    }

    const match = mapWikidataBindings(readArray(readRecord(response.value.data, "results"), "bindings"), isbn13);
    if (match === null) {
      return lookupFailure(this.logger, this.name, isbn13, new BookNotFoundError(isbn13), options);
    }
    if (match.coverFile === null) {
      return Ok(match.book);
    }

    const coverImageUrl = await this.resolveCommonsImage(match.coverFile, options);
    return Ok({ ...match.book, coverImageUrl });
  }

  /**
   * 失敗したら表紙なしで返す
   */
  private async resolveCommonsImage(fileName: string, options: LookupOptions): Promise<string | null> {
    const response = await this.httpClient.get(COMMONS_API_URI, {
      params: { action: "query", titles: `File:${fileName}`, prop: "imageinfo", iiprop: "url", format: "json" },
      headers: { "User-Agent": USER_AGENT },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      this.logger.warn("Wikidata: failed to resolve the Commons image", { fileName, error: response.err });
      return null;
    }
    return readCommonsImageUrl(response.value.data);
  }
}
