import type { BookProvider, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { firstString, isRecord, readArray, readRecord, readString, type JsonRecord } from "./json-reader";

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
import { absolutizeUrl, extractPublishYear, toPageCount } from "@/domain/services/canonicalize";
import { normalizeIsbn, pickPreferredIsbn } from "@/domain/services/isbn-service";

export const INVENTAIRE_ORIGIN = "https://inventaire.io";
const INVENTAIRE_API_URI = `${INVENTAIRE_ORIGIN}/api`;
const DEFAULT_LIMIT = 10;

/** 版 (edition) から作品 (P629)・著者 (P50)・出版社 (P123) まで一度に取得する */
const RELATIVES = "wdt:P629|wdt:P50|wdt:P123";

export type InventaireOptions = {
  readonly limit?: number;
};

const claimValues = (entity: unknown, property: string): readonly unknown[] =>
  readArray(readRecord(entity, "claims"), property);

const firstClaim = (entity: unknown, property: string): string | number | null => {
  const value = claimValues(entity, property)[0];
  return typeof value === "string" || typeof value === "number" ? value : null;
};

const claimString = (entity: unknown, property: string): string | null => {
  const value = firstClaim(entity, property);
  return typeof value === "string" ? value : null;
};

/** 英語を優先し、無ければどれか1つ */
const localized = (values: JsonRecord | null): string | null => {
  if (values === null) return null;
  return readString(values, "en") ?? firstString(Object.values(values));
};

const entityLabel = (entity: unknown): string | null => localized(readRecord(entity, "labels"));

const entityImage = (entity: unknown): string | null => {
  if (!isRecord(entity)) return null;
  const image = entity["image"];
  if (typeof image === "string") return image;
  if (Array.isArray(image)) return firstString(image);
  return readString(image, "url");
};

const resolveLabels = (uris: readonly unknown[], entities: JsonRecord): string[] =>
  uris
    .filter((uri): uri is string => typeof uri === "string")
    .map((uri) => entityLabel(entities[uri]))
    .filter((label): label is string => label !== null);

/**
 * by-uris のレスポンスから ISBN に対応する版を探す
 * isbn:… が inv:… にリダイレクトされている場合もある
 */
const findEdition = (data: unknown, uri: string): JsonRecord | null => {
  const entities = readRecord(data, "entities");
  if (entities === null) return null;

  const direct = readRecord(entities, uri);
  if (direct !== null) return direct;

  const redirected = readString(readRecord(data, "redirects"), uri);
  if (redirected !== null) {
    const entity = readRecord(entities, redirected);
    if (entity !== null) return entity;
  }
  const isEdition = (entity: unknown): entity is JsonRecord => readString(entity, "type") === "edition";
  return Object.values(entities).find(isEdition) ?? null;
};

/**
 * 版のエンティティを Book に変換する。著者などは同じレスポンスに含まれる relatives から引く
 * @link https://api.inventaire.io/#/Entities/getEntitiesByUris
 */
export const mapInventaireEdition = (edition: unknown, entities: JsonRecord): Book | null => {
  const works = claimValues(edition, "wdt:P629")
    .filter((uri): uri is string => typeof uri === "string")
    .map((uri) => entities[uri])
    .filter(isRecord);

  const editionAuthors = resolveLabels(claimValues(edition, "wdt:P50"), entities);
  const authors =
    editionAuthors.length > 0
      ? editionAuthors
      : works.flatMap((work) => resolveLabels(claimValues(work, "wdt:P50"), entities));
  const image = entityImage(edition) ?? works.map(entityImage).find((url) => url !== null) ?? null;

  return createBook({
    title: claimString(edition, "wdt:P1476") ?? entityLabel(edition),
    authors: [...new Set(authors)],
    publisher: resolveLabels(claimValues(edition, "wdt:P123"), entities)[0] ?? null,
    publishYear: extractPublishYear(firstClaim(edition, "wdt:P577")),
    pageCount: toPageCount(firstClaim(edition, "wdt:P1104")),
    isbn: pickPreferredIsbn([claimString(edition, "wdt:P212"), claimString(edition, "wdt:P957")]),
    description:
      localized(readRecord(edition, "descriptions")) ??
      works.map((work) => localized(readRecord(work, "descriptions"))).find((text) => text !== null) ??
      null,
    coverImageUrl: image === null ? null : absolutizeUrl(image, INVENTAIRE_ORIGIN),
    source: "Inventaire",
    externalId: readString(edition, "uri")
  });
};

/**
 * search?types=works の1件。著者・ISBN は含まれない
 */
export const mapInventaireSearchResult = (result: unknown): Book | null => {
  const image = entityImage(result);
  return createBook({
    title: readString(result, "label"),
    description: readString(result, "description"),
    coverImageUrl: image === null ? null : absolutizeUrl(image, INVENTAIRE_ORIGIN),
    source: "Inventaire",
    externalId: readString(result, "uri")
  });
};

/**
 * Inventaire (API キー不要、表紙画像が充実している)
 */
export class InventaireProvider implements BookProvider {
  readonly name = "Inventaire";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["isbn-lookup", "text-search"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly limit: number;

  constructor(dependencies: ProviderDependencies, options: InventaireOptions = {}) {
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
    this.limit = options.limit ?? DEFAULT_LIMIT;
  }

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<Result<Book, LookupError>> {
    const normalized = normalizeIsbn(isbn);
    if (normalized === "") {
      return lookupFailure(this.logger, this.name, isbn, new InvalidIsbnError(isbn), options);
    }
    const uri = `isbn:${normalized}`;

    const response = await this.httpClient.get(`${INVENTAIRE_API_URI}/entities`, {
      params: { action: "by-uris", uris: uri, relatives: RELATIVES },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, normalized, response.err, options);
    }
    const data = response.value.data;
    if (!isRecord(data)) {
      return lookupFailure(
        this.logger,
        this.name,
        normalized,
        new ParseError("Inventaire response is not an object"),
        options
      );
    }

    const edition = findEdition(data, uri);
    const book = edition === null ? null : mapInventaireEdition(edition, readRecord(data, "entities") ?? {});
    if (book === null) {
      return lookupFailure(this.logger, this.name, normalized, new BookNotFoundError(normalized), options);
    }
    return Ok({ ...book, isbn: book.isbn ?? normalized });
  }

  async searchByText(query: string, options: LookupOptions = {}): Promise<Book[]> {
    const response = await this.httpClient.get(`${INVENTAIRE_API_URI}/search`, {
      params: { types: "works", search: query, lang: "en", limit: this.limit },
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
        new ParseError("Inventaire response is not an object"),
        options
      );
      return [];
    }
    return readArray(response.value.data, "results")
      .map(mapInventaireSearchResult)
      .filter((book): book is Book => book !== null);
  }
}
