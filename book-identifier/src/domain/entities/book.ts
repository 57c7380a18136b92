import { randomUUID } from "node:crypto";

import type { BookSource } from "../book-sources";

export type Book = {
  readonly id: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly publisher: string | null;
  readonly publishYear: number | null;
  readonly pageCount: number | null;
  readonly isbn: string | null;
  readonly description: string | null;
  readonly coverImageUrl: string | null;
  readonly source: BookSource;
  readonly externalId: string | null;
};

/**
 * 各プロバイダーのマッピング結果
 * title 以外はすべて省略可能
 */
export type BookDraft = {
  readonly id?: string;
  readonly title?: string | null;
  readonly authors?: readonly (string | null | undefined)[] | null;
  readonly publisher?: string | null;
  readonly publishYear?: number | null;
  readonly pageCount?: number | null;
  readonly isbn?: string | null;
  readonly description?: string | null;
  readonly coverImageUrl?: string | null;
  readonly source: BookSource;
  readonly externalId?: string | null;
};

/** 補完対象にできるフィールド (id / title / source は対象外) */
export const ENRICHABLE_FIELDS = [
  "authors",
  "publisher",
  "publishYear",
  "pageCount",
  "isbn",
  "description",
  "coverImageUrl",
  "externalId"
] as const;
export type EnrichableField = (typeof ENRICHABLE_FIELDS)[number];

export const isEnrichableField = (value: string): value is EnrichableField =>
  ENRICHABLE_FIELDS.some((field) => field === value);

const blankToNull = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
};

/**
 * Book を生成する唯一の入口
 * タイトルが空の場合は null (呼び出し側で破棄する)
 */
export function createBook(draft: BookDraft): Book | null {
  const title = blankToNull(draft.title);
  if (title === null) {
    return null;
  }

  const authors = (draft.authors ?? [])
    .map((author) => blankToNull(author))
    .filter((author): author is string => author !== null);

  return {
    id: draft.id ?? randomUUID(),
    title,
    authors,
    publisher: blankToNull(draft.publisher),
    publishYear: draft.publishYear ?? null,
    pageCount: draft.pageCount ?? null,
    isbn: blankToNull(draft.isbn),
    description: blankToNull(draft.description),
    coverImageUrl: blankToNull(draft.coverImageUrl),
    source: draft.source,
    externalId: blankToNull(draft.externalId)
  };
}

export const isFieldMissing = (book: Book, field: EnrichableField): boolean => {
  if (field === "authors") {
    return book.authors.length === 0;
  }
  return book[field] === null;
};

export const missingFields = (book: Book, fields: readonly EnrichableField[]): EnrichableField[] =>
  fields.filter((field) => isFieldMissing(book, field));

/**
 * base の空フィールドのうち fields に含まれるものだけを donor から埋める
 * 何も埋まらなければ base をそのまま返す
 */
export function fillMissingFields(base: Book, donor: Book, fields: readonly EnrichableField[]): Book {
  let filled: Book = base;
  for (const field of fields) {
    if (!isFieldMissing(filled, field) || isFieldMissing(donor, field)) {
      continue;
    }
    filled = copyField(filled, donor, field);
  }
  return filled;
}

function copyField(target: Book, donor: Book, field: EnrichableField): Book {
  switch (field) {
    case "authors":
      return { ...target, authors: donor.authors };
    case "publishYear":
      return { ...target, publishYear: donor.publishYear };
    case "pageCount":
      return { ...target, pageCount: donor.pageCount };
    case "publisher":
      return { ...target, publisher: donor.publisher };
    case "isbn":
      return { ...target, isbn: donor.isbn };
    case "description":
      return { ...target, description: donor.description };
    case "coverImageUrl":
      return { ...target, coverImageUrl: donor.coverImageUrl };
    case "externalId":
      return { ...target, externalId: donor.externalId };
  }
}
