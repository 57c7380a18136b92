import type { Book } from "../entities/book";

const dedupeKey = (book: Book): string =>
  book.isbn !== null ? `isbn:${book.isbn}` : `${book.title.toLowerCase()}|${book.authors.join(",").toLowerCase()}`;

/**
 * 同じ本が複数の取得元から返ってきた場合、最初に現れたものだけ残す
 */
export const dedupeBooks = (books: readonly Book[]): Book[] => {
  const seen = new Set<string>();
  return books.filter((book) => {
    const key = dedupeKey(book);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};
