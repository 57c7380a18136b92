import { eq, or, sql, type Column, type SQL } from "drizzle-orm";

import type { BookRepository } from "@/application/interfaces/book-repository";
import type { Logger } from "@/application/interfaces/logger";
import type { Book } from "@/domain/entities/book";
import type { DrizzleDatabase } from "@/infrastructure/database/connection";
import type { BookRow, NewBookRow } from "@/infrastructure/database/schema";

import { isProviderName } from "@/domain/book-sources";
import { Err, Ok, RepositoryError, type Result } from "@/domain/error";
import { normalizeIsbn } from "@/domain/services/isbn-service";
import { booksTable } from "@/infrastructure/database/schema";

const parseAuthors = (json: string): string[] => {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((author): author is string => typeof author === "string") : [];
  } catch {
    return [];
  }
};

/**
 * LIKE のワイルドカード (% と _) とエスケープ文字をそのままの文字として扱う
 */
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

const containsText = (column: Column, text: string): SQL =>
  sql`${column} LIKE ${`%${escapeLikePattern(text)}%`} ESCAPE '\\'`;

/**
 * Row を Book に変換する
 * 取得元の名前が読めなければ "Repository" とする
 */
export const rowToBook = (row: BookRow): Book => ({
  id: row.id,
  title: row.title,
  authors: parseAuthors(row.authors),
  publisher: row.publisher,
  publishYear: row.publishYear,
  pageCount: row.pageCount,
  isbn: row.isbn,
  description: row.description,
  coverImageUrl: row.coverImageUrl,
  source: isProviderName(row.source) ? row.source : "Repository",
  externalId: row.externalId
});

export const bookToRow = (book: Book): NewBookRow => ({
  id: book.id,
  title: book.title,
  authors: JSON.stringify(book.authors),
  publisher: book.publisher,
  publishYear: book.publishYear,
  pageCount: book.pageCount,
  isbn: book.isbn === null ? null : normalizeIsbn(book.isbn),
  description: book.description,
  coverImageUrl: book.coverImageUrl,
  source: book.source,
  externalId: book.externalId
});

/**
 * Drizzle ORM を使用した書籍リポジトリの実装
 */
export class SqliteBookRepository implements BookRepository {
  constructor(
    private readonly db: DrizzleDatabase,
    private readonly logger: Logger
  ) {}

  async findByIsbn(isbn: string): Promise<Result<Book | null, RepositoryError>> {
    return this.run("findByIsbn", () => {
      const row = this.db
        .select()
        .from(booksTable)
        .where(eq(booksTable.isbn, normalizeIsbn(isbn)))
        .limit(1)
        .get();
      return row === undefined ? null : rowToBook(row);
    });
  }

  async search(query: string): Promise<Result<Book[], RepositoryError>> {
    const trimmed = query.trim();
    if (trimmed === "") {
      return Ok([]);
    }
    // SQLite の LIKE は ASCII の大文字小文字を区別しない
    return this.run("search", () =>
      this.db
        .select()
        .from(booksTable)
        .where(or(containsText(booksTable.title, trimmed), containsText(booksTable.authors, trimmed)))
        .all()
        .map(rowToBook)
    );
  }

  async save(book: Book): Promise<Result<Book, RepositoryError>> {
    return this.run("save", () => {
      const row = bookToRow(book);
      this.db.insert(booksTable).values(row).onConflictDoUpdate({ target: booksTable.id, set: row }).run();
      this.logger.debug("Saved book", { id: book.id, title: book.title });
      return book;
    });
  }

  private run<T>(operation: string, body: () => T): Result<T, RepositoryError> {
    try {
      return Ok(body());
    } catch (error) {
      this.logger.error(`Database operation failed: ${operation}`, { error });
      return Err(new RepositoryError(`${operation} failed`, error));
    }
  }
}
