import type { BookRepository } from "@/application/interfaces/book-repository";
import type { Book } from "@/domain/entities/book";

import { Ok, type RepositoryError, type Result } from "@/domain/error";
import { normalizeIsbn } from "@/domain/services/isbn-service";

/**
 * インメモリでBookを管理するRepository実装
 */
export class InMemoryBookRepository implements BookRepository {
  private readonly books: Map<string, Book>;

  constructor(books: Iterable<Book> = []) {
    this.books = new Map(Array.from(books, (book): [string, Book] => [book.id, book]));
  }

  size(): number {
    return this.books.size;
  }

  values(): Book[] {
    return [...this.books.values()];
  }

  async findByIsbn(isbn: string): Promise<Result<Book | null, RepositoryError>> {
    const normalized = normalizeIsbn(isbn);
    const found = [...this.books.values()].find(
      (book) => book.isbn !== null && normalizeIsbn(book.isbn) === normalized
    );
    return Ok(found ?? null);
  }

  async search(query: string): Promise<Result<Book[], RepositoryError>> {
    const lowerQuery = query.trim().toLowerCase();
    if (lowerQuery === "") {
      return Ok([]);
    }
    return Ok(
      [...this.books.values()].filter(
        (book) =>
          book.title.toLowerCase().includes(lowerQuery) ||
          book.authors.some((author) => author.toLowerCase().includes(lowerQuery))
      )
    );
  }

  async save(book: Book): Promise<Result<Book, RepositoryError>> {
    this.books.set(book.id, book);
    return Ok(book);
  }
}
