import type { Book } from "@/domain/entities/book";
import type { RepositoryError, Result } from "@/domain/error";

/**
 * 保存済みカタログへのポート
 */
export interface BookRepository {
  findByIsbn(isbn: string): Promise<Result<Book | null, RepositoryError>>;

  /**
   * タイトルか著者のどれかに query を含むもの (大文字小文字は区別しない)
   */
  search(query: string): Promise<Result<Book[], RepositoryError>>;

  /**
   * id が同じものがあれば上書きする
   */
  save(book: Book): Promise<Result<Book, RepositoryError>>;
}
