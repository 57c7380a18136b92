import type { Capability, ProviderName } from "@/domain/book-sources";
import type { Book } from "@/domain/entities/book";
import type { LookupError, Result } from "@/domain/error";

export type LookupOptions = {
  readonly signal?: AbortSignal;
};

export type ImageIdentification = {
  readonly book: Book;
  /** 表紙から読み取った生のテキスト (行区切り) */
  readonly recognizedText: string;
};

/**
 * 外部の書誌情報サービス1つ分のアダプター
 *
 * 「見つからない」も「失敗した」も Err で返す。例外は投げない。
 * 対応していない操作は実装しないでおき、capabilities で宣言する。
 */
export interface BookProvider {
  readonly name: ProviderName;
  readonly capabilities: ReadonlySet<Capability>;

  lookupByIsbn?(isbn: string, options?: LookupOptions): Promise<Result<Book, LookupError>>;

  /**
   * 失敗時は空配列
   */
  searchByText?(query: string, options?: LookupOptions): Promise<Book[]>;

  identifyFromImage?(image: Uint8Array, options?: LookupOptions): Promise<Result<ImageIdentification, LookupError>>;
}
