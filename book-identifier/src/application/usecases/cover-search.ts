import type { BookIdentifier } from "./identify-book";
import type { LookupOptions } from "../book-provider";
import type { BookRepository } from "../interfaces/book-repository";
import type { Logger } from "../interfaces/logger";
import type { ProviderRegistry } from "../provider-registry";
import type { Book } from "@/domain/entities/book";

import { describeError, isErr } from "@/domain/error";
import { dedupeBooks } from "@/domain/services/book-dedupe";
import { cleanCoverText } from "@/domain/services/cover-text";

export type CoverSearchResult = {
  readonly books: Book[];
  readonly totalResults: number;
};

const EMPTY_RESULT: CoverSearchResult = { books: [], totalResults: 0 };

/**
 * 表紙 (OCRテキスト・画像) からの検索
 */
export class CoverSearch {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly identifier: BookIdentifier,
    private readonly logger: Logger,
    private readonly repository?: BookRepository
  ) {}

  /**
   * 保存済みカタログと全てのテキスト検索対応の取得元を順に引き、重複を除いてまとめる
   */
  async searchByCoverText(ocrText: string, options: LookupOptions = {}): Promise<CoverSearchResult> {
    const query = cleanCoverText(ocrText);
    if (query === "") {
      this.logger.info("Nothing left to search after cleaning the cover text");
      return EMPTY_RESULT;
    }

    const collected: Book[] = [];
    if (this.repository !== undefined) {
      const stored = await this.repository.search(query);
      if (isErr(stored)) {
        this.logger.warn("Catalog search failed", { query, error: stored.err });
      } else {
        collected.push(...stored.value);
      }
    }

    for (const provider of this.identifier.candidates("text-search")) {
      if (options.signal?.aborted === true) {
        break;
      }
      if (provider.searchByText === undefined) {
        continue;
      }
      try {
        collected.push(...(await provider.searchByText(query, options)));
      } catch (error) {
        this.logger.error(`${provider.name} threw unexpectedly: ${describeError(error)}`, { query, error });
      }
    }

    const books = dedupeBooks(collected);
    return { books, totalResults: books.length };
  }

  /**
   * 表紙画像を読み取り、読めた文字列でテキスト検索する
   * テキスト検索で見つからなければ画像解析の結果 (表紙のタイトル) を返す
   */
  async identifyByImage(image: Uint8Array, options: LookupOptions = {}): Promise<Book | null> {
    const vision = this.registry
      .withCapability("image-identification")
      .find((provider) => provider.identifyFromImage !== undefined);
    if (vision?.identifyFromImage === undefined) {
      this.logger.warn("No image-capable provider is registered");
      return null;
    }

    const identified = await vision.identifyFromImage(image, options);
    if (isErr(identified)) {
      this.logger.warn(`${vision.name} could not read the cover`, { reason: identified.err.message });
      return null;
    }

    const query = cleanCoverText(identified.value.recognizedText);
    if (query !== "") {
      const found = await this.identifier.identifyByText(query, options);
      if (found !== null) {
        return found;
      }
    }
    return identified.value.book;
  }
}
