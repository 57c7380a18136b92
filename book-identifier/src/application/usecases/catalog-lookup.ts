import type { BookIdentifier } from "./identify-book";
import type { FieldEnricher } from "./enrich-missing-fields";
import type { LookupOptions } from "../book-provider";
import type { BookRepository } from "../interfaces/book-repository";
import type { Logger } from "../interfaces/logger";
import type { Book } from "@/domain/entities/book";

import { isErr } from "@/domain/error";
import { convertIsbn10To13, isIsbn10, normalizeIsbn } from "@/domain/services/isbn-service";

export type CatalogLookupResult = {
  readonly book: Book;
  /** 保存済みカタログから見つかったかどうか */
  readonly fromCatalog: boolean;
};

/**
 * 保存済みカタログを先に引き、無ければ外部の取得元で探して保存する
 */
export class CatalogLookup {
  constructor(
    private readonly identifier: BookIdentifier,
    private readonly enricher: FieldEnricher,
    private readonly repository: BookRepository,
    private readonly logger: Logger
  ) {}

  async lookupByIsbn(isbn: string, options: LookupOptions = {}): Promise<CatalogLookupResult | null> {
    const normalized = normalizeIsbn(isbn);

    const stored = await this.findStored(normalized);
    if (stored !== null) {
      this.logger.info("Found in catalog", { isbn: normalized, id: stored.id });
      // 表紙が無ければここで補完され、enricher 側で書き戻される
      const book = await this.enricher.enrichMissingFields(stored, options);
      return { book, fromCatalog: true };
    }

    const found = await this.identifier.identifyByIsbn(normalized, options);
    if (found === null) {
      return null;
    }

    const saved = await this.repository.save(found);
    if (isErr(saved)) {
      this.logger.warn("Failed to save the identified book", { isbn: normalized, error: saved.err });
    }
    const base = isErr(saved) ? found : saved.value;

    const book = await this.enricher.enrichMissingFields(base, { ...options, consulted: [base.source] });
    return { book, fromCatalog: false };
  }

  /**
   * 取得元は ISBN-13 を返すことが多いので、ISBN-10 の問い合わせは ISBN-13 でも引く
   * カタログが読めなければ null (取得元に問い合わせる)
   */
  private async findStored(isbn: string): Promise<Book | null> {
    const keys = isIsbn10(isbn) ? [isbn, convertIsbn10To13(isbn)] : [isbn];
    for (const key of keys) {
      const stored = await this.repository.findByIsbn(key);
      if (isErr(stored)) {
        this.logger.warn("Catalog lookup failed; falling back to providers", { isbn, error: stored.err });
        return null;
      }
      if (stored.value !== null) {
        return stored.value;
      }
    }
    return null;
  }
}
