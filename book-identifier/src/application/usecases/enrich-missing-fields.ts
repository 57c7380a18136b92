import type { BookProvider, LookupOptions } from "../book-provider";
import type { BookRepository } from "../interfaces/book-repository";
import type { Logger } from "../interfaces/logger";
import type { ProviderRegistry } from "../provider-registry";
import type { BookSource, ProviderName } from "@/domain/book-sources";
import type { Book, EnrichableField } from "@/domain/entities/book";

import { DEFAULT_ENRICHMENT_ORDER } from "@/domain/book-sources";
import { fillMissingFields, missingFields } from "@/domain/entities/book";
import { describeError, isErr } from "@/domain/error";
import { randomWait, sleep } from "@/shared/utils/delay";

export const DEFAULT_ENRICHMENT_FIELDS: readonly EnrichableField[] = ["coverImageUrl"];

export type FieldEnricherOptions = {
  readonly fields?: readonly EnrichableField[];
  /** 表紙画像の品質を優先した問い合わせ順 */
  readonly order?: readonly ProviderName[];
  /** consulted に含まれる取得元には問い合わせない */
  readonly skipConsulted?: boolean;
  readonly interProviderDelayMs?: number;
};

export type EnrichOptions = LookupOptions & {
  readonly consulted?: readonly BookSource[];
};

/**
 * 基本検索で得たレコードの空欄 (主に表紙画像) を他の取得元から埋める
 */
export class FieldEnricher {
  private readonly fields: readonly EnrichableField[];
  private readonly order: readonly ProviderName[];

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger,
    private readonly options: FieldEnricherOptions = {},
    private readonly repository?: BookRepository
  ) {
    this.fields = options.fields ?? DEFAULT_ENRICHMENT_FIELDS;
    this.order = options.order ?? DEFAULT_ENRICHMENT_ORDER;
  }

  /**
   * Fills the configured fields that are empty on `book`, never overwriting a populated one.
   * Returns `book` itself, without any network call, when nothing is missing.
   */
  async enrichMissingFields(book: Book, options: EnrichOptions = {}): Promise<Book> {
    if (missingFields(book, this.fields).length === 0) {
      return book;
    }

    const consulted = new Set(options.consulted ?? []);
    const providers = this.registry
      .ordered(this.order)
      .filter((provider) => !(this.options.skipConsulted === true && consulted.has(provider.name)));

    let current = book;
    let called = false;
    for (const provider of providers) {
      if (!this.canLookup(provider, current)) {
        continue;
      }
      if (called) {
        await this.waitForNextProvider(options.signal);
      }
      // 待機中に中断された場合もここで止まる
      if (options.signal?.aborted === true) {
        this.logger.info("Enrichment was cancelled", { title: book.title });
        break;
      }
      called = true;

      const donor = await this.fetchDonor(provider, current, options);
      if (donor === null) {
        continue;
      }
      const before = current;
      current = fillMissingFields(current, donor, this.fields);
      if (current !== before) {
        const stillMissing = missingFields(current, this.fields);
        const filled = missingFields(before, this.fields).filter((field) => !stillMissing.includes(field));
        this.logger.info(`Filled missing fields from ${provider.name}`, { title: current.title, filled });
      }
      if (missingFields(current, this.fields).length === 0) {
        break;
      }
    }

    if (current !== book) {
      await this.persist(current);
    }
    return current;
  }

  private canLookup(provider: BookProvider, book: Book): boolean {
    return book.isbn !== null
      ? provider.capabilities.has("isbn-lookup") && provider.lookupByIsbn !== undefined
      : provider.capabilities.has("text-search") && provider.searchByText !== undefined;
  }

  /**
   * ISBN があれば ISBN で、無ければ「タイトル + 筆頭著者」で検索し ISBN 付きの最初の候補を使う
   */
  private async fetchDonor(provider: BookProvider, book: Book, options: LookupOptions): Promise<Book | null> {
    try {
      if (book.isbn !== null && provider.lookupByIsbn !== undefined) {
        const result = await provider.lookupByIsbn(book.isbn, options);
        return isErr(result) ? null : result.value;
      }
      if (book.isbn === null && provider.searchByText !== undefined) {
        const query = [book.title, book.authors[0] ?? ""].join(" ").trim();
        const candidates = await provider.searchByText(query, options);
        return candidates.find((candidate) => candidate.isbn !== null) ?? null;
      }
      return null;
    } catch (error) {
      this.logger.error(`${provider.name} threw unexpectedly: ${describeError(error)}`, { title: book.title, error });
      return null;
    }
  }

  private async persist(book: Book): Promise<void> {
    if (this.repository === undefined) {
      return;
    }
    const saved = await this.repository.save(book);
    if (isErr(saved)) {
      this.logger.warn("Failed to save the enriched book", { id: book.id, error: saved.err });
    }
  }

  private async waitForNextProvider(signal: AbortSignal | undefined): Promise<void> {
    const delay = this.options.interProviderDelayMs ?? 0;
    if (delay > 0) {
      await sleep(randomWait(delay, 0.8, 1.2), signal);
    }
  }
}
