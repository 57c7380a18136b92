import type { BookProvider, LookupOptions } from "../book-provider";
import type { Logger } from "../interfaces/logger";
import type { ProviderRegistry } from "../provider-registry";
import type { Capability, ProviderName } from "@/domain/book-sources";
import type { Book } from "@/domain/entities/book";

import { describeError, isErr } from "@/domain/error";
import { normalizeIsbn } from "@/domain/services/isbn-service";
import { randomWait, sleep } from "@/shared/utils/delay";

const THROTTLE_VARIANCE: readonly [number, number] = [0.8, 1.2];

export type BookIdentifierOptions = {
  /** 基本検索で問い合わせる順。省略時はレジストリの登録順 */
  readonly baseOrder?: readonly ProviderName[];
  /** 連続する2つの問い合わせの間に空ける時間 (±20%) */
  readonly interProviderDelayMs?: number;
};

/**
 * 取得元を優先順に1つずつ試し、最初に見つかった結果を採用する
 */
export class BookIdentifier {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger,
    private readonly options: BookIdentifierOptions = {}
  ) {}

  async identifyByIsbn(isbn: string, options: LookupOptions = {}): Promise<Book | null> {
    const normalized = normalizeIsbn(isbn);
    if (normalized === "") {
      this.logger.warn("Empty ISBN was given", { isbn });
      return null;
    }

    return this.firstSuccess("isbn-lookup", normalized, options.signal, async (provider) => {
      if (provider.lookupByIsbn === undefined) {
        return null;
      }
      const result = await provider.lookupByIsbn(normalized, options);
      if (isErr(result)) {
        this.logger.debug(`${provider.name}: no result`, { isbn: normalized, reason: result.err.message });
        return null;
      }
      return result.value;
    });
  }

  async identifyByText(query: string, options: LookupOptions = {}): Promise<Book | null> {
    const trimmed = query.trim();
    if (trimmed === "") {
      this.logger.warn("Empty query was given");
      return null;
    }

    return this.firstSuccess("text-search", trimmed, options.signal, async (provider) => {
      if (provider.searchByText === undefined) {
        return null;
      }
      const books = await provider.searchByText(trimmed, options);
      return books[0] ?? null;
    });
  }

  /**
   * capability を持つ取得元を基本検索の順に並べる
   */
  candidates(capability: Capability): BookProvider[] {
    const providers =
      this.options.baseOrder === undefined
        ? [...this.registry.all()]
        : this.registry.ordered(this.options.baseOrder);
    return providers.filter((provider) => provider.capabilities.has(capability));
  }

  /**
   * Calls each capable provider in priority order and stops at the first hit.
   * Later providers are never called once one succeeds.
   */
  private async firstSuccess(
    capability: Capability,
    query: string,
    signal: AbortSignal | undefined,
    call: (provider: BookProvider) => Promise<Book | null>
  ): Promise<Book | null> {
    const providers = this.candidates(capability);

    for (let index = 0; index < providers.length; index++) {
      const provider = providers[index];
      if (index > 0) {
        await this.waitForNextProvider(signal);
      }
      if (signal?.aborted === true) {
        this.logger.info("Lookup was cancelled", { capability, query });
        return null;
      }

      try {
        const book = await call(provider);
        if (book !== null) {
          this.logger.info(`Found by ${provider.name}`, { capability, query, title: book.title });
          return book;
        }
      } catch (error) {
        // アダプターは例外を投げない約束だが、投げられても次へ進む
        this.logger.error(`${provider.name} threw unexpectedly: ${describeError(error)}`, { query, error });
      }
    }

    this.logger.info("No provider found the book", { capability, query });
    return null;
  }

  private async waitForNextProvider(signal: AbortSignal | undefined): Promise<void> {
    const delay = this.options.interProviderDelayMs ?? 0;
    if (delay <= 0) {
      return;
    }
    await sleep(randomWait(delay, THROTTLE_VARIANCE[0], THROTTLE_VARIANCE[1]), signal);
  }
}
