import type { BookProvider, LookupOptions } from "../book-provider";
import type { Logger } from "../interfaces/logger";
import type { ProviderRegistry } from "../provider-registry";
import type { Book } from "@/domain/entities/book";
import type { QuotationSource, QuoteVerification } from "@/domain/entities/quotation";

import { describeError } from "@/domain/error";

const GOOGLE_BOOKS_TOP = 5;
const OPEN_LIBRARY_TOP = 3;
const VERIFIED_THRESHOLD = 0.6;
const AUTHOR_ONLY_CONFIDENCE = 0.35;
const CONTEXT_DESCRIPTION_LENGTH = 200;

/**
 * 引用文が書誌情報の説明文にどれだけ含まれているか
 * 完全一致 0.95 / 8割以上の語が一致 0.7 ~ 0.8 / それ以外は一致率の半分
 */
export const scoreQuoteMatch = (quote: string, text: string | null): number => {
  if (text === null || text.trim() === "") {
    return 0;
  }
  const quoteLower = quote.toLowerCase();
  const textLower = text.toLowerCase();
  const words = quoteLower.split(" ").filter((word) => word !== "");
  if (words.length === 0) {
    return 0;
  }

  if (textLower.includes(quoteLower)) {
    return 0.95;
  }
  const ratio = words.filter((word) => textLower.includes(word)).length / words.length;
  if (ratio >= 0.8) {
    return 0.7 + (ratio - 0.8) * 0.5;
  }
  return ratio * 0.5;
};

/**
 * 複数の候補から全体の確度を出す
 */
export const overallConfidence = (sources: readonly QuotationSource[]): number => {
  if (sources.length === 0) {
    return 0;
  }
  const sorted = [...sources].sort((a, b) => b.confidence - a.confidence);
  const max = sorted[0].confidence;

  if (sorted.filter((source) => source.confidence >= VERIFIED_THRESHOLD).length >= 2) {
    return Math.min(0.95, max + 0.1);
  }
  if (sorted.length === 1) {
    return max;
  }

  const weights = [0.6, 0.25, 0.15];
  const top = sorted.slice(0, weights.length);
  const weightedSum = top.reduce((sum, source, index) => sum + source.confidence * weights[index], 0);
  const totalWeight = weights.slice(0, top.length).reduce((sum, weight) => sum + weight, 0);
  return weightedSum / totalWeight;
};

const authorMatches = (authors: readonly string[], claimedAuthor: string): boolean => {
  const claim = claimedAuthor.toLowerCase();
  return authors.some((author) => {
    const name = author.toLowerCase();
    return name.includes(claim) || claim.includes(name);
  });
};

const describeContext = (book: Book): string => {
  let context = `This quote appears to be from "${book.title}"`;
  if (book.authors.length > 0) {
    context += ` by ${book.authors.join(", ")}`;
  }
  if (book.publishYear !== null) {
    context += `, published in ${book.publishYear}`;
  }
  return `${context}. ${(book.description ?? "").slice(0, CONTEXT_DESCRIPTION_LENGTH)}`;
};

/**
 * 引用文の出典を GoogleBooks と OpenLibrary の検索結果から推定する
 */
export class QuoteVerifier {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger
  ) {}

  async verify(
    quote: string,
    claimedAuthor: string | null = null,
    options: LookupOptions = {}
  ): Promise<QuoteVerification> {
    const author = claimedAuthor !== null && claimedAuthor.trim() !== "" ? claimedAuthor.trim() : null;
    const sources = [
      ...(await this.searchGoogleBooks(quote, author, options)),
      ...(await this.searchOpenLibrary(quote, author, options))
    ];

    const confidence = overallConfidence(sources);
    const verification: QuoteVerification = {
      quote,
      claimedAuthor: author,
      isVerified: confidence >= VERIFIED_THRESHOLD,
      authorVerified: author !== null && sources.some((source) => authorMatches(source.book.authors, author)),
      overallConfidence: confidence,
      sources,
      context: sources.length > 0 ? describeContext(sources[0].book) : null,
      recommendedBook: sources.length > 0 ? sources[0].book : null
    };

    this.logger.info("Quote verification complete", {
      confidence,
      isVerified: verification.isVerified,
      authorVerified: verification.authorVerified,
      sources: sources.length
    });
    return verification;
  }

  private async searchGoogleBooks(
    quote: string,
    author: string | null,
    options: LookupOptions
  ): Promise<QuotationSource[]> {
    const query = author === null ? `"${quote}"` : `"${quote}" ${author}`;
    const books = await this.search(this.registry.get("GoogleBooks"), query, options);

    return books.slice(0, GOOGLE_BOOKS_TOP).flatMap((book): QuotationSource[] => {
      const confidence = scoreQuoteMatch(quote, book.description);
      return confidence > 0.3 ? [{ book, confidence, matchType: "Description Match", source: "GoogleBooks" }] : [];
    });
  }

  private async searchOpenLibrary(
    quote: string,
    author: string | null,
    options: LookupOptions
  ): Promise<QuotationSource[]> {
    const query = author ?? quote.split(" ").slice(0, 3).join(" ");
    const books = await this.search(this.registry.get("OpenLibrary"), query, options);

    return books.slice(0, OPEN_LIBRARY_TOP).flatMap((book): QuotationSource[] => {
      let confidence = scoreQuoteMatch(quote, book.description);
      if (confidence < 0.3 && author !== null && authorMatches(book.authors, author)) {
        confidence = AUTHOR_ONLY_CONFIDENCE;
      }
      if (confidence < 0.3) {
        return [];
      }
      return [
        {
          book,
          confidence,
          matchType: confidence >= 0.5 ? "Description Match" : "Author Match",
          source: "OpenLibrary"
        }
      ];
    });
  }

  private async search(provider: BookProvider | undefined, query: string, options: LookupOptions): Promise<Book[]> {
    if (provider?.searchByText === undefined) {
      this.logger.warn("Quote search provider is not registered", { query });
      return [];
    }
    try {
      return await provider.searchByText(query, options);
    } catch (error) {
      this.logger.warn(`${provider.name} threw while searching for a quote: ${describeError(error)}`, { error });
      return [];
    }
  }
}
