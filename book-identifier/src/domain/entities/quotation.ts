import type { Book } from "./book";
import type { ProviderName } from "../book-sources";

export type QuoteMatchType = "Description Match" | "Author Match";

export type QuotationSource = {
  readonly book: Book;
  /** 0 ~ 1 */
  readonly confidence: number;
  readonly matchType: QuoteMatchType;
  readonly source: ProviderName;
};

export type QuoteVerification = {
  readonly quote: string;
  readonly claimedAuthor: string | null;
  readonly isVerified: boolean;
  readonly authorVerified: boolean;
  readonly overallConfidence: number;
  readonly sources: readonly QuotationSource[];
  readonly context: string | null;
  readonly recommendedBook: Book | null;
};
