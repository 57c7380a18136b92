import { COVER_STOP_WORDS, COVER_TEXT_MAX_WORDS, COVER_TEXT_MIN_WORD_LENGTH } from "../constants";

/**
 * 表紙のOCRテキストを検索クエリに整形する
 * 短すぎる語とストップワードを落とし、先頭から最大8語まで
 */
export const cleanCoverText = (ocrText: string): string =>
  ocrText
    .split(/\s+/)
    .map((word) => word.trim())
    .filter((word) => word.length >= COVER_TEXT_MIN_WORD_LENGTH)
    .filter((word) => !COVER_STOP_WORDS.has(word.toLowerCase()))
    .slice(0, COVER_TEXT_MAX_WORDS)
    .join(" ");
