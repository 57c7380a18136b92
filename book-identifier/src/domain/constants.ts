export const REGEX = {
  isbn10:
    /^(?:ISBN(?:-10)?:? )?(?=[0-9X]{10}$|(?=(?:[0-9]+[- ]){3})[- 0-9X]{13}$)[0-9]{1,5}[- ]?[0-9]+[- ]?[0-9]+[- ]?[0-9X]$/,
  isbn13:
    /^(?:ISBN(?:-13)?:? )?(?=[0-9]{13}$|(?=(?:[0-9]+[- ]){4})[- 0-9]{17}$)97[89][- ]?[0-9]{1,5}[- ]?[0-9]+[- ]?[0-9]+[- ]?[0-9]$/,
  nonAlphanumeric: /[^0-9A-Za-z]/g
} as const;

/**
 * 表紙のOCRテキストから除外する語 (出版社・版表記など)
 */
export const COVER_STOP_WORDS: ReadonlySet<string> = new Set([
  "edición",
  "edition",
  "editorial",
  "editora",
  "press",
  "publishing",
  "publisher",
  "books",
  "library",
  "de",
  "by",
  "the",
  "a",
  "an",
  "del"
]);

export const COVER_TEXT_MAX_WORDS = 8;
export const COVER_TEXT_MIN_WORD_LENGTH = 3;
