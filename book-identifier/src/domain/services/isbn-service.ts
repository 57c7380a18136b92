import { REGEX } from "../constants";

export const isIsbn10 = (value: string): boolean => REGEX.isbn10.test(value);

export const isIsbn13 = (value: string): boolean => REGEX.isbn13.test(value);

/**
 * 区切り文字 (ハイフン・空白など) を取り除く
 * @example normalizeIsbn("978-0-13-235088-4") // "9780132350884"
 */
export const normalizeIsbn = (raw: string): string => raw.replace(REGEX.nonAlphanumeric, "").toUpperCase();

export const convertIsbn10To13 = (isbn10: string): string => {
  const src = `978${normalizeIsbn(isbn10).slice(0, 9)}`;
  const sum = src
    .split("")
    .map((s) => Number(s))
    .reduce((prev, current, index) => prev + (index % 2 === 0 ? current : current * 3), 0);

  const remainder = 10 - (sum % 10);
  const checkDigit = remainder === 10 ? 0 : remainder;

  return `${src}${checkDigit}`;
};

/**
 * 候補の中から ISBN-13 を優先して1つ選ぶ
 * ISBN-13 が無ければ最初の ISBN-10、どちらも無ければ null
 */
export const pickPreferredIsbn = (candidates: readonly (string | null | undefined)[]): string | null => {
  const normalized = candidates
    .filter((candidate): candidate is string => typeof candidate === "string" && candidate.trim() !== "")
    .map(normalizeIsbn);

  return normalized.find(isIsbn13) ?? normalized.find(isIsbn10) ?? null;
};
