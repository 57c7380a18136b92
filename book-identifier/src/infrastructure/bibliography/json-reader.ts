/**
 * 外部APIのレスポンスは形が保証されないので、unknown から1項目ずつ安全に読み出す
 */
export type JsonRecord = Readonly<Record<string, unknown>>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readRecord = (source: unknown, key: string): JsonRecord | null => {
  if (!isRecord(source)) return null;
  const value = source[key];
  return isRecord(value) ? value : null;
};

export const readArray = (source: unknown, key: string): readonly unknown[] => {
  if (!isRecord(source)) return [];
  const value = source[key];
  return Array.isArray(value) ? value : [];
};

export const readString = (source: unknown, key: string): string | null => {
  if (!isRecord(source)) return null;
  const value = source[key];
  return typeof value === "string" ? value : null;
};

export const readNumber = (source: unknown, key: string): number | null => {
  if (!isRecord(source)) return null;
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

/** 文字列でも数値でも受け取る (ページ数・年など) */
export const readScalar = (source: unknown, key: string): string | number | null =>
  readString(source, key) ?? readNumber(source, key);

export const readStrings = (source: unknown, key: string): string[] =>
  readArray(source, key).filter((value): value is string => typeof value === "string");

export const firstString = (values: readonly unknown[]): string | null => {
  const found = values.find((value): value is string => typeof value === "string");
  return found ?? null;
};
