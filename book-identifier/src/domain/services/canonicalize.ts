const MIN_PUBLISH_YEAR = 1000;

/**
 * 日付文字列の先頭4文字を年として取り出す
 * 1000 から「今年 + 1」の範囲外は null
 * @example extractPublishYear("1988-03-01") // 1988
 * @example extractPublishYear("+2008-08-01T00:00:00Z") // 2008 (Wikidata の時刻表現)
 */
export const extractPublishYear = (
  value: string | number | null | undefined,
  now: Date = new Date()
): number | null => {
  const maxYear = now.getFullYear() + 1;
  const inRange = (year: number): boolean => Number.isInteger(year) && year >= MIN_PUBLISH_YEAR && year <= maxYear;

  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return inRange(value) ? value : null;
  }

  const trimmed = value.trim().replace(/^\+/, "");
  if (trimmed.length < 4) {
    return null;
  }
  const head = trimmed.slice(0, 4);
  if (!/^\d{4}$/.test(head)) {
    return null;
  }
  const year = Number(head);
  return inRange(year) ? year : null;
};

export const toPageCount = (value: string | number | null | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const count = typeof value === "number" ? value : Number(value.trim());
  return Number.isInteger(count) && count > 0 ? count : null;
};

export const preferHttps = (url: string): string => url.replace(/^http:\/\//i, "https://");

/**
 * "/img/entities/xxx" のような相対パスに origin を付ける
 * 既に絶対URLならそのまま
 */
export const absolutizeUrl = (url: string, origin: string): string => {
  if (/^https?:\/\//i.test(url)) {
    return url;
  }
  if (url.startsWith("//")) {
    return `https:${url}`;
  }
  const base = origin.replace(/\/+$/, "");
  return url.startsWith("/") ? `${base}${url}` : `${base}/${url}`;
};
