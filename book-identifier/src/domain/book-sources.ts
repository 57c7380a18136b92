/**
 * 書誌情報の取得元
 * "Repository" は外部APIではなく、保存済みのカタログから読み出したことを示す
 */
export const PROVIDER_NAMES = [
  "GoogleBooks",
  "OpenLibrary",
  "ISBNdb",
  "Wikidata",
  "Inventaire",
  "AzureVision"
] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type BookSource = ProviderName | "Repository";

export type Capability = "isbn-lookup" | "text-search" | "image-identification";

export const isProviderName = (value: string): value is ProviderName => PROVIDER_NAMES.some((name) => name === value);

/**
 * 表紙画像の品質を優先した問い合わせ順
 * API キー付きの専用サービス > 無料の画像提供元 > 汎用検索
 */
export const DEFAULT_ENRICHMENT_ORDER: readonly ProviderName[] = [
  "ISBNdb",
  "Wikidata",
  "Inventaire",
  "GoogleBooks",
  "OpenLibrary"
];
