/**
 * environment variables
 */
declare namespace NodeJS {
  interface ProcessEnv {
    readonly GOOGLE_BOOKS_API_KEY?: string;
    readonly ISBNDB_API_KEY?: string;
    readonly AZURE_VISION_ENDPOINT?: string;
    readonly AZURE_VISION_API_KEY?: string;
    readonly HTTP_TIMEOUT_MS?: string;
    readonly PROVIDER_DELAY_MS?: string;
    readonly BASE_PROVIDER_ORDER?: string;
    readonly ENRICHMENT_PROVIDER_ORDER?: string;
    readonly ENRICHMENT_FIELDS?: string;
    readonly ENRICHMENT_SKIP_CONSULTED?: string;
    readonly ENABLED_PROVIDERS?: string;
    readonly SQLITE_PATH?: string;
    readonly LOG_LEVEL?: string;
  }
}
