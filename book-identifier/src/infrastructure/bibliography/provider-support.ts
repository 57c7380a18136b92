import type { LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { ProviderName } from "@/domain/book-sources";

import { BookNotFoundError, CancelledError, Err, HttpError, type LookupError } from "@/domain/error";

export type ProviderDependencies = {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
};

export const isAborted = (options: LookupOptions | undefined): boolean => options?.signal?.aborted === true;

/**
 * 取得元の失敗を記録して Err にする
 * 中断と「該当なし」は失敗ではないので debug に留める
 */
export const lookupFailure = (
  logger: Logger,
  provider: ProviderName,
  query: string,
  error: LookupError,
  options?: LookupOptions
): Err<LookupError> => {
  if (isAborted(options)) {
    logger.debug(`${provider}: lookup cancelled`, { query });
    return Err(new CancelledError());
  }
  if (error instanceof BookNotFoundError) {
    logger.debug(`${provider}: no match`, { query });
    return Err(error);
  }
  if (error instanceof HttpError && error.isNetworkError) {
    logger.warn(`${provider}: no response`, { query, url: error.url, error });
    return Err(error);
  }
  logger.warn(`${provider}: lookup failed`, { query, error });
  return Err(error);
};
