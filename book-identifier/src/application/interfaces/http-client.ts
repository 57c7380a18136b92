import type { HttpError, Result } from "@/domain/error";

export type HttpRequestParams = Readonly<Record<string, string | number | boolean | null | undefined>>;

export type HttpRequestConfig = {
  readonly headers?: Readonly<Record<string, string>>;
  readonly params?: HttpRequestParams;
  readonly responseType?: "json" | "text" | "arraybuffer";
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
};

export type HttpResponse<T> = {
  readonly data: T;
  readonly status: number;
  readonly statusText: string;
};

/**
 * レスポンスの形は保証されないので data は unknown のまま返す (読む側で検証する)
 */
export interface HttpClient {
  get(url: string, config?: HttpRequestConfig): Promise<Result<HttpResponse<unknown>, HttpError>>;
  post(url: string, body: unknown, config?: HttpRequestConfig): Promise<Result<HttpResponse<unknown>, HttpError>>;
}
