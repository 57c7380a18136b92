import axios, { isAxiosError, isCancel } from "axios";

import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";

import type { HttpClient, HttpRequestConfig, HttpResponse } from "@/application/interfaces/http-client";

import { Err, HttpError, Ok, type Result } from "@/domain/error";

export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Axiosはstatus codeが4xx, 5xxなら勝手にthrow Errorする
 * throwする条件をvalidateStatusで指定できる (falseならthrowする)
 * 404 は「見つからない」として呼び出し側で扱うので throw させない
 * @link https://axios-http.com/docs/handling_errors
 */
const DEFAULT_VALIDATE_STATUS = (status: number): boolean => (status >= 200 && status < 300) || status === 404;

const toAxiosConfig = (config?: HttpRequestConfig): AxiosRequestConfig => {
  if (config === undefined) {
    return {};
  }

  const axiosConfig: AxiosRequestConfig = {};

  if (config.headers !== undefined) {
    axiosConfig.headers = { ...config.headers };
  }
  if (config.params !== undefined) {
    axiosConfig.params = config.params;
  }
  if (config.responseType !== undefined) {
    axiosConfig.responseType = config.responseType;
  }
  if (config.timeoutMs !== undefined) {
    axiosConfig.timeout = config.timeoutMs;
  }
  if (config.signal !== undefined) {
    axiosConfig.signal = config.signal;
  }

  return axiosConfig;
};

const toHttpResponse = <T>(response: AxiosResponse<T>): HttpResponse<T> => ({
  data: response.data,
  status: response.status,
  statusText: response.statusText
});

/**
 * タイムアウト・接続失敗・中断は status 0 の HttpError になる
 */
const toHttpError = (error: unknown, url: string): HttpError => {
  if (isCancel(error)) {
    return new HttpError({ message: "Request was cancelled", status: 0, url });
  }
  if (isAxiosError(error)) {
    const status = error.response?.status ?? 0;
    const message = error.message !== "" ? error.message : "HTTP request failed";
    const requestUrl = error.config?.url ?? url;
    return new HttpError({ message, status, url: requestUrl });
  }

  const fallbackMessage = error instanceof Error ? error.message : String(error);
  return new HttpError({ message: fallbackMessage, status: 0, url });
};

/**
 * 取得元ごとに1つ作り、使い回す
 */
export function createAxiosHttpClient(config?: AxiosRequestConfig): HttpClient {
  const mergedConfig: AxiosRequestConfig = {
    timeout: DEFAULT_TIMEOUT_MS,
    ...config,
    validateStatus: config?.validateStatus ?? DEFAULT_VALIDATE_STATUS
  };
  const client: AxiosInstance = axios.create(mergedConfig);

  const send = async (
    url: string,
    request: () => Promise<AxiosResponse<unknown>>
  ): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    try {
      const response = await request();
      return Ok(toHttpResponse(response));
    } catch (error) {
      return Err(toHttpError(error, url));
    }
  };

  return {
    get: async (url: string, requestConfig?: HttpRequestConfig) =>
      send(url, () => client.get<unknown>(url, toAxiosConfig(requestConfig))),
    post: async (url: string, body: unknown, requestConfig?: HttpRequestConfig) =>
      send(url, () => client.post<unknown>(url, body, toAxiosConfig(requestConfig)))
  };
}
