export type Result<T, E extends Error> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly err?: null | undefined;
}

export interface Err<E extends Error> {
  readonly ok: false;
  readonly value?: null | undefined;
  readonly err: E;
}

export function isOk<T, E extends Error>(result: Result<T, E>): result is Extract<Result<T, E>, { ok: true }> {
  return result.ok === true;
}

export function isErr<T, E extends Error>(result: Result<T, E>): result is Extract<Result<T, E>, { ok: false }> {
  return result.ok === false;
}

export function Ok<T>(value: T): Ok<T> {
  return { ok: true, err: null, value };
}

export function Err<E extends Error>(err: E): Err<E> {
  return { ok: false, value: null, err };
}

/**
 * プロバイダー境界で「結果なし」として扱うエラー
 */
export type LookupError = HttpError | BookNotFoundError | InvalidIsbnError | ConfigError | ParseError | CancelledError;

export class BaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class BookNotFoundError extends BaseError {
  constructor(identifier: string) {
    super(`Book not found: ${identifier}`);
  }
}

export class InvalidIsbnError extends BaseError {
  constructor(isbn: string) {
    super(`Invalid ISBN: ${isbn}`);
  }
}

export class ConfigError extends BaseError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

export type HttpErrorContext = {
  readonly message: string;
  readonly url: string;
  readonly status: number;
};

export class HttpError extends BaseError {
  readonly status: number;
  readonly url: string;

  constructor(context: HttpErrorContext) {
    super(`HTTP Error: ${context.message} (Status: ${context.status}) for ${context.url}`);
    this.status = context.status;
    this.url = context.url;
  }

  /**
   * ステータスコードが無い = レスポンスが返ってこなかった (タイムアウト・接続失敗)
   */
  get isNetworkError(): boolean {
    return this.status === 0;
  }
}

export class ParseError extends BaseError {
  constructor(message: string) {
    super(`Parse Error: ${message}`);
  }
}

export class CancelledError extends BaseError {
  constructor(message = "Operation was cancelled") {
    super(message);
  }
}

export class RepositoryError extends BaseError {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(`Repository Error: ${message}`);
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
