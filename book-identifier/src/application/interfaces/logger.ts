export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

/**
 * ロガーのポート
 */
export interface Logger {
  /**
   * 処理の流れを追うための詳細な情報
   */
  debug(message: string, context?: Record<string, unknown>): void;

  info(message: string, context?: Record<string, unknown>): void;

  /**
   * 取得元の失敗など、処理は続行できる問題
   */
  warn(message: string, context?: Record<string, unknown>): void;

  error(message: string, context?: Record<string, unknown>): void;
}
