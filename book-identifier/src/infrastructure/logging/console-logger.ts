import type { Logger, LogLevel } from "@/application/interfaces/logger";

// 結果の出力 (stdout) と混ざらないよう、ログはすべて stderr に出す
const writeToStderr = (message: string): void => {
  console.error(message);
};

/**
 * コンソールロガーの実装
 * [時刻] [レベル] [プレフィックス] メッセージ の形式で出力する
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly enabledLevels: Set<LogLevel>;

  /**
   * @param prefix ログメッセージに付与するプレフィックス
   * @param level 指定されたレベル以上のログが出力される
   */
  constructor(prefix: string, level: LogLevel = "info") {
    this.prefix = prefix;

    this.enabledLevels = new Set();
    switch (level) {
      case "debug":
        this.enabledLevels.add("debug");
      // fallthrough
      case "info":
        this.enabledLevels.add("info");
      // fallthrough
      case "warn":
        this.enabledLevels.add("warn");
      // fallthrough
      case "error":
        this.enabledLevels.add("error");
        break;
    }
  }

  /**
   * 同じ出力レベルのまま、プレフィックスだけ変えたロガーを作る
   */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix}:${prefix}`, this.lowestLevel());
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.enabledLevels.has(level)) return;

    const formattedMessage = this.formatMessage(level, message);
    const formattedContext = this.formatContext(context);
    writeToStderr(formattedMessage);
    if (formattedContext) {
      writeToStderr(formattedContext);
    }
  }

  private lowestLevel(): LogLevel {
    if (this.enabledLevels.has("debug")) return "debug";
    if (this.enabledLevels.has("info")) return "info";
    if (this.enabledLevels.has("warn")) return "warn";
    return "error";
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.prefix}] ${message}`;
  }

  /**
   * Error はそのままだと JSON.stringify で {} になるので name / message / stack を取り出す
   */
  formatContext(context?: Record<string, unknown>): string {
    if (!context) return "";

    try {
      const processedContext: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(context)) {
        processedContext[key] =
          value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
      }
      return JSON.stringify(processedContext, null, 2);
    } catch (e) {
      return `[Context serialization failed: ${e instanceof Error ? e.message : String(e)}]`;
    }
  }
}
