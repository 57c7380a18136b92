import { executeCommand, EXIT_CONFIG_ERROR, parseCliArguments } from "./interface/cli";
import { createAppContext, type AppContext } from "./interface/container";

import { createRuntimeConfig } from "@/config/config";
import { ConfigError } from "@/domain/error";

/**
 * アプリケーションのエントリポイント
 * 見つかれば 0、見つからなければ 2、設定の誤りは 1 で終了する
 */
export async function main(argv: string[]): Promise<number> {
  const startTime = Date.now();
  const { command, options } = await parseCliArguments(argv);

  let context: AppContext;
  try {
    context = createAppContext(createRuntimeConfig(), options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  // Ctrl+C で実行中のリクエストを中断する
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const exitCode = await executeCommand(context, command, options, controller.signal);
    context.logger.debug(`The process took ${Math.round((Date.now() - startTime) / 1000)} seconds`);
    return exitCode;
  } finally {
    process.off("SIGINT", onInterrupt);
    context.dispose();
  }
}

// スクリプト直接実行時のエントリポイント
if (require.main === module) {
  main(process.argv)
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("予期しないエラーが発生しました:", error);
      process.exitCode = 1;
    });
}
