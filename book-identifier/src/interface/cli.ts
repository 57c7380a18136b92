import { readFile } from "node:fs/promises";

import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import type { AppContext } from "./container";
import type { Book } from "@/domain/entities/book";
import type { QuoteVerification } from "@/domain/entities/quotation";

export const EXIT_FOUND = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_NOT_FOUND = 2;

export type CliCommand =
  | { readonly kind: "isbn"; readonly isbn: string }
  | { readonly kind: "text"; readonly query: string }
  | { readonly kind: "cover"; readonly ocrText: string }
  | { readonly kind: "image"; readonly path: string }
  | { readonly kind: "quote"; readonly quote: string; readonly author: string | null };

/**
 * yargsによってパースされたコマンドラインオプション
 */
export interface CliOptions {
  readonly persist: boolean;
  readonly json: boolean;
}

const positional = (value: unknown): string => {
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(" ");
  }
  return typeof value === "string" || typeof value === "number" ? String(value) : "";
};

/**
 * コマンドライン引数を解析する
 */
export async function parseCliArguments(argv: string[]): Promise<{ command: CliCommand; options: CliOptions }> {
  const parsed = await yargs(hideBin(argv))
    .scriptName("book-identifier")
    .command("isbn <isbn>", "ISBNから本を特定する", (y) =>
      y.positional("isbn", { type: "string", describe: "ISBN-10 / ISBN-13 (ハイフン可)", demandOption: true })
    )
    .command("text <query..>", "タイトル・著者などの文字列から本を特定する", (y) =>
      y.positional("query", { type: "string", array: true, demandOption: true })
    )
    .command("cover <ocrText..>", "表紙のOCRテキストで検索する", (y) =>
      y.positional("ocrText", { type: "string", array: true, demandOption: true })
    )
    .command("image <path>", "表紙画像から本を特定する", (y) =>
      y.positional("path", { type: "string", describe: "画像ファイルのパス", demandOption: true })
    )
    .command("quote <quote..>", "引用文の出典を確かめる", (y) =>
      y
        .positional("quote", { type: "string", array: true, demandOption: true })
        .option("author", { alias: "a", type: "string", description: "著者とされている人物" })
    )
    .option("persist", {
      type: "boolean",
      description: "SQLiteのカタログを参照・保存する",
      default: false
    })
    .option("json", {
      type: "boolean",
      description: "結果をJSONで出力する",
      default: false
    })
    .demandCommand(1)
    .help()
    .alias("help", "h")
    .strict()
    .wrap(null)
    .parseAsync();

  const options: CliOptions = { persist: parsed.persist, json: parsed.json };
  const kind = positional(parsed._[0]);
  switch (kind) {
    case "isbn":
      return { command: { kind, isbn: positional(parsed["isbn"]) }, options };
    case "text":
      return { command: { kind, query: positional(parsed["query"]) }, options };
    case "cover":
      return { command: { kind, ocrText: positional(parsed["ocrText"]) }, options };
    case "image":
      return { command: { kind, path: positional(parsed["path"]) }, options };
    case "quote": {
      const author = positional(parsed["author"]);
      const quote = positional(parsed["quote"]);
      return { command: { kind, quote, author: author === "" ? null : author }, options };
    }
    default:
      throw new Error(`Unknown command: ${kind}`);
  }
}

export const formatBook = (book: Book): string =>
  [
    `${book.title}${book.authors.length > 0 ? ` / ${book.authors.join(", ")}` : ""}`,
    `  source:      ${book.source}`,
    `  isbn:        ${book.isbn ?? "-"}`,
    `  publisher:   ${book.publisher ?? "-"}`,
    `  year:        ${book.publishYear ?? "-"}`,
    `  pages:       ${book.pageCount ?? "-"}`,
    `  cover:       ${book.coverImageUrl ?? "-"}`
  ].join("\n");

const formatVerification = (verification: QuoteVerification): string =>
  [
    `verified: ${verification.isVerified} (confidence ${verification.overallConfidence.toFixed(2)})`,
    `author verified: ${verification.authorVerified}`,
    ...verification.sources.map(
      (source) => `- [${source.source}] ${source.book.title} (${source.matchType}, ${source.confidence.toFixed(2)})`
    ),
    ...(verification.context === null ? [] : [verification.context])
  ].join("\n");

const print = (value: unknown, json: boolean, format: () => string): void => {
  console.log(json ? JSON.stringify(value, null, 2) : format());
};

/**
 * コマンドを実行して終了コードを返す
 */
export async function executeCommand(
  context: AppContext,
  command: CliCommand,
  options: CliOptions,
  signal?: AbortSignal
): Promise<number> {
  const printBook = async (book: Book | null): Promise<number> => {
    if (book === null) {
      context.logger.info("Not found");
      return EXIT_NOT_FOUND;
    }
    const enriched = await context.enricher.enrichMissingFields(book, { signal, consulted: [book.source] });
    print(enriched, options.json, () => formatBook(enriched));
    return EXIT_FOUND;
  };

  switch (command.kind) {
    case "isbn": {
      if (context.catalog !== null) {
        const result = await context.catalog.lookupByIsbn(command.isbn, { signal });
        if (result === null) {
          return EXIT_NOT_FOUND;
        }
        print(result, options.json, () => formatBook(result.book));
        return EXIT_FOUND;
      }
      return printBook(await context.identifier.identifyByIsbn(command.isbn, { signal }));
    }
    case "text":
      return printBook(await context.identifier.identifyByText(command.query, { signal }));
    case "cover": {
      const result = await context.coverSearch.searchByCoverText(command.ocrText, { signal });
      print(result, options.json, () =>
        [`${result.totalResults} result(s)`, ...result.books.map(formatBook)].join("\n")
      );
      return result.totalResults > 0 ? EXIT_FOUND : EXIT_NOT_FOUND;
    }
    case "image": {
      const image = await readFile(command.path);
      return printBook(await context.coverSearch.identifyByImage(image, { signal }));
    }
    case "quote": {
      const verification = await context.quoteVerifier.verify(command.quote, command.author, { signal });
      print(verification, options.json, () => formatVerification(verification));
      return verification.sources.length > 0 ? EXIT_FOUND : EXIT_NOT_FOUND;
    }
  }
}
