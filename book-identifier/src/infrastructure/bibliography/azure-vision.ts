import { DefaultAzureCredential } from "@azure/identity";

import type { BookProvider, ImageIdentification, LookupOptions } from "@/application/book-provider";
import type { HttpClient } from "@/application/interfaces/http-client";
import type { Logger } from "@/application/interfaces/logger";
import type { Capability } from "@/domain/book-sources";

import { lookupFailure, type ProviderDependencies } from "./provider-support";
import { isRecord, readArray, readRecord, readString } from "./json-reader";

import { createBook } from "@/domain/entities/book";
import {
  BookNotFoundError,
  ConfigError,
  describeError,
  Err,
  isErr,
  Ok,
  ParseError,
  type LookupError,
  type Result
} from "@/domain/error";

const COGNITIVE_SERVICES_SCOPE = "https://cognitiveservices.azure.com/.default";
const ANALYZE_PATH = "/computervision/imageanalysis:analyze";
const API_VERSION = "2024-02-01";
const FEATURES = "read,caption";

/**
 * Bearer トークンの取得元 (テストでは差し替える)
 */
export interface AccessTokenSource {
  getToken(signal?: AbortSignal): Promise<string | null>;
}

/**
 * マネージドID / az login / 環境変数の順に認証情報を探す
 * @link https://learn.microsoft.com/javascript/api/@azure/identity/defaultazurecredential
 */
export const createManagedIdentityTokenSource = (): AccessTokenSource => {
  const credential = new DefaultAzureCredential();
  return {
    getToken: async (signal) => {
      const token = await credential.getToken(COGNITIVE_SERVICES_SCOPE, { abortSignal: signal });
      return token?.token ?? null;
    }
  };
};

export type AzureVisionOptions = {
  readonly endpoint?: string | null;
  /** 指定があればトークンの代わりに Ocp-Apim-Subscription-Key で認証する */
  readonly apiKey?: string | null;
  readonly tokenSource?: AccessTokenSource;
  readonly language?: string;
};

/**
 * Image Analysis 4.0 の read 結果を行ごとに取り出す
 */
export const readRecognizedLines = (data: unknown): string[] =>
  readArray(readRecord(data, "readResult"), "blocks")
    .flatMap((block) => readArray(block, "lines"))
    .map((line) => readString(line, "text"))
    .filter((text): text is string => text !== null && text.trim() !== "")
    .map((text) => text.trim());

/**
 * 1行目をタイトル (読めなければキャプション)、2行目を著者とみなす
 */
export const mapVisionAnalysis = (data: unknown): ImageIdentification | null => {
  const lines = readRecognizedLines(data);
  const caption = readString(readRecord(data, "captionResult"), "text");

  const book = createBook({
    title: lines[0] ?? caption,
    authors: lines.length > 1 ? [lines[1]] : [],
    description: caption,
    source: "AzureVision"
  });
  return book === null ? null : { book, recognizedText: lines.join("\n") };
};

/**
 * 表紙画像の解析 (ISBN検索・テキスト検索はしない)
 * @link https://learn.microsoft.com/azure/ai-services/computer-vision/how-to/call-analyze-image-40
 */
export class AzureVisionProvider implements BookProvider {
  readonly name = "AzureVision";
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(["image-identification"]);

  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly endpoint: string;
  private readonly apiKey: string | null;
  private readonly tokenSource: AccessTokenSource | null;
  private readonly language: string;

  /**
   * @throws {ConfigError} エンドポイントが設定されていない
   */
  constructor(dependencies: ProviderDependencies, options: AzureVisionOptions = {}) {
    const endpoint = options.endpoint?.trim() ?? "";
    if (endpoint === "") {
      throw new ConfigError("Azure Vision endpoint is not configured");
    }
    this.httpClient = dependencies.httpClient;
    this.logger = dependencies.logger;
    this.endpoint = endpoint.replace(/\/+$/, "");

    const apiKey = options.apiKey?.trim() ?? "";
    this.apiKey = apiKey === "" ? null : apiKey;
    this.tokenSource = this.apiKey === null ? (options.tokenSource ?? createManagedIdentityTokenSource()) : null;
    this.language = options.language ?? "en";
  }

  async identifyFromImage(
    image: Uint8Array,
    options: LookupOptions = {}
  ): Promise<Result<ImageIdentification, LookupError>> {
    const query = `image (${image.byteLength} bytes)`;
    if (image.byteLength === 0) {
      return lookupFailure(
        this.logger,
        this.name,
        query,
        new ParseError("Image is empty"),
        options
      );
    }

    const auth = await this.authorizationHeader(options.signal);
    if (isErr(auth)) {
      return lookupFailure(this.logger, this.name, query, auth.err, options);
    }

    const response = await this.httpClient.post(`${this.endpoint}${ANALYZE_PATH}`, Buffer.from(image), {
      params: { "api-version": API_VERSION, features: FEATURES, language: this.language },
      headers: { ...auth.value, "Content-Type": "application/octet-stream" },
      responseType: "json",
      signal: options.signal
    });
    if (isErr(response)) {
      return lookupFailure(this.logger, this.name, query, response.err, options);
    }
    if (!isRecord(response.value.data)) {
      return lookupFailure(
        this.logger,
        this.name,
        query,
        new ParseError("Azure Vision response is not an object"),
        options
      );
    }

    const identified = mapVisionAnalysis(response.value.data);
    if (identified === null) {
      return lookupFailure(this.logger, this.name, query, new BookNotFoundError("no text on the cover"), options);
    }
    this.logger.info("AzureVision: read the cover", { title: identified.book.title });
    return Ok(identified);
  }

  private async authorizationHeader(signal?: AbortSignal): Promise<Result<Record<string, string>, ConfigError>> {
    if (this.apiKey !== null) {
      return Ok({ "Ocp-Apim-Subscription-Key": this.apiKey });
    }
    if (this.tokenSource === null) {
      return Err(new ConfigError("No Azure Vision credential is available"));
    }
    try {
      const token = await this.tokenSource.getToken(signal);
      return token === null
        ? Err(new ConfigError("Azure credential returned no token"))
        : Ok({ Authorization: `Bearer ${token}` });
    } catch (error) {
      return Err(new ConfigError(`Failed to acquire an Azure token: ${describeError(error)}`));
    }
  }
}
