import path from "node:path";

import { config as loadEnv } from "dotenv";

import type { LogLevel } from "@/application/interfaces/logger";
import type { EnrichableField } from "@/domain/entities/book";

import { isLogLevel } from "@/application/interfaces/logger";
import { DEFAULT_ENRICHMENT_ORDER, isProviderName, PROVIDER_NAMES, type ProviderName } from "@/domain/book-sources";
import { isEnrichableField } from "@/domain/entities/book";
import { ConfigError } from "@/domain/error";

export interface ApiCredentials {
  googleBooksApiKey: string | null;
  isbnDbApiKey: string | null;
  azureVisionEndpoint: string | null;
  azureVisionApiKey: string | null;
}

export interface ProviderConfig {
  /** 登録する取得元 (この順でレジストリに並ぶ) */
  enabled: readonly ProviderName[];
  /** 基本検索の順。null ならレジストリの登録順 */
  baseOrder: readonly ProviderName[] | null;
  enrichmentOrder: readonly ProviderName[];
  enrichmentFields: readonly EnrichableField[];
  skipConsulted: boolean;
  timeoutMs: number;
  delayMs: number;
}

export interface StorageConfig {
  sqlitePath: string;
}

export interface RuntimeConfig {
  api: ApiCredentials;
  providers: ProviderConfig;
  storage: StorageConfig;
  logLevel: LogLevel;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_SQLITE_PATH = "./books.sqlite";

const optional = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" ? null : trimmed;
};

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

const parseProviderList = (key: string, value: string | undefined): ProviderName[] | null => {
  const raw = optional(value);
  if (raw === null) {
    return null;
  }
  const names: ProviderName[] = [];
  for (const item of splitList(raw)) {
    if (!isProviderName(item)) {
      const expected = PROVIDER_NAMES.join(", ");
      throw new ConfigError(`${key} contains an unknown provider: ${item} (expected one of ${expected})`);
    }
    names.push(item);
  }
  return names;
};

const parseMilliseconds = (key: string, value: string | undefined, fallback: number, minimum = 0): number => {
  const raw = optional(value);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new ConfigError(`${key} must be an integer of at least ${minimum}: ${raw}`);
  }
  return parsed;
};

const parseBoolean = (key: string, value: string | undefined): boolean => {
  const raw = optional(value)?.toLowerCase() ?? null;
  if (raw === null) {
    return false;
  }
  if (["true", "1", "yes"].includes(raw)) return true;
  if (["false", "0", "no"].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean: ${raw}`);
};

const parseFields = (value: string | undefined): EnrichableField[] => {
  const raw = optional(value);
  if (raw === null) {
    return ["coverImageUrl"];
  }
  return splitList(raw).map((field) => {
    if (!isEnrichableField(field)) {
      throw new ConfigError(`ENRICHMENT_FIELDS contains a field that cannot be enriched: ${field}`);
    }
    return field;
  });
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  const raw = optional(value)?.toLowerCase() ?? null;
  if (raw === null) {
    return "info";
  }
  if (!isLogLevel(raw)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error: ${raw}`);
  }
  return raw;
};

/**
 * AzureVision はエンドポイントが設定されているときだけ既定で有効
 */
const defaultEnabledProviders = (azureVisionEndpoint: string | null): ProviderName[] =>
  PROVIDER_NAMES.filter((name) => name !== "AzureVision" || azureVisionEndpoint !== null);

/**
 * 環境変数から設定を組み立てる
 * @throws {ConfigError} 値が不正
 */
export const parseRuntimeConfig = (env: EnvSource): RuntimeConfig => {
  const api: ApiCredentials = {
    googleBooksApiKey: optional(env.GOOGLE_BOOKS_API_KEY),
    isbnDbApiKey: optional(env.ISBNDB_API_KEY),
    azureVisionEndpoint: optional(env.AZURE_VISION_ENDPOINT),
    azureVisionApiKey: optional(env.AZURE_VISION_API_KEY)
  };

  const providers: ProviderConfig = {
    enabled:
      parseProviderList("ENABLED_PROVIDERS", env.ENABLED_PROVIDERS) ??
      defaultEnabledProviders(api.azureVisionEndpoint),
    baseOrder: parseProviderList("BASE_PROVIDER_ORDER", env.BASE_PROVIDER_ORDER),
    enrichmentOrder:
      parseProviderList("ENRICHMENT_PROVIDER_ORDER", env.ENRICHMENT_PROVIDER_ORDER) ?? DEFAULT_ENRICHMENT_ORDER,
    enrichmentFields: parseFields(env.ENRICHMENT_FIELDS),
    skipConsulted: parseBoolean("ENRICHMENT_SKIP_CONSULTED", env.ENRICHMENT_SKIP_CONSULTED),
    timeoutMs: parseMilliseconds("HTTP_TIMEOUT_MS", env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 1),
    delayMs: parseMilliseconds("PROVIDER_DELAY_MS", env.PROVIDER_DELAY_MS, 0)
  };

  return {
    api,
    providers,
    storage: { sqlitePath: optional(env.SQLITE_PATH) ?? DEFAULT_SQLITE_PATH },
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
};

/**
 * .env を読み込んでから process.env を解釈する (既に設定済みの環境変数が優先)
 */
export const createRuntimeConfig = (envPath: string = path.join(process.cwd(), ".env")): RuntimeConfig => {
  loadEnv({ path: envPath });
  return parseRuntimeConfig(process.env);
};
