import type { BookProvider } from "@/application/book-provider";
import type { BookRepository } from "@/application/interfaces/book-repository";
import type { Logger } from "@/application/interfaces/logger";
import type { RuntimeConfig } from "@/config/config";
import type { ProviderName } from "@/domain/book-sources";

import { ProviderRegistry } from "@/application/provider-registry";
import { CatalogLookup } from "@/application/usecases/catalog-lookup";
import { CoverSearch } from "@/application/usecases/cover-search";
import { FieldEnricher } from "@/application/usecases/enrich-missing-fields";
import { BookIdentifier } from "@/application/usecases/identify-book";
import { QuoteVerifier } from "@/application/usecases/verify-quote";
import { AzureVisionProvider } from "@/infrastructure/bibliography/azure-vision";
import { GoogleBooksProvider } from "@/infrastructure/bibliography/google-books";
import { InventaireProvider } from "@/infrastructure/bibliography/inventaire";
import { IsbnDbProvider } from "@/infrastructure/bibliography/isbn-db";
import { OpenLibraryProvider } from "@/infrastructure/bibliography/open-library";
import { WikidataProvider } from "@/infrastructure/bibliography/wikidata";
import { closeDrizzleConnection, createDrizzleConnection } from "@/infrastructure/database/connection";
import { ConsoleLogger } from "@/infrastructure/logging/console-logger";
import { createAxiosHttpClient } from "@/infrastructure/ports/axios-http-client";
import { SqliteBookRepository } from "@/infrastructure/repositories/sqlite-book-repository";

export interface AppContext {
  readonly logger: Logger;
  readonly registry: ProviderRegistry;
  readonly identifier: BookIdentifier;
  readonly enricher: FieldEnricher;
  readonly coverSearch: CoverSearch;
  readonly quoteVerifier: QuoteVerifier;
  /** --persist のときだけ */
  readonly catalog: CatalogLookup | null;
  dispose(): void;
}

export type AppContextOptions = {
  readonly persist: boolean;
};

/**
 * 取得元ごとに axios インスタンスを1つずつ作る
 * @throws {ConfigError} AzureVision を有効にしたのにエンドポイントが無い
 */
export const createProvider = (name: ProviderName, config: RuntimeConfig, logger: ConsoleLogger): BookProvider => {
  const dependencies = {
    httpClient: createAxiosHttpClient({ timeout: config.providers.timeoutMs }),
    logger: logger.child(name)
  };

  switch (name) {
    case "GoogleBooks":
      return new GoogleBooksProvider(dependencies, { apiKey: config.api.googleBooksApiKey });
    case "OpenLibrary":
      return new OpenLibraryProvider(dependencies);
    case "ISBNdb":
      return new IsbnDbProvider(dependencies, { apiKey: config.api.isbnDbApiKey });
    case "Wikidata":
      return new WikidataProvider(dependencies);
    case "Inventaire":
      return new InventaireProvider(dependencies);
    case "AzureVision":
      return new AzureVisionProvider(dependencies, {
        endpoint: config.api.azureVisionEndpoint,
        apiKey: config.api.azureVisionApiKey
      });
  }
};

/**
 * アプリケーションコンテキストのセットアップ
 */
export const createAppContext = (config: RuntimeConfig, options: AppContextOptions): AppContext => {
  const logger = new ConsoleLogger("book-identifier", config.logLevel);
  const registry = new ProviderRegistry(config.providers.enabled.map((name) => createProvider(name, config, logger)));

  const db = options.persist ? createDrizzleConnection(config.storage.sqlitePath) : null;
  const repository: BookRepository | undefined =
    db === null ? undefined : new SqliteBookRepository(db, logger.child("repository"));

  const identifier = new BookIdentifier(registry, logger.child("identify"), {
    baseOrder: config.providers.baseOrder ?? undefined,
    interProviderDelayMs: config.providers.delayMs
  });
  const enricher = new FieldEnricher(
    registry,
    logger.child("enrich"),
    {
      fields: config.providers.enrichmentFields,
      order: config.providers.enrichmentOrder,
      skipConsulted: config.providers.skipConsulted,
      interProviderDelayMs: config.providers.delayMs
    },
    repository
  );

  return {
    logger,
    registry,
    identifier,
    enricher,
    coverSearch: new CoverSearch(registry, identifier, logger.child("cover"), repository),
    quoteVerifier: new QuoteVerifier(registry, logger.child("quote")),
    catalog:
      repository === undefined ? null : new CatalogLookup(identifier, enricher, repository, logger.child("catalog")),
    dispose: () => {
      if (db !== null) {
        closeDrizzleConnection(db);
      }
    }
  };
};
