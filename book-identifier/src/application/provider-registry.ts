import type { BookProvider } from "./book-provider";
import type { Capability, ProviderName } from "@/domain/book-sources";

import { ConfigError } from "@/domain/error";

/**
 * 登録順を保った書誌情報アダプターの一覧
 */
export class ProviderRegistry {
  private readonly providers: readonly BookProvider[];

  constructor(providers: readonly BookProvider[]) {
    const names = new Set<ProviderName>();
    for (const provider of providers) {
      if (names.has(provider.name)) {
        throw new ConfigError(`Provider registered twice: ${provider.name}`);
      }
      names.add(provider.name);
    }
    this.providers = [...providers];
  }

  all(): readonly BookProvider[] {
    return this.providers;
  }

  get(name: ProviderName): BookProvider | undefined {
    return this.providers.find((provider) => provider.name === name);
  }

  withCapability(capability: Capability): BookProvider[] {
    return this.providers.filter((provider) => provider.capabilities.has(capability));
  }

  /**
   * names の順に並べ替える。未登録の名前と重複は無視
   */
  ordered(names: readonly ProviderName[]): BookProvider[] {
    const picked: BookProvider[] = [];
    for (const name of new Set(names)) {
      const provider = this.get(name);
      if (provider !== undefined) {
        picked.push(provider);
      }
    }
    return picked;
  }
}
