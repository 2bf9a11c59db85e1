/**
 * Lookup Resolver - app resource → stored translation → fallback → key
 *
 * "Missing" is detected by probing each provider with a sentinel default
 * carrying a fresh random token, so no real string can collide with it.
 */

import { randomUUID } from 'crypto';

import { LOOKUP_DEFAULTS } from '../constants.js';
import type { LanguageKey, TranslationKey } from '../types/index.js';
import type { ResourceProvider } from './resource-providers.js';

export type ResolutionSource = 'app' | 'stored' | 'fallback' | 'key';

export interface Resolution {
  value: string;
  source: ResolutionSource;
}

export interface LookupResolverOptions {
  /** Resources bundled with the application; consulted first */
  appResources?: ResourceProvider;
  /** The store's current bundle */
  stored: ResourceProvider;
  sentinelPrefix?: string;
}

/**
 * Language code of a locale identifier: `se-SV` → `se`, `en_US` → `en`
 */
export function languageCode(identifier: string): LanguageKey {
  return identifier.split(/[-_]/)[0].toLowerCase();
}

export class LookupResolver {
  private readonly appResources?: ResourceProvider;
  private readonly stored: ResourceProvider;
  private readonly sentinelPrefix: string;

  constructor(options: LookupResolverOptions) {
    this.appResources = options.appResources;
    this.stored = options.stored;
    this.sentinelPrefix = options.sentinelPrefix ?? LOOKUP_DEFAULTS.SENTINEL_PREFIX;
  }

  /** A default value no stored string can equal */
  createSentinel(): string {
    return `${this.sentinelPrefix} ${randomUUID()} ##`;
  }

  private async lookupIn(
    provider: ResourceProvider | undefined,
    key: TranslationKey,
    language: LanguageKey
  ): Promise<string | undefined> {
    if (!provider) {
      return undefined;
    }
    const sentinel = this.createSentinel();
    const value = await provider.localizedString(key, language, sentinel);
    return value === sentinel ? undefined : value;
  }

  async resolveWithSource(key: TranslationKey, language: LanguageKey, fallback?: string): Promise<Resolution> {
    const app = await this.lookupIn(this.appResources, key, language);
    if (app !== undefined) {
      return { value: app, source: 'app' };
    }

    const stored = await this.lookupIn(this.stored, key, language);
    if (stored !== undefined) {
      return { value: stored, source: 'stored' };
    }

    if (fallback !== undefined) {
      return { value: fallback, source: 'fallback' };
    }
    return { value: key, source: 'key' };
  }

  async resolve(key: TranslationKey, language: LanguageKey, fallback?: string): Promise<string> {
    return (await this.resolveWithSource(key, language, fallback)).value;
  }

  /**
   * True only if every language has an app or stored entry for `text`
   */
  async isTranslated(text: TranslationKey, languages: readonly LanguageKey[]): Promise<boolean> {
    for (const language of languages) {
      const { source } = await this.resolveWithSource(text, language);
      if (source === 'key') {
        return false;
      }
    }
    return true;
  }
}
