import { Result, err } from '../../lib/result-types.js';
import {
  AuthorizationRejectedError,
  CacheEntryNotFoundError,
  CacheWriteFailedError,
  InvalidCacheKeyError,
  UnsupportedLanguageError
} from '../../lib/errors/DocWikiErrors.js';
import type { AuthSettings, LanguageSettings } from '../../lib/env-config.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import type { CachedWikiSummary, WikiCacheEntry, WikiCacheKey } from '../../models/WikiCache.js';
import type { WikiCacheStore } from './WikiCacheStore.js';

export interface SaveWikiRequest {
  key: WikiCacheKey;
  entry: WikiCacheEntry;
}

export interface WikiCacheServiceOptions {
  store: WikiCacheStore;
  languages: LanguageSettings;
  auth: AuthSettings;
  logger?: Logger;
}

export type RemoveWikiError =
  | UnsupportedLanguageError
  | AuthorizationRejectedError
  | CacheEntryNotFoundError
  | CacheWriteFailedError
  | InvalidCacheKeyError;

/**
 * Request-level rules in front of WikiCacheStore
 *
 * Reads and writes fall back to the default language; deletes must name a
 * supported language and, when auth mode is on, the configured code.
 */
export class WikiCacheService {
  private readonly store: WikiCacheStore;
  private readonly languages: LanguageSettings;
  private readonly auth: AuthSettings;
  private readonly logger: Logger;

  constructor(options: WikiCacheServiceOptions) {
    this.store = options.store;
    this.languages = options.languages;
    this.auth = options.auth;
    this.logger = options.logger ?? createSilentLogger();
  }

  async read(key: WikiCacheKey): Promise<Result<WikiCacheEntry, CacheEntryNotFoundError | InvalidCacheKeyError>> {
    return this.store.get(this.normalizeLanguage(key));
  }

  async save(request: SaveWikiRequest): Promise<Result<string, CacheWriteFailedError | InvalidCacheKeyError>> {
    return this.store.put(this.normalizeLanguage(request.key), request.entry);
  }

  async remove(key: WikiCacheKey, authorizationCode?: string): Promise<Result<void, RemoveWikiError>> {
    if (!this.isSupported(key.language)) {
      return err(new UnsupportedLanguageError(key.language, Object.keys(this.languages.supported)));
    }

    if (this.auth.enabled && authorizationCode !== this.auth.code) {
      this.logger.warn('cache', 'Rejected wiki cache delete: bad authorization code', {
        owner: key.owner,
        repo: key.repo
      });
      return err(new AuthorizationRejectedError());
    }

    return this.store.delete(key);
  }

  async listProjects(): Promise<CachedWikiSummary[]> {
    return this.store.listAll();
  }

  isSupported(language: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.languages.supported, language);
  }

  private normalizeLanguage(key: WikiCacheKey): WikiCacheKey {
    if (this.isSupported(key.language)) {
      return key;
    }
    this.logger.info('cache', `Language "${key.language}" is not supported; using ${this.languages.defaultLanguage}`);
    return { ...key, language: this.languages.defaultLanguage };
  }
}
