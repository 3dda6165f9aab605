/**
 * Wiki cache filename codec
 *
 * A cache file is named
 *
 *   deepwiki_cache_{repoType}_{owner}_{repo}_{language}.json
 *
 * The name is the only index of the cache, so listings recover the key from
 * it. Decoding relies on fixed token roles: the first token is repoType, the
 * second is owner, the last is language, and every token in between is
 * rejoined with "_" as repo. This only round-trips while repoType, owner and
 * language contain no "_"; repo may contain any number of them.
 *
 * Files written by existing deployments use this layout, so it is kept as is.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { CacheParseSkippedError, InvalidCacheKeyError } from '../../lib/errors/DocWikiErrors.js';
import { WIKI_CACHE_FILES } from '../../constants/embedding-constants.js';
import type { WikiCacheKey } from '../../models/WikiCache.js';

const { PREFIX, SUFFIX, SEPARATOR, MIN_TOKENS } = WIKI_CACHE_FILES;

const KEY_FIELDS = ['repoType', 'owner', 'repo', 'language'] as const;
const FIXED_ROLE_FIELDS = ['repoType', 'owner', 'language'] as const;

type KeyField = (typeof KEY_FIELDS)[number];

/**
 * Reject components that could escape the cache directory or produce an
 * unreadable name
 */
export function validateCacheKey(key: WikiCacheKey): Result<WikiCacheKey, InvalidCacheKeyError> {
  for (const field of KEY_FIELDS) {
    const value = key[field];
    if (value.length === 0) {
      return err(new InvalidCacheKeyError(field, value, 'must not be empty'));
    }
    if (/[/\\\0]/.test(value)) {
      return err(new InvalidCacheKeyError(field, value, 'must not contain path separators'));
    }
    if (value === '.' || value === '..') {
      return err(new InvalidCacheKeyError(field, value, 'must not be a relative path segment'));
    }
  }
  return ok(key);
}

/**
 * Fixed-role fields that contain the separator; such keys can be written but
 * are misattributed when listed
 */
export function fixedRoleSeparatorFields(key: WikiCacheKey): KeyField[] {
  return FIXED_ROLE_FIELDS.filter((field) => key[field].includes(SEPARATOR));
}

export function encodeCacheFilename(key: WikiCacheKey): string {
  return `${PREFIX}${[key.repoType, key.owner, key.repo, key.language].join(SEPARATOR)}${SUFFIX}`;
}

export function isCacheFilename(filename: string): boolean {
  return filename.startsWith(PREFIX) && filename.endsWith(SUFFIX);
}

export function parseCacheFilename(filename: string): Result<WikiCacheKey, CacheParseSkippedError> {
  if (!isCacheFilename(filename)) {
    return err(new CacheParseSkippedError(filename, 'not a wiki cache file'));
  }

  const body = filename.slice(PREFIX.length, filename.length - SUFFIX.length);
  const tokens = body.split(SEPARATOR);

  if (tokens.length < MIN_TOKENS) {
    return err(
      new CacheParseSkippedError(filename, `expected at least ${MIN_TOKENS} tokens, found ${tokens.length}`)
    );
  }

  const repoType = tokens[0] ?? '';
  const owner = tokens[1] ?? '';
  const language = tokens[tokens.length - 1] ?? '';
  const repo = tokens.slice(2, -1).join(SEPARATOR);

  if ([repoType, owner, repo, language].some((token) => token.length === 0)) {
    return err(new CacheParseSkippedError(filename, 'empty key component'));
  }

  return ok({ repoType, owner, repo, language });
}
