import { describe, it, expect } from 'vitest';
import {
  encodeCacheFilename,
  fixedRoleSeparatorFields,
  isCacheFilename,
  parseCacheFilename,
  validateCacheKey
} from '../../../../src/services/cache/wiki-cache-filename.js';
import { CacheParseSkippedError, InvalidCacheKeyError } from '../../../../src/lib/errors/DocWikiErrors.js';
import { wikiKey } from '../../../helpers/wiki-fixtures.js';

describe('wiki cache filenames', () => {
  it('encodes the key in repoType, owner, repo, language order', () => {
    expect(encodeCacheFilename({ repoType: 'github', owner: 'AsyncFuncAI', repo: 'deepwiki-open', language: 'en' })).toBe(
      'deepwiki_cache_github_AsyncFuncAI_deepwiki-open_en.json'
    );
  });

  it('decodes the four token roles', () => {
    const parsed = parseCacheFilename('deepwiki_cache_github_AsyncFuncAI_deepwiki-open_en.json');

    expect(parsed.isOk() && parsed.value).toEqual({
      repoType: 'github',
      owner: 'AsyncFuncAI',
      repo: 'deepwiki-open',
      language: 'en'
    });
  });

  it('rejoins middle tokens as the repo name', () => {
    const parsed = parseCacheFilename('deepwiki_cache_gitlab_team_my_long_repo_ja.json');

    expect(parsed.isOk() && parsed.value).toEqual({
      repoType: 'gitlab',
      owner: 'team',
      repo: 'my_long_repo',
      language: 'ja'
    });
  });

  it('skips names with fewer than four tokens', () => {
    const parsed = parseCacheFilename('deepwiki_cache_github_acme_en.json');

    expect(parsed.isErr()).toBe(true);
    if (parsed.isErr()) {
      expect(parsed.error).toBeInstanceOf(CacheParseSkippedError);
      expect(parsed.error.message).toBe(
        'Skipped wiki cache file deepwiki_cache_github_acme_en.json: expected at least 4 tokens, found 3'
      );
    }
  });

  it('skips names with an empty token', () => {
    expect(parseCacheFilename('deepwiki_cache_github__widgets_en.json').isErr()).toBe(true);
  });

  it('recognises only prefixed json files', () => {
    expect(isCacheFilename('deepwiki_cache_github_acme_widgets_en.json')).toBe(true);
    expect(isCacheFilename('notes.json')).toBe(false);
    expect(isCacheFilename('deepwiki_cache_github_acme_widgets_en.json.tmp')).toBe(false);
  });

  it('round-trips keys whose repo contains the separator', () => {
    const key = wikiKey({ repo: 'a_b_c' });

    const parsed = parseCacheFilename(encodeCacheFilename(key));

    expect(parsed.isOk() && parsed.value).toEqual(key);
  });

  it('names fixed-role fields that contain the separator', () => {
    expect(fixedRoleSeparatorFields(wikiKey({ owner: 'my_org', language: 'pt_br' }))).toEqual(['owner', 'language']);
    expect(fixedRoleSeparatorFields(wikiKey({ repo: 'x_y' }))).toEqual([]);
  });

  it.each([
    ['owner', '..'],
    ['repo', 'a/b'],
    ['repo', 'a\\b'],
    ['language', '']
  ] as const)('rejects %s = %j', (field, value) => {
    const checked = validateCacheKey({ ...wikiKey(), [field]: value });

    expect(checked.isErr()).toBe(true);
    if (checked.isErr()) {
      expect(checked.error).toBeInstanceOf(InvalidCacheKeyError);
      expect(checked.error.field).toBe(field);
    }
  });
});
