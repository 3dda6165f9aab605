import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { ConfigurationManager, DEFAULT_INSTALL_TIMEOUT_MS } from '../../../src/lib/env-config.js';
import { ConfigError } from '../../../src/lib/errors/DocWikiErrors.js';
import { createTempDir, removeTempDir } from '../../helpers/temp-dir.js';

describe('ConfigurationManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('derives every directory from the home directory', () => {
    const config = new ConfigurationManager({ DOCWIKI_HOME: dir }).getRuntimeConfig();

    expect(config.isOk()).toBe(true);
    if (config.isOk()) {
      expect(config.value.configDir).toBe(join(dir, 'config'));
      expect(config.value.cacheDir).toBe(join(dir, 'wikicache'));
      expect(config.value.logDir).toBe(join(dir, 'logs'));
      expect(config.value.installTimeoutMs).toBe(DEFAULT_INSTALL_TIMEOUT_MS);
      expect(config.value.auth).toEqual({ enabled: false, code: '' });
    }
  });

  it('defaults to ~/.docwiki', () => {
    const config = new ConfigurationManager({}).getRuntimeConfig();

    expect(config.isOk() && config.value.homeDir).toBe(join(homedir(), '.docwiki'));
  });

  it('treats empty variables as unset', () => {
    const config = new ConfigurationManager({ DOCWIKI_HOME: dir, DOCWIKI_CACHE_DIR: '' }).getRuntimeConfig();

    expect(config.isOk() && config.value.cacheDir).toBe(join(dir, 'wikicache'));
  });

  it('loads the bundled language list', () => {
    const config = new ConfigurationManager({ DOCWIKI_HOME: dir }).getRuntimeConfig();

    expect(config.isOk() && config.value.languages.defaultLanguage).toBe('en');
    expect(config.isOk() && Object.keys(config.value.languages.supported)).toContain('ja');
  });

  it('rejects a non-numeric timeout', () => {
    const config = new ConfigurationManager({ DOCWIKI_PROBE_TIMEOUT_MS: 'soon' }).getRuntimeConfig();

    expect(config.isErr()).toBe(true);
    if (config.isErr()) {
      expect(config.error).toBeInstanceOf(ConfigError);
      expect(config.error.message).toBe('DOCWIKI_PROBE_TIMEOUT_MS must be a positive integer, got "soon"');
    }
  });

  it('requires a code when auth mode is on', () => {
    const config = new ConfigurationManager({ WIKI_AUTH_MODE: 'true' }).getRuntimeConfig();

    expect(config.isErr() && config.error.message).toBe('WIKI_AUTH_MODE is enabled but WIKI_AUTH_CODE is not set');
  });

  it('enables auth mode with a code', () => {
    const config = new ConfigurationManager({ WIKI_AUTH_MODE: '1', WIKI_AUTH_CODE: 'test-secret' }).getRuntimeConfig();

    expect(config.isOk() && config.value.auth).toEqual({ enabled: true, code: 'test-secret' });
  });

  it('rejects a language file whose default is not supported', async () => {
    const langFile = join(dir, 'lang.json');
    await writeFile(langFile, JSON.stringify({ supported_languages: { en: 'English' }, default: 'fr' }));

    const config = new ConfigurationManager({ DOCWIKI_LANG_CONFIG: langFile }).getRuntimeConfig();

    expect(config.isErr() && config.error.message).toBe(
      `Invalid language settings ${langFile}: default language must be one of supported_languages`
    );
  });
});
