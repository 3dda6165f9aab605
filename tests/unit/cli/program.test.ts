import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { ok } from '../../../src/lib/result-types.js';
import type { Result } from '../../../src/lib/result-types.js';
import type { ConfigError } from '../../../src/lib/errors/DocWikiErrors.js';
import { createSilentLogger } from '../../../src/lib/logger.js';
import type { RuntimeConfig } from '../../../src/lib/env-config.js';
import { createServices } from '../../../src/services/service-container.js';
import type { Services } from '../../../src/services/service-container.js';
import { createProgram } from '../../../src/cli/program.js';
import type { CliContext } from '../../../src/cli/context.js';
import { OutputFormatter } from '../../../src/cli/utils/output.js';
import { FakeProcessRunner, ollamaListOutput } from '../../helpers/fake-process-runner.js';
import { createTempDir, removeTempDir } from '../../helpers/temp-dir.js';
import { wikiEntry, wikiKey } from '../../helpers/wiki-fixtures.js';

class TestContext implements CliContext {
  exitCode = 0;
  readonly lines: string[] = [];
  readonly errors: string[] = [];
  readonly output = new OutputFormatter({
    color: false,
    spinners: false,
    sink: { out: (line) => this.lines.push(line), err: (line) => this.errors.push(line) }
  });

  constructor(private readonly built: Services) {}

  services(): Result<Services, ConfigError> {
    return ok(this.built);
  }

  setLogLevel(): void {}
}

describe('docwiki CLI', () => {
  let dir: string;
  let services: Services;
  let ctx: TestContext;

  const run = async (...args: string[]): Promise<void> => {
    await createProgram(ctx).parseAsync(args, { from: 'user' });
  };

  const firstJson = (): Record<string, unknown> => JSON.parse(ctx.lines[0] ?? 'null');

  beforeEach(async () => {
    dir = await createTempDir();
    const config: RuntimeConfig = {
      homeDir: dir,
      configDir: join(dir, 'config'),
      cacheDir: join(dir, 'wikicache'),
      logDir: join(dir, 'logs'),
      probeTimeoutMs: 1000,
      installTimeoutMs: 1000,
      languages: { supported: { en: 'English' }, defaultLanguage: 'en' },
      auth: { enabled: false, code: '' }
    };
    services = createServices(config, {
      logger: createSilentLogger(),
      runner: new FakeProcessRunner().succeed('ollama list', ollamaListOutput('nomic-embed-text:latest')),
      moduleResolver: { canResolve: () => false },
      env: { OPENAI_API_KEY: 'test-secret' }
    });
    ctx = new TestContext(services);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('shows the default configuration', async () => {
    await run('status');

    expect(ctx.exitCode).toBe(0);
    expect(ctx.lines[0]).toBe('ℹ Using default embedding configuration');
    expect(ctx.lines).toContain('  Model: nomic-embed-text');
    expect(ctx.lines).toContain('  Client Kind: OllamaClient');
  });

  it('writes the default configuration once on init', async () => {
    await run('init');

    expect(ctx.exitCode).toBe(0);
    expect(ctx.lines).toEqual([
      '✓ Wrote default embedding configuration',
      `  Config Path: ${services.configStore.configPath}`
    ]);
    const status = await services.configStore.describe();
    expect(status.isOk() && status.value.isDefault).toBe(false);

    await run('init');

    expect(ctx.exitCode).toBe(0);
    expect(ctx.lines[2]).toBe('ℹ Embedding configuration already exists');
  });

  it('lists models with availability and the active marker', async () => {
    await run('--json', 'list');

    const table = firstJson();
    expect(table.headers).toEqual(['ID', 'NAME', 'DIMS', 'COMPATIBLE', 'INSTALLED', 'STATUS']);
    expect(Array.isArray(table.data) && table.data[0]).toEqual({
      ID: 'ollama_nomic-embed-text',
      NAME: 'Nomic Embed Text',
      DIMS: 768,
      COMPATIBLE: 'yes',
      INSTALLED: 'yes',
      STATUS: 'CURRENT'
    });
  });

  it('switches models and reports the outcome as JSON', async () => {
    await run('--json', 'switch', 'openai_text-embedding-3-small');

    expect(ctx.exitCode).toBe(0);
    expect(firstJson()).toEqual({
      status: 'success',
      message: 'Switched to Text Embedding 3 Small',
      id: 'openai_text-embedding-3-small',
      previous: null,
      dimensions: 768,
      installed: false,
      forced: false
    });

    const status = await services.configStore.describe();
    expect(status.isOk() && status.value.model).toBe('text-embedding-3-small');
  });

  it('fails an incompatible switch without --force', async () => {
    await run('switch', 'openai_text-embedding-3-large');

    expect(ctx.exitCode).toBe(1);
    expect(ctx.errors[0]).toMatch(/^✗ Model "openai_text-embedding-3-large"/);
  });

  it('warns about stale caches after a forced switch', async () => {
    await run('switch', 'openai_text-embedding-3-large', '--force');

    expect(ctx.exitCode).toBe(0);
    expect(ctx.lines[0]).toBe('✓ Switched to Text Embedding 3 Large');
    expect(ctx.errors[0]).toMatch(/^⚠ openai_text-embedding-3-large produces 3072-dimensional vectors/);
  });

  it('exits 1 from check when a model is unavailable', async () => {
    await run('check', 'google_text-embedding-004');

    expect(ctx.exitCode).toBe(1);
    expect(ctx.errors).toEqual(['✗ Gemini Text Embedding 004 is not available']);
  });

  it('exits 1 for an unknown model', async () => {
    await run('install', 'ollama_unknown');

    expect(ctx.exitCode).toBe(1);
  });

  it('lists presets', async () => {
    await run('--json', 'presets');

    const table = firstJson();
    expect(Array.isArray(table.data) && table.data.length).toBe(4);
  });

  it('lists and deletes cached wikis', async () => {
    await services.wikiCache.save({ key: wikiKey(), entry: wikiEntry() });

    await run('--json', 'cache', 'list');
    const table = firstJson();
    expect(Array.isArray(table.data) && table.data[0]).toMatchObject({
      NAME: 'acme/widgets',
      TYPE: 'github',
      LANGUAGE: 'en'
    });

    await run('cache', 'delete', 'github', 'acme', 'widgets', 'en');
    expect(ctx.exitCode).toBe(0);
    expect((await services.cacheStore.get(wikiKey())).isErr()).toBe(true);
  });

  it('clears the cache', async () => {
    await services.wikiCache.save({ key: wikiKey({ repo: 'one' }), entry: wikiEntry() });
    await services.wikiCache.save({ key: wikiKey({ repo: 'two' }), entry: wikiEntry() });

    await run('cache', 'clear');

    expect(ctx.lines[0]).toBe('✓ Removed 2 cached wiki(s)');
    expect(await services.cacheStore.listAll()).toEqual([]);
  });
});
