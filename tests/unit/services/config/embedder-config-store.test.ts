import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { EmbedderConfigStore } from '../../../../src/services/config/EmbedderConfigStore.js';
import { ConfigReadFailedError, ConfigWriteFailedError } from '../../../../src/lib/errors/DocWikiErrors.js';
import { createDefaultEmbedderConfig, serializeEmbedderConfigFile } from '../../../../src/models/EmbedderConfig.js';
import type { EmbedderConfigFile } from '../../../../src/models/EmbedderConfig.js';
import { createTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

const googleConfig: EmbedderConfigFile = {
  embedder: {
    clientKind: 'GoogleEmbedderClient',
    modelParams: { model: 'text-embedding-004', dimensions: 768 }
  },
  retriever: { top_k: 20 }
};

describe('EmbedderConfigStore', () => {
  let dir: string;
  let store: EmbedderConfigStore;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new EmbedderConfigStore({ configDir: dir });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('getCurrent', () => {
    it('returns null when no file exists', async () => {
      const current = await store.getCurrent();
      expect(current.isOk() && current.value).toBeNull();
    });

    it('falls back to the defaults', async () => {
      const current = await store.getCurrentOrDefault();
      expect(current.isOk() && current.value).toEqual(createDefaultEmbedderConfig());
    });

    it('hands out a fresh default each time', async () => {
      const first = await store.getCurrentOrDefault();
      if (first.isOk()) {
        first.value.embedder.modelParams.model = 'changed-by-caller';
      }

      const second = await store.getCurrentOrDefault();

      expect(second.isOk() && second.value.embedder.modelParams.model).toBe('nomic-embed-text');
    });

    it('reports invalid JSON as ConfigReadFailed', async () => {
      await writeFile(store.configPath, 'invalid json {{{');

      const current = await store.getCurrent();

      expect(current.isErr()).toBe(true);
      if (current.isErr()) {
        expect(current.error).toBeInstanceOf(ConfigReadFailedError);
        expect(current.error.message).toContain('invalid JSON');
      }
    });

    it('reports a missing model as ConfigReadFailed', async () => {
      await writeFile(store.configPath, JSON.stringify({ embedder: { client_class: 'OllamaClient', model_kwargs: {} } }));

      const current = await store.getCurrent();

      expect(current.isErr()).toBe(true);
      if (current.isErr()) {
        expect(current.error.message).toContain('embedder.model_kwargs.model');
      }
    });
  });

  describe('initialize', () => {
    it('writes the defaults once', async () => {
      const created = await store.initialize();

      expect(created.isOk() && created.value).toBe(true);
      expect(await readFile(store.configPath, 'utf-8')).toBe(serializeEmbedderConfigFile(createDefaultEmbedderConfig()));
    });

    it('never overwrites an existing file', async () => {
      await writeFile(store.configPath, '{"embedder":{"client_class":"OllamaClient","model_kwargs":{"model":"x"}}}');

      const created = await store.initialize();

      expect(created.isOk() && created.value).toBe(false);
      expect(await readFile(store.configPath, 'utf-8')).toBe(
        '{"embedder":{"client_class":"OllamaClient","model_kwargs":{"model":"x"}}}'
      );
    });
  });

  describe('updateCurrent', () => {
    it('creates no backup when there was no primary', async () => {
      const result = await store.updateCurrent(googleConfig);

      expect(result.isOk()).toBe(true);
      expect(existsSync(store.backupPath)).toBe(false);
      expect(await readFile(store.configPath, 'utf-8')).toBe(serializeEmbedderConfigFile(googleConfig));
    });

    it('backs up exactly the previous content before replacing it', async () => {
      const previous = '{ "embedder": { "client_class": "OllamaClient", "model_kwargs": { "model": "nomic-embed-text" } } }';
      await writeFile(store.configPath, previous);

      await store.updateCurrent(googleConfig);

      expect(await readFile(store.backupPath, 'utf-8')).toBe(previous);
      expect((await readdir(dir)).sort()).toEqual(['embedder.json', 'embedder.json.bak']);
    });

    it('keeps a single backup across updates', async () => {
      await store.initialize();
      await store.updateCurrent(googleConfig);
      await store.updateCurrent(createDefaultEmbedderConfig());

      const backup = await store.readBackup();
      expect(backup.isOk() && backup.value).toEqual(googleConfig);
      expect((await readdir(dir)).sort()).toEqual(['embedder.json', 'embedder.json.bak']);
    });

    it('leaves the existing primary untouched when the write fails', async () => {
      await store.initialize();
      const before = await readFile(store.configPath, 'utf-8');
      await mkdir(store.backupPath);

      const result = await store.updateCurrent(googleConfig);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(ConfigWriteFailedError);
      }
      expect(await readFile(store.configPath, 'utf-8')).toBe(before);
      expect(existsSync(join(dir, 'embedder.json.tmp'))).toBe(false);
    });
  });

  describe('describe', () => {
    it('reports the defaults before anything is written', async () => {
      const status = await store.describe();

      expect(status.isOk() && status.value).toEqual({
        model: 'nomic-embed-text',
        clientKind: 'OllamaClient',
        provider: 'ollama',
        dimensions: 768,
        configPath: store.configPath,
        isDefault: true
      });
    });

    it('falls back to model_kwargs.dimensions for models outside the catalog', async () => {
      await store.updateCurrent({
        embedder: { clientKind: 'OpenAIClient', modelParams: { model: 'text-embedding-ada-002', dimensions: 1536 } }
      });

      const status = await store.describe();

      expect(status.isOk() && status.value).toMatchObject({ provider: 'openai', dimensions: 1536, isDefault: false });
    });
  });
});
