import { describe, it, expect } from 'vitest';
import {
  AvailabilityChecker,
  parseOllamaList
} from '../../../../src/services/embedding/AvailabilityChecker.js';
import type { ModuleResolver } from '../../../../src/services/embedding/AvailabilityChecker.js';
import { ModelCatalog } from '../../../../src/services/embedding/model-catalog.js';
import type { EmbeddingModelDescriptor } from '../../../../src/models/EmbeddingModelDescriptor.js';
import type { ProcessOutput, ProcessRunner } from '../../../../src/lib/process-runner.js';
import type { Result } from '../../../../src/lib/result-types.js';
import type { ProcessError } from '../../../../src/lib/process-runner.js';
import { FakeProcessRunner, ollamaListOutput } from '../../../helpers/fake-process-runner.js';

const catalog = new ModelCatalog();

function model(id: string): EmbeddingModelDescriptor {
  const found = catalog.findById(id);
  if (found.isErr()) throw found.error;
  return found.value;
}

const resolvable = (...modules: string[]): ModuleResolver => ({
  canResolve: (specifier) => modules.includes(specifier)
});

describe('parseOllamaList', () => {
  it('returns the NAME column without the header', () => {
    expect(parseOllamaList(ollamaListOutput('nomic-embed-text:latest', 'llama3.1:8b'))).toEqual([
      'nomic-embed-text:latest',
      'llama3.1:8b'
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseOllamaList('')).toEqual([]);
  });
});

describe('AvailabilityChecker', () => {
  describe('ollama models', () => {
    it('is available when ollama lists the model under a tag', async () => {
      const runner = new FakeProcessRunner().succeed('ollama list', ollamaListOutput('nomic-embed-text:latest'));
      const checker = new AvailabilityChecker({ runner, probeTimeoutMs: 500 });

      expect(await checker.checkAvailable(model('ollama_nomic-embed-text'))).toBe(true);
      expect(runner.calls).toEqual([{ commandLine: 'ollama list', timeoutMs: 500 }]);
    });

    it('does not match a different model sharing a prefix', async () => {
      const runner = new FakeProcessRunner().succeed('ollama list', ollamaListOutput('nomic-embed-text-v2:latest'));
      const checker = new AvailabilityChecker({ runner });

      expect(await checker.checkAvailable(model('ollama_nomic-embed-text'))).toBe(false);
    });

    it('is unavailable when ollama is not installed', async () => {
      const checker = new AvailabilityChecker({ runner: new FakeProcessRunner() });

      expect(await checker.checkAvailable(model('ollama_mxbai-embed-large'))).toBe(false);
    });

    it('is unavailable when the listing exits non-zero', async () => {
      const runner = new FakeProcessRunner().failWith('ollama list', 'could not connect to ollama app');
      const checker = new AvailabilityChecker({ runner });

      expect(await checker.checkAvailable(model('ollama_nomic-embed-text'))).toBe(false);
    });

    it('reports false when the runner itself throws', async () => {
      const runner: ProcessRunner = {
        run: async (): Promise<Result<ProcessOutput, ProcessError>> => {
          throw new Error('boom');
        }
      };
      const checker = new AvailabilityChecker({ runner });

      await expect(checker.checkAvailable(model('ollama_nomic-embed-text'))).resolves.toBe(false);
    });
  });

  describe('hosted models', () => {
    it('is available when the credential is set', async () => {
      const runner = new FakeProcessRunner();
      const checker = new AvailabilityChecker({ runner, env: { OPENAI_API_KEY: 'test-secret' } });

      expect(await checker.checkAvailable(model('openai_text-embedding-3-small'))).toBe(true);
      expect(runner.calls).toHaveLength(0);
    });

    it('treats a blank credential as missing', async () => {
      const checker = new AvailabilityChecker({ runner: new FakeProcessRunner(), env: { GOOGLE_API_KEY: '  ' } });

      expect(await checker.checkAvailable(model('google_text-embedding-004'))).toBe(false);
    });

    it('looks up the provider-specific variable', async () => {
      const checker = new AvailabilityChecker({ runner: new FakeProcessRunner(), env: { OPENAI_API_KEY: 'test-secret' } });

      expect(await checker.checkAvailable(model('google_text-embedding-004'))).toBe(false);
    });
  });

  describe('in-process library models', () => {
    it('is available when the library resolves', async () => {
      const checker = new AvailabilityChecker({
        runner: new FakeProcessRunner(),
        moduleResolver: resolvable('@xenova/transformers')
      });

      expect(await checker.checkAvailable(model('huggingface_all-mpnet-base-v2'))).toBe(true);
    });

    it('is unavailable when it does not', async () => {
      const checker = new AvailabilityChecker({ runner: new FakeProcessRunner(), moduleResolver: resolvable() });

      expect(await checker.checkAvailable(model('huggingface_all-mpnet-base-v2'))).toBe(false);
    });
  });
});
