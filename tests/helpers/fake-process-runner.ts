/**
 * In-process ProcessRunner for tests: canned replies keyed by command line
 */

import { ok, err } from '../../src/lib/result-types.js';
import type { Result } from '../../src/lib/result-types.js';
import { ProcessError } from '../../src/lib/process-runner.js';
import type { ProcessOutput, ProcessRunner, RunOptions } from '../../src/lib/process-runner.js';

export interface RecordedCall {
  commandLine: string;
  timeoutMs?: number;
}

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Result<ProcessOutput, ProcessError>>();

  succeed(commandLine: string, stdout: string = ''): this {
    this.replies.set(commandLine, ok({ stdout, stderr: '' }));
    return this;
  }

  failWith(commandLine: string, stderr: string = 'failed', exitCode: number = 1): this {
    this.replies.set(
      commandLine,
      err(new ProcessError('exit', commandLine, `${commandLine} exited with code ${exitCode}`, exitCode, '', stderr))
    );
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<Result<ProcessOutput, ProcessError>> {
    const commandLine = [command, ...args].join(' ');
    this.calls.push({ commandLine, timeoutMs: options.timeoutMs });
    return (
      this.replies.get(commandLine) ??
      err(new ProcessError('spawn-failed', commandLine, `${commandLine}: ENOENT`))
    );
  }
}

/**
 * `ollama list` output listing the given models
 */
export function ollamaListOutput(...names: string[]): string {
  const rows = names.map((name) => `${name.padEnd(28)}0a109f422b47    274 MB    2 weeks ago`);
  return ['NAME                        ID              SIZE      MODIFIED', ...rows].join('\n') + '\n';
}
