/**
 * External process execution
 *
 * Availability probes and install directives shell out to tools such as
 * `ollama`. Services depend on the ProcessRunner interface so tests can
 * substitute a fake; the production runner always enforces a timeout.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { Result, ok, err, describeError } from './result-types.js';

const execFileAsync = promisify(execFile);

/** System error codes (ENOENT, EACCES, ...); Node's own codes start with ERR_ */
const ERRNO_CODE = /^E[A-Z0-9]+$/;

/**
 * Captured output of a process that exited with status 0
 */
export interface ProcessOutput {
	stdout: string;
	stderr: string;
}

export interface RunOptions {
	/** Kill the process after this many milliseconds */
	timeoutMs?: number;
}

/**
 * Why a process run did not succeed
 */
export type ProcessFailureKind = 'spawn-failed' | 'timeout' | 'exit';

export class ProcessError extends Error {
	constructor(
		public readonly kind: ProcessFailureKind,
		public readonly commandLine: string,
		message: string,
		public readonly exitCode: number | null = null,
		public readonly stdout: string = '',
		public readonly stderr: string = ''
	) {
		super(message);
		this.name = 'ProcessError';
		Object.setPrototypeOf(this, ProcessError.prototype);
	}
}

/**
 * Runs an external command to completion
 */
export interface ProcessRunner {
	run(command: string, args: string[], options?: RunOptions): Promise<Result<ProcessOutput, ProcessError>>;
}

/**
 * ProcessRunner backed by child_process.execFile (no shell)
 */
export class NodeProcessRunner implements ProcessRunner {
	constructor(private readonly defaultTimeoutMs: number) {}

	async run(command: string, args: string[], options: RunOptions = {}): Promise<Result<ProcessOutput, ProcessError>> {
		const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

		try {
			const { stdout, stderr } = await execFileAsync(command, args, {
				timeout: timeoutMs,
				maxBuffer: 10 * 1024 * 1024,
				windowsHide: true,
			});
			return ok({ stdout, stderr });
		} catch (error) {
			return err(toProcessError([command, ...args].join(' '), timeoutMs, error));
		}
	}
}

/**
 * Classify an execFile rejection
 */
export function toProcessError(commandLine: string, timeoutMs: number, error: unknown): ProcessError {
	if (typeof error !== 'object' || error === null) {
		return new ProcessError('spawn-failed', commandLine, describeError(error));
	}

	const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
	const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
	const code = 'code' in error ? error.code : undefined;
	const killed = 'killed' in error && error.killed === true;

	if (typeof code === 'string' && ERRNO_CODE.test(code)) {
		// ENOENT, EACCES: the binary never started
		return new ProcessError('spawn-failed', commandLine, `${commandLine}: ${code}`, null, stdout, stderr);
	}

	if (typeof code === 'string') {
		// Node-level failure of a process that did start, e.g. ERR_CHILD_PROCESS_STDIO_MAXBUFFER
		return new ProcessError('exit', commandLine, `${commandLine} failed: ${code}`, null, stdout, stderr);
	}

	if (killed) {
		return new ProcessError(
			'timeout',
			commandLine,
			`${commandLine} timed out after ${timeoutMs}ms`,
			null,
			stdout,
			stderr
		);
	}

	const exitCode = typeof code === 'number' ? code : null;
	return new ProcessError(
		'exit',
		commandLine,
		`${commandLine} exited with code ${exitCode ?? 'unknown'}`,
		exitCode,
		stdout,
		stderr
	);
}
