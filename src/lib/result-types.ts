/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result/Either pattern using neverthrow.
 * Every fallible operation in docwiki-core returns one of these instead of throwing.
 */

import {
	Result as NeverthrowResult,
	Ok,
	Err,
	ok as neverthrowOk,
	err as neverthrowErr,
	ResultAsync,
	okAsync,
	errAsync,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export { Ok, Err, ResultAsync, okAsync, errAsync };
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute an async function and wrap its outcome in a Result
 *
 * @param fn - Async function to execute
 * @param errorHandler - Converts whatever was thrown into E
 */
export async function tryAsync<T, E>(
	fn: () => Promise<T>,
	errorHandler: (error: unknown) => E
): Promise<Result<T, E>> {
	try {
		const value = await fn();
		return ok(value);
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Execute a synchronous function and wrap its outcome in a Result
 *
 * @param fn - Function to execute
 * @param errorHandler - Converts whatever was thrown into E
 */
export function trySync<T, E>(
	fn: () => T,
	errorHandler: (error: unknown) => E
): Result<T, E> {
	try {
		return ok(fn());
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * errno code (ENOENT, EACCES, ...) of a Node.js system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error) {
		return typeof error.code === 'string' ? error.code : undefined;
	}
	return undefined;
}
