/**
 * @module Result
 * @description Utilities for working with Result values.
 */

import { ok, err, type EdgeError, type Result } from "./types";

/**
 * Pattern match on a Result, extracting the value with the matching handler.
 *
 * @example
 * ```ts
 * const label = match(
 *   await edge.mirror.get_latest_version('catalog'),
 *   v => v.version,
 *   () => 'none'
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, returning default if error.
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Execute an async function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = await try_catch_async(
 *   async () => transform(item, ctx),
 *   cause => ({ kind: 'transform_failed', dataset_id, cause })
 * )
 * ```
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Extract value from Result, returning null for any error.
 * Use for lookups where not-found is expected.
 */
export const to_nullable = <T, E>(result: Result<T, E>): T | null => (result.ok ? result.value : null);

/**
 * Format an unknown error to a string message.
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Thrown from lazy sequences (`get_rows`, `get_view`) when a page read fails,
 * since an async iterator has no Result channel.
 */
export class EdgeFault extends Error {
	readonly error: EdgeError;

	constructor(error: EdgeError) {
		super(`edge store failure: ${error.kind}`);
		this.name = "EdgeFault";
		this.error = error;
	}
}

/**
 * Drain an async iterable into an array.
 *
 * @example
 * ```ts
 * const rows = unwrap(await edge.mirror.get_rows('catalog', 'v1'))
 * const items = await collect(rows)
 * ```
 */
export const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
	const out: T[] = [];
	for await (const item of iterable) out.push(item);
	return out;
};
