/**
 * @module UserDBUtils
 * @description Document key, timestamp and name validation for tenant tables.
 */

import type { EdgeError, JsonObject, Result } from '../types';
import { ok, err } from '../types';
import { read_segments, type PathSegment } from '../json-path';
import { to_index_key } from './indexing';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;
const DIGITS = /^\d+$/;

/**
 * Index column names are plain identifiers of at most 63 characters.
 *
 * @example
 * ```ts
 * validate_col_name('status')   // ok
 * validate_col_name('1status')  // err invalid_path
 * ```
 */
export function validate_col_name(col_name: string): Result<void, EdgeError> {
	if (!IDENTIFIER.test(col_name)) {
		return err({ kind: 'invalid_path', path: col_name, message: 'column name must match ^[A-Za-z_][A-Za-z0-9_]{0,62}$' });
	}
	return ok(undefined);
}

export function validate_phy_table(phy_table: string): Result<void, EdgeError> {
	if (!IDENTIFIER.test(phy_table)) {
		return err({ kind: 'invalid_input', message: `physical table id "${phy_table}" is not a valid identifier` });
	}
	return ok(undefined);
}

/**
 * Reads the primary key of a document. Strings must be non-empty; numbers are
 * stored in their decimal form, so `1` and `"1"` name the same document.
 */
export function extract_pk(item: JsonObject, segments: PathSegment[], pk_path: string): Result<string, EdgeError> {
	const value = read_segments(item, segments);
	if (typeof value === 'string' && value.length > 0) return ok(value);
	if (typeof value === 'number' && Number.isFinite(value)) return ok(String(value));
	return err({ kind: 'invalid_path', path: pk_path, message: 'primary key must be a non-empty string or a finite number' });
}

/**
 * Resolves the document timestamp in epoch ms: a number, a string of digits,
 * or an ISO-8601 datetime at `ts_path`. Anything else falls back to `now`.
 */
export function resolve_ts(item: JsonObject, segments: PathSegment[], now: number): number {
	const value = read_segments(item, segments);
	if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
	if (typeof value === 'string') {
		if (DIGITS.test(value)) return Number(value);
		const parsed = to_index_key(value, 'datetime');
		if (typeof parsed === 'number') return parsed;
	}
	return now;
}

export const lock_key = (user_id: string, table_name: string): string => `${user_id}\u0000${table_name}`;
