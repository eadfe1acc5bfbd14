/**
 * @module UserDBClient
 * @description Tenant document tables with typed secondary indexes, built on the storage transaction API.
 */

import type { ColType, EdgeError, IndexKey, JsonObject, JsonValue, KeyLookup, Result, StorageReader, UserTable, UserTableIndex } from '../types';
import { ok, err, COL_TYPES } from '../types';
import { JsonObjectSchema } from '../codec';
import { derive_phy_table } from '../hash';
import { parse_path, read_segments, type PathSegment } from '../json-path';
import { deadline_of, ensure_ready, ensure_writable, fail, remaining, report, require_ids, type Runtime } from '../utils';
import { compile_lookup, is_missing, match_key, match_raw, parse_predicate, to_index_key, type Predicate, type RawLookup } from './indexing';
import { extract_pk, lock_key, resolve_ts, validate_col_name, validate_phy_table } from './utils';
import type { DropIndexResult, DropTableResult, QueryResult, UpsertOpts, UpsertResult, UserTableEngine } from './types';

type IndexPlan = { index: UserTableIndex; segments: PathSegment[] };

type Backfill =
	| { status: 'created'; index: UserTableIndex; backfilled: number }
	| { status: 'mismatch'; pk: string; backfilled: number };

const is_col_type = (value: string): value is ColType => COL_TYPES.some(t => t === value);

function not_found_table(user_id: string, table_name: string): EdgeError {
	return { kind: 'not_found', resource: 'table', key: `${user_id}/${table_name}` };
}

function type_mismatch(index: UserTableIndex, pk: string): EdgeError {
	return {
		kind: 'invalid_path',
		path: index.json_path,
		message: `value for column "${index.col_name}" is not a ${index.col_type}`,
		pk,
	};
}

/**
 * Paths stored in table metadata were validated on the way in; a failure
 * here means the metadata itself is corrupt.
 */
function stored_path(path: string): PathSegment[] {
	const parsed = parse_path(path);
	if (!parsed.ok) throw new Error(`stored path "${path}" does not parse`);
	return parsed.value;
}

function plan_indexes(indexes: UserTableIndex[]): IndexPlan[] {
	return indexes.map(index => ({ index, segments: stored_path(index.json_path) }));
}

function scan_matching(
	tx: StorageReader,
	table: UserTable,
	segments: PathSegment[],
	matches: (value: JsonValue) => boolean
): { documents: JsonObject[]; examined: number } {
	const docs = tx.scan_documents(table.phy_table);
	const documents: JsonObject[] = [];
	for (const doc of docs) {
		const value = read_segments(doc.item, segments);
		if (is_missing(value)) continue;
		if (matches(value)) documents.push(doc.item);
	}
	return { documents, examined: docs.length };
}

/**
 * Creates the tenant table engine.
 * @category Core
 * @group Components
 *
 * Documents live in one generic document table partitioned by each table's
 * physical id; every declared index keeps one typed entry per document,
 * written in the same transaction as the document.
 *
 * Metadata changes (`create_index`, `drop_index`, `drop_table`) hold the
 * table's lock exclusively; `upsert` and `delete` hold it shared, and reads
 * take no lock at all.
 *
 * @example
 * ```ts
 * await edge.userdb.create_table('u1', 'orders', { pk_path: '$.id' })
 * await edge.userdb.upsert('u1', 'orders', { id: 'o1', updated_at: 5, status: 'open' })
 * await edge.userdb.create_index('u1', 'orders', { col_name: 'status', json_path: '$.status', col_type: 'string' })
 *
 * const open = await edge.userdb.query('u1', 'orders', 'status', 'open')
 * // open.value.documents => [{ id: 'o1', updated_at: 5, status: 'open' }]
 * ```
 */
export function create_user_table_engine(rt: Runtime): UserTableEngine {
	async function with_lock<T>(
		mode: 'shared' | 'exclusive',
		user_id: string,
		table_name: string,
		operation: string,
		deadline: number,
		fn: () => Result<T, EdgeError>
	): Promise<Result<T, EdgeError>> {
		const key = lock_key(user_id, table_name);
		const release = mode === 'shared' ? await rt.locks.shared(key, remaining(deadline)) : await rt.locks.exclusive(key, remaining(deadline));
		if (!release) return fail(rt, { kind: 'transaction_aborted', operation, reason: 'timeout' });
		try {
			return fn();
		} finally {
			release();
		}
	}

	function upsert_one(user_id: string, table_name: string, document: JsonObject, opts: UpsertOpts, deadline: number): Result<UpsertResult, EdgeError> {
		const parsed = JsonObjectSchema.safeParse(document);
		if (!parsed.success) return err({ kind: 'invalid_input', message: 'document must be a JSON object' });
		const item = parsed.data;

		if (opts.client_ts !== undefined && !Number.isFinite(opts.client_ts)) {
			return err({ kind: 'invalid_input', message: 'client_ts must be a finite number' });
		}

		const now = rt.options.clock();
		return rt.storage.write<UpsertResult>(tx => {
			const table = tx.get_table(user_id, table_name);
			if (!table) return err(not_found_table(user_id, table_name));

			const pk = extract_pk(item, stored_path(table.pk_path), table.pk_path);
			if (!pk.ok) return pk;

			const ts = opts.client_ts !== undefined ? Math.trunc(opts.client_ts) : resolve_ts(item, stored_path(table.ts_path), now);

			const keys: { col_name: string; value: IndexKey | null }[] = [];
			for (const { index, segments } of plan_indexes(tx.list_indexes(user_id, table_name))) {
				const value = read_segments(item, segments);
				if (is_missing(value)) {
					keys.push({ col_name: index.col_name, value: null });
					continue;
				}
				const key = to_index_key(value, index.col_type);
				if (key === null) return err(type_mismatch(index, pk.value));
				keys.push({ col_name: index.col_name, value: key });
			}

			const stored = tx.get_document(table.phy_table, pk.value);
			if (stored && (opts.mode ?? 'lww') === 'lww' && stored.updated_at >= ts) {
				return err({ kind: 'stale_write', table_name, pk: pk.value, stored_ts: stored.updated_at, incoming_ts: ts });
			}

			tx.put_document({ phy_table: table.phy_table, pk: pk.value, item, updated_at: ts });
			let indexed = 0;
			for (const { col_name, value } of keys) {
				if (value === null) {
					tx.delete_index_entries(table.phy_table, { col_name, pk: pk.value });
				} else {
					tx.put_index_entry({ phy_table: table.phy_table, col_name, pk: pk.value, value });
					indexed++;
				}
			}
			return ok({ pk: pk.value, ts, indexed });
		}, { deadline, operation: 'upsert' });
	}

	async function run_upsert(user_id: string, table_name: string, document: JsonObject, opts: UpsertOpts): Promise<Result<UpsertResult, EdgeError>> {
		const deadline = deadline_of(rt, opts);
		const result = await with_lock('shared', user_id, table_name, 'upsert', deadline, () =>
			upsert_one(user_id, table_name, document, opts, deadline)
		);
		if (!result.ok) return report(rt, result);

		rt.emit({ type: 'document_upserted', user_id, table_name, pk: result.value.pk, ts: result.value.ts });
		return result;
	}

	function run_query(
		user_id: string,
		table_name: string,
		json_path: string,
		raw: RawLookup,
		col_type: ColType | undefined,
		operation: string
	): Result<QueryResult, EdgeError> {
		const parsed = parse_path(json_path);
		if (!parsed.ok) return parsed;
		const segments = parsed.value;

		let typed: { lookup: KeyLookup; col_type: ColType } | null = null;
		if (col_type !== undefined) {
			const lookup = compile_lookup(raw, col_type);
			if (!lookup.ok) return lookup;
			typed = { lookup: lookup.value, col_type };
		}
		const matcher = typed;

		const scanned = rt.storage.read(tx => {
			const table = tx.get_table(user_id, table_name);
			if (!table) return null;
			return scan_matching(tx, table, segments, value => {
				if (!matcher) return match_raw(value, raw);
				const key = to_index_key(value, matcher.col_type);
				return key !== null && match_key(key, matcher.lookup);
			});
		}, operation);
		if (!scanned.ok) return scanned;
		if (!scanned.value) return err(not_found_table(user_id, table_name));

		const { documents, examined } = scanned.value;
		return ok({ documents, plan: { indexed: false, json_path, examined } });
	}

	return {
		async create_table(user_id, table_name, opts) {
			const allowed = ensure_writable(rt, 'create_table');
			if (!allowed.ok) return report(rt, allowed);

			const ids = require_ids({ user_id, table_name, pk_path: opts.pk_path });
			if (!ids.ok) return report(rt, ids);

			const ts_path = opts.ts_path ?? '$.updated_at';
			for (const path of [opts.pk_path, ts_path]) {
				const parsed = parse_path(path);
				if (!parsed.ok) return report(rt, parsed);
			}

			const phy_table = opts.phy_table ?? (await derive_phy_table(user_id, table_name));
			const valid_phy = validate_phy_table(phy_table);
			if (!valid_phy.ok) return report(rt, valid_phy);

			const deadline = deadline_of(rt, opts);
			const result = await with_lock('exclusive', user_id, table_name, 'create_table', deadline, () =>
				rt.storage.write<UserTable>(tx => {
					if (tx.get_table(user_id, table_name)) {
						return err({ kind: 'already_exists', resource: 'table', key: `${user_id}/${table_name}` });
					}
					if (tx.get_table_by_phy(phy_table)) {
						return err({ kind: 'already_exists', resource: 'phy_table', key: phy_table });
					}
					const created = tx.insert_table({
						user_id,
						table_name,
						phy_table,
						pk_path: opts.pk_path,
						ts_path,
						created_at: rt.options.clock(),
					});
					if (!created) return err({ kind: 'already_exists', resource: 'table', key: `${user_id}/${table_name}` });
					return ok(created);
				}, { deadline, operation: 'create_table' })
			);
			if (!result.ok) return report(rt, result);

			rt.emit({ type: 'table_created', user_id, table_name, phy_table });
			return result;
		},

		async describe_table(user_id, table_name) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			const found = rt.storage.read(tx => {
				const table = tx.get_table(user_id, table_name);
				if (!table) return null;
				const indexes = tx
					.list_indexes(user_id, table_name)
					.map(index => ({ ...index, entries: tx.count_index_entries(table.phy_table, index.col_name) }));
				return { ...table, indexes };
			}, 'describe_table');
			if (!found.ok) return found;
			if (!found.value) return err(not_found_table(user_id, table_name));
			return ok(found.value);
		},

		async list_tables(user_id) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			return rt.storage.read(tx => tx.list_tables(user_id), 'list_tables');
		},

		async create_index(user_id, table_name, opts) {
			const allowed = ensure_writable(rt, 'create_index');
			if (!allowed.ok) return report(rt, allowed);

			const { col_name, json_path } = opts;
			const col_type = opts.col_type ?? 'string';

			const valid_name = validate_col_name(col_name);
			if (!valid_name.ok) return report(rt, valid_name);

			const parsed = parse_path(json_path);
			if (!parsed.ok) return report(rt, parsed);
			const segments = parsed.value;

			if (!is_col_type(col_type)) {
				return fail(rt, { kind: 'invalid_input', message: `col_type must be one of ${COL_TYPES.join(', ')}` });
			}

			const deadline = deadline_of(rt, opts);
			const result = await with_lock('exclusive', user_id, table_name, 'create_index', deadline, () =>
				rt.storage.write<Backfill>(tx => {
					const table = tx.get_table(user_id, table_name);
					if (!table) return err(not_found_table(user_id, table_name));
					if (tx.list_indexes(user_id, table_name).some(i => i.col_name === col_name)) {
						return err({ kind: 'already_exists', resource: 'index', key: `${user_id}/${table_name}.${col_name}` });
					}

					// entries left by an earlier failed backfill
					tx.delete_index_entries(table.phy_table, { col_name });

					let backfilled = 0;
					for (const doc of tx.scan_documents(table.phy_table, { order_by: 'pk' })) {
						const value = read_segments(doc.item, segments);
						if (is_missing(value)) continue;
						const key = to_index_key(value, col_type);
						if (key === null) return ok({ status: 'mismatch', pk: doc.pk, backfilled });
						tx.put_index_entry({ phy_table: table.phy_table, col_name, pk: doc.pk, value: key });
						backfilled++;
					}

					const index = tx.insert_index({ user_id, table_name, col_name, json_path, col_type });
					if (!index) return err({ kind: 'already_exists', resource: 'index', key: `${user_id}/${table_name}.${col_name}` });
					return ok({ status: 'created', index, backfilled });
				}, { deadline, operation: 'create_index' })
			);
			if (!result.ok) return report(rt, result);

			const outcome = result.value;
			if (outcome.status === 'mismatch') {
				return fail(rt, {
					kind: 'invalid_path',
					path: json_path,
					message: `value for column "${col_name}" is not a ${col_type} (${outcome.backfilled} documents indexed before it)`,
					pk: outcome.pk,
				});
			}

			rt.emit({ type: 'index_created', user_id, table_name, col_name, backfilled: outcome.backfilled });
			return ok(outcome.index);
		},

		async upsert(user_id, table_name, document, opts = {}) {
			const allowed = ensure_writable(rt, 'upsert');
			if (!allowed.ok) return report(rt, allowed);

			return run_upsert(user_id, table_name, document, opts);
		},

		async upsert_many(user_id, table_name, documents, opts = {}) {
			const allowed = ensure_writable(rt, 'upsert');
			if (!allowed.ok) return report(rt, allowed);

			const results: Result<UpsertResult, EdgeError>[] = [];
			for (const document of documents) {
				results.push(await run_upsert(user_id, table_name, document, opts));
			}
			return ok(results);
		},

		async get(user_id, table_name, pk) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			const key = String(pk);
			const found = rt.storage.read(tx => {
				const table = tx.get_table(user_id, table_name);
				if (!table) return { table: false, doc: null };
				return { table: true, doc: tx.get_document(table.phy_table, key) };
			}, 'get');
			if (!found.ok) return found;
			if (!found.value.table) return err(not_found_table(user_id, table_name));
			if (!found.value.doc) return err({ kind: 'not_found', resource: 'document', key });
			return ok(found.value.doc.item);
		},

		async delete(user_id, table_name, pk, opts = {}) {
			const allowed = ensure_writable(rt, 'delete');
			if (!allowed.ok) return report(rt, allowed);

			const key = String(pk);
			const deadline = deadline_of(rt, opts);
			const result = await with_lock('shared', user_id, table_name, 'delete', deadline, () =>
				rt.storage.write<void>(tx => {
					const table = tx.get_table(user_id, table_name);
					if (!table) return err(not_found_table(user_id, table_name));
					if (!tx.delete_document(table.phy_table, key)) return err({ kind: 'not_found', resource: 'document', key });
					tx.delete_index_entries(table.phy_table, { pk: key });
					return ok(undefined);
				}, { deadline, operation: 'delete' })
			);
			if (!result.ok) return report(rt, result);

			rt.emit({ type: 'document_deleted', user_id, table_name, pk: key });
			return result;
		},

		async list(user_id, table_name, opts = {}) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			const found = rt.storage.read(tx => {
				const table = tx.get_table(user_id, table_name);
				if (!table) return null;
				return tx.scan_documents(table.phy_table, {
					order_by: 'updated_at',
					direction: opts.order ?? 'asc',
					since: opts.since,
					limit: opts.limit ?? 100,
				});
			}, 'list');
			if (!found.ok) return found;
			if (!found.value) return err(not_found_table(user_id, table_name));
			return ok(found.value.map(({ pk, updated_at, item }) => ({ pk, updated_at, item })));
		},

		async query(user_id, table_name, col_name, predicate: Predicate) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			const raw = parse_predicate(predicate);
			if (!raw.ok) return raw;

			const meta = rt.storage.read(
				tx => (tx.get_table(user_id, table_name) ? tx.list_indexes(user_id, table_name) : null),
				'query'
			);
			if (!meta.ok) return meta;
			if (!meta.value) return err(not_found_table(user_id, table_name));

			const index = meta.value.find(i => i.col_name === col_name);
			let result: Result<QueryResult, EdgeError>;

			if (index) {
				const lookup = compile_lookup(raw.value, index.col_type);
				if (!lookup.ok) return lookup;
				const compiled = lookup.value;
				const indexed_col = index.col_name;

				const hits = rt.storage.read(tx => {
					const table = tx.get_table(user_id, table_name);
					if (!table) return null;
					const pks = tx.lookup_index(table.phy_table, indexed_col, compiled);
					const documents: JsonObject[] = [];
					for (const pk of pks) {
						const doc = tx.get_document(table.phy_table, pk);
						if (doc) documents.push(doc.item);
					}
					return { documents, examined: pks.length };
				}, 'query');
				if (!hits.ok) return hits;
				if (!hits.value) return err(not_found_table(user_id, table_name));
				result = ok({ documents: hits.value.documents, plan: { indexed: true, json_path: index.json_path, examined: hits.value.examined } });
			} else {
				const json_path = col_name.startsWith('$') ? col_name : `$.${col_name}`;
				result = run_query(user_id, table_name, json_path, raw.value, undefined, 'query');
			}

			if (result.ok) {
				rt.emit({
					type: 'query',
					user_id,
					table_name,
					col_name,
					indexed: result.value.plan.indexed,
					count: result.value.documents.length,
				});
			}
			return result;
		},

		async scan(user_id, table_name, json_path, predicate, col_type) {
			const ready = ensure_ready(rt);
			if (!ready.ok) return ready;

			const raw = parse_predicate(predicate);
			if (!raw.ok) return raw;

			return run_query(user_id, table_name, json_path, raw.value, col_type, 'scan');
		},

		async drop_index(user_id, table_name, col_name, opts = {}) {
			const allowed = ensure_writable(rt, 'drop_index');
			if (!allowed.ok) return report(rt, allowed);

			const deadline = deadline_of(rt, opts);
			const result = await with_lock('exclusive', user_id, table_name, 'drop_index', deadline, () =>
				rt.storage.write<DropIndexResult>(tx => {
					const table = tx.get_table(user_id, table_name);
					if (!table) return err(not_found_table(user_id, table_name));
					if (!tx.delete_index(user_id, table_name, col_name)) {
						return err({ kind: 'not_found', resource: 'index', key: `${user_id}/${table_name}.${col_name}` });
					}
					return ok({ entries: tx.delete_index_entries(table.phy_table, { col_name }) });
				}, { deadline, operation: 'drop_index' })
			);
			if (!result.ok) return report(rt, result);

			rt.emit({ type: 'index_dropped', user_id, table_name, col_name, entries: result.value.entries });
			return result;
		},

		async drop_table(user_id, table_name, opts = {}) {
			const allowed = ensure_writable(rt, 'drop_table');
			if (!allowed.ok) return report(rt, allowed);

			const deadline = deadline_of(rt, opts);
			const result = await with_lock('exclusive', user_id, table_name, 'drop_table', deadline, () =>
				rt.storage.write<DropTableResult>(tx => {
					const table = tx.get_table(user_id, table_name);
					if (!table) return err(not_found_table(user_id, table_name));
					const index_entries = tx.delete_index_entries(table.phy_table);
					const documents = tx.delete_documents(table.phy_table);
					const indexes = tx.delete_indexes(user_id, table_name);
					tx.delete_table(user_id, table_name);
					return ok({ documents, index_entries, indexes });
				}, { deadline, operation: 'drop_table' })
			);
			if (!result.ok) return report(rt, result);

			rt.emit({ type: 'table_dropped', user_id, table_name, documents: result.value.documents, index_entries: result.value.index_entries });
			return result;
		},
	};
}
