/**
 * @module Backends
 * @description In-memory storage backend for testing and development.
 */

import type {
	EventHandler,
	GlobalRow,
	IndexKey,
	JsonValue,
	MirrorVersion,
	Role,
	Storage,
	StorageReader,
	StorageWriter,
	StoredDocument,
	UserContext,
	UserTable,
	UserTableIndex,
	UserView,
} from "../types";
import { match_key } from "../userdb/indexing";
import { compare_text } from "../utils";
import { create_storage, type StorageDriver } from "./base";

/**
 * Everything a memory storage holds. Several storages (e.g. a writer and a
 * reader) can share one state.
 */
export type MemoryState = {
	seq: { version: number; row: number; context: number; view: number; table: number; index: number };
	versions: MirrorVersion[];
	rows: Map<string, GlobalRow[]>;
	contexts: Map<string, UserContext>;
	views: UserView[];
	tables: Map<string, UserTable>;
	indexes: Map<string, UserTableIndex[]>;
	documents: Map<string, Map<string, StoredDocument>>;
	entries: Map<string, Map<string, IndexKey>>;
	provisioned: boolean;
	undo: Array<() => void> | null;
};

export type MemoryStorageOptions = {
	role?: Role;
	state?: MemoryState;
	on_event?: EventHandler;
};

export function create_memory_state(): MemoryState {
	return {
		seq: { version: 0, row: 0, context: 0, view: 0, table: 0, index: 0 },
		versions: [],
		rows: new Map(),
		contexts: new Map(),
		views: [],
		tables: new Map(),
		indexes: new Map(),
		documents: new Map(),
		entries: new Map(),
		provisioned: false,
		undo: null,
	};
}

const key = (...parts: string[]): string => parts.join("\u0000");

const clone = <T extends JsonValue>(value: T): T => structuredClone(value);

const by_pk = (a: StoredDocument, b: StoredDocument): number => compare_text(a.pk, b.pk);

/**
 * Creates an in-memory storage.
 * @category Backends
 * @group Storage Backends
 *
 * Transactions keep an undo log and replay it in reverse when the
 * transaction throws. Stored JSON is cloned on the way in and out.
 *
 * @example
 * ```ts
 * const state = create_memory_state()
 * const writer = create_memory_storage({ state })
 * const reader = create_memory_storage({ state, role: 'reader' })
 * ```
 */
export function create_memory_storage(options: MemoryStorageOptions = {}): Storage {
	const state = options.state ?? create_memory_state();

	function record(undo: () => void): void {
		if (!state.undo) throw new Error("memory storage mutated outside a transaction");
		state.undo.push(undo);
	}

	function next_id(counter: keyof MemoryState["seq"]): number {
		const previous = state.seq[counter];
		state.seq[counter] = previous + 1;
		record(() => {
			state.seq[counter] = previous;
		});
		return previous + 1;
	}

	function set_in<K, V>(map: Map<K, V>, k: K, value: V): void {
		const had = map.has(k);
		const previous = map.get(k);
		map.set(k, value);
		record(() => {
			if (had && previous !== undefined) map.set(k, previous);
			else map.delete(k);
		});
	}

	function delete_in<K, V>(map: Map<K, V>, k: K): boolean {
		if (!map.has(k)) return false;
		const previous = map.get(k);
		map.delete(k);
		record(() => {
			if (previous !== undefined) map.set(k, previous);
		});
		return true;
	}

	function entry_map(phy_table: string, col_name: string, create: boolean): Map<string, IndexKey> | undefined {
		const k = key(phy_table, col_name);
		let map = state.entries.get(k);
		if (!map && create) {
			map = new Map();
			set_in(state.entries, k, map);
		}
		return map;
	}

	function doc_map(phy_table: string, create: boolean): Map<string, StoredDocument> | undefined {
		let map = state.documents.get(phy_table);
		if (!map && create) {
			map = new Map();
			set_in(state.documents, phy_table, map);
		}
		return map;
	}

	const copy_doc = (doc: StoredDocument): StoredDocument => ({ ...doc, item: clone(doc.item) });

	const reader: StorageReader = {
		is_provisioned: () => state.provisioned,

		get_mirror_version(dataset_id, version) {
			const found = state.versions.find(v => v.dataset_id === dataset_id && v.version === version);
			return found ? { ...found } : null;
		},

		latest_mirror_version(dataset_id) {
			let latest: MirrorVersion | null = null;
			for (const v of state.versions) {
				if (v.dataset_id !== dataset_id) continue;
				if (!latest || v.ts > latest.ts || (v.ts === latest.ts && v.id > latest.id)) latest = v;
			}
			return latest ? { ...latest } : null;
		},

		list_mirror_versions(dataset_id, limit) {
			return state.versions
				.filter(v => v.dataset_id === dataset_id)
				.sort((a, b) => b.ts - a.ts || b.id - a.id)
				.slice(0, limit)
				.map(v => ({ ...v }));
		},

		count_global_rows(dataset_id, version) {
			return state.rows.get(key(dataset_id, version))?.length ?? 0;
		},

		read_global_rows(dataset_id, version, after_id, limit) {
			const rows = state.rows.get(key(dataset_id, version)) ?? [];
			return rows
				.filter(r => r.id > after_id)
				.slice(0, limit)
				.map(r => ({ ...r, item: clone(r.item) }));
		},

		get_context(user_id, dataset_id) {
			const found = state.contexts.get(key(user_id, dataset_id));
			return found ? { ...found, ctx: clone(found.ctx) } : null;
		},

		list_context_users(dataset_id) {
			const users: string[] = [];
			for (const c of state.contexts.values()) {
				if (c.dataset_id === dataset_id) users.push(c.user_id);
			}
			return users.sort(compare_text);
		},

		read_views(user_id, dataset_id, version, since_ts, after, limit) {
			return state.views
				.filter(v => v.user_id === user_id && v.dataset_id === dataset_id && v.version === version && v.ts >= since_ts)
				.filter(v => !after || v.ts > after.ts || (v.ts === after.ts && v.id > after.id))
				.sort((a, b) => a.ts - b.ts || a.id - b.id)
				.slice(0, limit)
				.map(v => ({ ...v, item: clone(v.item) }));
		},

		get_table(user_id, table_name) {
			const found = state.tables.get(key(user_id, table_name));
			return found ? { ...found } : null;
		},

		get_table_by_phy(phy_table) {
			for (const t of state.tables.values()) {
				if (t.phy_table === phy_table) return { ...t };
			}
			return null;
		},

		list_tables(user_id) {
			return Array.from(state.tables.values())
				.filter(t => t.user_id === user_id)
				.sort((a, b) => a.id - b.id)
				.map(t => ({ ...t }));
		},

		list_indexes(user_id, table_name) {
			return (state.indexes.get(key(user_id, table_name)) ?? []).map(i => ({ ...i }));
		},

		get_document(phy_table, pk) {
			const found = state.documents.get(phy_table)?.get(pk);
			return found ? copy_doc(found) : null;
		},

		scan_documents(phy_table, opts = {}) {
			const { order_by = "pk", direction = "asc", since, limit } = opts;
			let docs = Array.from(state.documents.get(phy_table)?.values() ?? []);
			if (since !== undefined) docs = docs.filter(d => d.updated_at >= since);
			docs.sort(order_by === "pk" ? by_pk : (a, b) => a.updated_at - b.updated_at || by_pk(a, b));
			if (direction === "desc") docs.reverse();
			if (limit !== undefined) docs = docs.slice(0, limit);
			return docs.map(copy_doc);
		},

		lookup_index(phy_table, col_name, lookup) {
			const pks: string[] = [];
			for (const [pk, value] of state.entries.get(key(phy_table, col_name)) ?? []) {
				if (match_key(value, lookup)) pks.push(pk);
			}
			return pks.sort(compare_text);
		},

		count_index_entries(phy_table, col_name) {
			return state.entries.get(key(phy_table, col_name))?.size ?? 0;
		},
	};

	const writer: StorageWriter = {
		...reader,

		insert_mirror_version(input) {
			if (state.versions.some(v => v.dataset_id === input.dataset_id && v.version === input.version)) return null;
			const row: MirrorVersion = { ...input, id: next_id("version") };
			state.versions.push(row);
			record(() => {
				state.versions.pop();
			});
			return { ...row };
		},

		insert_global_rows(dataset_id, version, items) {
			const k = key(dataset_id, version);
			const existing = state.rows.get(k) ?? [];
			const appended = items.map(item => ({ id: next_id("row"), dataset_id, version, item: clone(item) }));
			set_in(state.rows, k, [...existing, ...appended]);
			return appended.length;
		},

		upsert_context(input) {
			const k = key(input.user_id, input.dataset_id);
			const id = state.contexts.get(k)?.id ?? next_id("context");
			const row: UserContext = { ...input, id, ctx: clone(input.ctx) };
			set_in(state.contexts, k, row);
			return { ...row, ctx: clone(row.ctx) };
		},

		append_views(rows) {
			for (const row of rows) {
				state.views.push({ ...row, id: next_id("view"), item: clone(row.item) });
			}
			const count = rows.length;
			record(() => {
				state.views.splice(state.views.length - count, count);
			});
			return count;
		},

		insert_table(input) {
			const k = key(input.user_id, input.table_name);
			if (state.tables.has(k) || reader.get_table_by_phy(input.phy_table)) return null;
			const row: UserTable = { ...input, id: next_id("table") };
			set_in(state.tables, k, row);
			return { ...row };
		},

		delete_table(user_id, table_name) {
			return delete_in(state.tables, key(user_id, table_name));
		},

		insert_index(input) {
			const k = key(input.user_id, input.table_name);
			const existing = state.indexes.get(k) ?? [];
			if (existing.some(i => i.col_name === input.col_name)) return null;
			const row: UserTableIndex = { ...input, id: next_id("index") };
			set_in(state.indexes, k, [...existing, row]);
			return { ...row };
		},

		delete_index(user_id, table_name, col_name) {
			const k = key(user_id, table_name);
			const existing = state.indexes.get(k) ?? [];
			const kept = existing.filter(i => i.col_name !== col_name);
			if (kept.length === existing.length) return false;
			set_in(state.indexes, k, kept);
			return true;
		},

		delete_indexes(user_id, table_name) {
			const k = key(user_id, table_name);
			const count = state.indexes.get(k)?.length ?? 0;
			delete_in(state.indexes, k);
			return count;
		},

		put_document(doc) {
			const map = doc_map(doc.phy_table, true);
			if (map) set_in(map, doc.pk, copy_doc(doc));
		},

		delete_document(phy_table, pk) {
			const map = doc_map(phy_table, false);
			return map ? delete_in(map, pk) : false;
		},

		delete_documents(phy_table) {
			const count = state.documents.get(phy_table)?.size ?? 0;
			delete_in(state.documents, phy_table);
			return count;
		},

		put_index_entry(entry) {
			const map = entry_map(entry.phy_table, entry.col_name, true);
			if (map) set_in(map, entry.pk, entry.value);
		},

		delete_index_entries(phy_table, filter = {}) {
			let removed = 0;
			for (const [k, map] of Array.from(state.entries)) {
				const [phy, col] = k.split("\u0000");
				if (phy !== phy_table) continue;
				if (filter.col_name !== undefined && col !== filter.col_name) continue;
				if (filter.pk !== undefined) {
					if (delete_in(map, filter.pk)) removed++;
				} else {
					removed += map.size;
					delete_in(state.entries, k);
				}
			}
			return removed;
		},
	};

	const driver: StorageDriver = {
		reader,
		writer,

		transaction(fn) {
			if (state.undo) throw new Error("nested memory transaction");
			const undo: Array<() => void> = [];
			state.undo = undo;
			try {
				return fn();
			} catch (e) {
				for (let i = undo.length - 1; i >= 0; i--) undo[i]?.();
				throw e;
			} finally {
				state.undo = null;
			}
		},

		read_transaction: fn => fn(),

		provision() {
			const already = state.provisioned;
			state.provisioned = true;
			return already;
		},

		close() {},
	};

	return create_storage(driver, options.role ?? "writer", options.on_event);
}
