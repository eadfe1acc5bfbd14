/**
 * @module Backends
 * @description SQLite storage backend using drizzle-orm over better-sqlite3.
 */

import Database from "better-sqlite3";
import { and, asc, count, desc, eq, gt, gte, inArray, lt, lte, or, type SQL } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type {
	EventHandler,
	GlobalRow,
	IndexKey,
	KeyLookup,
	Role,
	Storage,
	StorageReader,
	StorageWriter,
	StoredDocument,
	UserContext,
	UserView,
} from "../types";
import {
	global_mirror_versions,
	global_rows,
	init_complete,
	user_contexts,
	user_views,
	userdb_documents,
	userdb_index_entries,
	userdb_table_indexes,
	userdb_tables,
	type DocumentRow,
	type GlobalRowRecord,
	type UserContextRow,
	type UserViewRow,
} from "../schema";
import { EDGE_MIGRATION_SQL } from "../migration";
import { json_object_codec, json_value_codec } from "../codec";
import { create_storage, type StorageDriver } from "./base";

export type SqliteStorageConfig = {
	/** File path, or `:memory:` (the default). Ignored when `database` is given. */
	path?: string;
	/** An already open connection. The caller keeps ownership and closes it. */
	database?: Database.Database;
	role?: Role;
	on_event?: EventHandler;
};

const INSERT_CHUNK = 200;

const to_global_row = (row: GlobalRowRecord): GlobalRow => ({ ...row, item: json_value_codec.decode(row.item) });
const to_context = (row: UserContextRow): UserContext => ({ ...row, ctx: json_object_codec.decode(row.ctx) });
const to_view = (row: UserViewRow): UserView => ({ ...row, item: json_value_codec.decode(row.item) });
const to_document = (row: DocumentRow): StoredDocument => ({ ...row, item: json_object_codec.decode(row.item) });

const OPERATORS = { eq, gt, gte, lt, lte };

function key_condition(op: keyof typeof OPERATORS, key: IndexKey): SQL {
	const compare = OPERATORS[op];
	return typeof key === "string" ? compare(userdb_index_entries.str_value, key) : compare(userdb_index_entries.num_value, key);
}

function lookup_condition(lookup: KeyLookup): SQL | undefined {
	switch (lookup.kind) {
		case "eq":
			return key_condition("eq", lookup.value);
		case "in": {
			const strings = lookup.values.filter((v): v is string => typeof v === "string");
			const numbers = lookup.values.filter((v): v is number => typeof v === "number");
			const parts: SQL[] = [];
			if (strings.length > 0) parts.push(inArray(userdb_index_entries.str_value, strings));
			if (numbers.length > 0) parts.push(inArray(userdb_index_entries.num_value, numbers));
			return or(...parts);
		}
		case "range": {
			const parts: SQL[] = [];
			for (const op of ["gt", "gte", "lt", "lte"] as const) {
				const bound = lookup[op];
				if (bound !== undefined) parts.push(key_condition(op, bound));
			}
			return and(...parts);
		}
	}
}

/**
 * Creates a SQLite storage.
 * @category Backends
 * @group Storage Backends
 *
 * Every `write` runs inside one SQLite transaction. A `reader` opened on a
 * file path gets a read-only connection, so the database itself refuses
 * writes as well.
 *
 * @example
 * ```ts
 * const writer = create_sqlite_storage({ path: './edge.db' })
 * writer.provision()
 *
 * const reader = create_sqlite_storage({ path: './edge.db', role: 'reader' })
 * ```
 */
export function create_sqlite_storage(config: SqliteStorageConfig = {}): Storage {
	const role = config.role ?? "writer";
	const path = config.path ?? ":memory:";
	const owned = config.database === undefined;
	const sqlite = config.database ?? new Database(path, role === "reader" && path !== ":memory:" ? { readonly: true, fileMustExist: true } : {});
	const db = drizzle(sqlite);

	const reader: StorageReader = {
		is_provisioned() {
			return db.select().from(init_complete).where(eq(init_complete.id, 1)).get() !== undefined;
		},

		get_mirror_version(dataset_id, version) {
			return (
				db
					.select()
					.from(global_mirror_versions)
					.where(and(eq(global_mirror_versions.dataset_id, dataset_id), eq(global_mirror_versions.version, version)))
					.get() ?? null
			);
		},

		latest_mirror_version(dataset_id) {
			return (
				db
					.select()
					.from(global_mirror_versions)
					.where(eq(global_mirror_versions.dataset_id, dataset_id))
					.orderBy(desc(global_mirror_versions.ts), desc(global_mirror_versions.id))
					.limit(1)
					.get() ?? null
			);
		},

		list_mirror_versions(dataset_id, limit) {
			return db
				.select()
				.from(global_mirror_versions)
				.where(eq(global_mirror_versions.dataset_id, dataset_id))
				.orderBy(desc(global_mirror_versions.ts), desc(global_mirror_versions.id))
				.limit(limit)
				.all();
		},

		count_global_rows(dataset_id, version) {
			const row = db
				.select({ n: count() })
				.from(global_rows)
				.where(and(eq(global_rows.dataset_id, dataset_id), eq(global_rows.version, version)))
				.get();
			return row?.n ?? 0;
		},

		read_global_rows(dataset_id, version, after_id, limit) {
			return db
				.select()
				.from(global_rows)
				.where(and(eq(global_rows.dataset_id, dataset_id), eq(global_rows.version, version), gt(global_rows.id, after_id)))
				.orderBy(asc(global_rows.id))
				.limit(limit)
				.all()
				.map(to_global_row);
		},

		get_context(user_id, dataset_id) {
			const row = db
				.select()
				.from(user_contexts)
				.where(and(eq(user_contexts.user_id, user_id), eq(user_contexts.dataset_id, dataset_id)))
				.get();
			return row ? to_context(row) : null;
		},

		list_context_users(dataset_id) {
			return db
				.select({ user_id: user_contexts.user_id })
				.from(user_contexts)
				.where(eq(user_contexts.dataset_id, dataset_id))
				.orderBy(asc(user_contexts.user_id))
				.all()
				.map(r => r.user_id);
		},

		read_views(user_id, dataset_id, version, since_ts, after, limit) {
			const conditions: (SQL | undefined)[] = [
				eq(user_views.user_id, user_id),
				eq(user_views.dataset_id, dataset_id),
				eq(user_views.version, version),
				gte(user_views.ts, since_ts),
			];
			if (after) {
				conditions.push(or(gt(user_views.ts, after.ts), and(eq(user_views.ts, after.ts), gt(user_views.id, after.id))));
			}
			return db
				.select()
				.from(user_views)
				.where(and(...conditions))
				.orderBy(asc(user_views.ts), asc(user_views.id))
				.limit(limit)
				.all()
				.map(to_view);
		},

		get_table(user_id, table_name) {
			return (
				db
					.select()
					.from(userdb_tables)
					.where(and(eq(userdb_tables.user_id, user_id), eq(userdb_tables.table_name, table_name)))
					.get() ?? null
			);
		},

		get_table_by_phy(phy_table) {
			return db.select().from(userdb_tables).where(eq(userdb_tables.phy_table, phy_table)).get() ?? null;
		},

		list_tables(user_id) {
			return db.select().from(userdb_tables).where(eq(userdb_tables.user_id, user_id)).orderBy(asc(userdb_tables.id)).all();
		},

		list_indexes(user_id, table_name) {
			return db
				.select()
				.from(userdb_table_indexes)
				.where(and(eq(userdb_table_indexes.user_id, user_id), eq(userdb_table_indexes.table_name, table_name)))
				.orderBy(asc(userdb_table_indexes.id))
				.all();
		},

		get_document(phy_table, pk) {
			const row = db
				.select()
				.from(userdb_documents)
				.where(and(eq(userdb_documents.phy_table, phy_table), eq(userdb_documents.pk, pk)))
				.get();
			return row ? to_document(row) : null;
		},

		scan_documents(phy_table, opts = {}) {
			const { order_by = "pk", direction = "asc", since, limit } = opts;
			const dir = direction === "asc" ? asc : desc;
			const order = order_by === "pk" ? [dir(userdb_documents.pk)] : [dir(userdb_documents.updated_at), dir(userdb_documents.pk)];
			const query = db
				.select()
				.from(userdb_documents)
				.where(and(eq(userdb_documents.phy_table, phy_table), since === undefined ? undefined : gte(userdb_documents.updated_at, since)))
				.orderBy(...order);
			const rows = limit === undefined ? query.all() : query.limit(limit).all();
			return rows.map(to_document);
		},

		lookup_index(phy_table, col_name, lookup) {
			if (lookup.kind === "in" && lookup.values.length === 0) return [];
			return db
				.select({ pk: userdb_index_entries.pk })
				.from(userdb_index_entries)
				.where(
					and(eq(userdb_index_entries.phy_table, phy_table), eq(userdb_index_entries.col_name, col_name), lookup_condition(lookup))
				)
				.orderBy(asc(userdb_index_entries.pk))
				.all()
				.map(r => r.pk);
		},

		count_index_entries(phy_table, col_name) {
			const row = db
				.select({ n: count() })
				.from(userdb_index_entries)
				.where(and(eq(userdb_index_entries.phy_table, phy_table), eq(userdb_index_entries.col_name, col_name)))
				.get();
			return row?.n ?? 0;
		},
	};

	const writer: StorageWriter = {
		...reader,

		insert_mirror_version(input) {
			return db.insert(global_mirror_versions).values(input).onConflictDoNothing().returning().get() ?? null;
		},

		insert_global_rows(dataset_id, version, items) {
			for (let i = 0; i < items.length; i += INSERT_CHUNK) {
				const chunk = items.slice(i, i + INSERT_CHUNK).map(item => ({ dataset_id, version, item: json_value_codec.encode(item) }));
				db.insert(global_rows).values(chunk).run();
			}
			return items.length;
		},

		upsert_context(input) {
			const ctx = json_object_codec.encode(input.ctx);
			const row = db
				.insert(user_contexts)
				.values({ ...input, ctx })
				.onConflictDoUpdate({
					target: [user_contexts.user_id, user_contexts.dataset_id],
					set: { ctx, ts: input.ts },
				})
				.returning()
				.get();
			if (!row) throw new Error("context upsert returned no row");
			return to_context(row);
		},

		append_views(rows) {
			for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
				const chunk = rows.slice(i, i + INSERT_CHUNK).map(row => ({ ...row, item: json_value_codec.encode(row.item) }));
				db.insert(user_views).values(chunk).run();
			}
			return rows.length;
		},

		insert_table(input) {
			return db.insert(userdb_tables).values(input).onConflictDoNothing().returning().get() ?? null;
		},

		delete_table(user_id, table_name) {
			const result = db
				.delete(userdb_tables)
				.where(and(eq(userdb_tables.user_id, user_id), eq(userdb_tables.table_name, table_name)))
				.run();
			return result.changes > 0;
		},

		insert_index(input) {
			return db.insert(userdb_table_indexes).values(input).onConflictDoNothing().returning().get() ?? null;
		},

		delete_index(user_id, table_name, col_name) {
			const result = db
				.delete(userdb_table_indexes)
				.where(
					and(
						eq(userdb_table_indexes.user_id, user_id),
						eq(userdb_table_indexes.table_name, table_name),
						eq(userdb_table_indexes.col_name, col_name)
					)
				)
				.run();
			return result.changes > 0;
		},

		delete_indexes(user_id, table_name) {
			return db
				.delete(userdb_table_indexes)
				.where(and(eq(userdb_table_indexes.user_id, user_id), eq(userdb_table_indexes.table_name, table_name)))
				.run().changes;
		},

		put_document(doc) {
			const item = json_object_codec.encode(doc.item);
			db.insert(userdb_documents)
				.values({ ...doc, item })
				.onConflictDoUpdate({
					target: [userdb_documents.phy_table, userdb_documents.pk],
					set: { item, updated_at: doc.updated_at },
				})
				.run();
		},

		delete_document(phy_table, pk) {
			const result = db
				.delete(userdb_documents)
				.where(and(eq(userdb_documents.phy_table, phy_table), eq(userdb_documents.pk, pk)))
				.run();
			return result.changes > 0;
		},

		delete_documents(phy_table) {
			return db.delete(userdb_documents).where(eq(userdb_documents.phy_table, phy_table)).run().changes;
		},

		put_index_entry(entry) {
			const str_value = typeof entry.value === "string" ? entry.value : null;
			const num_value = typeof entry.value === "number" ? entry.value : null;
			db.insert(userdb_index_entries)
				.values({ phy_table: entry.phy_table, col_name: entry.col_name, pk: entry.pk, str_value, num_value })
				.onConflictDoUpdate({
					target: [userdb_index_entries.phy_table, userdb_index_entries.col_name, userdb_index_entries.pk],
					set: { str_value, num_value },
				})
				.run();
		},

		delete_index_entries(phy_table, filter = {}) {
			return db
				.delete(userdb_index_entries)
				.where(
					and(
						eq(userdb_index_entries.phy_table, phy_table),
						filter.col_name === undefined ? undefined : eq(userdb_index_entries.col_name, filter.col_name),
						filter.pk === undefined ? undefined : eq(userdb_index_entries.pk, filter.pk)
					)
				)
				.run().changes;
		},
	};

	const driver: StorageDriver = {
		reader,
		writer,

		transaction: fn => sqlite.transaction(fn)(),

		read_transaction: fn => sqlite.transaction(fn)(),

		provision() {
			return sqlite.transaction(() => {
				sqlite.exec(EDGE_MIGRATION_SQL);
				const inserted = db
					.insert(init_complete)
					.values({ id: 1, completed_at: Date.now() })
					.onConflictDoNothing()
					.returning()
					.get();
				return inserted === undefined;
			})();
		},

		close() {
			if (owned) sqlite.close();
		},
	};

	return create_storage(driver, role, config.on_event);
}
