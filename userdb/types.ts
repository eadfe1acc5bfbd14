/**
 * @module UserDBTypes
 * @description Types for tenant document tables and their secondary indexes.
 */

import type { CallOpts, ColType, EdgeError, JsonObject, Result, UserTable, UserTableIndex } from '../types';
import type { Predicate } from './indexing';

export type CreateTableOpts = CallOpts & {
	/** Path of the primary key inside each document, e.g. `$.id`. */
	pk_path: string;
	/** Path of the document timestamp. Defaults to `$.updated_at`. */
	ts_path?: string;
	/** Physical identifier. Defaults to one derived from the user and table name. */
	phy_table?: string;
};

export type CreateIndexOpts = CallOpts & {
	col_name: string;
	json_path: string;
	/** Defaults to `'string'`. */
	col_type?: ColType;
};

/**
 * - `lww` - last write wins: rejected with `stale_write` unless the incoming
 *   timestamp is newer than the stored one
 * - `force` - always overwrite
 */
export type UpsertMode = 'lww' | 'force';

export type UpsertOpts = CallOpts & {
	mode?: UpsertMode;
	/** Overrides the timestamp read from `ts_path`. */
	client_ts?: number;
};

export type UpsertResult = {
	pk: string;
	ts: number;
	/** Number of index entries written for the document. */
	indexed: number;
};

export type TableDocument = {
	pk: string;
	updated_at: number;
	item: JsonObject;
};

export type ListOpts = {
	/** Only documents with `updated_at >= since`. */
	since?: number;
	limit?: number;
	order?: 'asc' | 'desc';
};

export type QueryPlan = {
	indexed: boolean;
	json_path: string;
	/** Index hits for an indexed query, documents scanned otherwise. */
	examined: number;
};

export type QueryResult = {
	documents: JsonObject[];
	plan: QueryPlan;
};

export type IndexDescription = UserTableIndex & {
	/** Documents currently holding a key in this index. */
	entries: number;
};

export type TableDescription = UserTable & {
	indexes: IndexDescription[];
};

export type DropIndexResult = {
	entries: number;
};

export type DropTableResult = {
	documents: number;
	index_entries: number;
	indexes: number;
};

/**
 * Tenant document tables.
 * @category Types
 * @group Component Types
 */
export type UserTableEngine = {
	create_table: (user_id: string, table_name: string, opts: CreateTableOpts) => Promise<Result<UserTable, EdgeError>>;
	describe_table: (user_id: string, table_name: string) => Promise<Result<TableDescription, EdgeError>>;
	list_tables: (user_id: string) => Promise<Result<UserTable[], EdgeError>>;
	create_index: (user_id: string, table_name: string, opts: CreateIndexOpts) => Promise<Result<UserTableIndex, EdgeError>>;
	upsert: (user_id: string, table_name: string, document: JsonObject, opts?: UpsertOpts) => Promise<Result<UpsertResult, EdgeError>>;
	upsert_many: (user_id: string, table_name: string, documents: JsonObject[], opts?: UpsertOpts) => Promise<Result<Result<UpsertResult, EdgeError>[], EdgeError>>;
	get: (user_id: string, table_name: string, pk: string | number) => Promise<Result<JsonObject, EdgeError>>;
	delete: (user_id: string, table_name: string, pk: string | number, opts?: CallOpts) => Promise<Result<void, EdgeError>>;
	list: (user_id: string, table_name: string, opts?: ListOpts) => Promise<Result<TableDocument[], EdgeError>>;
	query: (user_id: string, table_name: string, col_name: string, predicate: Predicate) => Promise<Result<QueryResult, EdgeError>>;
	scan: (user_id: string, table_name: string, json_path: string, predicate: Predicate, col_type?: ColType) => Promise<Result<QueryResult, EdgeError>>;
	drop_index: (user_id: string, table_name: string, col_name: string, opts?: CallOpts) => Promise<Result<DropIndexResult, EdgeError>>;
	drop_table: (user_id: string, table_name: string, opts?: CallOpts) => Promise<Result<DropTableResult, EdgeError>>;
};
