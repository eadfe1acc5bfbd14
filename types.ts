/**
 * @module Types
 * @description Type definitions for the edge document store.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

/** Capability role a storage handle is opened with. */
export type Role = 'writer' | 'reader'

/**
 * Error types that can occur during store operations.
 * @category Types
 * @group Error Types
 *
 * Discriminated on `kind`:
 * - `duplicate_version` - Version already published (only when re-publishing is rejected)
 * - `checksum_mismatch` - Re-publish or verification with a different checksum
 * - `not_found` - Dataset, version, context, table, index or document does not exist
 * - `already_exists` - Table, index or physical table id already taken
 * - `stale_write` - Stored document timestamp is not older than the incoming one
 * - `invalid_path` - Malformed JSON path, or a value at a path does not match its index type
 * - `unauthorized` - Mutation attempted under the `reader` role
 * - `transaction_aborted` - Timeout or storage failure; nothing was persisted
 * - `not_initialized` - Schema provisioning has not completed
 *
 * @example
 * ```ts
 * const result = await edge.userdb.upsert('u1', 'orders', doc)
 * if (!result.ok && result.error.kind === 'stale_write') {
 *   console.log(`kept ts ${result.error.stored_ts}`)
 * }
 * ```
 */
export type EdgeError =
  | { kind: 'duplicate_version'; dataset_id: string; version: string }
  | { kind: 'checksum_mismatch'; dataset_id: string; version: string; expected: string; actual: string }
  | { kind: 'not_found'; resource: Resource; key: string }
  | { kind: 'already_exists'; resource: Resource; key: string }
  | { kind: 'stale_write'; table_name: string; pk: string; stored_ts: number; incoming_ts: number }
  | { kind: 'invalid_path'; path: string; message: string; pk?: string }
  | { kind: 'unauthorized'; operation: string }
  | { kind: 'transaction_aborted'; operation: string; reason: 'timeout' | 'storage_failure'; cause?: unknown }
  | { kind: 'not_initialized' }
  | { kind: 'invalid_input'; message: string }
  | { kind: 'transform_failed'; dataset_id: string; cause: unknown }
  | { kind: 'invalid_config'; message: string }

export type Resource = 'dataset' | 'version' | 'context' | 'table' | 'phy_table' | 'index' | 'document'

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = EdgeError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 * @category Core
 * @group Result Helpers
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

export type EdgeEvent =
  | { type: 'version_published'; dataset_id: string; version: string; row_count: number; deduplicated: boolean }
  | { type: 'context_set'; user_id: string; dataset_id: string; ts: number }
  | { type: 'view_materialized'; user_id: string; dataset_id: string; version: string; count: number }
  | { type: 'table_created'; user_id: string; table_name: string; phy_table: string }
  | { type: 'table_dropped'; user_id: string; table_name: string; documents: number; index_entries: number }
  | { type: 'index_created'; user_id: string; table_name: string; col_name: string; backfilled: number }
  | { type: 'index_dropped'; user_id: string; table_name: string; col_name: string; entries: number }
  | { type: 'document_upserted'; user_id: string; table_name: string; pk: string; ts: number }
  | { type: 'document_deleted'; user_id: string; table_name: string; pk: string }
  | { type: 'query'; user_id: string; table_name: string; col_name: string; indexed: boolean; count: number }
  | { type: 'error'; error: EdgeError }

export type EventHandler = (event: EdgeEvent) => void

/* ======= Persisted records ======= */

export type MirrorVersion = {
  id: number
  dataset_id: string
  version: string
  checksum: string
  ts: number
}

export type GlobalRow = {
  id: number
  dataset_id: string
  version: string
  item: JsonValue
}

export type UserContext = {
  id: number
  user_id: string
  dataset_id: string
  ctx: JsonObject
  ts: number
}

/**
 * One entry of the append-only view log. Several rows may exist for the same
 * item over time; readers derive the latest one (see `latest_per_key`).
 */
export type UserView = {
  id: number
  user_id: string
  dataset_id: string
  version: string
  item: JsonValue
  ts: number
}

export type ColType = 'string' | 'number' | 'integer' | 'datetime' | 'boolean'

export const COL_TYPES = ['string', 'number', 'integer', 'datetime', 'boolean'] as const satisfies readonly ColType[]

export type UserTable = {
  id: number
  user_id: string
  table_name: string
  phy_table: string
  pk_path: string
  ts_path: string
  created_at: number
}

export type UserTableIndex = {
  id: number
  user_id: string
  table_name: string
  col_name: string
  json_path: string
  col_type: ColType
}

export type StoredDocument = {
  phy_table: string
  pk: string
  item: JsonObject
  updated_at: number
}

/** Normalized index value: strings for `string` columns, numbers for every other type. */
export type IndexKey = string | number

export type IndexEntry = {
  phy_table: string
  col_name: string
  pk: string
  value: IndexKey
}

/** A predicate after coercion to the index's key space. */
export type KeyLookup =
  | { kind: 'eq'; value: IndexKey }
  | { kind: 'in'; values: IndexKey[] }
  | { kind: 'range'; gt?: IndexKey; gte?: IndexKey; lt?: IndexKey; lte?: IndexKey }

export type DocumentScanOpts = {
  order_by?: 'pk' | 'updated_at'
  direction?: 'asc' | 'desc'
  since?: number
  limit?: number
}

export type ViewCursor = { ts: number; id: number }

/* ======= Storage ======= */

/**
 * Read side of a storage transaction. All methods are synchronous: a whole
 * transaction runs without yielding, so no other caller observes it half done.
 * @internal
 */
export type StorageReader = {
  is_provisioned: () => boolean

  get_mirror_version: (dataset_id: string, version: string) => MirrorVersion | null
  latest_mirror_version: (dataset_id: string) => MirrorVersion | null
  list_mirror_versions: (dataset_id: string, limit: number) => MirrorVersion[]
  count_global_rows: (dataset_id: string, version: string) => number
  read_global_rows: (dataset_id: string, version: string, after_id: number, limit: number) => GlobalRow[]

  get_context: (user_id: string, dataset_id: string) => UserContext | null
  list_context_users: (dataset_id: string) => string[]

  read_views: (user_id: string, dataset_id: string, version: string, since_ts: number, after: ViewCursor | null, limit: number) => UserView[]

  get_table: (user_id: string, table_name: string) => UserTable | null
  get_table_by_phy: (phy_table: string) => UserTable | null
  list_tables: (user_id: string) => UserTable[]
  list_indexes: (user_id: string, table_name: string) => UserTableIndex[]

  get_document: (phy_table: string, pk: string) => StoredDocument | null
  scan_documents: (phy_table: string, opts?: DocumentScanOpts) => StoredDocument[]
  lookup_index: (phy_table: string, col_name: string, lookup: KeyLookup) => string[]
  count_index_entries: (phy_table: string, col_name: string) => number
}

/** @internal */
export type StorageWriter = StorageReader & {
  insert_mirror_version: (input: Omit<MirrorVersion, 'id'>) => MirrorVersion | null
  insert_global_rows: (dataset_id: string, version: string, items: JsonValue[]) => number

  upsert_context: (input: Omit<UserContext, 'id'>) => UserContext
  append_views: (rows: Omit<UserView, 'id'>[]) => number

  insert_table: (input: Omit<UserTable, 'id'>) => UserTable | null
  delete_table: (user_id: string, table_name: string) => boolean
  insert_index: (input: Omit<UserTableIndex, 'id'>) => UserTableIndex | null
  delete_index: (user_id: string, table_name: string, col_name: string) => boolean
  delete_indexes: (user_id: string, table_name: string) => number

  put_document: (doc: StoredDocument) => void
  delete_document: (phy_table: string, pk: string) => boolean
  delete_documents: (phy_table: string) => number
  put_index_entry: (entry: IndexEntry) => void
  delete_index_entries: (phy_table: string, filter?: { col_name?: string; pk?: string }) => number
}

export type WriteOpts = {
  /** Epoch ms after which the transaction rolls back instead of committing. */
  deadline?: number
  operation?: string
}

/**
 * Interface that storage drivers are wrapped into.
 *
 * Built-in drivers:
 * - `create_memory_storage()` - In-memory, ephemeral storage
 * - `create_sqlite_storage()` - SQLite via drizzle-orm and better-sqlite3
 *
 * @category Types
 * @group Storage Types
 */
export type Storage = {
  readonly role: Role
  read: <T>(fn: (tx: StorageReader) => T, operation?: string) => Result<T, EdgeError>
  write: <T>(fn: (tx: StorageWriter) => Result<T, EdgeError>, opts?: WriteOpts) => Result<T, EdgeError>
  provision: () => Result<{ already_provisioned: boolean }, EdgeError>
  is_provisioned: () => boolean
  close: () => void
  on_event?: EventHandler
}

/**
 * Per-dataset function combining one global row with a tenant context.
 * Returning `null` drops the row from the view.
 */
export type ViewTransform = (
  item: JsonValue,
  ctx: JsonObject,
  info: { dataset_id: string; version: string; user_id: string }
) => JsonValue | null | Promise<JsonValue | null>

export type CallOpts = {
  timeout_ms?: number
}
