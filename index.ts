export { create_edge, open_edge, type Edge, type EdgeBuilder } from "./edge";

export { create_mirror, diff_rows, type DatasetMirror, type VersionDiff, type PublishOpts, type PublishRowsOpts, type PublishResult, type VersionSummary } from "./mirror";
export { create_context_store, type UserContextStore, type SetContextOpts } from "./context";
export {
	create_view_materializer,
	merge_context,
	filter_by_context,
	order_by_context,
	type ViewMaterializer,
	type MaterializeResult,
	type MaterializeAllResult,
	type MaterializeAllOpts,
} from "./views";
export * from "./userdb";

export { create_memory_storage, create_memory_state, type MemoryState, type MemoryStorageOptions } from "./backend/memory";
export { create_sqlite_storage, type SqliteStorageConfig } from "./backend/sqlite";
export { create_storage, type StorageDriver } from "./backend/base";

export { load_config, type EdgeConfig } from "./config";
export { create_runtime, DEFAULT_OPTIONS, type EdgeOptions, type Runtime } from "./utils";

export { compute_checksum, derive_phy_table } from "./hash";
export { derive_version } from "./version";
export { parse_path, extract, type PathSegment } from "./json-path";
export { json_codec, json_value_codec, json_object_codec, JsonValueSchema, JsonObjectSchema, type TextCodec } from "./codec";

export * as schema from "./schema";
export { EDGE_MIGRATION_SQL } from "./migration";

export type {
	JsonValue,
	JsonObject,
	Role,
	EdgeError,
	Resource,
	Result,
	EdgeEvent,
	EventHandler,
	MirrorVersion,
	GlobalRow,
	UserContext,
	UserView,
	ColType,
	UserTable,
	UserTableIndex,
	StoredDocument,
	IndexKey,
	IndexEntry,
	KeyLookup,
	DocumentScanOpts,
	ViewCursor,
	StorageReader,
	StorageWriter,
	WriteOpts,
	Storage,
	ViewTransform,
	CallOpts,
} from "./types";

export { ok, err, COL_TYPES } from "./types";

export { match, unwrap_or, unwrap, unwrap_err, try_catch_async, to_nullable, format_error, collect, EdgeFault } from "./result";

export { Semaphore, RwLock, LockTable, parallel_map, type Release } from "./concurrency";
