/**
 * @module UserDB
 * @description Re-exports for tenant document tables.
 */

// Types
export * from './types';
export type { Predicate, Scalar, RawLookup } from './indexing';

// Functions
export { create_user_table_engine } from './client';
export { to_index_key, parse_predicate, compile_lookup, match_key, match_raw } from './indexing';
export { validate_col_name, validate_phy_table, extract_pk, resolve_ts, lock_key } from './utils';
