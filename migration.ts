/**
 * SQL migration script creating every table the sqlite storage uses, mirroring
 * `schema.ts`.
 *
 * Safe to run multiple times (uses IF NOT EXISTS). The readiness marker is
 * inserted separately by `Storage.provision()`, after this script succeeds.
 *
 * @example
 * ```ts
 * const sqlite = new Database('./edge.db')
 * sqlite.exec(EDGE_MIGRATION_SQL)
 * ```
 */
export const EDGE_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS global_mirror_versions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  dataset_id TEXT NOT NULL,
  version TEXT NOT NULL,
  checksum TEXT NOT NULL,
  ts INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS uniq_dataset_version ON global_mirror_versions(dataset_id, version);

CREATE TABLE IF NOT EXISTS global_rows (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  dataset_id TEXT NOT NULL,
  version TEXT NOT NULL,
  item TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_dataset_version ON global_rows(dataset_id, version);

CREATE TABLE IF NOT EXISTS user_contexts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL,
  dataset_id TEXT NOT NULL,
  ctx TEXT NOT NULL,
  ts INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS uniq_user_dataset ON user_contexts(user_id, dataset_id);

CREATE TABLE IF NOT EXISTS user_views (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL,
  dataset_id TEXT NOT NULL,
  version TEXT NOT NULL,
  item TEXT NOT NULL,
  ts INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_user_dataset_version ON user_views(user_id, dataset_id, version);

CREATE TABLE IF NOT EXISTS userdb_tables (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL,
  table_name TEXT NOT NULL,
  phy_table TEXT NOT NULL,
  pk_path TEXT NOT NULL,
  ts_path TEXT NOT NULL DEFAULT '$.updated_at',
  created_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS uniq_user_tbl ON userdb_tables(user_id, table_name);
CREATE UNIQUE INDEX IF NOT EXISTS uniq_phy_table ON userdb_tables(phy_table);

CREATE TABLE IF NOT EXISTS userdb_table_indexes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL,
  table_name TEXT NOT NULL,
  col_name TEXT NOT NULL,
  json_path TEXT NOT NULL,
  col_type TEXT NOT NULL DEFAULT 'string'
    CHECK (col_type IN ('string','number','integer','datetime','boolean'))
);
CREATE UNIQUE INDEX IF NOT EXISTS uniq_idx ON userdb_table_indexes(user_id, table_name, col_name);

CREATE TABLE IF NOT EXISTS userdb_documents (
  phy_table TEXT NOT NULL,
  pk TEXT NOT NULL,
  item TEXT NOT NULL,
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (phy_table, pk)
);
CREATE INDEX IF NOT EXISTS idx_doc_updated ON userdb_documents(phy_table, updated_at);

CREATE TABLE IF NOT EXISTS userdb_index_entries (
  phy_table TEXT NOT NULL,
  col_name TEXT NOT NULL,
  pk TEXT NOT NULL,
  str_value TEXT,
  num_value REAL,
  PRIMARY KEY (phy_table, col_name, pk)
);
CREATE INDEX IF NOT EXISTS idx_entry_str ON userdb_index_entries(phy_table, col_name, str_value);
CREATE INDEX IF NOT EXISTS idx_entry_num ON userdb_index_entries(phy_table, col_name, num_value);

CREATE TABLE IF NOT EXISTS init_complete (
  id INTEGER PRIMARY KEY,
  completed_at INTEGER NOT NULL
);
`
