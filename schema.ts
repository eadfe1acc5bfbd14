/**
 * @module Schema
 * @description Database schema definitions for Drizzle ORM.
 */

import { sqliteTable, text, integer, real, primaryKey, index, uniqueIndex } from 'drizzle-orm/sqlite-core'
import { COL_TYPES } from './types'

/* ======= Global mirror ======= */

export const global_mirror_versions = sqliteTable('global_mirror_versions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  dataset_id: text('dataset_id').notNull(),
  version: text('version').notNull(),
  checksum: text('checksum').notNull(),
  ts: integer('ts').notNull(),
}, (table) => ({
  uniq_dataset_version: uniqueIndex('uniq_dataset_version').on(table.dataset_id, table.version),
}))

/**
 * Items of a published version. `item` is JSON text; rows are never updated.
 */
export const global_rows = sqliteTable('global_rows', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  dataset_id: text('dataset_id').notNull(),
  version: text('version').notNull(),
  item: text('item').notNull(),
}, (table) => ({
  dataset_version_idx: index('idx_dataset_version').on(table.dataset_id, table.version),
}))

export const user_contexts = sqliteTable('user_contexts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  user_id: text('user_id').notNull(),
  dataset_id: text('dataset_id').notNull(),
  ctx: text('ctx').notNull(),
  ts: integer('ts').notNull(),
}, (table) => ({
  uniq_user_dataset: uniqueIndex('uniq_user_dataset').on(table.user_id, table.dataset_id),
}))

/**
 * Append-only view log. No uniqueness: the same item may appear once per
 * materialization run.
 */
export const user_views = sqliteTable('user_views', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  user_id: text('user_id').notNull(),
  dataset_id: text('dataset_id').notNull(),
  version: text('version').notNull(),
  item: text('item').notNull(),
  ts: integer('ts').notNull(),
}, (table) => ({
  user_dataset_version_idx: index('idx_user_dataset_version').on(table.user_id, table.dataset_id, table.version),
}))

/* ======= UserDB metadata ======= */

export const userdb_tables = sqliteTable('userdb_tables', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  user_id: text('user_id').notNull(),
  table_name: text('table_name').notNull(),
  phy_table: text('phy_table').notNull(),
  pk_path: text('pk_path').notNull(),
  ts_path: text('ts_path').notNull().default('$.updated_at'),
  created_at: integer('created_at').notNull(),
}, (table) => ({
  uniq_user_tbl: uniqueIndex('uniq_user_tbl').on(table.user_id, table.table_name),
  uniq_phy_table: uniqueIndex('uniq_phy_table').on(table.phy_table),
}))

export const userdb_table_indexes = sqliteTable('userdb_table_indexes', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  user_id: text('user_id').notNull(),
  table_name: text('table_name').notNull(),
  col_name: text('col_name').notNull(),
  json_path: text('json_path').notNull(),
  col_type: text('col_type', { enum: COL_TYPES }).notNull().default('string'),
}, (table) => ({
  uniq_idx: uniqueIndex('uniq_idx').on(table.user_id, table.table_name, table.col_name),
}))

/* ======= UserDB documents ======= */

/**
 * Generic document table shared by every tenant table, partitioned by
 * `phy_table`.
 */
export const userdb_documents = sqliteTable('userdb_documents', {
  phy_table: text('phy_table').notNull(),
  pk: text('pk').notNull(),
  item: text('item').notNull(),
  updated_at: integer('updated_at').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.phy_table, table.pk] }),
  updated_idx: index('idx_doc_updated').on(table.phy_table, table.updated_at),
}))

/**
 * Typed secondary index entries, one row per (column, document). String
 * columns fill `str_value`; number, integer, boolean and datetime columns
 * fill `num_value`.
 */
export const userdb_index_entries = sqliteTable('userdb_index_entries', {
  phy_table: text('phy_table').notNull(),
  col_name: text('col_name').notNull(),
  pk: text('pk').notNull(),
  str_value: text('str_value'),
  num_value: real('num_value'),
}, (table) => ({
  pk: primaryKey({ columns: [table.phy_table, table.col_name, table.pk] }),
  str_idx: index('idx_entry_str').on(table.phy_table, table.col_name, table.str_value),
  num_idx: index('idx_entry_num').on(table.phy_table, table.col_name, table.num_value),
}))

export const init_complete = sqliteTable('init_complete', {
  id: integer('id').primaryKey(),
  completed_at: integer('completed_at').notNull(),
})

export type GlobalRowRecord = typeof global_rows.$inferSelect
export type UserContextRow = typeof user_contexts.$inferSelect
export type UserViewRow = typeof user_views.$inferSelect
export type DocumentRow = typeof userdb_documents.$inferSelect
