/**
 * Storage backend implementations for different environments.
 * @module Backends
 * @packageDocumentation
 */

export { create_memory_storage, create_memory_state, type MemoryState, type MemoryStorageOptions } from './backend/memory'
export { create_sqlite_storage, type SqliteStorageConfig } from './backend/sqlite'
export { create_storage, create_emitter, type StorageDriver } from './backend/base'
export type { Storage, StorageReader, StorageWriter, WriteOpts, EventHandler, EdgeEvent } from './types'
