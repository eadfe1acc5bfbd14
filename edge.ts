/**
 * @module Core
 * @description Builder assembling the store components over one storage.
 */

import type { EdgeError, EventHandler, Result, Storage, ViewTransform } from './types'
import type { EdgeConfig } from './config'
import { create_mirror, type DatasetMirror } from './mirror'
import { create_context_store, type UserContextStore } from './context'
import { create_view_materializer, type ViewMaterializer } from './views'
import { create_user_table_engine } from './userdb/client'
import type { UserTableEngine } from './userdb/types'
import { create_sqlite_storage } from './backend/sqlite'
import { create_runtime, type EdgeOptions } from './utils'

/**
 * A built store.
 * @category Types
 * @group Core Types
 */
export type Edge = {
  mirror: DatasetMirror
  contexts: UserContextStore
  views: ViewMaterializer
  userdb: UserTableEngine
  storage: Storage
  /** Creates the schema and the readiness marker. Writer only. */
  provision: () => Promise<Result<{ already_provisioned: boolean }, EdgeError>>
  is_ready: () => boolean
  close: () => void
}

/**
 * @category Types
 * @group Core Types
 */
export type EdgeBuilder = {
  with_storage: (storage: Storage) => EdgeBuilder
  /** Registers the view transform of one dataset. The last registration wins. */
  with_transform: (dataset_id: string, transform: ViewTransform) => EdgeBuilder
  with_options: (options: Partial<EdgeOptions>) => EdgeBuilder
  build: () => Edge
}

function check_options(options: Partial<EdgeOptions>): void {
  const { timeout_ms, page_size } = options
  if (timeout_ms !== undefined && !(Number.isFinite(timeout_ms) && timeout_ms > 0)) {
    throw new Error(`timeout_ms must be a positive number, got ${timeout_ms}`)
  }
  if (page_size !== undefined && !(Number.isInteger(page_size) && page_size > 0)) {
    throw new Error(`page_size must be a positive integer, got ${page_size}`)
  }
}

/**
 * Creates a new store using the builder pattern.
 * @category Core
 * @group Builders
 *
 * Use the builder chain to configure: `with_storage()` → `with_transform()` →
 * `with_options()` → `build()`. Every operation returns `not_initialized`
 * until `provision()` has run once against the storage.
 *
 * @example
 * ```ts
 * const edge = create_edge()
 *   .with_storage(create_memory_storage())
 *   .with_transform('orders', filter_by_context)
 *   .with_options({ timeout_ms: 2000 })
 *   .build()
 *
 * await edge.provision()
 * await edge.mirror.publish_version('catalog', 'v1', 'abc123', [{ sku: 'A1' }], 1000)
 * ```
 */
export function create_edge(): EdgeBuilder {
  let storage: Storage | null = null
  const transforms = new Map<string, ViewTransform>()
  let options: Partial<EdgeOptions> = {}

  const builder: EdgeBuilder = {
    with_storage(s) {
      storage = s
      return builder
    },

    with_transform(dataset_id, transform) {
      transforms.set(dataset_id, transform)
      return builder
    },

    with_options(o) {
      check_options(o)
      options = { ...options, ...o }
      return builder
    },

    build() {
      if (!storage) {
        throw new Error('Storage is required. Call with_storage() first.')
      }

      const s = storage
      const rt = create_runtime(s, options, new Map(transforms))

      return {
        mirror: create_mirror(rt),
        contexts: create_context_store(rt),
        views: create_view_materializer(rt),
        userdb: create_user_table_engine(rt),
        storage: s,
        provision: async () => s.provision(),
        is_ready: () => s.is_provisioned(),
        close: () => s.close(),
      }
    },
  }

  return builder
}

/**
 * Builds a sqlite-backed store from a loaded configuration.
 *
 * @example
 * ```ts
 * const config = load_config()
 * if (config.ok) {
 *   const edge = open_edge(config.value, { on_event: e => console.log(e.type) })
 * }
 * ```
 */
export function open_edge(
  config: EdgeConfig,
  extras: { transforms?: Record<string, ViewTransform>; on_event?: EventHandler } = {}
): Edge {
  const builder = create_edge()
    .with_storage(create_sqlite_storage({ path: config.db_path, role: config.role, on_event: extras.on_event }))
    .with_options({ timeout_ms: config.timeout_ms, verify_checksum: config.verify_checksum, page_size: config.page_size })

  for (const [dataset_id, transform] of Object.entries(extras.transforms ?? {})) {
    builder.with_transform(dataset_id, transform)
  }
  return builder.build()
}
