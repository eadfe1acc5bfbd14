/**
 * @module Mirror
 * @description Versioned, checksum-identified snapshots of global datasets.
 */

import { z } from 'zod'
import type { CallOpts, EdgeError, GlobalRow, JsonValue, MirrorVersion, Result, StorageReader } from './types'
import { ok, err } from './types'
import { JsonValueSchema } from './codec'
import { compute_checksum } from './hash'
import { derive_version } from './version'
import { deadline_of, ensure_ready, ensure_writable, fail, paged, report, require_ids, type Runtime } from './utils'

const RowsSchema = z.array(JsonValueSchema)

export type PublishOpts = CallOpts & {
  /**
   * What to do when the (dataset, version) pair already exists with the same
   * checksum: `'unchanged'` (default) succeeds without writing, `'reject'`
   * returns `duplicate_version`.
   */
  on_existing?: 'unchanged' | 'reject'
}

export type PublishRowsOpts = PublishOpts & {
  /** Publish timestamp; defaults to the store clock. */
  ts?: number
}

export type PublishResult = {
  status: 'published' | 'unchanged'
  version: MirrorVersion
  row_count: number
}

export type VersionSummary = MirrorVersion & { row_count: number }

export type VersionDiff = {
  from: string
  to: string
  /** Rows of `to` with no counterpart in `from`, in `to` order. */
  added: JsonValue[]
  /** Rows of `from` with no counterpart in `to`, in `from` order. */
  removed: JsonValue[]
}

function sorted_keys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sorted_keys)
  if (value === null || typeof value !== 'object') return value
  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((key): [string, JsonValue] => [key, sorted_keys(value[key])])
  )
}

const row_identity = (value: JsonValue): string => JSON.stringify(sorted_keys(value))

/**
 * Multiset difference of two row batches. Rows are equal when their JSON is
 * equal up to object key order; a row present twice in `after` and once in
 * `before` is added once.
 *
 * @example
 * ```ts
 * diff_rows([{ sku: 'A1' }, { sku: 'A2' }], [{ sku: 'A2' }, { sku: 'A3' }])
 * // => { added: [{ sku: 'A3' }], removed: [{ sku: 'A1' }] }
 * ```
 */
export function diff_rows(before: JsonValue[], after: JsonValue[]): { added: JsonValue[]; removed: JsonValue[] } {
  const unmatched = new Map<string, number>()
  for (const item of before) {
    const key = row_identity(item)
    unmatched.set(key, (unmatched.get(key) ?? 0) + 1)
  }

  const added: JsonValue[] = []
  for (const item of after) {
    const key = row_identity(item)
    const n = unmatched.get(key) ?? 0
    if (n > 0) unmatched.set(key, n - 1)
    else added.push(item)
  }

  const removed: JsonValue[] = []
  for (const item of before) {
    const key = row_identity(item)
    const n = unmatched.get(key) ?? 0
    if (n === 0) continue
    unmatched.set(key, n - 1)
    removed.push(item)
  }
  return { added, removed }
}

export type DatasetMirror = {
  publish_version: (dataset_id: string, version: string, checksum: string, rows: JsonValue[], ts: number, opts?: PublishOpts) => Promise<Result<PublishResult, EdgeError>>
  publish_rows: (dataset_id: string, rows: JsonValue[], opts?: PublishRowsOpts) => Promise<Result<PublishResult, EdgeError>>
  get_latest_version: (dataset_id: string) => Promise<Result<MirrorVersion, EdgeError>>
  get_version: (dataset_id: string, version: string) => Promise<Result<MirrorVersion, EdgeError>>
  list_versions: (dataset_id: string, opts?: { limit?: number }) => Promise<Result<VersionSummary[], EdgeError>>
  get_rows: (dataset_id: string, version: string) => Promise<Result<AsyncIterable<JsonValue>, EdgeError>>
  diff_versions: (dataset_id: string, from: string, to: string) => Promise<Result<VersionDiff, EdgeError>>
}

/**
 * Creates the dataset mirror over a runtime.
 * @category Core
 * @group Components
 *
 * A version and its rows are written in one transaction, so readers see
 * either the whole batch or nothing. Re-publishing a known version with the
 * same checksum is a no-op; with a different checksum it is refused and the
 * stored snapshot is left as it was.
 *
 * @example
 * ```ts
 * const result = await edge.mirror.publish_version('catalog', 'v1', 'abc123', [{ sku: 'A1' }], 1000)
 * if (result.ok && result.value.status === 'unchanged') {
 *   // already mirrored
 * }
 * ```
 */
export function create_mirror(rt: Runtime): DatasetMirror {
  function read_all_rows(tx: StorageReader, dataset_id: string, version: string): JsonValue[] {
    const items: JsonValue[] = []
    let after = 0
    while (true) {
      const page = tx.read_global_rows(dataset_id, version, after, rt.options.page_size)
      for (const row of page) items.push(row.item)
      const last = page[page.length - 1]
      if (!last || page.length < rt.options.page_size) return items
      after = last.id
    }
  }

  async function publish_version(
    dataset_id: string,
    version: string,
    checksum: string,
    rows: JsonValue[],
    ts: number,
    opts: PublishOpts = {}
  ): Promise<Result<PublishResult, EdgeError>> {
    const allowed = ensure_writable(rt, 'publish_version')
    if (!allowed.ok) return report(rt, allowed)

    const ids = require_ids({ dataset_id, version, checksum })
    if (!ids.ok) return report(rt, ids)
    if (!Number.isSafeInteger(ts)) return fail(rt, { kind: 'invalid_input', message: 'ts must be an integer (epoch ms)' })

    const parsed = RowsSchema.safeParse(rows)
    if (!parsed.success) return fail(rt, { kind: 'invalid_input', message: 'rows must be an array of JSON values' })

    if (rt.options.verify_checksum) {
      const actual = await compute_checksum(parsed.data)
      if (actual !== checksum) {
        return fail(rt, { kind: 'checksum_mismatch', dataset_id, version, expected: checksum, actual })
      }
    }

    const deadline = deadline_of(rt, opts)
    const result = rt.storage.write<PublishResult>(tx => {
      const existing = tx.get_mirror_version(dataset_id, version)
      if (existing) {
        if (existing.checksum !== checksum) {
          return err({ kind: 'checksum_mismatch', dataset_id, version, expected: existing.checksum, actual: checksum })
        }
        if (opts.on_existing === 'reject') return err({ kind: 'duplicate_version', dataset_id, version })
        return ok({ status: 'unchanged', version: existing, row_count: tx.count_global_rows(dataset_id, version) })
      }

      const inserted = tx.insert_mirror_version({ dataset_id, version, checksum, ts })
      if (!inserted) return err({ kind: 'duplicate_version', dataset_id, version })
      const row_count = tx.insert_global_rows(dataset_id, version, parsed.data)
      return ok({ status: 'published', version: inserted, row_count })
    }, { deadline, operation: 'publish_version' })

    if (!result.ok) return report(rt, result)

    rt.emit({
      type: 'version_published',
      dataset_id,
      version,
      row_count: result.value.row_count,
      deduplicated: result.value.status === 'unchanged',
    })
    return result
  }

  return {
    publish_version,

    async publish_rows(dataset_id, rows, opts = {}) {
      const parsed = RowsSchema.safeParse(rows)
      if (!parsed.success) return fail(rt, { kind: 'invalid_input', message: 'rows must be an array of JSON values' })

      const checksum = await compute_checksum(parsed.data)
      const ts = opts.ts ?? rt.options.clock()
      return publish_version(dataset_id, derive_version(ts, checksum), checksum, parsed.data, ts, opts)
    },

    async get_latest_version(dataset_id) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const latest = rt.storage.read(tx => tx.latest_mirror_version(dataset_id), 'get_latest_version')
      if (!latest.ok) return latest
      if (!latest.value) return err({ kind: 'not_found', resource: 'dataset', key: dataset_id })
      return ok(latest.value)
    },

    async get_version(dataset_id, version) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const found = rt.storage.read(tx => tx.get_mirror_version(dataset_id, version), 'get_version')
      if (!found.ok) return found
      if (!found.value) return err({ kind: 'not_found', resource: 'version', key: `${dataset_id}@${version}` })
      return ok(found.value)
    },

    async list_versions(dataset_id, opts = {}) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const limit = opts.limit ?? 50
      return rt.storage.read(
        tx => tx.list_mirror_versions(dataset_id, limit).map(v => ({ ...v, row_count: tx.count_global_rows(dataset_id, v.version) })),
        'list_versions'
      )
    },

    async get_rows(dataset_id, version) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const found = rt.storage.read(tx => tx.get_mirror_version(dataset_id, version), 'get_rows')
      if (!found.ok) return found
      if (!found.value) return err({ kind: 'not_found', resource: 'version', key: `${dataset_id}@${version}` })

      return ok(
        paged<GlobalRow, JsonValue>(
          rt,
          'get_rows',
          (tx, after, limit) => tx.read_global_rows(dataset_id, version, after?.id ?? 0, limit),
          row => row.item
        )
      )
    },

    async diff_versions(dataset_id, from, to) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      // both snapshots come from one read
      const found = rt.storage.read((tx): { missing: string } | { before: JsonValue[]; after: JsonValue[] } => {
        for (const version of [from, to]) {
          if (!tx.get_mirror_version(dataset_id, version)) return { missing: version }
        }
        return { before: read_all_rows(tx, dataset_id, from), after: read_all_rows(tx, dataset_id, to) }
      }, 'diff_versions')
      if (!found.ok) return found
      if ('missing' in found.value) return err({ kind: 'not_found', resource: 'version', key: `${dataset_id}@${found.value.missing}` })

      return ok({ from, to, ...diff_rows(found.value.before, found.value.after) })
    },
  }
}
