/**
 * @module Views
 * @description Per-tenant view log derived from the latest mirrored snapshot and the tenant context.
 */

import type { CallOpts, EdgeError, JsonObject, JsonValue, Result, UserView, ViewTransform } from './types'
import { ok, err } from './types'
import { JsonValueSchema } from './codec'
import { parse_path, read_segments } from './json-path'
import { EdgeFault, format_error, try_catch_async } from './result'
import { parallel_map } from './concurrency'
import { compare_text, deadline_of, ensure_ready, ensure_writable, fail, paged, report, require_ids, type Runtime } from './utils'

export type MaterializeResult = {
  version: string
  checksum: string
  count: number
}

export type MaterializeAllResult = {
  user_id: string
  result: Result<MaterializeResult, EdgeError>
}

export type MaterializeAllOpts = CallOpts & {
  concurrency?: number
}

export type ViewMaterializer = {
  materialize: (user_id: string, dataset_id: string, opts?: CallOpts) => Promise<Result<MaterializeResult, EdgeError>>
  materialize_all: (dataset_id: string, opts?: MaterializeAllOpts) => Promise<Result<MaterializeAllResult[], EdgeError>>
  get_view: (user_id: string, dataset_id: string, version: string, since_ts?: number) => Promise<Result<AsyncIterable<UserView>, EdgeError>>
  latest_per_key: (user_id: string, dataset_id: string, version: string, key_path: string) => Promise<Result<UserView[], EdgeError>>
}

const is_object = (value: JsonValue): value is JsonObject => typeof value === 'object' && value !== null && !Array.isArray(value)

const same = (a: JsonValue | undefined, b: JsonValue): boolean => a === b || (a !== undefined && JSON.stringify(a) === JSON.stringify(b))

/**
 * Shallow-merges the context into object rows; context keys win. Other rows
 * pass through unchanged.
 *
 * @example
 * ```ts
 * merge_context({ sku: 'A1' }, { region: 'EU' }) // => { sku: 'A1', region: 'EU' }
 * ```
 */
export const merge_context: ViewTransform = (item, ctx) => (is_object(item) ? { ...item, ...ctx } : item)

/**
 * Keeps rows matching every entry of `ctx.filters` and drops the rest. A
 * filter value that is an array matches any of its elements.
 *
 * @example
 * ```ts
 * const ctx = { filters: { status: ['new'], country: 'IN' } }
 * filter_by_context({ status: 'new', country: 'IN' }, ctx) // => the row
 * filter_by_context({ status: 'paid', country: 'IN' }, ctx) // => null
 * ```
 */
export const filter_by_context: ViewTransform = (item, ctx) => {
  const filters = ctx.filters
  if (filters === undefined || !is_object(filters)) return item
  const row = is_object(item) ? item : {}

  for (const [field, expected] of Object.entries(filters)) {
    const actual = row[field]
    const matched = Array.isArray(expected) ? expected.some(v => same(actual, v)) : same(actual, expected)
    if (!matched) return null
  }
  return item
}

type SortKey = number | string

const sort_key = (item: JsonValue, by: string): SortKey | undefined => {
  if (!is_object(item)) return undefined
  const value = item[by]
  return typeof value === 'number' || typeof value === 'string' ? value : undefined
}

// numbers before strings
const compare_keys = (a: SortKey, b: SortKey): number => {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'string' && typeof b === 'string') return compare_text(a, b)
  return typeof a === 'number' ? -1 : 1
}

/**
 * Orders derived rows by `ctx.sort = { by, desc }`, keeping equal rows in
 * their original order. Rows with no number or string at `by` go last in
 * either direction. Without a string `ctx.sort.by` the rows come back as
 * they are.
 *
 * @example
 * ```ts
 * order_by_context([{ n: 2 }, { n: 1 }], { sort: { by: 'n' } }) // => [{ n: 1 }, { n: 2 }]
 * ```
 */
export function order_by_context(items: JsonValue[], ctx: JsonObject): JsonValue[] {
  const sort = ctx.sort
  if (sort === undefined || !is_object(sort)) return items
  const by = sort.by
  if (typeof by !== 'string') return items
  const direction = sort.desc === true ? -1 : 1

  return items
    .map(item => ({ item, key: sort_key(item, by) }))
    .sort((a, b) => {
      if (a.key === undefined || b.key === undefined) return (a.key === undefined ? 1 : 0) - (b.key === undefined ? 1 : 0)
      return direction * compare_keys(a.key, b.key)
    })
    .map(({ item }) => item)
}

/**
 * Creates the view materializer.
 * @category Core
 * @group Components
 *
 * `materialize` pins the latest version once, derives one item per global
 * row through the dataset's transform (`merge_context` unless one was
 * registered), orders the result by `ctx.sort` when the context has one
 * (see {@link order_by_context}) and appends every derived item in a single
 * transaction, all stamped with the same clock reading. The log is append-only: running it
 * twice appends twice.
 */
export function create_view_materializer(rt: Runtime): ViewMaterializer {
  async function derive(
    dataset_id: string,
    version: string,
    user_id: string,
    ctx: JsonObject
  ): Promise<Result<JsonValue[], EdgeError>> {
    const transform = rt.transforms.get(dataset_id) ?? merge_context
    const info = { dataset_id, version, user_id }
    const derived: JsonValue[] = []
    let after = 0

    while (true) {
      const page = rt.storage.read(tx => tx.read_global_rows(dataset_id, version, after, rt.options.page_size), 'materialize_view')
      if (!page.ok) return page

      for (const row of page.value) {
        const out = await try_catch_async(
          async () => transform(row.item, ctx, info),
          (cause): EdgeError => ({ kind: 'transform_failed', dataset_id, cause })
        )
        if (!out.ok) return out
        if (out.value === null) continue

        const checked = JsonValueSchema.safeParse(out.value)
        if (!checked.success) {
          return err({ kind: 'transform_failed', dataset_id, cause: new Error(`transform returned a non-JSON value: ${format_error(checked.error)}`) })
        }
        derived.push(checked.data)
      }

      const last = page.value[page.value.length - 1]
      if (!last || page.value.length < rt.options.page_size) return ok(derived)
      after = last.id
    }
  }

  async function materialize(user_id: string, dataset_id: string, opts: CallOpts = {}): Promise<Result<MaterializeResult, EdgeError>> {
    const allowed = ensure_writable(rt, 'materialize_view')
    if (!allowed.ok) return report(rt, allowed)

    const ids = require_ids({ user_id, dataset_id })
    if (!ids.ok) return report(rt, ids)

    const deadline = deadline_of(rt, opts)

    const pinned = rt.storage.read(
      tx => ({ latest: tx.latest_mirror_version(dataset_id), context: tx.get_context(user_id, dataset_id) }),
      'materialize_view'
    )
    if (!pinned.ok) return report(rt, pinned)

    const { latest, context } = pinned.value
    if (!latest) return fail(rt, { kind: 'not_found', resource: 'dataset', key: dataset_id })

    const ctx = context?.ctx ?? {}
    const derived = await derive(dataset_id, latest.version, user_id, ctx)
    if (!derived.ok) return report(rt, derived)

    const ts = rt.options.clock()
    const rows = order_by_context(derived.value, ctx).map(item => ({ user_id, dataset_id, version: latest.version, item, ts }))
    const appended = rt.storage.write(tx => ok(tx.append_views(rows)), { deadline, operation: 'materialize_view' })
    if (!appended.ok) return report(rt, appended)

    rt.emit({ type: 'view_materialized', user_id, dataset_id, version: latest.version, count: appended.value })
    return ok({ version: latest.version, checksum: latest.checksum, count: appended.value })
  }

  function read_view(user_id: string, dataset_id: string, version: string, since_ts: number): AsyncIterable<UserView> {
    return paged<UserView, UserView>(
      rt,
      'get_view',
      (tx, after, limit) => tx.read_views(user_id, dataset_id, version, since_ts, after && { ts: after.ts, id: after.id }, limit),
      view => view
    )
  }

  return {
    materialize,

    async materialize_all(dataset_id, opts = {}) {
      const allowed = ensure_writable(rt, 'materialize_view')
      if (!allowed.ok) return report(rt, allowed)

      const users = rt.storage.read(tx => tx.list_context_users(dataset_id), 'materialize_all')
      if (!users.ok) return report(rt, users)

      const results = await parallel_map(
        users.value,
        async user_id => ({ user_id, result: await materialize(user_id, dataset_id, opts) }),
        opts.concurrency ?? 4
      )
      return ok(results)
    },

    async get_view(user_id, dataset_id, version, since_ts = 0) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      return ok(read_view(user_id, dataset_id, version, since_ts))
    },

    async latest_per_key(user_id, dataset_id, version, key_path) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const segments = parse_path(key_path)
      if (!segments.ok) return segments

      // later rows in (ts, id) order replace earlier ones
      const latest = new Map<string, UserView>()
      try {
        for await (const view of read_view(user_id, dataset_id, version, 0)) {
          const key = read_segments(view.item, segments.value)
          if (key === undefined || key === null) continue
          latest.set(JSON.stringify(key), view)
        }
      } catch (e) {
        if (e instanceof EdgeFault) return err(e.error)
        throw e
      }

      return ok(Array.from(latest.values()).sort((a, b) => a.ts - b.ts || a.id - b.id))
    },
  }
}
