import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { create_edge, type Edge } from '../edge'
import { create_memory_storage, create_sqlite_storage } from '../backends'
import { collect, unwrap } from '../result'
import type { Storage } from '../types'

const backends: [string, () => Storage][] = [
  ['memory', () => create_memory_storage()],
  ['sqlite', () => create_sqlite_storage()],
]

describe.each(backends)('end to end on %s storage', (_name, make_storage) => {
  let edge: Edge

  beforeEach(async () => {
    edge = create_edge().with_storage(make_storage()).build()
    unwrap(await edge.provision())
  })

  afterEach(() => {
    edge.close()
  })

  it('materializes a published version with the tenant context', async () => {
    unwrap(await edge.mirror.publish_version('catalog', 'v1', 'abc123', [{ sku: 'A1' }, { sku: 'A2' }], 1000))
    unwrap(await edge.contexts.set_context('u1', 'catalog', { region: 'EU' }))

    const result = unwrap(await edge.views.materialize('u1', 'catalog'))
    expect(result).toEqual({ version: 'v1', checksum: 'abc123', count: 2 })

    const views = await collect(unwrap(await edge.views.get_view('u1', 'catalog', 'v1', 0)))
    expect(views).toHaveLength(2)
    expect(views.map(v => v.item)).toEqual([
      { sku: 'A1', region: 'EU' },
      { sku: 'A2', region: 'EU' },
    ])
    expect(views.every(v => v.version === 'v1')).toBe(true)
  })

  it('finds an upserted document through an index created afterwards', async () => {
    unwrap(await edge.userdb.create_table('u1', 'orders', { phy_table: 't_u1_orders', pk_path: '$.id', ts_path: '$.updated_at' }))
    unwrap(await edge.userdb.upsert('u1', 'orders', { id: 'o1', updated_at: 5, status: 'open' }))
    unwrap(await edge.userdb.create_index('u1', 'orders', { col_name: 'status', json_path: '$.status', col_type: 'string' }))

    const result = unwrap(await edge.userdb.query('u1', 'orders', 'status', 'open'))
    expect(result.documents).toEqual([{ id: 'o1', updated_at: 5, status: 'open' }])
    expect(result.plan.indexed).toBe(true)
  })

  it('keeps the newer document when an older write arrives', async () => {
    unwrap(await edge.userdb.create_table('u1', 'orders', { phy_table: 't_u1_orders', pk_path: '$.id', ts_path: '$.updated_at' }))
    unwrap(await edge.userdb.upsert('u1', 'orders', { id: 'o1', updated_at: 5, status: 'open' }))

    const stale = await edge.userdb.upsert('u1', 'orders', { id: 'o1', updated_at: 3, status: 'closed' })
    expect(stale).toEqual({
      ok: false,
      error: { kind: 'stale_write', table_name: 'orders', pk: 'o1', stored_ts: 5, incoming_ts: 3 },
    })
    expect(unwrap(await edge.userdb.get('u1', 'orders', 'o1'))).toEqual({ id: 'o1', updated_at: 5, status: 'open' })
  })

  it('runs the full table lifecycle', async () => {
    const db = edge.userdb
    unwrap(await db.create_table('u1', 'orders', { pk_path: '$.id' }))
    for (const [id, total] of [['o1', 10], ['o2', 25], ['o3', 40]] as const) {
      unwrap(await db.upsert('u1', 'orders', { id, updated_at: 1, total }))
    }
    unwrap(await db.create_index('u1', 'orders', { col_name: 'total', json_path: '$.total', col_type: 'number' }))

    const range = unwrap(await db.query('u1', 'orders', 'total', { gte: 20, lt: 40 }))
    expect(range.documents.map(d => d.id)).toEqual(['o2'])
    expect(unwrap(await db.query('u1', 'orders', 'total', { in: [10, 40] })).documents.map(d => d.id)).toEqual(['o1', 'o3'])

    expect(unwrap(await db.drop_index('u1', 'orders', 'total'))).toEqual({ entries: 3 })
    expect(unwrap(await db.drop_table('u1', 'orders'))).toEqual({ documents: 3, index_entries: 0, indexes: 0 })
    expect(unwrap(await db.list_tables('u1'))).toEqual([])
  })

  it('leaves no trace of a publish that fails', async () => {
    unwrap(await edge.mirror.publish_version('catalog', 'v1', 'abc123', [{ sku: 'A1' }], 1000))
    await edge.mirror.publish_version('catalog', 'v1', 'zzz999', [{ sku: 'Z9' }], 2000)

    expect(unwrap(await edge.mirror.get_latest_version('catalog')).checksum).toBe('abc123')
    expect(await collect(unwrap(await edge.mirror.get_rows('catalog', 'v1')))).toEqual([{ sku: 'A1' }])
  })
})
