import { describe, it, expect } from 'vitest'
import { create_edge } from '../edge'
import { create_memory_state, create_memory_storage } from '../backend/memory'
import { collect, unwrap } from '../result'
import { make_edge, make_reader } from './helpers/edge'

describe('readiness', () => {
  it('refuses every operation until provisioned', async () => {
    const edge = create_edge().with_storage(create_memory_storage()).build()
    const not_ready = { ok: false, error: { kind: 'not_initialized' } }

    expect(edge.is_ready()).toBe(false)
    expect(await edge.mirror.publish_version('catalog', 'v1', 'abc', [], 1)).toEqual(not_ready)
    expect(await edge.mirror.get_latest_version('catalog')).toEqual(not_ready)
    expect(await edge.contexts.get_context('u1', 'catalog')).toEqual(not_ready)
    expect(await edge.views.get_view('u1', 'catalog', 'v1')).toEqual(not_ready)
    expect(await edge.userdb.query('u1', 'orders', 'status', 'open')).toEqual(not_ready)

    expect(unwrap(await edge.provision())).toEqual({ already_provisioned: false })
    expect(edge.is_ready()).toBe(true)
    expect((await edge.mirror.publish_version('catalog', 'v1', 'abc', [], 1)).ok).toBe(true)
  })

  it('reports a repeated provision', async () => {
    const { edge } = await make_edge()
    expect(await edge.provision()).toEqual({ ok: true, value: { already_provisioned: true } })
  })
})

describe('reader role', () => {
  it('reads what the writer stored', async () => {
    const { edge, state } = await make_edge()
    await edge.mirror.publish_version('catalog', 'v1', 'abc123', [{ sku: 'A1' }], 1000)
    await edge.contexts.set_context('u1', 'catalog', { region: 'EU' })
    await edge.views.materialize('u1', 'catalog')
    await edge.userdb.create_table('u1', 'orders', { pk_path: '$.id' })
    await edge.userdb.upsert('u1', 'orders', { id: 'o1', updated_at: 5 })

    const reader = make_reader(state)
    expect(unwrap(await reader.mirror.get_latest_version('catalog')).version).toBe('v1')
    expect(await collect(unwrap(await reader.mirror.get_rows('catalog', 'v1')))).toEqual([{ sku: 'A1' }])
    expect(unwrap(await reader.contexts.get_context('u1', 'catalog')).ctx).toEqual({ region: 'EU' })
    expect(await collect(unwrap(await reader.views.get_view('u1', 'catalog', 'v1')))).toHaveLength(1)
    expect(unwrap(await reader.userdb.get('u1', 'orders', 'o1'))).toEqual({ id: 'o1', updated_at: 5 })
    expect(unwrap(await reader.userdb.query('u1', 'orders', 'id', 'o1')).documents).toHaveLength(1)
  })

  it('refuses every mutation', async () => {
    const { state } = await make_edge()
    const reader = make_reader(state)
    const refused = (operation: string) => ({ ok: false, error: { kind: 'unauthorized', operation } })

    expect(await reader.provision()).toEqual(refused('provision'))
    expect(await reader.mirror.publish_version('catalog', 'v1', 'abc', [], 1)).toEqual(refused('publish_version'))
    expect(await reader.mirror.publish_rows('catalog', [])).toEqual(refused('publish_version'))
    expect(await reader.contexts.set_context('u1', 'catalog', {})).toEqual(refused('set_context'))
    expect(await reader.views.materialize('u1', 'catalog')).toEqual(refused('materialize_view'))
    expect(await reader.views.materialize_all('catalog')).toEqual(refused('materialize_view'))
    expect(await reader.userdb.create_table('u1', 'orders', { pk_path: '$.id' })).toEqual(refused('create_table'))
    expect(await reader.userdb.create_index('u1', 'orders', { col_name: 'a', json_path: '$.a' })).toEqual(refused('create_index'))
    expect(await reader.userdb.upsert('u1', 'orders', { id: 'o1' })).toEqual(refused('upsert'))
    expect(await reader.userdb.upsert_many('u1', 'orders', [{ id: 'o1' }])).toEqual(refused('upsert'))
    expect(await reader.userdb.delete('u1', 'orders', 'o1')).toEqual(refused('delete'))
    expect(await reader.userdb.drop_index('u1', 'orders', 'a')).toEqual(refused('drop_index'))
    expect(await reader.userdb.drop_table('u1', 'orders')).toEqual(refused('drop_table'))
  })

  it('checks the role before readiness', async () => {
    const reader = make_reader(create_memory_state())
    expect(await reader.contexts.set_context('u1', 'catalog', {})).toEqual({
      ok: false,
      error: { kind: 'unauthorized', operation: 'set_context' },
    })
  })

  it('emits an error event for a refused mutation', async () => {
    const kinds: string[] = []
    const reader = create_edge()
      .with_storage(create_memory_storage({ role: 'reader', on_event: e => kinds.push(e.type === 'error' ? e.error.kind : e.type) }))
      .build()

    await reader.contexts.set_context('u1', 'catalog', {})
    expect(kinds).toEqual(['unauthorized'])
  })
})
