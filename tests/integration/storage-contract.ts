import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Storage, StoredDocument } from '../../types'
import { ok, err } from '../../types'

/** A writer and a reader over the same underlying data. */
export type StoragePair = { writer: Storage; reader: Storage; cleanup?: () => void }
export type StorageFactory = () => StoragePair

const makeDoc = (phy_table: string, pk: string, updated_at: number, item = { id: pk }): StoredDocument => ({
  phy_table,
  pk,
  item,
  updated_at,
})

export function runStorageContractTests(name: string, createStorage: StorageFactory) {
  describe(`${name} - Storage Contract`, () => {
    let writer: Storage
    let reader: Storage
    let cleanup: (() => void) | undefined

    beforeEach(() => {
      const pair = createStorage()
      writer = pair.writer
      reader = pair.reader
      cleanup = pair.cleanup
    })

    afterEach(() => {
      reader.close()
      writer.close()
      cleanup?.()
    })

    describe('provision', () => {
      it('marks the storage ready once', () => {
        expect(writer.is_provisioned()).toBe(false)

        expect(writer.provision()).toEqual({ ok: true, value: { already_provisioned: false } })
        expect(writer.is_provisioned()).toBe(true)
        expect(reader.is_provisioned()).toBe(true)

        expect(writer.provision()).toEqual({ ok: true, value: { already_provisioned: true } })
      })

      it('is refused to a reader', () => {
        expect(reader.provision()).toEqual({ ok: false, error: { kind: 'unauthorized', operation: 'provision' } })
      })
    })

    describe('write', () => {
      beforeEach(() => {
        writer.provision()
      })

      it('commits the writes of a successful transaction', () => {
        const result = writer.write(tx => {
          const version = tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v1', checksum: 'abc', ts: 1000 })
          tx.insert_global_rows('catalog', 'v1', [{ sku: 'A1' }, { sku: 'A2' }])
          return ok(version?.version)
        })

        expect(result).toEqual({ ok: true, value: 'v1' })
        const rows = reader.read(tx => tx.read_global_rows('catalog', 'v1', 0, 10).map(r => r.item))
        expect(rows).toEqual({ ok: true, value: [{ sku: 'A1' }, { sku: 'A2' }] })
      })

      it('rolls back every write when the callback returns an error', () => {
        const result = writer.write(tx => {
          tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v1', checksum: 'abc', ts: 1000 })
          tx.insert_global_rows('catalog', 'v1', [{ sku: 'A1' }])
          return err({ kind: 'invalid_input', message: 'stop' })
        })

        expect(result).toEqual({ ok: false, error: { kind: 'invalid_input', message: 'stop' } })
        expect(reader.read(tx => tx.get_mirror_version('catalog', 'v1'))).toEqual({ ok: true, value: null })
        expect(reader.read(tx => tx.count_global_rows('catalog', 'v1'))).toEqual({ ok: true, value: 0 })
      })

      it('rolls back and reports a storage failure when the callback throws', () => {
        const result = writer.write(
          tx => {
            tx.put_document(makeDoc('t_1', 'a', 1))
            throw new Error('disk full')
          },
          { operation: 'upsert' }
        )

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error.kind).toBe('transaction_aborted')
        if (result.error.kind !== 'transaction_aborted') return
        expect(result.error.operation).toBe('upsert')
        expect(result.error.reason).toBe('storage_failure')
        expect(reader.read(tx => tx.get_document('t_1', 'a'))).toEqual({ ok: true, value: null })
      })

      it('aborts without running when the deadline has passed', () => {
        let ran = false
        const result = writer.write(
          () => {
            ran = true
            return ok(1)
          },
          { deadline: Date.now() - 1, operation: 'publish_version' }
        )

        expect(ran).toBe(false)
        expect(result).toEqual({
          ok: false,
          error: { kind: 'transaction_aborted', operation: 'publish_version', reason: 'timeout', cause: undefined },
        })
      })

      it('rolls back a transaction that outlives its deadline', () => {
        const deadline = Date.now() + 5
        const result = writer.write(
          tx => {
            tx.put_document(makeDoc('t_1', 'a', 1))
            while (Date.now() <= deadline + 1) {
              // wait out the deadline
            }
            return ok(true)
          },
          { deadline }
        )

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error.kind === 'transaction_aborted' && result.error.reason).toBe('timeout')
        expect(reader.read(tx => tx.get_document('t_1', 'a'))).toEqual({ ok: true, value: null })
      })

      it('refuses every write to a reader', () => {
        const result = reader.write(() => ok(1), { operation: 'set_context' })
        expect(result).toEqual({ ok: false, error: { kind: 'unauthorized', operation: 'set_context' } })
      })
    })

    describe('records', () => {
      beforeEach(() => {
        writer.provision()
      })

      it('returns null for a duplicate mirror version', () => {
        const result = writer.write(tx => {
          const first = tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v1', checksum: 'abc', ts: 1000 })
          const second = tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v1', checksum: 'def', ts: 2000 })
          return ok({ first: first?.checksum, second })
        })
        expect(result).toEqual({ ok: true, value: { first: 'abc', second: null } })
      })

      it('picks the latest version by ts, then insertion order', () => {
        writer.write(tx => {
          tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v2', checksum: 'b', ts: 2000 })
          tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v1', checksum: 'a', ts: 1000 })
          tx.insert_mirror_version({ dataset_id: 'catalog', version: 'v2b', checksum: 'c', ts: 2000 })
          return ok(null)
        })

        const latest = reader.read(tx => tx.latest_mirror_version('catalog')?.version)
        expect(latest).toEqual({ ok: true, value: 'v2b' })

        const listed = reader.read(tx => tx.list_mirror_versions('catalog', 2).map(v => v.version))
        expect(listed).toEqual({ ok: true, value: ['v2b', 'v2'] })
      })

      it('pages global rows after an id', () => {
        writer.write(tx => ok(tx.insert_global_rows('catalog', 'v1', [1, 2, 3, 4, 5])))

        const first = reader.read(tx => tx.read_global_rows('catalog', 'v1', 0, 2))
        expect(first.ok).toBe(true)
        if (!first.ok) return
        expect(first.value.map(r => r.item)).toEqual([1, 2])

        const after = first.value[1]?.id ?? 0
        const second = reader.read(tx => tx.read_global_rows('catalog', 'v1', after, 10).map(r => r.item))
        expect(second).toEqual({ ok: true, value: [3, 4, 5] })
      })

      it('replaces a context on upsert and keeps its id', () => {
        const result = writer.write(tx => {
          const first = tx.upsert_context({ user_id: 'u1', dataset_id: 'catalog', ctx: { region: 'IN' }, ts: 1 })
          const second = tx.upsert_context({ user_id: 'u1', dataset_id: 'catalog', ctx: { region: 'US' }, ts: 2 })
          return ok(first.id === second.id)
        })
        expect(result).toEqual({ ok: true, value: true })

        const stored = reader.read(tx => tx.get_context('u1', 'catalog'))
        expect(stored.ok && stored.value?.ctx).toEqual({ region: 'US' })
        expect(stored.ok && stored.value?.ts).toBe(2)
      })

      it('reads views in (ts, id) order from a cursor', () => {
        writer.write(tx =>
          ok(
            tx.append_views([
              { user_id: 'u1', dataset_id: 'catalog', version: 'v1', item: 'a', ts: 10 },
              { user_id: 'u1', dataset_id: 'catalog', version: 'v1', item: 'b', ts: 10 },
              { user_id: 'u1', dataset_id: 'catalog', version: 'v1', item: 'c', ts: 20 },
              { user_id: 'u2', dataset_id: 'catalog', version: 'v1', item: 'x', ts: 10 },
            ])
          )
        )

        const all = reader.read(tx => tx.read_views('u1', 'catalog', 'v1', 0, null, 10))
        expect(all.ok).toBe(true)
        if (!all.ok) return
        expect(all.value.map(v => v.item)).toEqual(['a', 'b', 'c'])

        const first = all.value[0]
        if (!first) return
        const rest = reader.read(tx => tx.read_views('u1', 'catalog', 'v1', 0, { ts: first.ts, id: first.id }, 10).map(v => v.item))
        expect(rest).toEqual({ ok: true, value: ['b', 'c'] })

        const since = reader.read(tx => tx.read_views('u1', 'catalog', 'v1', 20, null, 10).map(v => v.item))
        expect(since).toEqual({ ok: true, value: ['c'] })
      })
    })

    describe('user tables', () => {
      beforeEach(() => {
        writer.provision()
      })

      it('refuses a second table with the same name or physical id', () => {
        const table = { user_id: 'u1', table_name: 'orders', phy_table: 't_1', pk_path: '$.id', ts_path: '$.ts', created_at: 1 }
        const result = writer.write(tx =>
          ok({
            first: tx.insert_table(table)?.phy_table,
            same_name: tx.insert_table({ ...table, phy_table: 't_2' }),
            same_phy: tx.insert_table({ ...table, table_name: 'notes' }),
          })
        )
        expect(result).toEqual({ ok: true, value: { first: 't_1', same_name: null, same_phy: null } })
      })

      it('scans documents by pk or by updated_at', () => {
        writer.write(tx => {
          tx.put_document(makeDoc('t_1', 'b', 30))
          tx.put_document(makeDoc('t_1', 'a', 20))
          tx.put_document(makeDoc('t_1', 'c', 10))
          tx.put_document(makeDoc('t_2', 'z', 5))
          return ok(null)
        })

        const by_pk = reader.read(tx => tx.scan_documents('t_1').map(d => d.pk))
        expect(by_pk).toEqual({ ok: true, value: ['a', 'b', 'c'] })

        const recent = reader.read(tx =>
          tx.scan_documents('t_1', { order_by: 'updated_at', direction: 'desc', since: 15, limit: 5 }).map(d => d.pk)
        )
        expect(recent).toEqual({ ok: true, value: ['b', 'a'] })
      })

      it('looks up index entries by equality, membership and range', () => {
        writer.write(tx => {
          tx.put_index_entry({ phy_table: 't_1', col_name: 'status', pk: 'o2', value: 'open' })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'status', pk: 'o1', value: 'open' })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'status', pk: 'o3', value: 'closed' })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'total', pk: 'o1', value: 10 })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'total', pk: 'o2', value: 25 })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'total', pk: 'o3', value: 40 })
          return ok(null)
        })

        expect(reader.read(tx => tx.lookup_index('t_1', 'status', { kind: 'eq', value: 'open' }))).toEqual({ ok: true, value: ['o1', 'o2'] })
        expect(reader.read(tx => tx.lookup_index('t_1', 'status', { kind: 'in', values: ['closed'] }))).toEqual({ ok: true, value: ['o3'] })
        expect(reader.read(tx => tx.lookup_index('t_1', 'total', { kind: 'range', gt: 10, lte: 40 }))).toEqual({ ok: true, value: ['o2', 'o3'] })
        expect(reader.read(tx => tx.count_index_entries('t_1', 'total'))).toEqual({ ok: true, value: 3 })
      })

      it('replaces the entry of a pk and deletes entries by column or pk', () => {
        writer.write(tx => {
          tx.put_index_entry({ phy_table: 't_1', col_name: 'status', pk: 'o1', value: 'open' })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'status', pk: 'o1', value: 'closed' })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'total', pk: 'o1', value: 10 })
          tx.put_index_entry({ phy_table: 't_1', col_name: 'total', pk: 'o2', value: 20 })
          return ok(null)
        })

        expect(reader.read(tx => tx.lookup_index('t_1', 'status', { kind: 'eq', value: 'open' }))).toEqual({ ok: true, value: [] })

        const removed = writer.write(tx =>
          ok({
            by_pk: tx.delete_index_entries('t_1', { pk: 'o1' }),
            by_col: tx.delete_index_entries('t_1', { col_name: 'total' }),
          })
        )
        expect(removed).toEqual({ ok: true, value: { by_pk: 2, by_col: 1 } })
        expect(reader.read(tx => tx.count_index_entries('t_1', 'status'))).toEqual({ ok: true, value: 0 })
      })
    })
  })
}
