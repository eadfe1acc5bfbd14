/**
 * @module Contexts
 * @description One private JSON context per (user, dataset).
 */

import type { CallOpts, EdgeError, JsonObject, Result, UserContext } from './types'
import { ok, err } from './types'
import { JsonObjectSchema } from './codec'
import { deadline_of, ensure_ready, ensure_writable, fail, report, require_ids, type Runtime } from './utils'

export type SetContextOpts = CallOpts & {
  /** Record timestamp; defaults to the store clock. */
  ts?: number
}

export type UserContextStore = {
  set_context: (user_id: string, dataset_id: string, ctx: JsonObject, opts?: SetContextOpts) => Promise<Result<UserContext, EdgeError>>
  get_context: (user_id: string, dataset_id: string) => Promise<Result<UserContext, EdgeError>>
  list_users: (dataset_id: string) => Promise<Result<string[], EdgeError>>
}

/**
 * Creates the context store.
 * @category Core
 * @group Components
 *
 * `set_context` is an unconditional upsert: the last call wins, whatever `ts`
 * it carries.
 */
export function create_context_store(rt: Runtime): UserContextStore {
  return {
    async set_context(user_id, dataset_id, ctx, opts = {}) {
      const allowed = ensure_writable(rt, 'set_context')
      if (!allowed.ok) return report(rt, allowed)

      const ids = require_ids({ user_id, dataset_id })
      if (!ids.ok) return report(rt, ids)

      const parsed = JsonObjectSchema.safeParse(ctx)
      if (!parsed.success) return fail(rt, { kind: 'invalid_input', message: 'ctx must be a JSON object' })

      const ts = opts.ts ?? rt.options.clock()
      if (!Number.isSafeInteger(ts)) return fail(rt, { kind: 'invalid_input', message: 'ts must be an integer (epoch ms)' })

      const result = rt.storage.write(
        tx => ok(tx.upsert_context({ user_id, dataset_id, ctx: parsed.data, ts })),
        { deadline: deadline_of(rt, opts), operation: 'set_context' }
      )
      if (!result.ok) return report(rt, result)

      rt.emit({ type: 'context_set', user_id, dataset_id, ts })
      return result
    },

    async get_context(user_id, dataset_id) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      const found = rt.storage.read(tx => tx.get_context(user_id, dataset_id), 'get_context')
      if (!found.ok) return found
      if (!found.value) return err({ kind: 'not_found', resource: 'context', key: `${user_id}/${dataset_id}` })
      return ok(found.value)
    },

    async list_users(dataset_id) {
      const ready = ensure_ready(rt)
      if (!ready.ok) return ready

      return rt.storage.read(tx => tx.list_context_users(dataset_id), 'list_users')
    },
  }
}
