/**
 * @module Config
 * @description Environment configuration for a sqlite-backed store.
 */

import { z } from 'zod'
import type { EdgeError, Result, Role } from './types'
import { ok, err } from './types'

const Flag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1')

const EnvSchema = z.object({
  EDGE_DB_PATH: z.string().min(1).default(':memory:'),
  EDGE_ROLE: z.enum(['writer', 'reader']).default('writer'),
  EDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  EDGE_VERIFY_CHECKSUM: Flag.default('false'),
  EDGE_PAGE_SIZE: z.coerce.number().int().positive().max(10_000).default(500),
})

export type EdgeConfig = {
  db_path: string
  role: Role
  timeout_ms: number
  verify_checksum: boolean
  page_size: number
}

/**
 * Reads the store configuration from environment variables.
 *
 * | Variable | Default |
 * |---|---|
 * | `EDGE_DB_PATH` | `:memory:` |
 * | `EDGE_ROLE` | `writer` |
 * | `EDGE_TIMEOUT_MS` | `5000` |
 * | `EDGE_VERIFY_CHECKSUM` | `false` |
 * | `EDGE_PAGE_SIZE` | `500` |
 *
 * @example
 * ```ts
 * const config = load_config({ EDGE_DB_PATH: './edge.db', EDGE_ROLE: 'reader' })
 * if (!config.ok) console.error(config.error)
 * ```
 */
export function load_config(env: Record<string, string | undefined> = process.env): Result<EdgeConfig, EdgeError> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    return err({ kind: 'invalid_config', message })
  }

  const e = parsed.data
  return ok({
    db_path: e.EDGE_DB_PATH,
    role: e.EDGE_ROLE,
    timeout_ms: e.EDGE_TIMEOUT_MS,
    verify_checksum: e.EDGE_VERIFY_CHECKSUM,
    page_size: e.EDGE_PAGE_SIZE,
  })
}
