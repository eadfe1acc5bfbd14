import { webcrypto } from 'node:crypto'
import type { JsonValue } from './types'

async function digest_hex(algorithm: 'SHA-1' | 'SHA-256', data: Uint8Array): Promise<string> {
  const hash_buffer = await webcrypto.subtle.digest(algorithm, data)
  const hash_array = new Uint8Array(hash_buffer)
  return Array.from(hash_array).map(b => b.toString(16).padStart(2, '0')).join('')
}

/**
 * SHA-256 hex digest of the JSON encoding of a row batch. This is the checksum
 * publishers attach to a dataset version.
 */
export async function compute_checksum(rows: JsonValue[]): Promise<string> {
  return digest_hex('SHA-256', new TextEncoder().encode(JSON.stringify(rows)))
}

/**
 * Stable physical identifier for a tenant table: `udb_` plus the first 16 hex
 * characters of SHA-1(`user_id:table_name`).
 */
export async function derive_phy_table(user_id: string, table_name: string): Promise<string> {
  const hex = await digest_hex('SHA-1', new TextEncoder().encode(`${user_id}:${table_name}`))
  return `udb_${hex.slice(0, 16)}`
}
