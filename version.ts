/**
 * Derives a dataset version label from the publish timestamp and checksum.
 * Format: `v{ts}.{first 8 checksum chars}`, e.g. `v1700000000.9f86d081`.
 */
export function derive_version(ts: number, checksum: string): string {
  return `v${ts}.${checksum.slice(0, 8)}`
}
