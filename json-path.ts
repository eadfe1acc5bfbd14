/**
 * @module JsonPath
 * @description Minimal JSON path support: `$`, `$.a.b`, `$.items[0].sku`.
 */

import type { EdgeError, JsonValue, Result } from './types'
import { ok, err } from './types'

export type PathSegment = string | number

const SEGMENT = /^([A-Za-z_][A-Za-z0-9_-]*)((?:\[\d+\])*)$/
const INDEX = /\[(\d+)\]/g

/**
 * Parses a path into property and array-index segments.
 *
 * @example
 * ```ts
 * parse_path('$.items[0].sku') // => ok(['items', 0, 'sku'])
 * parse_path('items.sku')      // => err({ kind: 'invalid_path', ... })
 * ```
 */
export function parse_path(path: string): Result<PathSegment[], EdgeError> {
  const fail = (message: string) => err<EdgeError>({ kind: 'invalid_path', path, message })

  if (path === '$') return ok([])
  if (!path.startsWith('$.')) return fail('path must start with "$."')

  const segments: PathSegment[] = []
  for (const part of path.slice(2).split('.')) {
    const m = SEGMENT.exec(part)
    if (!m || m[1] === undefined) return fail(`invalid segment "${part}"`)
    segments.push(m[1])
    for (const idx of (m[2] ?? '').matchAll(INDEX)) {
      segments.push(Number(idx[1]))
    }
  }
  return ok(segments)
}

/** Walks parsed segments; `undefined` when any step is missing. */
export function read_segments(value: JsonValue, segments: PathSegment[]): JsonValue | undefined {
  let current: JsonValue | undefined = value
  for (const segment of segments) {
    if (current === undefined || current === null) return undefined
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined
      current = current[segment]
    } else {
      if (typeof current !== 'object' || Array.isArray(current)) return undefined
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined
    }
  }
  return current
}

/**
 * Extracts the value at `path`. An unparseable path yields `invalid_path`;
 * a well-formed path that does not resolve yields `undefined`.
 */
export function extract(value: JsonValue, path: string): Result<JsonValue | undefined, EdgeError> {
  const parsed = parse_path(path)
  if (!parsed.ok) return parsed
  return ok(read_segments(value, parsed.value))
}
