/**
 * @module Indexing
 * @description Index value coercion and predicate matching shared by the engine and the backends.
 */

import { z } from 'zod'
import type { ColType, EdgeError, IndexKey, JsonValue, KeyLookup, Result } from '../types'
import { ok, err } from '../types'
import { compare_text } from '../utils'

const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i

const KEY_SCHEMAS: { [K in ColType]: z.ZodType<IndexKey, z.ZodTypeDef, unknown> } = {
  string: z.string(),
  number: z.number().finite(),
  integer: z.number().int(),
  boolean: z.boolean().transform(b => (b ? 1 : 0)),
  datetime: z
    .string()
    .datetime({ offset: true, local: true })
    .transform((s, ctx) => {
      // no offset means UTC
      const ms = Date.parse(HAS_OFFSET.test(s) ? s : `${s}Z`)
      if (Number.isNaN(ms)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'unparseable datetime' })
        return z.NEVER
      }
      return ms
    }),
}

/**
 * Converts a document value to the key stored in an index of `col_type`.
 * Returns `null` when the value does not have that type.
 *
 * @example
 * ```ts
 * to_index_key('open', 'string')                 // => 'open'
 * to_index_key(true, 'boolean')                  // => 1
 * to_index_key('1970-01-01T00:00:01Z', 'datetime') // => 1000
 * to_index_key(1.5, 'integer')                   // => null
 * ```
 */
export function to_index_key(value: JsonValue, col_type: ColType): IndexKey | null {
  const parsed = KEY_SCHEMAS[col_type].safeParse(value)
  return parsed.success ? parsed.data : null
}

/** Absent and `null` values are simply not indexed. */
export function is_missing(value: JsonValue | undefined): value is null | undefined {
  return value === undefined || value === null
}

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()])

const PredicateSchema = z.union([
  ScalarSchema,
  z.object({ eq: ScalarSchema }).strict(),
  z.object({ in: z.array(ScalarSchema) }).strict(),
  z
    .object({
      gt: ScalarSchema.optional(),
      gte: ScalarSchema.optional(),
      lt: ScalarSchema.optional(),
      lte: ScalarSchema.optional(),
    })
    .strict()
    .refine(r => r.gt !== undefined || r.gte !== undefined || r.lt !== undefined || r.lte !== undefined, {
      message: 'range needs at least one bound',
    }),
])

export type Scalar = z.infer<typeof ScalarSchema>

/**
 * Query predicate: a bare scalar means equality.
 *
 * @example
 * ```ts
 * 'open'
 * { in: ['open', 'pending'] }
 * { gte: 10, lt: 20 }
 * ```
 */
export type Predicate = z.infer<typeof PredicateSchema>

type RangeBounds = { gt?: Scalar; gte?: Scalar; lt?: Scalar; lte?: Scalar }

/** Parsed predicate with values left as given. */
export type RawLookup =
  | { kind: 'eq'; value: Scalar }
  | { kind: 'in'; values: Scalar[] }
  | ({ kind: 'range' } & RangeBounds)

export function parse_predicate(predicate: unknown): Result<RawLookup, EdgeError> {
  const parsed = PredicateSchema.safeParse(predicate)
  if (!parsed.success) {
    return err({ kind: 'invalid_input', message: `invalid predicate: ${parsed.error.issues[0]?.message ?? 'unrecognized shape'}` })
  }
  const p = parsed.data
  if (typeof p !== 'object') return ok({ kind: 'eq', value: p })
  if ('eq' in p) return ok({ kind: 'eq', value: p.eq })
  if ('in' in p) return ok({ kind: 'in', values: p.in })
  return ok({ kind: 'range', gt: p.gt, gte: p.gte, lt: p.lt, lte: p.lte })
}

/**
 * Coerces every predicate value into the key space of `col_type`, so the
 * same lookup can run against index entries and against scanned documents.
 */
export function compile_lookup(raw: RawLookup, col_type: ColType): Result<KeyLookup, EdgeError> {
  const coerce = (v: Scalar): Result<IndexKey, EdgeError> => {
    const key = to_index_key(v, col_type)
    if (key === null) return err({ kind: 'invalid_input', message: `predicate value ${JSON.stringify(v)} is not a ${col_type}` })
    return ok(key)
  }

  switch (raw.kind) {
    case 'eq': {
      const key = coerce(raw.value)
      if (!key.ok) return key
      return ok({ kind: 'eq', value: key.value })
    }
    case 'in': {
      const values: IndexKey[] = []
      for (const v of raw.values) {
        const key = coerce(v)
        if (!key.ok) return key
        values.push(key.value)
      }
      return ok({ kind: 'in', values })
    }
    case 'range': {
      const out: Extract<KeyLookup, { kind: 'range' }> = { kind: 'range' }
      for (const bound of ['gt', 'gte', 'lt', 'lte'] as const) {
        const v = raw[bound]
        if (v === undefined) continue
        const key = coerce(v)
        if (!key.ok) return key
        out[bound] = key.value
      }
      return ok(out)
    }
  }
}

type Accept = (order: number) => boolean

const above: Accept = o => o > 0
const at_least: Accept = o => o >= 0
const below: Accept = o => o < 0
const at_most: Accept = o => o <= 0

/** Strings compare by code point, numbers numerically; a string never matches a number bound. */
function compare_bound(value: IndexKey, bound: IndexKey | undefined, accept: Accept): boolean {
  if (bound === undefined) return true
  if (typeof value === 'string' && typeof bound === 'string') return accept(compare_text(value, bound))
  if (typeof value === 'number' && typeof bound === 'number') return accept(value - bound)
  return false
}

/** Evaluates a compiled lookup against one index key. */
export function match_key(key: IndexKey, lookup: KeyLookup): boolean {
  switch (lookup.kind) {
    case 'eq':
      return key === lookup.value
    case 'in':
      return lookup.values.includes(key)
    case 'range':
      return (
        compare_bound(key, lookup.gt, above) &&
        compare_bound(key, lookup.gte, at_least) &&
        compare_bound(key, lookup.lt, below) &&
        compare_bound(key, lookup.lte, at_most)
      )
  }
}

/**
 * Untyped match used by scans over paths with no declared index: values are
 * compared as they appear in the document. Ranges only compare a number with
 * a number or a string with a string.
 */
export function match_raw(value: JsonValue, lookup: RawLookup): boolean {
  switch (lookup.kind) {
    case 'eq':
      return value === lookup.value
    case 'in':
      return lookup.values.some(v => v === value)
    case 'range': {
      if (typeof value !== 'string' && typeof value !== 'number') return false
      const key: IndexKey = value
      const bounds: [Scalar | undefined, Accept][] = [
        [lookup.gt, above],
        [lookup.gte, at_least],
        [lookup.lt, below],
        [lookup.lte, at_most],
      ]
      return bounds.every(([bound, accept]) => {
        if (bound === undefined) return true
        if (typeof bound === 'boolean') return false
        return compare_bound(key, bound, accept)
      })
    }
  }
}
