/**
 * @module Utilities
 * @description Shared runtime, guards and paging helpers for the store components.
 */

import type { CallOpts, EdgeError, EdgeEvent, Result, Storage, StorageReader, ViewTransform } from "./types"
import { ok, err } from "./types"
import { EdgeFault } from "./result"
import { LockTable } from "./concurrency"

/**
 * Resolved store options.
 * @category Types
 */
export type EdgeOptions = {
  /** Default deadline for every operation, in ms. */
  timeout_ms: number
  /** Require published checksums to equal the SHA-256 of the row batch. */
  verify_checksum: boolean
  /** Rows fetched per storage read by lazy sequences. */
  page_size: number
  /** Source of record timestamps (epoch ms). */
  clock: () => number
}

export const DEFAULT_OPTIONS: EdgeOptions = {
  timeout_ms: 5000,
  verify_checksum: false,
  page_size: 500,
  clock: () => Date.now(),
}

/**
 * What every component is built from.
 * @internal
 */
export type Runtime = {
  storage: Storage
  options: EdgeOptions
  transforms: Map<string, ViewTransform>
  /** Per-table metadata locks, keyed by user and table name. */
  locks: LockTable
  emit: (event: EdgeEvent) => void
}

export function create_runtime(storage: Storage, options: Partial<EdgeOptions> = {}, transforms = new Map<string, ViewTransform>()): Runtime {
  return {
    storage,
    options: { ...DEFAULT_OPTIONS, ...options },
    transforms,
    locks: new LockTable(),
    emit: event => storage.on_event?.(event),
  }
}

/** Epoch ms after which the call gives up. */
export function deadline_of(rt: Runtime, opts?: CallOpts): number {
  return Date.now() + (opts?.timeout_ms ?? rt.options.timeout_ms)
}

/** Time left before `deadline`, never negative. */
export const remaining = (deadline: number): number => Math.max(0, deadline - Date.now())

/**
 * Refuses every operation until provisioning has completed.
 */
export function ensure_ready(rt: Runtime): Result<void, EdgeError> {
  if (!rt.storage.is_provisioned()) return err({ kind: "not_initialized" })
  return ok(undefined)
}

/**
 * Refuses mutations under the `reader` role, then checks readiness. The
 * storage layer repeats the role check for every write transaction.
 */
export function ensure_writable(rt: Runtime, operation: string): Result<void, EdgeError> {
  if (rt.storage.role !== "writer") return err({ kind: "unauthorized", operation })
  return ensure_ready(rt)
}

/**
 * Rejects empty identifiers and identifiers containing NUL, which storage
 * keys use as their separator.
 *
 * @example
 * ```ts
 * require_ids({ user_id, dataset_id }) // err invalid_input "user_id must be a non-empty string" when user_id is ''
 * ```
 */
export function require_ids(ids: Record<string, string>): Result<void, EdgeError> {
  for (const [name, value] of Object.entries(ids)) {
    if (typeof value !== "string" || value.length === 0) {
      return err({ kind: "invalid_input", message: `${name} must be a non-empty string` })
    }
    if (value.includes("\u0000")) {
      return err({ kind: "invalid_input", message: `${name} must not contain NUL` })
    }
  }
  return ok(undefined)
}

/**
 * Orders strings by Unicode code point, which is how SQLite orders UTF-8
 * text. Plain `<` compares UTF-16 code units and puts astral characters
 * before U+E000..U+FFFF.
 */
export function compare_text(a: string, b: string): number {
  let i = 0
  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0
    const y = b.codePointAt(i) ?? 0
    if (x !== y) return x < y ? -1 : 1
    i += x > 0xffff ? 2 : 1
  }
  return (i < a.length ? 1 : 0) - (i < b.length ? 1 : 0)
}

/** Emits an `error` event for a failed result and passes it through. */
export function report<R extends Result<unknown, EdgeError>>(rt: Runtime, result: R): R {
  const checked: Result<unknown, EdgeError> = result
  if (!checked.ok) rt.emit({ type: "error", error: checked.error })
  return result
}

/** Emits an `error` event and returns the error as a failed result. */
export function fail(rt: Runtime, error: EdgeError): Result<never, EdgeError> {
  rt.emit({ type: "error", error })
  return err(error)
}

/**
 * Lazy, restartable sequence read page by page. Each `for await` starts over
 * from the first page. A failed page read throws `EdgeFault`.
 *
 * @example
 * ```ts
 * const items = paged(
 *   rt,
 *   'get_rows',
 *   (tx, after, limit) => tx.read_global_rows('catalog', 'v1', after?.id ?? 0, limit),
 *   row => row.item
 * )
 * ```
 */
export function paged<R, T>(
  rt: Runtime,
  operation: string,
  read_page: (tx: StorageReader, after: R | null, limit: number) => R[],
  project: (row: R) => T
): AsyncIterable<T> {
  const limit = rt.options.page_size
  return {
    async *[Symbol.asyncIterator]() {
      let after: R | null = null
      while (true) {
        const cursor: R | null = after
        const page: Result<R[], EdgeError> = rt.storage.read((tx): R[] => read_page(tx, cursor, limit), operation)
        if (!page.ok) throw new EdgeFault(page.error)
        for (const row of page.value) yield project(row)
        if (page.value.length < limit) return
        after = page.value[page.value.length - 1] ?? null
      }
    },
  }
}
