import { create_edge, type Edge } from '../../edge'
import { create_memory_state, create_memory_storage, type MemoryState } from '../../backend/memory'
import { create_sqlite_storage } from '../../backend/sqlite'
import type { EdgeEvent, ViewTransform } from '../../types'
import type { EdgeOptions } from '../../utils'

export type TestEdge = {
  edge: Edge
  events: EdgeEvent[]
  state: MemoryState
  /** Moves the store clock to `ms`. */
  set_time: (ms: number) => void
}

/**
 * A provisioned memory-backed store with a manual clock starting at 1000.
 */
export async function make_edge(
  options: Partial<EdgeOptions> = {},
  transforms: Record<string, ViewTransform> = {}
): Promise<TestEdge> {
  const events: EdgeEvent[] = []
  const state = create_memory_state()
  let now = 1000

  const builder = create_edge()
    .with_storage(create_memory_storage({ state, on_event: e => events.push(e) }))
    .with_options({ clock: () => now, ...options })
  for (const [dataset_id, transform] of Object.entries(transforms)) {
    builder.with_transform(dataset_id, transform)
  }

  const edge = builder.build()
  await edge.provision()
  return {
    edge,
    events,
    state,
    set_time: ms => {
      now = ms
    },
  }
}

/** A store over the same state opened with the reader role. */
export function make_reader(state: MemoryState): Edge {
  return create_edge().with_storage(create_memory_storage({ state, role: 'reader' })).build()
}

export type Driver = 'memory' | 'sqlite'

export const DRIVERS: Driver[] = ['memory', 'sqlite']

export type DriverEdge = Omit<TestEdge, 'state'>

/**
 * Like {@link make_edge} on either driver. The sqlite store lives in an
 * in-memory database; close the edge after each test.
 */
export async function make_edge_on(driver: Driver, options: Partial<EdgeOptions> = {}): Promise<DriverEdge> {
  const events: EdgeEvent[] = []
  const on_event = (e: EdgeEvent) => {
    events.push(e)
  }
  let now = 1000

  const storage = driver === 'memory' ? create_memory_storage({ on_event }) : create_sqlite_storage({ on_event })
  const edge = create_edge()
    .with_storage(storage)
    .with_options({ clock: () => now, ...options })
    .build()
  await edge.provision()
  return {
    edge,
    events,
    set_time: ms => {
      now = ms
    },
  }
}
