/**
 * Core store functionality: the builder and the four components.
 * @module Core
 * @packageDocumentation
 */

export { create_edge, open_edge } from './edge'
export { create_mirror } from './mirror'
export { create_context_store } from './context'
export { create_view_materializer, merge_context, filter_by_context, order_by_context } from './views'
export { create_user_table_engine } from './userdb/client'
export { ok, err } from './types'
export type { Edge, EdgeBuilder } from './edge'
export type { Result, EdgeError, ViewTransform, CallOpts } from './types'
