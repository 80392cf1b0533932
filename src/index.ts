/**
 * tree-store-ts: Unidirectional State Management as a Tree of Stores
 * ==================================================================
 *
 * A single root state value, reduced by pure reducers, exposed through a tree
 * of scoped stores. Features:
 *
 * - Scoped child stores cached by an explicit (selector id, action id) key
 * - Optional and collection scoping that degrades to invalid stores
 * - Effects registered per dispatch and cancelled with the stores they came from
 * - One change notification per committed mutation pass
 * - Serialized re-entrant dispatch
 * - Lens-style state paths and reducer composition
 *
 * @license MIT
 */

// =============================================================================
// STORES
// =============================================================================

export {
  createStore,
  Store,
  type StoreOptions,
  type ScopeIfOptions,
  type ScopeCollectionOptions
} from './store'
export { StoreCollection } from './collection'
export { StoreTask } from './task'
export type { CoreKind, Scheduler } from './core'
export type { NodeId } from './tree'

// =============================================================================
// EFFECTS
// =============================================================================

export {
  Effect,
  cancelKey,
  type CancelID,
  type EffectBody,
  type EffectContext,
  type RunOptions
} from './effect'
export { EffectHandle, type EffectId, type EffectStatus } from './effect-handle'
export { EffectRegistry } from './registry'

// =============================================================================
// CHANGE PROPAGATION
// =============================================================================

export { ChangeChannel, type Unsubscribe } from './change'
export { shallowEqual, deepEqual, type EqualityFn } from './equality'

// =============================================================================
// PATHS AND REDUCERS
// =============================================================================

export {
  path,
  selector,
  statePath,
  actionEmbedding,
  actionCase,
  scopeId,
  describeAction,
  type Action,
  type CaseAction,
  type ActionCase,
  type ActionEmbedding,
  type ScopeID,
  type StatePath,
  type StateSelector
} from './paths'
export {
  createReducer,
  combineReducers,
  scopeReducer,
  ifLet,
  forEach,
  type Reducer,
  type ReducerHandlers,
  type ReducerResult,
  type WritablePath
} from './reducer'
export {
  elementAction,
  updateElement,
  removeElement,
  type ElementId,
  type IdentifiedAction
} from './identified'

// =============================================================================
// DIAGNOSTICS
// =============================================================================

export { PreconditionFailure, preconditionFailure, reportIssue } from './errors'
export { Logger } from './logger'
