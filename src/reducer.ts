// =============================================================================
// REDUCER SYSTEM FOR ACTION-BASED STATE MANAGEMENT
// =============================================================================

import { reportIssue } from './errors'
import { Effect } from './effect'
import { elementAction, type ElementId, type IdentifiedAction } from './identified'
import { describeAction, type Action, type ActionCase, type StatePath } from './paths'

/**
 * What a reducer returns: the next state and the effects to start once it is
 * committed.
 */
export type ReducerResult<S, A> = readonly [S, readonly Effect<A>[]]

/**
 * A pure function computing the next state and effect descriptors.
 * @template S The state type.
 * @template A The action type.
 */
export type Reducer<S, A> = (state: S, action: A) => ReducerResult<S, A>

/**
 * The writable part of a state path the combinators need.
 */
export type WritablePath<P, S> = Pick<StatePath<P, S>, 'id' | 'get' | 'set'>

type CaseHandler<S, A extends Action, K extends A['type']> = (
  state: S,
  action: Extract<A, { type: K }>
) => ReducerResult<S, A>

/**
 * Handlers keyed by action type. Missing types leave the state unchanged.
 */
export type ReducerHandlers<S, A extends Action> = {
  readonly [K in A['type']]?: CaseHandler<S, A, K>
}

function isHandler<S, A>(value: unknown): value is (state: S, action: A) => ReducerResult<S, A> {
  return typeof value === 'function'
}

/**
 * Creates a type-safe reducer from action type to handler mappings.
 *
 * @example
 * ```ts
 * type CounterAction =
 *   | { type: 'increment'; payload?: number }
 *   | { type: 'decrement'; payload?: number }
 *   | { type: 'reset' }
 *
 * const counterReducer = createReducer<{ count: number }, CounterAction>({
 *   increment: (state, action) => [{ count: state.count + (action.payload ?? 1) }, []],
 *   decrement: (state, action) => [{ count: state.count - (action.payload ?? 1) }, []],
 *   reset: () => [{ count: 0 }, []]
 * })
 * ```
 */
export function createReducer<S, A extends Action>(handlers: ReducerHandlers<S, A>): Reducer<S, A> {
  return (state, action) => {
    const type: A['type'] = action.type
    const handler: unknown = handlers[type]
    return isHandler<S, A>(handler) ? handler(state, action) : [state, []]
  }
}

/**
 * Runs reducers one after another on the same action, threading the state
 * through and collecting every effect in order.
 */
export function combineReducers<S, A>(...reducers: Reducer<S, A>[]): Reducer<S, A> {
  return (state, action) => {
    let current = state
    const effects: Effect<A>[] = []
    for (const reducer of reducers) {
      const [next, produced] = reducer(current, action)
      current = next
      effects.push(...produced)
    }
    return [current, effects]
  }
}

/**
 * Runs a child reducer on a slice of parent state for the actions of one case.
 *
 * @example
 * ```ts
 * const appReducer = scopeReducer(path<AppState>().at('counter'), counterAction, counterReducer)
 * ```
 */
export function scopeReducer<P, PA, S, A>(
  state: WritablePath<P, S>,
  action: ActionCase<PA, A>,
  child: Reducer<S, A>
): Reducer<P, PA> {
  return (parent, parentAction) => {
    const childAction = action.extract(parentAction)
    if (childAction === undefined) return [parent, []]
    const [next, effects] = child(state.get(parent), childAction)
    return [state.set(parent, next), Effect.mapAll(effects, (a) => action.embed(a))]
  }
}

/**
 * Runs a child reducer on optional state while it is present. Child actions
 * arriving while it is absent are reported and ignored.
 */
export function ifLet<P, PA, S, A>(
  state: WritablePath<P, S | null | undefined>,
  action: ActionCase<PA, A>,
  child: Reducer<S, A>
): Reducer<P, PA> {
  return (parent, parentAction) => {
    const childAction = action.extract(parentAction)
    if (childAction === undefined) return [parent, []]
    const current = state.get(parent)
    if (current === undefined || current === null) {
      reportIssue(
        `ifLet at "${state.id}" received "${describeAction(childAction)}" while its state was absent. ` +
          'The action was ignored.'
      )
      return [parent, []]
    }
    const [next, effects] = child(current, childAction)
    return [state.set(parent, next), Effect.mapAll(effects, (a) => action.embed(a))]
  }
}

/**
 * Runs an element reducer on the element of an identified collection an
 * action is addressed to.
 */
export function forEach<P, PA, ID extends ElementId, S, A>(
  state: WritablePath<P, readonly S[]>,
  action: ActionCase<PA, IdentifiedAction<ID, A>>,
  identify: (element: S) => ID,
  child: Reducer<S, A>
): Reducer<P, PA> {
  return (parent, parentAction) => {
    const wrapped = action.extract(parentAction)
    if (wrapped === undefined) return [parent, []]
    const elements = state.get(parent)
    const index = elements.findIndex((element) => identify(element) === wrapped.id)
    if (index < 0) {
      reportIssue(
        `forEach at "${state.id}" received "${describeAction(wrapped.action)}" for missing element ` +
          `${JSON.stringify(wrapped.id)}. The action was ignored.`
      )
      return [parent, []]
    }
    const [next, effects] = child(elements[index], wrapped.action)
    const updated = elements.slice()
    updated[index] = next
    return [
      state.set(parent, updated),
      Effect.mapAll(effects, (a) => action.embed(elementAction(wrapped.id, a)))
    ]
  }
}
