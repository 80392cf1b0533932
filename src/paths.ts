/**
 * Paths & Scope Identity
 * ======================
 *
 * Stores are scoped with a state selector and an action embedding. Both carry
 * an explicit `id` chosen by the feature author; the pair of ids is the
 * {@link ScopeID} under which a parent caches the derived child. Ids are
 * compared by value, so two calls built from equal selectors find the same
 * cached store.
 *
 * `StatePath` is the lens flavour of a selector (it can also write back) and
 * `ActionCase` the prism flavour of an embedding (it can also extract). The
 * reducer combinators need the richer forms; store scoping only needs `get`
 * and `embed`.
 */

// =============================================================================
// ACTIONS
// =============================================================================

/**
 * Base shape of every action the reducer helpers understand.
 */
export interface Action {
  readonly type: string
}

/**
 * An action case wrapping a child action, e.g. `{ type: 'counter', action: { type: 'increment' } }`.
 */
export interface CaseAction<T extends string, A> {
  readonly type: T
  readonly action: A
}

/** The `type` tags of a parent action union whose members wrap a child action. */
export type CaseType<PA> = PA extends { readonly type: infer T extends string; readonly action: unknown } ? T : never

/** The child action wrapped by the member of `PA` tagged `T`. */
export type CaseOf<PA, T> = PA extends { readonly type: T; readonly action: infer A } ? A : never

// =============================================================================
// SELECTORS AND EMBEDDINGS
// =============================================================================

/**
 * Reads a child state out of a parent state.
 * @template P The parent state type.
 * @template S The child state type.
 */
export interface StateSelector<P, S> {
  readonly id: string
  get(parent: P): S
}

/**
 * A selector that can also write the child state back into the parent.
 */
export interface StatePath<P, S> extends StateSelector<P, S> {
  /** Set a new value at the focus, returning the updated parent. */
  set(parent: P, value: S): P

  /** Update the focused value using a function, returning the updated parent. */
  update(parent: P, updater: (value: S) => S): P

  /** Focus on a field of the current (object) focus. */
  at<K extends keyof S>(key: K): StatePath<P, S[K]>

  /** Compose with another path to focus deeper. */
  compose<T>(next: StatePath<S, T>): StatePath<P, T>
}

/**
 * Wraps a child action into the parent action type.
 * @template PA The parent action type.
 * @template A The child action type.
 */
export interface ActionEmbedding<PA, A> {
  readonly id: string
  embed(action: A): PA
}

/**
 * An embedding that can also recognise its own case in a parent action.
 */
export interface ActionCase<PA, A> extends ActionEmbedding<PA, A> {
  extract(action: PA): A | undefined
}

/**
 * Value-comparable cache key of a scoped child.
 */
export type ScopeID = string

/**
 * Builds the cache key for a `(state selector, action embedding)` pair.
 */
export function scopeId(state: { readonly id: string }, action: { readonly id: string }): ScopeID {
  return JSON.stringify([state.id, action.id])
}

function joinId(parent: string, child: string): string {
  return parent === '' ? child : `${parent}.${child}`
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

/**
 * Creates a plain selector.
 *
 * @example
 * ```ts
 * const total = selector('total', (state: Cart) => state.items.length)
 * ```
 */
export function selector<P, S>(id: string, get: (parent: P) => S): StateSelector<P, S> {
  return { id, get }
}

/**
 * Creates a state path from getter and setter functions.
 *
 * @example
 * ```ts
 * const nameLens = statePath(
 *   'name',
 *   (user: User) => user.name,
 *   (user, name) => ({ ...user, name })
 * )
 * ```
 */
export function statePath<P, S>(
  id: string,
  get: (parent: P) => S,
  set: (parent: P, value: S) => P
): StatePath<P, S> {
  const path: StatePath<P, S> = {
    id,
    get,
    set,
    update: (parent, updater) => set(parent, updater(get(parent))),

    at: <K extends keyof S>(key: K) =>
      statePath<P, S[K]>(
        joinId(id, String(key)),
        (parent) => get(parent)[key],
        (parent, value) => {
          const current = get(parent)
          const next: S = { ...current, [key]: value }
          return set(parent, next)
        }
      ),

    compose: <T>(next: StatePath<S, T>) =>
      statePath<P, T>(
        joinId(id, next.id),
        (parent) => next.get(get(parent)),
        (parent, value) => set(parent, next.set(get(parent), value))
      )
  }

  return path
}

/**
 * The identity path of a state type; the starting point for `.at(...)` chains.
 *
 * @example
 * ```ts
 * const counter = path<AppState>().at('counter')
 * store.scope(counter, counterAction)
 * ```
 */
export function path<S>(): StatePath<S, S> {
  return statePath<S, S>('', (state) => state, (_state, value) => value)
}

/**
 * Creates an embedding from a plain function.
 */
export function actionEmbedding<PA, A>(id: string, embed: (action: A) => PA): ActionEmbedding<PA, A> {
  return { id, embed }
}

/**
 * Creates a case for parent actions shaped `{ type, action }`.
 *
 * @example
 * ```ts
 * type AppAction =
 *   | { type: 'counter'; action: CounterAction }
 *   | { type: 'reset' }
 *
 * const counterAction = actionCase<AppAction>()('counter')
 * counterAction.embed({ type: 'increment' }) // { type: 'counter', action: { type: 'increment' } }
 * ```
 */
export function actionCase<PA extends Action>() {
  return <T extends CaseType<PA>>(type: T): ActionCase<PA, CaseOf<PA, T>> => {
    const matches = (action: Action): action is CaseAction<T, CaseOf<PA, T>> =>
      action.type === type && 'action' in action

    return {
      id: type,
      embed(action) {
        const wrapped = { type, action }
        const widened: Action = wrapped
        // `T` selects exactly the union member built here
        return widened as PA
      },
      extract(action) {
        return matches(action) ? action.action : undefined
      }
    }
  }
}

/**
 * Short description of an action for log lines, following nested
 * `{ type, action }` cases: `'counter/increment'`.
 */
export function describeAction(action: unknown): string {
  if (typeof action === 'object' && action !== null && 'type' in action && typeof action.type === 'string') {
    const nested = 'action' in action ? describeAction(action.action) : ''
    return nested === '' || nested === 'action' ? action.type : `${action.type}/${nested}`
  }
  if (typeof action === 'string' || typeof action === 'number') return String(action)
  return 'action'
}
