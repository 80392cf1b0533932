/**
 * Stores
 * ======
 *
 * A store is one node of the tree: a handle on a {@link Core} plus the
 * bookkeeping the root runtime needs to cache it, attribute effects to it and
 * tear it down. The root store owns the state; every other store is derived
 * from its parent with one of the `scope*` methods.
 *
 * @example
 * ```ts
 * const store = createStore({ initialState: { counter: { count: 0 } }, reducer: appReducer })
 * const counter = store.scope(path<AppState>().at('counter'), counterAction)
 *
 * counter.send({ type: 'increment' })
 * counter.state.count // 1
 * ```
 */

import { StoreCollection } from './collection'
import {
  ClosureScopedCore,
  ConditionalCore,
  InvalidCore,
  RootCore,
  ScopedCore,
  type Core,
  type CoreKind,
  type Scheduler
} from './core'
import type { Unsubscribe } from './change'
import type { EffectId } from './effect-handle'
import type { EqualityFn } from './equality'
import { reportIssue } from './errors'
import { elementAction, type ElementId, type IdentifiedAction } from './identified'
import { Logger } from './logger'
import { scopeId, type ActionEmbedding, type ScopeID, type StateSelector } from './paths'
import type { Reducer } from './reducer'
import { StoreRuntime } from './runtime'
import { StoreTask } from './task'
import type { NodeId, TreeNode } from './tree'

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface StoreOptions<S, A> {
  readonly initialState: S
  readonly reducer: Reducer<S, A>
  /** Debug name used in log lines and `toString()`. Defaults to `'Store'`. */
  readonly name?: string
  /** Enables {@link Logger.shared}. */
  readonly debug?: boolean
  /**
   * Runs actions sent by effects on the writer context. Defaults to running
   * them immediately.
   */
  readonly scheduler?: Scheduler
  /** Whether the caller is on the writer context. Defaults to always true. */
  readonly isWriterContext?: () => boolean
}

export interface ScopeIfOptions<S> {
  /**
   * Identity of the present value. When it changes the scoped store turns
   * invalid and the next `scopeIf` returns a new store.
   */
  readonly identify?: (state: S) => unknown
}

export interface ScopeCollectionOptions<ID extends ElementId, S> {
  readonly id: (element: S) => ID
  /** Read by stores addressed past the end of the collection. */
  readonly placeholder: S
}

interface StoreInit {
  readonly name: string
  /** Node ids from the parent up to the root. */
  readonly parentPath: readonly NodeId[]
  /** Where the node is cached; absent for stores that are not cached. */
  readonly slot?: { readonly parent?: NodeId; readonly scopeId?: ScopeID }
  /** Uncached conditional stores between the parent and the root. */
  readonly guards: readonly TreeNode[]
}

const runImmediately: Scheduler = (job) => job()

/**
 * Creates a root store.
 *
 * @example
 * ```ts
 * const store = createStore({
 *   initialState: { count: 0 },
 *   reducer: counterReducer,
 *   name: 'Counter'
 * })
 * ```
 */
export function createStore<S, A>(options: StoreOptions<S, A>): Store<S, A> {
  if (options.debug) Logger.shared.isEnabled = true
  const name = options.name ?? 'Store'
  const runtime = new StoreRuntime()
  const core = new RootCore(
    {
      initialState: options.initialState,
      reducer: options.reducer,
      name,
      scheduler: options.scheduler ?? runImmediately,
      isWriterContext: options.isWriterContext ?? (() => true)
    },
    runtime
  )
  return new Store(core, runtime, { name, parentPath: [], slot: {}, guards: [] })
}

// =============================================================================
// STORE
// =============================================================================

export class Store<S, A> implements TreeNode {
  readonly nodeId: NodeId
  /** Node ids from this store up to the root; the origin of its sends. */
  readonly path: readonly NodeId[]
  readonly name: string

  private core: Core<S, A>
  private readonly runtime: StoreRuntime
  private readonly subscriptions = new Set<Unsubscribe>()
  private readonly guards: readonly TreeNode[]

  /** @internal Use {@link createStore} or the `scope*` methods. */
  constructor(core: Core<S, A>, runtime: StoreRuntime, init: StoreInit) {
    this.core = core
    this.runtime = runtime
    this.name = init.name
    this.nodeId = runtime.tree.allocate()
    this.path = [this.nodeId, ...init.parentPath]
    this.guards = !init.slot && core.kind === 'conditional' ? [...init.guards, this] : init.guards
    if (init.slot) runtime.tree.insert(this, init.slot.parent, init.slot.scopeId)
    Logger.shared.log(`${this.name}.init`)
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  /** The current state, projected from the root state on every read. */
  get state(): S {
    return this.core.state()
  }

  withState<R>(body: (state: S) => R): R {
    return body(this.core.state())
  }

  get kind(): CoreKind {
    return this.core.kind
  }

  isInvalid(): boolean {
    return this.core.isInvalid()
  }

  /** Ids of the running effects whose dispatch passed through this store. */
  get effectIds(): EffectId[] {
    return this.runtime.registry.idsForNode(this.nodeId)
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /**
   * Sends an action up to the root, where it is reduced synchronously.
   * Sending to an invalid store does nothing and returns an empty task.
   */
  send(action: A): StoreTask {
    for (const guard of this.guards) this.runtime.tree.watch(guard)
    return this.core.send(action, this.path) ?? StoreTask.empty()
  }

  // ---------------------------------------------------------------------------
  // Scoping
  // ---------------------------------------------------------------------------

  /**
   * Derives a child store. Calls with selectors and embeddings of the same ids
   * return the same store for as long as it stays attached.
   */
  scope<CS, CA>(state: StateSelector<S, CS>, action: ActionEmbedding<A, CA>): Store<CS, CA> {
    const id = scopeId(state, action)
    const cacheable = this.canCache()
    if (cacheable) {
      const cached = this.runtime.tree.child(this.nodeId, id)
      if (cached instanceof Store) return cached
    }
    const core = new ScopedCore<S, A, CS, CA>(
      this.core,
      (parent) => state.get(parent),
      (child) => action.embed(child)
    )
    return this.child(core, state.id, cacheable ? id : undefined)
  }

  /**
   * Derives a child store for optional state. Returns `undefined` while the
   * state is absent. The store turns invalid once the state is gone.
   */
  scopeIf<CS, CA>(
    state: StateSelector<S, CS | null | undefined>,
    action: ActionEmbedding<A, CA>,
    options: ScopeIfOptions<CS> = {}
  ): Store<CS, CA> | undefined {
    if (this.isInvalid()) return undefined
    const current = state.get(this.core.state())
    if (current === undefined || current === null) return undefined

    const id = scopeId(state, action)
    const cacheable = this.canCache()
    if (cacheable) {
      const cached = this.runtime.tree.child(this.nodeId, id)
      if (cached instanceof Store && !cached.isInvalid()) return cached
      if (cached) this.runtime.tree.detach(cached.nodeId)
    }
    const core = new ConditionalCore<S, A, CS, CA>(this.core, {
      resolve: (parent) => state.get(parent),
      fromAction: (child) => action.embed(child),
      placeholder: current,
      identify: options.identify
    })
    return this.child(core, state.id, cacheable ? id : undefined)
  }

  /**
   * Derives a child store from plain functions. The store is not cached and
   * does not cache its own children.
   */
  scopeWith<CS, CA>(toState: (state: S) => CS, fromAction: (action: CA) => A): Store<CS, CA> {
    return this.child(new ClosureScopedCore(this.core, toState, fromAction), 'scopeWith', undefined)
  }

  /**
   * Derives one store per element of an identified collection.
   *
   * @example
   * ```ts
   * const rows = store.scopeCollection(path<AppState>().at('rows'), rowsAction, {
   *   id: (row) => row.id,
   *   placeholder: { id: 0, title: '' }
   * })
   * rows.at(1).send({ type: 'rename', title: 'Second' })
   * ```
   */
  scopeCollection<ID extends ElementId, ES, EA>(
    state: StateSelector<S, readonly ES[]>,
    action: ActionEmbedding<A, IdentifiedAction<ID, EA>>,
    options: ScopeCollectionOptions<ID, ES>
  ): StoreCollection<ID, Store<ES, EA>> {
    if (!this.canCache()) {
      reportIssue(
        `scopeCollection was called on ${this}, which cannot cache children. ` +
          'Element stores will be rebuilt on every access.'
      )
    }
    const source = this.scope(state, action)
    const snapshot = source.state
    return new StoreCollection(
      snapshot.map(options.id),
      (id, index) => this.element(source, id, snapshot[index], options.id),
      () => source.invalidStore<ES, EA>(options.placeholder)
    )
  }

  /**
   * A store that reads `placeholder` and discards every action.
   */
  invalidStore<T, B>(placeholder: T): Store<T, B> {
    return new Store(new InvalidCore<T, B>(placeholder), this.runtime, {
      name: `${this.name}.invalid`,
      parentPath: this.path
    })
  }

  // ---------------------------------------------------------------------------
  // Observation
  // ---------------------------------------------------------------------------

  /**
   * Calls `listener` with this store's state after every committed pass,
   * until unsubscribed or until the store turns invalid.
   */
  subscribe(listener: (state: S) => void): Unsubscribe {
    if (this.isInvalid()) return () => {}

    let stop: Unsubscribe = () => {}
    const unsubscribe = this.runtime.changes.subscribe(() => {
      if (this.isInvalid()) {
        stop()
        return
      }
      listener(this.core.state())
    })
    stop = () => {
      unsubscribe()
      this.subscriptions.delete(stop)
    }
    this.subscriptions.add(stop)
    return stop
  }

  /**
   * Calls `listener` when a value derived from the state changes according
   * to `equals`. Not called for the current value.
   *
   * @example
   * ```ts
   * store.observe((state) => state.items.map((item) => item.id), renderIds, shallowEqual)
   * ```
   */
  observe<T>(
    select: (state: S) => T,
    listener: (value: T, previous: T) => void,
    equals: EqualityFn<T> = Object.is
  ): Unsubscribe {
    let previous = select(this.core.state())
    return this.subscribe((state) => {
      const next = select(state)
      if (equals(previous, next)) return
      const last = previous
      previous = next
      listener(next, last)
    })
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  /**
   * Disposes the store. The root cancels every effect, detaches all children
   * and stops notifying; any other store detaches itself and everything below
   * it and cancels the effects dispatched through them.
   */
  dispose(): void {
    const core = this.core
    if (core instanceof RootCore) {
      core.dispose()
      return
    }
    if (this.runtime.tree.has(this.nodeId) || this.runtime.tree.isWatched(this.nodeId)) {
      this.runtime.tree.detach(this.nodeId)
      return
    }
    this.runtime.registry.cancelNode(this.nodeId)
    this.invalidate()
  }

  /** @internal Called by the node table when the store is detached. */
  invalidate(): void {
    if (this.core.kind !== 'invalid') {
      this.core = new InvalidCore(this.core.state())
    }
    for (const stop of [...this.subscriptions]) stop()
  }

  toString(): string {
    return this.name
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private canCache(): boolean {
    return this.core.canCacheChildren && this.runtime.tree.has(this.nodeId)
  }

  private child<CS, CA>(core: Core<CS, CA>, label: string, id: ScopeID | undefined): Store<CS, CA> {
    return new Store(core, this.runtime, {
      name: label === '' || label.startsWith('[') ? `${this.name}${label}` : `${this.name}.${label}`,
      parentPath: this.path,
      slot: id === undefined ? undefined : { parent: this.nodeId, scopeId: id },
      guards: this.guards
    })
  }

  private element<ID extends ElementId, ES, EA>(
    source: Store<readonly ES[], IdentifiedAction<ID, EA>>,
    id: ID,
    snapshot: ES,
    identify: (element: ES) => ID
  ): Store<ES, EA> {
    const key = `[id:${JSON.stringify(id)}]`
    const elementScope = scopeId({ id: key }, { id: key })
    const cacheable = source.canCache()
    if (cacheable) {
      const cached = this.runtime.tree.child(source.nodeId, elementScope)
      if (cached instanceof Store) return cached
    }
    const core = new ConditionalCore<readonly ES[], IdentifiedAction<ID, EA>, ES, EA>(source.core, {
      resolve: (elements) => elements.find((element) => identify(element) === id),
      fromAction: (child) => elementAction(id, child),
      placeholder: snapshot
    })
    return source.child(core, `[${JSON.stringify(id)}]`, cacheable ? elementScope : undefined)
  }
}
