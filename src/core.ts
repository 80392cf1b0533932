/**
 * Store Cores
 * ===========
 *
 * A core is the capability set behind one store: read the current (projected)
 * state, send an action, and report whether the state it projects still
 * exists. Every core has a `kind` tag:
 *
 * - `root`: owns the state, the reducer and the runtime (effect registry,
 *   node table, change channel). The only core that reduces.
 * - `scoped`: projects a parent core through a stable selector and embedding.
 * - `closure-scoped`: the same from anonymous functions; never cached.
 * - `conditional`: projects an optional value or a collection element and
 *   turns invalid once it is gone.
 * - `invalid`: a terminal placeholder that absorbs reads and writes.
 *
 * Reads are pull based: every `state()` call re-applies each projection to
 * the current root state. Sends apply each embedding on the way up and reach
 * the root exactly once.
 */

import { createContext } from 'unctx'
import { preconditionFailure, reportError, reportIssue } from './errors'
import type { Effect } from './effect'
import type { EffectHandle } from './effect-handle'
import { Logger } from './logger'
import { describeAction } from './paths'
import type { Reducer } from './reducer'
import type { StoreRuntime } from './runtime'
import { StoreTask } from './task'
import type { NodeId } from './tree'

export type CoreKind = 'root' | 'scoped' | 'closure-scoped' | 'conditional' | 'invalid'

/**
 * Runs a job on the writer context.
 */
export type Scheduler = (job: () => void) => void

export interface Core<S, A> {
  readonly kind: CoreKind
  /** Whether stores built on this core may cache their children. */
  readonly canCacheChildren: boolean
  state(): S
  /**
   * Reduces the action (root) or embeds it into the parent action type and
   * forwards it to the base core (every other kind).
   * @param origin Node ids the dispatch passed through, dispatch site first.
   */
  send(action: A, origin: readonly NodeId[]): StoreTask | undefined
  isInvalid(): boolean
}

// =============================================================================
// REDUCER SCOPE
// =============================================================================

interface ReducerFrame {
  readonly store: string
  readonly action: string
}

/**
 * Set while a reducer runs so a send from inside one is caught.
 */
const reducerScope = createContext<ReducerFrame>()

// =============================================================================
// ROOT
// =============================================================================

export interface RootCoreOptions<S, A> {
  readonly initialState: S
  readonly reducer: Reducer<S, A>
  readonly name: string
  readonly scheduler: Scheduler
  readonly isWriterContext: () => boolean
}

interface PendingAction<A> {
  readonly action: A
  readonly origin: readonly NodeId[]
  readonly task: StoreTask
}

export class RootCore<S, A> implements Core<S, A> {
  readonly kind: 'root' = 'root'
  readonly canCacheChildren = true

  private current: S
  private readonly reducer: Reducer<S, A>
  private readonly name: string
  private readonly scheduler: Scheduler
  private readonly isWriterContext: () => boolean
  private readonly buffer: PendingAction<A>[] = []
  private isSending = false
  private disposed = false

  constructor(
    options: RootCoreOptions<S, A>,
    readonly runtime: StoreRuntime
  ) {
    this.current = options.initialState
    this.reducer = options.reducer
    this.name = options.name
    this.scheduler = options.scheduler
    this.isWriterContext = options.isWriterContext
  }

  state(): S {
    return this.current
  }

  isInvalid(): boolean {
    return this.disposed
  }

  /**
   * Runs one mutation pass per action: reduce, commit, detach children whose
   * state is gone, notify, start effects. A send issued while a pass is
   * running is queued and processed after it, in submission order.
   */
  send(action: A, origin: readonly NodeId[] = []): StoreTask {
    if (!this.isWriterContext()) {
      preconditionFailure(
        `"${describeAction(action)}" was sent to ${this.name} outside its writer context. ` +
          'Effects must dispatch through the send function they are given.'
      )
    }
    const frame = reducerScope.tryUse()
    if (frame) {
      preconditionFailure(
        `"${describeAction(action)}" was sent to ${this.name} while the reducer of ${frame.store} ` +
          `was handling "${frame.action}". Reducers must return effects instead of sending actions.`
      )
    }

    if (this.disposed) {
      Logger.shared.log(`${this.name} is disposed; dropped "${describeAction(action)}"`)
      return StoreTask.empty()
    }

    const task = new StoreTask()
    this.buffer.push({ action, origin, task })
    if (this.isSending) return task

    this.isSending = true
    try {
      let next = this.buffer.shift()
      while (next !== undefined) {
        this.process(next)
        next = this.buffer.shift()
      }
    } catch (error) {
      const dropped = this.buffer.splice(0)
      for (const pending of dropped) pending.task.markProcessed()
      if (dropped.length > 0) {
        reportError(`The reducer of ${this.name} threw; ${dropped.length} queued action(s) were discarded.`, error)
      }
      throw error
    } finally {
      this.isSending = false
      this.runtime.tree.release()
    }
    return task
  }

  /**
   * Cancels all effects, detaches every child and stops notifications.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    for (const pending of this.buffer.splice(0)) pending.task.markProcessed()
    this.runtime.registry.cancelAll()
    this.runtime.tree.detachChildren()
    this.runtime.changes.close()
    Logger.shared.log(`${this.name}.dispose`)
  }

  private process({ action, origin, task }: PendingAction<A>): void {
    try {
      const [next, effects] = reducerScope.call(
        { store: this.name, action: describeAction(action) },
        () => this.reducer(this.current, action)
      )
      this.current = next
      const detached = new Set(this.runtime.tree.prune())
      this.runtime.changes.emit()
      if (this.disposed) {
        if (effects.length > 0) {
          Logger.shared.log(
            `${this.name} was disposed during "${describeAction(action)}"; dropped ${effects.length} effect(s)`
          )
        }
        return
      }
      const origins = origin.some((id) => detached.has(id)) ? 'detached' : 'attached'
      for (const effect of effects) this.start(effect, origin, task, origins)
    } finally {
      task.markProcessed()
    }
  }

  private start(
    effect: Effect<A>,
    origin: readonly NodeId[],
    task: StoreTask,
    origins: 'attached' | 'detached'
  ): void {
    switch (effect.kind) {
      case 'send':
        task.adopt(this.send(effect.action, origin))
        return
      case 'cancel':
        this.runtime.registry.cancelKey(effect.cancelId)
        return
      case 'run': {
        const { options } = effect
        if (options.cancelInFlight && options.cancelId !== undefined) {
          this.runtime.registry.cancelKey(options.cancelId)
        }
        const handle = this.runtime.registry.register({
          origin,
          cancelId: options.cancelId,
          awaitCleanup: options.awaitCleanup,
          name: options.name
        })
        task.track(handle)
        if (origins === 'detached') {
          // the store it was sent through was detached by this same pass
          handle.cancel()
          handle.complete()
          return
        }

        let result: void | Promise<void>
        try {
          result = effect.body({
            id: handle.id,
            signal: handle.signal,
            send: (action) => this.sendFromEffect(handle, action, origin, task),
            dismiss: () => handle.cancel()
          })
        } catch (error) {
          reportError(`${handle.name} threw while starting.`, error)
          handle.complete()
          return
        }

        if (result instanceof Promise) {
          result.then(
            () => handle.complete(),
            (error: unknown) => {
              if (!handle.signal.aborted) reportError(`${handle.name} failed.`, error)
              handle.complete()
            }
          )
        } else {
          handle.complete()
        }
        return
      }
    }
  }

  private sendFromEffect(handle: EffectHandle, action: A, origin: readonly NodeId[], task: StoreTask): void {
    const status = handle.status
    if (status === 'completed') {
      reportIssue(`${handle.name} sent "${describeAction(action)}" after it completed. The action was discarded.`)
      return
    }
    if (status !== 'pending') {
      Logger.shared.log(`${handle.name} was cancelled; dropped "${describeAction(action)}"`)
      return
    }
    this.scheduler(() => {
      task.adopt(this.send(action, origin))
    })
  }
}

// =============================================================================
// SCOPED
// =============================================================================

export class ScopedCore<P, PA, S, A> implements Core<S, A> {
  readonly kind: 'scoped' = 'scoped'

  constructor(
    private readonly base: Core<P, PA>,
    private readonly toState: (parent: P) => S,
    private readonly fromAction: (action: A) => PA
  ) {}

  get canCacheChildren(): boolean {
    return this.base.canCacheChildren
  }

  state(): S {
    return this.toState(this.base.state())
  }

  send(action: A, origin: readonly NodeId[]): StoreTask | undefined {
    return this.base.send(this.fromAction(action), origin)
  }

  isInvalid(): boolean {
    return this.base.isInvalid()
  }
}

// =============================================================================
// CLOSURE SCOPED
// =============================================================================

/**
 * Like {@link ScopedCore}, but built from functions without a stable identity,
 * so neither this store nor anything below it is cached.
 */
export class ClosureScopedCore<P, PA, S, A> implements Core<S, A> {
  readonly kind: 'closure-scoped' = 'closure-scoped'
  readonly canCacheChildren = false

  constructor(
    private readonly base: Core<P, PA>,
    private readonly toState: (parent: P) => S,
    private readonly fromAction: (action: A) => PA
  ) {}

  state(): S {
    return this.toState(this.base.state())
  }

  send(action: A, origin: readonly NodeId[]): StoreTask | undefined {
    return this.base.send(this.fromAction(action), origin)
  }

  isInvalid(): boolean {
    return this.base.isInvalid()
  }
}

// =============================================================================
// CONDITIONAL
// =============================================================================

export interface ConditionalCoreOptions<P, PA, S, A> {
  readonly resolve: (parent: P) => S | null | undefined
  readonly fromAction: (action: A) => PA
  /** Last present value; returned once the value is gone. */
  readonly placeholder: S
  /** When given, a present value with a different identity counts as gone. */
  readonly identify?: (state: S) => unknown
}

/**
 * Projects an optional value or a collection element. Once the value is
 * observed missing the core stays invalid: reads return the last present
 * value and sends are dropped.
 */
export class ConditionalCore<P, PA, S, A> implements Core<S, A> {
  readonly kind: 'conditional' = 'conditional'

  private cached: S
  private absent = false
  private readonly identity: unknown
  private readonly resolve: (parent: P) => S | null | undefined
  private readonly fromAction: (action: A) => PA
  private readonly identify: ((state: S) => unknown) | undefined

  constructor(
    private readonly base: Core<P, PA>,
    options: ConditionalCoreOptions<P, PA, S, A>
  ) {
    this.cached = options.placeholder
    this.resolve = options.resolve
    this.fromAction = options.fromAction
    this.identify = options.identify
    this.identity = options.identify?.(options.placeholder)
  }

  get canCacheChildren(): boolean {
    return this.base.canCacheChildren
  }

  state(): S {
    this.refresh()
    return this.cached
  }

  isInvalid(): boolean {
    this.refresh()
    return this.absent
  }

  send(action: A, origin: readonly NodeId[]): StoreTask | undefined {
    if (this.isInvalid()) {
      reportIssue(`"${describeAction(action)}" was sent to a store whose state is no longer present. The action was discarded.`)
      return undefined
    }
    return this.base.send(this.fromAction(action), origin)
  }

  private refresh(): void {
    if (this.absent) return
    if (this.base.isInvalid()) {
      this.absent = true
      return
    }
    const value = this.resolve(this.base.state())
    if (value === undefined || value === null) {
      this.absent = true
      return
    }
    if (this.identify && !Object.is(this.identify(value), this.identity)) {
      this.absent = true
      return
    }
    this.cached = value
  }
}

// =============================================================================
// INVALID
// =============================================================================

export class InvalidCore<S, A> implements Core<S, A> {
  readonly kind: 'invalid' = 'invalid'
  readonly canCacheChildren = false

  constructor(private readonly placeholder: S) {}

  state(): S {
    return this.placeholder
  }

  send(action: A): StoreTask | undefined {
    Logger.shared.log(`Dropped "${describeAction(action)}" sent to an invalid store`)
    return undefined
  }

  isInvalid(): boolean {
    return true
  }
}
