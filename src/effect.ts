/**
 * Effect Descriptors
 * ==================
 *
 * Reducers never perform side effects. They return descriptions of work,
 * which the root store registers and starts after the state they were
 * computed with has been committed.
 *
 * - `Effect.none()` is the empty effect list.
 * - `Effect.send(action)` feeds an action back immediately after the pass.
 * - `Effect.run(body, options)` starts asynchronous work. The body receives a
 *   context with a `send` function (the only way for it to report results),
 *   an `AbortSignal` and a `dismiss` function to cancel itself.
 * - `Effect.cancel(id)` cancels every running effect registered under a
 *   cancellation id.
 */

import type { EffectId } from './effect-handle'

// =============================================================================
// TYPES
// =============================================================================

/**
 * User-chosen cancellation key. Compared by value, so `['download', 3]`
 * cancels what was started under `['download', 3]`.
 */
export type CancelID = string | number | readonly (string | number)[]

/**
 * What an effect body receives when it starts.
 * @template A The action type the effect reports back with.
 */
export interface EffectContext<A> {
  /** Registry id of the running effect. */
  readonly id: EffectId
  /** Aborted when the effect is cancelled. Check it at suspension points. */
  readonly signal: AbortSignal
  /** Dispatch an action back to the store. Discarded once the effect has finished or been cancelled. */
  send(action: A): void
  /** Cancel this effect. */
  dismiss(): void
}

export type EffectBody<A> = (context: EffectContext<A>) => void | Promise<void>

export interface RunOptions {
  /** Register the effect under a cancellation id. */
  readonly cancelId?: CancelID
  /** Cancel effects already running under `cancelId` before starting. */
  readonly cancelInFlight?: boolean
  /**
   * On cancellation, abort the signal but keep the effect registered until
   * its body settles, so it can run its own cleanup to completion.
   */
  readonly awaitCleanup?: boolean
  /** Debug name used in log lines. */
  readonly name?: string
}

export type Effect<A> =
  | { readonly kind: 'send'; readonly action: A }
  | { readonly kind: 'run'; readonly body: EffectBody<A>; readonly options: RunOptions }
  | { readonly kind: 'cancel'; readonly cancelId: CancelID }

/**
 * Normalises a cancellation id into a map key.
 */
export function cancelKey(id: CancelID): string {
  return JSON.stringify(id)
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

/** No effects. */
function none<A>(): Effect<A>[] {
  return []
}

function send<A>(action: A): Effect<A> {
  return { kind: 'send', action }
}

function run<A>(body: EffectBody<A>, options: RunOptions = {}): Effect<A> {
  return { kind: 'run', body, options }
}

function cancel<A>(cancelId: CancelID): Effect<A> {
  return { kind: 'cancel', cancelId }
}

/**
 * Marks a run effect as cancellable under `cancelId`. Other effects pass
 * through unchanged. Without `cancelInFlight` the effect keeps the flag it
 * was built with.
 */
function cancellable<A>(effect: Effect<A>, cancelId: CancelID, cancelInFlight?: boolean): Effect<A> {
  if (effect.kind !== 'run') return effect
  return {
    kind: 'run',
    body: effect.body,
    options: { ...effect.options, cancelId, cancelInFlight: cancelInFlight ?? effect.options.cancelInFlight }
  }
}

/**
 * Transforms the actions an effect sends. Used to lift child effects into the
 * parent action type.
 */
function map<A, B>(effect: Effect<A>, transform: (action: A) => B): Effect<B> {
  switch (effect.kind) {
    case 'send':
      return { kind: 'send', action: transform(effect.action) }
    case 'cancel':
      return { kind: 'cancel', cancelId: effect.cancelId }
    case 'run': {
      const body = effect.body
      return {
        kind: 'run',
        options: effect.options,
        body: (context) =>
          body({
            id: context.id,
            signal: context.signal,
            send: (action) => context.send(transform(action)),
            dismiss: () => context.dismiss()
          })
      }
    }
  }
}

function mapAll<A, B>(effects: readonly Effect<A>[], transform: (action: A) => B): Effect<B>[] {
  return effects.map((effect) => map(effect, transform))
}

export const Effect = {
  none,
  send,
  run,
  cancel,
  cancellable,
  map,
  mapAll
}
