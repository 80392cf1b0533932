/**
 * Effect Handle Lifecycle
 * =======================
 *
 * Each running effect is tracked by a handle whose status is driven by a
 * small `robot3` state machine:
 *
 * ```
 *   pending ──complete──▶ completed
 *      │ ╲
 *      │  ╲request-cancel──▶ cancelling ──complete──▶ cancelled
 *      │
 *      └──cancel──▶ cancelled
 * ```
 *
 * `cancelling` is only used by effects registered with `awaitCleanup`: their
 * abort signal fires immediately but the handle stays registered until the
 * body settles.
 */

import { createMachine, interpret, state, transition } from 'robot3'
import { Logger } from './logger'
import type { NodeId } from './tree'

export type EffectId = number

export type EffectStatus = 'pending' | 'cancelling' | 'completed' | 'cancelled'

const STATUSES: readonly string[] = ['pending', 'cancelling', 'completed', 'cancelled']

function isStatus(value: unknown): value is EffectStatus {
  return typeof value === 'string' && STATUSES.includes(value)
}

const lifecycle = createMachine('pending', {
  pending: state(
    transition('complete', 'completed'),
    transition('cancel', 'cancelled'),
    transition('request-cancel', 'cancelling')
  ),
  cancelling: state(transition('complete', 'cancelled')),
  completed: state(),
  cancelled: state()
})

export interface EffectHandleInit {
  readonly id: EffectId
  /** Node ids the originating dispatch passed through, dispatch site first. */
  readonly origin: readonly NodeId[]
  readonly cancelKey?: string
  readonly awaitCleanup?: boolean
  readonly name?: string
  /** Called once when the handle reaches `completed` or `cancelled`. */
  readonly onSettled: (handle: EffectHandle) => void
}

export class EffectHandle {
  readonly id: EffectId
  readonly origin: readonly NodeId[]
  readonly cancelKey: string | undefined
  readonly awaitCleanup: boolean
  readonly name: string

  private readonly controller = new AbortController()
  private readonly service = interpret(lifecycle, () => {})
  private readonly onSettled: (handle: EffectHandle) => void
  private readonly waiters: Array<() => void> = []

  constructor(init: EffectHandleInit) {
    this.id = init.id
    this.origin = init.origin
    this.cancelKey = init.cancelKey
    this.awaitCleanup = init.awaitCleanup ?? false
    this.name = init.name ?? `effect ${init.id}`
    this.onSettled = init.onSettled
  }

  get status(): EffectStatus {
    const current: unknown = this.service.machine.current
    return isStatus(current) ? current : 'pending'
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  /** True until cancellation is requested or the body finishes. */
  get isActive(): boolean {
    return this.status === 'pending'
  }

  get isSettled(): boolean {
    const status = this.status
    return status === 'completed' || status === 'cancelled'
  }

  /**
   * Records that the effect body finished. A no-op once settled.
   */
  complete(): void {
    if (this.isSettled) return
    this.service.send('complete')
    this.settle()
  }

  /**
   * Requests cancellation. Unknown, finished or already cancelling handles
   * ignore the call.
   */
  cancel(): void {
    if (!this.isActive) return
    this.service.send(this.awaitCleanup ? 'request-cancel' : 'cancel')
    Logger.shared.log(`${this.name} cancelled`)
    this.controller.abort()
    this.settle()
  }

  /**
   * Resolves once the handle is `completed` or `cancelled`.
   */
  settled(): Promise<void> {
    if (this.isSettled) return Promise.resolve()
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  private settle(): void {
    if (!this.isSettled) return
    this.onSettled(this)
    for (const resolve of this.waiters.splice(0)) resolve()
  }
}
