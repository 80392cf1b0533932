/**
 * Effect Registry
 * ===============
 *
 * Owned by the root store. Every effect a reducer returns is registered here
 * before its body starts and deregistered when it settles, so running work can
 * be cancelled by effect id, by cancellation id, by the tree node its dispatch
 * came through, or all at once when the root is disposed.
 *
 * Effect ids are never reused.
 */

import { cancelKey as keyOf, type CancelID } from './effect'
import { EffectHandle, type EffectId } from './effect-handle'
import type { NodeId } from './tree'

export interface RegisterOptions {
  readonly origin: readonly NodeId[]
  readonly cancelId?: CancelID
  readonly awaitCleanup?: boolean
  readonly name?: string
}

export class EffectRegistry {
  private readonly handles = new Map<EffectId, EffectHandle>()
  private nextId = 1

  /**
   * Registers a new pending effect and returns its handle.
   */
  register(options: RegisterOptions): EffectHandle {
    const handle = new EffectHandle({
      id: this.nextId++,
      origin: options.origin,
      cancelKey: options.cancelId === undefined ? undefined : keyOf(options.cancelId),
      awaitCleanup: options.awaitCleanup,
      name: options.name,
      onSettled: (settled) => {
        this.handles.delete(settled.id)
      }
    })
    this.handles.set(handle.id, handle)
    return handle
  }

  get(id: EffectId): EffectHandle | undefined {
    return this.handles.get(id)
  }

  has(id: EffectId): boolean {
    return this.handles.has(id)
  }

  get size(): number {
    return this.handles.size
  }

  ids(): EffectId[] {
    return [...this.handles.keys()]
  }

  /** Ids of effects whose dispatch passed through `nodeId`. */
  idsForNode(nodeId: NodeId): EffectId[] {
    return [...this.handles.values()]
      .filter((handle) => handle.origin.includes(nodeId))
      .map((handle) => handle.id)
  }

  /**
   * Marks an effect as finished. Unknown ids are ignored.
   */
  complete(id: EffectId): void {
    this.handles.get(id)?.complete()
  }

  /**
   * Cancels one effect. Cancelling an unknown or completed id is a no-op.
   * @returns Whether a pending effect was cancelled.
   */
  cancel(id: EffectId): boolean {
    const handle = this.handles.get(id)
    if (!handle || !handle.isActive) return false
    handle.cancel()
    return true
  }

  /**
   * Cancels every pending effect registered under a cancellation id.
   * @returns The number of effects cancelled.
   */
  cancelKey(cancelId: CancelID): number {
    const key = keyOf(cancelId)
    return this.cancelWhere((handle) => handle.cancelKey === key)
  }

  /**
   * Cancels every pending effect whose dispatch passed through `nodeId`.
   */
  cancelNode(nodeId: NodeId): number {
    return this.cancelWhere((handle) => handle.origin.includes(nodeId))
  }

  cancelAll(): number {
    return this.cancelWhere(() => true)
  }

  private cancelWhere(predicate: (handle: EffectHandle) => boolean): number {
    const matching = [...this.handles.values()].filter((handle) => handle.isActive && predicate(handle))
    for (const handle of matching) handle.cancel()
    return matching.length
  }
}
