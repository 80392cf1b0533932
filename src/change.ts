/**
 * Change Channel
 * ==============
 *
 * A payload-free multicast stream owned by the root. The root emits exactly
 * once per committed mutation pass; subscribers re-read whatever state they
 * care about through their own store.
 */

import { reportError } from './errors'

export type Unsubscribe = () => void

export class ChangeChannel {
  private readonly listeners = new Set<() => void>()
  private closed = false
  private emitted = 0

  /**
   * Subscribe to change notifications. Listeners added during an emission
   * are first called on the next one.
   */
  subscribe(listener: () => void): Unsubscribe {
    if (this.closed) return () => {}
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  emit(): void {
    if (this.closed) return
    this.emitted++
    for (const listener of [...this.listeners]) {
      if (!this.listeners.has(listener)) continue
      try {
        listener()
      } catch (error) {
        reportError('A change listener threw.', error)
      }
    }
  }

  /** Number of notifications emitted so far. */
  get version(): number {
    return this.emitted
  }

  get size(): number {
    return this.listeners.size
  }

  close(): void {
    this.closed = true
    this.listeners.clear()
  }
}
