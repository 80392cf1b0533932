import type { EffectHandle, EffectId } from './effect-handle'

/**
 * Represents the lifecycle of the effects started by one `send`.
 *
 * ```ts
 * const task = store.send({ type: 'refresh' })
 * await task.finish()
 * ```
 *
 * A send queued behind a running pass returns its task right away; the task
 * picks up its effects once the queued action has been reduced. Actions sent
 * by those effects (or by `Effect.send`) are adopted as child tasks, so
 * cancelling and awaiting the task covers the whole chain.
 */
export class StoreTask {
  private readonly handles: EffectHandle[] = []
  private readonly children: StoreTask[] = []
  private cancelled = false
  private processed = false
  private readonly processing: Promise<void>
  private markDone: () => void = () => {}

  constructor() {
    this.processing = new Promise((resolve) => {
      this.markDone = resolve
    })
  }

  /** A task for an action that was discarded or started nothing. */
  static empty(): StoreTask {
    const task = new StoreTask()
    task.markProcessed()
    return task
  }

  /** @internal */
  track(handle: EffectHandle): void {
    this.handles.push(handle)
    if (this.cancelled) handle.cancel()
  }

  /** @internal Attaches the task of a follow-up send. */
  adopt(child: StoreTask): void {
    if (child === this || child.isIdle()) return
    this.children.push(child)
    if (this.cancelled) child.cancel()
  }

  /** @internal */
  markProcessed(): void {
    if (this.processed) return
    this.processed = true
    this.markDone()
  }

  /** Ids of the effects started for this send and its follow-ups. */
  get effectIds(): EffectId[] {
    return this.allHandles().map((handle) => handle.id)
  }

  /** Cancels every effect started for this send and its follow-ups. */
  cancel(): void {
    this.cancelled = true
    for (const handle of this.handles) handle.cancel()
    for (const child of this.children) child.cancel()
  }

  /**
   * Waits until the action was reduced and all its effects have settled,
   * including the follow-ups they sent before settling.
   */
  async finish(): Promise<void> {
    await this.processing
    let waited = 0
    while (waited < this.handles.length + this.children.length) {
      const handles = this.handles.slice()
      const children = this.children.slice()
      waited = handles.length + children.length
      await Promise.all([...handles.map((handle) => handle.settled()), ...children.map((child) => child.finish())])
    }
  }

  /**
   * True once every effect of the chain was cancelled, or when the send
   * started no effect at all.
   */
  get isCancelled(): boolean {
    return this.cancelled || (this.processed && this.allHandles().every((handle) => handle.status === 'cancelled'))
  }

  private isIdle(): boolean {
    return this.processed && this.handles.length === 0 && this.children.length === 0
  }

  private allHandles(): EffectHandle[] {
    return [...this.handles, ...this.children.flatMap((child) => child.allHandles())]
  }
}
