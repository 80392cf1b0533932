import { describe, it, expect, vi } from 'vitest'
import {
  actionCase,
  combineReducers,
  createReducer,
  createStore,
  Effect,
  EffectRegistry,
  forEach,
  path,
  removeElement,
  type IdentifiedAction,
  type Store
} from '../src'

function gate() {
  let open: () => void = () => {}
  const promise = new Promise<void>((resolve) => {
    open = resolve
  })
  return { promise, open }
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve())
  })
}

describe('EffectRegistry', () => {
  it('should treat cancelling a completed id as a no-op', () => {
    const registry = new EffectRegistry()
    const handle = registry.register({ origin: [1] })

    registry.complete(handle.id)

    expect(handle.status).toBe('completed')
    expect(registry.has(handle.id)).toBe(false)
    expect(registry.cancel(handle.id)).toBe(false)
    expect(registry.cancel(99)).toBe(false)
    expect(registry.size).toBe(0)
    expect(handle.status).toBe('completed')
  })

  it('should never reuse ids', () => {
    const registry = new EffectRegistry()
    const first = registry.register({ origin: [] })
    registry.complete(first.id)
    const second = registry.register({ origin: [] })

    expect(first.id).toBe(1)
    expect(second.id).toBe(2)
  })

  it('should cancel by cancellation id, compared by value', () => {
    const registry = new EffectRegistry()
    const a1 = registry.register({ origin: [], cancelId: ['download', 1] })
    const a2 = registry.register({ origin: [], cancelId: ['download', 1] })
    const b = registry.register({ origin: [], cancelId: ['download', 2] })

    expect(registry.cancelKey(['download', 1])).toBe(2)

    expect(a1.status).toBe('cancelled')
    expect(a2.signal.aborted).toBe(true)
    expect(b.isActive).toBe(true)
    expect(registry.ids()).toEqual([b.id])
  })

  it('should cancel effects whose origin passes through a node', () => {
    const registry = new EffectRegistry()
    const inside = registry.register({ origin: [3, 2, 1] })
    const outside = registry.register({ origin: [4, 2, 1] })

    expect(registry.idsForNode(2)).toEqual([inside.id, outside.id])
    expect(registry.cancelNode(3)).toBe(1)
    expect(registry.idsForNode(2)).toEqual([outside.id])
  })

  it('should keep awaitCleanup effects registered until they settle', async () => {
    const registry = new EffectRegistry()
    const handle = registry.register({ origin: [], awaitCleanup: true })

    expect(registry.cancel(handle.id)).toBe(true)
    expect(handle.status).toBe('cancelling')
    expect(handle.signal.aborted).toBe(true)
    expect(registry.has(handle.id)).toBe(true)
    expect(registry.cancel(handle.id)).toBe(false)

    handle.complete()
    await handle.settled()

    expect(handle.status).toBe('cancelled')
    expect(registry.has(handle.id)).toBe(false)
  })

  it('should cancel everything at once', () => {
    const registry = new EffectRegistry()
    registry.register({ origin: [1] })
    registry.register({ origin: [2] })

    expect(registry.cancelAll()).toBe(2)
    expect(registry.size).toBe(0)
  })
})

describe('Store effects', () => {
  interface JobState {
    results: string[]
    events: string[]
  }

  type JobAction =
    | { type: 'fetch'; id: string }
    | { type: 'loaded'; id: string }
    | { type: 'stop'; id: string }
    | { type: 'ordered' }

  it('should start effects after the state is committed and observers notified', () => {
    const events: string[] = []
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        ordered: (state) => {
          events.push('reduce')
          return [state, [Effect.run(() => void events.push('effect'))]]
        }
      })
    })
    store.subscribe(() => events.push('notify'))

    store.send({ type: 'ordered' })

    expect(events).toEqual(['reduce', 'notify', 'effect'])
  })

  it('should feed actions sent by async effects back into the store', async () => {
    const { promise, open } = gate()
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        fetch: (state, action) => [
          state,
          [
            Effect.run(async ({ send }) => {
              await promise
              send({ type: 'loaded', id: action.id })
            })
          ]
        ],
        loaded: (state, action) => [{ ...state, results: [...state.results, action.id] }, []]
      })
    })

    const task = store.send({ type: 'fetch', id: 'x' })
    expect(store.state.results).toEqual([])

    open()
    await task.finish()

    expect(store.state.results).toEqual(['x'])
    expect(store.effectIds).toEqual([])
  })

  describe('cancellation', () => {
    const reducer = createReducer<JobState, JobAction>({
      fetch: (state, action) => [
        state,
        [
          Effect.run(({ signal }) => waitForAbort(signal), {
            cancelId: ['fetch', action.id],
            cancelInFlight: true,
            name: `fetch ${action.id}`
          })
        ]
      ],
      stop: (state, action) => [state, [Effect.cancel(['fetch', action.id])]]
    })

    function createJobs() {
      return createStore<JobState, JobAction>({ initialState: { results: [], events: [] }, reducer })
    }

    it('should cancel in-flight effects under the same id', () => {
      const store = createJobs()
      const first = store.send({ type: 'fetch', id: 'a' })
      const other = store.send({ type: 'fetch', id: 'b' })
      const second = store.send({ type: 'fetch', id: 'a' })

      expect(first.isCancelled).toBe(true)
      expect(other.isCancelled).toBe(false)
      expect(second.isCancelled).toBe(false)
      expect(store.effectIds).toEqual([2, 3])
    })

    it('should cancel by id from a reducer', () => {
      const store = createJobs()
      const task = store.send({ type: 'fetch', id: 'a' })

      store.send({ type: 'stop', id: 'a' })

      expect(task.isCancelled).toBe(true)
      expect(store.effectIds).toEqual([])
    })

    it('should cancel the effects of a task', async () => {
      const store = createJobs()
      const task = store.send({ type: 'fetch', id: 'a' })

      task.cancel()
      await task.finish()

      expect(task.isCancelled).toBe(true)
      expect(store.effectIds).toEqual([])
    })

    it('should cancel every effect when the root is disposed', () => {
      const store = createJobs()
      const a = store.send({ type: 'fetch', id: 'a' })
      const b = store.send({ type: 'fetch', id: 'b' })

      store.dispose()

      expect(a.isCancelled).toBe(true)
      expect(b.isCancelled).toBe(true)
    })
  })

  describe('follow-up sends', () => {
    type ChainAction = { type: 'go'; via: 'run' | 'send' } | { type: 'next' }

    const chainReducer = createReducer<JobState, ChainAction>({
      go: (state, action) => [
        state,
        [
          action.via === 'send'
            ? Effect.send({ type: 'next' })
            : Effect.run(({ send }) => send({ type: 'next' }), { name: 'go' })
        ]
      ],
      next: (state) => [state, [Effect.run(({ signal }) => waitForAbort(signal), { name: 'follow-up' })]]
    })

    it.each(['run', 'send'] as const)('should cancel the effects of actions sent on behalf of a task (%s)', async (via) => {
      const store = createStore<JobState, ChainAction>({ initialState: { results: [], events: [] }, reducer: chainReducer })
      const task = store.send({ type: 'go', via })
      const running = store.effectIds
      expect(running).toHaveLength(1)
      expect(task.effectIds).toContain(running[0])

      task.cancel()
      await task.finish()

      expect(task.isCancelled).toBe(true)
      expect(store.effectIds).toEqual([])
    })
  })

  it('should not start effects when a change listener disposes the store', () => {
    const body = vi.fn()
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        ordered: (state) => [state, [Effect.run(body)]]
      })
    })
    store.subscribe(() => store.dispose())

    const task = store.send({ type: 'ordered' })

    expect(store.isInvalid()).toBe(true)
    expect(body).not.toHaveBeenCalled()
    expect(task.effectIds).toEqual([])
    expect(store.effectIds).toEqual([])
  })

  it('should report a send without effects as cancelled', () => {
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        loaded: (state, action) => [{ ...state, results: [...state.results, action.id] }, []]
      })
    })

    const task = store.send({ type: 'loaded', id: 'x' })

    expect(store.state.results).toEqual(['x'])
    expect(task.effectIds).toEqual([])
    expect(task.isCancelled).toBe(true)
  })

  it('should let an effect dismiss itself and drop what it sends afterwards', () => {
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        fetch: (state, action) => [
          state,
          [
            Effect.run(({ dismiss, send }) => {
              dismiss()
              send({ type: 'loaded', id: action.id })
            })
          ]
        ],
        loaded: (state, action) => [{ ...state, results: [...state.results, action.id] }, []]
      })
    })

    const task = store.send({ type: 'fetch', id: 'x' })

    expect(task.isCancelled).toBe(true)
    expect(store.state.results).toEqual([])
  })

  it('should keep an awaitCleanup effect until its body settles', async () => {
    const cleanup = gate()
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        fetch: (state) => [
          state,
          [
            Effect.run(
              async ({ signal }) => {
                await waitForAbort(signal)
                await cleanup.promise
              },
              { cancelId: 'slow', awaitCleanup: true }
            )
          ]
        ],
        stop: (state) => [state, [Effect.cancel('slow')]]
      })
    })

    const task = store.send({ type: 'fetch', id: 'x' })
    store.send({ type: 'stop', id: 'x' })

    expect(store.effectIds).toEqual([1])
    expect(task.isCancelled).toBe(false)

    cleanup.open()
    await task.finish()

    expect(store.effectIds).toEqual([])
    expect(task.isCancelled).toBe(true)
  })

  it('should warn when an effect sends after it completed', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    let late: (action: JobAction) => void = () => {}
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        fetch: (state) => [
          state,
          [
            Effect.run(({ send }) => {
              late = send
            })
          ]
        ],
        loaded: (state, action) => [{ ...state, results: [...state.results, action.id] }, []]
      })
    })

    await store.send({ type: 'fetch', id: 'x' }).finish()
    late({ type: 'loaded', id: 'x' })

    expect(store.state.results).toEqual([])
    expect(warn).toHaveBeenCalledWith('[TREE-STORE] effect 1 sent "loaded" after it completed. The action was discarded.')
  })

  it('should log effects that throw or reject', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const thrown = new Error('sync failure')
    const rejected = new Error('async failure')
    const store = createStore<JobState, JobAction>({
      initialState: { results: [], events: [] },
      reducer: createReducer<JobState, JobAction>({
        fetch: (state) => [
          state,
          [
            Effect.run(() => {
              throw thrown
            }),
            Effect.run(
              async () => {
                throw rejected
              },
              { name: 'loader' }
            )
          ]
        ]
      })
    })

    await store.send({ type: 'fetch', id: 'x' }).finish()

    expect(error).toHaveBeenCalledWith('[TREE-STORE] effect 1 threw while starting.', thrown)
    expect(error).toHaveBeenCalledWith('[TREE-STORE] loader failed.', rejected)
    expect(store.effectIds).toEqual([])
  })
})

describe('Downloads', () => {
  interface Download {
    id: string
    progress: number
  }

  interface DownloadsState {
    rows: readonly Download[]
  }

  type RowAction = { type: 'start' } | { type: 'progress'; value: number }

  type DownloadsAction =
    | { type: 'rows'; action: IdentifiedAction<string, RowAction> }
    | { type: 'remove'; id: string }

  it('should cancel only the downloads of removed rows', async () => {
    const progress = gate()
    const rowReducer = createReducer<Download, RowAction>({
      start: (row) => [
        row,
        [
          Effect.run(
            async ({ signal, send }) => {
              await Promise.race([progress.promise, waitForAbort(signal)])
              if (!signal.aborted) send({ type: 'progress', value: 50 })
            },
            { name: `download ${row.id}` }
          )
        ]
      ],
      progress: (row, action) => [{ ...row, progress: action.value }, []]
    })
    const rowsAction = actionCase<DownloadsAction>()('rows')
    const store: Store<DownloadsState, DownloadsAction> = createStore<DownloadsState, DownloadsAction>({
      initialState: {
        rows: [
          { id: 'a', progress: 0 },
          { id: 'b', progress: 0 }
        ]
      },
      reducer: combineReducers(
        createReducer<DownloadsState, DownloadsAction>({
          remove: (state, action) => [{ rows: removeElement(state.rows, (row) => row.id, action.id) }, []]
        }),
        forEach(path<DownloadsState>().at('rows'), rowsAction, (row) => row.id, rowReducer)
      )
    })
    const rows = store.scopeCollection(path<DownloadsState>().at('rows'), rowsAction, {
      id: (row) => row.id,
      placeholder: { id: '', progress: 0 }
    })
    const rowA = rows.at(0)
    const rowB = rows.at(1)

    const taskA = rowA.send({ type: 'start' })
    const taskB = rowB.send({ type: 'start' })
    expect(rowA.effectIds).toEqual([1])
    expect(rowB.effectIds).toEqual([2])

    store.send({ type: 'remove', id: 'a' })

    expect(taskA.isCancelled).toBe(true)
    expect(taskB.isCancelled).toBe(false)
    expect(store.effectIds).toEqual([2])

    progress.open()
    await taskB.finish()

    expect(store.state.rows).toEqual([{ id: 'b', progress: 50 }])
    expect(rowB.state.progress).toBe(50)
  })
})
