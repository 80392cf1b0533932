import type { ElementId } from './identified'

/**
 * An index-addressable view of the element stores of an identified
 * collection, taken at the moment it was scoped. Element stores are built
 * lazily on first access and resolve their element by id, so a store keeps
 * following its element when other elements are inserted or removed.
 *
 * @example
 * ```ts
 * const rows = store.scopeCollection(path<AppState>().at('rows'), rowsAction, {
 *   id: (row) => row.id,
 *   placeholder: emptyRow
 * })
 * for (const row of rows) console.log(row.state.title)
 * ```
 */
export class StoreCollection<ID extends ElementId, E> implements Iterable<E> {
  constructor(
    readonly ids: readonly ID[],
    private readonly element: (id: ID, index: number) => E,
    private readonly outOfBounds: () => E
  ) {}

  get length(): number {
    return this.ids.length
  }

  /**
   * The store of the element at `index` in the snapshot, or an invalid store
   * reading the placeholder when `index` is outside it.
   */
  at(index: number): E {
    if (!Number.isInteger(index) || index < 0 || index >= this.ids.length) {
      return this.outOfBounds()
    }
    return this.element(this.ids[index], index)
  }

  map<R>(fn: (element: E, index: number) => R): R[] {
    return this.ids.map((_id, index) => fn(this.at(index), index))
  }

  *[Symbol.iterator](): Iterator<E> {
    for (let index = 0; index < this.ids.length; index++) {
      yield this.at(index)
    }
  }
}
