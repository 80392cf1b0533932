// =============================================================================
// EQUALITY CHECKING
// =============================================================================

/**
 * Equality comparison used to de-duplicate observed values.
 */
export type EqualityFn<T> = (a: T, b: T) => boolean

/**
 * Compares two containers of the same shape, delegating to `compare` for the
 * values they hold. Arrays, `Map`s, `Set`s, `Date`s and plain records are
 * containers; anything else only equals itself.
 */
function sameShape(a: unknown, b: unknown, compare: EqualityFn<unknown>): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false

  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, index) => compare(value, b[index]))
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !compare(value, b.get(key))) return false
    }
    return true
  }

  // set members are matched by identity at every depth
  if (a instanceof Set && b instanceof Set) {
    return a.size === b.size && [...a].every((value) => b.has(value))
  }

  const entriesA = Object.entries(a)
  if (entriesA.length !== Object.keys(b).length) return false
  const recordB = new Map(Object.entries(b))
  return entriesA.every(([key, value]) => recordB.has(key) && compare(value, recordB.get(key)))
}

/**
 * One level deep: members are compared with `Object.is`.
 *
 * @example
 * ```ts
 * store.observe((state) => state.entries, render, shallowEqual)
 * ```
 */
export function shallowEqual(a: unknown, b: unknown): boolean {
  return sameShape(a, b, Object.is)
}

/** Recursive structural equality. */
export function deepEqual(a: unknown, b: unknown): boolean {
  return sameShape(a, b, deepEqual)
}
