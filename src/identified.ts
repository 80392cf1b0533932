// =============================================================================
// IDENTIFIED COLLECTIONS
// =============================================================================

/**
 * Stable identity of a collection element.
 */
export type ElementId = string | number

/**
 * An action addressed to one element of an identified collection.
 * @template ID The element id type.
 * @template A The element action type.
 */
export interface IdentifiedAction<ID extends ElementId, A> {
  readonly type: 'element'
  readonly id: ID
  readonly action: A
}

export function elementAction<ID extends ElementId, A>(id: ID, action: A): IdentifiedAction<ID, A> {
  return { type: 'element', id, action }
}

/**
 * Replaces the element with the given id, leaving the array unchanged (same
 * reference) when no element matches.
 */
export function updateElement<T, ID extends ElementId>(
  elements: readonly T[],
  identify: (element: T) => ID,
  id: ID,
  updater: (element: T) => T
): readonly T[] {
  const index = elements.findIndex((element) => identify(element) === id)
  if (index < 0) return elements
  const next = elements.slice()
  next[index] = updater(elements[index])
  return next
}

/**
 * Removes the element with the given id.
 */
export function removeElement<T, ID extends ElementId>(
  elements: readonly T[],
  identify: (element: T) => ID,
  id: ID
): readonly T[] {
  const index = elements.findIndex((element) => identify(element) === id)
  if (index < 0) return elements
  return [...elements.slice(0, index), ...elements.slice(index + 1)]
}
