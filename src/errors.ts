/**
 * Diagnostics for misuse of the store runtime.
 *
 * The runtime has no recoverable error type. Scoping past absent state is
 * normal operation and degrades to an invalid store; the failures below are
 * programming defects and are thrown so they surface where they happen.
 */

const PREFIX = '[TREE-STORE]'

/**
 * Raised when a runtime precondition does not hold, e.g. an action sent
 * while a reducer is running or from outside the writer context.
 */
export class PreconditionFailure extends Error {
  constructor(message: string) {
    super(`${PREFIX} ${message}`)
    this.name = 'PreconditionFailure'
  }
}

/**
 * Throws a {@link PreconditionFailure}. Returns never for proper narrowing.
 */
export function preconditionFailure(message: string): never {
  throw new PreconditionFailure(message)
}

/**
 * Reports non-fatal misuse to the console.
 */
export function reportIssue(message: string): void {
  console.warn(`${PREFIX} ${message}`)
}

/**
 * Logs an error raised by user code the runtime does not interpret
 * (effect bodies, change listeners).
 */
export function reportError(context: string, error: unknown): void {
  console.error(`${PREFIX} ${context}`, error)
}
