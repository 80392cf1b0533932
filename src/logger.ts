/**
 * Lifecycle logger. Collects lines such as `Store.init` and `Store.detach`
 * so tooling and tests can inspect them, and echoes them to the console
 * while enabled.
 */
export class Logger {
  static readonly shared = new Logger()

  isEnabled = false
  readonly logs: string[] = []

  log(message: string): void {
    if (!this.isEnabled) return
    this.logs.push(message)
    console.log(`[TREE-STORE] ${message}`)
  }

  clear(): void {
    this.logs.length = 0
  }
}
