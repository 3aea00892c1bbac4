import type { IndentingLogger } from "../../ports/indenting-logger"

/**
 * Logger that never writes.
 *
 * @remarks
 * Stays disabled permanently: assigning `enabled` is accepted and ignored, so
 * `enabled` always reads `false` and `indentLevel` always reads 0.
 */
export class NullIndentingLogger implements IndentingLogger {
  get enabled(): boolean {
    return false
  }

  set enabled(_value: boolean) {}

  get indentLevel(): number {
    return 0
  }

  log(_format: string, ..._args: unknown[]): void {}

  logStackTrace(): void {}

  indent(): void {}

  exdent(): void {}

  resetIndent(): void {}

  group<T>(fn: () => T): T {
    return fn()
  }
}

export function createNullIndentingLogger(): IndentingLogger {
  return new NullIndentingLogger()
}
