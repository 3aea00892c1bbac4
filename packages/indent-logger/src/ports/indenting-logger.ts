export interface IndentingLogger {
  /**
   * Whether output is produced. When false every operation is a no-op.
   *
   * @remarks
   * Settable by the owner at any time, except on NullIndentingLogger, which
   * stays disabled. Calls skipped while disabled are not replayed when the
   * logger is enabled again.
   */
  enabled: boolean

  /** Current nesting depth. Never negative. */
  readonly indentLevel: number

  /**
   * Writes the current indent followed by the printf-style formatted message.
   *
   * The indent is applied once, at the start of the output; line breaks inside
   * the message are not re-indented and no trailing newline is added.
   */
  log(format: string, ...args: unknown[]): void

  /** Writes one indented line per frame of the caller's stack. */
  logStackTrace(): void

  indent(): void

  /**
   * Decreases the depth by one level. At depth 0 the depth is left alone and a
   * warning plus a stack trace are logged instead.
   */
  exdent(): void

  resetIndent(): void

  /** Runs `fn` one level deeper, restoring the depth when it returns or throws. */
  group<T>(fn: () => T): T
}
