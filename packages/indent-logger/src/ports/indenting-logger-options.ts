/**
 * Configuration options for an IndentingLogger instance.
 */
export type IndentingLoggerOptions = {
  /**
   * Whether the logger starts out enabled.
   * @default true
   */
  enabled: boolean

  /**
   * String appended once per nesting level. Must not be empty.
   * @default "  "
   */
  indentUnit: string
}
