import { formatMessage } from "../../core/format"
import { IndentCache } from "../../core/indent-cache"
import { LoggerError } from "../../core/logger-error"
import { resolveIndentingLoggerOptions } from "../../core/options"
import { captureStackFrames } from "../../core/stack-trace"
import type { IndentingLogger } from "../../ports/indenting-logger"
import type { IndentingLoggerOptions } from "../../ports/indenting-logger-options"
import type { OutputSink } from "../../ports/output-sink"

export type StdoutIndentingLoggerDeps = {
  sink?: OutputSink
}

const EXDENT_AT_ZERO_WARNING = "Called exdent when indentation level was 0."

// captureStackFrames itself, logStackTrace and logStackTrace's caller
const SKIPPED_FRAMES = 3

export class StdoutIndentingLogger implements IndentingLogger {
  private readonly sink: OutputSink
  private readonly cache: IndentCache
  private isEnabled: boolean
  private level = 0
  /** Cached prefix for `level`, or undefined when it must be looked up again. */
  private currentIndent: string | undefined = undefined

  constructor(opts: Partial<IndentingLoggerOptions> = {}, deps: StdoutIndentingLoggerDeps = {}) {
    const resolved = resolveIndentingLoggerOptions(opts)

    this.sink = deps.sink ?? process.stdout
    this.cache = new IndentCache(resolved.indentUnit)
    this.isEnabled = resolved.enabled
  }

  get enabled(): boolean {
    return this.isEnabled
  }

  set enabled(value: boolean) {
    this.isEnabled = value
  }

  get indentLevel(): number {
    return this.level
  }

  log(format: string, ...args: unknown[]): void {
    if (!this.isEnabled) return

    this.sink.write(this.indentString())
    this.sink.write(formatMessage(format, args))
  }

  logStackTrace(): void {
    if (!this.isEnabled) return

    const frames = captureStackFrames().slice(SKIPPED_FRAMES)
    for (const frame of frames) {
      this.sink.write(`${this.indentString()}  ${frame}\n`)
    }
  }

  indent(): void {
    if (!this.isEnabled) return

    this.level++
    this.currentIndent = undefined
  }

  exdent(): void {
    if (!this.isEnabled) return

    if (this.level === 0) {
      this.log(EXDENT_AT_ZERO_WARNING)
      this.logStackTrace()
      return
    }

    this.level--
    this.currentIndent = undefined
  }

  resetIndent(): void {
    if (!this.isEnabled) return

    this.level = 0
    this.currentIndent = ""
  }

  group<T>(fn: () => T): T {
    if (!this.isEnabled) return fn()

    this.indent()
    try {
      return fn()
    } finally {
      this.exdent()
    }
  }

  private indentString(): string {
    if (!this.isEnabled) {
      throw new LoggerError("Indentation was resolved while logging is disabled", {
        code: "invariant_violation",
        context: { indentLevel: this.level },
        isOperational: false,
      })
    }

    if (this.currentIndent === undefined) {
      this.currentIndent = this.cache.get(this.level)
    }

    return this.currentIndent
  }
}

export function createIndentingLogger(
  enabled = true,
  deps: StdoutIndentingLoggerDeps = {},
): IndentingLogger {
  return new StdoutIndentingLogger({ enabled }, deps)
}
