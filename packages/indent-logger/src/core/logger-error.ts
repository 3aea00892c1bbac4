export type LoggerErrorCode = "invalid_options" | "invariant_violation"

export type LoggerErrorContext = Readonly<Record<string, unknown>>

export type LoggerErrorOptions = Readonly<{
  code: LoggerErrorCode
  context?: LoggerErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * Serialized error shape, safe to pass to JSON.stringify.
 */
export type SerializedLoggerError = Readonly<{
  name: string
  code: LoggerErrorCode
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: string
}>

export class LoggerError extends Error {
  readonly code: LoggerErrorCode
  readonly context: LoggerErrorContext
  /**
   * `false` for programmer errors such as a broken internal invariant,
   * `true` for bad input the caller can fix.
   * @default true
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: LoggerErrorOptions) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedLoggerError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      timestamp: this.timestamp.toISOString(),
      isOperational: this.isOperational,
      ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
    }
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`
  return typeof cause === "string" ? cause : "Unknown cause"
}

export function isLoggerError(e: unknown): e is LoggerError {
  return e instanceof LoggerError
}
