export {
  NullIndentingLogger,
  createNullIndentingLogger,
} from "./adapters/null/null-indenting-logger"
export {
  StdoutIndentingLogger,
  type StdoutIndentingLoggerDeps,
  createIndentingLogger,
} from "./adapters/stdout/stdout-indenting-logger"
export { formatMessage } from "./core/format"
export { DEFAULT_INDENT_UNIT, IndentCache } from "./core/indent-cache"
export {
  LoggerError,
  type LoggerErrorCode,
  type LoggerErrorContext,
  type LoggerErrorOptions,
  type SerializedLoggerError,
  isLoggerError,
} from "./core/logger-error"
export {
  DEFAULT_ENV_PREFIX,
  type EnvOptionsSource,
  indentingLoggerOptionsSchema,
  readIndentingLoggerOptions,
  resolveIndentingLoggerOptions,
  unknownEnvKeys,
} from "./core/options"
export { captureStackFrames, parseStackFrames } from "./core/stack-trace"
export type { IndentingLogger } from "./ports/indenting-logger"
export type { IndentingLoggerOptions } from "./ports/indenting-logger-options"
export type { OutputSink } from "./ports/output-sink"
