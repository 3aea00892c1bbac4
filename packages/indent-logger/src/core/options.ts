import { z } from "zod"
import type { IndentingLoggerOptions } from "../ports/indenting-logger-options"
import { DEFAULT_INDENT_UNIT } from "./indent-cache"
import { LoggerError } from "./logger-error"

export const DEFAULT_ENV_PREFIX = "INDENTLOG_"

export const indentingLoggerOptionsSchema = z.object({
  enabled: z.boolean().default(true),
  indentUnit: z.string().min(1, "indentUnit must not be empty").default(DEFAULT_INDENT_UNIT),
})

const envOptionsSchema = z.object({
  ENABLED: z.stringbool().optional(),
  INDENT_UNIT: z.string().optional(),
})

const ENV_KEYS: ReadonlySet<string> = new Set(Object.keys(envOptionsSchema.shape))

export type EnvOptionsSource = {
  /** Key prefix, stripped before lookup. Default: `INDENTLOG_` */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Fills in defaults and validates logger options.
 *
 * @throws LoggerError with code `invalid_options` when validation fails.
 */
export function resolveIndentingLoggerOptions(
  opts: Partial<IndentingLoggerOptions> = {},
): IndentingLoggerOptions {
  const result = indentingLoggerOptionsSchema.safeParse(opts)

  if (!result.success) {
    throw new LoggerError(`Invalid logger options:\n${z.prettifyError(result.error)}`, {
      code: "invalid_options",
      cause: result.error,
    })
  }

  return result.data
}

/**
 * Reads logger options from environment variables such as
 * `INDENTLOG_ENABLED=false` and `INDENTLOG_INDENT_UNIT="    "`.
 *
 * Nothing reads the environment implicitly; pass the result to the logger
 * constructor.
 *
 * @throws LoggerError with code `invalid_options` when a value does not parse.
 */
export function readIndentingLoggerOptions(source: EnvOptionsSource = {}): IndentingLoggerOptions {
  const result = envOptionsSchema.safeParse(selectPrefixed(source))

  if (!result.success) {
    throw new LoggerError(`Invalid logger environment:\n${z.prettifyError(result.error)}`, {
      code: "invalid_options",
      context: { prefix: source.prefix ?? DEFAULT_ENV_PREFIX },
      cause: result.error,
    })
  }

  return resolveIndentingLoggerOptions({
    enabled: result.data.ENABLED,
    indentUnit: result.data.INDENT_UNIT,
  })
}

/** Keys under the prefix that name no logger option, e.g. typos. */
export function unknownEnvKeys(source: EnvOptionsSource = {}): string[] {
  return Object.keys(selectPrefixed(source)).filter((key) => !ENV_KEYS.has(key))
}

function selectPrefixed(source: EnvOptionsSource): Record<string, string> {
  const prefix = source.prefix ?? DEFAULT_ENV_PREFIX
  const env = source.env ?? process.env
  const selected: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && key.startsWith(prefix)) {
      selected[key.slice(prefix.length)] = value
    }
  }

  return selected
}
