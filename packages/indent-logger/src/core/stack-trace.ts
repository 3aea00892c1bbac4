const FRAME_PREFIX = "at "

/**
 * Captures the current call stack as one string per frame, innermost first.
 *
 * Frame 0 is this function and frame 1 its caller. Callers hide themselves by
 * slicing off a fixed number of leading entries, so keep every capture behind
 * this single function.
 *
 * The depth is not capped by `Error.stackTraceLimit`.
 */
export function captureStackFrames(): string[] {
  const previousLimit = Error.stackTraceLimit
  let stack: string | undefined

  Error.stackTraceLimit = Number.POSITIVE_INFINITY
  try {
    stack = new Error().stack
  } finally {
    Error.stackTraceLimit = previousLimit
  }

  return parseStackFrames(stack)
}

/** Extracts frame descriptions from a V8 stack string, without the `at ` marker. */
export function parseStackFrames(stack: string | undefined): string[] {
  if (!stack) return []

  return stack
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith(FRAME_PREFIX))
    .map((line) => line.slice(FRAME_PREFIX.length))
}
