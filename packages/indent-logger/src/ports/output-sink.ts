/**
 * Destination for raw log text.
 *
 * Text is written exactly as given: the logger adds no newline and expects no
 * buffering or flushing from the sink. `process.stdout` satisfies this shape.
 */
export type OutputSink = {
  write(text: string): unknown
}
