import { format } from "node:util"

/**
 * printf-style substitution (`%s`, `%d`, `%i`, `%f`, `%j`, `%o`, `%O`, `%%`).
 *
 * Surplus arguments are appended separated by spaces; specifiers without an
 * argument are left as written. `%%` always becomes `%`, including when no
 * arguments are given, which `util.format` alone would leave untouched.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  if (args.length === 0) return template.replaceAll("%%", "%")

  return format(template, ...args)
}
