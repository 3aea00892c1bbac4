export const DEFAULT_INDENT_UNIT = "  "

/**
 * Prefix strings indexed by depth.
 *
 * Entry 0 is always `""` and entry `i` is entry `i - 1` plus one unit. The
 * cache only grows, so each depth is built once for the lifetime of the cache.
 */
export class IndentCache {
  private readonly entries: string[] = [""]

  constructor(readonly unit: string = DEFAULT_INDENT_UNIT) {}

  /** Number of depths built so far. */
  get size(): number {
    return this.entries.length
  }

  get(level: number): string {
    for (let i = this.entries.length; i <= level; i++) {
      this.entries.push(`${this.entries[i - 1] ?? ""}${this.unit}`)
    }

    return this.entries[level] ?? ""
  }
}
