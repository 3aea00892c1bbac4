import { DEFAULT_INDENT_UNIT, IndentCache } from "../indent-cache"

describe("IndentCache", () => {
  it("starts with only the empty depth-0 entry", () => {
    const cache = new IndentCache()

    expect(cache.size).toBe(1)
    expect(cache.get(0)).toBe("")
  })

  it("defaults to a two-space unit", () => {
    expect(DEFAULT_INDENT_UNIT).toBe("  ")
    expect(new IndentCache().get(2)).toBe("    ")
  })

  it("grows sequentially up to the requested depth", () => {
    const cache = new IndentCache("-")

    expect(cache.get(3)).toBe("---")
    expect(cache.size).toBe(4)
    expect(cache.get(1)).toBe("-")
    expect(cache.get(2)).toBe("--")
  })

  it("returns the cached string for a repeated depth without growing", () => {
    const cache = new IndentCache()

    const first = cache.get(5)
    const sizeAfterFirst = cache.size
    const second = cache.get(5)

    expect(second).toBe(first)
    expect(cache.size).toBe(sizeAfterFirst)
  })

  it("never shrinks when a shallower depth is requested", () => {
    const cache = new IndentCache()

    cache.get(4)
    cache.get(1)

    expect(cache.size).toBe(5)
  })
})
