import { LoggerError, isLoggerError } from "../logger-error"

describe("LoggerError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("sets name, code and message", () => {
      const err = new LoggerError("bad unit", { code: "invalid_options" })

      expect(err.name).toBe("LoggerError")
      expect(err.code).toBe("invalid_options")
      expect(err.message).toBe("bad unit")
    })

    it("defaults isOperational to true", () => {
      const err = new LoggerError("bad unit", { code: "invalid_options" })

      expect(err.isOperational).toBe(true)
    })

    it("accepts isOperational false for invariant violations", () => {
      const err = new LoggerError("broken", {
        code: "invariant_violation",
        isOperational: false,
      })

      expect(err.isOperational).toBe(false)
    })

    it("freezes context", () => {
      const err = new LoggerError("broken", {
        code: "invariant_violation",
        context: { indentLevel: 3 },
      })

      expect(err.context).toEqual({ indentLevel: 3 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults context to an empty frozen object", () => {
      const err = new LoggerError("bad unit", { code: "invalid_options" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root")
      const err = new LoggerError("wrapped", { code: "invalid_options", cause })

      expect(err.cause).toBe(cause)
    })

    it("sets timestamp to the current time", () => {
      const err = new LoggerError("bad unit", { code: "invalid_options" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error without a cause", () => {
      const err = new LoggerError("broken", {
        code: "invariant_violation",
        context: { indentLevel: 1 },
        isOperational: false,
      })

      expect(err.toJSON()).toEqual({
        name: "LoggerError",
        code: "invariant_violation",
        message: "broken",
        context: { indentLevel: 1 },
        timestamp: "2024-01-15T10:30:00.000Z",
        isOperational: false,
      })
    })

    it("describes an Error cause by name and message", () => {
      const err = new LoggerError("wrapped", {
        code: "invalid_options",
        cause: new TypeError("not a string"),
      })

      expect(err.toJSON().cause).toBe("TypeError: not a string")
    })

    it("survives JSON.stringify", () => {
      const err = new LoggerError("bad unit", { code: "invalid_options", cause: "raw" })

      expect(JSON.parse(JSON.stringify(err))).toMatchObject({
        code: "invalid_options",
        cause: "raw",
      })
    })
  })

  describe("isLoggerError", () => {
    it("accepts LoggerError instances only", () => {
      expect(isLoggerError(new LoggerError("x", { code: "invalid_options" }))).toBe(true)
      expect(isLoggerError(new Error("x"))).toBe(false)
      expect(isLoggerError({ code: "invalid_options" })).toBe(false)
    })
  })
})
