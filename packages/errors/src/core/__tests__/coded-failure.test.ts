import { CodedFailure } from "../coded-failure"
import { ErrorKinds } from "../error-kinds"

describe("CodedFailure", () => {
  describe("construction", () => {
    it("holds kind and message", () => {
      const f = new CodedFailure("gas exhausted", { kind: ErrorKinds.InsufficientGas })

      expect(f.kind).toBe(ErrorKinds.InsufficientGas)
      expect(f.message).toBe("gas exhausted")
    })

    it("sets name to constructor name", () => {
      const f = new CodedFailure("x", { kind: ErrorKinds.Generic })

      expect(f.name).toBe("CodedFailure")
    })

    it("accepts optional cause", () => {
      const cause = new Error("root cause")
      const f = new CodedFailure("wrapped", { kind: ErrorKinds.Generic, cause })

      expect(f.cause).toBe(cause)
    })

    it("omits cause when none is given", () => {
      const f = new CodedFailure("x", { kind: ErrorKinds.Generic })

      expect("cause" in f).toBe(false)
    })

    it("rejects an empty message", () => {
      expect(() => new CodedFailure("", { kind: ErrorKinds.Generic })).toThrow(RangeError)
    })

    it("rejects a kind that is not a uint32", () => {
      expect(() => new CodedFailure("x", { kind: -1 })).toThrow("Invalid error kind: -1")
      expect(() => new CodedFailure("x", { kind: 1.5 })).toThrow(RangeError)
    })

    it("accepts undeclared but valid kinds", () => {
      const f = new CodedFailure("x", { kind: 500 })

      expect(f.kind).toBe(500)
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error", () => {
      const f = new CodedFailure("x", { kind: ErrorKinds.Generic })

      expect(f instanceof Error).toBe(true)
    })

    it("can be thrown and caught", () => {
      const f = new CodedFailure("reverted", { kind: ErrorKinds.ExecutionReverted })

      expect(() => {
        throw f
      }).toThrow("reverted")
    })
  })

  describe("diagnostics", () => {
    it("message is not decorated", () => {
      const f = new CodedFailure("stack overflow", { kind: ErrorKinds.CallStackOverflow })

      expect(f.message).toBe("stack overflow")
    })

    it("toDebugString() includes kind and description", () => {
      const f = new CodedFailure("gas exhausted", { kind: ErrorKinds.InsufficientGas })

      expect(f.toDebugString()).toBe("Error 4 (Insufficient gas): gas exhausted")
    })

    it("toDebugString() describes undeclared kinds as unknown", () => {
      const f = new CodedFailure("odd", { kind: 99 })

      expect(f.toDebugString()).toBe("Error 99 (Unknown error): odd")
    })
  })
})
