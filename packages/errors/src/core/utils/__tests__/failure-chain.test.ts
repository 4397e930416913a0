import { CodedFailure } from "../../coded-failure"
import { ErrorKinds } from "../../error-kinds"
import { createFailure } from "../create-failure"
import { failureChain, rootFailure } from "../failure-chain"
import { wrapFailure } from "../wrap-failure"

describe("failureChain", () => {
  it("returns a single element for an unwrapped failure", () => {
    const f = createFailure(ErrorKinds.InsufficientGas, "gas exhausted")

    expect(failureChain(f)).toEqual([f])
  })

  it("returns every wrap layer, outermost first", () => {
    const root = createFailure(ErrorKinds.DataStackUnderflow, "pop on empty stack")
    const middle = wrapFailure(root, "ADD")
    const outer = wrapFailure(middle, "frame 0")

    const chain = failureChain(outer)

    expect(chain).toHaveLength(3)
    expect(chain[0]).toBe(outer)
    expect(chain[1]).toBe(middle)
    expect(chain[2]).toBe(root)
  })

  it("stops at a cause that is not a CodedFailure", () => {
    const f = new CodedFailure("load failed", {
      kind: ErrorKinds.Generic,
      cause: new Error("io"),
    })

    expect(failureChain(f)).toEqual([f])
  })

  it("returns an empty chain for non-failures", () => {
    expect(failureChain(undefined)).toEqual([])
    expect(failureChain(new Error("plain"))).toEqual([])
  })

  it("respects maxDepth", () => {
    let f = createFailure(ErrorKinds.ExecutionReverted, "revert")
    for (let i = 0; i < 9; i++) {
      f = wrapFailure(f, `frame ${i}`)
    }

    expect(failureChain(f, 5)).toHaveLength(5)
  })

  it("detects cycles", () => {
    const a = new CodedFailure("a", { kind: ErrorKinds.Generic })
    const b = new CodedFailure("b", { kind: ErrorKinds.Generic, cause: a })
    Object.defineProperty(a, "cause", { value: b })

    expect(failureChain(b)).toEqual([b, a])
  })
})

describe("rootFailure", () => {
  it("returns the innermost failure", () => {
    const root = createFailure(ErrorKinds.InvalidJumpDest, "jump to 0x20")

    expect(rootFailure(wrapFailure(wrapFailure(root, "JUMPI"), "frame 2"))).toBe(root)
  })

  it("returns undefined when there is no failure", () => {
    expect(rootFailure(undefined)).toBeUndefined()
  })
})
