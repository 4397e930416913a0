import { CodedFailure } from "../../coded-failure"
import { ErrorKinds } from "../../error-kinds"
import { createFailure } from "../create-failure"
import { failuresEqual } from "../failures-equal"
import { toFailure } from "../to-failure"

describe("failuresEqual", () => {
  const gas = createFailure(ErrorKinds.InsufficientGas, "gas exhausted")

  it("is reflexive", () => {
    expect(failuresEqual(gas, gas)).toBe(true)
  })

  it("compares by kind and message, not identity", () => {
    const same = new CodedFailure("gas exhausted", { kind: ErrorKinds.InsufficientGas })

    expect(failuresEqual(gas, same)).toBe(true)
    expect(failuresEqual(same, gas)).toBe(true)
  })

  it("distinguishes kinds", () => {
    const other = createFailure(ErrorKinds.Generic, "gas exhausted")

    expect(failuresEqual(gas, other)).toBe(false)
    expect(failuresEqual(other, gas)).toBe(false)
  })

  it("distinguishes messages", () => {
    const other = createFailure(ErrorKinds.InsufficientGas, "out of gas")

    expect(failuresEqual(gas, other)).toBe(false)
  })

  it("treats two absent failures as equal", () => {
    expect(failuresEqual(undefined, undefined)).toBe(true)
    expect(failuresEqual(null, createFailure(ErrorKinds.Generic, ""))).toBe(true)
  })

  it("never equates absent and present", () => {
    expect(failuresEqual(undefined, gas)).toBe(false)
    expect(failuresEqual(gas, undefined)).toBe(false)
  })

  it("ignores causes", () => {
    const withCause = createFailure(ErrorKinds.InsufficientGas, "gas exhausted", {
      cause: new Error("meter"),
    })

    expect(failuresEqual(gas, withCause)).toBe(true)
  })

  it("coerces plain errors before comparing", () => {
    const generic = createFailure(ErrorKinds.Generic, "disk full")

    expect(failuresEqual(new Error("disk full"), generic)).toBe(true)
  })

  it("holds for a failure and its coerced form", () => {
    const f = createFailure(ErrorKinds.CallStackOverflow, "depth 1025")
    const err: unknown = f

    expect(failuresEqual(toFailure(err), f)).toBe(true)
  })
})
