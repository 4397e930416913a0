import { isLogLevelName, LogLevels, logLevelNames } from "../log-level"

describe("log levels", () => {
  it("orders names from least to most severe", () => {
    expect(logLevelNames).toEqual(["trace", "debug", "info", "warn", "error", "fatal"])
    expect(LogLevels.Trace).toBeLessThan(LogLevels.Fatal)
  })

  it("recognizes level names", () => {
    expect(isLogLevelName("warn")).toBe(true)
    expect(isLogLevelName("verbose")).toBe(false)
    expect(isLogLevelName(30)).toBe(false)
  })
})
