import { isLogLevelName, LogLevels, logLevelNames } from "../log-level"

describe("log levels", () => {
  it("orders severities from trace to fatal", () => {
    const severities = [
      LogLevels.Trace,
      LogLevels.Debug,
      LogLevels.Info,
      LogLevels.Warn,
      LogLevels.Error,
      LogLevels.Fatal,
    ]

    expect(severities).toEqual([10, 20, 30, 40, 50, 60])
    expect(logLevelNames).toHaveLength(severities.length)
  })

  it("recognizes level names", () => {
    expect(isLogLevelName("debug")).toBe(true)
    expect(isLogLevelName("verbose")).toBe(false)
    expect(isLogLevelName(20)).toBe(false)
  })
})
