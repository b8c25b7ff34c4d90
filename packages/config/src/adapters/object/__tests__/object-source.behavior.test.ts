import { InvalidFlagValueError } from "../../../core/errors/errors"
import { MENTIONED } from "../../../core/markers"
import { ConfigParser } from "../../../core/config-parser"
import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  const parser = new ConfigParser()
  parser.addConfig("level")
  parser.addConfig("paths", { action: "extend" })
  parser.addConfig("debug", { action: "store_true" })
  parser.addConfig("quiet", { action: "count" })
  const specs = parser.configItems()

  it("is named 'object' unless a name is given", () => {
    expect(new ObjectSource({}).name).toBe("object")
    expect(new ObjectSource({}, { name: "object:overrides" }).name).toBe("object:overrides")
  })

  it("keeps an array as one value for store items", () => {
    const source = new ObjectSource({ level: ["a", "b"] })

    expect(source.getConfig(specs)).toEqual({ level: [["a", "b"]] })
  })

  it("spreads arrays for accumulating items", () => {
    const source = new ObjectSource({ paths: [["/a", "/b"], "/c"] })

    expect(source.getConfig(specs)).toEqual({ paths: [["/a", "/b"], "/c"] })
  })

  it("treats undefined as absent", () => {
    const source = new ObjectSource({ level: undefined, quiet: undefined })

    expect(source.getConfig(specs)).toEqual({})
  })

  it("reports null and MENTIONED as mentions of a flag", () => {
    const source = new ObjectSource({ debug: null, quiet: [MENTIONED, null] })

    expect(source.getConfig(specs)).toEqual({ debug: [MENTIONED], quiet: [MENTIONED, MENTIONED] })
  })

  it("rejects other values for a flag", () => {
    const source = new ObjectSource({ debug: true })

    expect(() => source.getConfig(specs)).toThrow(InvalidFlagValueError)
  })

  it("accepts custom none values", () => {
    const source = new ObjectSource({ debug: "yes" }, { noneValues: ["yes"] })

    expect(source.getConfig(specs)).toEqual({ debug: [MENTIONED] })
  })

  it("ignores keys that are not registered items", () => {
    const source = new ObjectSource({ level: "info", unknown: 1 })

    expect(source.getConfig(specs)).toEqual({ level: ["info"] })
  })

  it("does not see later changes to the given object", () => {
    const values: Record<string, unknown> = { level: "info" }
    const source = new ObjectSource(values)

    values.level = "debug"

    expect(source.getConfig(specs)).toEqual({ level: ["info"] })
  })

  it("does not see later changes to nested values", () => {
    const db = { host: "localhost" }
    const source = new ObjectSource({ level: db })

    db.host = "changed"

    expect(source.getConfig(specs)).toEqual({ level: [{ host: "localhost" }] })
  })

  it("returns fresh arrays and objects on every read", () => {
    const source = new ObjectSource({ level: { hosts: ["a"] }, paths: [["/a"]] })

    const first = source.getConfig(specs)
    const second = source.getConfig(specs)

    expect(second).toEqual(first)
    expect(second.level?.[0]).not.toBe(first.level?.[0])
    expect(second.paths?.[0]).not.toBe(first.paths?.[0])
  })
})
