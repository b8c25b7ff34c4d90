import { ResolvedConfig } from "../resolved-config"

describe("ResolvedConfig", () => {
  const data = { port: 3000, debug: false, host: "localhost", tags: null }
  const provenance = new Map([
    ["port", "env"],
    ["host", "dotenv:.env"],
  ])

  const config = new ResolvedConfig(data, provenance)

  describe("get", () => {
    it("returns value by name", () => {
      expect(config.get("port")).toBe(3000)
      expect(config.get("host")).toBe("localhost")
      expect(config.get("tags")).toBeNull()
    })

    it("returns undefined for names not in the namespace", () => {
      expect(config.get("missing")).toBeUndefined()
      expect(config.get("toString")).toBeUndefined()
      expect(config.get("constructor")).toBeUndefined()
    })
  })

  describe("keys / has", () => {
    it("returns names in insertion order", () => {
      expect(config.keys()).toEqual(["port", "debug", "host", "tags"])
    })

    it("tells whether a name is present", () => {
      expect(config.has("tags")).toBe(true)
      expect(config.has("missing")).toBe(false)
      expect(config.has("toString")).toBe(false)
    })
  })

  describe("explain", () => {
    it("returns source name for an item from a source", () => {
      expect(config.explain("port")).toBe("env")
      expect(config.explain("host")).toBe("dotenv:.env")
    })

    it("returns 'default' for an item without a source", () => {
      expect(config.explain("debug")).toBe("default")
      expect(config.explain("tags")).toBe("default")
    })

    it("does not read inherited object members", () => {
      expect(config.explain("constructor")).toBe("default")
      expect(config.explain("hasOwnProperty")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("returns unique names in item order", () => {
      expect(config.sourcesUsed()).toEqual(["env", "default", "dotenv:.env"])
    })
  })

  describe("immutability", () => {
    it("value is frozen", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
      expect(() => Object.assign(config.value, { port: 9999 })).toThrow(TypeError)
    })
  })
})
