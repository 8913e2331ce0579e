import { UNRECOGNIZED } from "../../ports/classification"
import { Status } from "../status"

describe("Status", () => {
  describe("construction", () => {
    it("starts with the classification and nothing else", () => {
      const status = new Status("not_found")

      expect(status.classification).toBe("not_found")
      expect(status.id).toBe("not_found")
      expect(status.entries()).toEqual([])
      expect(status.cause).toBeUndefined()
      expect(status.literal).toBeUndefined()
      expect(status.isInternalCause).toBe(false)
    })

    it("is an Error named after its class", () => {
      const status = new Status("io_error")

      expect(status).toBeInstanceOf(Error)
      expect(status.name).toBe("Status")
      expect(status.message).toBe("io_error")
      expect(status.stack).toContain("Status")
    })

    it("reports the original id of an unrecognized classification", () => {
      const status = new Status(UNRECOGNIZED, { unrecognizedId: "quota_exceeded" })

      expect(status.classification).toBe(UNRECOGNIZED)
      expect(status.id).toBe("quota_exceeded")
    })

    it("falls back to a generic id for an unrecognized classification without one", () => {
      const status = new Status(UNRECOGNIZED)

      expect(status.id).toBe("unrecognized")
    })
  })

  describe("withContext", () => {
    it("appends entries in call order and returns the same status", () => {
      const status = new Status("not_found")

      const returned = status.withContext("path", "/etc/x").withContext("attempt", 2)

      expect(returned).toBe(status)
      expect(status.entries()).toEqual([
        { key: "path", value: "/etc/x" },
        { key: "attempt", value: 2 },
      ])
    })

    it("keeps every refinement of a repeated key", () => {
      const status = new Status("not_found")
        .withContext("path", "/var/lib/app/cfg")
        .withContext("path", "~/app.toml")

      expect(status.context.latest("path")).toBe("~/app.toml")
      expect(status.context.history("path")).toEqual(["/var/lib/app/cfg", "~/app.toml"])
    })

    it("withContextEntries appends one entry per property", () => {
      const status = new Status("io_error").withContextEntries({ path: "/tmp/x", bytes: 512 })

      expect(status.entries()).toEqual([
        { key: "path", value: "/tmp/x" },
        { key: "bytes", value: 512 },
      ])
    })
  })

  describe("withMessage", () => {
    it("sets the literal message without clearing context", () => {
      const status = new Status("io_error")
        .withContext("path", "/tmp/x")
        .withMessage("disk quota exceeded")

      expect(status.literal).toBe("disk quota exceeded")
      expect(status.message).toBe("disk quota exceeded")
      expect(status.context.latest("path")).toBe("/tmp/x")
    })

    it("overrides an earlier literal message", () => {
      const status = new Status("io_error").withMessage("first").withMessage("second")

      expect(status.literal).toBe("second")
    })
  })

  describe("wrap", () => {
    it("keeps the prior status as the exact cause", () => {
      const prior = new Status("io_error").withContext("path", "/etc/app.toml")

      const outer = Status.wrap("config.load_failed", prior)

      expect(outer.cause).toBe(prior)
      expect(outer.classification).toBe("config.load_failed")
    })

    it("gives the wrapper an empty, independent context", () => {
      const prior = new Status("io_error").withContext("path", "/etc/app.toml")

      const outer = Status.wrap("config.load_failed", prior).withContext("source", "defaults")

      expect(outer.entries()).toEqual([{ key: "source", value: "defaults" }])
      expect(prior.entries()).toEqual([{ key: "path", value: "/etc/app.toml" }])
    })

    it("marks internal causes", () => {
      const prior = new Status("io_error")

      expect(Status.wrap("config.load_failed", prior, { internal: true }).isInternalCause).toBe(
        true,
      )
      expect(Status.wrap("config.load_failed", prior).isInternalCause).toBe(false)
    })
  })

  describe("chain", () => {
    const root = new Status("io_error")
    const middle = Status.wrap("not_found", root, { internal: true })
    const outer = Status.wrap("config.load_failed", middle)

    it("walks public causes outermost first", () => {
      expect([...outer.chain()]).toEqual([outer, middle])
    })

    it("walks internal causes on request", () => {
      expect([...outer.chain({ includeInternal: true })]).toEqual([outer, middle, root])
    })

    it("can be iterated more than once", () => {
      const chain = outer.chain({ includeInternal: true })

      expect([...chain].map((s) => s.id)).toEqual(["config.load_failed", "not_found", "io_error"])
      expect([...chain].map((s) => s.id)).toEqual(["config.load_failed", "not_found", "io_error"])
    })

    it("is lazy", () => {
      const iterator = outer.chain()[Symbol.iterator]()

      expect(iterator.next().value).toBe(outer)
    })
  })

  it("toJSON produces the serialized form", () => {
    const status = new Status("not_found").withContext("path", "/etc/x")

    expect(JSON.parse(JSON.stringify(status))).toEqual({
      id: "not_found",
      context: [{ key: "path", value: { type: "string", value: "/etc/x" } }],
    })
  })
})
