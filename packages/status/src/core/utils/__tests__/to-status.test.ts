import { Status } from "../../status"
import { toStatus } from "../to-status"

describe("toStatus", () => {
  it("passes a Status through unchanged", () => {
    const status = new Status("not_found")

    expect(toStatus(status, "io_error")).toBe(status)
  })

  it("keeps an Error message as the literal message", () => {
    const status = toStatus(new TypeError("bad input"), "io_error")

    expect(status.classification).toBe("io_error")
    expect(status.literal).toBe("bad input")
    expect(status.context.latest("error_name")).toBe("TypeError")
    expect(status.cause).toBeUndefined()
  })

  it("turns Error causes into internal causes", () => {
    const root = new Error("ENOENT")
    const status = toStatus(new Error("read failed", { cause: root }), "io_error")

    expect(status.isInternalCause).toBe(true)
    expect(status.cause?.literal).toBe("ENOENT")
    expect([...status.chain()]).toHaveLength(1)
    expect([...status.chain({ includeInternal: true })]).toHaveLength(2)
  })

  it("keeps a Status found in the cause chain as is", () => {
    const inner = new Status("not_found").withContext("path", "/etc/x")
    const status = toStatus(new Error("wrapper", { cause: inner }), "io_error")

    expect(status.cause).toBe(inner)
  })

  it("cuts cause cycles", () => {
    const a = new Error("a")
    const b = new Error("b", { cause: a })
    a.cause = b

    const status = toStatus(a, "io_error")

    expect([...status.chain({ includeInternal: true })].map((s) => s.literal)).toEqual(["a", "b"])
  })

  it("uses a thrown string as the literal message", () => {
    expect(toStatus("boom", "io_error").literal).toBe("boom")
  })

  it("keeps other representable values under 'value'", () => {
    expect(toStatus({ code: 7 }, "io_error").context.latest("value")).toEqual(
      new Map([["code", 7]]),
    )
    expect(toStatus(2n ** 60n, "io_error").context.latest("value")).toBe(2n ** 60n)
  })

  it("drops values that cannot be represented", () => {
    expect(toStatus(Symbol("x"), "io_error").entries()).toEqual([])
    expect(toStatus(undefined, "io_error").entries()).toEqual([])
  })
})
