import { UNRECOGNIZED } from "../../../ports/classification"
import { Kinds } from "../../../tests/fixtures"
import { contextFloat, contextMap } from "../../context/context-value"
import { Status } from "../../status"
import { statusFromJSON } from "../parse-status"
import { serializeStatus, serializeValue } from "../serialize-status"

describe("serializeValue", () => {
  it("tags every value type", () => {
    expect(serializeValue("x")).toEqual({ type: "string", value: "x" })
    expect(serializeValue(4)).toEqual({ type: "integer", value: 4 })
    expect(serializeValue(4.5)).toEqual({ type: "float", value: 4.5 })
    expect(serializeValue(true)).toEqual({ type: "boolean", value: true })
    expect(serializeValue(null)).toEqual({ type: "null", value: null })
    expect(serializeValue([1, "a"])).toEqual({
      type: "list",
      value: [
        { type: "integer", value: 1 },
        { type: "string", value: "a" },
      ],
    })
    expect(serializeValue(contextMap({ port: 80 }))).toEqual({
      type: "map",
      value: [{ key: "port", value: { type: "integer", value: 80 } }],
    })
  })

  it("writes wide integers as decimal strings and keeps integral floats as floats", () => {
    expect(serializeValue(2n ** 60n)).toEqual({ type: "integer", value: "1152921504606846976" })
    expect(serializeValue(contextFloat(2))).toEqual({ type: "float", value: 2 })
    expect(serializeValue(contextFloat(-0))).toEqual({ type: "float", value: "-0" })
  })

  it("spells out non-finite floats", () => {
    expect(serializeValue(Number.NaN)).toEqual({ type: "float", value: "NaN" })
    expect(serializeValue(Number.POSITIVE_INFINITY)).toEqual({ type: "float", value: "Infinity" })
    expect(serializeValue(Number.NEGATIVE_INFINITY)).toEqual({
      type: "float",
      value: "-Infinity",
    })
  })
})

describe("serializeStatus", () => {
  it("omits message and cause when absent", () => {
    const serialized = serializeStatus(new Status("not_found"))

    expect(serialized).toEqual({ id: "not_found", context: [] })
    expect("message" in serialized).toBe(false)
    expect("cause" in serialized).toBe(false)
  })

  it("nests the cause chain with its visibility", () => {
    const inner = new Status("io_error").withMessage("disk full")
    const outer = Status.wrap("config.load_failed", inner, { internal: true }).withContext(
      "source",
      "env",
    )

    expect(serializeStatus(outer)).toEqual({
      id: "config.load_failed",
      context: [{ key: "source", value: { type: "string", value: "env" } }],
      cause: {
        internal: true,
        status: { id: "io_error", message: "disk full", context: [] },
      },
    })
  })
})

describe("statusFromJSON", () => {
  it("rebuilds a status that survived JSON text", () => {
    const inner = new Status("io_error").withContext("ratio", Number.NaN)
    const outer = Status.wrap("not_found", inner)
      .withContext("path", "/etc/x")
      .withContext("ids", [1, 2.5])

    const result = statusFromJSON(JSON.parse(JSON.stringify(outer)), Kinds)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const decoded = result.status
    expect(decoded.classification).toBe("not_found")
    expect(decoded.entries()).toEqual([
      { key: "path", value: "/etc/x" },
      { key: "ids", value: [1, 2.5] },
    ])
    expect(decoded.cause?.classification).toBe("io_error")
    expect(decoded.cause?.context.latest("ratio")).toBeNaN()
    expect(decoded.isInternalCause).toBe(false)
  })

  it("keeps value types and map order through JSON text", () => {
    const status = new Status("io_error")
      .withContext("wide", 2n ** 60n)
      .withContext("whole", contextFloat(2))
      .withContext("negzero", contextFloat(-0))
      .withContext(
        "limits",
        contextMap([
          ["b", 1],
          ["1", 2],
        ]),
      )

    const result = statusFromJSON(JSON.parse(JSON.stringify(status)), Kinds)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const decoded = result.status
    expect(decoded.context.latest("wide")).toBe(2n ** 60n)
    expect(decoded.context.latest("whole")).toEqual({ kind: "float", value: 2 })
    expect(decoded.context.latest("negzero")).toEqual({ kind: "float", value: -0 })
    expect(serializeStatus(decoded)).toEqual(serializeStatus(status))
    expect(serializeStatus(decoded).context[3]?.value).toEqual({
      type: "map",
      value: [
        { key: "b", value: { type: "integer", value: 1 } },
        { key: "1", value: { type: "integer", value: 2 } },
      ],
    })
  })

  it("rejects integers wider than 64 bits and duplicate map keys", () => {
    const wide = statusFromJSON(
      {
        id: "io_error",
        context: [{ key: "n", value: { type: "integer", value: "9223372036854775808" } }],
      },
      Kinds,
    )
    const duplicate = statusFromJSON(
      {
        id: "io_error",
        context: [
          {
            key: "m",
            value: {
              type: "map",
              value: [
                { key: "x", value: { type: "null", value: null } },
                { key: "x", value: { type: "null", value: null } },
              ],
            },
          },
        ],
      },
      Kinds,
    )

    expect(wide.ok || wide.error.code).toBe("invalid_value")
    expect(duplicate.ok || duplicate.error.code).toBe("invalid_value")
  })

  it("maps unknown ids to the sentinel", () => {
    const result = statusFromJSON({ id: "quota_exceeded", context: [] }, Kinds)

    expect(result.ok && result.status.classification).toBe(UNRECOGNIZED)
    expect(result.ok && result.status.id).toBe("quota_exceeded")
  })

  it("reports structural problems as a DecodeError", () => {
    const result = statusFromJSON(
      { id: "not_found", context: [{ key: "n", value: { type: "integer", value: 1.5 } }] },
      Kinds,
    )

    expect(result.ok).toBe(false)
    if (result.ok) return

    expect(result.error.code).toBe("invalid_value")
    expect(result.error.message).toContain("Invalid serialized status")
  })

  it("rejects non-objects", () => {
    expect(statusFromJSON("not_found", Kinds).ok).toBe(false)
  })
})
