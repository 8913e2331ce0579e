import { loadStatusConfig } from "../load-status-config"

describe("loadStatusConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadStatusConfig({ env: {} })).toEqual({
      locale: "en-US",
      unknownMarker: "<unknown>",
      maxDecodeDepth: undefined,
      includeInternal: false,
    })
  })

  it("reads STATUS_-prefixed variables and ignores the rest", () => {
    const config = loadStatusConfig({
      env: {
        STATUS_LOCALE: "fr-FR",
        STATUS_MAX_DECODE_DEPTH: "8",
        STATUS_INCLUDE_INTERNAL: "true",
        LOCALE: "de-DE",
      },
    })

    expect(config).toEqual({
      locale: "fr-FR",
      unknownMarker: "<unknown>",
      maxDecodeDepth: 8,
      includeInternal: true,
    })
  })

  it("parses 'false' as false", () => {
    expect(loadStatusConfig({ env: { STATUS_INCLUDE_INTERNAL: "false" } }).includeInternal).toBe(
      false,
    )
  })

  it("lets overrides win over the environment", () => {
    const config = loadStatusConfig({
      env: { STATUS_UNKNOWN_MARKER: "??" },
      overrides: { UNKNOWN_MARKER: "(missing)", INCLUDE_INTERNAL: true },
    })

    expect(config.unknownMarker).toBe("(missing)")
    expect(config.includeInternal).toBe(true)
  })

  it("throws on invalid values", () => {
    expect(() => loadStatusConfig({ env: { STATUS_MAX_DECODE_DEPTH: "-1" } })).toThrow(
      "Configuration validation failed",
    )
  })
})
