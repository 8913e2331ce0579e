import type { MessageResolver } from "../../ports/message-resolver"
import { formatValue } from "../context/context-value"
import type { Status } from "../status"
import type { ChainOptions } from "../utils/status-chain"
import { substitute } from "./template"

export const DEFAULT_UNKNOWN_MARKER = "<unknown>"

export type RenderOptions = Readonly<{
  locale: string
  resolver: MessageResolver

  /** Rendered in place of a placeholder whose key is not in the context */
  unknownMarker?: string
}>

export type RenderChainOptions = RenderOptions & ChainOptions

function lookupTemplate(status: Status, locale: string, resolver: MessageResolver) {
  const classification = status.classification
  if (typeof classification !== "string") return undefined

  try {
    const template = resolver.lookup(classification, locale)
    if (template) return template
    if (resolver.defaultLocale === locale) return undefined
    return resolver.lookup(classification, resolver.defaultLocale) || undefined
  } catch {
    // a failing catalog degrades to the generic message
    return undefined
  }
}

/**
 * Message used when no template exists: the identifier plus every context key with its
 * latest value.
 *
 * @example
 * `not_found (path=/etc/x, attempt=2)`
 */
export function genericMessage(status: Status): string {
  const id = status.id === "" ? "unrecognized" : status.id
  const keys = status.context.keys()

  if (keys.length === 0) return id

  const fields = keys.map((key) => {
    const value = status.context.latest(key)
    return `${key}=${value === undefined ? "" : formatValue(value)}`
  })

  return `${id} (${fields.join(", ")})`
}

/**
 * Render one status to text for a locale.
 *
 * A literal message wins. Otherwise the resolver template for `locale`, then for the
 * resolver's default locale, then {@link genericMessage}. Never throws and never returns an
 * empty string.
 *
 * @example
 * ```ts
 * render(new Status("not_found").withContext("path", "/etc/x"), { locale: "en-US", resolver })
 * // "File /etc/x not found"
 * ```
 */
export function render(status: Status, options: RenderOptions): string {
  const literal = status.literal
  if (literal) return literal

  const template = lookupTemplate(status, options.locale, options.resolver)
  if (template === undefined) return genericMessage(status)

  const marker = options.unknownMarker ?? DEFAULT_UNKNOWN_MARKER
  const text = substitute(template, (key) => {
    const value = status.context.latest(key)
    return value === undefined ? marker : formatValue(value)
  })

  return text === "" ? genericMessage(status) : text
}

/**
 * Render each level of the cause chain, outermost first.
 */
export function renderChain(status: Status, options: RenderChainOptions): string[] {
  return [...status.chain(options)].map((level) => render(level, options))
}

/**
 * Multi-line diagnostic text: the outermost rendering, then one `Caused by:` line per cause.
 */
export function formatReport(status: Status, options: RenderChainOptions): string {
  const [headline, ...causes] = renderChain(status, options)

  return [headline ?? genericMessage(status), ...causes.map((line) => `Caused by: ${line}`)].join(
    "\n",
  )
}
