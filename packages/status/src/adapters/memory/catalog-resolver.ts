import type { MessageResolver } from "../../ports/message-resolver"

export type MessageCatalog<K extends string = string> = Readonly<
  Record<string, Readonly<Partial<Record<K, string>>>>
>

export type CatalogResolverOptions<K extends string = string> = Readonly<{
  defaultLocale: string
  /** locale -> classification -> template */
  catalog: MessageCatalog<K>
}>

/**
 * In-memory message catalog.
 *
 * Lookups try the exact locale, then its base language (`en-US` -> `en`).
 */
export class CatalogMessageResolver<K extends string = string> implements MessageResolver {
  readonly defaultLocale: string
  private readonly templates = new Map<string, Map<string, string>>()

  constructor(options: CatalogResolverOptions<K>) {
    this.defaultLocale = options.defaultLocale

    for (const [locale, entries] of Object.entries(options.catalog)) {
      const byClassification = new Map<string, string>()
      for (const [classification, template] of Object.entries(entries)) {
        if (typeof template === "string") byClassification.set(classification, template)
      }
      this.templates.set(locale, byClassification)
    }
  }

  lookup(classification: string, locale: string): string | undefined {
    for (const candidate of localeCandidates(locale)) {
      const template = this.templates.get(candidate)?.get(classification)
      if (template !== undefined) return template
    }
    return undefined
  }

  locales(): string[] {
    return [...this.templates.keys()]
  }
}

function localeCandidates(locale: string): string[] {
  const base = locale.split(/[-_]/)[0]
  return base && base !== locale ? [locale, base] : [locale]
}

export function createCatalogResolver<K extends string>(
  options: CatalogResolverOptions<K>,
): MessageResolver {
  return new CatalogMessageResolver(options)
}
