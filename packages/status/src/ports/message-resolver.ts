/**
 * Localization lookup supplied by the application.
 *
 * @remarks
 * Templates reference context keys as `{key}`. Use `{{` and `}}` for literal braces.
 * Resolvers must be synchronous; fetch catalogs before rendering.
 */
export interface MessageResolver {
  /** Locale tried when the requested locale has no template */
  readonly defaultLocale: string

  lookup(classification: string, locale: string): string | undefined
}
