import { z } from "zod"

export const statusEnvSchema = z.object({
  LOCALE: z.string().min(1).default("en-US"),
  UNKNOWN_MARKER: z.string().min(1).default("<unknown>"),
  MAX_DECODE_DEPTH: z.coerce.number().int().positive().optional(),
  INCLUDE_INTERNAL: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type StatusEnvConfig = z.infer<typeof statusEnvSchema>

export type StatusConfig = {
  /** Locale used when rendering for logs and reports */
  locale: string

  /** Text substituted for placeholders whose key is not in the context */
  unknownMarker: string

  /** Deepest list/map nesting the wire codec accepts. Unset: no limit */
  maxDecodeDepth: number | undefined

  /** Render internal causes in reports */
  includeInternal: boolean
}

export type LoadStatusConfigOptions = {
  /** Environment to read `STATUS_*` variables from. Default: `process.env` */
  env?: Record<string, string | undefined>

  /** Values applied after the environment, keyed like the unprefixed variables */
  overrides?: Record<string, unknown>
}

export const STATUS_ENV_PREFIX = "STATUS_"

export function mapEnvToStatusConfig(env: StatusEnvConfig): StatusConfig {
  return {
    locale: env.LOCALE,
    unknownMarker: env.UNKNOWN_MARKER,
    maxDecodeDepth: env.MAX_DECODE_DEPTH,
    includeInternal: env.INCLUDE_INTERNAL,
  }
}

/**
 * Load rendering and codec settings from `STATUS_`-prefixed variables.
 *
 * @example
 * ```ts
 * const config = loadStatusConfig({ overrides: { LOCALE: "fr-FR" } })
 * const codec = createConfiguredWireCodec(Kinds, config)
 * ```
 */
export function loadStatusConfig(options: LoadStatusConfigOptions = {}): StatusConfig {
  const env = options.env ?? process.env
  const merged: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(STATUS_ENV_PREFIX) && value !== undefined) {
      merged[key.slice(STATUS_ENV_PREFIX.length)] = value
    }
  }

  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) merged[key] = value
  }

  const result = statusEnvSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return mapEnvToStatusConfig(result.data)
}
