import {
  type ClassificationSet,
  UNRECOGNIZED,
  type Unrecognized,
} from "../ports/classification"

const ID_PATTERN = /^[a-z][a-z0-9_.-]*$/

class FixedClassificationSet<K extends string> implements ClassificationSet<K> {
  readonly ids: readonly K[]
  private readonly members: ReadonlySet<string>

  constructor(ids: readonly K[]) {
    this.ids = Object.freeze([...ids])
    this.members = new Set<string>(ids)
  }

  has(value: unknown): value is K {
    return typeof value === "string" && this.members.has(value)
  }

  parse(id: string): K | Unrecognized {
    return this.has(id) ? id : UNRECOGNIZED
  }
}

/**
 * Define the closed set of classifications an application reports with.
 *
 * Identifiers travel on the wire, so keep them stable across releases: add new ones, never
 * rename or reuse old ones.
 *
 * @throws TypeError when an identifier is not a lowercase token or appears twice
 *
 * @example
 * ```ts
 * export const Kinds = defineClassifications(["not_found", "io_error", "config.load_failed"])
 * export type Kind = (typeof Kinds.ids)[number]
 * ```
 */
export function defineClassifications<K extends string>(
  ids: readonly K[],
): ClassificationSet<K> {
  const seen = new Set<string>()

  for (const id of ids) {
    if (!ID_PATTERN.test(id)) {
      throw new TypeError(`Invalid classification id "${id}": expected ${ID_PATTERN}`)
    }
    if (seen.has(id)) {
      throw new TypeError(`Duplicate classification id "${id}"`)
    }
    seen.add(id)
  }

  return new FixedClassificationSet(ids)
}
