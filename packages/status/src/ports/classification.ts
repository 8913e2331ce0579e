/**
 * Stable, cross-process identifier of a failure category.
 *
 * @remarks
 * Identifiers are lowercase tokens (`not_found`, `config.load_failed`). Two processes built
 * from the same classification set agree on equality because equality is string equality.
 */
export type ClassificationId = Lowercase<string>

/**
 * Sentinel classification carried by statuses decoded from a producer that knows
 * classifications this process does not.
 */
export const UNRECOGNIZED: unique symbol = Symbol("status.unrecognized")

export type Unrecognized = typeof UNRECOGNIZED

/** Anything that can sit in `Status#classification`. */
export type Classification = string | Unrecognized

/**
 * A closed set of classifications supplied by the consuming application.
 *
 * @example
 * ```ts
 * const Kinds = defineClassifications(["not_found", "io_error"])
 *
 * Kinds.parse("not_found") // "not_found"
 * Kinds.parse("added_later") // UNRECOGNIZED
 * ```
 */
export interface ClassificationSet<K extends string> {
  /** Identifiers in definition order */
  readonly ids: readonly K[]

  /** Type guard for values that belong to this set */
  has(value: unknown): value is K

  /**
   * Map a wire identifier onto the set.
   * Unknown identifiers map to {@link UNRECOGNIZED}; this never throws.
   */
  parse(id: string): K | Unrecognized
}
