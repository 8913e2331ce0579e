import type { ContextValue } from "../../ports/context-value"
import { Status } from "../status"

/**
 * Throw a Status unless `condition` holds.
 *
 * @example
 * ```ts
 * ensure(depth <= MAX_DEPTH, "limit_exceeded", { depth, max: MAX_DEPTH })
 * ```
 */
export function ensure<K extends string>(
  condition: unknown,
  classification: K,
  context: Readonly<Record<string, ContextValue>> = {},
): asserts condition {
  if (condition) return

  throw new Status(classification).withContextEntries(context)
}
