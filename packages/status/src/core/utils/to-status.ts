import { toContextValue } from "../context/context-value"
import { Status } from "../status"

const MAX_CAUSE_DEPTH = 50

/**
 * Convert any thrown value to a Status.
 *
 * - Status passes through unchanged
 * - Error instances keep their message as the literal message; an `Error` cause becomes an
 *   internal cause, recursively (cycles are cut)
 * - strings become the literal message
 * - other values are kept under the `value` key when they fit in a context, plain objects as
 *   maps
 *
 * @param value - The caught value
 * @param fallback - Classification for values that are not already a Status
 */
export function toStatus<K extends string>(value: unknown, fallback: K): Status {
  if (value instanceof Status) return value

  if (value instanceof Error) {
    const errors = collectErrors(value)
    let status: Status | undefined

    for (const error of errors.reverse()) {
      status =
        error instanceof Status
          ? error
          : new Status(fallback, { cause: status, internal: true })
              .withMessage(error.message)
              .withContext("error_name", error.name)
    }

    return status ?? new Status(fallback)
  }

  const status = new Status(fallback)

  if (typeof value === "string") return status.withMessage(value)
  const converted = value === undefined ? undefined : toContextValue(value)
  if (converted !== undefined) return status.withContext("value", converted)

  return status
}

/**
 * Errors reachable through `cause`, outermost first. Stops at the first Status, since a
 * Status already carries its own chain.
 */
function collectErrors(head: Error): Error[] {
  const errors: Error[] = []
  const seen = new WeakSet<Error>()
  let current: unknown = head

  while (current instanceof Error && !seen.has(current) && errors.length < MAX_CAUSE_DEPTH) {
    seen.add(current)
    errors.push(current)
    if (current instanceof Status) break
    current = current.cause
  }

  return errors
}
