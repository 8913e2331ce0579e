import { Status } from "../status"

/**
 * Type guard for values caught or received from untyped code.
 *
 * @example
 * ```ts
 * try {
 *   // ...
 * } catch (err) {
 *   if (isStatus(err)) reporter.report(err)
 *   else throw err
 * }
 * ```
 */
export function isStatus(value: unknown): value is Status {
  return value instanceof Status
}
