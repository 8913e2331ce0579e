import type { Status } from "../status"

export type ChainOptions = Readonly<{
  /** Walk past causes attached as internal. Default: false */
  includeInternal?: boolean
}>

/**
 * Walk a status and its causes, outermost first.
 *
 * Chains are acyclic by construction: a cause exists before the status that wraps it.
 *
 * @example
 * ```ts
 * for (const s of statusChain(status, { includeInternal: true })) {
 *   console.log(s.id)
 * }
 * ```
 */
export function statusChain(head: Status, options: ChainOptions = {}): Iterable<Status> {
  const includeInternal = options.includeInternal ?? false

  return {
    *[Symbol.iterator]() {
      let current: Status | undefined = head

      while (current) {
        yield current

        if (current.isInternalCause && !includeInternal) return
        current = current.cause
      }
    },
  }
}

/**
 * The innermost status reachable with the given options.
 */
export function rootStatus(head: Status, options: ChainOptions = {}): Status {
  let root = head
  for (const s of statusChain(head, options)) root = s
  return root
}
