/**
 * Values that can be attached to a status context.
 *
 * The union is closed so every value has a self-describing wire tag. Numbers are integers when
 * they are safe integers or bigints, floats otherwise; {@link ContextFloat} keeps an integral
 * float (`2.0`, `-0.0`) a float. Maps keep their insertion order.
 */
export type ContextValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | ContextFloat
  | readonly ContextValue[]
  | ContextMap

export type ContextMap = ReadonlyMap<string, ContextValue>

export type ContextFloat = Readonly<{
  kind: "float"
  value: number
}>

export type ContextEntry = Readonly<{
  key: string
  value: ContextValue
}>

/**
 * Read side of a status context.
 *
 * Entries are kept in insertion order. Keys may repeat: later entries refine earlier ones
 * without replacing them.
 */
export interface ReadonlyStatusContext extends Iterable<ContextEntry> {
  readonly size: number

  /** Every entry, oldest first */
  entries(): readonly ContextEntry[]

  /** Latest value appended for `key` (last write wins), or `undefined` */
  latest(key: string): ContextValue | undefined

  /** Every value appended for `key`, oldest first */
  history(key: string): ContextValue[]

  /** Distinct keys in order of first appearance */
  keys(): string[]

  has(key: string): boolean
}
