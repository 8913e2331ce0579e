import type {
  ContextEntry,
  ContextValue,
  ReadonlyStatusContext,
} from "../../ports/context-value"
import { freezeValue } from "./context-value"

/**
 * Append-only, ordered key/value log owned by a single status.
 */
export class StatusContext implements ReadonlyStatusContext {
  private readonly items: ContextEntry[] = []

  get size(): number {
    return this.items.length
  }

  append(key: string, value: ContextValue): void {
    this.items.push(Object.freeze({ key, value: freezeValue(value) }))
  }

  entries(): readonly ContextEntry[] {
    return Object.freeze([...this.items])
  }

  latest(key: string): ContextValue | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const entry = this.items[i]
      if (entry?.key === key) return entry.value
    }
    return undefined
  }

  history(key: string): ContextValue[] {
    return this.items.filter((entry) => entry.key === key).map((entry) => entry.value)
  }

  keys(): string[] {
    return [...new Set(this.items.map((entry) => entry.key))]
  }

  has(key: string): boolean {
    return this.items.some((entry) => entry.key === key)
  }

  [Symbol.iterator](): Iterator<ContextEntry> {
    return this.items[Symbol.iterator]()
  }
}
