/**
 * Substitute `{key}` placeholders.
 *
 * `{{` and `}}` produce literal braces. An opening brace with no closing brace is copied
 * through as text.
 */
export function substitute(template: string, resolve: (key: string) => string): string {
  let out = ""
  let i = 0

  while (i < template.length) {
    const ch = template.charAt(i)
    const next = template.charAt(i + 1)

    if (ch === "{" && next === "{") {
      out += "{"
      i += 2
      continue
    }

    if (ch === "}" && next === "}") {
      out += "}"
      i += 2
      continue
    }

    if (ch === "{") {
      const close = template.indexOf("}", i + 1)
      if (close === -1) {
        out += template.slice(i)
        break
      }
      out += resolve(template.slice(i + 1, close).trim())
      i = close + 1
      continue
    }

    out += ch
    i += 1
  }

  return out
}

/**
 * Placeholder keys in the order they appear.
 */
export function placeholders(template: string): string[] {
  const keys: string[] = []
  substitute(template, (key) => {
    keys.push(key)
    return ""
  })
  return keys
}
