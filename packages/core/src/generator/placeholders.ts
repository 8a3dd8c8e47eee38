// ── Named placeholder rewriting ────────────────────────────────

const NAME_START = /[A-Za-z_]/
const NAME_PART = /[A-Za-z0-9_]/

/**
 * Replace every `:name` placeholder in `sql` with `replace(name)`.
 *
 * Skipped: single-quoted literals, double-quoted identifiers (both with doubled-quote
 * escapes) and `::` casts.
 */
export function rewritePlaceholders(sql: string, replace: (name: string) => string): string {
  let out = ''
  let i = 0

  while (i < sql.length) {
    const ch = sql.charAt(i)

    if (ch === "'" || ch === '"') {
      const end = closingQuote(sql, i, ch)
      out += sql.slice(i, end)
      i = end
      continue
    }

    if (ch === ':') {
      if (sql.charAt(i + 1) === ':') {
        out += '::'
        i += 2
        continue
      }
      if (NAME_START.test(sql.charAt(i + 1))) {
        let j = i + 2
        while (j < sql.length && NAME_PART.test(sql.charAt(j))) j++
        out += replace(sql.slice(i + 1, j))
        i = j
        continue
      }
    }

    out += ch
    i++
  }

  return out
}

/** Placeholder names in order of first appearance. */
export function placeholderNames(sql: string): string[] {
  const names: string[] = []
  rewritePlaceholders(sql, (name) => {
    if (!names.includes(name)) names.push(name)
    return ''
  })
  return names
}

function closingQuote(sql: string, start: number, quote: string): number {
  let j = start + 1
  while (j < sql.length) {
    if (sql.charAt(j) === quote) {
      if (sql.charAt(j + 1) === quote) {
        j += 2
        continue
      }
      return j + 1
    }
    j++
  }
  return sql.length
}
