/**
 * Render entries as `{k: v, ...}`. Strings are printed bare; objects go
 * through JSON, falling back to `String()` for values JSON cannot encode.
 */
export function formatEntries(entries: Iterable<readonly [unknown, unknown]>): string {
  const parts: string[] = []

  for (const [key, value] of entries) {
    parts.push(`${formatValue(key)}: ${formatValue(value)}`)
  }

  return `{${parts.join(", ")}}`
}

export function formatValue(value: unknown): string {
  if (typeof value !== "object" || value === null) return String(value)

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    // cyclic structures, BigInt fields
    return String(value)
  }
}
