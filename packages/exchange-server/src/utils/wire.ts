/**
 * JSON encoding for bigint-carrying values: every bigint becomes a decimal string,
 * undefined fields are dropped.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export function toWire(value: unknown): JsonValue {
  if (typeof value === 'bigint') return value.toString()
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  if (Array.isArray(value)) return value.map(toWire)
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {}
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) out[k] = toWire(v)
    }
    return out
  }
  return String(value)
}
