/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message`, `http_status`, and add `context`.
 * bigint context values are rendered as decimal strings so envelopes stay JSON-safe.
 */
import { ReasonDetail, ReasonCode, ReasonContext } from '@govex/dto'
import { REASONS } from './registry'

export type ContextInput = Record<string, string | number | boolean | bigint>

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'http_status'>> & { context?: ContextInput }

export function normalizeContext(input: ContextInput): ReasonContext {
  const out: ReasonContext = {}
  for (const [k, v] of Object.entries(input)) {
    out[k] = typeof v === 'bigint' ? v.toString() : v
  }
  return out
}

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...(base.context || {}), ...normalizeContext(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    http_status: overrides?.http_status ?? base.http_status,
    context: Object.keys(context).length ? context : undefined,
  }
}
