/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail to enforce a deterministic rejection shape across the engine and HTTP layer.
 */
import { ReasonCode, ReasonDetail } from '@govex/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail
  public readonly terminalState = 'REJECTED' as const

  constructor(reason: ReasonDetail, human?: string) {
    super(human || reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

/** Shorthand for `new ReasonedRejection(reason(code, overrides))`. */
export function reject(code: ReasonCode, overrides?: ReasonOverrides): ReasonedRejection {
  return new ReasonedRejection(reason(code, overrides))
}

export function isRejection(e: unknown, code?: ReasonCode): e is ReasonedRejection {
  return e instanceof ReasonedRejection && (code === undefined || e.reason.code === code)
}
