import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, http_status: 400, message: 'Bad request' },
  ADDRESS_IS_ZERO: { code: 'ADDRESS_IS_ZERO', category: ReasonCategory.CLIENT, http_status: 400, message: 'Requester is the zero address' },
  AMOUNT_IS_TOO_SMALL: { code: 'AMOUNT_IS_TOO_SMALL', category: ReasonCategory.CLIENT, http_status: 400, message: 'Amount is below the minimum exchange amount' },

  // AUTHORIZATION
  INVALID_NONCE: { code: 'INVALID_NONCE', category: ReasonCategory.AUTHORIZATION, http_status: 409, message: 'Nonce already consumed' },
  SIGNATURE_EXPIRED: { code: 'SIGNATURE_EXPIRED', category: ReasonCategory.AUTHORIZATION, http_status: 400, message: 'Signature expired' },
  INVALID_SIGNATURE: { code: 'INVALID_SIGNATURE', category: ReasonCategory.AUTHORIZATION, http_status: 401, message: 'Signature does not match requester' },

  // CAPACITY
  VOTING_POWER_IS_HIGHER_THAN_CAP: { code: 'VOTING_POWER_IS_HIGHER_THAN_CAP', category: ReasonCategory.CAPACITY, http_status: 422, message: 'Voting power already at or above cap' },

  // POLICY
  LEVEL_IS_LOWER_THAN_EXISTING: { code: 'LEVEL_IS_LOWER_THAN_EXISTING', category: ReasonCategory.POLICY, http_status: 422, message: 'New cap must be higher than the existing cap' },

  // ACCESS
  ACCESS_DENIED: { code: 'ACCESS_DENIED', category: ReasonCategory.ACCESS, http_status: 403, message: 'Caller lacks the required role' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

