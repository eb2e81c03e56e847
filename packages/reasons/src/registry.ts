/**
 * Reasons Registry
 * Machine-parsable rejection codes for the exchange. Entries are stable;
 * operators and dashboards key on `code`.
 */
import { ReasonCode, ReasonDetail, REASONS as DTO_REASONS } from '@govex/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
