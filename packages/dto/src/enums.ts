export enum ExchangeState {
  RECEIVED = "RECEIVED",
  SCREENED = "SCREENED",
  AUTHORIZED = "AUTHORIZED",
  SETTLED = "SETTLED",
  REJECTED = "REJECTED",
}

export enum ReasonCategory {
  CLIENT = "CLIENT",
  AUTHORIZATION = "AUTHORIZATION",
  CAPACITY = "CAPACITY",
  POLICY = "POLICY",
  ACCESS = "ACCESS",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "CLIENT_BAD_REQUEST"
  | "ADDRESS_IS_ZERO"
  | "AMOUNT_IS_TOO_SMALL"
  | "INVALID_NONCE"
  | "SIGNATURE_EXPIRED"
  | "INVALID_SIGNATURE"
  | "VOTING_POWER_IS_HIGHER_THAN_CAP"
  | "LEVEL_IS_LOWER_THAN_EXISTING"
  | "ACCESS_DENIED"
  | "INTERNAL_ERROR";

export type ReasonContext = Record<string, string | number | boolean>;

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: ReasonContext;
}

export interface ErrorEnvelope {
  corr_id: string;
  state: ExchangeState;
  reason: ReasonDetail;
  ts: string; // RFC3339 UTC
}
