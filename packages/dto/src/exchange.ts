/**
 * Wire types shared by the engine and its HTTP surface.
 * Amounts are bigint in-process and decimal strings on the wire.
 */

export interface ExchangeIntent {
  requester: string
  amount: bigint
  nonce: string // 0x-prefixed bytes32
  expiration: bigint // unix seconds
  signature: string
}

export type LedgerMutation =
  | { kind: 'utility.transferFrom'; spender: string; from: string; to: string; amount: bigint }
  | { kind: 'utility.burn'; account: string; amount: bigint }
  | { kind: 'governance.setBurnedAmount'; account: string; amount: bigint }
  | { kind: 'governance.mint'; account: string; amount: bigint }

export interface ExchangeReceipt {
  requester: string
  operator: string
  digest: string
  burnAmount: bigint
  grantedPower: bigint
  requestedAmount: bigint
  capped: boolean
  mutations: LedgerMutation[]
}

export interface ExchangePreview {
  requester: string
  currentVotingPower: bigint
  currentBurnedAmount: bigint
  grantedPower: bigint
  burnAmount: bigint
  capped: boolean
}

export interface ExchangeDomain {
  name: string
  version: string
  chainId: bigint
  verifyingContract: string
}
