/**
 * Ledger collaborators
 * The engine reads holder state and hands mutation batches to these seams; it never
 * owns balances itself. Implementations may be on-chain token adapters or the
 * in-memory ledgers below.
 */
import type { LedgerMutation } from '@govex/dto'

export interface UtilityLedger {
  balanceOf(account: string): Promise<bigint>
  allowance(owner: string, spender: string): Promise<bigint>
  mint(account: string, amount: bigint): Promise<void>
  burnByBurner(account: string, amount: bigint): Promise<void>
  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<void>
}

export interface GovernanceLedger {
  balanceOf(account: string): Promise<bigint>
  burnedAmountOfUtilToken(account: string): Promise<bigint>
  mint(account: string, amount: bigint): Promise<void>
  burnByBurner(account: string, amount: bigint): Promise<void>
  setBurnedAmountOfUtilToken(account: string, amount: bigint): Promise<void>
}

/** Applies every mutation of a batch or none of them. */
export interface LedgerBatchExecutor {
  applyBatch(mutations: LedgerMutation[]): Promise<void>
}

export class LedgerError extends Error {
  constructor(message: string, public readonly account?: string) {
    super(message)
    this.name = 'LedgerError'
  }
}
