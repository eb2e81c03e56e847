/**
 * In-memory ledgers
 * Process-local stand-ins for the utility and governance token ledgers. Addresses are
 * keyed in checksum form. Used by the local server and by tests.
 */
import { getAddress } from 'ethers'
import type { LedgerMutation } from '@govex/dto'
import { GovernanceLedger, LedgerBatchExecutor, LedgerError, UtilityLedger } from './ledgers'

type BalanceSnapshot = { balances: Map<string, bigint>; totalSupply: bigint }
type UtilitySnapshot = { book: BalanceSnapshot; allowances: Map<string, bigint> }
type GovernanceSnapshot = { book: BalanceSnapshot; burned: Map<string, bigint> }

class BalanceBook {
  protected balances: Map<string, bigint> = new Map()
  protected supply = 0n

  protected read(account: string): bigint {
    return this.balances.get(getAddress(account)) ?? 0n
  }

  protected credit(account: string, amount: bigint) {
    if (amount < 0n) throw new LedgerError('negative amount', account)
    const key = getAddress(account)
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount)
    this.supply += amount
  }

  protected debit(account: string, amount: bigint) {
    if (amount < 0n) throw new LedgerError('negative amount', account)
    const key = getAddress(account)
    const current = this.balances.get(key) ?? 0n
    if (current < amount) throw new LedgerError(`insufficient balance: ${current} < ${amount}`, key)
    this.balances.set(key, current - amount)
    this.supply -= amount
  }

  get totalSupply(): bigint {
    return this.supply
  }

  snapshotBalances(): BalanceSnapshot {
    return { balances: new Map(this.balances), totalSupply: this.supply }
  }

  restoreBalances(s: BalanceSnapshot) {
    this.balances = new Map(s.balances)
    this.supply = s.totalSupply
  }
}

export class InMemoryUtilityLedger extends BalanceBook implements UtilityLedger {
  private allowances: Map<string, bigint> = new Map()

  private static allowanceKey(owner: string, spender: string) {
    return `${getAddress(owner)}:${getAddress(spender)}`
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.read(account)
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    return this.allowances.get(InMemoryUtilityLedger.allowanceKey(owner, spender)) ?? 0n
  }

  async approve(owner: string, spender: string, amount: bigint): Promise<void> {
    if (amount < 0n) throw new LedgerError('negative allowance', owner)
    this.allowances.set(InMemoryUtilityLedger.allowanceKey(owner, spender), amount)
  }

  async mint(account: string, amount: bigint): Promise<void> {
    this.credit(account, amount)
  }

  async burnByBurner(account: string, amount: bigint): Promise<void> {
    this.debit(account, amount)
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<void> {
    const key = InMemoryUtilityLedger.allowanceKey(from, spender)
    const allowed = this.allowances.get(key) ?? 0n
    if (allowed < amount) throw new LedgerError(`insufficient allowance: ${allowed} < ${amount}`, from)
    this.debit(from, amount)
    this.credit(to, amount)
    this.allowances.set(key, allowed - amount)
  }

  snapshot(): UtilitySnapshot {
    return { book: this.snapshotBalances(), allowances: new Map(this.allowances) }
  }

  restore(s: UtilitySnapshot) {
    this.restoreBalances(s.book)
    this.allowances = new Map(s.allowances)
  }
}

export class InMemoryGovernanceLedger extends BalanceBook implements GovernanceLedger {
  private burned: Map<string, bigint> = new Map()

  async balanceOf(account: string): Promise<bigint> {
    return this.read(account)
  }

  async burnedAmountOfUtilToken(account: string): Promise<bigint> {
    return this.burned.get(getAddress(account)) ?? 0n
  }

  async mint(account: string, amount: bigint): Promise<void> {
    this.credit(account, amount)
  }

  async burnByBurner(account: string, amount: bigint): Promise<void> {
    this.debit(account, amount)
  }

  async setBurnedAmountOfUtilToken(account: string, amount: bigint): Promise<void> {
    if (amount < 0n) throw new LedgerError('negative burned amount', account)
    this.burned.set(getAddress(account), amount)
  }

  snapshot(): GovernanceSnapshot {
    return { book: this.snapshotBalances(), burned: new Map(this.burned) }
  }

  restore(s: GovernanceSnapshot) {
    this.restoreBalances(s.book)
    this.burned = new Map(s.burned)
  }
}

/**
 * InMemoryBatchExecutor
 * Applies a mutation batch against both in-memory ledgers; any failure restores the
 * snapshots taken before the first mutation.
 */
export class InMemoryBatchExecutor implements LedgerBatchExecutor {
  constructor(private readonly utility: InMemoryUtilityLedger, private readonly governance: InMemoryGovernanceLedger) {}

  async applyBatch(mutations: LedgerMutation[]): Promise<void> {
    const utilitySnap = this.utility.snapshot()
    const governanceSnap = this.governance.snapshot()
    try {
      for (const m of mutations) await this.apply(m)
    } catch (e) {
      this.utility.restore(utilitySnap)
      this.governance.restore(governanceSnap)
      throw e
    }
  }

  private async apply(m: LedgerMutation): Promise<void> {
    switch (m.kind) {
      case 'utility.transferFrom':
        return this.utility.transferFrom(m.spender, m.from, m.to, m.amount)
      case 'utility.burn':
        return this.utility.burnByBurner(m.account, m.amount)
      case 'governance.setBurnedAmount':
        return this.governance.setBurnedAmountOfUtilToken(m.account, m.amount)
      case 'governance.mint':
        return this.governance.mint(m.account, m.amount)
      default: {
        const exhaustive: never = m
        throw new LedgerError(`unknown mutation ${String(exhaustive)}`)
      }
    }
  }
}
