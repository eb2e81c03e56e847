import { getAddress } from 'ethers'
import { reject } from '@govex/reasons'

/**
 * ReplayGuard
 * Per-requester set of consumed intent nonces. Entries are only removed by `release`,
 * which the engine calls when it discards the same in-flight request that consumed them.
 */
export class ReplayGuard {
  private consumed: Map<string, Set<string>> = new Map()

  private static key(requester: string) {
    return getAddress(requester)
  }

  isConsumed(requester: string, nonce: string): boolean {
    return this.consumed.get(ReplayGuard.key(requester))?.has(nonce.toLowerCase()) ?? false
  }

  consume(requester: string, nonce: string): void {
    const key = ReplayGuard.key(requester)
    const set = this.consumed.get(key) ?? new Set<string>()
    const n = nonce.toLowerCase()
    if (set.has(n)) throw reject('INVALID_NONCE', { context: { requester: key, nonce: n } })
    set.add(n)
    this.consumed.set(key, set)
  }

  release(requester: string, nonce: string): void {
    const key = ReplayGuard.key(requester)
    const set = this.consumed.get(key)
    if (!set) return
    set.delete(nonce.toLowerCase())
    if (set.size === 0) this.consumed.delete(key)
  }

  consumedCount(requester: string): number {
    return this.consumed.get(ReplayGuard.key(requester))?.size ?? 0
  }
}
