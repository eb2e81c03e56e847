/**
 * Access control collaborator
 * Role ids follow the keccak256(name) convention used by on-chain role registries.
 */
import { getAddress, id } from 'ethers'

export const EXCHANGER_ROLE = id('EXCHANGER_ROLE')
export const MANAGER_ROLE = id('MANAGER_ROLE')

export interface AccessControl {
  hasRole(role: string, account: string): Promise<boolean>
}

export class InMemoryAccessControl implements AccessControl {
  private members: Map<string, Set<string>> = new Map()

  async hasRole(role: string, account: string): Promise<boolean> {
    return this.members.get(role)?.has(getAddress(account)) ?? false
  }

  grantRole(role: string, account: string) {
    const set = this.members.get(role) ?? new Set<string>()
    set.add(getAddress(account))
    this.members.set(role, set)
  }

  revokeRole(role: string, account: string) {
    this.members.get(role)?.delete(getAddress(account))
  }
}
