import { EventEmitter } from 'events'
import { MAX_UINT256, assertUint256 } from '@govex/math'
import { reject } from '@govex/reasons'
import { AccessControl, MANAGER_ROLE } from '../collaborators/accessControl'
import { SerialQueue } from './SerialQueue'
import { getLogger } from '../utils/logger'
import { emitSafely } from '../utils/emitSafely'

export const VOTING_POWER_CAP_CHANGED = 'VotingPowerCapChanged'

export type VotingPowerCapChangedEvent = { previousCap: bigint; newCap: bigint; caller: string }

/**
 * CapPolicy
 * Holds the per-holder voting power ceiling. The cap only moves up: every update must be
 * strictly greater than the value it replaces. Updates share the engine's queue so an
 * exchange never observes a cap change half-way through.
 */
export class CapPolicy extends EventEmitter {
  private cap: bigint

  constructor(
    initialCap: bigint,
    private readonly accessControl: AccessControl,
    private readonly queue: SerialQueue
  ) {
    super()
    this.cap = assertUint256(initialCap, 'initial cap')
  }

  getCap(): bigint {
    return this.cap
  }

  async setCap(caller: string, newCap: bigint): Promise<bigint> {
    return this.queue.run(async () => {
      if (!(await this.accessControl.hasRole(MANAGER_ROLE, caller))) {
        throw reject('ACCESS_DENIED', { context: { caller, role: 'MANAGER_ROLE' } })
      }
      if (newCap > MAX_UINT256) {
        throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'newCap: exceeds the uint256 range', requestedCap: newCap } })
      }
      const previousCap = this.cap
      if (newCap <= previousCap) {
        throw reject('LEVEL_IS_LOWER_THAN_EXISTING', { context: { currentCap: previousCap, requestedCap: newCap } })
      }
      this.cap = newCap
      getLogger().info({ event: 'cap.changed', previousCap: previousCap.toString(), newCap: newCap.toString(), caller })
      const event: VotingPowerCapChangedEvent = { previousCap, newCap, caller }
      emitSafely(this, VOTING_POWER_CAP_CHANGED, event)
      return newCap
    })
  }
}
