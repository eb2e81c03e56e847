import { Wallet } from 'ethers'
import { InMemoryAccessControl, MANAGER_ROLE } from '../../src/collaborators/accessControl'
import { CapPolicy, VOTING_POWER_CAP_CHANGED, VotingPowerCapChangedEvent } from '../../src/services/CapPolicy'
import { SerialQueue } from '../../src/services/SerialQueue'
import { DEFAULT_CAP, E18, silenceLogs } from '../fixtures'

beforeAll(() => silenceLogs())

function setup() {
  const accessControl = new InMemoryAccessControl()
  const manager = Wallet.createRandom().address
  accessControl.grantRole(MANAGER_ROLE, manager)
  const policy = new CapPolicy(DEFAULT_CAP, accessControl, new SerialQueue())
  return { policy, manager, accessControl }
}

describe('CapPolicy', () => {
  test('starts at the configured cap', () => {
    expect(setup().policy.getCap()).toBe(100n * E18)
  })

  test('refuses an initial cap outside uint256', () => {
    expect(() => new CapPolicy(-1n, new InMemoryAccessControl(), new SerialQueue())).toThrow(RangeError)
    expect(() => new CapPolicy(1n << 256n, new InMemoryAccessControl(), new SerialQueue())).toThrow('initial cap overflows uint256')
  })

  test('raises the cap and announces the change', async () => {
    const { policy, manager } = setup()
    const events: VotingPowerCapChangedEvent[] = []
    policy.on(VOTING_POWER_CAP_CHANGED, (e: VotingPowerCapChangedEvent) => events.push(e))

    await expect(policy.setCap(manager, 200n * E18)).resolves.toBe(200n * E18)
    expect(policy.getCap()).toBe(200n * E18)
    expect(events).toEqual([{ previousCap: 100n * E18, newCap: 200n * E18, caller: manager }])
  })

  test('an equal or lower cap is rejected and nothing changes', async () => {
    const { policy, manager } = setup()
    await expect(policy.setCap(manager, 100n * E18)).rejects.toMatchObject({
      reason: {
        code: 'LEVEL_IS_LOWER_THAN_EXISTING',
        context: { currentCap: (100n * E18).toString(), requestedCap: (100n * E18).toString() },
      },
    })
    await expect(policy.setCap(manager, 50n * E18)).rejects.toMatchObject({ reason: { code: 'LEVEL_IS_LOWER_THAN_EXISTING' } })
    expect(policy.getCap()).toBe(100n * E18)
  })

  test('only managers may raise it', async () => {
    const { policy, accessControl, manager } = setup()
    const stranger = Wallet.createRandom().address
    await expect(policy.setCap(stranger, 200n * E18)).rejects.toMatchObject({
      reason: { code: 'ACCESS_DENIED', context: { caller: stranger, role: 'MANAGER_ROLE' } },
    })
    accessControl.revokeRole(MANAGER_ROLE, manager)
    await expect(policy.setCap(manager, 200n * E18)).rejects.toMatchObject({ reason: { code: 'ACCESS_DENIED' } })
    expect(policy.getCap()).toBe(100n * E18)
  })

  test('a cap beyond uint256 is a client error', async () => {
    const { policy, manager } = setup()
    await expect(policy.setCap(manager, 1n << 300n)).rejects.toMatchObject({
      reason: { code: 'CLIENT_BAD_REQUEST', context: { issues: 'newCap: exceeds the uint256 range' } },
    })
    expect(policy.getCap()).toBe(100n * E18)
  })

  test('a throwing listener does not undo the change', async () => {
    const { policy, manager } = setup()
    policy.on(VOTING_POWER_CAP_CHANGED, () => {
      throw new Error('listener boom')
    })
    await expect(policy.setCap(manager, 200n * E18)).resolves.toBe(200n * E18)
    expect(policy.getCap()).toBe(200n * E18)
  })
})
