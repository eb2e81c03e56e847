/**
 * curve.ts
 * Fixed-point bonding curve between cumulative utility tokens burned and governance voting power.
 * All values carry 18 decimals. Pure functions only (no I/O, no side-effects).
 *
 *   votingPower = (2 * sqrt(306.25 + 30 * burned) - 5) / 30 - 1
 *   burned      = (15 * votingPower^2 + 35 * votingPower) / 2
 */
import { assertUint256, sqrt } from './sqrt'

export const PRECISION = 10n ** 18n
/** sqrt(a * PRECISION) = sqrt(a) * 10^9; multiplying by this brings the root back to PRECISION units. */
export const PRECISION_FIX = 10n ** 9n
export const MINIMUM_EXCHANGE_AMOUNT = 10n ** 18n

/** 306.25 in PRECISION units. */
const CURVE_OFFSET = 30625n * 10n ** 16n

export class CurveUnderflowError extends Error {
  constructor(public readonly label: string, public readonly minuend: bigint, public readonly subtrahend: bigint) {
    super(`${label}: ${minuend} - ${subtrahend} underflows`)
    this.name = 'CurveUnderflowError'
  }
}

export function checkedSub(a: bigint, b: bigint, label = 'subtraction'): bigint {
  if (b > a) throw new CurveUnderflowError(label, a, b)
  return a - b
}

/**
 * votingPowerFromBurned
 * Inputs under 1_166_666_667 units leave sqrt(inner) at exactly 17.5e9 and map to zero.
 * Downstream accounting relies on that floor; do not round it away.
 */
export function votingPowerFromBurned(burnedAmount: bigint): bigint {
  assertUint256(burnedAmount, 'burnedAmount')
  const inner = assertUint256(CURVE_OFFSET + 30n * burnedAmount, 'curve inner term')
  const scaledRoot = sqrt(inner) * 2n * PRECISION_FIX
  const shifted = checkedSub(scaledRoot, 5n * PRECISION, 'votingPowerFromBurned root') / 30n
  return checkedSub(shifted, PRECISION, 'votingPowerFromBurned offset')
}

/** Exact inverse polynomial; the squared term is rescaled before summation. */
export function burnedFromVotingPower(votingPower: bigint): bigint {
  assertUint256(votingPower, 'votingPower')
  const squared = (15n * votingPower * votingPower) / PRECISION
  return assertUint256((squared + 35n * votingPower) / 2n, 'burnedFromVotingPower')
}

/**
 * incrementalVotingPower
 * Voting power gained by burning `deltaBurned` on top of `currentBurned`.
 * Non-increasing in `currentBurned` for a fixed delta.
 */
export function incrementalVotingPower(deltaBurned: bigint, currentBurned: bigint): bigint {
  const after = votingPowerFromBurned(currentBurned + deltaBurned)
  const before = votingPowerFromBurned(currentBurned)
  return checkedSub(after, before, 'incrementalVotingPower')
}

/** Exact utility-token cost of moving from `currentVotingPower` to `currentVotingPower + deltaVotingPower`. */
export function incrementalBurnedAmount(deltaVotingPower: bigint, currentVotingPower: bigint): bigint {
  const after = burnedFromVotingPower(currentVotingPower + deltaVotingPower)
  const before = burnedFromVotingPower(currentVotingPower)
  return checkedSub(after, before, 'incrementalBurnedAmount')
}
