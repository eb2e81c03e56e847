/**
 * sqrt.ts
 * Unsigned 256-bit integer helpers; pure functions only.
 */

export const MAX_UINT256 = (1n << 256n) - 1n

/** Throws RangeError unless 0 <= value <= 2^256-1. */
export function assertUint256(value: bigint, label = 'value'): bigint {
  if (value < 0n) throw new RangeError(`${label} is negative: ${value}`)
  if (value > MAX_UINT256) throw new RangeError(`${label} overflows uint256: ${value}`)
  return value
}

/**
 * sqrt
 * Floor integer square root by Newton iteration. The seed 2^(ceil(bits/2)) is always >= the
 * true root, so the sequence decreases monotonically and stops at floor(sqrt(n)).
 */
export function sqrt(n: bigint): bigint {
  if (n < 0n) throw new RangeError(`sqrt of negative value: ${n}`)
  if (n < 2n) return n
  const bits = BigInt(n.toString(2).length)
  let x = 1n << ((bits + 1n) / 2n)
  let y = (x + n / x) >> 1n
  while (y < x) {
    x = y
    y = (x + n / x) >> 1n
  }
  return x
}
