import { assert, BigUint, Bytes, op, Uint64, type biguint, type uint64 } from '@algorandfoundation/algorand-typescript'

// Fixed-point unit of the accrual index and of 18-decimal USD amounts
export const SCALE: biguint = BigUint(1_000_000_000_000_000_000n)

const UINT64_LIMIT: biguint = BigUint(18_446_744_073_709_551_616n)

/**
 * Narrows a wide intermediate back to uint64, failing if it does not fit.
 */
export function toUint64(value: biguint): uint64 {
  assert(value < UINT64_LIMIT, 'Value exceeds uint64')
  const raw = Bytes(value)
  return op.extractUint64(op.bzero(8).concat(raw), raw.length)
}

export function pow10(exponent: uint64): biguint {
  return BigUint(op.exp(10, exponent))
}

/**
 * floor(a * b / d) with a 128-bit intermediate
 */
export function mulDivFloor(a: uint64, b: uint64, d: uint64): uint64 {
  const [hi, lo] = op.mulw(a, b)
  const [qHi, qLo] = op.divmodw(hi, lo, Uint64(0), d)
  assert(qHi === Uint64(0), 'Multiplication overflow in mulDivFloor')
  return qLo
}

export function minUint64(a: uint64, b: uint64): uint64 {
  return a < b ? a : b
}

export function maxUint64(a: uint64, b: uint64): uint64 {
  return a > b ? a : b
}
