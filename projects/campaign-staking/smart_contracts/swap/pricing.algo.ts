import { BigUint, type biguint, type uint64 } from '@algorandfoundation/algorand-typescript'
import { pow10, SCALE, toUint64 } from '../math/fixed-point.algo'

export const PRICE_DECIMALS: uint64 = 18
// Main-token prices are kept in micro-USD
export const USD_PRICE_UNIT: uint64 = 1_000_000
export const NATIVE_DECIMALS: uint64 = 6

/** Rescales an amount with `decimals` decimals to an 18-decimal USD value. */
export function normalizeDecimals(amount: uint64, decimals: uint64): biguint {
  if (decimals <= PRICE_DECIMALS) {
    return BigUint(amount) * pow10(PRICE_DECIMALS - decimals)
  }
  return BigUint(amount) / pow10(decimals - PRICE_DECIMALS)
}

/**
 * Main-token amount, in its own base units, that `usdValue` (18 decimals)
 * buys at `price` micro-USD per whole main token. Rounds down.
 */
export function usdToMainToken(usdValue: biguint, price: uint64, mainDecimals: uint64): uint64 {
  return toUint64((usdValue * pow10(mainDecimals) * BigUint(USD_PRICE_UNIT)) / (BigUint(price) * SCALE))
}

/**
 * USD value (18 decimals) of `amount` native base units priced at `answer`
 * USD with `answerDecimals` decimals per whole native unit.
 */
export function nativeToUsd(amount: uint64, answer: uint64, answerDecimals: uint64): biguint {
  return (normalizeDecimals(amount, NATIVE_DECIMALS) * BigUint(answer)) / pow10(answerDecimals)
}

export function isStale(updatedAt: uint64, now: uint64, maxAge: uint64): boolean {
  return now > updatedAt && now - updatedAt > maxAge
}
