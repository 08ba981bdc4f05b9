import { Uint64, type uint64 } from '@algorandfoundation/algorand-typescript'
import { mulDivFloor } from '../math/fixed-point.algo'
export const UNLOCK_PERIOD: uint64 = 2_592_000 // 30 days
export const UNLOCK_PORTIONS: uint64 = 10
export const UNLOCK_PERCENTAGE: uint64 = 10

export type Release = { amount: uint64; portions: uint64 }

/**
 * Portions due at `now`. The first one is due at the unlock start, then
 * one more every UNLOCK_PERIOD.
 */
export function portionsDue(unlockStart: uint64, now: uint64): uint64 {
  if (now < unlockStart) {
    return 0
  }
  const elapsedPeriods: uint64 = (now - unlockStart) / UNLOCK_PERIOD + 1
  return elapsedPeriods >= UNLOCK_PORTIONS ? UNLOCK_PORTIONS : elapsedPeriods
}

export function unlockablePortions(unlockStart: uint64, unlockedPortions: uint64, now: uint64): uint64 {
  const due = portionsDue(unlockStart, now)
  return due > unlockedPortions ? due - unlockedPortions : Uint64(0)
}

/**
 * Amount released by unlocking every due portion. The final portion takes
 * whatever is left, rounding remainder included.
 */
export function releaseDue(supply: uint64, left: uint64, unlockStart: uint64, unlockedPortions: uint64, now: uint64): Release {
  const portions = unlockablePortions(unlockStart, unlockedPortions, now)
  if (portions === 0) {
    return { amount: 0, portions: 0 }
  }
  if (unlockedPortions + portions === UNLOCK_PORTIONS) {
    return { amount: left, portions }
  }
  const portionSize = mulDivFloor(supply, UNLOCK_PERCENTAGE, 100)
  return { amount: portionSize * portions, portions }
}
