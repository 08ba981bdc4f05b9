import { BigUint, Uint64, type biguint, type uint64 } from '@algorandfoundation/algorand-typescript'
import { maxUint64, minUint64, SCALE, toUint64 } from '../math/fixed-point.algo'

export function campaignLength(startTime: uint64, finishTime: uint64): uint64 {
  return finishTime > startTime ? finishTime - startTime : Uint64(0)
}

export function isCampaignActive(startTime: uint64, finishTime: uint64, now: uint64): boolean {
  return campaignLength(startTime, finishTime) > 0 && startTime <= now && now < finishTime
}

/**
 * Seconds of `[lastUpdateTime, now]` that fall inside the campaign window.
 */
export function accrualWindow(startTime: uint64, finishTime: uint64, lastUpdateTime: uint64, now: uint64): uint64 {
  if (campaignLength(startTime, finishTime) === 0) {
    return 0
  }
  const windowStart = maxUint64(startTime, lastUpdateTime)
  const windowEnd = minUint64(now, finishTime)
  return windowStart > windowEnd ? Uint64(0) : windowEnd - windowStart
}

/**
 * Rewards per unit of stake per second, at SCALE precision.
 */
export function rewardRate(rewardAmount: uint64, duration: uint64, globalStake: uint64): biguint {
  if (globalStake === 0 || duration === 0) {
    return BigUint(0)
  }
  return (BigUint(rewardAmount) * SCALE) / BigUint(globalStake) / BigUint(duration)
}

/**
 * Index increase for `elapsed` seconds. Multiplies before dividing, which
 * makes a campaign that is staked for its whole duration pay out exactly.
 */
export function indexDelta(rewardAmount: uint64, duration: uint64, globalStake: uint64, elapsed: uint64): biguint {
  if (globalStake === 0 || duration === 0 || elapsed === 0) {
    return BigUint(0)
  }
  return (BigUint(elapsed) * BigUint(rewardAmount) * SCALE) / (BigUint(globalStake) * BigUint(duration))
}

export function accruedReward(stake: uint64, fromIndex: biguint, toIndex: biguint): uint64 {
  if (stake === 0 || toIndex <= fromIndex) {
    return 0
  }
  return toUint64((BigUint(stake) * (toIndex - fromIndex)) / SCALE)
}

/** Reward released into the index, from its SCALE-precision running total. */
export function distributedAmount(distributedScaled: biguint): uint64 {
  return toUint64(distributedScaled / SCALE)
}

/** Reward funds that no campaign has been promised. */
export function withdrawableRewards(deposited: uint64, committed: uint64): uint64 {
  return deposited > committed ? deposited - committed : Uint64(0)
}

/** Reward funds not yet released into the index. */
export function undistributedRewards(deposited: uint64, distributed: uint64): uint64 {
  return deposited > distributed ? deposited - distributed : Uint64(0)
}
