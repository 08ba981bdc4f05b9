import type { uint64 } from '@algorandfoundation/algorand-typescript'

export const DAY: uint64 = 86_400

export const DEFAULT_CAMPAIGN_DURATION: uint64 = 86_280 // 23h 58m
export const MAX_CAMPAIGN_DURATION: uint64 = 2_592_000 // 30 days

export const DEFAULT_UNSTAKE_PERIOD: uint64 = 31_536_000 // 365 days
export const MAX_UNSTAKE_PERIOD: uint64 = 31_536_000
