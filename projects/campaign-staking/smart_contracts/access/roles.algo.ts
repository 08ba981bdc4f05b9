import type { uint64 } from '@algorandfoundation/algorand-typescript'

// Role bits; an account's box holds the OR of every role it was granted
export const ADMIN_ROLE: uint64 = 1
export const ANNOUNCER_ROLE: uint64 = 2
export const PRICE_UPDATER_ROLE: uint64 = 4
