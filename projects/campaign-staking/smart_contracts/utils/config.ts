import type { LevelWithSilent } from 'pino'
import { z } from 'zod'
import {
  DEFAULT_CAMPAIGN_DURATION,
  DEFAULT_UNSTAKE_PERIOD,
  MAX_CAMPAIGN_DURATION,
  MAX_UNSTAKE_PERIOD,
} from '../staking/constants.algo'

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

const SecondsSchema = (fallback: number, max: number) => z.coerce.number().int().positive().max(max).default(fallback)

const USD_FRACTION_DIGITS = 6

/**
 * Parses a USD amount such as "1.1" into micro-USD.
 */
export function parseUsdPrice(value: string): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid decimal number: ${value}`)
  }
  const [, whole, fraction = ''] = match
  if (fraction.length > USD_FRACTION_DIGITS) {
    throw new Error(`Too many fraction digits in ${value} (max ${USD_FRACTION_DIGITS})`)
  }
  return BigInt(whole) * 1_000_000n + BigInt(fraction.padEnd(USD_FRACTION_DIGITS, '0'))
}

export const StakingConfigSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
  CAMPAIGN_DURATION_SECONDS: SecondsSchema(Number(DEFAULT_CAMPAIGN_DURATION), Number(MAX_CAMPAIGN_DURATION)),
  UNSTAKE_PERIOD_SECONDS: SecondsSchema(Number(DEFAULT_UNSTAKE_PERIOD), Number(MAX_UNSTAKE_PERIOD)),
  MAIN_TOKEN_PRICE: z
    .string()
    .regex(/^\d+(\.\d{1,6})?$/, 'Must be a decimal number with at most 6 fraction digits')
    .default('1.1'),
  PRICE_FEED_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(3_600),
  USDT_ASSET_ID: z.coerce.bigint().positive().optional(),
  // Main-token base units handed to the swap contract for sale
  SWAP_INVENTORY: z.coerce.bigint().nonnegative().default(0n),
})

export interface StakingConfig {
  logLevel: LevelWithSilent
  campaignDuration: bigint
  unstakePeriod: bigint
  // micro-USD per whole main token
  mainTokenPrice: bigint
  priceFeedMaxAge: bigint
  usdtAssetId?: bigint
  swapInventory: bigint
}

export function getStakingConfigFromEnvironment(env: NodeJS.ProcessEnv = process.env): StakingConfig {
  const parsed = StakingConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid staking configuration in the environment variables (${issues})`)
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    campaignDuration: BigInt(parsed.data.CAMPAIGN_DURATION_SECONDS),
    unstakePeriod: BigInt(parsed.data.UNSTAKE_PERIOD_SECONDS),
    mainTokenPrice: parseUsdPrice(parsed.data.MAIN_TOKEN_PRICE),
    priceFeedMaxAge: BigInt(parsed.data.PRICE_FEED_MAX_AGE_SECONDS),
    usdtAssetId: parsed.data.USDT_ASSET_ID,
    swapInventory: parsed.data.SWAP_INVENTORY,
  }
}

export function getLogLevelFromEnvironment(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL ?? 'info')
  if (!parsed.success) {
    throw new Error(`Invalid LOG_LEVEL in the environment variables: ${env.LOG_LEVEL}`)
  }
  return parsed.data
}
