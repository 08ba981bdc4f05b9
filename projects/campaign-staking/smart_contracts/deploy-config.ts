import { AlgorandClient, microAlgo } from '@algorandfoundation/algokit-utils'
import type { ABIValue } from 'algosdk'
import { readFile } from 'node:fs/promises'
import type { Logger } from 'pino'
import { PRICE_UPDATER_ROLE } from './access/roles.algo'
import type { StakingConfig } from './utils/config'

export type ContractName = 'token' | 'staking' | 'swap'

export interface DeployedApp {
  name: ContractName
  appId: bigint
  appAddress: string
  // true when this run created or replaced the app
  created: boolean
}

export interface TestAssetParams {
  total: bigint
  decimals: number
  assetName: string
  unitName: string
}

/**
 * What a deployment needs from the network. AlgoKitDeployTarget talks to a
 * node; tests use an in-memory one.
 */
export interface DeployTarget {
  readonly deployer: string
  deployApp(name: ContractName): Promise<DeployedApp>
  fund(receiver: string, microAlgos: bigint): Promise<void>
  call(app: DeployedApp, method: string, args: ABIValue[], innerTransactions?: number): Promise<ABIValue | undefined>
  createAsset(params: TestAssetParams): Promise<bigint>
}

export interface Deployment {
  token: DeployedApp
  staking: DeployedApp
  swap: DeployedApp
  mainTokenId: bigint
  usdtId: bigint
}

export const APP_FUNDING = 1_000_000n

const ARTIFACTS: Record<ContractName, string> = {
  token: './artifacts/token/CampaignTokenContract.arc56.json',
  staking: './artifacts/staking/CampaignStakingContract.arc56.json',
  swap: './artifacts/swap/SwapContract.arc56.json',
}

const readAppSpec = (name: ContractName): Promise<string> => readFile(new URL(ARTIFACTS[name], import.meta.url), 'utf8')

export class AlgoKitDeployTarget implements DeployTarget {
  constructor(
    private readonly algorand: AlgorandClient,
    public readonly deployer: string,
  ) {}

  static async fromEnvironment(): Promise<AlgoKitDeployTarget> {
    const algorand = AlgorandClient.fromEnvironment()
    const deployer = await algorand.account.fromEnvironment('DEPLOYER')
    return new AlgoKitDeployTarget(algorand, deployer.addr.toString())
  }

  async deployApp(name: ContractName): Promise<DeployedApp> {
    const factory = this.algorand.client.getAppFactory({
      appSpec: await readAppSpec(name),
      defaultSender: this.deployer,
    })
    const { appClient, result } = await factory.deploy({ onUpdate: 'append', onSchemaBreak: 'append' })
    return {
      name,
      appId: appClient.appId,
      appAddress: appClient.appAddress.toString(),
      created: ['create', 'replace'].includes(result.operationPerformed),
    }
  }

  async fund(receiver: string, microAlgos: bigint): Promise<void> {
    await this.algorand.send.payment({ amount: microAlgo(microAlgos), sender: this.deployer, receiver })
  }

  async call(app: DeployedApp, method: string, args: ABIValue[], innerTransactions = 0): Promise<ABIValue | undefined> {
    const appClient = this.algorand.client.getAppClientById({
      appId: app.appId,
      appSpec: await readAppSpec(app.name),
      defaultSender: this.deployer,
    })
    const result = await appClient.send.call({ method, args, extraFee: microAlgo(1_000 * innerTransactions) })
    return result.return?.returnValue
  }

  async createAsset(params: TestAssetParams): Promise<bigint> {
    const { assetId } = await this.algorand.send.assetCreate({ sender: this.deployer, ...params })
    return assetId
  }
}

function asAssetId(value: ABIValue | undefined, method: string): bigint {
  if (typeof value !== 'bigint') {
    throw new Error(`${method} did not return an asset id`)
  }
  return value
}

async function deployFunded(target: DeployTarget, name: ContractName, logger: Logger): Promise<DeployedApp> {
  const app = await target.deployApp(name)
  // Fund the app account when it was just created
  if (app.created) {
    await target.fund(app.appAddress, APP_FUNDING)
  }
  logger.info({ appId: app.appId.toString(), address: app.appAddress, created: app.created }, `${name} deployed`)
  return app
}

/**
 * Deploys the token, staking and swap apps and wires the ones this run
 * created. The deployer owns the token and administers both other apps.
 */
export async function deploy(target: DeployTarget, config: StakingConfig, logger: Logger): Promise<Deployment> {
  logger.info('=== Deploying Campaign Staking ===')
  const deployer = target.deployer

  const token = await deployFunded(target, 'token', logger)
  const mainTokenId = token.created
    ? asAssetId(await target.call(token, 'initialize', [deployer], 1), 'initialize')
    : asAssetId(await target.call(token, 'tokenId', []), 'tokenId')

  let usdtId = config.usdtAssetId
  if (usdtId === undefined) {
    usdtId = await target.createAsset({
      total: 1_000_000_000_000_000n,
      decimals: 6,
      assetName: 'Test USD',
      unitName: 'USDT',
    })
    logger.warn({ assetId: usdtId.toString() }, 'USDT_ASSET_ID not set, created a test stablecoin')
  }

  const staking = await deployFunded(target, 'staking', logger)
  if (staking.created) {
    await target.call(staking, 'initialize', [deployer, deployer])
    await target.call(staking, 'setTokenAddresses', [mainTokenId, usdtId], 2)
    await target.call(staking, 'setCampaignDuration', [config.campaignDuration])
    await target.call(staking, 'setUnstakePeriod', [config.unstakePeriod])
  }

  const swap = await deployFunded(target, 'swap', logger)
  if (swap.created) {
    await target.call(swap, 'initialize', [deployer, deployer])
    await target.call(swap, 'setMainToken', [mainTokenId], 1)
    await target.call(swap, 'allowStableToken', [usdtId], 1)
    await target.call(swap, 'setMainTokenPrice', [config.mainTokenPrice])
    await target.call(swap, 'setPriceFeedMaxAge', [config.priceFeedMaxAge])
    await target.call(swap, 'grantRole', [BigInt(PRICE_UPDATER_ROLE), deployer])

    if (config.swapInventory > 0n) {
      await target.call(token, 'releaseLiquidity', [swap.appAddress, config.swapInventory], 1)
      logger.info({ amount: config.swapInventory.toString() }, 'liquidity released to swap')
    }
  }

  return { token, staking, swap, mainTokenId, usdtId }
}
