import { AlgoKitDeployTarget, deploy } from './deploy-config'
import { getStakingConfigFromEnvironment } from './utils/config'
import { createLogger } from './utils/logger'

const logger = createLogger('deploy')

async function main(): Promise<void> {
  const config = getStakingConfigFromEnvironment()
  const target = await AlgoKitDeployTarget.fromEnvironment()
  const deployment = await deploy(target, config, logger)
  logger.info(
    {
      token: deployment.token.appId.toString(),
      staking: deployment.staking.appId.toString(),
      swap: deployment.swap.appId.toString(),
      mainTokenId: deployment.mainTokenId.toString(),
      usdtId: deployment.usdtId.toString(),
    },
    'deployment complete',
  )
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'deployment failed')
  process.exitCode = 1
})
