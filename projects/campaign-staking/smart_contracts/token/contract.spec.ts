import { TestExecutionContext } from '@algorandfoundation/algorand-typescript-testing'
import type { Account } from '@algorandfoundation/algorand-typescript'
import { beforeEach, describe, expect, it } from 'vitest'
import { CampaignTokenContract, LIQUIDITY_SUPPLY, TEAM_CLIFF, TOTAL_SUPPLY } from './contract.algo'
import { portionsDue, releaseDue, UNLOCK_PERIOD } from './vesting.algo'

const T0 = 1_700_000_000

describe('Campaign token contract', () => {
  const ctx = new TestExecutionContext()

  let owner: Account
  let token: CampaignTokenContract

  const at = (latestTimestamp: number): void => ctx.ledger.patchGlobalData({ latestTimestamp })

  const as = <T>(sender: Account, call: () => T): T =>
    ctx.txn
      .createScope([ctx.any.txn.applicationCall({ sender, appId: ctx.ledger.getApplicationForContract(token) })], 0)
      .execute(call)

  const lastAssetTransfer = () => ctx.txn.lastGroup.lastItxnGroup().getAssetTransferInnerTxn()

  beforeEach(() => {
    ctx.reset()
    at(T0)
    owner = ctx.defaultSender
    token = ctx.contract.create(CampaignTokenContract)
    ctx.ledger.patchAccountData(ctx.ledger.getApplicationForContract(token).address, {
      account: { balance: 10_000_000 },
    })
    token.initialize(owner)
  })

  describe('Deployment', () => {
    it('creates the asset with the whole supply', () => {
      const created = ctx.txn.lastGroup.lastItxnGroup().getAssetConfigInnerTxn()

      expect(created.total).toEqual(TOTAL_SUPPLY)
      expect(created.decimals).toEqual(6)
      expect(token.tokenId()).toEqual(token.token.value.id)
      expect(token.owner.value).toEqual(owner)
    })

    it('splits the supply into buckets', () => {
      expect(token.liquidityLeft.value).toEqual(800_000_000_000_000)
      expect(token.marketingLeft.value).toEqual(120_000_000_000_000)
      expect(token.marketingStart.value).toEqual(T0)
      expect(token.teamLeft.value).toEqual(80_000_000_000_000)
      expect(token.teamStart.value).toEqual(T0 + 47_347_200)
    })

    it('cannot be initialized twice', () => {
      expect(() => token.initialize(owner)).toThrow('Already initialized')
    })
  })

  describe('Liquidity', () => {
    it('releases liquidity to any address', () => {
      const pool = ctx.any.account()

      token.releaseLiquidity(pool, 1_000_000_000)

      const transfer = lastAssetTransfer()
      expect(transfer.assetReceiver).toEqual(pool)
      expect(transfer.assetAmount).toEqual(1_000_000_000)
      expect(transfer.xferAsset).toEqual(token.token.value)
      expect(token.liquidityLeft.value).toEqual(799_999_000_000_000)
    })

    it('cannot release more than the liquidity bucket', () => {
      const tooMuch = BigInt(LIQUIDITY_SUPPLY.valueOf()) + 1n

      expect(() => token.releaseLiquidity(owner, Number(tooMuch))).toThrow('Not enough liquidity tokens left')
      expect(() => token.releaseLiquidity(owner, 0)).toThrow('Amount must be > 0')
    })

    it('only lets the owner release liquidity', () => {
      const stranger = ctx.any.account()

      expect(() => as(stranger, () => token.releaseLiquidity(stranger, 1))).toThrow('Caller is not the owner')
    })
  })

  describe('Vesting', () => {
    it('releases the first marketing portion at once', () => {
      expect(token.unlockablePortions('marketing')).toEqual(1)

      expect(token.unlockMarketing()).toEqual(12_000_000_000_000)

      expect(lastAssetTransfer().assetReceiver).toEqual(owner)
      expect(token.marketingUnlocked.value).toEqual(1)
      expect(() => token.unlockMarketing()).toThrow('Nothing to unlock')
    })

    it('releases every due portion in one call', () => {
      at(T0 + 2 * 2_592_000)

      expect(token.unlockablePortions('marketing')).toEqual(3)
      expect(token.unlockMarketing()).toEqual(36_000_000_000_000)
      expect(token.marketingLeft.value).toEqual(84_000_000_000_000)
    })

    it('releases the rest of the bucket with the last portion', () => {
      at(T0 + 20 * 2_592_000)

      expect(token.unlockMarketing()).toEqual(120_000_000_000_000)
      expect(token.marketingLeft.value).toEqual(0)
      expect(token.unlockablePortions('marketing')).toEqual(0)
    })

    it('locks the team bucket until the cliff', () => {
      at(T0 + 47_347_199)
      expect(() => token.unlockTeam()).toThrow('Nothing to unlock')
      expect(token.unlockablePortions('team')).toEqual(0)

      at(T0 + 47_347_200)
      expect(token.unlockTeam()).toEqual(8_000_000_000_000)
    })

    it('rejects unknown buckets', () => {
      expect(() => token.unlockablePortions('liquidity')).toThrow('Unknown bucket')
    })
  })

  it('transfers ownership', () => {
    const next = ctx.any.account()

    token.transferOwnership(next)

    expect(token.owner.value).toEqual(next)
    expect(() => token.unlockMarketing()).toThrow('Caller is not the owner')
    expect(as(next, () => token.unlockMarketing())).toEqual(12_000_000_000_000)
  })
})

describe('Vesting schedule', () => {
  it('uses 30-day periods and a 548-day team cliff', () => {
    expect(UNLOCK_PERIOD).toEqual(2_592_000)
    expect(TEAM_CLIFF).toEqual(47_347_200)
  })

  it('counts due portions from the unlock start', () => {
    expect(portionsDue(100, 99)).toEqual(0)
    expect(portionsDue(100, 100)).toEqual(1)
    expect(portionsDue(0, 2_592_000)).toEqual(2)
    expect(portionsDue(0, 100 * 2_592_000)).toEqual(10)
  })

  it('rounds portions down and pays the remainder last', () => {
    expect(releaseDue(1_005, 1_005, 0, 0, 0)).toEqual({ amount: 100, portions: 1 })
    expect(releaseDue(1_005, 105, 0, 9, 9 * 2_592_000)).toEqual({ amount: 105, portions: 1 })
    expect(releaseDue(1_005, 105, 0, 9, 0)).toEqual({ amount: 0, portions: 0 })
  })
})
