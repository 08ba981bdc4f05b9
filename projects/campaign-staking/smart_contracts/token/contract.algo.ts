import {
  abimethod,
  Account,
  assert,
  Contract,
  emit,
  Global,
  GlobalState,
  itxn,
  Txn,
  type Asset,
  type uint64,
} from '@algorandfoundation/algorand-typescript'
import { sendAsset } from '../assets/transfers.algo'
import { releaseDue, unlockablePortions, type Release } from './vesting.algo'

export const TOKEN_DECIMALS: uint64 = 6
// 1 billion tokens at 6 decimals
export const TOTAL_SUPPLY: uint64 = 1_000_000_000_000_000
export const LIQUIDITY_SUPPLY: uint64 = 800_000_000_000_000
export const MARKETING_SUPPLY: uint64 = 120_000_000_000_000
export const TEAM_SUPPLY: uint64 = 80_000_000_000_000
export const TEAM_CLIFF: uint64 = 47_347_200 // 548 days

type LiquidityReleased = { to: Account; amount: uint64 }
type TokensUnlocked = { bucket: string; amount: uint64; unlockedPortions: uint64 }
type OwnershipTransferred = { previousOwner: Account; newOwner: Account }

/**
 * Fixed-supply token. The contract creates the asset holding its whole
 * supply and splits it into a liquidity bucket the owner releases at will,
 * plus marketing and team buckets that vest in ten monthly portions.
 */
export class CampaignTokenContract extends Contract {
  public initialized = GlobalState<boolean>({ initialValue: false })
  public owner = GlobalState<Account>()
  public token = GlobalState<Asset>()

  public liquidityLeft = GlobalState<uint64>({ initialValue: 0 })

  public marketingLeft = GlobalState<uint64>({ initialValue: 0 })
  public marketingStart = GlobalState<uint64>({ initialValue: 0 })
  public marketingUnlocked = GlobalState<uint64>({ initialValue: 0 })

  public teamLeft = GlobalState<uint64>({ initialValue: 0 })
  public teamStart = GlobalState<uint64>({ initialValue: 0 })
  public teamUnlocked = GlobalState<uint64>({ initialValue: 0 })

  @abimethod()
  public initialize(owner: Account): Asset {
    assert(!this.initialized.value, 'Already initialized')
    assert(Txn.sender === Global.creatorAddress, 'Only creator can initialize')
    assert(owner !== Account(), 'Invalid owner address')

    const created = itxn
      .assetConfig({
        total: TOTAL_SUPPLY,
        decimals: TOKEN_DECIMALS,
        assetName: 'Campaign Token',
        unitName: 'CMPN',
        manager: Global.currentApplicationAddress,
        reserve: Global.currentApplicationAddress,
        fee: 0,
      })
      .submit().createdAsset

    const now = Global.latestTimestamp
    this.initialized.value = true
    this.owner.value = owner
    this.token.value = created

    this.liquidityLeft.value = LIQUIDITY_SUPPLY
    this.marketingLeft.value = MARKETING_SUPPLY
    this.marketingStart.value = now
    this.teamLeft.value = TEAM_SUPPLY
    this.teamStart.value = now + TEAM_CLIFF
    return created
  }

  @abimethod()
  public releaseLiquidity(to: Account, amount: uint64): void {
    this.onlyOwner()
    assert(amount > 0, 'Amount must be > 0')
    assert(amount <= this.liquidityLeft.value, 'Not enough liquidity tokens left')

    this.liquidityLeft.value = this.liquidityLeft.value - amount
    sendAsset(this.token.value, to, amount)
    emit<LiquidityReleased>({ to, amount })
  }

  @abimethod()
  public unlockMarketing(): uint64 {
    this.onlyOwner()
    const release = releaseDue(
      MARKETING_SUPPLY,
      this.marketingLeft.value,
      this.marketingStart.value,
      this.marketingUnlocked.value,
      Global.latestTimestamp,
    )
    assert(release.amount > 0, 'Nothing to unlock')

    this.marketingLeft.value = this.marketingLeft.value - release.amount
    this.marketingUnlocked.value = this.marketingUnlocked.value + release.portions
    this.payOwner('marketing', release, this.marketingUnlocked.value)
    return release.amount
  }

  @abimethod()
  public unlockTeam(): uint64 {
    this.onlyOwner()
    const release = releaseDue(
      TEAM_SUPPLY,
      this.teamLeft.value,
      this.teamStart.value,
      this.teamUnlocked.value,
      Global.latestTimestamp,
    )
    assert(release.amount > 0, 'Nothing to unlock')

    this.teamLeft.value = this.teamLeft.value - release.amount
    this.teamUnlocked.value = this.teamUnlocked.value + release.portions
    this.payOwner('team', release, this.teamUnlocked.value)
    return release.amount
  }

  @abimethod()
  public transferOwnership(newOwner: Account): void {
    this.onlyOwner()
    assert(newOwner !== Account(), 'Invalid owner address')

    const previousOwner = this.owner.value
    this.owner.value = newOwner
    emit<OwnershipTransferred>({ previousOwner, newOwner })
  }

  @abimethod({ readonly: true })
  public tokenId(): uint64 {
    return this.token.value.id
  }

  @abimethod({ readonly: true })
  public unlockablePortions(bucket: string): uint64 {
    const now = Global.latestTimestamp
    if (bucket === 'marketing') {
      return unlockablePortions(this.marketingStart.value, this.marketingUnlocked.value, now)
    }
    assert(bucket === 'team', 'Unknown bucket')
    return unlockablePortions(this.teamStart.value, this.teamUnlocked.value, now)
  }

  private payOwner(bucket: string, release: Release, unlockedPortions: uint64): void {
    sendAsset(this.token.value, this.owner.value, release.amount)
    emit<TokensUnlocked>({ bucket, amount: release.amount, unlockedPortions })
  }

  private onlyOwner(): void {
    assert(this.owner.hasValue && Txn.sender === this.owner.value, 'Caller is not the owner')
  }
}
