import {
  abimethod,
  Account,
  assert,
  Asset,
  BigUint,
  BoxMap,
  emit,
  Global,
  GlobalState,
  op,
  Txn,
  Uint64,
  type biguint,
  type bytes,
  type uint64,
} from '@algorandfoundation/algorand-typescript'
import { AccessControl } from '../access/access-control.algo'
import { ADMIN_ROLE, ANNOUNCER_ROLE } from '../access/roles.algo'
import { optInToAsset, receiveAsset, sendAsset } from '../assets/transfers.algo'
import { minUint64, SCALE, toUint64 } from '../math/fixed-point.algo'
import {
  accrualWindow,
  accruedReward,
  campaignLength,
  distributedAmount,
  indexDelta,
  isCampaignActive,
  rewardRate,
  undistributedRewards,
  withdrawableRewards,
} from './accrual.algo'
import {
  DEFAULT_CAMPAIGN_DURATION,
  DEFAULT_UNSTAKE_PERIOD,
  MAX_CAMPAIGN_DURATION,
  MAX_UNSTAKE_PERIOD,
} from './constants.algo'

export type UnlockEntry = { amount: uint64; depositTimestamp: uint64 }

export type UserStats = {
  currentStake: uint64
  pendingRewards: uint64
  totalClaimed: uint64
  rewardsPerSecond: uint64
  depositCount: uint64
  unlockableAmount: uint64
  totalUnstaked: uint64
  unstakePeriod: uint64
  stakingTokenBalance: uint64
}

export type GlobalStats = {
  totalStaked: uint64
  totalStakers: uint64
  activeStakers: uint64
  totalDistributed: uint64
  totalPendingRewards: uint64
  availableBank: uint64
  currentCampaignRewards: uint64
  campaignStart: uint64
  campaignEnd: uint64
  rewardRatePerToken: biguint
}

export type StakerRewards = {
  staker: Account
  pendingRewards: uint64
  claimedRewards: uint64
  totalRewards: uint64
  stake: uint64
}

export type AvailableRewards = { distributed: uint64; available: uint64 }

type TokenAddressesSet = { stakingToken: uint64; rewardsToken: uint64 }
type CampaignDurationSet = { duration: uint64 }
type UnstakePeriodSet = { period: uint64 }
type Deposit = { sender: Account; amount: uint64 }
type Withdraw = { asset: uint64; amount: uint64; receiver: Account }
type Announce = { rewardAmount: uint64; startTime: uint64; finishTime: uint64 }
type Stake = { staker: Account; amount: uint64 }
type Unstake = { staker: Account; amount: uint64 }
type ClaimRewards = { staker: Account; amount: uint64 }

/**
 * Campaign Staking Contract
 *
 * Users stake the staking asset and earn the reward asset from time-boxed
 * campaigns announced by an admin or announcer. Each campaign's reward is
 * released evenly over its duration and split between stakers in
 * proportion to stake and time staked.
 *
 * Rewards are tracked with a global accrual index (reward per unit of stake
 * since genesis, at 1e18 precision) and a per-user snapshot of it, both
 * advanced lazily at the top of every mutating call, so no call ever loops
 * over stakers. Principal is locked per deposit for `unstakePeriod` seconds.
 */
export class CampaignStakingContract extends AccessControl {
  public initialized = GlobalState<boolean>({ initialValue: false })
  public stakingToken = GlobalState<Asset>()
  public rewardsToken = GlobalState<Asset>()

  public campaignDuration = GlobalState<uint64>({ initialValue: DEFAULT_CAMPAIGN_DURATION })
  public unstakePeriod = GlobalState<uint64>({ initialValue: DEFAULT_UNSTAKE_PERIOD })

  // Current campaign; superseded by the next announce
  public campaignStart = GlobalState<uint64>({ initialValue: 0 })
  public campaignFinish = GlobalState<uint64>({ initialValue: 0 })
  public campaignReward = GlobalState<uint64>({ initialValue: 0 })

  public accrualIndex = GlobalState<biguint>({ initialValue: BigUint(0) })
  public lastUpdateTime = GlobalState<uint64>({ initialValue: 0 })
  public distributedScaled = GlobalState<biguint>({ initialValue: BigUint(0) })
  public globalStake = GlobalState<uint64>({ initialValue: 0 })

  // Reward treasury
  public deposited = GlobalState<uint64>({ initialValue: 0 })
  public totalRewardsCommitted = GlobalState<uint64>({ initialValue: 0 })
  public totalClaimed = GlobalState<uint64>({ initialValue: 0 })

  public stakes = BoxMap<Account, uint64>({ keyPrefix: 'stake' })
  public snapshots = BoxMap<Account, biguint>({ keyPrefix: 'snap' })
  public unclaimed = BoxMap<Account, uint64>({ keyPrefix: 'owed' })
  public claimed = BoxMap<Account, uint64>({ keyPrefix: 'claimed' })
  public unstaked = BoxMap<Account, uint64>({ keyPrefix: 'unstaked' })

  // Principal deposits, keyed by staker address followed by the deposit number
  public depositCount = BoxMap<Account, uint64>({ keyPrefix: 'deposits' })
  public depositAmounts = BoxMap<bytes, uint64>({ keyPrefix: 'dep_amt' })
  public depositTimes = BoxMap<bytes, uint64>({ keyPrefix: 'dep_ts' })

  // Everyone who ever staked, in first-stake order
  public stakerCount = GlobalState<uint64>({ initialValue: 0 })
  public stakerAt = BoxMap<uint64, Account>({ keyPrefix: 'staker' })

  @abimethod()
  public initialize(admin: Account, announcer: Account): void {
    assert(!this.initialized.value, 'Already initialized')
    assert(Txn.sender === Global.creatorAddress, 'Only creator can initialize')
    assert(admin !== Account(), 'Invalid admin address')
    assert(announcer !== Account(), 'Invalid announcer address')

    this.initialized.value = true
    this.setupRole(ADMIN_ROLE, admin)
    this.setupRole(ANNOUNCER_ROLE, announcer)
  }

  /**
   * Sets the staking and reward assets and opts the contract into both.
   * Can only be done once.
   */
  @abimethod()
  public setTokenAddresses(stakingToken: Asset, rewardsToken: Asset): void {
    this.onlyRole(ADMIN_ROLE)
    assert(!this.stakingToken.hasValue, 'Token addresses can only be set once')
    assert(stakingToken !== rewardsToken, 'Staking and rewards tokens must be different')

    this.stakingToken.value = stakingToken
    this.rewardsToken.value = rewardsToken
    optInToAsset(stakingToken)
    optInToAsset(rewardsToken)

    emit<TokenAddressesSet>({ stakingToken: stakingToken.id, rewardsToken: rewardsToken.id })
  }

  /**
   * Duration of campaigns announced from now on. The running campaign keeps
   * its own window.
   */
  @abimethod()
  public setCampaignDuration(duration: uint64): void {
    this.onlyRole(ADMIN_ROLE)
    assert(duration > 0, 'Duration must be > 0')
    assert(duration <= MAX_CAMPAIGN_DURATION, 'Duration too long')

    this.campaignDuration.value = duration
    emit<CampaignDurationSet>({ duration })
  }

  @abimethod()
  public setUnstakePeriod(period: uint64): void {
    this.onlyRole(ADMIN_ROLE)
    assert(period > 0, 'Duration must be > 0')
    assert(period <= MAX_UNSTAKE_PERIOD, 'Duration too long')

    this.unstakePeriod.value = period
    emit<UnstakePeriodSet>({ period })
  }

  /**
   * Adds reward-asset funds to the treasury. Requires a companion transfer
   * of the reward asset; the measured holding change is credited, not the
   * nominal amount.
   */
  @abimethod()
  public deposit(amount: uint64): void {
    this.depositRewards(amount)
  }

  /**
   * Admin withdrawal. Reward funds already promised to a campaign and
   * staking-asset funds owed to stakers cannot be withdrawn.
   */
  @abimethod()
  public withdraw(asset: Asset, amount: uint64): void {
    this.onlyRole(ADMIN_ROLE)
    assert(amount > 0, 'Amount must be > 0')
    this.updateGlobalIndex()

    if (this.rewardsToken.hasValue && asset === this.rewardsToken.value) {
      const available = withdrawableRewards(this.deposited.value, this.totalRewardsCommitted.value)
      assert(amount <= available, 'Amount exceeds withdrawable rewards')
      this.deposited.value = this.deposited.value - amount
    } else {
      const owed: uint64 =
        this.stakingToken.hasValue && asset === this.stakingToken.value ? this.globalStake.value : Uint64(0)
      const holding = asset.balance(Global.currentApplicationAddress)
      assert(holding >= owed && amount <= holding - owed, 'Amount exceeds withdrawable balance')
    }

    sendAsset(asset, Txn.sender, amount)
    emit<Withdraw>({ asset: asset.id, amount, receiver: Txn.sender })
  }

  /**
   * Starts a new campaign paying `rewardAmount` over `campaignDuration`
   * seconds from now.
   */
  @abimethod()
  public announce(rewardAmount: uint64): void {
    this.onlyAdminOrAnnouncer()
    this.startCampaign(rewardAmount)
  }

  @abimethod()
  public depositAndAnnounce(amount: uint64): void {
    this.onlyAdminOrAnnouncer()
    const received = this.depositRewards(amount)
    this.startCampaign(received)
  }

  /**
   * Stake tokens
   * Requires a companion transfer of the staking asset right before this call
   */
  @abimethod()
  public stake(amount: uint64): void {
    this.requireTokens()
    assert(amount > 0, 'Amount must be > 0')

    const staker = Txn.sender
    const received = receiveAsset(this.stakingToken.value, amount, this.globalStake.value)

    // Close the books on the old stake before it changes
    this.updateGlobalIndex()
    this.settle(staker)

    const count = this.depositCountOf(staker)
    if (count === 0) {
      this.stakerAt(this.stakerCount.value).value = staker
      this.stakerCount.value = this.stakerCount.value + 1
    }
    const key = this.depositKey(staker, count)
    this.depositAmounts(key).value = received
    this.depositTimes(key).value = Global.latestTimestamp
    this.depositCount(staker).value = count + 1

    this.stakes(staker).value = this.stakeOf(staker) + received
    this.globalStake.value = this.globalStake.value + received

    emit<Stake>({ staker, amount: received })
  }

  /**
   * Withdraws unlocked principal. Only deposits older than `unstakePeriod`
   * count towards what can be unstaked.
   */
  @abimethod()
  public unstake(amount: uint64): void {
    this.requireTokens()
    assert(amount > 0, 'Amount must be > 0')

    const staker = Txn.sender
    assert(amount <= this.unlockableOf(staker), 'Amount exceeds unlockable balance')

    this.updateGlobalIndex()
    this.settle(staker)

    this.stakes(staker).value = this.stakeOf(staker) - amount
    this.unstaked(staker).value = this.unstakedOf(staker) + amount
    this.globalStake.value = this.globalStake.value - amount

    sendAsset(this.stakingToken.value, staker, amount)
    emit<Unstake>({ staker, amount })
  }

  @abimethod()
  public claimRewards(): void {
    this.requireTokens()
    const staker = Txn.sender

    this.updateGlobalIndex()
    const reward = this.settle(staker)
    assert(reward > 0, 'No rewards')

    this.unclaimed(staker).value = 0
    this.claimed(staker).value = this.claimedOf(staker) + reward
    this.totalClaimed.value = this.totalClaimed.value + reward

    sendAsset(this.rewardsToken.value, staker, reward)
    emit<ClaimRewards>({ staker, amount: reward })
  }

  @abimethod({ readonly: true })
  public currentIndex(): biguint {
    return this.projectedIndex()
  }

  /**
   * Reward the user could claim right now
   */
  @abimethod({ readonly: true })
  public pendingReward(user: Account): uint64 {
    return this.pendingAt(user, this.projectedIndex())
  }

  @abimethod({ readonly: true })
  public rewards(user: Account): uint64 {
    return this.pendingAt(user, this.projectedIndex())
  }

  @abimethod({ readonly: true })
  public localStake(user: Account): uint64 {
    return this.stakeOf(user)
  }

  @abimethod({ readonly: true })
  public totalClaimedRewards(user: Account): uint64 {
    return this.claimedOf(user)
  }

  @abimethod({ readonly: true })
  public totalUnstaked(user: Account): uint64 {
    return this.unstakedOf(user)
  }

  @abimethod({ readonly: true })
  public getUnlockableAmount(user: Account): uint64 {
    return this.unlockableOf(user)
  }

  @abimethod({ readonly: true })
  public getUserDeposits(user: Account): UnlockEntry[] {
    const entries: UnlockEntry[] = []
    const count = this.depositCountOf(user)
    for (let i: uint64 = 0; i < count; i++) {
      const key = this.depositKey(user, i)
      entries.push({ amount: this.depositAmounts(key).value, depositTimestamp: this.depositTimes(key).value })
    }
    return entries
  }

  @abimethod({ readonly: true })
  public totalDistributed(): uint64 {
    return this.projectedDistributed()
  }

  @abimethod({ readonly: true })
  public getAvailableRewards(): AvailableRewards {
    return {
      distributed: this.projectedDistributed(),
      available: withdrawableRewards(this.deposited.value, this.totalRewardsCommitted.value),
    }
  }

  @abimethod({ readonly: true })
  public getUserStats(user: Account): UserStats {
    const stake = this.stakeOf(user)
    const rate = this.activeRewardRate()
    let stakingTokenBalance: uint64 = 0
    if (this.stakingToken.hasValue) {
      const [balance, optedIn] = op.AssetHolding.assetBalance(user, this.stakingToken.value)
      stakingTokenBalance = optedIn ? balance : Uint64(0)
    }

    return {
      currentStake: stake,
      pendingRewards: this.pendingAt(user, this.projectedIndex()),
      totalClaimed: this.claimedOf(user),
      rewardsPerSecond: toUint64((BigUint(stake) * rate) / SCALE),
      depositCount: this.depositCountOf(user),
      unlockableAmount: this.unlockableOf(user),
      totalUnstaked: this.unstakedOf(user),
      unstakePeriod: this.unstakePeriod.value,
      stakingTokenBalance,
    }
  }

  @abimethod({ readonly: true })
  public getGlobalStats(): GlobalStats {
    const index = this.projectedIndex()
    const total = this.stakerCount.value

    let activeStakers: uint64 = 0
    let totalPendingRewards: uint64 = 0
    for (let i: uint64 = 0; i < total; i++) {
      const staker = this.stakerAt(i).value
      if (this.stakeOf(staker) > 0) {
        activeStakers++
      }
      totalPendingRewards += this.pendingAt(staker, index)
    }

    return {
      totalStaked: this.globalStake.value,
      totalStakers: total,
      activeStakers,
      totalDistributed: this.projectedDistributed(),
      totalPendingRewards,
      availableBank: withdrawableRewards(this.deposited.value, this.totalRewardsCommitted.value),
      currentCampaignRewards: this.campaignReward.value,
      campaignStart: this.campaignStart.value,
      campaignEnd: this.campaignFinish.value,
      rewardRatePerToken: this.activeRewardRate(),
    }
  }

  /**
   * Rewards of `size` stakers starting at `offset`, in first-stake order.
   */
  @abimethod({ readonly: true })
  public getStakersRewardsBatch(offset: uint64, size: uint64): StakerRewards[] {
    assert(size > 0, 'Batch size must be greater than 0')
    const total = this.stakerCount.value
    assert(offset === 0 || offset < total, 'Offset out of bounds')

    const index = this.projectedIndex()
    const end = minUint64(offset + size, total)
    const batch: StakerRewards[] = []
    for (let i: uint64 = offset; i < end; i++) {
      batch.push(this.stakerRewards(this.stakerAt(i).value, index))
    }
    return batch
  }

  @abimethod({ readonly: true })
  public getRewardsByAddresses(addresses: Account[]): StakerRewards[] {
    assert(addresses.length > 0, 'Addresses array cannot be empty')

    const index = this.projectedIndex()
    const batch: StakerRewards[] = []
    for (const address of addresses) {
      batch.push(this.stakerRewards(address, index))
    }
    return batch
  }

  private requireTokens(): void {
    assert(this.stakingToken.hasValue && this.rewardsToken.hasValue, 'Token addresses must be set first')
  }

  private stakeOf(user: Account): uint64 {
    const [value, exists] = this.stakes(user).maybe()
    return exists ? value : Uint64(0)
  }

  private snapshotOf(user: Account): biguint {
    const [value, exists] = this.snapshots(user).maybe()
    return exists ? value : BigUint(0)
  }

  private unclaimedOf(user: Account): uint64 {
    const [value, exists] = this.unclaimed(user).maybe()
    return exists ? value : Uint64(0)
  }

  private claimedOf(user: Account): uint64 {
    const [value, exists] = this.claimed(user).maybe()
    return exists ? value : Uint64(0)
  }

  private unstakedOf(user: Account): uint64 {
    const [value, exists] = this.unstaked(user).maybe()
    return exists ? value : Uint64(0)
  }

  private depositCountOf(user: Account): uint64 {
    const [value, exists] = this.depositCount(user).maybe()
    return exists ? value : Uint64(0)
  }

  private depositKey(user: Account, position: uint64): bytes {
    return user.bytes.concat(op.itob(position))
  }

  private pendingAt(user: Account, index: biguint): uint64 {
    return this.unclaimedOf(user) + accruedReward(this.stakeOf(user), this.snapshotOf(user), index)
  }

  private stakerRewards(staker: Account, index: biguint): StakerRewards {
    const pending = this.pendingAt(staker, index)
    const claimed = this.claimedOf(staker)
    return {
      staker,
      pendingRewards: pending,
      claimedRewards: claimed,
      totalRewards: pending + claimed,
      stake: this.stakeOf(staker),
    }
  }

  /**
   * Deposits are never removed; what was already taken out is subtracted
   * from the unlocked total instead.
   */
  private unlockableOf(user: Account): uint64 {
    const now = Global.latestTimestamp
    const period = this.unstakePeriod.value
    const count = this.depositCountOf(user)

    let unlocked: uint64 = 0
    for (let i: uint64 = 0; i < count; i++) {
      const key = this.depositKey(user, i)
      if (now - this.depositTimes(key).value >= period) {
        unlocked += this.depositAmounts(key).value
      }
    }
    const taken = this.unstakedOf(user)
    return unlocked > taken ? unlocked - taken : Uint64(0)
  }

  private activeRewardRate(): biguint {
    const start = this.campaignStart.value
    const finish = this.campaignFinish.value
    if (!isCampaignActive(start, finish, Global.latestTimestamp)) {
      return BigUint(0)
    }
    return rewardRate(this.campaignReward.value, campaignLength(start, finish), this.globalStake.value)
  }

  private pendingDelta(): biguint {
    const start = this.campaignStart.value
    const finish = this.campaignFinish.value
    const elapsed = accrualWindow(start, finish, this.lastUpdateTime.value, Global.latestTimestamp)
    return indexDelta(this.campaignReward.value, campaignLength(start, finish), this.globalStake.value, elapsed)
  }

  /** The index `updateGlobalIndex` would produce now, without writing it. */
  private projectedIndex(): biguint {
    return this.accrualIndex.value + this.pendingDelta()
  }

  private projectedDistributed(): uint64 {
    return distributedAmount(this.distributedScaled.value + this.pendingDelta() * BigUint(this.globalStake.value))
  }

  /**
   * Integrates the reward rate over the part of the elapsed time that falls
   * inside the campaign window.
   */
  private updateGlobalIndex(): void {
    const delta = this.pendingDelta()
    this.accrualIndex.value = this.accrualIndex.value + delta
    this.distributedScaled.value = this.distributedScaled.value + delta * BigUint(this.globalStake.value)
    if (Global.latestTimestamp > this.lastUpdateTime.value) {
      this.lastUpdateTime.value = Global.latestTimestamp
    }
  }

  /**
   * Folds what the user earned since their snapshot into their unclaimed
   * balance. Must run right after updateGlobalIndex and before the user's
   * stake changes.
   */
  private settle(user: Account): uint64 {
    const index = this.accrualIndex.value
    const owed = this.pendingAt(user, index)
    this.snapshots(user).value = index
    this.unclaimed(user).value = owed
    return owed
  }

  private depositRewards(amount: uint64): uint64 {
    this.requireTokens()
    assert(amount > 0, 'Amount must be > 0')

    // Reward holding already owed: deposited funds not yet paid out as claims
    const accounted: uint64 = this.deposited.value - this.totalClaimed.value
    const received = receiveAsset(this.rewardsToken.value, amount, accounted)
    this.deposited.value = this.deposited.value + received

    emit<Deposit>({ sender: Txn.sender, amount: received })
    return received
  }

  private startCampaign(rewardAmount: uint64): void {
    const now = Global.latestTimestamp
    assert(rewardAmount > 0, 'Rewards amount must be greater than zero')
    assert(now >= this.campaignFinish.value, "The previous campaign hasn't finished")

    // Flush the outgoing campaign before its window is replaced
    this.updateGlobalIndex()
    const distributed = distributedAmount(this.distributedScaled.value)
    assert(
      undistributedRewards(this.deposited.value, distributed) >= rewardAmount,
      'Not enough deposit for the campaign',
    )

    const finish: uint64 = now + this.campaignDuration.value
    this.campaignStart.value = now
    this.campaignFinish.value = finish
    this.campaignReward.value = rewardAmount
    this.totalRewardsCommitted.value = this.totalRewardsCommitted.value + rewardAmount

    emit<Announce>({ rewardAmount, startTime: now, finishTime: finish })
  }
}
