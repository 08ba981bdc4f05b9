import {
  abimethod,
  Account,
  assert,
  BoxMap,
  emit,
  Global,
  GlobalState,
  Txn,
  type Asset,
  type biguint,
  type uint64,
} from '@algorandfoundation/algorand-typescript'
import { AccessControl } from '../access/access-control.algo'
import { ADMIN_ROLE, PRICE_UPDATER_ROLE } from '../access/roles.algo'
import { optInToAsset, receiveAsset, receivePayment, sendAsset, sendPayment } from '../assets/transfers.algo'
import { isStale, nativeToUsd, normalizeDecimals, PRICE_DECIMALS, usdToMainToken } from './pricing.algo'

export const DEFAULT_MAIN_TOKEN_PRICE: uint64 = 1_100_000 // 1.1 USD
export const DEFAULT_PRICE_FEED_MAX_AGE: uint64 = 3_600

type FundingAddressSet = { fundingAddress: Account }
type MainTokenSet = { token: Asset }
type MainTokenPriceSet = { price: uint64 }
type PriceFeedMaxAgeSet = { seconds: uint64 }
type StableTokenAllowed = { token: Asset }
type StableTokenDisallowed = { token: Asset }
type NativePriceUpdated = { answer: uint64; decimals: uint64; updatedAt: uint64 }
// assetIn is 0 for ALGO
type TokensSwapped = { buyer: Account; assetIn: uint64; amountIn: uint64; usdValue: biguint; mainAmount: uint64 }

/**
 * Sells the main token held by this contract for allowed stablecoins or
 * ALGO, the latter priced by the last answer a price updater pushed.
 * Proceeds are forwarded to the funding address.
 */
export class SwapContract extends AccessControl {
  public initialized = GlobalState<boolean>({ initialValue: false })
  public fundingAddress = GlobalState<Account>()
  public mainToken = GlobalState<Asset>()

  public mainTokenPrice = GlobalState<uint64>({ initialValue: DEFAULT_MAIN_TOKEN_PRICE })
  public priceFeedMaxAge = GlobalState<uint64>({ initialValue: DEFAULT_PRICE_FEED_MAX_AGE })

  public nativePrice = GlobalState<uint64>({ initialValue: 0 })
  public nativePriceDecimals = GlobalState<uint64>({ initialValue: 0 })
  public nativePriceUpdatedAt = GlobalState<uint64>({ initialValue: 0 })

  public stableTokens = BoxMap<Asset, uint64>({ keyPrefix: 'stable' })

  @abimethod()
  public initialize(admin: Account, fundingAddress: Account): void {
    assert(!this.initialized.value, 'Already initialized')
    assert(Txn.sender === Global.creatorAddress, 'Only creator can initialize')
    assert(admin !== Account(), 'Invalid admin address')
    assert(fundingAddress !== Account(), 'Invalid funding address')

    this.initialized.value = true
    this.setupRole(ADMIN_ROLE, admin)
    this.fundingAddress.value = fundingAddress
  }

  @abimethod()
  public setFundingAddress(fundingAddress: Account): void {
    this.onlyRole(ADMIN_ROLE)
    assert(fundingAddress !== Account(), 'Invalid funding address')
    this.fundingAddress.value = fundingAddress
    emit<FundingAddressSet>({ fundingAddress })
  }

  @abimethod()
  public setMainToken(token: Asset): void {
    this.onlyRole(ADMIN_ROLE)
    assert(!this.mainToken.hasValue, 'Main token already set')
    this.mainToken.value = token
    optInToAsset(token)
    emit<MainTokenSet>({ token })
  }

  @abimethod()
  public setMainTokenPrice(price: uint64): void {
    this.onlyRole(ADMIN_ROLE)
    assert(price > 0, 'Price must be > 0')
    this.mainTokenPrice.value = price
    emit<MainTokenPriceSet>({ price })
  }

  @abimethod()
  public setPriceFeedMaxAge(seconds: uint64): void {
    this.onlyRole(ADMIN_ROLE)
    assert(seconds > 0, 'Duration must be > 0')
    this.priceFeedMaxAge.value = seconds
    emit<PriceFeedMaxAgeSet>({ seconds })
  }

  @abimethod()
  public allowStableToken(token: Asset): void {
    this.onlyRole(ADMIN_ROLE)
    if (!this.stableTokens(token).exists) {
      this.stableTokens(token).value = 1
      optInToAsset(token)
      emit<StableTokenAllowed>({ token })
    }
  }

  @abimethod()
  public disallowStableToken(token: Asset): void {
    this.onlyRole(ADMIN_ROLE)
    if (this.stableTokens(token).exists) {
      this.stableTokens(token).delete()
      emit<StableTokenDisallowed>({ token })
    }
  }

  /** Records the ALGO/USD answer, `decimals` fraction digits. */
  @abimethod()
  public updateNativePrice(answer: uint64, decimals: uint64): void {
    this.onlyRole(PRICE_UPDATER_ROLE)
    assert(answer > 0, 'Invalid price')
    assert(decimals <= PRICE_DECIMALS, 'Too many price decimals')

    const updatedAt = Global.latestTimestamp
    this.nativePrice.value = answer
    this.nativePriceDecimals.value = decimals
    this.nativePriceUpdatedAt.value = updatedAt
    emit<NativePriceUpdated>({ answer, decimals, updatedAt })
  }

  @abimethod({ readonly: true })
  public allowedStableTokens(token: Asset): boolean {
    return this.stableTokens(token).exists
  }

  /** Main-token amount `amount` of an allowed stablecoin buys right now. */
  @abimethod({ readonly: true })
  public quoteStable(token: Asset, amount: uint64): uint64 {
    return this.mainTokenFor(normalizeDecimals(amount, token.decimals))
  }

  @abimethod({ readonly: true })
  public quoteNative(amount: uint64): uint64 {
    return this.mainTokenFor(this.nativeUsdValue(amount))
  }

  /** Pays with the stablecoin transfer placed right before this call. */
  @abimethod()
  public swapStableTokens(token: Asset, amount: uint64): uint64 {
    assert(this.stableTokens(token).exists, 'Token is not an allowed stablecoin')
    assert(amount > 0, 'Amount must be > 0')

    const received = receiveAsset(token, amount, 0)
    const usdValue = normalizeDecimals(received, token.decimals)
    const mainAmount = this.payOut(usdValue)

    sendAsset(token, this.fundingAddress.value, received)
    emit<TokensSwapped>({ buyer: Txn.sender, assetIn: token.id, amountIn: received, usdValue, mainAmount })
    return mainAmount
  }

  /** Pays with the ALGO payment placed right before this call. */
  @abimethod()
  public swapNative(amount: uint64): uint64 {
    assert(amount > 0, 'Amount must be > 0')

    const received = receivePayment(amount)
    const usdValue = this.nativeUsdValue(received)
    const mainAmount = this.payOut(usdValue)

    sendPayment(this.fundingAddress.value, received)
    emit<TokensSwapped>({ buyer: Txn.sender, assetIn: 0, amountIn: received, usdValue, mainAmount })
    return mainAmount
  }

  private mainTokenFor(usdValue: biguint): uint64 {
    assert(this.mainToken.hasValue, 'Main token not set')
    return usdToMainToken(usdValue, this.mainTokenPrice.value, this.mainToken.value.decimals)
  }

  private nativeUsdValue(amount: uint64): biguint {
    assert(this.nativePrice.value > 0, 'Native price not set')
    assert(
      !isStale(this.nativePriceUpdatedAt.value, Global.latestTimestamp, this.priceFeedMaxAge.value),
      'Stale price',
    )
    return nativeToUsd(amount, this.nativePrice.value, this.nativePriceDecimals.value)
  }

  private payOut(usdValue: biguint): uint64 {
    const mainAmount = this.mainTokenFor(usdValue)
    assert(mainAmount > 0, 'Amount too small')

    const main = this.mainToken.value
    assert(main.balance(Global.currentApplicationAddress) >= mainAmount, 'Not enough main tokens in the contract')
    sendAsset(main, Txn.sender, mainAmount)
    return mainAmount
  }
}
