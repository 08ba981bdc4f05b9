import { assert, Global, gtxn, itxn, Txn, type Account, type Asset, type uint64 } from '@algorandfoundation/algorand-typescript'
import { minUint64 } from '../math/fixed-point.algo'

/**
 * Credits the asset transfer placed right before this app call.
 *
 * The credited amount is what the app's holding grew by beyond `accounted`
 * (the part of the holding already owed to someone), capped at the
 * transfer's nominal amount.
 */
export function receiveAsset(asset: Asset, amount: uint64, accounted: uint64): uint64 {
  assert(Txn.groupIndex >= 1, 'App call must follow asset transfer')
  const transferIndex: uint64 = Txn.groupIndex - 1
  const transfer = gtxn.AssetTransferTxn(transferIndex)

  assert(transfer.xferAsset === asset, 'Must transfer the expected asset')
  assert(transfer.assetReceiver === Global.currentApplicationAddress, 'Must send to contract')
  assert(transfer.sender === Txn.sender, 'Transfer must be from caller')
  assert(transfer.assetAmount === amount, 'Transfer amount does not match')

  const holding = asset.balance(Global.currentApplicationAddress)
  assert(holding >= accounted, 'Holding below accounted balance')
  const received = minUint64(amount, holding - accounted)
  assert(received > 0, 'No tokens received')
  return received
}

/**
 * Checks the payment placed right before this app call. ALGO payments
 * always land in full, so the nominal amount is what the app received.
 */
export function receivePayment(amount: uint64): uint64 {
  assert(Txn.groupIndex >= 1, 'App call must follow payment')
  const paymentIndex: uint64 = Txn.groupIndex - 1
  const payment = gtxn.PaymentTxn(paymentIndex)

  assert(payment.receiver === Global.currentApplicationAddress, 'Payment must be to app')
  assert(payment.sender === Txn.sender, 'Payment must be from caller')
  assert(payment.amount === amount, 'Payment amount does not match')
  assert(payment.closeRemainderTo === Global.zeroAddress, 'closeRemainderTo must be zero')
  return amount
}

export function sendPayment(receiver: Account, amount: uint64): void {
  itxn.payment({ receiver, amount }).submit()
}

export function sendAsset(asset: Asset, receiver: Account, amount: uint64): void {
  itxn
    .assetTransfer({
      assetReceiver: receiver,
      assetAmount: amount,
      xferAsset: asset,
    })
    .submit()
}

export function optInToAsset(asset: Asset): void {
  itxn
    .assetTransfer({
      assetReceiver: Global.currentApplicationAddress,
      assetAmount: 0,
      xferAsset: asset,
    })
    .submit()
}
