import {
  abimethod,
  Account,
  assert,
  BoxMap,
  Contract,
  emit,
  Txn,
  Uint64,
  type uint64,
} from '@algorandfoundation/algorand-typescript'
import { ADMIN_ROLE, ANNOUNCER_ROLE, PRICE_UPDATER_ROLE } from './roles.algo'

type RoleGranted = { role: uint64; account: Account; sender: Account }
type RoleRevoked = { role: uint64; account: Account; sender: Account }

/**
 * Role registry for contracts administered by an admin account.
 */
export abstract class AccessControl extends Contract {
  public roles = BoxMap<Account, uint64>({ keyPrefix: 'role' })

  @abimethod({ readonly: true })
  public hasRole(role: uint64, account: Account): boolean {
    return this.holdsRole(role, account)
  }

  @abimethod()
  public grantRole(role: uint64, account: Account): void {
    this.onlyRole(ADMIN_ROLE)
    assert(this.isKnownRole(role), 'Unknown role')
    assert(account !== Account(), 'Invalid account address')

    if (!this.holdsRole(role, account)) {
      this.setupRole(role, account)
      emit<RoleGranted>({ role, account, sender: Txn.sender })
    }
  }

  @abimethod()
  public revokeRole(role: uint64, account: Account): void {
    this.onlyRole(ADMIN_ROLE)

    if (this.holdsRole(role, account)) {
      const remaining: uint64 = this.roles(account).value ^ role
      if (remaining === Uint64(0)) {
        this.roles(account).delete()
      } else {
        this.roles(account).value = remaining
      }
      emit<RoleRevoked>({ role, account, sender: Txn.sender })
    }
  }

  protected holdsRole(role: uint64, account: Account): boolean {
    const [mask, exists] = this.roles(account).maybe()
    return exists && (mask & role) === role
  }

  protected setupRole(role: uint64, account: Account): void {
    const [mask, exists] = this.roles(account).maybe()
    this.roles(account).value = exists ? mask | role : role
  }

  protected onlyRole(role: uint64): void {
    assert(this.holdsRole(role, Txn.sender), 'Caller is missing the required role')
  }

  protected onlyAdminOrAnnouncer(): void {
    const sender = Txn.sender
    assert(
      this.holdsRole(ADMIN_ROLE, sender) || this.holdsRole(ANNOUNCER_ROLE, sender),
      'Caller must be admin or announcer',
    )
  }

  private isKnownRole(role: uint64): boolean {
    return role === ADMIN_ROLE || role === ANNOUNCER_ROLE || role === PRICE_UPDATER_ROLE
  }
}
