import { TokenError } from '../lib/errors'
import { validateAddress } from '../lib/validate'

/**
 * Capped fungible token used as the single reward asset.
 *
 * Balances are whole base units (bigint). Only the minter may mint, and the
 * total supply can never exceed `supplyCap`. Failed operations leave every
 * balance untouched.
 */
export class RewardToken {
  private readonly balances = new Map<string, bigint>()
  private readonly allowances = new Map<string, bigint>()
  private supply = 0n

  constructor(
    readonly symbol: string,
    readonly supplyCap: bigint,
    readonly minter: string
  ) {
    validateAddress(minter, 'minter')
    if (supplyCap <= 0n) {
      throw new TokenError('InvalidTransferAmount', 'supplyCap must be positive')
    }
  }

  private allowanceKey(owner: string, spender: string): string {
    return `${owner}:${spender}`
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new TokenError('InvalidTransferAmount', `amount must be positive, got ${amount}`)
    }
  }

  totalSupply(): bigint {
    return this.supply
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n
  }

  mint(caller: string, to: string, amount: bigint): void {
    if (caller !== this.minter) {
      throw new TokenError('NotMinter', caller)
    }
    validateAddress(to, 'to')
    this.requirePositive(amount)
    if (this.supply + amount > this.supplyCap) {
      throw new TokenError('SupplyCapExceeded', `cap ${this.supplyCap}, supply ${this.supply}, mint ${amount}`)
    }

    this.supply += amount
    this.balances.set(to, this.balanceOf(to) + amount)
  }

  transfer(from: string, to: string, amount: bigint): void {
    validateAddress(to, 'to')
    this.requirePositive(amount)

    const balance = this.balanceOf(from)
    if (balance < amount) {
      throw new TokenError('InsufficientBalance', `${from} holds ${balance}, needs ${amount}`)
    }

    this.balances.set(from, balance - amount)
    this.balances.set(to, this.balanceOf(to) + amount)
  }

  approve(owner: string, spender: string, amount: bigint): void {
    validateAddress(spender, 'spender')
    this.allowances.set(this.allowanceKey(owner, spender), amount)
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): void {
    const allowed = this.allowance(from, spender)
    if (allowed < amount) {
      throw new TokenError('InsufficientAllowance', `${spender} may move ${allowed} from ${from}, needs ${amount}`)
    }

    this.transfer(from, to, amount)
    this.allowances.set(this.allowanceKey(from, spender), allowed - amount)
  }
}
