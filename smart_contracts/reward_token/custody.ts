import type { RewardToken } from './contract'

/**
 * Escrow interface consumed by the ledger. Implementations must throw when a
 * transfer cannot be completed; a returned call means the funds moved.
 */
export interface TokenCustody {
  deposit(from: string, amount: bigint): void
  pay(to: string, amount: bigint): void
  balanceHeld(): bigint
}

/**
 * Custody backed by a RewardToken account owned by the ledger. Deposits pull
 * through an allowance the depositor granted to the escrow account.
 */
export class EscrowCustody implements TokenCustody {
  constructor(
    private readonly token: RewardToken,
    readonly escrowAddress: string
  ) {}

  deposit(from: string, amount: bigint): void {
    this.token.transferFrom(this.escrowAddress, from, this.escrowAddress, amount)
  }

  pay(to: string, amount: bigint): void {
    this.token.transfer(this.escrowAddress, to, amount)
  }

  balanceHeld(): bigint {
    return this.token.balanceOf(this.escrowAddress)
  }
}
