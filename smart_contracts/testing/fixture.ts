import algosdk from 'algosdk'
import { RoleRegistry } from '../access_guard/contract'
import { ManualClock } from '../lib/clock'
import type { Hash32 } from '../merkle/hash'
import { IDENTITY_LEAF_ENCODER, type LeafEncoder } from '../merkle/leaf'
import { buildMerkleTree, getProofForLeaf, type MerkleTree } from '../merkle/tree'
import { RewardDistributor } from '../reward_distributor/contract'
import { RewardToken } from '../reward_token/contract'
import { EscrowCustody, type TokenCustody } from '../reward_token/custody'

/**
 * In-process ledger fixture: manual clock, capped token, escrow custody,
 * role registry and a distributor wired together.
 */

/** Deterministic, checksum-valid address for test account `seed` */
export function testAddress(seed: number): string {
  return algosdk.getApplicationAddress(seed)
}

export const START = 1_767_225_600n // 2026-01-01T00:00:00Z
export const THIRTY_DAYS = 30n * 86_400n

export interface LedgerFixture {
  clock: ManualClock
  token: RewardToken
  custody: EscrowCustody
  roles: RoleRegistry
  distributor: RewardDistributor
  admin: string
  validator: string
  escrow: string
  /** Mint `amount` to `account` and approve the escrow to pull it */
  fund(account: string, amount: bigint): void
}

export interface LedgerFixtureOptions {
  now?: bigint
  leafEncoder?: LeafEncoder
  supplyCap?: bigint
  /** Wraps the escrow custody, e.g. to simulate a hostile token */
  wrapCustody?: (inner: EscrowCustody, distributor: () => RewardDistributor) => TokenCustody
}

export function createLedgerFixture(options: LedgerFixtureOptions = {}): LedgerFixture {
  const admin = testAddress(1)
  const validator = testAddress(2)
  const escrow = testAddress(3)

  const clock = new ManualClock(options.now ?? START)
  const token = new RewardToken('RWD', options.supplyCap ?? 1_000_000_000n, admin)
  const custody = new EscrowCustody(token, escrow)
  const roles = new RoleRegistry(admin)
  roles.grantRole(admin, 'Validator', validator)

  let distributor: RewardDistributor | undefined
  const current = (): RewardDistributor => {
    if (!distributor) throw new Error('distributor not constructed yet')
    return distributor
  }

  distributor = new RewardDistributor({
    access: roles,
    custody: options.wrapCustody ? options.wrapCustody(custody, current) : custody,
    clock,
    leafEncoder: options.leafEncoder,
  })

  return {
    clock,
    token,
    custody,
    roles,
    distributor,
    admin,
    validator,
    escrow,
    fund(account, amount) {
      token.mint(admin, account, amount)
      token.approve(account, escrow, token.allowance(account, escrow) + amount)
    },
  }
}

export interface TestAllowlist {
  tree: MerkleTree
  root: Hash32
  proofOf(address: string): Hash32[]
}

export function buildTestAllowlist(
  addresses: readonly string[],
  encoder: LeafEncoder = IDENTITY_LEAF_ENCODER,
  taskId = 0n
): TestAllowlist {
  const tree = buildMerkleTree(addresses.map((address) => encoder.encode(address, taskId)))
  return {
    tree,
    root: tree.root,
    proofOf: (address) => getProofForLeaf(tree, encoder.encode(address, taskId)),
  }
}
