import { describe, expect, it } from 'vitest'
import { LedgerError, ReentrancyError, TokenError, ValidationError } from '../lib/errors'
import type { Hash32 } from '../merkle/hash'
import { TASK_BOUND_LEAF_ENCODER } from '../merkle/leaf'
import type { CreateTaskParams } from '../task_registry/contract'
import { FlakyCustody, ReenteringCustody } from '../testing/custody'
import {
  buildTestAllowlist,
  createLedgerFixture,
  START,
  testAddress,
  THIRTY_DAYS,
  type LedgerFixtureOptions,
} from '../testing/fixture'

/**
 * ClaimLedger
 *
 * Invariants:
 * 1. One payout per (task, identity), regardless of root changes
 * 2. Check order: Paused, TaskNotActive, TaskNotStarted, TaskEnded,
 *    AlreadyClaimed, MaxClaimsReached, InsufficientRewardPool, InvalidProof
 * 3. The window is inclusive at both ends
 * 4. A failed payout leaves no claim record, counters or event behind
 * 5. Custody callbacks cannot re-enter any ledger mutation
 */
describe('ClaimLedger', () => {
  const alice = testAddress(10)
  const bob = testAddress(11)
  const carol = testAddress(12)
  const dave = testAddress(13)
  const allowlist = buildTestAllowlist([alice, bob, carol])
  const bogusProof: Hash32[] = [`0x${'ab'.repeat(32)}`]

  function params(overrides: Partial<CreateTaskParams> = {}): CreateTaskParams {
    return {
      name: 'Launch quest',
      membershipRoot: allowlist.root,
      rewardAmount: 100n,
      totalPool: 10_000n,
      maxClaims: 100n,
      startTime: START,
      endTime: START + THIRTY_DAYS,
      ...overrides,
    }
  }

  function setup(overrides: Partial<CreateTaskParams> = {}, options: LedgerFixtureOptions = {}) {
    const fx = createLedgerFixture(options)
    fx.fund(fx.admin, 100_000n)
    const taskId = fx.distributor.createTask(fx.admin, params(overrides))
    return { ...fx, taskId }
  }

  // -----------------------
  // Happy path
  // -----------------------

  it('claim: pays the reward and records the claim', () => {
    const { distributor, token, taskId } = setup()

    const receipt = distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(receipt).toEqual({
      taskId,
      identity: alice,
      amount: 100n,
      claimedAt: START,
      claimCount: 1n,
      remainingRewards: 9_900n,
    })
    expect(token.balanceOf(alice)).toBe(100n)
    expect(distributor.hasClaimed(taskId, alice)).toBe(true)
    expect(distributor.hasClaimed(taskId, bob)).toBe(false)
    expect(distributor.getClaim(taskId, alice)).toEqual({ taskId, identity: alice, amount: 100n, claimedAt: START })
    expect(distributor.getClaim(taskId, bob)).toBeUndefined()
    expect(distributor.getTotalDistributed()).toBe(100n)
    expect(distributor.getRemainingClaims(taskId)).toBe(99n)

    const claimed = distributor.getEvents({ name: 'RewardClaimed' })
    expect(claimed).toHaveLength(1)
    expect(claimed[0].identity).toBe(alice)
    expect(claimed[0].data).toEqual({ amount: 100n })
  })

  it('claim: second attempt is AlreadyClaimed', () => {
    const { distributor, token, taskId } = setup()
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(/AlreadyClaimed/)
    expect(token.balanceOf(alice)).toBe(100n)
  })

  it('claim: non-member is InvalidProof', () => {
    const { distributor, taskId } = setup()

    expect(() => distributor.claim(dave, taskId, allowlist.proofOf(alice))).toThrow(/InvalidProof/)
    expect(() => distributor.claim(dave, taskId, [])).toThrow(/InvalidProof/)
    expect(() => distributor.claim(alice, taskId, ['0xnot-hex'])).toThrow(/InvalidProof/)
  })

  it('claim: malformed claimant is a ValidationError', () => {
    const { distributor, taskId } = setup()

    expect(() => distributor.claim('alice', taskId, allowlist.proofOf(alice))).toThrow(ValidationError)
  })

  // -----------------------
  // Window and task state
  // -----------------------

  it('claim: window is inclusive at both ends', () => {
    const { distributor, clock, taskId } = setup({ startTime: START + 100n, endTime: START + 200n })

    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(/TaskNotStarted/)

    clock.set(START + 100n)
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    clock.set(START + 200n)
    distributor.claim(bob, taskId, allowlist.proofOf(bob))

    clock.set(START + 201n)
    expect(() => distributor.claim(carol, taskId, allowlist.proofOf(carol))).toThrow(/TaskEnded/)
  })

  it('claim: unknown or inactive task is TaskNotActive', () => {
    const { distributor, admin, taskId } = setup()

    expect(() => distributor.claim(alice, 42n, allowlist.proofOf(alice))).toThrow(/TaskNotActive/)

    distributor.deactivateTask(admin, taskId)
    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(/TaskNotActive/)

    distributor.reactivateTask(admin, taskId)
    expect(distributor.claim(alice, taskId, allowlist.proofOf(alice)).amount).toBe(100n)
  })

  // -----------------------
  // Caps
  // -----------------------

  it('claim: MaxClaimsReached once the cap is hit', () => {
    const { distributor, taskId } = setup({ maxClaims: 2n })
    distributor.claim(alice, taskId, allowlist.proofOf(alice))
    distributor.claim(bob, taskId, allowlist.proofOf(bob))

    expect(() => distributor.claim(carol, taskId, allowlist.proofOf(carol))).toThrow(/MaxClaimsReached/)
    expect(distributor.getRemainingClaims(taskId)).toBe(0n)
  })

  it('claim: InsufficientRewardPool when one reward no longer fits', () => {
    const { distributor, token, taskId } = setup({ totalPool: 150n })
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(() => distributor.claim(bob, taskId, allowlist.proofOf(bob))).toThrow(/InsufficientRewardPool/)
    expect(distributor.getRemainingRewards(taskId)).toBe(50n)
    expect(token.balanceOf(bob)).toBe(0n)
  })

  // -----------------------
  // Check order
  // -----------------------

  it('check order: Paused comes before everything', () => {
    const { distributor, admin } = setup()
    distributor.pause(admin)

    expect(() => distributor.claim(alice, 42n, bogusProof)).toThrow(/Paused/)
  })

  it('check order: Paused before claimant validation', () => {
    const { distributor, admin, taskId } = setup()
    distributor.pause(admin)

    expect(() => distributor.claim('alice', taskId, [])).toThrow(/Paused/)
    distributor.unpause(admin)
    expect(() => distributor.claim('alice', taskId, [])).toThrow(ValidationError)
  })

  it('check order: TaskNotActive before window checks', () => {
    const { distributor, admin, clock, taskId } = setup()
    distributor.deactivateTask(admin, taskId)
    clock.set(START + THIRTY_DAYS + 1n)

    expect(() => distributor.claim(alice, taskId, bogusProof)).toThrow(/TaskNotActive/)
  })

  it('check order: window before AlreadyClaimed', () => {
    const { distributor, clock, taskId } = setup()
    distributor.claim(alice, taskId, allowlist.proofOf(alice))
    clock.set(START + THIRTY_DAYS + 1n)

    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(/TaskEnded/)
  })

  it('check order: AlreadyClaimed before MaxClaimsReached and InvalidProof', () => {
    const { distributor, taskId } = setup({ maxClaims: 1n })
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(() => distributor.claim(alice, taskId, bogusProof)).toThrow(/AlreadyClaimed/)
  })

  it('check order: MaxClaimsReached before InsufficientRewardPool', () => {
    const { distributor, taskId } = setup({ maxClaims: 1n, totalPool: 100n })
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(() => distributor.claim(bob, taskId, bogusProof)).toThrow(/MaxClaimsReached/)
  })

  it('check order: InsufficientRewardPool before InvalidProof', () => {
    const { distributor, taskId } = setup({ totalPool: 150n })
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(() => distributor.claim(dave, taskId, bogusProof)).toThrow(/InsufficientRewardPool/)
  })

  it('errors carry their code', () => {
    const { distributor, taskId } = setup()

    try {
      distributor.claim(dave, taskId, bogusProof)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerError)
      expect(error instanceof LedgerError && error.code).toBe('InvalidProof')
    }
  })

  // -----------------------
  // Root rotation and leaf encoding
  // -----------------------

  it('root rotation keeps existing claims', () => {
    const { distributor, validator, taskId } = setup()
    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    const rotated = buildTestAllowlist([alice, dave])
    distributor.updateMembershipRoot(validator, taskId, rotated.root)

    expect(() => distributor.claim(alice, taskId, rotated.proofOf(alice))).toThrow(/AlreadyClaimed/)
    expect(() => distributor.claim(bob, taskId, allowlist.proofOf(bob))).toThrow(/InvalidProof/)
    expect(distributor.claim(dave, taskId, rotated.proofOf(dave)).claimCount).toBe(2n)
  })

  it('identity leaves let one proof serve every task sharing the root', () => {
    const { distributor, admin, taskId } = setup()
    const second = distributor.createTask(admin, params({ name: 'Follow-up' }))

    distributor.claim(alice, taskId, allowlist.proofOf(alice))
    distributor.claim(alice, second, allowlist.proofOf(alice))

    expect(distributor.getTotalDistributed()).toBe(200n)
  })

  it('task-bound leaves reject a proof replayed against another task', () => {
    const bound = buildTestAllowlist([alice, bob, carol], TASK_BOUND_LEAF_ENCODER, 1n)
    const { distributor, admin, taskId } = setup(
      { membershipRoot: bound.root },
      { leafEncoder: TASK_BOUND_LEAF_ENCODER }
    )
    const second = distributor.createTask(admin, params({ membershipRoot: bound.root }))

    expect(distributor.claim(alice, taskId, bound.proofOf(alice)).amount).toBe(100n)
    expect(() => distributor.claim(alice, second, bound.proofOf(alice))).toThrow(/InvalidProof/)
  })

  // -----------------------
  // isEligible
  // -----------------------

  it('isEligible: membership and not yet claimed', () => {
    const { distributor, taskId } = setup()

    expect(distributor.isEligible(taskId, alice, allowlist.proofOf(alice))).toBe(true)
    expect(distributor.isEligible(taskId, dave, allowlist.proofOf(alice))).toBe(false)
    expect(distributor.isEligible(99n, alice, allowlist.proofOf(alice))).toBe(false)

    distributor.claim(alice, taskId, allowlist.proofOf(alice))
    expect(distributor.isEligible(taskId, alice, allowlist.proofOf(alice))).toBe(false)
  })

  it('isEligible: ignores window, active flag and pause', () => {
    const { distributor, admin, clock, taskId } = setup()
    distributor.deactivateTask(admin, taskId)
    distributor.pause(admin)
    clock.set(START + THIRTY_DAYS + 10n)

    expect(distributor.isEligible(taskId, bob, allowlist.proofOf(bob))).toBe(true)
  })

  it('isEligible: malformed identity is a ValidationError', () => {
    const { distributor, taskId } = setup()

    expect(() => distributor.isEligible(taskId, 'bob', [])).toThrow(ValidationError)
  })

  // -----------------------
  // Atomicity and reentrancy
  // -----------------------

  it('failed payout rolls back the whole claim', () => {
    const flaky = new FlakyCustody()
    const { distributor, token, escrow, taskId } = setup({}, { wrapCustody: (inner) => flaky.bind(inner) })
    flaky.failPayouts = true

    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(TokenError)

    expect(distributor.hasClaimed(taskId, alice)).toBe(false)
    expect(distributor.getTask(taskId).claimCount).toBe(0n)
    expect(distributor.getTask(taskId).claimedAmount).toBe(0n)
    expect(distributor.getTotalDistributed()).toBe(0n)
    expect(distributor.getEvents({ name: 'RewardClaimed' })).toEqual([])
    expect(token.balanceOf(escrow)).toBe(10_000n)

    flaky.failPayouts = false
    expect(distributor.claim(alice, taskId, allowlist.proofOf(alice)).claimCount).toBe(1n)
  })

  it('re-entering claim from a payout is rejected', () => {
    const hostile = new ReenteringCustody(true)
    const { distributor, token, taskId } = setup({}, { wrapCustody: (inner, ledger) => hostile.bind(inner, ledger) })
    hostile.onNextPayout((ledger) => ledger.claim(bob, taskId, allowlist.proofOf(bob)))

    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(hostile.caught).toHaveLength(1)
    expect(hostile.caught[0]).toBeInstanceOf(ReentrancyError)
    expect(distributor.hasClaimed(taskId, alice)).toBe(true)
    expect(distributor.hasClaimed(taskId, bob)).toBe(false)
    expect(token.balanceOf(bob)).toBe(0n)
    expect(distributor.getTask(taskId).claimCount).toBe(1n)
  })

  it('re-entering an admin operation from a payout is rejected', () => {
    const hostile = new ReenteringCustody(true)
    const { distributor, admin, taskId } = setup({}, { wrapCustody: (inner, ledger) => hostile.bind(inner, ledger) })
    hostile.onNextPayout((ledger) => ledger.increaseRewardPool(admin, taskId, 1n))

    distributor.claim(alice, taskId, allowlist.proofOf(alice))

    expect(hostile.caught[0]).toBeInstanceOf(ReentrancyError)
    expect(distributor.getTask(taskId).totalPool).toBe(10_000n)
  })

  it('a propagated reentrancy failure aborts the outer claim', () => {
    const hostile = new ReenteringCustody(false)
    const { distributor, token, taskId } = setup({}, { wrapCustody: (inner, ledger) => hostile.bind(inner, ledger) })
    hostile.onNextPayout((ledger) => ledger.claim(alice, taskId, allowlist.proofOf(alice)))

    expect(() => distributor.claim(alice, taskId, allowlist.proofOf(alice))).toThrow(ReentrancyError)

    expect(distributor.hasClaimed(taskId, alice)).toBe(false)
    expect(token.balanceOf(alice)).toBe(0n)

    expect(distributor.claim(alice, taskId, allowlist.proofOf(alice)).amount).toBe(100n)
  })
})
