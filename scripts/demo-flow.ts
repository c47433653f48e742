// Demo script (in-process) walking one task through its whole lifecycle:
// 1) build an allowlist for three identities
// 2) launch a task gated on its root (admin)
// 3) claim as a member, then show the refusals for a repeat and an outsider
// 4) rotate the root, let the window close and sweep the remainder
//
// Everything runs against an in-memory ledger with a manual clock, so the
// script needs no network and can be re-run freely.

import algosdk from 'algosdk'
import { ManualClock, ONE_DAY } from '../smart_contracts/lib/clock'
import { computeAllowlist } from '../smart_contracts/sdk/src/builders/allowlist'
import { loadLedgerConfig } from '../smart_contracts/sdk/src/config/ledger'
import { createRewardLedger } from '../smart_contracts/sdk/src/lib/ledger'
import { RewardClaimant } from '../smart_contracts/sdk/src/ops/claimant'
import { RewardOperator } from '../smart_contracts/sdk/src/ops/operator'

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function main() {
  const config = loadLedgerConfig()
  const clock = new ManualClock(BigInt(Math.floor(Date.now() / 1000)))
  const ledger = createRewardLedger(config, { clock })
  const operator = new RewardOperator(ledger)
  const claimant = new RewardClaimant(ledger)

  // Placeholder identities derived from app ids
  const [alice, bob, carol, dave] = [2001, 2002, 2003, 2004].map((id) => algosdk.getApplicationAddress(id))

  console.log('\n=== 1) Allowlist ===')
  const allowlist = computeAllowlist({
    addresses: [alice, bob, carol],
    leafEncoding: config.leafEncoding,
    taskId: config.leafEncoding === 'task-bound' ? ledger.distributor.getNextTaskId() : undefined,
  })
  console.log(`root=${allowlist.root} leaves=${allowlist.leafCount} hash=${allowlist.hash}`)

  console.log('\n=== 2) Launch ===')
  const task = operator.launchTask({
    name: 'Demo quest',
    allowlist,
    rewardAmount: 100n,
    totalPool: 1_000n,
    durationSeconds: 7n * ONE_DAY,
  })
  console.dir(operator.summarize(task.taskId), { depth: 1 })

  console.log('\n=== 3) Claims ===')
  const result = claimant.claim(task.taskId, alice, allowlist)
  console.log(`alice received ${result.amountClaimed}, ${result.remainingRewards} left`)

  for (const [label, who] of [
    ['alice again', alice],
    ['dave (not listed)', dave],
  ] as const) {
    try {
      claimant.claim(task.taskId, who, allowlist)
      console.log(`${label}: unexpectedly succeeded`)
    } catch (error) {
      console.log(`${label}: ${describeError(error)}`)
    }
  }

  console.log('\n=== 4) Rotate, close, sweep ===')
  const rotated = computeAllowlist({
    addresses: [alice, bob, dave],
    leafEncoding: config.leafEncoding,
    taskId: config.leafEncoding === 'task-bound' ? task.taskId : undefined,
  })
  operator.rotateRoot(task.taskId, rotated)
  claimant.claim(task.taskId, dave, rotated)

  clock.set(task.endTime + 1n)
  const swept = operator.sweep(task.taskId)
  console.log(`swept ${swept}`)
  console.dir(operator.summarize(task.taskId), { depth: 1 })

  console.log('\nEvents:')
  for (const event of ledger.distributor.getEvents()) {
    console.log(`  #${event.seq} ${event.name}${event.taskId === undefined ? '' : ` task=${event.taskId}`}`)
  }
}

main().catch((err) => {
  console.error('Demo error:', err)
  process.exit(1)
})
