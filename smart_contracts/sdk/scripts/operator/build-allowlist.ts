/**
 * Operator Script: Build Allowlist
 *
 * Reads a JSON array of addresses and writes the allowlist artifact (root and
 * per-address proofs) to be published alongside the task.
 *
 * Usage:
 *   tsx smart_contracts/sdk/scripts/operator/build-allowlist.ts \
 *     --input ./allowlists/beta.json \
 *     --output ./outputs/beta.allowlist.json \
 *     [--encoding task-bound --taskId 4]
 */

import fs from 'fs'
import { createLogger } from '../../../lib/logger'
import type { LeafEncoding } from '../../../merkle/leaf'
import { computeAllowlist, saveAllowlistToFile } from '../../src/builders/allowlist'
import { loadLedgerConfig } from '../../src/config/ledger'
import { parseBigIntSetting, parseLeafEncoding } from '../../src/lib/validate'
import { AllowlistValidationError } from '../../src/types/allowlist'

/**
 * Parse command line arguments
 */
function parseArgs(): {
  input: string
  output: string
  encoding?: LeafEncoding
  taskId?: bigint
} {
  const args = process.argv.slice(2)
  let input = ''
  let output = ''
  let encoding: LeafEncoding | undefined
  let taskId: bigint | undefined

  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i]
    const value = args[i + 1] ?? ''

    switch (flag) {
      case '--input':
        input = value
        break
      case '--output':
        output = value
        break
      case '--encoding':
        encoding = parseLeafEncoding(value)
        break
      case '--taskId':
        taskId = parseBigIntSetting(value, '--taskId')
        break
    }
  }

  if (!input || !output) {
    console.error('Usage: build-allowlist.ts --input <addresses.json> --output <artifact.json> [--encoding identity|task-bound] [--taskId <id>]')
    process.exit(1)
  }

  return { input, output, encoding, taskId }
}

function readAddresses(file: string): string[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'))
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new AllowlistValidationError(`${file} must contain a JSON array of address strings`)
  }
  return parsed
}

/**
 * Main execution
 */
async function main() {
  const { input, output, encoding, taskId } = parseArgs()

  // Step 1: Load configuration (leaf encoding defaults to the ledger's)
  const config = loadLedgerConfig()
  const logger = createLogger('build-allowlist', config.logLevel)
  const leafEncoding = encoding ?? config.leafEncoding

  logger.info('=== Build Allowlist ===')
  logger.info(`Ledger: ${config.ledgerId}`)
  logger.info(`Encoding: ${leafEncoding}${taskId === undefined ? '' : ` (task ${taskId})`}`)

  // Step 2: Read addresses
  const addresses = readAddresses(input)
  logger.info(`Addresses read: ${addresses.length}`)

  // Step 3: Build tree and proofs
  const artifact = computeAllowlist({ addresses, leafEncoding, taskId })

  // Step 4: Persist
  saveAllowlistToFile(artifact, output, logger)
  logger.info('=== Allowlist Complete ===')
}

main().catch((error) => {
  console.error('Error:', error)
  process.exit(1)
})
