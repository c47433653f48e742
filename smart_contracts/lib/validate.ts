import algosdk from 'algosdk'
import { ValidationError } from './errors'

const HASH32_PATTERN = /^0x[0-9a-fA-F]{64}$/

export function isHash32(value: string): boolean {
  return HASH32_PATTERN.test(value)
}

export function validateAddress(address: string, field = 'address'): void {
  if (!algosdk.isValidAddress(address)) {
    throw new ValidationError(`${field} is not a valid address: ${address}`)
  }
}

export function validateHash32(value: string, field = 'hash'): void {
  if (!isHash32(value)) {
    throw new ValidationError(`${field} must be a 0x-prefixed 32-byte hex string, got ${value}`)
  }
}

export function validateTaskId(taskId: bigint): void {
  if (taskId <= 0n) {
    throw new ValidationError(`taskId must be positive, got ${taskId}`)
  }
}
