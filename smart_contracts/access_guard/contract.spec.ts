import { describe, expect, it } from 'vitest'
import { AuthorizationError, ValidationError } from '../lib/errors'
import { testAddress } from '../testing/fixture'
import { requireRole, RoleRegistry } from './contract'

describe('RoleRegistry', () => {
  const admin = testAddress(1)
  const validator = testAddress(2)
  const outsider = testAddress(9)

  it('bootstraps a single Admin', () => {
    const roles = new RoleRegistry(admin)

    expect(roles.hasRole(admin, 'Admin')).toBe(true)
    expect(roles.hasRole(admin, 'Validator')).toBe(false)
    expect(roles.hasRole(outsider, 'Admin')).toBe(false)
  })

  it('grant and revoke are Admin-only and audited', () => {
    const roles = new RoleRegistry(admin)

    roles.grantRole(admin, 'Validator', validator)
    expect(roles.hasRole(validator, 'Validator')).toBe(true)

    expect(() => roles.grantRole(validator, 'Admin', validator)).toThrow(AuthorizationError)
    expect(() => roles.revokeRole(outsider, 'Validator', validator)).toThrow(/Unauthorized/)

    roles.revokeRole(admin, 'Validator', validator)
    expect(roles.hasRole(validator, 'Validator')).toBe(false)

    expect(roles.history()).toEqual([
      { role: 'Validator', principal: validator, granted: true, by: admin },
      { role: 'Validator', principal: validator, granted: false, by: admin },
    ])
  })

  it('rejects malformed principals', () => {
    expect(() => new RoleRegistry('admin')).toThrow(ValidationError)

    const roles = new RoleRegistry(admin)
    expect(() => roles.grantRole(admin, 'Validator', 'validator')).toThrow(ValidationError)
  })

  it('requireRole names the principal and role', () => {
    const roles = new RoleRegistry(admin)

    expect(() => requireRole(roles, outsider, 'Validator')).toThrow(`Unauthorized: ${outsider} lacks role Validator`)
    expect(() => requireRole(roles, admin, 'Admin')).not.toThrow()
  })
})
