import { AuthorizationError } from '../lib/errors'
import { validateAddress } from '../lib/validate'

/**
 * Role-based access control for privileged ledger operations.
 *
 * Roles are flat capabilities. Admin does not imply Validator: root updates
 * are a narrower trust and must be granted on their own.
 */

export type Role = 'Admin' | 'Validator'

export const ROLES: readonly Role[] = ['Admin', 'Validator']

export interface AccessGuard {
  hasRole(principal: string, role: Role): boolean
}

export function requireRole(guard: AccessGuard, principal: string, role: Role): void {
  if (!guard.hasRole(principal, role)) {
    throw new AuthorizationError(principal, role)
  }
}

export interface RoleChange {
  role: Role
  principal: string
  granted: boolean
  by: string
}

export class RoleRegistry implements AccessGuard {
  private readonly members = new Map<Role, Set<string>>(ROLES.map((role) => [role, new Set<string>()]))
  private readonly changes: RoleChange[] = []

  constructor(bootstrapAdmin: string) {
    validateAddress(bootstrapAdmin, 'bootstrapAdmin')
    this.roleSet('Admin').add(bootstrapAdmin)
  }

  private roleSet(role: Role): Set<string> {
    let set = this.members.get(role)
    if (!set) {
      set = new Set<string>()
      this.members.set(role, set)
    }
    return set
  }

  hasRole(principal: string, role: Role): boolean {
    return this.roleSet(role).has(principal)
  }

  grantRole(caller: string, role: Role, principal: string): void {
    requireRole(this, caller, 'Admin')
    validateAddress(principal, 'principal')
    this.roleSet(role).add(principal)
    this.changes.push({ role, principal, granted: true, by: caller })
  }

  revokeRole(caller: string, role: Role, principal: string): void {
    requireRole(this, caller, 'Admin')
    this.roleSet(role).delete(principal)
    this.changes.push({ role, principal, granted: false, by: caller })
  }

  /** Audit trail of grants and revocations */
  history(): readonly RoleChange[] {
    return [...this.changes]
  }
}
