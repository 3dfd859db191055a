/**
 * AccessGuard.ts
 * Role checks for administrative and seller-only operations
 *
 * The owner role is assigned once, at construction, and never changes.
 */

import { MarketErrors } from '../market/MarketErrors';
import { PartyId, isNullParty } from './Identity';

// ============================================================================
// Types
// ============================================================================

export enum Role {
  OWNER = 'owner',
  PARTICIPANT = 'participant',
}

export interface AccessCheckResult {
  readonly allowed: boolean;
  readonly role: Role;
  readonly reason?: string;
}

// ============================================================================
// AccessGuard Implementation
// ============================================================================

export class AccessGuard {
  private readonly owner: PartyId;

  constructor(owner: PartyId) {
    if (isNullParty(owner)) {
      throw MarketErrors.nullIdentity('owner');
    }
    this.owner = owner;
  }

  getOwner(): PartyId {
    return this.owner;
  }

  roleOf(party: PartyId): Role {
    return party === this.owner ? Role.OWNER : Role.PARTICIPANT;
  }

  checkOwner(caller: PartyId): AccessCheckResult {
    const role = this.roleOf(caller);
    if (role === Role.OWNER) {
      return { allowed: true, role };
    }
    return { allowed: false, role, reason: 'owner role required' };
  }

  /**
   * Throws AuthorizationError unless `caller` holds the owner role.
   */
  requireOwner(caller: PartyId, operation: string): void {
    if (!this.checkOwner(caller).allowed) {
      throw MarketErrors.notOwner(operation, caller);
    }
  }
}
