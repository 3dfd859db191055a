/**
 * Identity.ts
 * Party identities for sellers, buyers, the owner role and the engine itself
 */

// ============================================================================
// Types
// ============================================================================

export type PartyId = string;

/**
 * The all-zero address. Treated as "no party" wherever an identity is required.
 */
export const NULL_PARTY: PartyId = '0x0000000000000000000000000000000000000000';

// ============================================================================
// Helpers
// ============================================================================

export function isNullParty(party: PartyId | null | undefined): boolean {
  if (party === null || party === undefined) return true;
  const trimmed = party.trim();
  return trimmed.length === 0 || trimmed.toLowerCase() === NULL_PARTY;
}

export function isSameParty(a: PartyId, b: PartyId): boolean {
  return !isNullParty(a) && a === b;
}
