/**
 * Caller authorization
 *
 * Each guarded operation declares the roles it accepts; the component
 * supplies a resolver that says which addresses hold a role at call
 * time (always re-derived, never cached).
 */

import { zeroAddress, type Address } from 'viem';
import { LendingError } from '../utils/errors.js';

export type CallerRole =
  | 'factory'
  | 'owner'
  | 'operator'
  | 'lendingPool'
  | 'liquidator'
  | 'positionOwner'
  | 'position'
  | 'bridge';

/**
 * Resolve whether `caller` holds `role` for the component being called
 */
export type RoleResolver = (role: CallerRole, caller: Address) => boolean;

/**
 * Map key for an address (case-insensitive)
 */
export function addressKey(address: Address): string {
  return address.toLowerCase();
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(address: Address): boolean {
  return sameAddress(address, zeroAddress);
}

/**
 * Return the first allowed role the caller holds, or throw UNAUTHORIZED
 */
export function requireRole(
  caller: Address,
  allowed: readonly CallerRole[],
  resolve: RoleResolver,
  operation: string
): CallerRole {
  for (const role of allowed) {
    if (resolve(role, caller)) return role;
  }
  throw new LendingError('UNAUTHORIZED', `${operation} requires one of [${allowed.join(', ')}]`, {
    caller,
    operation,
  });
}
