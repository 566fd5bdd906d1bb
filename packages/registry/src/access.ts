/**
 * Access — role membership and maintenance mode.
 *
 * In-memory implementations of the two collaborator contracts the state
 * machine consults. Neither gates itself; RegistryAdmin decides who may
 * change them.
 */

import type { Address, CapabilityCheck, HaltCheck, Role } from "@cardkeep/types";
import { CardError, NULL_ADDRESS, ROLES } from "@cardkeep/types";

// =============================================================================
// Roles
// =============================================================================

export class RoleRegistry implements CapabilityCheck {
  private readonly _members = new Map<Role, Set<Address>>(
    ROLES.map((role): [Role, Set<Address>] => [role, new Set<Address>()]),
  );

  constructor(admin?: Address) {
    if (admin !== undefined) {
      this.grant("ADMIN", admin);
    }
  }

  /** Returns false when the account already held the role. */
  grant(role: Role, account: Address): boolean {
    if (account === NULL_ADDRESS) {
      throw new CardError("INVALID_RECIPIENT", `Cannot grant ${role} to the null holder`);
    }
    const members = this._set(role);
    if (members.has(account)) return false;
    members.add(account);
    return true;
  }

  /** Returns false when the account did not hold the role. */
  revoke(role: Role, account: Address): boolean {
    return this._set(role).delete(account);
  }

  hasCapability(actor: Address, role: Role): boolean {
    return this._set(role).has(actor);
  }

  membersOf(role: Role): readonly Address[] {
    return [...this._set(role)];
  }

  private _set(role: Role): Set<Address> {
    let members = this._members.get(role);
    if (members === undefined) {
      members = new Set();
      this._members.set(role, members);
    }
    return members;
  }
}

/**
 * Throw CAPABILITY_DENIED unless `actor` holds `role`.
 */
export function assertCapability(check: CapabilityCheck, actor: Address, role: Role): void {
  if (!check.hasCapability(actor, role)) {
    throw new CardError("CAPABILITY_DENIED", `"${actor}" lacks the ${role} role`);
  }
}

// =============================================================================
// Halt
// =============================================================================

export class HaltSwitch implements HaltCheck {
  private _halted: boolean;

  constructor(halted = false) {
    this._halted = halted;
  }

  /** Returns false when already halted. */
  halt(): boolean {
    if (this._halted) return false;
    this._halted = true;
    return true;
  }

  /** Returns false when not halted. */
  resume(): boolean {
    if (!this._halted) return false;
    this._halted = false;
    return true;
  }

  isHalted(): boolean {
    return this._halted;
  }
}

/**
 * Throw HALTED while the system is in maintenance mode.
 */
export function assertNotHalted(check: HaltCheck): void {
  if (check.isHalted()) {
    throw new CardError("HALTED", "Ownership changes are halted");
  }
}
