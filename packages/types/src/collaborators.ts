/**
 * Collaborator contracts consumed by the card state machine.
 *
 * Authorization policy and maintenance mode live outside the card logic
 * and are reached only through these two questions.
 */

import type { Address, Role } from "./card.js";

/** Answers whether an actor holds a role. */
export interface CapabilityCheck {
  hasCapability(actor: Address, role: Role): boolean;
}

/** Answers whether the system is in maintenance mode. */
export interface HaltCheck {
  isHalted(): boolean;
}
