/**
 * @cardkeep/types — Shared primitives for the card stack.
 *
 * Used by every cardkeep package:
 * - Card identity, metadata and limits
 * - Roles and collaborator contracts
 * - Structured errors
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Numeric state is bigint
 */

// Card types
export type { Address, CardId, Level, CardMeta, CardLimits, Role } from "./card.js";
export { NULL_ADDRESS, MAX_UINT128, MAX_UINT256, ROLES } from "./card.js";

// Collaborators
export type { CapabilityCheck, HaltCheck } from "./collaborators.js";

// Errors
export type { CardErrorCode } from "./errors.js";
export { CardError, isCardError } from "./errors.js";

// Event types
export type {
  CardEvent,
  CardEventOf,
  CardEventPayloads,
  CardEventSink,
  CardEventType,
} from "./event.js";

// Runtime guards
export {
  isAddress,
  isRole,
  isCardEventType,
  isUint128,
  isCardId,
  assertUint128,
  parseUint,
} from "./guards.js";
