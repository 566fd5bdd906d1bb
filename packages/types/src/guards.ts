/**
 * Runtime Type Guards
 *
 * Narrowing and range checks for card primitives.
 * Used at system boundaries (config, snapshots, caller input).
 */

import type { Address, Role } from "./card.js";
import { MAX_UINT128, MAX_UINT256, ROLES } from "./card.js";
import type { CardEventType } from "./event.js";
import { CardError } from "./errors.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ROLE_SET = new Set<string>(ROLES);

const EVENT_TYPES = new Set<string>([
  "card.transferred",
  "card.approved",
  "card.approval-for-all",
  "card.used",
  "limits.updated",
  "level-uri.updated",
  "base-uri.updated",
  "role.granted",
  "role.revoked",
  "registry.halted",
  "registry.resumed",
]);

const DECIMAL = /^(0|[1-9][0-9]*)$/;

/** A holder address: any non-empty string. */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.length > 0;
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

export function isCardEventType(value: unknown): value is CardEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isUint128(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_UINT128;
}

export function isCardId(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_UINT256;
}

// =============================================================================
// Assertions
// =============================================================================

/**
 * Throw INVALID_VALUE unless `value` fits an unsigned 128-bit counter.
 */
export function assertUint128(value: bigint, name: string): void {
  if (!isUint128(value)) {
    throw new CardError(
      "INVALID_VALUE",
      `${name} must be an unsigned 128-bit integer, got ${String(value)}`,
    );
  }
}

/**
 * Parse a non-negative decimal string into a bigint.
 * Rejects signs, whitespace, leading zeros and anything above `max`.
 */
export function parseUint(raw: string, name: string, max: bigint = MAX_UINT128): bigint {
  if (!DECIMAL.test(raw)) {
    throw new CardError("INVALID_VALUE", `${name} must be a decimal integer, got "${raw}"`);
  }
  const value = BigInt(raw);
  if (value > max) {
    throw new CardError("INVALID_VALUE", `${name} is out of range: ${raw}`);
  }
  return value;
}
