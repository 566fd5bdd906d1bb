/**
 * Card Types
 *
 * Primitives shared by the ownership ledger and the card registry.
 *
 * Rules:
 * - All numeric state is bigint (no floating point, no overflow)
 * - All types are readonly
 * - The empty address is the null holder and never owns a card
 */

/** An account that can hold, mint, operate or administer cards. */
export type Address = string;

/** The null holder. Mints are transfers from it, burns are transfers to it. */
export const NULL_ADDRESS: Address = "";

/** Card identifier. Assigned once at mint, never reused. */
export type CardId = bigint;

/** Immutable classification tag fixed at mint. Drives metadata resolution. */
export type Level = bigint;

/** Largest value an unsigned 128-bit counter can hold. */
export const MAX_UINT128 = (1n << 128n) - 1n;

/** Largest value a card identifier can take. */
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Per-card mutable metadata.
 * `uses` only grows until the card is burned; `level` never changes.
 */
export interface CardMeta {
  readonly uses: bigint;
  readonly level: Level;
}

/**
 * Global limits read by the state machine.
 * `maxOwns` is stored and reported but not enforced.
 */
export interface CardLimits {
  readonly maxOwns: bigint;
  readonly maxUses: bigint;
}

/** Capabilities an actor may hold. */
export type Role = "MINTER" | "OPERATOR" | "ADMIN";

export const ROLES: readonly Role[] = ["MINTER", "OPERATOR", "ADMIN"] as const;
