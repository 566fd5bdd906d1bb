/**
 * @cardkeep/ledger — Ownership ledger contract and snapshot types.
 *
 * Rules:
 * - All types are readonly
 * - An owner's cards are enumerable by index, in a stable order
 * - Fail-closed: invalid operations throw CardError, never silently succeed
 */

import type {
  Address,
  CardEventSink,
  CardId,
  HaltCheck,
} from "@cardkeep/types";

// ─── Ledger Contract ─────────────────────────────────────────────────────

/**
 * Ownership bookkeeping for cards.
 *
 * Write primitives are halt-gated. Mints and burns are modelled as
 * transfers from and to the null holder, so they are gated the same way.
 */
export interface AssetLedger {
  /** Register `id` as owned by `to`. */
  mintOwnership(actor: Address, to: Address, id: CardId): void;

  /** Remove `id` from its owner. No approval check; callers gate this. */
  burnOwnership(actor: Address, id: CardId): void;

  /** Move `id` from `from` to `to`, checking that `actor` may do so. */
  transferOwnership(actor: Address, from: Address, to: Address, id: CardId): void;

  ownerOf(id: CardId): Address;
  balanceOf(owner: Address): number;

  /** The card at `index` in the owner's enumeration (0-based). */
  cardOfOwnerByIndex(owner: Address, index: number): CardId;

  exists(id: CardId): boolean;
  isApprovedOrOwner(actor: Address, id: CardId): boolean;
}

/**
 * Collaborators for the in-memory ledger.
 */
export interface LedgerDeps {
  readonly halt: HaltCheck;
  readonly sink?: CardEventSink | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** One owner and their cards in enumeration order. Ids are decimal strings. */
export interface HolderSnapshot {
  readonly owner: Address;
  readonly cards: readonly string[];
}

export interface ApprovalSnapshot {
  readonly cardId: string;
  readonly approved: Address;
}

export interface OperatorSnapshot {
  readonly owner: Address;
  readonly operator: Address;
}

/**
 * Serializable snapshot of the ownership ledger.
 * bigint identifiers are stored as decimal strings.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly holders: readonly HolderSnapshot[];
  readonly approvals: readonly ApprovalSnapshot[];
  readonly operators: readonly OperatorSnapshot[];
  readonly createdAt: string;
}
