/**
 * @cardkeep/ledger — Enumerable card ownership ledger.
 *
 * A pure TypeScript ownership ledger with zero runtime dependencies.
 * Enforces ownership invariants:
 * - Every existing card has exactly one non-null owner
 * - Each owner's cards are enumerable by index in a stable order
 * - Ownership changes are blocked while halted
 * - Only the owner or an approved delegate may move a card
 */

// Core engine
export { InMemoryAssetLedger } from "./in-memory-ledger.js";

// Types
export type {
  AssetLedger,
  LedgerDeps,
  LedgerSnapshot,
  HolderSnapshot,
  ApprovalSnapshot,
  OperatorSnapshot,
} from "./types.js";
