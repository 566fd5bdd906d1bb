/**
 * @cardkeep/registry — Types for the card state machine.
 *
 * Rules:
 * - All types are readonly
 * - bigint in memory, decimal strings in snapshots
 */

import type { LedgerSnapshot } from "@cardkeep/ledger";
import type {
  Address,
  CardEventSink,
  CardId,
  CardLimits,
  CardMeta,
  Role,
} from "@cardkeep/types";
import type { Logger } from "./logger.js";

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Outcome of a holder-wide use: which card absorbed the use and its
 * metadata afterwards.
 */
export interface HolderUseResult {
  readonly cardId: CardId;
  readonly meta: CardMeta;
}

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Options for building a CardRegistry.
 */
export interface RegistryOptions {
  readonly limits: CardLimits;
  /** Prefix joined onto level URIs. Empty means level URIs are used verbatim. */
  readonly baseUri?: string | undefined;
  /** Account granted ADMIN at construction. */
  readonly admin?: Address | undefined;
  readonly sink?: CardEventSink | undefined;
  readonly logger?: Logger | undefined;
}

/** Options accepted when restoring; limits, URIs and roles come from the snapshot. */
export type RestoreOptions = Pick<RegistryOptions, "sink" | "logger">;

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface CardSnapshot {
  readonly cardId: string;
  readonly uses: string;
  readonly level: string;
}

export interface LevelUriSnapshot {
  readonly level: string;
  readonly uri: string;
}

export interface RoleMemberSnapshot {
  readonly role: Role;
  readonly account: Address;
}

/**
 * Serializable snapshot of the whole registry, ownership included.
 * Versioned so that a future layout can migrate explicitly.
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly nextId: string;
  readonly limits: {
    readonly maxOwns: string;
    readonly maxUses: string;
  };
  readonly baseUri: string;
  readonly levelUris: readonly LevelUriSnapshot[];
  readonly cards: readonly CardSnapshot[];
  readonly roles: readonly RoleMemberSnapshot[];
  readonly halted: boolean;
  readonly ledger: LedgerSnapshot;
  readonly createdAt: string;
}
