/**
 * Asset State Store — per-card use counters and levels.
 *
 * Owns the mutable metadata of every card and the global limits.
 * `recordUse` is the only writer of `uses` and the single place the
 * `uses <= maxUses` bound is checked.
 *
 * Existence is answered by the ownership ledger, not by the presence of a
 * record: a freshly minted card with zero uses still exists.
 */

import type { AssetLedger } from "@cardkeep/ledger";
import type { CardId, CardLimits, CardMeta, Level } from "@cardkeep/types";
import { CardError, assertUint128 } from "@cardkeep/types";

export class AssetStateStore {
  private readonly _meta = new Map<CardId, CardMeta>();
  private readonly _ledger: Pick<AssetLedger, "exists">;
  private _limits: CardLimits;

  constructor(ledger: Pick<AssetLedger, "exists">, limits: CardLimits) {
    assertLimits(limits);
    this._ledger = ledger;
    this._limits = { ...limits };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Limits
  // ───────────────────────────────────────────────────────────────────────

  getLimits(): CardLimits {
    return this._limits;
  }

  /**
   * Replace the limits. Lowering `maxUses` below a card's current uses is
   * allowed; that card simply accepts no further use.
   */
  setLimits(limits: CardLimits): void {
    assertLimits(limits);
    this._limits = { ...limits };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Records
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a record with zero uses. The caller guarantees `id` is fresh.
   */
  setMeta(id: CardId, level: Level): void {
    assertUint128(level, "level");
    this._meta.set(id, { uses: 0n, level });
  }

  /** Drop the record for a burned card. Idempotent. */
  clearMeta(id: CardId): void {
    this._meta.delete(id);
  }

  /**
   * Add `count` uses to a card and return the new total.
   */
  recordUse(id: CardId, count: bigint): bigint {
    if (count === 0n) {
      throw new CardError("ZERO_USE_COUNT", "Use count must be greater than zero");
    }
    assertUint128(count, "count");

    const meta = this._meta.get(id);
    if (meta === undefined) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} does not exist`);
    }

    const uses = meta.uses + count;
    if (uses > this._limits.maxUses) {
      throw new CardError(
        "MAX_USES_COUNT_REACHED",
        `Card ${id.toString()} has ${meta.uses.toString()} of ${this._limits.maxUses.toString()} uses; cannot add ${count.toString()}`,
      );
    }

    this._meta.set(id, { uses, level: meta.level });
    return uses;
  }

  /**
   * Whether `count` more uses fit on a card. Missing records never fit.
   */
  canAccept(id: CardId, count: bigint): boolean {
    const meta = this._meta.get(id);
    return meta !== undefined && meta.uses + count <= this._limits.maxUses;
  }

  getMeta(id: CardId): CardMeta {
    if (!this._ledger.exists(id)) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} does not exist`);
    }
    return this._meta.get(id) ?? { uses: 0n, level: 0n };
  }

  /** Headroom left on a card; zero when limits were lowered below its uses. */
  remainingUses(uses: bigint): bigint {
    const remaining = this._limits.maxUses - uses;
    return remaining > 0n ? remaining : 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────

  /** All records in creation order. */
  entries(): readonly (readonly [CardId, CardMeta])[] {
    return [...this._meta];
  }

  /**
   * Load a record verbatim from a snapshot.
   */
  restoreMeta(id: CardId, meta: CardMeta): void {
    assertUint128(meta.uses, "uses");
    assertUint128(meta.level, "level");
    this._meta.set(id, { uses: meta.uses, level: meta.level });
  }
}

function assertLimits(limits: CardLimits): void {
  assertUint128(limits.maxOwns, "maxOwns");
  assertUint128(limits.maxUses, "maxUses");
}
