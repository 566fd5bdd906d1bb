/**
 * Lifecycle Controller — mint, burn, transfer and use.
 *
 * Composes:
 * - AssetLedger (who owns what, in which enumeration order)
 * - AssetStateStore (use counters, levels, limits)
 * - CapabilityCheck (MINTER / OPERATOR roles)
 * - HaltCheck (maintenance mode)
 *
 * Every call checks halt and capability first, then touches the state
 * store, then (for ownership changes) the ledger. If the ledger throws
 * without committing, the store change is undone; once the ledger has
 * committed, the store change stands even if a sink throws afterwards.
 * Calls are synchronous, so each one completes before the next begins.
 *
 * Halt blocks mint, burn and transfer. It does not block use.
 */

import type { AssetLedger } from "@cardkeep/ledger";
import type {
  Address,
  CapabilityCheck,
  CardEvent,
  CardEventSink,
  CardId,
  CardMeta,
  HaltCheck,
  Level,
} from "@cardkeep/types";
import { CardError, NULL_ADDRESS, assertUint128, isUint128 } from "@cardkeep/types";
import { assertCapability, assertNotHalted } from "./access.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { AssetStateStore } from "./state-store.js";
import type { HolderUseResult } from "./types.js";

export interface LifecycleDeps {
  readonly ledger: AssetLedger;
  readonly store: AssetStateStore;
  readonly capabilities: CapabilityCheck;
  readonly halt: HaltCheck;
  readonly sink?: CardEventSink | undefined;
  readonly logger?: Logger | undefined;
  /** First identifier to assign. Default: 0 */
  readonly nextId?: CardId | undefined;
}

export class LifecycleController {
  private readonly ledger: AssetLedger;
  private readonly store: AssetStateStore;
  private readonly capabilities: CapabilityCheck;
  private readonly halt: HaltCheck;
  private readonly sink: CardEventSink | undefined;
  private readonly logger: Logger;
  private _nextId: CardId;

  constructor(deps: LifecycleDeps) {
    this.ledger = deps.ledger;
    this.store = deps.store;
    this.capabilities = deps.capabilities;
    this.halt = deps.halt;
    this.sink = deps.sink;
    this.logger = deps.logger ?? silentLogger();
    this._nextId = deps.nextId ?? 0n;
  }

  /** The identifier the next mint will receive. */
  get nextId(): CardId {
    return this._nextId;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mint
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Mint one card to `to` with a fixed level. Requires MINTER.
   * `maxOwns` is not consulted.
   */
  mint(actor: Address, to: Address, level: Level): CardId {
    assertNotHalted(this.halt);
    assertCapability(this.capabilities, actor, "MINTER");
    this.assertMintable(to, level);

    return this.mintOne(actor, to, level);
  }

  /**
   * Mint `tos.length` cards; `tos[i]` receives identifier `nextId + i`
   * with `levels[i]`. Every input is validated before the first mint, so a
   * failure leaves nothing minted.
   */
  mintBatch(actor: Address, tos: readonly Address[], levels: readonly Level[]): CardId[] {
    assertNotHalted(this.halt);
    assertCapability(this.capabilities, actor, "MINTER");
    if (tos.length === 0 || tos.length !== levels.length) {
      throw new CardError(
        "WRONG_INPUT_PARAMS",
        `Expected equal, non-empty recipient and level lists, got ${tos.length} and ${levels.length}`,
      );
    }

    const items = tos.map((to, i) => ({ to, level: levels[i] ?? 0n }));
    for (const { to, level } of items) {
      this.assertMintable(to, level);
    }

    return items.map(({ to, level }) => this.mintOne(actor, to, level));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Burn
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Burn a card. The actor must own it or be approved for it.
   */
  burn(actor: Address, id: CardId): void {
    assertNotHalted(this.halt);
    if (!this.ledger.exists(id)) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} does not exist`);
    }
    if (!this.ledger.isApprovedOrOwner(actor, id)) {
      throw new CardError(
        "CALLER_IS_NOT_OWNER_NOR_APPROVED",
        `"${actor}" is neither owner nor approved for card ${id.toString()}`,
      );
    }

    const meta = this.store.getMeta(id);
    this.store.clearMeta(id);
    try {
      this.ledger.burnOwnership(actor, id);
    } catch (err) {
      // The ledger emits last, so a card it still holds was never burned.
      if (this.ledger.exists(id)) {
        this.store.restoreMeta(id, meta);
      }
      throw err;
    }
    this.logger.debug({ actor, cardId: id.toString() }, "Card burned");
  }

  /**
   * Burn cards one after another. The first failure propagates; cards
   * burned before it stay burned.
   */
  burnBatch(actor: Address, ids: readonly CardId[]): void {
    for (const id of ids) {
      this.burn(actor, id);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfer
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move one card. Ownership, approval and halt are checked by the ledger.
   * Uses travel with the card.
   */
  transfer(actor: Address, from: Address, to: Address, id: CardId): void {
    this.ledger.transferOwnership(actor, from, to, id);
    this.logger.debug({ actor, from, to, cardId: id.toString() }, "Card transferred");
  }

  /**
   * Move cards one after another. The first failure propagates; cards
   * moved before it stay moved.
   */
  transferBatch(actor: Address, from: Address, to: Address, ids: readonly CardId[]): void {
    for (const id of ids) {
      this.transfer(actor, from, to, id);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Use
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Add `count` uses to one card. Requires OPERATOR.
   * Emits `card.used` with the headroom left.
   */
  use(actor: Address, id: CardId, count: bigint): CardMeta {
    assertCapability(this.capabilities, actor, "OPERATOR");
    if (!this.ledger.exists(id)) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} does not exist`);
    }
    assertUseCount(count);

    this.applyUse(actor, id, count);
    return this.store.getMeta(id);
  }

  /**
   * Add `count` uses to the first card of `owner` that can take them.
   *
   * Cards are visited in the ledger's enumeration order (index 0 up to
   * balance - 1); the lowest index with `uses + count <= maxUses` wins.
   */
  useFromHolder(actor: Address, owner: Address, count: bigint): HolderUseResult {
    assertCapability(this.capabilities, actor, "OPERATOR");
    assertUseCount(count);
    if (this.ledger.balanceOf(owner) === 0) {
      throw new CardError("NOT_EXISTS", `"${owner}" holds no cards`);
    }

    const id = this.findFirstFit(owner, count);
    if (id === undefined) {
      throw new CardError(
        "MAX_USES_COUNT_REACHED",
        `No card of "${owner}" can take ${count.toString()} more uses`,
      );
    }

    this.applyUse(actor, id, count);
    return { cardId: id, meta: this.store.getMeta(id) };
  }

  /**
   * Whether `useFromHolder(owner, count)` would succeed right now.
   * False for a zero count, an out-of-range count or an empty holder.
   */
  canUseFrom(owner: Address, count: bigint): boolean {
    if (count === 0n || !isUint128(count) || this.ledger.balanceOf(owner) === 0) {
      return false;
    }
    return this.findFirstFit(owner, count) !== undefined;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Sum of uses across every card of `owner`, in enumeration order.
   */
  totalUsesOf(owner: Address): bigint {
    const balance = this.ledger.balanceOf(owner);
    if (balance === 0) {
      throw new CardError("NOT_EXISTS", `"${owner}" holds no cards`);
    }

    let total = 0n;
    for (let i = 0; i < balance; i++) {
      total += this.store.getMeta(this.ledger.cardOfOwnerByIndex(owner, i)).uses;
    }
    return total;
  }

  usesOf(id: CardId): bigint {
    return this.store.getMeta(id).uses;
  }

  levelOf(id: CardId): Level {
    return this.store.getMeta(id).level;
  }

  metaOf(id: CardId): CardMeta {
    return this.store.getMeta(id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private assertMintable(to: Address, level: Level): void {
    if (to === NULL_ADDRESS) {
      throw new CardError("INVALID_RECIPIENT", "Cannot mint to the null holder");
    }
    assertUint128(level, "level");
  }

  private mintOne(actor: Address, to: Address, level: Level): CardId {
    const id = this._nextId;
    this._nextId = id + 1n;
    this.store.setMeta(id, level);
    try {
      this.ledger.mintOwnership(actor, to, id);
    } catch (err) {
      // A card the ledger does not hold was never minted; reclaim the id.
      if (!this.ledger.exists(id)) {
        this.store.clearMeta(id);
        this._nextId = id;
      }
      throw err;
    }

    this.logger.debug({ actor, to, cardId: id.toString(), level: level.toString() }, "Card minted");
    return id;
  }

  private findFirstFit(owner: Address, count: bigint): CardId | undefined {
    const balance = this.ledger.balanceOf(owner);
    for (let i = 0; i < balance; i++) {
      const id = this.ledger.cardOfOwnerByIndex(owner, i);
      if (this.store.canAccept(id, count)) {
        return id;
      }
    }
    return undefined;
  }

  private applyUse(actor: Address, id: CardId, count: bigint): void {
    const uses = this.store.recordUse(id, count);
    const remainingUses = this.store.remainingUses(uses);

    this.logger.debug(
      { actor, cardId: id.toString(), count: count.toString(), uses: uses.toString() },
      "Card used",
    );
    this.emit({ type: "card.used", actor, payload: { cardId: id, remainingUses } });
  }

  private emit(event: CardEvent): void {
    this.sink?.emit(event);
  }
}

function assertUseCount(count: bigint): void {
  if (count === 0n) {
    throw new CardError("ZERO_USE_COUNT", "Use count must be greater than zero");
  }
  assertUint128(count, "count");
}
