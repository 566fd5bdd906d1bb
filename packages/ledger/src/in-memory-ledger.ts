/**
 * @cardkeep/ledger — In-memory enumerable ownership ledger.
 *
 * Tracks who owns each card and keeps a per-owner index so an owner's
 * cards can be walked by position. Suitable for:
 * - Unit and integration tests
 * - Embedding in a single process that persists via snapshots
 *
 * Enumeration order:
 * - A received card is appended to the end of its owner's list
 * - A removed card is replaced by the owner's last card (swap-and-pop)
 *
 * API surface:
 * - mintOwnership() / burnOwnership() / transferOwnership() — halt-gated writes
 * - approve() / setApprovalForAll() — delegation
 * - ownerOf() / balanceOf() / cardOfOwnerByIndex() / exists() — reads
 * - snapshot() / fromSnapshot() — persistence
 */

import type { Address, CardEvent, CardId } from "@cardkeep/types";
import { CardError, MAX_UINT256, NULL_ADDRESS, parseUint } from "@cardkeep/types";
import type {
  AssetLedger,
  HolderSnapshot,
  LedgerDeps,
  LedgerSnapshot,
  OperatorSnapshot,
} from "./types.js";

export class InMemoryAssetLedger implements AssetLedger {
  private readonly _owners = new Map<CardId, Address>();

  /** Per-owner enumeration lists. Empty lists are dropped. */
  private readonly _owned = new Map<Address, CardId[]>();

  /** Position of each card inside its owner's list. */
  private readonly _ownedIndex = new Map<CardId, number>();

  private readonly _approvals = new Map<CardId, Address>();
  private readonly _operators = new Map<Address, Set<Address>>();

  private readonly _deps: LedgerDeps;

  constructor(deps: LedgerDeps) {
    this._deps = deps;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  mintOwnership(actor: Address, to: Address, id: CardId): void {
    this._assertNotHalted();
    if (to === NULL_ADDRESS) {
      throw new CardError("INVALID_RECIPIENT", "Cannot mint to the null holder");
    }
    if (this._owners.has(id)) {
      throw new CardError("ALREADY_MINTED", `Card ${id.toString()} already exists`);
    }

    this._addToOwner(to, id);
    this._emit({
      type: "card.transferred",
      actor,
      payload: { from: NULL_ADDRESS, to, cardId: id },
    });
  }

  burnOwnership(actor: Address, id: CardId): void {
    this._assertNotHalted();
    const owner = this.ownerOf(id);

    this._approvals.delete(id);
    this._removeFromOwner(owner, id);
    this._emit({
      type: "card.transferred",
      actor,
      payload: { from: owner, to: NULL_ADDRESS, cardId: id },
    });
  }

  transferOwnership(actor: Address, from: Address, to: Address, id: CardId): void {
    this._assertNotHalted();
    if (!this.isApprovedOrOwner(actor, id)) {
      throw new CardError(
        "CALLER_IS_NOT_OWNER_NOR_APPROVED",
        `"${actor}" is neither owner nor approved for card ${id.toString()}`,
      );
    }
    if (this.ownerOf(id) !== from) {
      throw new CardError(
        "TRANSFER_FROM_INCORRECT_OWNER",
        `Card ${id.toString()} is not owned by "${from}"`,
      );
    }
    if (to === NULL_ADDRESS) {
      throw new CardError("INVALID_RECIPIENT", "Cannot transfer to the null holder");
    }

    this._approvals.delete(id);
    if (from !== to) {
      this._removeFromOwner(from, id);
      this._addToOwner(to, id);
    }
    this._emit({
      type: "card.transferred",
      actor,
      payload: { from, to, cardId: id },
    });
  }

  // ─── Delegation ──────────────────────────────────────────────────────

  /**
   * Approve `approved` to move one card. Pass the null holder to clear.
   */
  approve(actor: Address, approved: Address, id: CardId): void {
    const owner = this.ownerOf(id);
    if (approved === owner) {
      throw new CardError(
        "APPROVAL_TO_CURRENT_OWNER",
        `"${approved}" already owns card ${id.toString()}`,
      );
    }
    if (actor !== owner && !this.isApprovedForAll(owner, actor)) {
      throw new CardError(
        "CALLER_IS_NOT_OWNER_NOR_APPROVED",
        `"${actor}" may not approve card ${id.toString()}`,
      );
    }

    if (approved === NULL_ADDRESS) {
      this._approvals.delete(id);
    } else {
      this._approvals.set(id, approved);
    }
    this._emit({
      type: "card.approved",
      actor,
      payload: { owner, approved, cardId: id },
    });
  }

  getApproved(id: CardId): Address {
    this.ownerOf(id);
    return this._approvals.get(id) ?? NULL_ADDRESS;
  }

  setApprovalForAll(actor: Address, operator: Address, approved: boolean): void {
    if (operator === NULL_ADDRESS) {
      throw new CardError("INVALID_RECIPIENT", "Operator cannot be the null holder");
    }
    if (operator === actor) {
      throw new CardError("APPROVAL_TO_CURRENT_OWNER", "Cannot approve yourself as operator");
    }

    let operators = this._operators.get(actor);
    if (approved) {
      if (operators === undefined) {
        operators = new Set();
        this._operators.set(actor, operators);
      }
      operators.add(operator);
    } else if (operators !== undefined) {
      operators.delete(operator);
      if (operators.size === 0) {
        this._operators.delete(actor);
      }
    }
    this._emit({
      type: "card.approval-for-all",
      actor,
      payload: { owner: actor, operator, approved },
    });
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._operators.get(owner)?.has(operator) ?? false;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  ownerOf(id: CardId): Address {
    const owner = this._owners.get(id);
    if (owner === undefined) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} does not exist`);
    }
    return owner;
  }

  balanceOf(owner: Address): number {
    return this._owned.get(owner)?.length ?? 0;
  }

  cardOfOwnerByIndex(owner: Address, index: number): CardId {
    const id = this._owned.get(owner)?.[index];
    if (id === undefined) {
      throw new CardError(
        "INDEX_OUT_OF_BOUNDS",
        `Index ${index} is out of bounds for "${owner}" (balance ${this.balanceOf(owner)})`,
      );
    }
    return id;
  }

  /**
   * All cards of an owner in enumeration order.
   */
  cardsOf(owner: Address): readonly CardId[] {
    return [...(this._owned.get(owner) ?? [])];
  }

  exists(id: CardId): boolean {
    return this._owners.has(id);
  }

  isApprovedOrOwner(actor: Address, id: CardId): boolean {
    const owner = this.ownerOf(id);
    return (
      actor === owner ||
      this._approvals.get(id) === actor ||
      this.isApprovedForAll(owner, actor)
    );
  }

  totalSupply(): number {
    return this._owners.size;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const holders: HolderSnapshot[] = [];
    for (const [owner, cards] of this._owned) {
      holders.push({ owner, cards: cards.map((id) => id.toString()) });
    }

    const operators: OperatorSnapshot[] = [];
    for (const [owner, set] of this._operators) {
      for (const operator of set) {
        operators.push({ owner, operator });
      }
    }

    return {
      version: 1,
      holders,
      approvals: [...this._approvals].map(([id, approved]) => ({
        cardId: id.toString(),
        approved,
      })),
      operators,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, preserving each owner's enumeration
   * order. Restoring emits no events and ignores the halt flag.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, deps: LedgerDeps): InMemoryAssetLedger {
    if (snapshot.version !== 1) {
      throw new CardError(
        "UNSUPPORTED_SNAPSHOT_VERSION",
        `Unsupported ledger snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new InMemoryAssetLedger(deps);

    for (const holder of snapshot.holders) {
      if (holder.owner === NULL_ADDRESS) {
        throw new CardError("INVALID_RECIPIENT", "Snapshot assigns cards to the null holder");
      }
      for (const raw of holder.cards) {
        const id = parseUint(raw, "cardId", MAX_UINT256);
        if (ledger._owners.has(id)) {
          throw new CardError("ALREADY_MINTED", `Card ${raw} appears twice in snapshot`);
        }
        ledger._addToOwner(holder.owner, id);
      }
    }

    for (const { cardId, approved } of snapshot.approvals) {
      const id = parseUint(cardId, "cardId", MAX_UINT256);
      const owner = ledger.ownerOf(id);
      if (approved === NULL_ADDRESS) {
        throw new CardError("INVALID_RECIPIENT", `Snapshot approves the null holder for card ${cardId}`);
      }
      if (approved === owner) {
        throw new CardError(
          "APPROVAL_TO_CURRENT_OWNER",
          `Snapshot approves "${approved}" for its own card ${cardId}`,
        );
      }
      ledger._approvals.set(id, approved);
    }

    for (const { owner, operator } of snapshot.operators) {
      if (owner === NULL_ADDRESS || operator === NULL_ADDRESS) {
        throw new CardError("INVALID_RECIPIENT", "Snapshot has an operator entry for the null holder");
      }
      if (owner === operator) {
        throw new CardError(
          "APPROVAL_TO_CURRENT_OWNER",
          `Snapshot approves "${owner}" as its own operator`,
        );
      }
      let set = ledger._operators.get(owner);
      if (set === undefined) {
        set = new Set();
        ledger._operators.set(owner, set);
      }
      set.add(operator);
    }

    return ledger;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _assertNotHalted(): void {
    if (this._deps.halt.isHalted()) {
      throw new CardError("HALTED", "Ownership changes are halted");
    }
  }

  private _addToOwner(owner: Address, id: CardId): void {
    let cards = this._owned.get(owner);
    if (cards === undefined) {
      cards = [];
      this._owned.set(owner, cards);
    }
    this._ownedIndex.set(id, cards.length);
    cards.push(id);
    this._owners.set(id, owner);
  }

  private _removeFromOwner(owner: Address, id: CardId): void {
    const cards = this._owned.get(owner);
    const index = this._ownedIndex.get(id);
    if (cards === undefined || index === undefined) {
      throw new CardError("NOT_EXISTS", `Card ${id.toString()} is not held by "${owner}"`);
    }

    const last = cards.pop();
    if (last !== undefined && last !== id) {
      cards[index] = last;
      this._ownedIndex.set(last, index);
    }
    if (cards.length === 0) {
      this._owned.delete(owner);
    }
    this._ownedIndex.delete(id);
    this._owners.delete(id);
  }

  private _emit(event: CardEvent): void {
    this._deps.sink?.emit(event);
  }
}
