/**
 * Event Types
 *
 * Every observable state change in the card stack is announced as a
 * CardEvent, discriminated by `type`. Sinks receive events in call order;
 * no other ordering is promised.
 */

import type { Address, CardId, Level, Role } from "./card.js";

/** Payload for each event type. */
export interface CardEventPayloads {
  /** Ownership change. `from` is the null holder on mint, `to` on burn. */
  readonly "card.transferred": {
    readonly from: Address;
    readonly to: Address;
    readonly cardId: CardId;
  };
  readonly "card.approved": {
    readonly owner: Address;
    readonly approved: Address;
    readonly cardId: CardId;
  };
  readonly "card.approval-for-all": {
    readonly owner: Address;
    readonly operator: Address;
    readonly approved: boolean;
  };
  /** Carries the headroom left after the use, not the raw counter. */
  readonly "card.used": {
    readonly cardId: CardId;
    readonly remainingUses: bigint;
  };
  readonly "limits.updated": {
    readonly maxOwns: bigint;
    readonly maxUses: bigint;
  };
  readonly "level-uri.updated": {
    readonly level: Level;
    readonly uri: string;
  };
  readonly "base-uri.updated": {
    readonly uri: string;
  };
  readonly "role.granted": {
    readonly role: Role;
    readonly account: Address;
  };
  readonly "role.revoked": {
    readonly role: Role;
    readonly account: Address;
  };
  readonly "registry.halted": Record<string, never>;
  readonly "registry.resumed": Record<string, never>;
}

export type CardEventType = keyof CardEventPayloads;

/**
 * A card event. `actor` is whoever caused it (the caller of the operation).
 */
export type CardEvent = {
  readonly [K in CardEventType]: {
    readonly type: K;
    readonly actor: Address;
    readonly payload: CardEventPayloads[K];
  };
}[CardEventType];

/** The event variant for a single type. */
export type CardEventOf<K extends CardEventType> = Extract<CardEvent, { readonly type: K }>;

/**
 * Receiver of card events. Implementations must not throw back into the
 * emitting operation.
 */
export interface CardEventSink {
  emit(event: CardEvent): void;
}
