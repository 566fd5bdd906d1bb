/**
 * Event sinks.
 *
 * - InMemoryCardEventSink: records every event with a sequence number and
 *   dispatches synchronously to subscribers. For tests and embedding.
 * - LoggingEventSink: writes each event to a pino logger.
 * - FanOutEventSink: forwards to several sinks in order.
 */

import type { CardEvent, CardEventSink, CardEventType } from "@cardkeep/types";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// =============================================================================
// Recorded events
// =============================================================================

/**
 * An event as held by the in-memory sink.
 */
export interface RecordedCardEvent {
  readonly event: CardEvent;

  /** Position across all recorded events (1-based, monotonically increasing) */
  readonly sequence: number;

  readonly recordedAt: string;
}

export type CardEventHandler = (recorded: RecordedCardEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface ReadEventsOptions {
  readonly type?: CardEventType | undefined;
  /** Start from this sequence (inclusive). Default: 1 */
  readonly fromSequence?: number | undefined;
  readonly maxCount?: number | undefined;
}

// =============================================================================
// In-memory sink
// =============================================================================

export class InMemoryCardEventSink implements CardEventSink {
  private readonly _log: RecordedCardEvent[] = [];
  private readonly _subscribers = new Set<CardEventHandler>();
  private readonly _typeSubscribers = new Map<CardEventType, Set<CardEventHandler>>();
  private readonly _logger: Logger;
  private _nextSequence = 1;

  constructor(logger?: Logger) {
    this._logger = logger ?? silentLogger();
  }

  emit(event: CardEvent): void {
    const recorded: RecordedCardEvent = {
      event,
      sequence: this._nextSequence++,
      recordedAt: new Date().toISOString(),
    };
    this._log.push(recorded);
    this._dispatch(recorded);
  }

  read(options?: ReadEventsOptions): readonly RecordedCardEvent[] {
    const fromSequence = options?.fromSequence ?? 1;
    const type = options?.type;

    let result = this._log.filter(
      (r) => r.sequence >= fromSequence && (type === undefined || r.event.type === type),
    );

    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  /** The bare events, in emission order. */
  events(): readonly CardEvent[] {
    return this._log.map((r) => r.event);
  }

  get count(): number {
    return this._log.length;
  }

  /**
   * Subscribe to every event, or only to one type.
   */
  subscribe(handler: CardEventHandler, type?: CardEventType): Subscription {
    if (type === undefined) {
      this._subscribers.add(handler);
      return {
        unsubscribe: () => {
          this._subscribers.delete(handler);
        },
      };
    }

    const eventType: CardEventType = type;
    const handlers = this._typeSubscribers.get(eventType) ?? new Set<CardEventHandler>();
    this._typeSubscribers.set(eventType, handlers);
    handlers.add(handler);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0 && this._typeSubscribers.get(eventType) === handlers) {
          this._typeSubscribers.delete(eventType);
        }
      },
    };
  }

  // A failing handler is logged and skipped; the emitting operation has
  // already committed its state change.
  private _dispatch(recorded: RecordedCardEvent): void {
    const typed = this._typeSubscribers.get(recorded.event.type);
    const handlers = [...(typed ?? []), ...this._subscribers];
    for (const handler of handlers) {
      try {
        handler(recorded);
      } catch (err) {
        this._logger.error(
          { err, type: recorded.event.type, sequence: recorded.sequence },
          "Card event handler failed",
        );
      }
    }
  }
}

// =============================================================================
// Logging sink
// =============================================================================

/**
 * Flatten an event for structured logging. bigints become decimal strings.
 */
export function eventLogFields(event: CardEvent): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event.payload)) {
    payload[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return { type: event.type, actor: event.actor, ...payload };
}

export class LoggingEventSink implements CardEventSink {
  private readonly _logger: Logger;

  constructor(logger: Logger) {
    this._logger = logger;
  }

  emit(event: CardEvent): void {
    this._logger.info(eventLogFields(event), event.type);
  }
}

// =============================================================================
// Fan-out
// =============================================================================

export class FanOutEventSink implements CardEventSink {
  private readonly _sinks: readonly CardEventSink[];

  constructor(sinks: readonly CardEventSink[]) {
    this._sinks = [...sinks];
  }

  emit(event: CardEvent): void {
    for (const sink of this._sinks) {
      sink.emit(event);
    }
  }
}
