import { CardError } from "@cardkeep/types";
import type { CardErrorCode, CardEvent, CardEventSink, HaltCheck } from "@cardkeep/types";

/**
 * Run `fn` and return the CardError code it throws, or undefined if it
 * returns normally. Anything other than a CardError is rethrown.
 */
export function codeOf(fn: () => unknown): CardErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof CardError) return err.code;
    throw err;
  }
  return undefined;
}

export class FakeHalt implements HaltCheck {
  halted = false;
  isHalted(): boolean {
    return this.halted;
  }
}

export class RecordingSink implements CardEventSink {
  readonly events: CardEvent[] = [];
  emit(event: CardEvent): void {
    this.events.push(event);
  }
}
