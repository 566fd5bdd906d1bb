import { CardError } from "@cardkeep/types";
import type { CardErrorCode } from "@cardkeep/types";
import { InMemoryCardEventSink } from "../src/events.js";
import { CardRegistry } from "../src/registry.js";

export const ADMIN = "admin";
export const MINTER = "minter";
export const OPERATOR = "operator";
export const ALICE = "alice";
export const BOB = "bob";
export const MALLORY = "mallory";

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

export interface Fixture {
  readonly registry: CardRegistry;
  readonly sink: InMemoryCardEventSink;
}

/**
 * A registry with ADMIN, MINTER and OPERATOR accounts set up.
 * Roles are granted on the RoleRegistry directly, so tests start with no events.
 */
export function makeRegistry(maxUses: bigint, baseUri = ""): Fixture {
  const sink = new InMemoryCardEventSink();
  const registry = CardRegistry.create({
    limits: { maxOwns: 10n, maxUses },
    baseUri,
    admin: ADMIN,
    sink,
  });
  registry.roles.grant("MINTER", MINTER);
  registry.roles.grant("OPERATOR", OPERATOR);
  return { registry, sink };
}
