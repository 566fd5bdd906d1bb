/**
 * Tests for CardRegistry: display URIs and snapshot persistence.
 */

import { describe, it, expect } from "vitest";
import { CardRegistry } from "../src/registry.js";
import { InMemoryCardEventSink } from "../src/events.js";
import { hashRegistrySnapshot } from "../src/state-hash.js";
import type { RegistrySnapshot } from "../src/types.js";
import { ADMIN, ALICE, BOB, MALLORY, MINTER, OPERATOR, codeOf, makeRegistry } from "./helpers.js";

/** Deep copy through JSON, with edits that the snapshot type would refuse. */
function tampered(snapshot: RegistrySnapshot, edits: Record<string, unknown>): RegistrySnapshot {
  const copy: RegistrySnapshot = JSON.parse(JSON.stringify({ ...snapshot, ...edits }));
  return copy;
}

/** A registry with a bit of everything: uses, a burn, approvals, level URIs. */
function populated(): CardRegistry {
  const { registry } = makeRegistry(5n, "https://cdn/");
  const cards = registry.lifecycle;
  cards.mintBatch(MINTER, [ALICE, ALICE, BOB, ALICE], [1n, 2n, 3n, 1n]);
  cards.use(OPERATOR, 1n, 4n);
  cards.use(OPERATOR, 2n, 2n);
  cards.burn(ALICE, 0n);
  registry.ledger.approve(ALICE, BOB, 3n);
  registry.ledger.setApprovalForAll(BOB, MALLORY, true);
  registry.admin.setLevelUris(ADMIN, [1n, 2n], ["common.json", "rare.json"]);
  return registry;
}

describe("CardRegistry", () => {
  describe("cardUri", () => {
    it("falls back to base + id when the level has no URI", () => {
      const { registry } = makeRegistry(5n, "https://cdn/");
      registry.lifecycle.mint(MINTER, ALICE, 2n);
      expect(registry.cardUri(0n)).toBe("https://cdn/0");
    });

    it("joins the base and the level URI", () => {
      const { registry } = makeRegistry(5n, "https://cdn/");
      registry.lifecycle.mint(MINTER, ALICE, 2n);
      registry.admin.setLevelUri(ADMIN, 2n, "gold.json");
      expect(registry.cardUri(0n)).toBe("https://cdn/gold.json");
    });

    it("uses the level URI verbatim without a base", () => {
      const { registry } = makeRegistry(5n);
      registry.lifecycle.mint(MINTER, ALICE, 2n);
      expect(registry.cardUri(0n)).toBe("");
      registry.admin.setLevelUri(ADMIN, 2n, "ipfs://gold");
      expect(registry.cardUri(0n)).toBe("ipfs://gold");
    });

    it("fails NOT_EXISTS for a missing card", () => {
      const { registry } = makeRegistry(5n);
      expect(codeOf(() => registry.cardUri(0n))).toBe("NOT_EXISTS");
    });
  });

  describe("snapshot", () => {
    it("captures the full state with decimal strings", () => {
      const { registry } = makeRegistry(5n, "https://cdn/");
      registry.lifecycle.mint(MINTER, ALICE, 2n);
      registry.lifecycle.use(OPERATOR, 0n, 3n);

      const snapshot = registry.snapshot();

      expect(snapshot).toMatchObject({
        version: 1,
        nextId: "1",
        limits: { maxOwns: "10", maxUses: "5" },
        baseUri: "https://cdn/",
        levelUris: [],
        cards: [{ cardId: "0", uses: "3", level: "2" }],
        roles: [
          { role: "MINTER", account: MINTER },
          { role: "OPERATOR", account: OPERATOR },
          { role: "ADMIN", account: ADMIN },
        ],
        halted: false,
        ledger: {
          version: 1,
          holders: [{ owner: ALICE, cards: ["0"] }],
          approvals: [],
          operators: [],
        },
      });
    });

    it("restores to an identical state hash", () => {
      const original = populated();
      const before = original.snapshot();

      const restored = CardRegistry.fromSnapshot(before);

      expect(hashRegistrySnapshot(restored.snapshot())).toBe(hashRegistrySnapshot(before));
    });

    it("survives JSON serialization", () => {
      const before = populated().snapshot();
      const restored = CardRegistry.fromSnapshot(JSON.parse(JSON.stringify(before)));
      expect(hashRegistrySnapshot(restored.snapshot())).toBe(hashRegistrySnapshot(before));
    });

    it("hashes differently once state changes", () => {
      const registry = populated();
      const before = hashRegistrySnapshot(registry.snapshot());
      registry.lifecycle.use(OPERATOR, 3n, 1n);
      expect(hashRegistrySnapshot(registry.snapshot())).not.toBe(before);
    });

    it("restores behaviour, not just data", () => {
      const restored = CardRegistry.fromSnapshot(populated().snapshot());
      const cards = restored.lifecycle;

      expect(cards.nextId).toBe(4n);
      expect(restored.ledger.cardsOf(ALICE)).toEqual([3n, 1n]);
      expect(cards.metaOf(1n)).toEqual({ uses: 4n, level: 2n });
      expect(codeOf(() => cards.usesOf(0n))).toBe("NOT_EXISTS");
      expect(restored.ledger.getApproved(3n)).toBe(BOB);
      expect(restored.ledger.isApprovedForAll(BOB, MALLORY)).toBe(true);
      expect(restored.cardUri(1n)).toBe("https://cdn/rare.json");

      expect(cards.useFromHolder(OPERATOR, ALICE, 2n).cardId).toBe(3n);
      expect(cards.mint(MINTER, BOB, 1n)).toBe(4n);
      expect(codeOf(() => restored.admin.halt(MINTER))).toBe("CAPABILITY_DENIED");
    });

    it("restores maintenance mode", () => {
      const registry = populated();
      registry.admin.halt(ADMIN);

      const restored = CardRegistry.fromSnapshot(registry.snapshot());

      expect(restored.haltSwitch.isHalted()).toBe(true);
      expect(codeOf(() => restored.lifecycle.mint(MINTER, ALICE, 1n))).toBe("HALTED");
      expect(restored.lifecycle.use(OPERATOR, 3n, 1n).uses).toBe(1n);
    });

    it("emits nothing while restoring", () => {
      const sink = new InMemoryCardEventSink();
      CardRegistry.fromSnapshot(populated().snapshot(), { sink });
      expect(sink.count).toBe(0);
    });

    it("rejects an unknown version", () => {
      const snapshot = tampered(populated().snapshot(), { version: 2 });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("UNSUPPORTED_SNAPSHOT_VERSION");
    });

    it("rejects metadata for a card nobody owns", () => {
      const before = populated().snapshot();
      const snapshot = tampered(before, {
        cards: [...before.cards, { cardId: "9", uses: "0", level: "1" }],
      });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("NOT_EXISTS");
    });

    it("rejects owned cards without metadata", () => {
      const before = populated().snapshot();
      const snapshot = tampered(before, { cards: before.cards.slice(1) });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("NOT_EXISTS");
    });

    it("rejects a nextId that would reissue an identifier", () => {
      const snapshot = tampered(populated().snapshot(), { nextId: "3" });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("INVALID_VALUE");
    });

    it("rejects unknown roles", () => {
      const snapshot = tampered(populated().snapshot(), {
        roles: [{ role: "ROOT", account: ADMIN }],
      });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("INVALID_VALUE");
    });

    it("rejects a ledger that approves the null holder", () => {
      const before = populated().snapshot();
      const snapshot = tampered(before, {
        ledger: { ...before.ledger, approvals: [{ cardId: "3", approved: "" }] },
      });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("INVALID_RECIPIENT");
    });

    it("rejects malformed numbers", () => {
      const snapshot = tampered(populated().snapshot(), {
        limits: { maxOwns: "10", maxUses: "-5" },
      });
      expect(codeOf(() => CardRegistry.fromSnapshot(snapshot))).toBe("INVALID_VALUE");
    });
  });
});
