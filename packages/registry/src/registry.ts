/**
 * CardRegistry — top-level coordinator.
 *
 * Composes:
 * - InMemoryAssetLedger (ownership)
 * - AssetStateStore (uses, levels, limits)
 * - MetadataResolver (display URIs)
 * - LifecycleController (mint / burn / transfer / use)
 * - RoleRegistry + HaltSwitch (collaborators)
 * - RegistryAdmin (ADMIN-gated configuration)
 *
 * API surface beyond the components:
 * - cardUri() — display URI of a card
 * - snapshot() / fromSnapshot() — versioned persistence
 */

import { InMemoryAssetLedger } from "@cardkeep/ledger";
import type { CardId } from "@cardkeep/types";
import { CardError, MAX_UINT256, ROLES, isRole, parseUint } from "@cardkeep/types";
import { HaltSwitch, RoleRegistry } from "./access.js";
import { RegistryAdmin } from "./admin.js";
import { LifecycleController } from "./lifecycle.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { MetadataResolver } from "./metadata-resolver.js";
import { AssetStateStore } from "./state-store.js";
import type {
  RegistryOptions,
  RegistrySnapshot,
  RestoreOptions,
  RoleMemberSnapshot,
} from "./types.js";

export class CardRegistry {
  readonly ledger: InMemoryAssetLedger;
  readonly store: AssetStateStore;
  readonly resolver: MetadataResolver;
  readonly lifecycle: LifecycleController;
  readonly roles: RoleRegistry;
  readonly haltSwitch: HaltSwitch;
  readonly admin: RegistryAdmin;
  private readonly logger: Logger;

  private constructor(options: RegistryOptions, from?: RegistrySnapshot) {
    const sink = options.sink;
    this.logger = options.logger ?? silentLogger();

    this.haltSwitch = new HaltSwitch(from?.halted ?? false);
    this.roles = new RoleRegistry(options.admin);
    this.ledger =
      from === undefined
        ? new InMemoryAssetLedger({ halt: this.haltSwitch, sink })
        : InMemoryAssetLedger.fromSnapshot(from.ledger, { halt: this.haltSwitch, sink });
    this.store = new AssetStateStore(this.ledger, options.limits);
    this.resolver = new MetadataResolver(options.baseUri ?? "");
    this.lifecycle = new LifecycleController({
      ledger: this.ledger,
      store: this.store,
      capabilities: this.roles,
      halt: this.haltSwitch,
      sink,
      logger: this.logger,
      nextId: from === undefined ? 0n : parseUint(from.nextId, "nextId", MAX_UINT256),
    });
    this.admin = new RegistryAdmin({
      roles: this.roles,
      halt: this.haltSwitch,
      store: this.store,
      resolver: this.resolver,
      sink,
      logger: this.logger,
    });

    if (from !== undefined) {
      this.hydrate(from);
    }
  }

  /**
   * Build an empty registry.
   */
  static create(options: RegistryOptions): CardRegistry {
    return new CardRegistry(options);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Display URI of an existing card.
   */
  cardUri(id: CardId): string {
    const { level } = this.store.getMeta(id);
    return this.resolver.cardUri(id, level);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (Persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    const limits = this.store.getLimits();
    const roles: RoleMemberSnapshot[] = [];
    for (const role of ROLES) {
      for (const account of this.roles.membersOf(role)) {
        roles.push({ role, account });
      }
    }

    return {
      version: 1,
      nextId: this.lifecycle.nextId.toString(),
      limits: {
        maxOwns: limits.maxOwns.toString(),
        maxUses: limits.maxUses.toString(),
      },
      baseUri: this.resolver.baseUri,
      levelUris: this.resolver.entries().map(([level, uri]) => ({
        level: level.toString(),
        uri,
      })),
      cards: this.store.entries().map(([id, meta]) => ({
        cardId: id.toString(),
        uses: meta.uses.toString(),
        level: meta.level.toString(),
      })),
      roles,
      halted: this.haltSwitch.isHalted(),
      ledger: this.ledger.snapshot(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a registry from a snapshot. Every card record must match a
   * card in the embedded ledger snapshot and vice versa.
   */
  static fromSnapshot(snapshot: RegistrySnapshot, options: RestoreOptions = {}): CardRegistry {
    if (snapshot.version !== 1) {
      throw new CardError(
        "UNSUPPORTED_SNAPSHOT_VERSION",
        `Unsupported registry snapshot version: ${String(snapshot.version)}`,
      );
    }

    return new CardRegistry(
      {
        ...options,
        limits: {
          maxOwns: parseUint(snapshot.limits.maxOwns, "maxOwns"),
          maxUses: parseUint(snapshot.limits.maxUses, "maxUses"),
        },
        baseUri: snapshot.baseUri,
      },
      snapshot,
    );
  }

  private hydrate(from: RegistrySnapshot): void {
    const nextId = this.lifecycle.nextId;

    for (const card of from.cards) {
      const id = parseUint(card.cardId, "cardId", MAX_UINT256);
      if (!this.ledger.exists(id)) {
        throw new CardError("NOT_EXISTS", `Snapshot has metadata for unowned card ${card.cardId}`);
      }
      if (id >= nextId) {
        throw new CardError(
          "INVALID_VALUE",
          `Card ${card.cardId} is not below nextId ${nextId.toString()}`,
        );
      }
      this.store.restoreMeta(id, {
        uses: parseUint(card.uses, "uses"),
        level: parseUint(card.level, "level"),
      });
    }
    if (this.store.entries().length !== this.ledger.totalSupply()) {
      throw new CardError("NOT_EXISTS", "Snapshot has owned cards without metadata");
    }

    for (const { level, uri } of from.levelUris) {
      this.resolver.setLevelUri(parseUint(level, "level"), uri);
    }

    for (const { role, account } of from.roles) {
      if (!isRole(role)) {
        throw new CardError("INVALID_VALUE", `Unknown role in snapshot: ${String(role)}`);
      }
      this.roles.grant(role, account);
    }

    this.logger.info(
      { cards: from.cards.length, nextId: from.nextId },
      "Registry restored from snapshot",
    );
  }
}
