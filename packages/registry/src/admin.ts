/**
 * Registry Admin — ADMIN-gated configuration surface.
 *
 * Limits, level URIs, the base URI, role membership and maintenance mode.
 * Every change emits a configuration event and is logged at info.
 * Admin operations are not blocked by halt.
 */

import type { Address, CardEvent, CardEventSink, CardLimits, Level, Role } from "@cardkeep/types";
import type { HaltSwitch, RoleRegistry } from "./access.js";
import { assertCapability } from "./access.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { MetadataResolver } from "./metadata-resolver.js";
import type { AssetStateStore } from "./state-store.js";

export interface AdminDeps {
  readonly roles: RoleRegistry;
  readonly halt: HaltSwitch;
  readonly store: AssetStateStore;
  readonly resolver: MetadataResolver;
  readonly sink?: CardEventSink | undefined;
  readonly logger?: Logger | undefined;
}

export class RegistryAdmin {
  private readonly roles: RoleRegistry;
  private readonly haltSwitch: HaltSwitch;
  private readonly store: AssetStateStore;
  private readonly resolver: MetadataResolver;
  private readonly sink: CardEventSink | undefined;
  private readonly logger: Logger;

  constructor(deps: AdminDeps) {
    this.roles = deps.roles;
    this.haltSwitch = deps.halt;
    this.store = deps.store;
    this.resolver = deps.resolver;
    this.sink = deps.sink;
    this.logger = deps.logger ?? silentLogger();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Limits
  // ───────────────────────────────────────────────────────────────────────

  setLimits(actor: Address, limits: CardLimits): void {
    assertCapability(this.roles, actor, "ADMIN");
    this.store.setLimits(limits);

    this.logger.info(
      { actor, maxOwns: limits.maxOwns.toString(), maxUses: limits.maxUses.toString() },
      "Limits updated",
    );
    this.emit({
      type: "limits.updated",
      actor,
      payload: { maxOwns: limits.maxOwns, maxUses: limits.maxUses },
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Metadata
  // ───────────────────────────────────────────────────────────────────────

  setLevelUri(actor: Address, level: Level, uri: string): void {
    assertCapability(this.roles, actor, "ADMIN");
    this.resolver.setLevelUri(level, uri);

    this.logger.info({ actor, level: level.toString(), uri }, "Level URI updated");
    this.emit({ type: "level-uri.updated", actor, payload: { level, uri } });
  }

  /**
   * Bulk form of setLevelUri. One event per level, in input order.
   */
  setLevelUris(actor: Address, levels: readonly Level[], uris: readonly string[]): void {
    assertCapability(this.roles, actor, "ADMIN");
    this.resolver.setLevelUris(levels, uris);

    this.logger.info({ actor, count: levels.length }, "Level URIs updated");
    levels.forEach((level, i) => {
      this.emit({ type: "level-uri.updated", actor, payload: { level, uri: uris[i] ?? "" } });
    });
  }

  setBaseUri(actor: Address, uri: string): void {
    assertCapability(this.roles, actor, "ADMIN");
    this.resolver.setBaseUri(uri);

    this.logger.info({ actor, uri }, "Base URI updated");
    this.emit({ type: "base-uri.updated", actor, payload: { uri } });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles
  // ───────────────────────────────────────────────────────────────────────

  /** No event when the account already held the role. */
  grantRole(actor: Address, role: Role, account: Address): void {
    assertCapability(this.roles, actor, "ADMIN");
    if (!this.roles.grant(role, account)) return;

    this.logger.info({ actor, role, account }, "Role granted");
    this.emit({ type: "role.granted", actor, payload: { role, account } });
  }

  /** No event when the account did not hold the role. */
  revokeRole(actor: Address, role: Role, account: Address): void {
    assertCapability(this.roles, actor, "ADMIN");
    if (!this.roles.revoke(role, account)) return;

    this.logger.info({ actor, role, account }, "Role revoked");
    this.emit({ type: "role.revoked", actor, payload: { role, account } });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Maintenance mode
  // ───────────────────────────────────────────────────────────────────────

  halt(actor: Address): void {
    assertCapability(this.roles, actor, "ADMIN");
    if (!this.haltSwitch.halt()) return;

    this.logger.info({ actor }, "Registry halted");
    this.emit({ type: "registry.halted", actor, payload: {} });
  }

  resume(actor: Address): void {
    assertCapability(this.roles, actor, "ADMIN");
    if (!this.haltSwitch.resume()) return;

    this.logger.info({ actor }, "Registry resumed");
    this.emit({ type: "registry.resumed", actor, payload: {} });
  }

  private emit(event: CardEvent): void {
    this.sink?.emit(event);
  }
}
