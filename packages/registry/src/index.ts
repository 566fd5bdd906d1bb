/**
 * @cardkeep/registry — Card state machine.
 *
 * Use-metered, ownable cards with:
 * - Bounded use counters (uses never exceed maxUses)
 * - Levels fixed at mint, resolved to display URIs
 * - First-fit consumption across a holder's cards
 * - Dense, never-reused identifiers
 * - Role-gated minting, use and administration
 * - Maintenance mode that blocks ownership changes but not use
 */

// Coordinator
export { CardRegistry } from "./registry.js";

// Components
export { AssetStateStore } from "./state-store.js";
export { MetadataResolver, resolveUri, defaultCardUri } from "./metadata-resolver.js";
export { LifecycleController } from "./lifecycle.js";
export type { LifecycleDeps } from "./lifecycle.js";
export { RegistryAdmin } from "./admin.js";
export type { AdminDeps } from "./admin.js";
export { RoleRegistry, HaltSwitch, assertCapability, assertNotHalted } from "./access.js";

// Events
export {
  InMemoryCardEventSink,
  LoggingEventSink,
  FanOutEventSink,
  eventLogFields,
} from "./events.js";
export type {
  RecordedCardEvent,
  CardEventHandler,
  Subscription,
  ReadEventsOptions,
} from "./events.js";

// Persistence
export { hashRegistrySnapshot } from "./state-hash.js";

// Ambient
export {
  ConfigSchema,
  loadConfig,
  loggerOptionsFromConfig,
  registryOptionsFromConfig,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";

// Types
export type {
  HolderUseResult,
  RegistryOptions,
  RestoreOptions,
  RegistrySnapshot,
  CardSnapshot,
  LevelUriSnapshot,
  RoleMemberSnapshot,
} from "./types.js";
