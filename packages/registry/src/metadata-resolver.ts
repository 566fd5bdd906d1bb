/**
 * Metadata Resolver — maps a card's level to its display URI.
 *
 * Resolution is a three-way branch and nothing more:
 * - no URI for the level → the per-card fallback, unchanged
 * - URI set, empty base → the level URI verbatim
 * - URI set, base set → base + level URI
 *
 * No caching and no URI validation.
 */

import type { CardId, Level } from "@cardkeep/types";
import { CardError, assertUint128 } from "@cardkeep/types";

/**
 * Resolve a display URI from a level URI, a fallback and a base prefix.
 */
export function resolveUri(levelUri: string, fallbackUri: string, baseUri: string): string {
  if (levelUri === "") {
    return fallbackUri;
  }
  if (baseUri === "") {
    return levelUri;
  }
  return `${baseUri}${levelUri}`;
}

/**
 * Per-card fallback: base + decimal id, or empty when there is no base.
 */
export function defaultCardUri(id: CardId, baseUri: string): string {
  return baseUri === "" ? "" : `${baseUri}${id.toString()}`;
}

export class MetadataResolver {
  private readonly _levelUris = new Map<Level, string>();
  private _baseUri: string;

  constructor(baseUri = "") {
    this._baseUri = baseUri;
  }

  get baseUri(): string {
    return this._baseUri;
  }

  setBaseUri(uri: string): void {
    this._baseUri = uri;
  }

  /** Set one level's URI. An empty URI removes the mapping. */
  setLevelUri(level: Level, uri: string): void {
    assertUint128(level, "level");
    if (uri === "") {
      this._levelUris.delete(level);
    } else {
      this._levelUris.set(level, uri);
    }
  }

  /**
   * Set many level URIs at once. The arrays are parallel; all entries are
   * validated before any is written.
   */
  setLevelUris(levels: readonly Level[], uris: readonly string[]): void {
    if (levels.length === 0 || levels.length !== uris.length) {
      throw new CardError(
        "WRONG_INPUT_PARAMS",
        `Expected equal, non-empty level and URI lists, got ${levels.length} and ${uris.length}`,
      );
    }
    for (const level of levels) {
      assertUint128(level, "level");
    }
    levels.forEach((level, i) => {
      this.setLevelUri(level, uris[i] ?? "");
    });
  }

  levelUri(level: Level): string {
    return this._levelUris.get(level) ?? "";
  }

  resolve(level: Level, fallbackUri: string, baseUri: string): string {
    return resolveUri(this.levelUri(level), fallbackUri, baseUri);
  }

  /** Display URI for a card with the resolver's own base. */
  cardUri(id: CardId, level: Level): string {
    return this.resolve(level, defaultCardUri(id, this._baseUri), this._baseUri);
  }

  entries(): readonly (readonly [Level, string])[] {
    return [...this._levelUris];
  }
}
