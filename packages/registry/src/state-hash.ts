/**
 * Registry state hash.
 *
 * Canonicalizes a snapshot (RFC 8785 / JCS) and SHA-256 hashes it.
 * Wall-clock `createdAt` fields are stripped first, so two snapshots of
 * the same state hash identically.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { RegistrySnapshot } from "./types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function hashRegistrySnapshot(snapshot: RegistrySnapshot): string {
  const { createdAt: _, ledger, ...structural } = snapshot;
  const { createdAt: __, ...ledgerStructural } = ledger;
  return sha256(canonicalize({ ...structural, ledger: ledgerStructural }));
}
