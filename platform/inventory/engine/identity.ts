import { randomUUID } from "crypto";
import { ASSET_TYPE_DEFINITIONS, type AssetType } from "@shared/assetTypes";
import type { AssetRecord, AssetRecordInput } from "../model";
import type { InventoryStore } from "../store";
import { AmbiguousParent, InvalidInput, OrphanAsset } from "../service/errors";

export type IdentityResolution =
  | { kind: "create"; assetId: string; urn: string }
  | { kind: "update"; assetId: string; urn: string; existing: AssetRecord };

/**
 * Deterministic URN for a logical path:
 * `<prefix>:<typeCode>:<ancestor>/.../<name>`.
 *
 * Every segment is percent-encoded, so a "/" inside a name can never be
 * confused with a path separator and distinct paths give distinct URNs.
 */
export function deriveUrn(
  prefix: string,
  assetType: AssetType,
  ancestorNames: readonly string[],
  name: string,
): string {
  const path = [...ancestorNames, name].map((segment) => encodeURIComponent(segment)).join("/");
  return `${prefix}:${ASSET_TYPE_DEFINITIONS[assetType].code}:${path}`;
}

/**
 * Locate or mint the identity for a record under an already-resolved
 * parent. Pure query plus id generation; the caller performs the write.
 */
export async function resolveIdentity(
  store: InventoryStore,
  record: AssetRecordInput,
  parent: AssetRecord | null,
  ancestorNames: readonly string[],
  urnPrefix: string,
): Promise<IdentityResolution> {
  const existing = await store.findChild(parent?.id ?? null, record.name);
  if (existing) {
    if (existing.assetType !== record.assetType) {
      throw new InvalidInput(
        `Asset "${record.name}" is "${existing.assetType}"; its type cannot change to "${record.assetType}"`,
      );
    }
    return { kind: "update", assetId: existing.id, urn: existing.urn, existing };
  }

  return {
    kind: "create",
    assetId: randomUUID(),
    urn: deriveUrn(urnPrefix, record.assetType, ancestorNames, record.name),
  };
}

/**
 * Resolve a parent reference by name among persisted assets. Only used
 * when the batch itself does not define the parent.
 */
export async function findPersistedParent(store: InventoryStore, parentName: string): Promise<AssetRecord> {
  const matches = await store.findAssetsByName(parentName);
  if (matches.length === 0) throw new OrphanAsset(parentName);
  if (matches.length > 1) throw new AmbiguousParent(parentName, matches.length);
  return matches[0];
}

/**
 * Names from the root down to (and excluding) the given asset. Walked by
 * query with a visited guard rather than by recursion.
 */
export async function ancestorNamesOf(store: InventoryStore, asset: AssetRecord): Promise<string[]> {
  const chain = await ancestorChain(store, asset);
  return chain.map((a) => a.name);
}

export async function ancestorChain(store: InventoryStore, asset: AssetRecord): Promise<AssetRecord[]> {
  const chain: AssetRecord[] = [];
  const visited = new Set<string>([asset.id]);
  let parentId = asset.parentId;

  while (parentId) {
    if (visited.has(parentId)) {
      throw new InvalidInput(`Stored hierarchy loops back through asset ${parentId}`);
    }
    visited.add(parentId);
    const parent = await store.getAsset(parentId);
    if (!parent) break;
    chain.unshift(parent);
    parentId = parent.parentId;
  }

  return chain;
}
