import { randomUUID } from "crypto";
import type { AssetRecord } from "../model";
import type { InventoryStore } from "../store";
import { InvalidHierarchy, NotFound } from "../service/errors";
import { assertValidHierarchy } from "./taxonomy";
import { ancestorChain, deriveUrn } from "./identity";

export interface CopyOptions {
  urnPrefix: string;
  now: () => Date;
}

async function freeName(store: InventoryStore, parentId: string | null, name: string): Promise<string> {
  if (!(await store.findChild(parentId, name))) return name;
  const base = `${name} (Copy)`;
  let candidate = base;
  for (let n = 2; await store.findChild(parentId, candidate); n++) {
    candidate = `${base} (${n})`;
  }
  return candidate;
}

/**
 * Deep-copy an asset and its descendants under newParentId. Snapshots are
 * not copied and external ids are cleared. Returns the copies, the new
 * root first, in breadth-first order.
 */
export async function copySubtree(
  store: InventoryStore,
  assetId: string,
  newParentId: string | null,
  options: CopyOptions,
): Promise<AssetRecord[]> {
  const source = await store.getAsset(assetId);
  if (!source) throw new NotFound(`Asset ${assetId} not found`);

  let parent: AssetRecord | null = null;
  let parentPath: string[] = [];
  if (newParentId !== null) {
    parent = await store.getAsset(newParentId);
    if (!parent) throw new NotFound(`Asset ${newParentId} not found`);
    const chain = [...(await ancestorChain(store, parent)), parent];
    if (chain.some((a) => a.id === source.id)) {
      throw new InvalidHierarchy(`Cannot copy "${source.name}" into its own subtree`);
    }
    assertValidHierarchy(parent.assetType, source.assetType);
    parentPath = chain.map((a) => a.name);
  }

  const now = options.now();
  const copies: AssetRecord[] = [];
  const queue: Array<{ original: AssetRecord; parent: AssetRecord | null; path: string[]; name: string }> = [
    { original: source, parent, path: parentPath, name: await freeName(store, newParentId, source.name) },
  ];

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;
    const { original, path, name } = next;
    const copy = await store.insertAsset({
      ...original,
      id: randomUUID(),
      urn: deriveUrn(options.urnPrefix, original.assetType, path, name),
      name,
      parentId: next.parent?.id ?? null,
      externalId: null,
      createdAt: now,
      updatedAt: now,
    });
    copies.push(copy);

    for (const child of await store.listChildren(original.id)) {
      queue.push({ original: child, parent: copy, path: [...path, name], name: child.name });
    }
  }

  return copies;
}
