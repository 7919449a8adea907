import { randomUUID } from "crypto";
import { z } from "zod";
import type { BomItem, BomItemInput, BomSnapshot, SnapshotMetadata } from "../model";
import type { InventoryStore } from "../store";
import { DuplicateBomItem, InvalidInput, NonMonotonicSnapshot, NotFound } from "../service/errors";
import { canHaveBom } from "./taxonomy";
import { diffBomItems, identityKey, itemKey } from "./bomDiff";

export type SnapshotWriteMode = "append" | "backfill";

/** Upper bound of the integer column quantities are stored in. */
export const MAX_QUANTITY = 2_147_483_647;

const blankToNull = (v: string | null | undefined) => (v && v.trim() !== "" ? v.trim() : null);

const bomItemSchema = z.object({
  componentRef: z.string().trim().min(1, "componentRef is required"),
  position: z.string().nullish().transform(blankToNull),
  componentName: z.string().nullish().transform(blankToNull),
  quantity: z
    .number()
    .int("quantity must be an integer")
    .min(1, "quantity must be at least 1")
    .max(MAX_QUANTITY, `quantity must be at most ${MAX_QUANTITY}`)
    .default(1),
  version: z.string().nullish().transform(blankToNull),
  properties: z.record(z.string(), z.unknown()).default({}),
});

/**
 * Validate and normalize the items of one snapshot. Identity keys
 * (componentRef, position) must be unique.
 */
export function normalizeItems(inputs: readonly BomItemInput[]): BomItem[] {
  const seen = new Set<string>();
  return inputs.map((input, i) => {
    const parsed = bomItemSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new InvalidInput(`BOM item #${i}: ${detail}`);
    }
    const item: BomItem = parsed.data;
    const key = identityKey(item);
    if (seen.has(key)) throw new DuplicateBomItem(itemKey(item));
    seen.add(key);
    return item;
  });
}

/**
 * Write one immutable snapshot. Must run inside a transaction: the asset
 * lock taken here holds until it ends.
 *
 * "append" requires takenAt to be strictly after the asset's latest
 * snapshot; "backfill" may land anywhere in the history.
 */
export async function writeSnapshot(
  store: InventoryStore,
  assetId: string,
  takenAt: Date,
  inputs: readonly BomItemInput[],
  mode: SnapshotWriteMode,
  recordedAt: Date,
  meta: SnapshotMetadata = {},
): Promise<BomSnapshot> {
  if (Number.isNaN(takenAt.getTime())) {
    throw new InvalidInput("Snapshot timestamp is not a valid date");
  }

  const asset = await store.getAsset(assetId);
  if (!asset) throw new NotFound(`Asset ${assetId} not found`);
  if (!canHaveBom(asset.assetType)) {
    throw new InvalidInput(`Assets of type "${asset.assetType}" do not carry a BOM`);
  }

  const items = normalizeItems(inputs);

  await store.lockAsset(assetId);

  const latest = await store.latestSnapshot(assetId);
  if (mode === "append" && latest && takenAt.getTime() <= latest.takenAt.getTime()) {
    throw new NonMonotonicSnapshot(assetId, takenAt, latest.takenAt);
  }

  const previous = mode === "append" ? latest : await store.latestSnapshot(assetId, takenAt);
  const { summary } = diffBomItems(previous?.items ?? [], items);

  return store.insertSnapshot({
    id: randomUUID(),
    assetId,
    takenAt,
    label: meta.label ?? null,
    bomType: meta.bomType ?? "SBOM",
    source: meta.source ?? null,
    backfilled: mode === "backfill",
    stats: {
      itemCount: items.length,
      added: summary.added,
      removed: summary.removed,
      modified: summary.modified,
    },
    items,
    createdAt: recordedAt,
  });
}
