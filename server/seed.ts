import { ASSET_TYPES, ASSET_TYPE_DEFINITIONS } from "@shared/assetTypes";
import { assetTypes, insertAssetTypeSchema } from "@shared/schema";
import { log } from "@shared/log";
import type { InventoryExecutor } from "./storage/DrizzleInventoryStore";

/** Rows for the asset_types table, validated against the insert schema. */
export function assetTypeSeedRows() {
  return ASSET_TYPES.map((name) => {
    const def = ASSET_TYPE_DEFINITIONS[name];
    return insertAssetTypeSchema.parse({
      name: def.name,
      code: def.code,
      rank: def.rank,
      description: def.description,
      canHaveBom: def.canHaveBom,
    });
  });
}

export async function seedDatabase(db: InventoryExecutor): Promise<void> {
  const inserted = await db
    .insert(assetTypes)
    .values(assetTypeSeedRows())
    .onConflictDoNothing({ target: assetTypes.name })
    .returning({ name: assetTypes.name });

  if (inserted.length === 0) {
    log("Asset types already seeded, skipping", "seed");
    return;
  }
  log(`Seeded ${inserted.length} asset types`, "seed");
}
