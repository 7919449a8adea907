import { ASSET_TYPE_DEFINITIONS, type AssetType } from "@shared/assetTypes";
import { InvalidHierarchy } from "../service/errors";

/**
 * Pure taxonomy checks. Lower rank = higher in the tree.
 */

export function rank(type: AssetType): number {
  return ASSET_TYPE_DEFINITIONS[type].rank;
}

/**
 * A child must sit strictly below its parent. Levels may be skipped;
 * same-rank pairs (including two rank-6 CI variants) are rejected.
 */
export function validate(parentType: AssetType, childType: AssetType): boolean {
  return rank(childType) > rank(parentType);
}

export function assertValidHierarchy(parentType: AssetType, childType: AssetType): void {
  if (validate(parentType, childType)) return;
  const relation = rank(childType) < rank(parentType) ? "ranks above" : "shares rank with";
  throw new InvalidHierarchy(
    `"${childType}" (rank ${rank(childType)}) ${relation} parent type "${parentType}" (rank ${rank(parentType)})`,
  );
}

export function canHaveBom(type: AssetType): boolean {
  return ASSET_TYPE_DEFINITIONS[type].canHaveBom;
}
