import type { AssetStatus, AssetType, BomSnapshot } from "../model";

export type AssetFilter = Readonly<{
  /** null selects roots; omitted matches any parent. */
  parentId?: string | null;
  assetType?: AssetType;
  status?: AssetStatus;
  /** Case-insensitive substring of the name, matched literally. */
  search?: string;
  limit?: number;
  offset?: number;
}>;

export type SnapshotRange = Readonly<{
  /** Inclusive lower bound on takenAt. */
  from?: Date;
  /** Inclusive upper bound on takenAt. */
  to?: Date;
}>;

/** A snapshot as handed to the store; sequence is assigned on insert. */
export type NewSnapshot = Omit<BomSnapshot, "sequence">;
