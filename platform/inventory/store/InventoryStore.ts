import type { AssetRecord, AssetTypeDefinition, BomSnapshot } from "../model";
import type { AssetFilter, NewSnapshot, SnapshotRange } from "./types";

/**
 * InventoryStore is a storage-only abstraction.
 *
 * Rules:
 * - No tree traversal APIs; callers walk the hierarchy by query
 * - Snapshots are insert-only
 * - Snapshot reads return items in their stored order
 * - Ordering of snapshot lists is (takenAt, sequence) ascending
 */
export interface InventoryStore {
  // ---- Assets ----

  getAsset(id: string): Promise<AssetRecord | null>;

  getAssetByUrn(urn: string): Promise<AssetRecord | null>;

  /** Exact (parentId, name) match; parentId null means root. */
  findChild(parentId: string | null, name: string): Promise<AssetRecord | null>;

  findAssetsByName(name: string): Promise<AssetRecord[]>;

  listChildren(parentId: string | null): Promise<AssetRecord[]>;

  /** Ordered by (name, id); limit/offset apply after filtering. */
  listAssets(filter?: AssetFilter): Promise<AssetRecord[]>;

  insertAsset(asset: AssetRecord): Promise<AssetRecord>;

  updateAsset(asset: AssetRecord): Promise<AssetRecord>;

  countAssets(): Promise<number>;

  /** Ordered by (rank, name). */
  listAssetTypes(): Promise<AssetTypeDefinition[]>;

  // ---- Snapshots ----

  insertSnapshot(snapshot: NewSnapshot): Promise<BomSnapshot>;

  getSnapshot(id: string): Promise<BomSnapshot | null>;

  /** Latest snapshot with takenAt <= at (any time when at is omitted). */
  latestSnapshot(assetId: string, at?: Date): Promise<BomSnapshot | null>;

  /** Latest snapshot with takenAt strictly before `before`. */
  latestSnapshotBefore(assetId: string, before: Date): Promise<BomSnapshot | null>;

  listSnapshots(assetId: string, range?: SnapshotRange): Promise<BomSnapshot[]>;

  /** Counts by recording time (createdAt), not by takenAt. */
  countSnapshots(recordedSince?: Date): Promise<number>;

  // ---- Units of work ----

  /**
   * Run fn against a transactional view. Writes become visible only when
   * fn resolves; a rejection discards them. Nested calls join the outer
   * transaction.
   */
  transaction<T>(fn: (tx: InventoryStore) => Promise<T>): Promise<T>;

  /** Serialize writers of one asset's history until the transaction ends. */
  lockAsset(assetId: string): Promise<void>;
}
