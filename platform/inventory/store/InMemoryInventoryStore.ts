import { ASSET_TYPES, ASSET_TYPE_DEFINITIONS } from "@shared/assetTypes";
import type { AssetRecord, AssetTypeDefinition, BomSnapshot } from "../model";
import type { InventoryStore } from "./InventoryStore";
import type { AssetFilter, NewSnapshot, SnapshotRange } from "./types";

type StoreState = {
  assets: Map<string, AssetRecord>;
  snapshots: BomSnapshot[];
  nextSequence: number;
};

function cloneState(state: StoreState): StoreState {
  // Records are immutable; copying the containers is enough.
  return {
    assets: new Map(state.assets),
    snapshots: state.snapshots.slice(),
    nextSequence: state.nextSequence,
  };
}

function bySnapshotOrder(a: BomSnapshot, b: BomSnapshot): number {
  return a.takenAt.getTime() - b.takenAt.getTime() || a.sequence - b.sequence;
}

function byName(a: AssetRecord, b: AssetRecord): number {
  return a.name.localeCompare(b.name) || a.id.localeCompare(b.id);
}

export class InMemoryInventoryStore implements InventoryStore {
  private state: StoreState;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(state?: StoreState, private readonly inTransaction = false) {
    this.state = state ?? { assets: new Map(), snapshots: [], nextSequence: 1 };
  }

  async getAsset(id: string): Promise<AssetRecord | null> {
    return this.state.assets.get(id) ?? null;
  }

  async getAssetByUrn(urn: string): Promise<AssetRecord | null> {
    for (const asset of this.state.assets.values()) {
      if (asset.urn === urn) return asset;
    }
    return null;
  }

  async findChild(parentId: string | null, name: string): Promise<AssetRecord | null> {
    for (const asset of this.state.assets.values()) {
      if (asset.parentId === parentId && asset.name === name) return asset;
    }
    return null;
  }

  async findAssetsByName(name: string): Promise<AssetRecord[]> {
    return Array.from(this.state.assets.values())
      .filter((a) => a.name === name)
      .sort(byName);
  }

  async listChildren(parentId: string | null): Promise<AssetRecord[]> {
    return Array.from(this.state.assets.values())
      .filter((a) => a.parentId === parentId)
      .sort(byName);
  }

  async listAssets(filter: AssetFilter = {}): Promise<AssetRecord[]> {
    const search = filter.search?.toLowerCase();
    const matches = Array.from(this.state.assets.values())
      .filter(
        (a) =>
          (filter.parentId === undefined || a.parentId === filter.parentId) &&
          (filter.assetType === undefined || a.assetType === filter.assetType) &&
          (filter.status === undefined || a.status === filter.status) &&
          (search === undefined || a.name.toLowerCase().includes(search)),
      )
      .sort(byName);
    const offset = filter.offset ?? 0;
    return matches.slice(offset, filter.limit === undefined ? undefined : offset + filter.limit);
  }

  async insertAsset(asset: AssetRecord): Promise<AssetRecord> {
    if (this.state.assets.has(asset.id)) {
      throw new Error(`INVENTORYSTORE_CONFLICT: asset ${asset.id} already exists`);
    }
    const clash = await this.findChild(asset.parentId, asset.name);
    if (clash) {
      throw new Error(`INVENTORYSTORE_CONFLICT: "${asset.name}" already exists under parent ${asset.parentId ?? "<root>"}`);
    }
    if (await this.getAssetByUrn(asset.urn)) {
      throw new Error(`INVENTORYSTORE_CONFLICT: urn ${asset.urn} already exists`);
    }
    this.state.assets.set(asset.id, asset);
    return asset;
  }

  async updateAsset(asset: AssetRecord): Promise<AssetRecord> {
    const existing = this.state.assets.get(asset.id);
    if (!existing) {
      throw new Error(`INVENTORYSTORE_MISSING: asset ${asset.id} does not exist`);
    }
    if (existing.urn !== asset.urn) {
      throw new Error(`INVENTORYSTORE_CONFLICT: urn of asset ${asset.id} is immutable`);
    }
    this.state.assets.set(asset.id, asset);
    return asset;
  }

  async countAssets(): Promise<number> {
    return this.state.assets.size;
  }

  async listAssetTypes(): Promise<AssetTypeDefinition[]> {
    return ASSET_TYPES.map((name) => ASSET_TYPE_DEFINITIONS[name]).sort(
      (a, b) => a.rank - b.rank || a.name.localeCompare(b.name),
    );
  }

  async insertSnapshot(snapshot: NewSnapshot): Promise<BomSnapshot> {
    const record: BomSnapshot = { ...snapshot, sequence: this.state.nextSequence };
    this.state.nextSequence += 1;
    this.state.snapshots.push(record);
    return record;
  }

  async getSnapshot(id: string): Promise<BomSnapshot | null> {
    return this.state.snapshots.find((s) => s.id === id) ?? null;
  }

  async latestSnapshot(assetId: string, at?: Date): Promise<BomSnapshot | null> {
    const candidates = await this.listSnapshots(assetId, { to: at });
    return candidates[candidates.length - 1] ?? null;
  }

  async latestSnapshotBefore(assetId: string, before: Date): Promise<BomSnapshot | null> {
    const t = before.getTime();
    const candidates = (await this.listSnapshots(assetId)).filter((s) => s.takenAt.getTime() < t);
    return candidates[candidates.length - 1] ?? null;
  }

  async listSnapshots(assetId: string, range: SnapshotRange = {}): Promise<BomSnapshot[]> {
    const from = range.from?.getTime();
    const to = range.to?.getTime();
    return this.state.snapshots
      .filter((s) => {
        if (s.assetId !== assetId) return false;
        const t = s.takenAt.getTime();
        return (from == null || t >= from) && (to == null || t <= to);
      })
      .sort(bySnapshotOrder);
  }

  async countSnapshots(recordedSince?: Date): Promise<number> {
    if (!recordedSince) return this.state.snapshots.length;
    const t = recordedSince.getTime();
    return this.state.snapshots.filter((s) => s.createdAt.getTime() >= t).length;
  }

  async transaction<T>(fn: (tx: InventoryStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);

    const run = this.queue.then(async () => {
      const working = new InMemoryInventoryStore(cloneState(this.state), true);
      const result = await fn(working);
      this.state = working.state;
      return result;
    });
    // Keep the queue alive after a rolled-back transaction.
    this.queue = run.catch(() => undefined);
    return run;
  }

  async lockAsset(_assetId: string): Promise<void> {
    // Transactions already run one at a time.
  }
}
