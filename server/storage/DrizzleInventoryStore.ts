import { and, asc, count, desc, eq, gte, ilike, inArray, isNull, lt, lte, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";
import { assets, assetTypes, bomItems, bomSnapshots, type BomItemRow, type BomSnapshotRow } from "@shared/schema";
import type {
  AssetFilter,
  AssetRecord,
  AssetTypeDefinition,
  BomSnapshot,
  InventoryStore,
  NewSnapshot,
  SnapshotRange,
} from "../../platform/inventory";
import {
  toAssetInsert,
  toAssetRecord,
  toAssetTypeDefinition,
  toBomSnapshot,
  toItemInserts,
  toSnapshotInsert,
} from "./rowMapping";

/** The pooled database or an open transaction; both run the same queries. */
export type InventoryExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const UNIQUE_VIOLATION = "23505";

/** ILIKE treats % and _ as wildcards, escaped with a backslash. */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function rethrowConflict(err: unknown, what: string): never {
  if (err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION) {
    throw new Error(`INVENTORYSTORE_CONFLICT: ${what}`);
  }
  throw err;
}

/**
 * InventoryStore over PostgreSQL via drizzle.
 *
 * Snapshot items are stored one row each with their ordinal, so reads
 * return them in the order they were written.
 */
export class DrizzleInventoryStore implements InventoryStore {
  constructor(
    private readonly db: InventoryExecutor,
    private readonly inTransaction = false,
  ) {}

  // ---- Assets ----

  async getAsset(id: string): Promise<AssetRecord | null> {
    const [row] = await this.db.select().from(assets).where(eq(assets.id, id));
    return row ? toAssetRecord(row) : null;
  }

  async getAssetByUrn(urn: string): Promise<AssetRecord | null> {
    const [row] = await this.db.select().from(assets).where(eq(assets.urn, urn));
    return row ? toAssetRecord(row) : null;
  }

  async findChild(parentId: string | null, name: string): Promise<AssetRecord | null> {
    const parent = parentId === null ? isNull(assets.parentId) : eq(assets.parentId, parentId);
    const [row] = await this.db.select().from(assets).where(and(parent, eq(assets.name, name)));
    return row ? toAssetRecord(row) : null;
  }

  async findAssetsByName(name: string): Promise<AssetRecord[]> {
    const rows = await this.db.select().from(assets).where(eq(assets.name, name)).orderBy(asc(assets.name), asc(assets.id));
    return rows.map(toAssetRecord);
  }

  async listChildren(parentId: string | null): Promise<AssetRecord[]> {
    const parent = parentId === null ? isNull(assets.parentId) : eq(assets.parentId, parentId);
    const rows = await this.db.select().from(assets).where(parent).orderBy(asc(assets.name), asc(assets.id));
    return rows.map(toAssetRecord);
  }

  async listAssets(filter: AssetFilter = {}): Promise<AssetRecord[]> {
    const parent =
      filter.parentId === undefined
        ? undefined
        : filter.parentId === null
          ? isNull(assets.parentId)
          : eq(assets.parentId, filter.parentId);
    const base = this.db
      .select()
      .from(assets)
      .where(
        and(
          parent,
          filter.assetType ? eq(assets.assetType, filter.assetType) : undefined,
          filter.status ? eq(assets.status, filter.status) : undefined,
          filter.search ? ilike(assets.name, `%${escapeLike(filter.search)}%`) : undefined,
        ),
      )
      .orderBy(asc(assets.name), asc(assets.id))
      .offset(filter.offset ?? 0);
    const rows = filter.limit !== undefined ? await base.limit(filter.limit) : await base;
    return rows.map(toAssetRecord);
  }

  async insertAsset(asset: AssetRecord): Promise<AssetRecord> {
    try {
      const [row] = await this.db.insert(assets).values(toAssetInsert(asset)).returning();
      return toAssetRecord(row);
    } catch (err) {
      rethrowConflict(err, `asset "${asset.name}" (${asset.urn}) already exists`);
    }
  }

  async updateAsset(asset: AssetRecord): Promise<AssetRecord> {
    // id, urn and createdAt never change after insert.
    const { id: _id, urn: _urn, createdAt: _createdAt, ...changes } = toAssetInsert(asset);
    const [row] = await this.db
      .update(assets)
      .set(changes)
      .where(and(eq(assets.id, asset.id), eq(assets.urn, asset.urn)))
      .returning();
    if (!row) {
      throw new Error(`INVENTORYSTORE_MISSING: asset ${asset.id} with urn ${asset.urn} does not exist`);
    }
    return toAssetRecord(row);
  }

  async countAssets(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(assets);
    return row?.value ?? 0;
  }

  async listAssetTypes(): Promise<AssetTypeDefinition[]> {
    const rows = await this.db.select().from(assetTypes).orderBy(asc(assetTypes.rank), asc(assetTypes.name));
    return rows.map(toAssetTypeDefinition);
  }

  // ---- Snapshots ----

  async insertSnapshot(snapshot: NewSnapshot): Promise<BomSnapshot> {
    try {
      const [row] = await this.db.insert(bomSnapshots).values(toSnapshotInsert(snapshot)).returning();
      const items =
        snapshot.items.length > 0
          ? await this.db.insert(bomItems).values(toItemInserts(row.id, snapshot.items)).returning()
          : [];
      return toBomSnapshot(row, items.sort((a, b) => a.ordinal - b.ordinal));
    } catch (err) {
      rethrowConflict(err, `snapshot ${snapshot.id} conflicts with an existing row`);
    }
  }

  async getSnapshot(id: string): Promise<BomSnapshot | null> {
    const [row] = await this.db.select().from(bomSnapshots).where(eq(bomSnapshots.id, id));
    if (!row) return null;
    const [snapshot] = await this.withItems([row]);
    return snapshot;
  }

  async latestSnapshot(assetId: string, at?: Date): Promise<BomSnapshot | null> {
    const [row] = await this.db
      .select()
      .from(bomSnapshots)
      .where(and(eq(bomSnapshots.assetId, assetId), at ? lte(bomSnapshots.takenAt, at) : undefined))
      .orderBy(desc(bomSnapshots.takenAt), desc(bomSnapshots.sequence))
      .limit(1);
    if (!row) return null;
    const [snapshot] = await this.withItems([row]);
    return snapshot;
  }

  async latestSnapshotBefore(assetId: string, before: Date): Promise<BomSnapshot | null> {
    const [row] = await this.db
      .select()
      .from(bomSnapshots)
      .where(and(eq(bomSnapshots.assetId, assetId), lt(bomSnapshots.takenAt, before)))
      .orderBy(desc(bomSnapshots.takenAt), desc(bomSnapshots.sequence))
      .limit(1);
    if (!row) return null;
    const [snapshot] = await this.withItems([row]);
    return snapshot;
  }

  async listSnapshots(assetId: string, range: SnapshotRange = {}): Promise<BomSnapshot[]> {
    const rows = await this.db
      .select()
      .from(bomSnapshots)
      .where(
        and(
          eq(bomSnapshots.assetId, assetId),
          range.from ? gte(bomSnapshots.takenAt, range.from) : undefined,
          range.to ? lte(bomSnapshots.takenAt, range.to) : undefined,
        ),
      )
      .orderBy(asc(bomSnapshots.takenAt), asc(bomSnapshots.sequence));
    return this.withItems(rows);
  }

  async countSnapshots(recordedSince?: Date): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(bomSnapshots)
      .where(recordedSince ? gte(bomSnapshots.createdAt, recordedSince) : undefined);
    return row?.value ?? 0;
  }

  // ---- Units of work ----

  async transaction<T>(fn: (tx: InventoryStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);
    return this.db.transaction((tx) => fn(new DrizzleInventoryStore(tx, true)));
  }

  async lockAsset(assetId: string): Promise<void> {
    await this.db.execute(sql`select pg_advisory_xact_lock(hashtext(${assetId}))`);
  }

  private async withItems(rows: BomSnapshotRow[]): Promise<BomSnapshot[]> {
    if (rows.length === 0) return [];
    const itemRows = await this.db
      .select()
      .from(bomItems)
      .where(inArray(bomItems.snapshotId, rows.map((r) => r.id)))
      .orderBy(asc(bomItems.snapshotId), asc(bomItems.ordinal));

    const bySnapshot = new Map<string, BomItemRow[]>();
    for (const item of itemRows) {
      bySnapshot.set(item.snapshotId, [...(bySnapshot.get(item.snapshotId) ?? []), item]);
    }
    return rows.map((row) => toBomSnapshot(row, bySnapshot.get(row.id) ?? []));
  }
}
