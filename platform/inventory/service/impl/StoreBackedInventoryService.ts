import { randomUUID } from "crypto";
import { subDays } from "date-fns";
import { log } from "@shared/log";
import type { AuditEvent, AuditEventType, AuditLog, AuditQuery } from "../../../audit";
import type {
  AssetRecord,
  AssetTypeDefinition,
  BomItemInput,
  BomSnapshot,
  ChangeReport,
  IngestionReport,
  InventorySummary,
  RawAssetRecord,
  SnapshotMetadata,
  TimelineStep,
} from "../../model";
import type { AssetFilter, InventoryStore } from "../../store";
import type { InventoryService } from "../InventoryService";
import type { ActorContext, ChangeReportRequest, IngestOptions, ReportOptions, ServiceOptions } from "../types";
import { CyclicHierarchy, InvalidInput, InventoryConflict, NotFound } from "../errors";
import { ingestBatch, type BatchResult } from "../../engine/hierarchyBuilder";
import { writeSnapshot, type SnapshotWriteMode } from "../../engine/snapshotLedger";
import { changeReport, changeTimeline, diffSnapshots } from "../../engine/changeAnalysis";
import { copySubtree } from "../../engine/assetCopy";
import { ancestorChain } from "../../engine/identity";

const SYSTEM_ACTOR: ActorContext = { actorId: "system", actorType: "system" };

function translateStoreError(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  if (msg.startsWith("INVENTORYSTORE_CONFLICT:")) {
    throw new InventoryConflict(msg);
  }
  if (msg.startsWith("INVENTORYSTORE_MISSING:")) {
    throw new NotFound(msg);
  }
  throw err instanceof Error ? err : new Error(msg);
}

function assertDate(value: Date, label: string): void {
  if (Number.isNaN(value.getTime())) throw new InvalidInput(`${label} is not a valid date`);
}

/**
 * InventoryService backed by an InventoryStore.
 *
 * Each write runs in one store transaction. Audit events are emitted only
 * after that transaction commits, so a rolled-back batch leaves no trail.
 */
export class StoreBackedInventoryService implements InventoryService {
  private readonly now: () => Date;
  private readonly defaultActor: ActorContext;

  constructor(
    private readonly store: InventoryStore,
    private readonly audit: AuditLog,
    private readonly options: ServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.defaultActor = options.actor ?? SYSTEM_ACTOR;
  }

  // ---- Assets ----

  async ingest(batch: readonly RawAssetRecord[], opts: IngestOptions = {}): Promise<IngestionReport> {
    const batchId = opts.batchId ?? randomUUID();
    const actor = opts.actor ?? this.defaultActor;

    let result: BatchResult;
    try {
      result = await this.store.transaction((tx) =>
        ingestBatch(tx, batch, batchId, {
          urnPrefix: this.options.urnPrefix,
          defaultExternalSystem: this.options.defaultExternalSystem,
          now: this.now,
        }),
      );
    } catch (err) {
      if (err instanceof CyclicHierarchy) {
        log(`[ingest] batch ${batchId} rolled back: ${err.message}`);
        throw err;
      }
      translateStoreError(err);
    }

    const { report, writes } = result;
    log(
      `[ingest] batch ${batchId}: ${report.total} records, ${report.created.length} created, ` +
        `${report.updated.length} updated, ${report.failed.length} failed`,
    );

    for (const write of writes) {
      await this.emitAuditEvent(
        write.kind === "created" ? "ASSET_CREATED" : "ASSET_UPDATED",
        "asset",
        write.asset.id,
        actor,
        batchId,
        { urn: write.asset.urn, name: write.asset.name },
      );
    }
    return report;
  }

  async getAsset(id: string): Promise<AssetRecord> {
    const asset = await this.store.getAsset(id);
    if (!asset) throw new NotFound(`Asset ${id} not found`);
    return asset;
  }

  async getAssetByUrn(urn: string): Promise<AssetRecord> {
    const asset = await this.store.getAssetByUrn(urn);
    if (!asset) throw new NotFound(`Asset ${urn} not found`);
    return asset;
  }

  async getAssetPath(id: string): Promise<AssetRecord[]> {
    const asset = await this.getAsset(id);
    return [...(await ancestorChain(this.store, asset)), asset];
  }

  async listChildren(parentId: string | null): Promise<AssetRecord[]> {
    if (parentId !== null) await this.getAsset(parentId);
    return this.store.listChildren(parentId);
  }

  async listAssets(filter: AssetFilter = {}): Promise<AssetRecord[]> {
    if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 1)) {
      throw new InvalidInput(`limit must be a positive integer, got ${filter.limit}`);
    }
    if (filter.offset !== undefined && (!Number.isInteger(filter.offset) || filter.offset < 0)) {
      throw new InvalidInput(`offset must be a non-negative integer, got ${filter.offset}`);
    }
    const search = filter.search?.trim();
    return this.store.listAssets({ ...filter, search: search ? search : undefined });
  }

  listAssetTypes(): Promise<AssetTypeDefinition[]> {
    return this.store.listAssetTypes();
  }

  async getSubtree(id: string): Promise<AssetRecord[]> {
    const root = await this.getAsset(id);
    const result: AssetRecord[] = [];
    const queue: AssetRecord[] = [root];
    const seen = new Set<string>();
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next || seen.has(next.id)) continue;
      seen.add(next.id);
      result.push(next);
      queue.push(...(await this.store.listChildren(next.id)));
    }
    return result;
  }

  async copyAsset(assetId: string, newParentId: string | null, actor?: ActorContext): Promise<AssetRecord[]> {
    const correlationId = randomUUID();
    let copies: AssetRecord[];
    try {
      copies = await this.store.transaction((tx) =>
        copySubtree(tx, assetId, newParentId, { urnPrefix: this.options.urnPrefix, now: this.now }),
      );
    } catch (err) {
      if (err instanceof Error && err.message.startsWith("INVENTORYSTORE_")) translateStoreError(err);
      throw err;
    }

    log(`[copy] ${assetId} -> ${newParentId ?? "<root>"}: ${copies.length} assets copied`);
    for (const copy of copies) {
      await this.emitAuditEvent("ASSET_CREATED", "asset", copy.id, actor ?? this.defaultActor, correlationId, {
        urn: copy.urn,
        name: copy.name,
        copiedFrom: assetId,
      });
    }
    return copies;
  }

  // ---- Snapshots ----

  appendSnapshot(
    assetId: string,
    takenAt: Date,
    items: readonly BomItemInput[],
    meta?: SnapshotMetadata,
    actor?: ActorContext,
  ): Promise<BomSnapshot> {
    return this.recordSnapshot("append", assetId, takenAt, items, meta, actor);
  }

  backfillSnapshot(
    assetId: string,
    takenAt: Date,
    items: readonly BomItemInput[],
    meta?: SnapshotMetadata,
    actor?: ActorContext,
  ): Promise<BomSnapshot> {
    return this.recordSnapshot("backfill", assetId, takenAt, items, meta, actor);
  }

  async getSnapshot(id: string): Promise<BomSnapshot> {
    const snapshot = await this.store.getSnapshot(id);
    if (!snapshot) throw new NotFound(`Snapshot ${id} not found`);
    return snapshot;
  }

  async latestBefore(assetId: string, at: Date): Promise<BomSnapshot | null> {
    assertDate(at, "Timestamp");
    await this.getAsset(assetId);
    return this.store.latestSnapshot(assetId, at);
  }

  async allBetween(assetId: string, from: Date, to: Date): Promise<BomSnapshot[]> {
    assertDate(from, "Range start");
    assertDate(to, "Range end");
    await this.getAsset(assetId);
    return this.store.listSnapshots(assetId, { from, to });
  }

  async snapshotHistory(assetId: string): Promise<BomSnapshot[]> {
    await this.getAsset(assetId);
    return this.store.listSnapshots(assetId);
  }

  // ---- Change analysis ----

  changeReport(assetId: string, months: number, opts: ChangeReportRequest = {}): Promise<ChangeReport> {
    return this.store.transaction((tx) =>
      changeReport(tx, assetId, months, {
        includeUnchanged: opts.includeUnchanged ?? this.options.includeUnchangedByDefault,
        now: opts.now,
      }),
    );
  }

  diffSnapshots(baselineId: string, currentId: string, opts: ReportOptions = {}): Promise<ChangeReport> {
    return diffSnapshots(this.store, baselineId, currentId, {
      includeUnchanged: opts.includeUnchanged ?? this.options.includeUnchangedByDefault,
    });
  }

  async changeTimeline(assetId: string, from: Date, to: Date, opts: ReportOptions = {}): Promise<TimelineStep[]> {
    assertDate(from, "Range start");
    assertDate(to, "Range end");
    return this.store.transaction((tx) =>
      changeTimeline(tx, assetId, from, to, {
        includeUnchanged: opts.includeUnchanged ?? this.options.includeUnchangedByDefault,
      }),
    );
  }

  // ---- Overview ----

  listAuditEvents(query?: AuditQuery): Promise<AuditEvent[]> {
    return this.audit.list(query);
  }

  async summary(): Promise<InventorySummary> {
    const generatedAt = this.now();
    const [totalAssets, totalSnapshots, recentSnapshots] = await Promise.all([
      this.store.countAssets(),
      this.store.countSnapshots(),
      this.store.countSnapshots(subDays(generatedAt, this.options.recentSnapshotDays)),
    ]);
    return { totalAssets, totalSnapshots, recentSnapshots, generatedAt };
  }

  // ---- Internals ----

  private async recordSnapshot(
    mode: SnapshotWriteMode,
    assetId: string,
    takenAt: Date,
    items: readonly BomItemInput[],
    meta: SnapshotMetadata = {},
    actor?: ActorContext,
  ): Promise<BomSnapshot> {
    let snapshot: BomSnapshot;
    try {
      snapshot = await this.store.transaction((tx) =>
        writeSnapshot(tx, assetId, takenAt, items, mode, this.now(), meta),
      );
    } catch (err) {
      if (err instanceof Error && err.message.startsWith("INVENTORYSTORE_")) translateStoreError(err);
      throw err;
    }

    log(
      `[snapshot] ${mode} ${snapshot.id} for asset ${assetId} at ${snapshot.takenAt.toISOString()}: ` +
        `${snapshot.stats.itemCount} items (+${snapshot.stats.added} -${snapshot.stats.removed} ~${snapshot.stats.modified})`,
    );
    await this.emitAuditEvent(
      mode === "append" ? "BOM_SNAPSHOT_APPENDED" : "BOM_SNAPSHOT_BACKFILLED",
      "bom_snapshot",
      snapshot.id,
      actor ?? this.defaultActor,
      undefined,
      { assetId, takenAt: snapshot.takenAt.toISOString(), ...snapshot.stats },
    );
    return snapshot;
  }

  private async emitAuditEvent(
    eventType: AuditEventType,
    entityType: AuditEvent["entityType"],
    entityId: string,
    actor: ActorContext,
    correlationId?: string,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    const event: AuditEvent = {
      eventId: randomUUID(),
      eventType,
      entityType,
      entityId,
      correlationId,
      actorId: actor.actorId,
      actorType: actor.actorType,
      timestamp: this.now().toISOString(),
      metadata,
    };
    await this.audit.emit(event);
  }
}
