import type { AuditEvent, AuditQuery } from "../../audit";
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
} from "../model";
import type { AssetFilter } from "../store";
import type { ActorContext, ChangeReportRequest, IngestOptions, ReportOptions } from "./types";

/**
 * InventoryService is the ONLY allowed read/write surface for inventory
 * state.
 *
 * Rules:
 * - Every write is one unit of work
 * - Audit events are emitted after the unit of work commits
 * - Lookups by id signal NotFound instead of returning null
 */
export interface InventoryService {
  // ---- Assets ----

  /** Resolve a batch of raw records into the tree. One transaction per batch. */
  ingest(batch: readonly RawAssetRecord[], opts?: IngestOptions): Promise<IngestionReport>;

  getAsset(id: string): Promise<AssetRecord>;

  getAssetByUrn(urn: string): Promise<AssetRecord>;

  /** Root first, ending with the asset itself. */
  getAssetPath(id: string): Promise<AssetRecord[]>;

  listChildren(parentId: string | null): Promise<AssetRecord[]>;

  /** Filtered listing ordered by name. */
  listAssets(filter?: AssetFilter): Promise<AssetRecord[]>;

  /** The taxonomy, ordered by (rank, name). */
  listAssetTypes(): Promise<AssetTypeDefinition[]>;

  /** Breadth-first, the asset itself first. */
  getSubtree(id: string): Promise<AssetRecord[]>;

  copyAsset(assetId: string, newParentId: string | null, actor?: ActorContext): Promise<AssetRecord[]>;

  // ---- Snapshots ----

  appendSnapshot(
    assetId: string,
    takenAt: Date,
    items: readonly BomItemInput[],
    meta?: SnapshotMetadata,
    actor?: ActorContext,
  ): Promise<BomSnapshot>;

  backfillSnapshot(
    assetId: string,
    takenAt: Date,
    items: readonly BomItemInput[],
    meta?: SnapshotMetadata,
    actor?: ActorContext,
  ): Promise<BomSnapshot>;

  getSnapshot(id: string): Promise<BomSnapshot>;

  latestBefore(assetId: string, at: Date): Promise<BomSnapshot | null>;

  allBetween(assetId: string, from: Date, to: Date): Promise<BomSnapshot[]>;

  snapshotHistory(assetId: string): Promise<BomSnapshot[]>;

  // ---- Change analysis ----

  changeReport(assetId: string, months: number, opts?: ChangeReportRequest): Promise<ChangeReport>;

  diffSnapshots(baselineId: string, currentId: string, opts?: ReportOptions): Promise<ChangeReport>;

  changeTimeline(assetId: string, from: Date, to: Date, opts?: ReportOptions): Promise<TimelineStep[]>;

  // ---- Overview ----

  listAuditEvents(query?: AuditQuery): Promise<AuditEvent[]>;

  summary(): Promise<InventorySummary>;
}
