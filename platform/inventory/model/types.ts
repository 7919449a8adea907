/**
 * Inventory Contract
 *
 * Core records for the hierarchical asset inventory and its Bill of
 * Materials history.
 *
 * Invariants:
 * - An Asset's id and urn are immutable once assigned
 * - (parentId, name) is unique across all assets, roots included
 * - The tree edge lives on the child (parentId); there is no child list
 * - A BomSnapshot is never edited after it is written
 * - Identity keys (componentRef, position) are unique within one snapshot
 *
 * This contract intentionally excludes:
 * - Storage/persistence mechanisms
 * - Wire formats (CSV, JSON, XML)
 */

import type { AssetType } from "@shared/assetTypes";

export type { AssetType, AssetTypeDefinition } from "@shared/assetTypes";

// ============================================================================
// Assets
// ============================================================================

export type AssetStatus = "active" | "inactive" | "deprecated";

export type JsonObject = Record<string, unknown>;

/**
 * A node in the managed infrastructure hierarchy.
 *
 * @example
 * ```ts
 * const router: AssetRecord = {
 *   id: "7d1e…",
 *   urn: "urn:asset:hw:Core%20Network/Edge/Router-1",
 *   name: "Router-1",
 *   assetType: "Hardware CI",
 *   parentId: "41aa…",
 *   status: "active",
 *   description: null,
 *   version: null,
 *   externalId: "CI-0042",
 *   externalSystem: "OTOBO",
 *   properties: { rackUnit: 12 },
 *   tags: ["edge", "prod"],
 *   lifecycleStage: "production",
 *   createdAt: new Date("2025-01-15T10:00:00Z"),
 *   updatedAt: new Date("2025-06-20T14:30:00Z"),
 * };
 * ```
 */
export interface AssetRecord {
  readonly id: string;
  readonly urn: string;
  readonly name: string;
  readonly assetType: AssetType;
  /** Weak back-reference; null for roots. */
  readonly parentId: string | null;
  readonly status: AssetStatus;
  readonly description: string | null;
  /** Free-form version label of the asset itself. */
  readonly version: string | null;
  /** Key of this asset in a foreign system. */
  readonly externalId: string | null;
  readonly externalSystem: string | null;
  readonly properties: Readonly<JsonObject>;
  /** Stored de-duplicated and sorted. */
  readonly tags: readonly string[];
  readonly lifecycleStage: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * A raw asset record after normalization, as handed over by an import
 * adapter. Optional fields left undefined are not touched on update.
 */
export interface AssetRecordInput {
  name: string;
  assetType: AssetType;
  /** Name of the parent asset; null for roots. */
  parentName: string | null;
  status?: AssetStatus;
  description?: string;
  version?: string;
  externalId?: string;
  externalSystem?: string;
  properties?: JsonObject;
  tags?: string[];
  lifecycleStage?: string;
}

/** Untyped mapping produced by CSV/JSON/XML decoding. */
export type RawAssetRecord = Readonly<Record<string, unknown>>;

// ============================================================================
// Ingestion
// ============================================================================

export type IngestionStatus = "created" | "updated" | "failed";

export interface IngestionOutcome {
  /** Position of the record in the submitted batch. */
  index: number;
  name: string | null;
  parentName: string | null;
  status: IngestionStatus;
  assetId?: string;
  urn?: string;
  error?: { code: string; message: string };
}

export interface IngestionReport {
  batchId: string;
  total: number;
  created: IngestionOutcome[];
  updated: IngestionOutcome[];
  failed: IngestionOutcome[];
}

// ============================================================================
// Bill of Materials
// ============================================================================

/**
 * One line of a BOM. Identity is (componentRef, position).
 */
export interface BomItem {
  /** Tracked asset id, or a stable external part identifier. */
  readonly componentRef: string;
  /** Slot designator when the same component appears more than once. */
  readonly position: string | null;
  /** Display label; not compared when diffing. */
  readonly componentName: string | null;
  readonly quantity: number;
  readonly version: string | null;
  readonly properties: Readonly<JsonObject>;
}

export interface BomItemInput {
  componentRef: string;
  position?: string | null;
  componentName?: string | null;
  quantity?: number;
  version?: string | null;
  properties?: JsonObject;
}

export interface SnapshotStats {
  itemCount: number;
  added: number;
  removed: number;
  modified: number;
}

/**
 * Immutable, timestamped full BOM state of one asset.
 */
export interface BomSnapshot {
  readonly id: string;
  readonly assetId: string;
  /** Moment the BOM state is asserted to be valid. */
  readonly takenAt: Date;
  /** Store-assigned insertion order; breaks ties on takenAt. */
  readonly sequence: number;
  readonly label: string | null;
  readonly bomType: string;
  readonly source: string | null;
  readonly backfilled: boolean;
  /** Counts against the snapshot that preceded this one when it was written. */
  readonly stats: SnapshotStats;
  readonly items: readonly BomItem[];
  /** When the snapshot was recorded, as opposed to the state it asserts. */
  readonly createdAt: Date;
}

export interface SnapshotMetadata {
  label?: string;
  bomType?: string;
  source?: string;
}

// ============================================================================
// Change analysis
// ============================================================================

export type ChangeClassification = "Added" | "Removed" | "Modified" | "Unchanged";

export type DiffedField = "quantity" | "version" | "properties";

export interface FieldChange {
  field: DiffedField;
  before: unknown;
  after: unknown;
}

export interface ChangeRecord {
  classification: ChangeClassification;
  /** Display form of the identity key: `ref` or `ref#position`. */
  key: string;
  componentRef: string;
  position: string | null;
  /** Only present for Modified. */
  changes?: FieldChange[];
  before?: BomItem;
  after?: BomItem;
}

export interface ChangeSummary {
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
}

export interface ChangeReport {
  assetId: string;
  from: Date;
  to: Date;
  baselineSnapshotId: string | null;
  currentSnapshotId: string | null;
  changes: ChangeRecord[];
  summary: ChangeSummary;
}

export interface TimelineStep {
  fromSnapshotId: string | null;
  toSnapshotId: string;
  takenAt: Date;
  label: string | null;
  changes: ChangeRecord[];
  summary: ChangeSummary;
}

export interface InventorySummary {
  totalAssets: number;
  totalSnapshots: number;
  recentSnapshots: number;
  generatedAt: Date;
}
