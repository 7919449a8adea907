/**
 * Inventory Model Module
 *
 * Public exports for the asset and BOM history contract.
 *
 * @module platform/inventory/model
 */

export type {
  AssetType,
  AssetTypeDefinition,
  AssetStatus,
  JsonObject,
  AssetRecord,
  AssetRecordInput,
  RawAssetRecord,
  IngestionStatus,
  IngestionOutcome,
  IngestionReport,
  BomItem,
  BomItemInput,
  BomSnapshot,
  SnapshotStats,
  SnapshotMetadata,
  ChangeClassification,
  DiffedField,
  FieldChange,
  ChangeRecord,
  ChangeSummary,
  ChangeReport,
  TimelineStep,
  InventorySummary,
} from "./types";
