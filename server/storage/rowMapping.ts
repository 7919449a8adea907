import { isAssetType, type AssetTypeDefinition } from "@shared/assetTypes";
import type {
  AssetRow,
  AssetTypeRow,
  AuditEventRow,
  BomItemRow,
  BomSnapshotRow,
  InsertAsset,
  InsertAuditEvent,
  InsertBomItem,
  InsertBomSnapshot,
} from "@shared/schema";
import type { AuditEntityType, AuditEvent } from "../../platform/audit";
import type { AssetRecord, BomItem, BomSnapshot, NewSnapshot } from "../../platform/inventory";

function isEntityType(value: string): value is AuditEntityType {
  return value === "asset" || value === "bom_snapshot";
}

export function toAssetTypeDefinition(row: AssetTypeRow): AssetTypeDefinition {
  if (!isAssetType(row.name)) {
    throw new Error(`Asset type "${row.name}" is not part of the taxonomy`);
  }
  return {
    name: row.name,
    code: row.code,
    rank: row.rank,
    description: row.description ?? "",
    canHaveBom: row.canHaveBom,
  };
}

export function toAssetRecord(row: AssetRow): AssetRecord {
  if (!isAssetType(row.assetType)) {
    throw new Error(`Asset ${row.id} has unknown type "${row.assetType}"`);
  }
  return {
    id: row.id,
    urn: row.urn,
    name: row.name,
    assetType: row.assetType,
    parentId: row.parentId,
    status: row.status,
    description: row.description,
    version: row.version,
    externalId: row.externalId,
    externalSystem: row.externalSystem,
    properties: row.properties,
    tags: row.tags,
    lifecycleStage: row.lifecycleStage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toAssetInsert(asset: AssetRecord): InsertAsset {
  return {
    id: asset.id,
    urn: asset.urn,
    name: asset.name,
    assetType: asset.assetType,
    parentId: asset.parentId,
    status: asset.status,
    description: asset.description,
    version: asset.version,
    externalId: asset.externalId,
    externalSystem: asset.externalSystem,
    properties: { ...asset.properties },
    tags: [...asset.tags],
    lifecycleStage: asset.lifecycleStage,
    createdAt: asset.createdAt,
    updatedAt: asset.updatedAt,
  };
}

export function toBomItem(row: BomItemRow): BomItem {
  return {
    componentRef: row.componentRef,
    position: row.position,
    componentName: row.componentName,
    quantity: row.quantity,
    version: row.version,
    properties: row.properties,
  };
}

export function toSnapshotInsert(snapshot: NewSnapshot): InsertBomSnapshot {
  return {
    id: snapshot.id,
    assetId: snapshot.assetId,
    takenAt: snapshot.takenAt,
    label: snapshot.label,
    bomType: snapshot.bomType,
    source: snapshot.source,
    backfilled: snapshot.backfilled,
    itemCount: snapshot.stats.itemCount,
    addedCount: snapshot.stats.added,
    removedCount: snapshot.stats.removed,
    modifiedCount: snapshot.stats.modified,
    createdAt: snapshot.createdAt,
  };
}

export function toItemInserts(snapshotId: string, items: readonly BomItem[]): InsertBomItem[] {
  return items.map((item, ordinal) => ({
    snapshotId,
    ordinal,
    componentRef: item.componentRef,
    position: item.position,
    componentName: item.componentName,
    quantity: item.quantity,
    version: item.version,
    properties: { ...item.properties },
  }));
}

/** Items must already be in ordinal order. */
export function toBomSnapshot(row: BomSnapshotRow, items: readonly BomItemRow[]): BomSnapshot {
  return {
    id: row.id,
    assetId: row.assetId,
    takenAt: row.takenAt,
    sequence: row.sequence,
    label: row.label,
    bomType: row.bomType,
    source: row.source,
    backfilled: row.backfilled,
    stats: {
      itemCount: row.itemCount,
      added: row.addedCount,
      removed: row.removedCount,
      modified: row.modifiedCount,
    },
    items: items.map(toBomItem),
    createdAt: row.createdAt,
  };
}

export function toAuditInsert(event: AuditEvent): InsertAuditEvent {
  return {
    id: event.eventId,
    eventType: event.eventType,
    entityType: event.entityType,
    entityId: event.entityId,
    correlationId: event.correlationId ?? null,
    actorId: event.actorId,
    actorType: event.actorType,
    metadata: event.metadata ?? null,
    createdAt: new Date(event.timestamp),
  };
}

export function toAuditEvent(row: AuditEventRow): AuditEvent {
  if (!isEntityType(row.entityType)) {
    throw new Error(`Audit event ${row.id} has unknown entity type "${row.entityType}"`);
  }
  return {
    eventId: row.id,
    eventType: row.eventType,
    entityType: row.entityType,
    entityId: row.entityId,
    correlationId: row.correlationId ?? undefined,
    actorId: row.actorId,
    actorType: row.actorType,
    timestamp: row.createdAt.toISOString(),
    metadata: row.metadata ?? undefined,
  };
}
