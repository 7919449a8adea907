export type AuditEventType =
  | "ASSET_CREATED"
  | "ASSET_UPDATED"
  | "BOM_SNAPSHOT_APPENDED"
  | "BOM_SNAPSHOT_BACKFILLED";

export type AuditEntityType = "asset" | "bom_snapshot";

export type AuditActorType = "user" | "system" | "integration";

export type AuditEvent = Readonly<{
  eventId: string;
  eventType: AuditEventType;
  entityType: AuditEntityType;
  entityId: string;
  /** Ingestion batch or copy operation that produced the event. */
  correlationId?: string;
  actorId: string;
  actorType: AuditActorType;
  timestamp: string;
  metadata?: Record<string, unknown>;
}>;

export type AuditQuery = Readonly<{
  entityId?: string;
  eventType?: AuditEventType;
  since?: Date;
  limit?: number;
}>;
