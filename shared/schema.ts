import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  pgEnum,
  boolean,
  integer,
  bigserial,
  jsonb,
  unique,
  index,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const assetStatusEnum = pgEnum("asset_status", [
  "active",
  "inactive",
  "deprecated",
]);

export const auditEventTypeEnum = pgEnum("audit_event_type", [
  "ASSET_CREATED",
  "ASSET_UPDATED",
  "BOM_SNAPSHOT_APPENDED",
  "BOM_SNAPSHOT_BACKFILLED",
]);

export const actorTypeEnum = pgEnum("actor_type", [
  "user",
  "system",
  "integration",
]);

// Fixed taxonomy, seeded from shared/assetTypes.ts
export const assetTypes = pgTable("asset_types", {
  name: text("name").primaryKey(),
  code: text("code").notNull().unique(),
  rank: integer("rank").notNull(),
  description: text("description"),
  canHaveBom: boolean("can_have_bom").notNull().default(true),
});

export const assets = pgTable("assets", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  urn: text("urn").notNull().unique(),
  name: text("name").notNull(),
  assetType: text("asset_type").notNull().references(() => assetTypes.name),
  parentId: varchar("parent_id").references((): AnyPgColumn => assets.id),
  status: assetStatusEnum("status").notNull().default("active"),
  description: text("description"),
  version: text("version"),
  externalId: text("external_id"),
  externalSystem: text("external_system"),
  properties: jsonb("properties").$type<Record<string, unknown>>().notNull().default({}),
  tags: jsonb("tags").$type<string[]>().notNull().default([]),
  lifecycleStage: text("lifecycle_stage"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique("uq_assets_parent_name").on(table.parentId, table.name).nullsNotDistinct(),
  index("idx_assets_name").on(table.name),
]);

export const bomSnapshots = pgTable("bom_snapshots", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  assetId: varchar("asset_id").notNull().references(() => assets.id),
  takenAt: timestamp("taken_at", { withTimezone: true }).notNull(),
  sequence: bigserial("sequence", { mode: "number" }).notNull(),
  label: text("label"),
  bomType: text("bom_type").notNull().default("SBOM"),
  source: text("source"),
  backfilled: boolean("backfilled").notNull().default(false),
  itemCount: integer("item_count").notNull().default(0),
  addedCount: integer("added_count").notNull().default(0),
  removedCount: integer("removed_count").notNull().default(0),
  modifiedCount: integer("modified_count").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_bom_snapshots_asset_taken").on(table.assetId, table.takenAt, table.sequence),
]);

export const bomItems = pgTable("bom_items", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  snapshotId: varchar("snapshot_id").notNull().references(() => bomSnapshots.id),
  ordinal: integer("ordinal").notNull(),
  componentRef: text("component_ref").notNull(),
  position: text("position"),
  componentName: text("component_name"),
  quantity: integer("quantity").notNull().default(1),
  version: text("version"),
  properties: jsonb("properties").$type<Record<string, unknown>>().notNull().default({}),
}, (table) => [
  unique("uq_bom_items_snapshot_key").on(table.snapshotId, table.componentRef, table.position).nullsNotDistinct(),
]);

export const auditEvents = pgTable("audit_events", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  eventType: auditEventTypeEnum("event_type").notNull(),
  entityType: text("entity_type").notNull(),
  entityId: varchar("entity_id").notNull(),
  correlationId: varchar("correlation_id"),
  actorId: text("actor_id").notNull(),
  actorType: actorTypeEnum("actor_type").notNull().default("system"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_audit_events_entity").on(table.entityId, table.createdAt),
]);

// Insert schemas
export const insertAssetTypeSchema = createInsertSchema(assetTypes, {
  code: (schema) => schema.regex(/^[a-z][a-z0-9-]*$/),
  rank: (schema) => schema.int().positive(),
});

// Types
export type InsertAssetType = z.infer<typeof insertAssetTypeSchema>;
export type AssetTypeRow = typeof assetTypes.$inferSelect;

export type InsertAsset = typeof assets.$inferInsert;
export type AssetRow = typeof assets.$inferSelect;

export type InsertBomSnapshot = typeof bomSnapshots.$inferInsert;
export type BomSnapshotRow = typeof bomSnapshots.$inferSelect;

export type InsertBomItem = typeof bomItems.$inferInsert;
export type BomItemRow = typeof bomItems.$inferSelect;

export type InsertAuditEvent = typeof auditEvents.$inferInsert;
export type AuditEventRow = typeof auditEvents.$inferSelect;
