// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
// Must stay the first import: ./db reads the config on load.
import "dotenv/config";

import { log } from "@shared/log";
import { StoreBackedInventoryService, type InventoryService } from "../platform/inventory";
import { loadConfig } from "./config";
import { db, pool } from "./db";
import { seedDatabase } from "./seed";
import { DrizzleAuditSink } from "./storage/DrizzleAuditSink";
import { DrizzleInventoryStore } from "./storage/DrizzleInventoryStore";

/**
 * Production wiring: PostgreSQL store and audit trail behind the
 * inventory service. Seeds the taxonomy on first use.
 */
export async function createInventory(): Promise<{ service: InventoryService; close: () => Promise<void> }> {
  const config = loadConfig();
  await seedDatabase(db);

  const service = new StoreBackedInventoryService(new DrizzleInventoryStore(db), new DrizzleAuditSink(db), {
    urnPrefix: config.urnPrefix,
    defaultExternalSystem: config.defaultExternalSystem,
    includeUnchangedByDefault: config.includeUnchangedByDefault,
    recentSnapshotDays: config.recentSnapshotDays,
  });
  log(`inventory ready (urn prefix ${config.urnPrefix})`);

  return { service, close: () => pool.end() };
}
