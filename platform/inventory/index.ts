export type * from "./model";
export type { AssetFilter, InventoryStore, NewSnapshot, SnapshotRange } from "./store";
export { InMemoryInventoryStore } from "./store";
export type { InventoryService } from "./service/InventoryService";
export type {
  ActorContext,
  ChangeReportRequest,
  IngestOptions,
  ReportOptions,
  ServiceOptions,
} from "./service/types";
export { DEFAULT_SERVICE_OPTIONS } from "./service/types";
export * from "./service/errors";
export { StoreBackedInventoryService } from "./service/impl/StoreBackedInventoryService";
export { createDevInventory } from "./core/createDevInventory";
