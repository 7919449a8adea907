export type { InventoryStore } from "./InventoryStore";
export type { AssetFilter, NewSnapshot, SnapshotRange } from "./types";
export { InMemoryInventoryStore } from "./InMemoryInventoryStore";
