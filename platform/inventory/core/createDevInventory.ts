import { InMemoryAuditSink } from "../../audit";
import { InMemoryInventoryStore } from "../store/InMemoryInventoryStore";
import { StoreBackedInventoryService } from "../service/impl/StoreBackedInventoryService";
import { DEFAULT_SERVICE_OPTIONS, type ServiceOptions } from "../service/types";

export function createDevInventory(overrides: Partial<ServiceOptions> = {}) {
  const audit = new InMemoryAuditSink();
  const store = new InMemoryInventoryStore();
  const service = new StoreBackedInventoryService(store, audit, { ...DEFAULT_SERVICE_OPTIONS, ...overrides });

  return { audit, store, service };
}
