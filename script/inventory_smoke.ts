import { createDevInventory, CyclicHierarchy, NonMonotonicSnapshot } from "../platform/inventory";

async function main() {
  const { service, audit, store } = createDevInventory();

  // 1) Children listed before parents still resolve
  const report = await service.ingest([
    { name: "Edge", asset_type: "Subsystem / Service", parent_name: "Core Network" },
    { name: "Router-1", asset_type: "Hardware CI", parent_name: "Edge", tags: "prod,edge" },
    { name: "Core Network", asset_type: "System / Environment", parent_name: "" },
  ]);
  if (report.created.length !== 3 || report.failed.length !== 0) {
    throw new Error(`Expected 3 created, got ${JSON.stringify(report)}`);
  }

  // 2) Cycles abort the whole batch
  let threw = false;
  try {
    await service.ingest([
      { name: "Loop-A", asset_type: "Component / Segment", parent_name: "Loop-B" },
      { name: "Loop-B", asset_type: "Component / Segment", parent_name: "Loop-A" },
    ]);
  } catch (e) {
    threw = e instanceof CyclicHierarchy;
  }
  if (!threw) throw new Error("Expected CyclicHierarchy for a two-record cycle.");
  if ((await store.countAssets()) !== 3) throw new Error("Cyclic batch left rows behind.");

  // 3) Snapshots are append-only and monotonic
  const router = report.created.find((o) => o.name === "Router-1");
  if (!router?.assetId) throw new Error("Router-1 was not created.");

  await service.appendSnapshot(router.assetId, new Date("2025-01-15T00:00:00Z"), [{ componentRef: "fw-1.0" }]);
  await service.appendSnapshot(router.assetId, new Date("2025-07-15T00:00:00Z"), [
    { componentRef: "fw-1.0", version: "1.2" },
    { componentRef: "psu-2", quantity: 2 },
  ]);

  threw = false;
  try {
    await service.appendSnapshot(router.assetId, new Date("2025-03-01T00:00:00Z"), []);
  } catch (e) {
    threw = e instanceof NonMonotonicSnapshot;
  }
  if (!threw) throw new Error("Expected NonMonotonicSnapshot for an out-of-order append.");

  // 4) Six-month change report
  const changes = await service.changeReport(router.assetId, 6);
  const keys = changes.changes.map((c) => `${c.classification}:${c.key}`);
  if (keys.join(",") !== "Modified:fw-1.0,Added:psu-2") {
    throw new Error(`Unexpected change report: ${keys.join(",")}`);
  }

  console.log("Inventory smoke test: OK");
  console.log("Audit events:", audit.events.map((e) => e.eventType));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
