import { describe, it, expect, beforeEach } from "vitest";
import { createDevInventory } from "../core/createDevInventory";
import { InvalidHierarchy, InvalidInput, NotFound } from "../service/errors";

const NOW = new Date("2025-07-15T12:00:00Z");

describe("asset operations", () => {
  let dev: ReturnType<typeof createDevInventory>;
  let ids: Map<string | null, string>;

  beforeEach(async () => {
    dev = createDevInventory({ now: () => NOW, actor: { actorId: "importer", actorType: "integration" } });
    const report = await dev.service.ingest([
      { name: "Core Network", asset_type: "System / Environment" },
      { name: "Edge", asset_type: "Subsystem / Service", parent_name: "Core Network" },
      { name: "Router-1", asset_type: "Hardware CI", parent_name: "Edge", external_id: "CI-0042" },
      { name: "Switch-1", asset_type: "Hardware CI", parent_name: "Edge" },
      { name: "Spare", asset_type: "Hardware CI" },
    ]);
    ids = new Map(report.created.map((o) => [o.name, o.assetId ?? ""]));
  });

  function id(name: string): string {
    return ids.get(name) ?? "";
  }

  describe("reads", () => {
    it("returns the path from the root", async () => {
      const path = await dev.service.getAssetPath(id("Router-1"));
      expect(path.map((a) => a.name)).toEqual(["Core Network", "Edge", "Router-1"]);
    });

    it("walks a subtree breadth-first", async () => {
      const subtree = await dev.service.getSubtree(id("Core Network"));
      expect(subtree.map((a) => a.name)).toEqual(["Core Network", "Edge", "Router-1", "Switch-1"]);
    });

    it("lists roots and children by name", async () => {
      expect((await dev.service.listChildren(null)).map((a) => a.name)).toEqual(["Core Network", "Spare"]);
      expect((await dev.service.listChildren(id("Edge"))).map((a) => a.name)).toEqual(["Router-1", "Switch-1"]);
    });

    it("lists assets by type, parent and name", async () => {
      const names = async (filter: Parameters<typeof dev.service.listAssets>[0]) =>
        (await dev.service.listAssets(filter)).map((a) => a.name);

      expect(await names({})).toEqual(["Core Network", "Edge", "Router-1", "Spare", "Switch-1"]);
      expect(await names({ assetType: "Hardware CI" })).toEqual(["Router-1", "Spare", "Switch-1"]);
      expect(await names({ parentId: null })).toEqual(["Core Network", "Spare"]);
      expect(await names({ parentId: id("Edge"), search: " SWI " })).toEqual(["Switch-1"]);
      expect(await names({ status: "inactive" })).toEqual([]);
      expect(await names({ search: "%" })).toEqual([]);
      expect(await names({ limit: 2, offset: 1 })).toEqual(["Edge", "Router-1"]);
    });

    it("rejects invalid paging", async () => {
      await expect(dev.service.listAssets({ limit: 0 })).rejects.toThrow(InvalidInput);
      await expect(dev.service.listAssets({ offset: -1 })).rejects.toThrow(
        "offset must be a non-negative integer, got -1",
      );
    });

    it("lists the asset types by rank", async () => {
      const types = await dev.service.listAssetTypes();

      expect(types.map((t) => t.name)).toEqual([
        "Domain / System of Systems",
        "System / Environment",
        "Subsystem / Service",
        "Component / Segment",
        "Configuration Item (CI)",
        "Firmware CI",
        "Hardware CI",
        "Software CI",
      ]);
      expect(types[0]).toEqual({
        name: "Domain / System of Systems",
        code: "domain",
        rank: 1,
        description: "Highest level grouping of multiple systems",
        canHaveBom: false,
      });
    });

    it("finds an asset by URN", async () => {
      const router = await dev.service.getAssetByUrn("urn:asset:hw:Core%20Network/Edge/Router-1");
      expect(router.id).toBe(id("Router-1"));
    });

    it("signals unknown ids and URNs", async () => {
      await expect(dev.service.getAsset("missing")).rejects.toThrow(NotFound);
      await expect(dev.service.getAssetByUrn("urn:asset:hw:nowhere")).rejects.toThrow(
        "Asset urn:asset:hw:nowhere not found",
      );
      await expect(dev.service.listChildren("missing")).rejects.toThrow(NotFound);
    });
  });

  describe("copyAsset", () => {
    it("copies a subtree beside the original with a suffixed name", async () => {
      await dev.service.appendSnapshot(id("Router-1"), NOW, [{ componentRef: "cpu" }]);

      const copies = await dev.service.copyAsset(id("Edge"), id("Core Network"));

      expect(copies.map((a) => a.urn)).toEqual([
        "urn:asset:subsys:Core%20Network/Edge%20(Copy)",
        "urn:asset:hw:Core%20Network/Edge%20(Copy)/Router-1",
        "urn:asset:hw:Core%20Network/Edge%20(Copy)/Switch-1",
      ]);
      expect(copies[0].name).toBe("Edge (Copy)");
      expect(copies[0].parentId).toBe(id("Core Network"));
      expect(copies[1].parentId).toBe(copies[0].id);
      expect(copies[1].externalId).toBeNull();
      expect(copies[1].id).not.toBe(id("Router-1"));
      expect(await dev.service.snapshotHistory(copies[1].id)).toEqual([]);
    });

    it("numbers repeated copies", async () => {
      await dev.service.copyAsset(id("Spare"), null);
      const second = await dev.service.copyAsset(id("Spare"), null);

      expect(second[0].name).toBe("Spare (Copy) (2)");
    });

    it("keeps the name when the target parent has no clash", async () => {
      const [copy] = await dev.service.copyAsset(id("Edge"), null);
      expect(copy.name).toBe("Edge");
      expect(copy.urn).toBe("urn:asset:subsys:Edge");
    });

    it("refuses to copy into the asset's own subtree", async () => {
      await expect(dev.service.copyAsset(id("Edge"), id("Router-1"))).rejects.toThrow(
        'Cannot copy "Edge" into its own subtree',
      );
      await expect(dev.service.copyAsset(id("Edge"), id("Edge"))).rejects.toThrow(InvalidHierarchy);
    });

    it("enforces the taxonomy under the new parent", async () => {
      await expect(dev.service.copyAsset(id("Edge"), id("Spare"))).rejects.toMatchObject({
        code: "INVALID_HIERARCHY",
      });
      expect(await dev.store.countAssets()).toBe(5);
    });

    it("records the copies in the audit trail", async () => {
      const copies = await dev.service.copyAsset(id("Spare"), null);
      const events = await dev.service.listAuditEvents({ entityId: copies[0].id });

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        eventType: "ASSET_CREATED",
        actorId: "importer",
        actorType: "integration",
        metadata: { copiedFrom: id("Spare") },
      });
    });
  });

  describe("summary", () => {
    it("counts assets, snapshots and recent snapshots", async () => {
      await dev.service.appendSnapshot(id("Router-1"), new Date("2025-01-10T12:00:00Z"), []);
      await dev.service.appendSnapshot(id("Router-1"), new Date("2025-07-10T12:00:00Z"), []);

      expect(await dev.service.summary()).toEqual({
        totalAssets: 5,
        totalSnapshots: 2,
        recentSnapshots: 2,
        generatedAt: NOW,
      });
    });

    it("counts recent snapshots by when they were recorded", async () => {
      let clock = new Date("2025-06-01T12:00:00Z");
      const timed = createDevInventory({ now: () => clock });
      const report = await timed.service.ingest([{ name: "Router-9", asset_type: "Hardware CI" }]);
      const routerId = report.created[0].assetId ?? "";

      await timed.service.appendSnapshot(routerId, new Date("2025-05-01T12:00:00Z"), []);
      clock = NOW;
      const late = await timed.service.backfillSnapshot(routerId, new Date("2025-01-10T12:00:00Z"), []);

      expect(late.createdAt).toEqual(NOW);
      expect(await timed.service.summary()).toEqual({
        totalAssets: 1,
        totalSnapshots: 2,
        recentSnapshots: 1,
        generatedAt: NOW,
      });
    });
  });

  describe("listAuditEvents", () => {
    it("filters by event type and time", async () => {
      const created = await dev.service.listAuditEvents({ eventType: "ASSET_CREATED" });
      expect(created).toHaveLength(5);
      expect(await dev.service.listAuditEvents({ since: new Date("2026-01-01T00:00:00Z") })).toEqual([]);
      expect(await dev.service.listAuditEvents({ limit: 2 })).toHaveLength(2);
    });
  });
});
