import { describe, it, expect, beforeEach } from "vitest";
import { subMonths } from "date-fns";
import { createDevInventory } from "../core/createDevInventory";
import { InvalidInput } from "../service/errors";

const T0 = new Date("2025-01-10T12:00:00Z");
const T3 = new Date("2025-04-10T12:00:00Z");
const T6 = new Date("2025-07-15T12:00:00Z");

async function setup(overrides: Parameters<typeof createDevInventory>[0] = {}) {
  const dev = createDevInventory(overrides);
  const report = await dev.service.ingest([
    { name: "Core", asset_type: "System / Environment" },
    { name: "Router-1", asset_type: "Hardware CI", parent_name: "Core" },
    { name: "Switch-1", asset_type: "Hardware CI", parent_name: "Core" },
  ]);
  const ids = new Map(report.created.map((o) => [o.name, o.assetId ?? ""]));
  return { ...dev, routerId: ids.get("Router-1") ?? "", switchId: ids.get("Switch-1") ?? "" };
}

describe("change analysis", () => {
  let ctx: Awaited<ReturnType<typeof setup>>;

  beforeEach(async () => {
    ctx = await setup();
  });

  describe("changeReport", () => {
    it("reports a new firmware version and an added power supply over six months", async () => {
      const s0 = await ctx.service.appendSnapshot(ctx.routerId, T0, [{ componentRef: "fw-1.0", quantity: 1 }]);
      const s6 = await ctx.service.appendSnapshot(ctx.routerId, T6, [
        { componentRef: "fw-1.0", quantity: 1, version: "1.2" },
        { componentRef: "psu-2", quantity: 2 },
      ]);

      const report = await ctx.service.changeReport(ctx.routerId, 6);

      expect(report.to).toEqual(T6);
      expect(report.from).toEqual(subMonths(T6, 6));
      expect(report.baselineSnapshotId).toBe(s0.id);
      expect(report.currentSnapshotId).toBe(s6.id);
      expect(report.changes.map((c) => [c.classification, c.key])).toEqual([
        ["Modified", "fw-1.0"],
        ["Added", "psu-2"],
      ]);
      expect(report.changes[0].changes).toEqual([{ field: "version", before: null, after: "1.2" }]);
      expect(report.changes[1].after?.quantity).toBe(2);
      expect(report.summary).toEqual({ added: 1, removed: 0, modified: 1, unchanged: 0 });
    });

    it("lists unchanged items only when asked", async () => {
      await ctx.service.appendSnapshot(ctx.routerId, T0, [{ componentRef: "chassis" }, { componentRef: "fan" }]);
      await ctx.service.appendSnapshot(ctx.routerId, T6, [{ componentRef: "chassis" }]);

      const plain = await ctx.service.changeReport(ctx.routerId, 6);
      expect(plain.changes.map((c) => c.classification)).toEqual(["Removed"]);
      expect(plain.summary.unchanged).toBe(1);

      const full = await ctx.service.changeReport(ctx.routerId, 6, { includeUnchanged: true });
      expect(full.changes.map((c) => [c.classification, c.key])).toEqual([
        ["Unchanged", "chassis"],
        ["Removed", "fan"],
      ]);
    });

    it("follows the configured default for unchanged items", async () => {
      const verbose = await setup({ includeUnchangedByDefault: true });
      await verbose.service.appendSnapshot(verbose.routerId, T0, [{ componentRef: "chassis" }]);
      await verbose.service.appendSnapshot(verbose.routerId, T6, [{ componentRef: "chassis" }]);

      const report = await verbose.service.changeReport(verbose.routerId, 6);
      expect(report.changes.map((c) => c.classification)).toEqual(["Unchanged"]);

      const terse = await verbose.service.changeReport(verbose.routerId, 6, { includeUnchanged: false });
      expect(terse.changes).toEqual([]);
    });

    it("reports no changes when both ends fall on the same snapshot", async () => {
      const s0 = await ctx.service.appendSnapshot(ctx.routerId, T0, [{ componentRef: "cpu" }]);
      await ctx.service.appendSnapshot(ctx.routerId, T6, [{ componentRef: "gpu" }]);

      const report = await ctx.service.changeReport(ctx.routerId, 1, { now: new Date("2025-03-01T12:00:00Z") });
      expect(report.baselineSnapshotId).toBe(s0.id);
      expect(report.currentSnapshotId).toBe(s0.id);
      expect(report.changes).toEqual([]);
      expect(report.summary).toEqual({ added: 0, removed: 0, modified: 0, unchanged: 1 });
    });

    it("diffs against an empty baseline when history starts inside the window", async () => {
      await ctx.service.appendSnapshot(ctx.routerId, T6, [{ componentRef: "cpu" }, { componentRef: "ram" }]);

      const report = await ctx.service.changeReport(ctx.routerId, 6);
      expect(report.baselineSnapshotId).toBeNull();
      expect(report.changes.map((c) => c.classification)).toEqual(["Added", "Added"]);
    });

    it("returns an empty report for an asset without snapshots", async () => {
      const report = await ctx.service.changeReport(ctx.routerId, 3);
      expect(report.baselineSnapshotId).toBeNull();
      expect(report.currentSnapshotId).toBeNull();
      expect(report.changes).toEqual([]);
    });

    it("requires a positive whole number of months", async () => {
      await expect(ctx.service.changeReport(ctx.routerId, 0)).rejects.toThrow(InvalidInput);
      await expect(ctx.service.changeReport(ctx.routerId, 1.5)).rejects.toThrow(
        "months must be a positive integer, got 1.5",
      );
    });

    it("signals an unknown asset", async () => {
      await expect(ctx.service.changeReport("missing", 6)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("diffSnapshots", () => {
    it("diffs two snapshots of one asset", async () => {
      const a = await ctx.service.appendSnapshot(ctx.routerId, T0, [{ componentRef: "cpu", properties: { ghz: 2 } }]);
      const b = await ctx.service.appendSnapshot(ctx.routerId, T6, [{ componentRef: "cpu", properties: { ghz: 3 } }]);

      const report = await ctx.service.diffSnapshots(a.id, b.id);
      expect(report.from).toEqual(T0);
      expect(report.to).toEqual(T6);
      expect(report.changes[0].changes).toEqual([{ field: "properties", before: { ghz: 2 }, after: { ghz: 3 } }]);
    });

    it("refuses snapshots of different assets", async () => {
      const a = await ctx.service.appendSnapshot(ctx.routerId, T0, []);
      const b = await ctx.service.appendSnapshot(ctx.switchId, T0, []);

      await expect(ctx.service.diffSnapshots(a.id, b.id)).rejects.toThrow("belong to different assets");
    });
  });

  describe("changeTimeline", () => {
    beforeEach(async () => {
      await ctx.service.appendSnapshot(ctx.routerId, T0, [{ componentRef: "fw", version: "1.0" }], { label: "r1" });
      await ctx.service.appendSnapshot(ctx.routerId, T3, [{ componentRef: "fw", version: "1.1" }], { label: "r2" });
      await ctx.service.appendSnapshot(ctx.routerId, T6, [{ componentRef: "fw", version: "1.1" }, { componentRef: "psu" }], {
        label: "r3",
      });
    });

    it("diffs each snapshot in the window against its predecessor", async () => {
      const steps = await ctx.service.changeTimeline(
        ctx.routerId,
        new Date("2025-03-01T00:00:00Z"),
        new Date("2025-08-01T00:00:00Z"),
      );

      expect(steps.map((s) => s.label)).toEqual(["r2", "r3"]);
      expect(steps[0].changes[0].changes).toEqual([{ field: "version", before: "1.0", after: "1.1" }]);
      expect(steps[1].changes.map((c) => [c.classification, c.key])).toEqual([["Added", "psu"]]);
      expect(steps[1].fromSnapshotId).toBe(steps[0].toSnapshotId);
    });

    it("takes the predecessor from before a window that starts on a snapshot", async () => {
      const [r1] = await ctx.service.snapshotHistory(ctx.routerId);
      const steps = await ctx.service.changeTimeline(ctx.routerId, T3, T6);

      expect(steps.map((s) => s.label)).toEqual(["r2", "r3"]);
      expect(steps[0].fromSnapshotId).toBe(r1.id);
      expect(steps[0].summary).toEqual({ added: 0, removed: 0, modified: 1, unchanged: 0 });
    });

    it("starts from the empty set when the window covers the first snapshot", async () => {
      const steps = await ctx.service.changeTimeline(ctx.routerId, new Date("2024-01-01T00:00:00Z"), T0);

      expect(steps).toHaveLength(1);
      expect(steps[0].fromSnapshotId).toBeNull();
      expect(steps[0].summary).toEqual({ added: 1, removed: 0, modified: 0, unchanged: 0 });
    });

    it("rejects an inverted window", async () => {
      await expect(ctx.service.changeTimeline(ctx.routerId, T6, T0)).rejects.toThrow("Timeline start is after its end");
    });
  });
});
