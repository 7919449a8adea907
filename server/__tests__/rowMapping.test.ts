import { describe, it, expect } from "vitest";
import type { AssetRow, AuditEventRow, BomItemRow, BomSnapshotRow } from "@shared/schema";
import {
  toAssetRecord,
  toAssetTypeDefinition,
  toAuditEvent,
  toBomSnapshot,
  toItemInserts,
  toSnapshotInsert,
} from "../storage/rowMapping";

const CREATED = new Date("2025-01-15T10:00:00Z");

function makeAssetRow(overrides: Partial<AssetRow> = {}): AssetRow {
  return {
    id: "a-1",
    urn: "urn:asset:hw:Core/Router-1",
    name: "Router-1",
    assetType: "Hardware CI",
    parentId: "p-1",
    status: "active",
    description: null,
    version: null,
    externalId: "CI-0042",
    externalSystem: "OTOBO",
    properties: { rackUnit: 12 },
    tags: ["edge"],
    lifecycleStage: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

function makeItemRow(ordinal: number, componentRef: string): BomItemRow {
  return {
    id: `i-${ordinal}`,
    snapshotId: "s-1",
    ordinal,
    componentRef,
    position: null,
    componentName: null,
    quantity: 1,
    version: null,
    properties: {},
  };
}

describe("rowMapping", () => {
  it("maps an asset row", () => {
    const asset = toAssetRecord(makeAssetRow());
    expect(asset.assetType).toBe("Hardware CI");
    expect(asset.properties).toEqual({ rackUnit: 12 });
    expect(asset.parentId).toBe("p-1");
  });

  it("rejects a row with a type outside the taxonomy", () => {
    expect(() => toAssetRecord(makeAssetRow({ assetType: "Rack" }))).toThrow('Asset a-1 has unknown type "Rack"');
  });

  it("maps an asset type row", () => {
    const row = { name: "Hardware CI", code: "hw", rank: 6, description: null, canHaveBom: true };

    expect(toAssetTypeDefinition(row)).toEqual({ ...row, description: "" });
    expect(() => toAssetTypeDefinition({ ...row, name: "Rack" })).toThrow(
      'Asset type "Rack" is not part of the taxonomy',
    );
  });

  it("maps a snapshot row and its items", () => {
    const row: BomSnapshotRow = {
      id: "s-1",
      assetId: "a-1",
      takenAt: CREATED,
      sequence: 7,
      label: "v2",
      bomType: "HBOM",
      source: null,
      backfilled: true,
      itemCount: 2,
      addedCount: 1,
      removedCount: 0,
      modifiedCount: 1,
      createdAt: CREATED,
    };

    const snapshot = toBomSnapshot(row, [makeItemRow(0, "cpu"), makeItemRow(1, "ram")]);
    expect(snapshot.stats).toEqual({ itemCount: 2, added: 1, removed: 0, modified: 1 });
    expect(snapshot.items.map((i) => i.componentRef)).toEqual(["cpu", "ram"]);
    expect(snapshot.sequence).toBe(7);
    expect(snapshot.createdAt).toEqual(CREATED);

    expect(toSnapshotInsert(snapshot)).toMatchObject({
      addedCount: 1,
      modifiedCount: 1,
      backfilled: true,
      createdAt: CREATED,
    });
  });

  it("numbers items by their position in the snapshot", () => {
    const inserts = toItemInserts("s-9", [
      { componentRef: "b", position: null, componentName: null, quantity: 1, version: null, properties: {} },
      { componentRef: "a", position: "x", componentName: "A", quantity: 3, version: "1", properties: {} },
    ]);
    expect(inserts.map((i) => [i.snapshotId, i.ordinal, i.componentRef])).toEqual([
      ["s-9", 0, "b"],
      ["s-9", 1, "a"],
    ]);
  });

  it("maps an audit row with optional fields left out", () => {
    const row: AuditEventRow = {
      id: "e-1",
      eventType: "ASSET_CREATED",
      entityType: "asset",
      entityId: "a-1",
      correlationId: null,
      actorId: "system",
      actorType: "system",
      metadata: null,
      createdAt: CREATED,
    };

    expect(toAuditEvent(row)).toEqual({
      eventId: "e-1",
      eventType: "ASSET_CREATED",
      entityType: "asset",
      entityId: "a-1",
      actorId: "system",
      actorType: "system",
      timestamp: "2025-01-15T10:00:00.000Z",
    });
  });
});
