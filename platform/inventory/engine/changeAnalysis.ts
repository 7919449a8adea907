import { subMonths } from "date-fns";
import type { BomSnapshot, ChangeReport, TimelineStep } from "../model";
import type { InventoryStore } from "../store";
import { InvalidInput, NotFound } from "../service/errors";
import { diffBomItems, type BomDiffOptions } from "./bomDiff";

export interface ChangeReportOptions extends BomDiffOptions {
  /** Window end. Defaults to the latest snapshot's timestamp. */
  now?: Date;
}

async function requireAsset(store: InventoryStore, assetId: string): Promise<void> {
  if (!(await store.getAsset(assetId))) throw new NotFound(`Asset ${assetId} not found`);
}

/**
 * Net change of an asset's BOM over the trailing `months` calendar months.
 *
 * Baseline is the latest snapshot at or before `from`; the empty set when
 * the history starts later. Current is the latest snapshot at or before `to`.
 */
export async function changeReport(
  store: InventoryStore,
  assetId: string,
  months: number,
  opts: ChangeReportOptions = {},
): Promise<ChangeReport> {
  if (!Number.isInteger(months) || months < 1) {
    throw new InvalidInput(`months must be a positive integer, got ${months}`);
  }
  await requireAsset(store, assetId);

  let to = opts.now;
  let current: BomSnapshot | null;
  if (to) {
    current = await store.latestSnapshot(assetId, to);
  } else {
    current = await store.latestSnapshot(assetId);
    to = current?.takenAt ?? new Date();
  }
  const from = subMonths(to, months);
  const baseline = await store.latestSnapshot(assetId, from);

  const { changes, summary } = diffBomItems(baseline?.items ?? [], current?.items ?? [], opts);

  return {
    assetId,
    from,
    to,
    baselineSnapshotId: baseline?.id ?? null,
    currentSnapshotId: current?.id ?? null,
    changes,
    summary,
  };
}

/** Diff two arbitrary snapshots of the same asset. */
export async function diffSnapshots(
  store: InventoryStore,
  baselineId: string,
  currentId: string,
  opts: BomDiffOptions = {},
): Promise<ChangeReport> {
  const baseline = await store.getSnapshot(baselineId);
  if (!baseline) throw new NotFound(`Snapshot ${baselineId} not found`);
  const current = await store.getSnapshot(currentId);
  if (!current) throw new NotFound(`Snapshot ${currentId} not found`);
  if (baseline.assetId !== current.assetId) {
    throw new InvalidInput(`Snapshots ${baselineId} and ${currentId} belong to different assets`);
  }

  const { changes, summary } = diffBomItems(baseline.items, current.items, opts);
  return {
    assetId: current.assetId,
    from: baseline.takenAt,
    to: current.takenAt,
    baselineSnapshotId: baseline.id,
    currentSnapshotId: current.id,
    changes,
    summary,
  };
}

/**
 * One step per snapshot in [from, to]; each step diffs the snapshot against
 * its predecessor. The first step's predecessor is the state just before
 * the window, when there is one.
 */
export async function changeTimeline(
  store: InventoryStore,
  assetId: string,
  from: Date,
  to: Date,
  opts: BomDiffOptions = {},
): Promise<TimelineStep[]> {
  if (from.getTime() > to.getTime()) {
    throw new InvalidInput("Timeline start is after its end");
  }
  await requireAsset(store, assetId);

  const window = await store.listSnapshots(assetId, { from, to });
  // Everything at or after `from` is in the window, so the first step's
  // predecessor is the latest snapshot strictly before it.
  let previous: BomSnapshot | null = window.length > 0 ? await store.latestSnapshotBefore(assetId, from) : null;

  const steps: TimelineStep[] = [];
  for (const snapshot of window) {
    const { changes, summary } = diffBomItems(previous?.items ?? [], snapshot.items, opts);
    steps.push({
      fromSnapshotId: previous?.id ?? null,
      toSnapshotId: snapshot.id,
      takenAt: snapshot.takenAt,
      label: snapshot.label,
      changes,
      summary,
    });
    previous = snapshot;
  }
  return steps;
}
