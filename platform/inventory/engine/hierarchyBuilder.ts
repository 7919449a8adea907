import type {
  AssetRecord,
  AssetRecordInput,
  IngestionOutcome,
  IngestionReport,
  RawAssetRecord,
} from "../model";
import type { InventoryStore } from "../store";
import {
  AmbiguousParent,
  CyclicHierarchy,
  InvalidInput,
  InventoryError,
  OrphanAsset,
  toErrorInfo,
} from "../service/errors";
import { assertValidHierarchy } from "./taxonomy";
import { ancestorNamesOf, findPersistedParent, resolveIdentity } from "./identity";
import { describeRawRecord, normalizeRecord } from "./recordNormalizer";

export interface BuilderOptions {
  urnPrefix: string;
  defaultExternalSystem: string;
  now: () => Date;
}

export type AssetWrite = {
  kind: "created" | "updated";
  asset: AssetRecord;
};

export interface BatchResult {
  report: IngestionReport;
  writes: AssetWrite[];
}

type Entry = {
  index: number;
  record: AssetRecordInput | null;
  outcome: IngestionOutcome | null;
  /** Same-batch parent, by entry index. */
  batchParent?: number;
  persistedParent?: AssetRecord;
};

function failed(entry: Entry, name: string | null, parentName: string | null, err: unknown): IngestionOutcome {
  return { index: entry.index, name, parentName, status: "failed", error: toErrorInfo(err) };
}

function failEntry(entry: Entry, err: unknown): void {
  entry.outcome = failed(entry, entry.record?.name ?? null, entry.record?.parentName ?? null, err);
}

function isLive(entry: Entry): entry is Entry & { record: AssetRecordInput } {
  return entry.record !== null && entry.outcome === null;
}

function compareRecords(a: AssetRecordInput, b: AssetRecordInput): number {
  return a.name.localeCompare(b.name) || (a.parentName ?? "").localeCompare(b.parentName ?? "");
}

/**
 * Pass 1: normalize and index the batch.
 * Records sharing a (parentName, name) key all fail: which one wins
 * would otherwise depend on arrival order.
 */
function indexBatch(batch: readonly RawAssetRecord[]): { entries: Entry[]; byName: Map<string, number[]> } {
  const entries: Entry[] = batch.map((raw, index) => {
    const entry: Entry = { index, record: null, outcome: null };
    try {
      entry.record = normalizeRecord(raw);
    } catch (err) {
      if (!(err instanceof InventoryError)) throw err;
      const { name, parentName } = describeRawRecord(raw);
      entry.outcome = failed(entry, name, parentName, err);
    }
    return entry;
  });

  const byKey = new Map<string, number[]>();
  const byName = new Map<string, number[]>();
  for (const entry of entries) {
    // A record that failed normalization still claims its name, so its
    // children fail as orphans instead of attaching to a persisted namesake.
    const name = entry.record?.name ?? entry.outcome?.name ?? null;
    if (name !== null) byName.set(name, [...(byName.get(name) ?? []), entry.index]);
    if (!entry.record) continue;
    const key = JSON.stringify([entry.record.parentName, entry.record.name]);
    byKey.set(key, [...(byKey.get(key) ?? []), entry.index]);
  }

  for (const indexes of byKey.values()) {
    if (indexes.length < 2) continue;
    for (const i of indexes) {
      const entry = entries[i];
      failEntry(
        entry,
        new InvalidInput(
          `Record "${entry.record?.name}" under "${entry.record?.parentName ?? "<root>"}" appears ${indexes.length} times in the batch`,
        ),
      );
    }
  }

  return { entries, byName };
}

/**
 * Pass 2: link each record to its parent, preferring a definition in the
 * batch over persisted rows.
 */
async function linkParents(
  store: InventoryStore,
  entries: Entry[],
  byName: Map<string, number[]>,
): Promise<void> {
  for (const entry of entries) {
    if (!isLive(entry) || entry.record.parentName === null) continue;
    const parentName = entry.record.parentName;
    const candidates = byName.get(parentName) ?? [];

    if (candidates.length > 1) {
      failEntry(entry, new AmbiguousParent(parentName, candidates.length));
    } else if (candidates.length === 1) {
      entry.batchParent = candidates[0];
    } else {
      try {
        entry.persistedParent = await findPersistedParent(store, parentName);
      } catch (err) {
        if (!(err instanceof InventoryError)) throw err;
        failEntry(entry, err);
      }
    }
  }
}

/**
 * Every record has at most one parent, so a cycle is found by walking
 * parent links with in-progress / done marking.
 */
function assertAcyclic(entries: Entry[]): void {
  const state = new Map<number, "visiting" | "done">();

  for (const start of entries) {
    if (!isLive(start) || state.has(start.index)) continue;

    const path: number[] = [];
    let current: number | undefined = start.index;
    while (current !== undefined && !state.has(current)) {
      state.set(current, "visiting");
      path.push(current);
      const entry: Entry = entries[current];
      current = isLive(entry) ? entry.batchParent : undefined;
    }

    if (current !== undefined && state.get(current) === "visiting") {
      const loop = path.slice(path.indexOf(current)).map((i) => entries[i].record?.name ?? `#${i}`);
      const pivot = loop.indexOf([...loop].sort()[0]);
      throw new CyclicHierarchy([...loop.slice(pivot), ...loop.slice(0, pivot), loop[pivot]]);
    }

    for (const i of path) state.set(i, "done");
  }
}

/**
 * Topological levels: parents always land in an earlier level than their
 * children. Each level is sorted by (name, parentName).
 */
function orderLevels(entries: Entry[]): number[][] {
  const children = new Map<number, number[]>();
  const first: number[] = [];

  for (const entry of entries) {
    if (!isLive(entry)) continue;
    const parent = entry.batchParent !== undefined ? entries[entry.batchParent] : undefined;
    if (parent && isLive(parent)) {
      children.set(parent.index, [...(children.get(parent.index) ?? []), entry.index]);
    } else {
      first.push(entry.index);
    }
  }

  const sortLevel = (level: number[]) =>
    level.sort((a, b) => {
      const ra = entries[a].record;
      const rb = entries[b].record;
      return ra && rb ? compareRecords(ra, rb) : a - b;
    });

  const levels: number[][] = [];
  let level = sortLevel(first);
  while (level.length > 0) {
    levels.push(level);
    level = sortLevel(level.flatMap((i) => children.get(i) ?? []));
  }
  return levels;
}

function buildAsset(
  record: AssetRecordInput,
  parent: AssetRecord | null,
  assetId: string,
  urn: string,
  options: BuilderOptions,
): AssetRecord {
  const now = options.now();
  return {
    id: assetId,
    urn,
    name: record.name,
    assetType: record.assetType,
    parentId: parent?.id ?? null,
    status: record.status ?? "active",
    description: record.description ?? null,
    version: record.version ?? null,
    externalId: record.externalId ?? null,
    externalSystem: record.externalSystem ?? options.defaultExternalSystem,
    properties: record.properties ?? {},
    tags: record.tags ?? [],
    lifecycleStage: record.lifecycleStage ?? null,
    createdAt: now,
    updatedAt: now,
  };
}

function mergeAsset(existing: AssetRecord, record: AssetRecordInput, options: BuilderOptions): AssetRecord {
  return {
    ...existing,
    status: record.status ?? existing.status,
    description: record.description ?? existing.description,
    version: record.version ?? existing.version,
    externalId: record.externalId ?? existing.externalId,
    externalSystem: record.externalSystem ?? existing.externalSystem,
    properties: record.properties ?? existing.properties,
    tags: record.tags ?? existing.tags,
    lifecycleStage: record.lifecycleStage ?? existing.lifecycleStage,
    updatedAt: options.now(),
  };
}

/**
 * Resolve a batch of raw records into the asset tree.
 *
 * Runs against the caller's transactional store view. Per-record failures
 * land in the report; a parent cycle throws CyclicHierarchy so the caller
 * can discard the whole unit of work.
 */
export async function ingestBatch(
  store: InventoryStore,
  batch: readonly RawAssetRecord[],
  batchId: string,
  options: BuilderOptions,
): Promise<BatchResult> {
  const { entries, byName } = indexBatch(batch);
  await linkParents(store, entries, byName);
  assertAcyclic(entries);

  const resolved = new Map<number, { asset: AssetRecord; path: string[] }>();
  const persistedPaths = new Map<string, string[]>();
  const writes: AssetWrite[] = [];

  for (const level of orderLevels(entries)) {
    for (const i of level) {
      const entry = entries[i];
      if (!isLive(entry)) continue;
      const record = entry.record;

      try {
        let parent: AssetRecord | null = null;
        let ancestors: string[] = [];

        if (entry.batchParent !== undefined) {
          const parentEntry = entries[entry.batchParent];
          const parentResult = resolved.get(entry.batchParent);
          if (!parentResult) {
            const reason = parentEntry.outcome?.error?.message ?? "not resolved";
            throw new OrphanAsset(
              record.parentName ?? "",
              `Parent asset "${record.parentName}" could not be resolved: ${reason}`,
            );
          }
          parent = parentResult.asset;
          ancestors = parentResult.path;
        } else if (entry.persistedParent) {
          parent = entry.persistedParent;
          let path = persistedPaths.get(parent.id);
          if (!path) {
            path = [...(await ancestorNamesOf(store, parent)), parent.name];
            persistedPaths.set(parent.id, path);
          }
          ancestors = path;
        }

        if (parent) assertValidHierarchy(parent.assetType, record.assetType);

        const identity = await resolveIdentity(store, record, parent, ancestors, options.urnPrefix);
        let asset: AssetRecord;
        if (identity.kind === "update") {
          asset = await store.updateAsset(mergeAsset(identity.existing, record, options));
          writes.push({ kind: "updated", asset });
        } else {
          asset = await store.insertAsset(buildAsset(record, parent, identity.assetId, identity.urn, options));
          writes.push({ kind: "created", asset });
        }

        resolved.set(i, { asset, path: [...ancestors, asset.name] });
        entry.outcome = {
          index: i,
          name: record.name,
          parentName: record.parentName,
          status: identity.kind === "update" ? "updated" : "created",
          assetId: asset.id,
          urn: asset.urn,
        };
      } catch (err) {
        if (!(err instanceof InventoryError)) throw err;
        failEntry(entry, err);
      }
    }
  }

  const outcomes = entries.map(
    (entry) => entry.outcome ?? failed(entry, entry.record?.name ?? null, entry.record?.parentName ?? null, new InvalidInput("Record was not processed")),
  );

  return {
    report: {
      batchId,
      total: batch.length,
      created: outcomes.filter((o) => o.status === "created"),
      updated: outcomes.filter((o) => o.status === "updated"),
      failed: outcomes.filter((o) => o.status === "failed"),
    },
    writes,
  };
}
