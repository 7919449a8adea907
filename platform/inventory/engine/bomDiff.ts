import type {
  BomItem,
  ChangeRecord,
  ChangeSummary,
  DiffedField,
  FieldChange,
} from "../model";

export interface BomDiffOptions {
  includeUnchanged?: boolean;
}

export interface BomDiffResult {
  changes: ChangeRecord[];
  /** Counts every classification, whether or not Unchanged rows are listed. */
  summary: ChangeSummary;
}

/** Display form of an identity key. */
export function itemKey(item: Pick<BomItem, "componentRef" | "position">): string {
  return item.position ? `${item.componentRef}#${item.position}` : item.componentRef;
}

/** Collision-free map key for (componentRef, position). */
export function identityKey(item: Pick<BomItem, "componentRef" | "position">): string {
  return JSON.stringify([item.componentRef, item.position ?? null]);
}

/**
 * JSON with object keys sorted at every depth, so two property bags
 * compare equal regardless of key order.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function compareFields(before: BomItem, after: BomItem): FieldChange[] {
  const changes: FieldChange[] = [];
  const push = (field: DiffedField, b: unknown, a: unknown) => changes.push({ field, before: b, after: a });

  if (before.quantity !== after.quantity) push("quantity", before.quantity, after.quantity);
  if ((before.version ?? null) !== (after.version ?? null)) {
    push("version", before.version ?? null, after.version ?? null);
  }
  if (canonicalJson(before.properties) !== canonicalJson(after.properties)) {
    push("properties", before.properties, after.properties);
  }
  return changes;
}

/**
 * Net diff between two item sets keyed by identity.
 *
 * Pure function. Results are sorted by display key for deterministic
 * ordering. Unchanged rows are left out unless requested.
 */
export function diffBomItems(
  baseline: readonly BomItem[],
  current: readonly BomItem[],
  opts: BomDiffOptions = {},
): BomDiffResult {
  const beforeByKey = new Map(baseline.map((item) => [identityKey(item), item]));
  const afterByKey = new Map(current.map((item) => [identityKey(item), item]));

  const all: ChangeRecord[] = [];

  for (const [key, after] of afterByKey) {
    const before = beforeByKey.get(key);
    const base = { key: itemKey(after), componentRef: after.componentRef, position: after.position };
    if (!before) {
      all.push({ classification: "Added", ...base, after });
      continue;
    }
    const changes = compareFields(before, after);
    all.push(
      changes.length > 0
        ? { classification: "Modified", ...base, changes, before, after }
        : { classification: "Unchanged", ...base, before, after },
    );
  }

  for (const [key, before] of beforeByKey) {
    if (afterByKey.has(key)) continue;
    all.push({
      classification: "Removed",
      key: itemKey(before),
      componentRef: before.componentRef,
      position: before.position,
      before,
    });
  }

  all.sort((a, b) => a.key.localeCompare(b.key) || a.classification.localeCompare(b.classification));

  const summary: ChangeSummary = { added: 0, removed: 0, modified: 0, unchanged: 0 };
  for (const change of all) {
    if (change.classification === "Added") summary.added += 1;
    else if (change.classification === "Removed") summary.removed += 1;
    else if (change.classification === "Modified") summary.modified += 1;
    else summary.unchanged += 1;
  }

  return {
    changes: opts.includeUnchanged ? all : all.filter((c) => c.classification !== "Unchanged"),
    summary,
  };
}
