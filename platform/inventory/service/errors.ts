export class InventoryError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "InventoryError";
    this.code = code;
  }
}

export class InvalidHierarchy extends InventoryError {
  constructor(message: string) {
    super("INVALID_HIERARCHY", message);
    this.name = "InvalidHierarchy";
  }
}

export class OrphanAsset extends InventoryError {
  public readonly missingParent: string;

  constructor(missingParent: string, message?: string) {
    super("ORPHAN_ASSET", message ?? `Parent asset "${missingParent}" was not found`);
    this.name = "OrphanAsset";
    this.missingParent = missingParent;
  }
}

export class CyclicHierarchy extends InventoryError {
  public readonly members: string[];

  constructor(members: string[]) {
    super("CYCLIC_HIERARCHY", `Cyclic parent references in batch: ${members.join(" -> ")}`);
    this.name = "CyclicHierarchy";
    this.members = members;
  }
}

export class AmbiguousParent extends InventoryError {
  constructor(parentName: string, matches: number) {
    super("AMBIGUOUS_PARENT", `Parent name "${parentName}" matches ${matches} assets`);
    this.name = "AmbiguousParent";
  }
}

export class DuplicateBomItem extends InventoryError {
  constructor(key: string) {
    super("DUPLICATE_BOM_ITEM", `BOM item "${key}" appears more than once in the snapshot`);
    this.name = "DuplicateBomItem";
  }
}

export class NonMonotonicSnapshot extends InventoryError {
  constructor(assetId: string, takenAt: Date, latest: Date) {
    super(
      "NON_MONOTONIC_SNAPSHOT",
      `Snapshot for asset ${assetId} at ${takenAt.toISOString()} is not after latest snapshot at ${latest.toISOString()}`,
    );
    this.name = "NonMonotonicSnapshot";
  }
}

export class NotFound extends InventoryError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFound";
  }
}

export class InvalidInput extends InventoryError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInput";
  }
}

export class InventoryConflict extends InventoryError {
  constructor(message: string) {
    super("CONFLICT", message);
    this.name = "InventoryConflict";
  }
}

export function toErrorInfo(err: unknown): { code: string; message: string } {
  if (err instanceof InventoryError) return { code: err.code, message: err.message };
  return { code: "INTERNAL", message: err instanceof Error ? err.message : String(err) };
}
