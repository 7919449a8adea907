import { z } from "zod";
import { parseAssetType } from "@shared/assetTypes";
import type { AssetRecordInput, RawAssetRecord } from "../model";
import { InvalidInput } from "../service/errors";

/**
 * Boundary between import adapters and the builder: turns one decoded
 * row (CSV, JSON or XML, snake_case or camelCase keys) into an
 * AssetRecordInput. Empty strings count as absent.
 */

const FIELD_ALIASES = {
  name: ["name"],
  assetType: ["asset_type", "assetType", "type"],
  parentName: ["parent_name", "parentName", "parent"],
  status: ["status"],
  description: ["description"],
  version: ["version"],
  externalId: ["external_id", "externalId"],
  externalSystem: ["external_system", "externalSystem"],
  properties: ["properties"],
  tags: ["tags"],
  lifecycleStage: ["lifecycle_stage", "lifecycleStage"],
} as const;

function blankToUndefined(value: unknown): unknown {
  if (value == null) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

const text = z.preprocess(
  blankToUndefined,
  z.union([z.string(), z.number()]).transform((v) => String(v).trim()).optional(),
);

const tags = z.preprocess(
  (value) => {
    const v = blankToUndefined(value);
    return typeof v === "string" ? v.split(",") : v;
  },
  z
    .array(z.union([z.string(), z.number()]))
    .transform((list) =>
      Array.from(new Set(list.map((t) => String(t).trim()).filter((t) => t.length > 0))).sort(),
    )
    .optional(),
);

const properties = z.preprocess(
  (value) => {
    const v = blankToUndefined(value);
    if (typeof v !== "string") return v;
    try {
      return JSON.parse(v);
    } catch {
      return v; // left for the record schema to reject
    }
  },
  z.record(z.string(), z.unknown()).optional(),
);

const rawRecordSchema = z.object({
  name: text.pipe(z.string({ required_error: "required" })),
  assetType: text.pipe(z.string({ required_error: "required" })),
  parentName: text,
  status: z.preprocess(blankToUndefined, z.enum(["active", "inactive", "deprecated"]).optional()),
  description: text,
  version: text,
  externalId: text,
  externalSystem: text,
  properties,
  tags,
  lifecycleStage: text,
});

function pick(raw: RawAssetRecord, aliases: readonly string[]): unknown {
  const key = aliases.find((alias) => raw[alias] !== undefined);
  return key === undefined ? undefined : raw[key];
}

function pickFields(raw: RawAssetRecord) {
  return {
    name: pick(raw, FIELD_ALIASES.name),
    assetType: pick(raw, FIELD_ALIASES.assetType),
    parentName: pick(raw, FIELD_ALIASES.parentName),
    status: pick(raw, FIELD_ALIASES.status),
    description: pick(raw, FIELD_ALIASES.description),
    version: pick(raw, FIELD_ALIASES.version),
    externalId: pick(raw, FIELD_ALIASES.externalId),
    externalSystem: pick(raw, FIELD_ALIASES.externalSystem),
    properties: pick(raw, FIELD_ALIASES.properties),
    tags: pick(raw, FIELD_ALIASES.tags),
    lifecycleStage: pick(raw, FIELD_ALIASES.lifecycleStage),
  };
}

/** Best-effort name/parent for reporting a record that fails normalization. */
export function describeRawRecord(raw: RawAssetRecord): { name: string | null; parentName: string | null } {
  const picked = pickFields(raw);
  const name = text.safeParse(picked.name);
  const parent = text.safeParse(picked.parentName);
  return {
    name: name.success ? name.data ?? null : null,
    parentName: parent.success ? parent.data ?? null : null,
  };
}

export function normalizeRecord(raw: RawAssetRecord): AssetRecordInput {
  const parsed = rawRecordSchema.safeParse(pickFields(raw));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new InvalidInput(`Invalid asset record: ${detail}`);
  }

  const { assetType: rawType, parentName, ...rest } = parsed.data;
  const assetType = parseAssetType(rawType);
  if (!assetType) {
    throw new InvalidInput(`Unknown asset type: ${rawType}`);
  }

  const record: AssetRecordInput = { name: rest.name, assetType, parentName: parentName ?? null };
  if (rest.status !== undefined) record.status = rest.status;
  if (rest.description !== undefined) record.description = rest.description;
  if (rest.version !== undefined) record.version = rest.version;
  if (rest.externalId !== undefined) record.externalId = rest.externalId;
  if (rest.externalSystem !== undefined) record.externalSystem = rest.externalSystem;
  if (rest.properties !== undefined) record.properties = rest.properties;
  if (rest.tags !== undefined) record.tags = rest.tags;
  if (rest.lifecycleStage !== undefined) record.lifecycleStage = rest.lifecycleStage;
  return record;
}
