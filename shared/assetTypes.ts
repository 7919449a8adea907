/**
 * Fixed asset-type taxonomy.
 *
 * The set of types is closed. Each type carries a hierarchy rank
 * (lower = higher in the tree), the short code used inside URNs, and
 * whether assets of that type may carry a BOM. Adding a type is a change
 * to this table, not to any type hierarchy.
 */

export const ASSET_TYPES = [
  "Domain / System of Systems",
  "System / Environment",
  "Subsystem / Service",
  "Component / Segment",
  "Configuration Item (CI)",
  "Hardware CI",
  "Software CI",
  "Firmware CI",
] as const;

export type AssetType = (typeof ASSET_TYPES)[number];

export interface AssetTypeDefinition {
  name: AssetType;
  code: string;
  rank: number;
  description: string;
  canHaveBom: boolean;
}

export const ASSET_TYPE_DEFINITIONS: Readonly<Record<AssetType, AssetTypeDefinition>> = {
  "Domain / System of Systems": {
    name: "Domain / System of Systems",
    code: "domain",
    rank: 1,
    description: "Highest level grouping of multiple systems",
    canHaveBom: false,
  },
  "System / Environment": {
    name: "System / Environment",
    code: "sys",
    rank: 2,
    description: "Complete system or environment",
    canHaveBom: true,
  },
  "Subsystem / Service": {
    name: "Subsystem / Service",
    code: "subsys",
    rank: 3,
    description: "Major functional component of a system",
    canHaveBom: true,
  },
  "Component / Segment": {
    name: "Component / Segment",
    code: "comp",
    rank: 4,
    description: "Discrete component or segment",
    canHaveBom: true,
  },
  "Configuration Item (CI)": {
    name: "Configuration Item (CI)",
    code: "ci",
    rank: 5,
    description: "Generic configuration item",
    canHaveBom: true,
  },
  "Hardware CI": {
    name: "Hardware CI",
    code: "hw",
    rank: 6,
    description: "Hardware configuration item",
    canHaveBom: true,
  },
  "Software CI": {
    name: "Software CI",
    code: "sw",
    rank: 6,
    description: "Software configuration item",
    canHaveBom: true,
  },
  "Firmware CI": {
    name: "Firmware CI",
    code: "fw",
    rank: 6,
    description: "Firmware configuration item",
    canHaveBom: true,
  },
};

// Older exports spell the service tier without its suffix.
const ASSET_TYPE_ALIASES: Readonly<Record<string, AssetType>> = {
  subsystem: "Subsystem / Service",
};

const TYPE_NAMES: ReadonlySet<string> = new Set(ASSET_TYPES);

export function isAssetType(value: unknown): value is AssetType {
  return typeof value === "string" && TYPE_NAMES.has(value);
}

/**
 * Match a raw type label against the taxonomy: exact first, then
 * case-insensitive after trimming, then known aliases.
 */
export function parseAssetType(raw: string): AssetType | null {
  if (isAssetType(raw)) return raw;
  const folded = raw.trim().toLowerCase();
  const match = ASSET_TYPES.find((t) => t.toLowerCase() === folded);
  return match ?? ASSET_TYPE_ALIASES[folded] ?? null;
}
