import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  URN_PREFIX: z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9.+-]*(:[A-Za-z0-9.+-]+)*$/, "must look like scheme:namespace")
    .default("urn:asset"),
  DEFAULT_EXTERNAL_SYSTEM: z.string().min(1).default("OTOBO"),
  CHANGE_REPORT_INCLUDE_UNCHANGED: booleanFlag.default("false"),
  RECENT_SNAPSHOT_DAYS: z.coerce.number().int().positive().default(7),
});

export type InventoryConfig = Readonly<{
  databaseUrl?: string;
  urnPrefix: string;
  defaultExternalSystem: string;
  includeUnchangedByDefault: boolean;
  recentSnapshotDays: number;
}>;

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }
  return cleaned;
}

/**
 * Parse inventory settings from the environment. Callers load .env first.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  return Object.freeze({
    databaseUrl: e.DATABASE_URL,
    urnPrefix: e.URN_PREFIX,
    defaultExternalSystem: e.DEFAULT_EXTERNAL_SYSTEM,
    includeUnchangedByDefault: e.CHANGE_REPORT_INCLUDE_UNCHANGED,
    recentSnapshotDays: e.RECENT_SNAPSHOT_DAYS,
  });
}
