import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CountryCode } from "libphonenumber-js";
import { isSupportedCountry } from "libphonenumber-js";
import { z } from "zod";

export const DEFAULT_BACKUP_ROOTS = ["/Volumes/Backups/iPhone/Active/"];

/**
 * Parse a comma-separated list of backup root directories.
 * Example: "/Volumes/Backups/iPhone/Active/,/mnt/old-phones"
 */
function parseBackupRoots(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Parse `backupId=Device Name` pairs used to label exported photos.
 * Example: "00008101-000A=Anna's iPhone,00008030-001B=Old iPhone"
 */
function parseDeviceNames(raw: string | undefined): Record<string, string> {
  if (!raw) return {};
  const names: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0 || eq === trimmed.length - 1) {
      throw new Error(`Invalid PHOTOS_DEVICE_NAMES entry "${trimmed}": expected backupId=name`);
    }
    names[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
  }
  return names;
}

const regionSchema = z
  .string()
  .toUpperCase()
  .refine((value): value is CountryCode => isSupportedCountry(value), {
    message: "PHONE_REGION must be an ISO 3166-1 alpha-2 region known to libphonenumber",
  });

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Directories whose immediate children are candidate backups. */
  backupRoots: z.array(z.string().min(1)).min(1).default(DEFAULT_BACKUP_ROOTS),
  /** Where extracted JSON is written, one subdirectory per backup. */
  outputDir: z.string().min(1).default("./output"),
  /** Writable scratch area for materialized databases. */
  scratchDir: z.string().min(1).default(join(tmpdir(), "ios-backup-extract")),
  /** Region used to interpret phone numbers written without a country code. */
  phoneRegion: regionSchema.default("US"),

  photos: z
    .object({
      /** Archive that camera-roll photos are copied into. Photo export is skipped when unset. */
      exportRoot: z.string().min(1).optional(),
      /** Backup id → device label used in exported file names. */
      deviceNames: z.record(z.string().min(1)).default({}),
    })
    .default({ deviceNames: {} }),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env.LOG_LEVEL,
    backupRoots: parseBackupRoots(env.BACKUP_ROOTS),
    outputDir: env.OUTPUT_DIR || undefined,
    scratchDir: env.SCRATCH_DIR || undefined,
    phoneRegion: env.PHONE_REGION || undefined,
    photos: {
      exportRoot: env.BACKUP_PHOTOS_ROOT || undefined,
      deviceNames: parseDeviceNames(env.PHOTOS_DEVICE_NAMES),
    },
  });
}
