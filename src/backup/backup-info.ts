import { z } from "zod";

/**
 * The keys of Info.plist this project reads. Everything else is still
 * reachable through {@link Backup.get}; key sets differ between iOS releases,
 * so only the unique identifier is required.
 */
export const backupInfoSchema = z
  .object({
    "Unique Identifier": z.string().min(1),
    "Display Name": z.string().optional(),
    "Device Name": z.string().optional(),
    GUID: z.string().optional(),
    "Last Backup Date": z.date().optional(),
    "Phone Number": z.string().optional(),
    "Product Type": z.string().optional(),
    "Product Version": z.string().optional(),
    /** bundle id → per-app info (iTunes / Finder backups) */
    Applications: z.record(z.unknown()).optional(),
    "Installed Applications": z.array(z.string()).optional(),
  })
  .passthrough();

export type BackupInfo = z.infer<typeof backupInfoSchema>;

/** Display fields logged when a backup is opened. */
export interface BackupSummary {
  path: string;
  name: string | null;
  guid: string | null;
  date: string | null;
  number: string | null;
  hardware: string | null;
  software: string | null;
}

export function installedApplications(info: BackupInfo): Set<string> {
  return new Set([...Object.keys(info.Applications ?? {}), ...(info["Installed Applications"] ?? [])]);
}
