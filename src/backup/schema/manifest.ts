import { blob, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * The `Files` table of a backup's Manifest.db.
 * One row per backed-up file; `fileID` doubles as the blob's storage name.
 */
export const manifestFiles = sqliteTable("Files", {
  /** SHA-1 of "<domain>-<relativePath>", hex encoded */
  fileId: text("fileID").primaryKey(),
  /** Namespace, e.g. "HomeDomain" or "AppDomain-com.example.app" */
  domain: text("domain").notNull(),
  relativePath: text("relativePath").notNull(),
  /** 1 = file, 2 = directory, 4 = symlink */
  flags: integer("flags"),
  /** NSKeyedArchiver plist describing the file (MBFile) */
  file: blob("file", { mode: "buffer" }),
});
