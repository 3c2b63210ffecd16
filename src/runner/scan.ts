import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { Backup } from "../backup/backup.js";
import { InvalidBackupError } from "../backup/errors.js";
import { logger } from "../config/logger.js";

function candidateDirectories(root: string): string[] {
  return readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => join(root, entry.name))
    .sort();
}

/**
 * Open every immediate subdirectory of the given roots as a backup.
 * Directories that are not backups are skipped; a missing root is logged and
 * skipped. Callers own the returned backups and must close them. On any other
 * error the backups opened so far are closed before it propagates.
 */
export function discoverBackups(roots: readonly string[], scratchRoot: string): Backup[] {
  const backups: Backup[] = [];
  try {
    for (const root of roots) {
      if (!existsSync(root)) {
        logger.warn(`Backup root ${root} does not exist`);
        continue;
      }

      for (const path of candidateDirectories(root)) {
        try {
          backups.push(new Backup(path, { scratchRoot }));
        } catch (err) {
          if (!(err instanceof InvalidBackupError)) throw err;
          logger.info(`Skipping ${path}`, { reason: err.message });
        }
      }
    }
  } catch (err) {
    for (const backup of backups) backup.close();
    throw err;
  }
  return backups;
}
