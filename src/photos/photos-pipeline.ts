import { copyFile, mkdir, readdir, stat, utimes } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { Backup } from "../backup/backup.js";
import { PhotosNotConfiguredError } from "../backup/errors.js";
import { logger } from "../config/logger.js";
import type { Pipeline } from "../runner/types.js";

export const CAMERA_ROLL_DOMAIN = "CameraRollDomain";
export const CAMERA_ROLL_PATTERN = "Media/DCIM/%";
export const PHOTO_EXTENSIONS: ReadonlySet<string> = new Set(["HEIC", "JPG", "JPEG", "PNG", "GIF", "MOV", "MP4"]);

export interface PhotoExport {
  relativePath: string;
  /** Blob inside the backup */
  source: string;
  /** Target inside the archive */
  destination: string;
  modifiedAt: string;
}

export interface PhotosOptions {
  /** Archive root; photo export is not configured when unset */
  exportRoot?: string;
  /** Backup id → label placed in exported file names */
  deviceNames: Record<string, string>;
}

/** Newest modification time of any non-hidden file below `root`, or null when there is none. */
export async function newestModification(root: string): Promise<Date | null> {
  let newest: Date | null = null;
  let entries;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const path = join(root, entry.name);
    let candidate: Date | null = null;
    if (entry.isDirectory()) {
      candidate = await newestModification(path);
    } else if (entry.isFile()) {
      candidate = (await stat(path)).mtime;
    }
    if (candidate && (!newest || candidate > newest)) newest = candidate;
  }
  return newest;
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot + 1).toUpperCase();
}

/**
 * Camera roll files modified at or after `since`, with their archive
 * destination `<root>/<year>/<YYYY-MM-DD> <device> <file name>` (UTC).
 */
export function planPhotoExport(
  backup: Backup,
  opts: { exportRoot: string; deviceName: string; since: Date | null },
): PhotoExport[] {
  const plan: PhotoExport[] = [];
  for (const photo of backup.files({ domain: CAMERA_ROLL_DOMAIN, path: CAMERA_ROLL_PATTERN })) {
    const modified = photo.metadata().lastModified;
    if (opts.since && modified < opts.since) continue;

    if (!PHOTO_EXTENSIONS.has(extensionOf(photo.fileName))) {
      logger.debug(`Skipping ${photo.relativePath} by extension`);
      continue;
    }

    const day = modified.toISOString().slice(0, 10);
    plan.push({
      relativePath: photo.relativePath,
      source: photo.physicalPath,
      destination: join(
        opts.exportRoot,
        String(modified.getUTCFullYear()),
        `${day} ${opts.deviceName} ${photo.fileName}`,
      ),
      modifiedAt: modified.toISOString(),
    });
  }
  return plan;
}

/** Copy planned photos, keeping each file's modification time. */
export async function exportPhotos(plan: readonly PhotoExport[]): Promise<void> {
  for (const item of plan) {
    await mkdir(dirname(item.destination), { recursive: true });
    await copyFile(item.source, item.destination);
    const modified = new Date(item.modifiedAt);
    await utimes(item.destination, modified, modified);
    logger.info(`Exported ${item.relativePath}`, { destination: item.destination });
  }
}

export function createPhotosPipeline(opts: PhotosOptions): Pipeline {
  return {
    name: "photos",
    async run({ backup, output }) {
      if (!opts.exportRoot) {
        throw new PhotosNotConfiguredError("BACKUP_PHOTOS_ROOT is not set");
      }
      const deviceName = opts.deviceNames[backup.id];
      if (!deviceName) {
        throw new PhotosNotConfiguredError(`add ${backup.id} to PHOTOS_DEVICE_NAMES`);
      }

      const since = await newestModification(opts.exportRoot);
      const plan = planPhotoExport(backup, { exportRoot: opts.exportRoot, deviceName, since });
      await exportPhotos(plan);
      await output.writeRecords("photos/exported.json", plan);
      logger.info(`Exported ${plan.length} photos`, { backup: backup.id, since: since?.toISOString() ?? null });
    },
  };
}
