import { parse as parsePlist } from "simple-plist";
import { z } from "zod";
import { BackupError } from "./errors.js";

/**
 * Attributes of an MBFile entry. The manifest stores it as an
 * NSKeyedArchiver plist whose root object sits at `$objects[1]`.
 */
const mbFileSchema = z.object({
  LastModified: z.number(),
  Birth: z.number().optional(),
  Size: z.number().optional(),
  Mode: z.number().optional(),
});

const keyedArchiveSchema = z.object({
  $objects: z.array(z.unknown()).min(2),
});

export interface FileMetadata {
  lastModified: Date;
  birth: Date | null;
  size: number | null;
  mode: number | null;
}

function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function decodeFileMetadata(blob: Buffer): FileMetadata {
  let archive: unknown;
  try {
    archive = parsePlist(blob, "file metadata");
  } catch (err) {
    throw new BackupError(`Unreadable file metadata: ${err instanceof Error ? err.message : String(err)}`);
  }
  const root = mbFileSchema.parse(keyedArchiveSchema.parse(archive).$objects[1]);
  return {
    lastModified: fromUnixSeconds(root.LastModified),
    birth: root.Birth === undefined ? null : fromUnixSeconds(root.Birth),
    size: root.Size ?? null,
    mode: root.Mode ?? null,
  };
}

export interface FileRecordInit {
  domain: string;
  relativePath: string;
  contentId: string;
  physicalPath: string;
  /** Returns the raw metadata column; called at most once. */
  loadMetadata: () => Buffer;
}

/** One logical file of a backup, addressed by (domain, relativePath). */
export class FileRecord {
  readonly domain: string;
  readonly relativePath: string;
  readonly contentId: string;
  /** Location of the blob inside the backup directory */
  readonly physicalPath: string;

  private readonly loadMetadata: () => Buffer;
  private cachedMetadata: FileMetadata | null = null;
  private local: string | null = null;

  constructor(init: FileRecordInit) {
    this.domain = init.domain;
    this.relativePath = init.relativePath;
    this.contentId = init.contentId;
    this.physicalPath = init.physicalPath;
    this.loadMetadata = init.loadMetadata;
  }

  metadata(): FileMetadata {
    if (!this.cachedMetadata) {
      this.cachedMetadata = decodeFileMetadata(this.loadMetadata());
    }
    return this.cachedMetadata;
  }

  /** Path of the writable local copy, once the file has been opened as a database. */
  get localPath(): string | null {
    return this.local;
  }

  rememberLocalCopy(path: string): void {
    this.local = path;
  }

  /** Last path segment, e.g. "IMG_0001.HEIC". */
  get fileName(): string {
    const slash = this.relativePath.lastIndexOf("/");
    return slash === -1 ? this.relativePath : this.relativePath.slice(slash + 1);
  }
}
