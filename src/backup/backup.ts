import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { parse as parsePlist } from "simple-plist";
import { logger } from "../config/logger.js";
import { Application } from "./application.js";
import type { BackupInfo, BackupSummary } from "./backup-info.js";
import { backupInfoSchema, installedApplications } from "./backup-info.js";
import { BlobResolver } from "./blob-resolver.js";
import { ApplicationNotFoundError, InvalidBackupError } from "./errors.js";
import type { FileRecord } from "./file-record.js";
import type { FileQuery } from "./identity-index.js";
import { IdentityIndex } from "./identity-index.js";
import { manifestFiles } from "./schema/manifest.js";

export const INFO_PLIST = "Info.plist";
export const MANIFEST_DB = "Manifest.db";

export interface BackupOptions {
  /** Writable directory for materialized databases */
  scratchRoot: string;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readInfo(root: string): BackupInfo {
  const infoPath = join(root, INFO_PLIST);
  if (!existsSync(infoPath)) {
    throw new InvalidBackupError(root, `missing ${INFO_PLIST}`);
  }

  let raw: unknown;
  try {
    raw = parsePlist(readFileSync(infoPath), infoPath);
  } catch (err) {
    throw new InvalidBackupError(root, `unreadable ${INFO_PLIST}: ${reason(err)}`);
  }

  const parsed = backupInfoSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidBackupError(root, `${INFO_PLIST} ${issue ? `${issue.path.join(".")}: ${issue.message}` : "is malformed"}`);
  }
  return parsed.data;
}

/** Open the scratch copy of the manifest and read one row to prove it is a usable catalog. */
function openManifest(root: string, blobs: BlobResolver, backupId: string): Database.Database {
  let sqlite: Database.Database | undefined;
  try {
    sqlite = new Database(blobs.materializePath(backupId, join(root, MANIFEST_DB), MANIFEST_DB));
    drizzle(sqlite).select({ fileId: manifestFiles.fileId }).from(manifestFiles).limit(1).all();
    return sqlite;
  } catch (err) {
    sqlite?.close();
    throw new InvalidBackupError(root, `unreadable ${MANIFEST_DB}: ${reason(err)}`);
  }
}

function isoOrNull(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

/**
 * One device backup directory: Info.plist, Manifest.db and the sharded blob
 * store. Construction validates the directory and opens a scratch copy of
 * the manifest; call {@link close} when done.
 */
export class Backup {
  readonly root: string;
  readonly id: string;
  readonly blobs: BlobResolver;

  private readonly info: BackupInfo;
  private readonly applications: Set<string>;
  private readonly manifest: Database.Database;
  private readonly index: IdentityIndex;

  constructor(root: string, opts: BackupOptions) {
    this.root = root;
    this.info = readInfo(root);
    this.id = this.info["Unique Identifier"];
    this.applications = installedApplications(this.info);

    const manifestPath = join(root, MANIFEST_DB);
    if (!existsSync(manifestPath)) {
      throw new InvalidBackupError(root, `missing ${MANIFEST_DB}`);
    }

    this.blobs = new BlobResolver({ backupRoot: root, scratchRoot: opts.scratchRoot });
    this.manifest = openManifest(root, this.blobs, this.id);
    this.index = new IdentityIndex(this.manifest, this.blobs);

    logger.info(`Backup ready: ${this.id}`, this.summary());
  }

  /** Raw Info.plist value; absent keys yield undefined. */
  get(key: string): unknown {
    return this.info[key];
  }

  summary(): BackupSummary {
    return {
      path: this.root,
      name: this.info["Display Name"] ?? this.info["Device Name"] ?? null,
      guid: this.info.GUID ?? null,
      date: isoOrNull(this.info["Last Backup Date"]),
      number: this.info["Phone Number"] ?? null,
      hardware: this.info["Product Type"] ?? null,
      software: this.info["Product Version"] ?? null,
    };
  }

  get installedApplications(): ReadonlySet<string> {
    return this.applications;
  }

  application(bundleId: string): Application {
    if (!this.applications.has(bundleId)) {
      throw new ApplicationNotFoundError(bundleId, this.id);
    }
    return new Application(this, bundleId);
  }

  file(domain: string, path: string): FileRecord {
    return this.index.lookup(domain, path);
  }

  files(query: FileQuery): IterableIterator<FileRecord> {
    return this.index.query(query);
  }

  domainFiles(domain: string): FileRecord[] {
    return this.index.filesInDomain(domain);
  }

  /**
   * Open a backed-up SQLite file through a local copy scoped to this backup
   * and the file's domain. The caller owns the returned handle.
   */
  openDatabase(file: FileRecord): Database.Database {
    const localPath = this.blobs.materialize(`${this.id}/${file.domain}`, file.contentId, file.relativePath);
    file.rememberLocalCopy(localPath);
    return new Database(localPath);
  }

  close(): void {
    this.manifest.close();
  }
}
