import { createHash } from "node:crypto";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";
import { stringify as stringifyPlist } from "simple-plist";

// Builds real backup directories on disk for tests: an XML Info.plist, a
// Manifest.db with a Files table, and blobs under two-character shards.

type PlistScalar = string | number | boolean | Date | Buffer;
export type PlistInput = PlistScalar | PlistInput[] | { [key: string]: PlistInput };

export interface FixtureFileOptions {
  /** Unix seconds written into the MBFile metadata */
  lastModified?: number;
  /** Overrides the SHA-1 content id */
  contentId?: string;
}

export function contentIdFor(domain: string, path: string): string {
  return createHash("sha1").update(`${domain}-${path}`).digest("hex");
}

export function metadataPlist(lastModified: number, size: number): Buffer {
  return Buffer.from(
    stringifyPlist({
      $version: 100000,
      $archiver: "NSKeyedArchiver",
      $objects: ["$null", { LastModified: lastModified, Birth: lastModified, Size: size, Mode: 33188 }],
    }),
  );
}

export class FixtureBackup {
  readonly root: string;
  readonly scratchRoot: string;
  private readonly workDir: string;
  private readonly manifest: Database.Database;
  private info: { [key: string]: PlistInput };
  private readonly applications: { [bundleId: string]: PlistInput } = {};

  constructor(id = "00008030-TESTDEVICE") {
    this.workDir = mkdtempSync(join(tmpdir(), "backup-fixture-"));
    this.root = join(this.workDir, id);
    this.scratchRoot = join(this.workDir, "scratch");
    mkdirSync(this.root, { recursive: true });

    this.info = {
      "Unique Identifier": id,
      "Display Name": "Test iPhone",
      GUID: "A1B2C3D4",
      "Last Backup Date": new Date("2024-03-01T12:00:00Z"),
      "Product Type": "iPhone14,2",
      "Product Version": "17.3",
    };
    this.writeInfo();

    this.manifest = new Database(join(this.root, "Manifest.db"));
    this.manifest.exec(`
      CREATE TABLE Files (fileID TEXT PRIMARY KEY, domain TEXT, relativePath TEXT, flags INTEGER, file BLOB);
      CREATE INDEX FilesDomainIdx ON Files(domain);
      CREATE INDEX FilesRelativePathIdx ON Files(relativePath);
    `);
  }

  /** Add (or extend) Info.plist keys. */
  setInfo(values: { [key: string]: PlistInput }): this {
    this.info = { ...this.info, ...values };
    this.writeInfo();
    return this;
  }

  installApplication(bundleId: string): this {
    this.applications[bundleId] = { CFBundleIdentifier: bundleId };
    this.writeInfo();
    return this;
  }

  /** Store a blob and register it in the manifest. Returns the content id. */
  addFile(domain: string, path: string, content: Buffer | string, opts: FixtureFileOptions = {}): string {
    const contentId = opts.contentId ?? contentIdFor(domain, path);
    const data = typeof content === "string" ? Buffer.from(content) : content;
    const blobPath = join(this.root, contentId.slice(0, 2), contentId);
    mkdirSync(dirname(blobPath), { recursive: true });
    writeFileSync(blobPath, data);
    this.addManifestRow(contentId, domain, path, metadataPlist(opts.lastModified ?? 1_700_000_000, data.length));
    return contentId;
  }

  /** Manifest row only, for rows that should not have a blob. */
  addManifestRow(contentId: string, domain: string, path: string, metadata: Buffer | null): void {
    this.manifest
      .prepare("INSERT INTO Files (fileID, domain, relativePath, flags, file) VALUES (?, ?, ?, 1, ?)")
      .run(contentId, domain, path, metadata);
  }

  /** Build a SQLite database with `build`, then store it as a blob. */
  addDatabase(domain: string, path: string, build: (db: Database.Database) => void): string {
    const scratch = join(this.workDir, "build", contentIdFor(domain, path));
    mkdirSync(dirname(scratch), { recursive: true });
    const db = new Database(scratch);
    try {
      build(db);
    } finally {
      db.close();
    }
    return this.addFile(domain, path, readFileSync(scratch));
  }

  /** Close the manifest so a Backup can copy it. No rows can be added afterwards. */
  finish(): this {
    if (this.manifest.open) this.manifest.close();
    return this;
  }

  cleanup(): void {
    if (this.manifest.open) this.manifest.close();
    rmSync(this.workDir, { recursive: true, force: true });
  }

  private writeInfo(): void {
    writeFileSync(join(this.root, "Info.plist"), stringifyPlist({ ...this.info, Applications: this.applications }));
  }
}
