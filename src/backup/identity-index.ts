import type Database from "better-sqlite3";
import type { SQL } from "drizzle-orm";
import { and, eq, like } from "drizzle-orm";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { SQLiteColumn } from "drizzle-orm/sqlite-core";
import { z } from "zod";
import type { BlobResolver } from "./blob-resolver.js";
import { AmbiguousFileError, EmptyFileQueryError, FileNotFoundError } from "./errors.js";
import { FileRecord } from "./file-record.js";
import { manifestFiles } from "./schema/manifest.js";

export interface FileQuery {
  /** Exact domain, or a LIKE pattern when it contains `%` */
  domain?: string;
  /** Exact relative path, or a LIKE pattern when it contains `%` */
  path?: string;
}

/** Shape of a row streamed straight from better-sqlite3 by {@link IdentityIndex.query}. */
const streamedRowSchema = z.object({
  fileID: z.string(),
  domain: z.string(),
  relativePath: z.string(),
  file: z.instanceof(Buffer).nullable(),
});

function matchPattern(column: SQLiteColumn, pattern: string): SQL {
  return pattern.includes("%") ? like(column, pattern) : eq(column, pattern);
}

/**
 * (domain, relativePath) → content id lookups over the manifest catalog.
 * Read-only; never mutates the connection it is given.
 */
export class IdentityIndex {
  private readonly db: BetterSQLite3Database;

  constructor(
    private readonly sqlite: Database.Database,
    private readonly blobs: BlobResolver,
  ) {
    this.db = drizzle(sqlite);
  }

  /** Exactly one row must match; zero or several is an error. */
  lookup(domain: string, path: string): FileRecord {
    const rows = this.db
      .select({ fileId: manifestFiles.fileId })
      .from(manifestFiles)
      .where(and(eq(manifestFiles.domain, domain), eq(manifestFiles.relativePath, path)))
      .all();

    if (rows.length === 0) throw new FileNotFoundError(domain, path);
    if (rows.length > 1) throw new AmbiguousFileError(domain, path, rows.length);

    const contentId = rows[0].fileId;
    return this.record(domain, path, contentId, () => this.metadataBlob(contentId));
  }

  /**
   * Lazily stream files matching the filter. The iterator holds the manifest
   * connection busy until it is exhausted or returned, so each record carries
   * its own metadata blob.
   */
  query(filter: FileQuery): IterableIterator<FileRecord> {
    const conditions: SQL[] = [];
    if (filter.domain) conditions.push(matchPattern(manifestFiles.domain, filter.domain));
    if (filter.path) conditions.push(matchPattern(manifestFiles.relativePath, filter.path));
    if (conditions.length === 0) throw new EmptyFileQueryError();

    const { sql, params } = this.db
      .select({
        fileId: manifestFiles.fileId,
        domain: manifestFiles.domain,
        relativePath: manifestFiles.relativePath,
        file: manifestFiles.file,
      })
      .from(manifestFiles)
      .where(and(...conditions))
      .toSQL();

    return this.stream(this.sqlite.prepare(sql).iterate(...params));
  }

  /** Every file of one domain, fetched eagerly. */
  filesInDomain(domain: string): FileRecord[] {
    return this.db
      .select({
        fileId: manifestFiles.fileId,
        relativePath: manifestFiles.relativePath,
        file: manifestFiles.file,
      })
      .from(manifestFiles)
      .where(eq(manifestFiles.domain, domain))
      .all()
      .map((row) => this.record(domain, row.relativePath, row.fileId, () => this.requireBlob(row.file, row.fileId)));
  }

  /** Raw NSKeyedArchiver metadata for a content id. */
  metadataBlob(contentId: string): Buffer {
    const rows = this.db
      .select({ domain: manifestFiles.domain, relativePath: manifestFiles.relativePath, file: manifestFiles.file })
      .from(manifestFiles)
      .where(eq(manifestFiles.fileId, contentId))
      .all();
    if (rows.length !== 1) {
      throw new FileNotFoundError("", contentId, `Could not load metadata for content id ${contentId}`);
    }
    return this.requireBlob(rows[0].file, contentId);
  }

  private *stream(rows: IterableIterator<unknown>): Generator<FileRecord, void, undefined> {
    for (const raw of rows) {
      const row = streamedRowSchema.parse(raw);
      yield this.record(row.domain, row.relativePath, row.fileID, () => this.requireBlob(row.file, row.fileID));
    }
  }

  private requireBlob(blob: Buffer | null, contentId: string): Buffer {
    if (!blob) {
      throw new FileNotFoundError("", contentId, `No metadata recorded for content id ${contentId}`);
    }
    return blob;
  }

  private record(domain: string, relativePath: string, contentId: string, loadMetadata: () => Buffer): FileRecord {
    return new FileRecord({
      domain,
      relativePath,
      contentId,
      physicalPath: this.blobs.physicalPath(contentId),
      loadMetadata,
    });
  }
}
