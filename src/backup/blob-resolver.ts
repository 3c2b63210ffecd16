import { copyFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, isAbsolute, join } from "node:path";
import { logger } from "../config/logger.js";
import { ScratchPathError } from "./errors.js";

export interface BlobResolverOptions {
  /** Backup root directory containing the two-character shard directories */
  backupRoot: string;
  /** Writable directory that materialized copies are placed under */
  scratchRoot: string;
}

/** Reject segments that would place a copy outside the scratch root. */
function assertContained(segment: string): void {
  if (segment === "" || isAbsolute(segment) || segment.split(/[\\/]/).includes("..")) {
    throw new ScratchPathError(segment);
  }
}

/**
 * Maps content ids to their location in the backup's blob store and keeps
 * writable local copies of blobs that have to be opened as databases.
 */
export class BlobResolver {
  private readonly backupRoot: string;
  private readonly scratchRoot: string;

  constructor(opts: BlobResolverOptions) {
    this.backupRoot = opts.backupRoot;
    this.scratchRoot = opts.scratchRoot;
  }

  /** `<backup root>/<first two characters of id>/<id>`. Does not touch the filesystem. */
  physicalPath(contentId: string): string {
    return join(this.backupRoot, contentId.slice(0, 2), contentId);
  }

  /**
   * Copy a blob to `<scratch root>/<scopeKey>/<logicalName>` unless a copy is
   * already there, and return the local path.
   */
  materialize(scopeKey: string, contentId: string, logicalName: string): string {
    return this.materializePath(scopeKey, this.physicalPath(contentId), logicalName);
  }

  /** As {@link materialize}, for a source file that is not content-addressed (Manifest.db). */
  materializePath(scopeKey: string, sourcePath: string, logicalName: string): string {
    assertContained(scopeKey);
    assertContained(logicalName);

    const localPath = join(this.scratchRoot, scopeKey, logicalName);
    if (existsSync(localPath)) {
      logger.debug(`Reusing local copy ${localPath}`);
      return localPath;
    }

    mkdirSync(dirname(localPath), { recursive: true });
    copyFileSync(sourcePath, localPath);
    logger.info(`Materialized ${localPath}`, { source: sourcePath });
    return localPath;
  }
}
