import type { Backup } from "./backup.js";
import { FileNotFoundError } from "./errors.js";
import type { FileRecord } from "./file-record.js";

export function applicationDomain(bundleId: string): string {
  return `AppDomain-${bundleId}`;
}

/** The files of one installed application, indexed by relative path. */
export class Application {
  readonly bundleId: string;
  readonly domain: string;
  private readonly files: Map<string, FileRecord>;

  constructor(backup: Backup, bundleId: string) {
    this.bundleId = bundleId;
    this.domain = applicationDomain(bundleId);
    this.files = new Map(backup.domainFiles(this.domain).map((file) => [file.relativePath, file]));
  }

  file(path: string): FileRecord {
    const file = this.files.get(path);
    if (!file) throw new FileNotFoundError(this.domain, path);
    return file;
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  get size(): number {
    return this.files.size;
  }
}
