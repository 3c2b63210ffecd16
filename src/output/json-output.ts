import { mkdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join } from "node:path";
import { logger } from "../config/logger.js";

/** Newline-delimited JSON: one value per line, trailing newline after each. */
export function toNdjson(rows: readonly unknown[]): string {
  return rows.map((row) => `${JSON.stringify(row)}\n`).join("");
}

export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Writes extraction results below one directory. Lists become NDJSON so they
 * can be streamed and appended; single objects become pretty-printed JSON.
 */
export class JsonOutput {
  constructor(readonly root: string) {}

  /** Writer for a subdirectory, e.g. one per backup. */
  scoped(segment: string): JsonOutput {
    return new JsonOutput(this.resolve(segment));
  }

  async writeRecords(relativePath: string, rows: readonly unknown[]): Promise<string> {
    return this.write(relativePath, toNdjson(rows));
  }

  async writeDocument(relativePath: string, value: unknown): Promise<string> {
    return this.write(relativePath, toPrettyJson(value));
  }

  private async write(relativePath: string, content: string): Promise<string> {
    const target = this.resolve(relativePath);
    logger.info(`Writing json to ${target}`);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
    return target;
  }

  private resolve(relativePath: string): string {
    if (isAbsolute(relativePath) || relativePath.split(/[\\/]/).includes("..")) {
      throw new Error(`Output path must stay inside ${this.root}: ${relativePath}`);
    }
    return join(this.root, relativePath);
  }
}
