import type { Backup } from "../backup/backup.js";
import { ApplicationNotFoundError, PhotosNotConfiguredError } from "../backup/errors.js";
import { logger } from "../config/logger.js";
import type { ContactResolutionTable } from "../contacts/contact-resolution-table.js";
import type { JsonOutput } from "../output/json-output.js";
import type { Pipeline, PipelineReport } from "./types.js";

/** Errors that mean "this pipeline does not apply to this backup". */
function isSkip(err: unknown): err is ApplicationNotFoundError | PhotosNotConfiguredError {
  return err instanceof ApplicationNotFoundError || err instanceof PhotosNotConfiguredError;
}

/**
 * Run pipelines in order against one backup. A failing pipeline is reported
 * and the remaining ones still run; the contact resolution table produced by
 * one pipeline is passed to those after it.
 */
export async function runPipelines(
  backup: Backup,
  pipelines: readonly Pipeline[],
  output: JsonOutput,
): Promise<PipelineReport[]> {
  const reports: PipelineReport[] = [];
  let contacts: ContactResolutionTable | undefined;

  for (const pipeline of pipelines) {
    const started = Date.now();
    try {
      const outcome = await pipeline.run({ backup, output, contacts });
      if (outcome && outcome.contacts) contacts = outcome.contacts;
      reports.push({ pipeline: pipeline.name, status: "completed", durationMs: Date.now() - started });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isSkip(err)) {
        logger.warn(`Skipping ${pipeline.name} for ${backup.id}`, { reason: message });
        reports.push({ pipeline: pipeline.name, status: "skipped", durationMs: Date.now() - started, error: message });
        continue;
      }
      logger.error(`Pipeline ${pipeline.name} failed for ${backup.id}`, {
        error: message,
        stack: err instanceof Error ? err.stack : undefined,
      });
      reports.push({ pipeline: pipeline.name, status: "failed", durationMs: Date.now() - started, error: message });
    }
  }
  return reports;
}
