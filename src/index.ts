#!/usr/bin/env node
import { loadConfig } from "./config/index.js";
import { logger, setLogLevel } from "./config/logger.js";
import { JsonOutput } from "./output/json-output.js";
import { runPipelines } from "./runner/dispatch.js";
import { createPipelines } from "./runner/pipelines.js";
import { discoverBackups } from "./runner/scan.js";
import type { PipelineReport } from "./runner/types.js";

export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  process.exitCode = 1;
};

// Winston's Console transport writes synchronously, so the entry is out before exit.
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const pipelines = createPipelines(config);
  const output = new JsonOutput(config.outputDir);
  const backups = discoverBackups(config.backupRoots, config.scratchDir);
  logger.info(`Found ${backups.length} backup(s)`, { roots: config.backupRoots });

  const failed: Array<PipelineReport & { backup: string }> = [];
  try {
    for (const backup of backups) {
      const reports = await runPipelines(backup, pipelines, output.scoped(backup.id));
      for (const report of reports) {
        if (report.status === "failed") failed.push({ ...report, backup: backup.id });
      }
      logger.info(`Finished ${backup.id}`, {
        applications: backup.installedApplications.size,
        completed: reports.filter((r) => r.status === "completed").map((r) => r.pipeline),
        skipped: reports.filter((r) => r.status === "skipped").map((r) => r.pipeline),
      });
    }
  } finally {
    for (const backup of backups) backup.close();
  }

  if (failed.length > 0) {
    logger.error(`${failed.length} pipeline run(s) failed`, {
      failed: failed.map((f) => `${f.backup}/${f.pipeline}: ${f.error ?? "unknown error"}`),
    });
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error("Extraction aborted", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exitCode = 1;
  });
