import type { Backup } from "../backup/backup.js";
import type { ContactResolutionTable } from "../contacts/contact-resolution-table.js";
import type { JsonOutput } from "../output/json-output.js";

/** What a pipeline can read while it runs against one backup. */
export interface PipelineContext {
  backup: Backup;
  /** Output writer rooted at this backup's output directory */
  output: JsonOutput;
  /** Set once the contacts pipeline has completed for this backup */
  contacts?: ContactResolutionTable;
}

/** Values a pipeline hands to the pipelines that run after it. */
export interface PipelineOutcome {
  contacts?: ContactResolutionTable;
}

export interface Pipeline {
  readonly name: string;
  run(ctx: PipelineContext): Promise<PipelineOutcome | void>;
}

export type PipelineStatus = "completed" | "skipped" | "failed";

export interface PipelineReport {
  pipeline: string;
  status: PipelineStatus;
  durationMs: number;
  error?: string;
}
