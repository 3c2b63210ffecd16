import { createBoardGameStatsPipeline } from "../apps/bgstats/bgstats-pipeline.js";
import type { Config } from "../config/index.js";
import { createContactsPipeline } from "../contacts/contacts-pipeline.js";
import { createMessagesPipeline } from "../messages/messages-pipeline.js";
import { createPhotosPipeline } from "../photos/photos-pipeline.js";
import type { Pipeline } from "./types.js";

/** Every pipeline, in run order. Messages must follow contacts. */
export function createPipelines(config: Config): Pipeline[] {
  return [
    createBoardGameStatsPipeline(),
    createContactsPipeline({ region: config.phoneRegion }),
    createMessagesPipeline({ region: config.phoneRegion }),
    createPhotosPipeline(config.photos),
  ];
}
