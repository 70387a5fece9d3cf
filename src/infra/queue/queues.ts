import type { JobStage } from "../../core/entities/pipelineRun";

/**
 * Uses hyphen-only queue names because BullMQ uses colon as an internal Redis key separator.
 */
export const queueNames: Record<JobStage, string> = {
  scrape: "disclosure-scrape",
  summarize: "disclosure-summarize",
  insights: "disclosure-insights",
};

export const jobStages = Object.keys(queueNames).filter(
  (stage): stage is JobStage => stage in queueNames,
);
