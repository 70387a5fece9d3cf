export type JobStage = "scrape" | "summarize" | "insights";

export type PipelineTaskEntity = {
  id: string;
  runId: string;
  date: string;
  requestedAt: Date;
  stage: JobStage;
  idempotencyKey: string;
};

export type ScrapeRunStatus = "completed" | "failed";

export type ScrapeRunRecord = {
  id: string;
  date: string;
  layout: string;
  discovered: number;
  stored: number;
  failed: number;
  status: ScrapeRunStatus;
  startedAt: Date;
  finishedAt: Date;
};

export type StoredDisclosureRecord = {
  runId: string;
  date: string;
  code: string;
  companyName: string;
  title: string;
  docType: string;
  storagePath: string;
};
