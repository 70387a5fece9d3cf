import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  JobStage,
  PipelineTaskEntity,
  ScrapeRunRecord,
  StoredDisclosureRecord,
} from "../entities/pipelineRun";

export type JobPayload = {
  runId: string;
  taskId: string;
  date: string;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(stage: JobStage, payload: JobPayload): Promise<void>;
}

export interface RateLimiterPort {
  acquire(): Promise<void>;
}

export interface DocumentDownloaderPort {
  download(url: string): Promise<Result<Uint8Array, AppBoundaryError>>;
}

/**
 * Worker-local scratch file. `release` must be called on every exit path.
 */
export type HoldingFile = {
  path: string;
  write(bytes: Uint8Array): Promise<void>;
  release(): Promise<void>;
};

export interface HoldingAreaPort {
  acquire(name: string): Promise<HoldingFile>;
}

export interface StoragePort {
  uploadFile(
    localPath: string,
    key: string,
    contentType: string,
  ): Promise<Result<string, AppBoundaryError>>;
  putObject(
    key: string,
    body: string | Uint8Array,
    contentType: string,
  ): Promise<Result<string, AppBoundaryError>>;
  getObject(key: string): Promise<Result<Uint8Array, AppBoundaryError>>;
  listKeys(prefix: string): Promise<Result<string[], AppBoundaryError>>;
}

export interface TextExtractorPort {
  extractText(key: string): Promise<Result<string, AppBoundaryError>>;
}

export type GenerationRequest = {
  system: string;
  prompt: string;
};

export interface LlmPort {
  generate(request: GenerationRequest): Promise<Result<string, AppBoundaryError>>;
}

export interface RunLedgerPort {
  recordRun(
    run: ScrapeRunRecord,
    documents: StoredDisclosureRecord[],
  ): Promise<void>;
  listRecent(limit: number): Promise<ScrapeRunRecord[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface TaskFactoryPort {
  create(date: string, stage: JobStage): PipelineTaskEntity;
}
