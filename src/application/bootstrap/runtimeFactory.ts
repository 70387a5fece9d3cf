import { DisclosureDiscoveryService } from "../services/disclosureDiscoveryService";
import { DisclosureScrapeService } from "../services/disclosureScrapeService";
import { DocumentTransferService } from "../services/documentTransferService";
import { IssuerSummaryService } from "../services/issuerSummaryService";
import {
  PipelineOrchestratorService,
  type StageRunners,
} from "../services/pipelineOrchestratorService";
import { RetryingSummarizer } from "../services/retryingSummarizer";
import { SectorBatchScrapeService } from "../services/sectorBatchScrapeService";
import { SectorInsightService } from "../services/sectorInsightService";
import { StorageDownloadService } from "../services/storageDownloadService";
import { TimeseriesAnalysisService } from "../services/timeseriesAnalysisService";
import { marketMapOf, type IssuerDirectory } from "../../core/entities/issuer";
import type {
  LlmPort,
  RunLedgerPort,
  StoragePort,
} from "../../core/ports/outboundPorts";
import { env, excludedMarkets } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { createDb } from "../../infra/db/client";
import { NoopRunLedger, PostgresRunLedger } from "../../infra/db/repositories";
import { HttpDocumentDownloader } from "../../infra/http/httpDocumentDownloader";
import { SlidingWindowRateLimiter } from "../../infra/http/slidingWindowRateLimiter";
import { MockLlm } from "../../infra/llm/mockLlm";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { PdfTextExtractor } from "../../infra/pdf/pdfTextExtractor";
import {
  defaultPromptsDir,
  loadPromptTemplates,
} from "../../infra/prompts/promptTemplateLoader";
import { LocalDirectoryCatalog } from "../../infra/providers/catalog/localDirectoryCatalog";
import { StorageMetadataCatalog } from "../../infra/providers/catalog/storageMetadataCatalog";
import { loadIssuerDirectory } from "../../infra/providers/issuers/csvIssuerDirectory";
import { TdnetListingProvider } from "../../infra/providers/tdnet/tdnetListingProvider";
import { BullMqQueue, redisConfigFromUrl } from "../../infra/queue/bullMqQueue";
import { LocalFileStorage } from "../../infra/storage/localFileStorage";
import { S3ObjectStorage } from "../../infra/storage/s3ObjectStorage";
import {
  SystemClock,
  TaskFactory,
  TempDirHoldingArea,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";

const createStorage = (): StoragePort => {
  if (env.STORAGE_PROVIDER === "s3") {
    return S3ObjectStorage.fromConfig({
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
    });
  }

  return new LocalFileStorage(env.LOCAL_STORAGE_ROOT);
};

const createLlm = (): LlmPort => {
  if (env.LLM_PROVIDER === "ollama") {
    return new OllamaLlm(
      env.OLLAMA_BASE_URL,
      env.OLLAMA_CHAT_MODEL,
      env.OLLAMA_CHAT_TIMEOUT_MS,
    );
  }

  return new MockLlm();
};

/**
 * A missing reference table only degrades grouping and filtering, so scraping still runs.
 */
const createIssuerDirectory = async (): Promise<IssuerDirectory> => {
  const loaded = await loadIssuerDirectory(env.COMPANIES_CSV_PATH);
  if (loaded.isErr()) {
    logger.warn(
      { path: env.COMPANIES_CSV_PATH, reason: loaded.error.message },
      "Issuer reference table unavailable; continuing without sector data",
    );
    return new Map();
  }

  logger.info(
    { path: env.COMPANIES_CSV_PATH, issuers: loaded.value.size },
    "Issuer reference table loaded",
  );
  return loaded.value;
};

const createLedger = (): { ledger: RunLedgerPort; close: () => Promise<void> } => {
  if (env.LEDGER_PROVIDER === "postgres") {
    const { db, sql } = createDb(env.POSTGRES_URL);
    return { ledger: new PostgresRunLedger(db), close: () => sql.end() };
  }

  return { ledger: new NoopRunLedger(), close: async () => {} };
};

/**
 * Centralizes runtime wiring so app and worker entry points share one composition root.
 */
export const createRuntime = async () => {
  const loadedTemplates = await loadPromptTemplates(env.PROMPTS_DIR || defaultPromptsDir);
  if (loadedTemplates.isErr()) {
    throw new Error(loadedTemplates.error.message);
  }
  const templates = loadedTemplates.value;

  const issuers = await createIssuerDirectory();
  const storage = createStorage();
  const { ledger, close } = createLedger();

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();

  const discoveryService = new DisclosureDiscoveryService(
    new TdnetListingProvider(
      env.TDNET_BASE_URL,
      env.TDNET_USER_AGENT,
      env.LISTING_TIMEOUT_MS,
    ),
    marketMapOf(issuers),
    excludedMarkets(),
  );
  const transferService = new DocumentTransferService(
    new HttpDocumentDownloader(env.TDNET_USER_AGENT, env.PDF_TIMEOUT_MS),
    storage,
    new TempDirHoldingArea(),
    new SlidingWindowRateLimiter(env.RATE_LIMIT_PER_SECOND),
    env.TRANSFER_CONCURRENCY,
    env.PROGRESS_EVERY,
  );
  const scrapeService = new DisclosureScrapeService(
    discoveryService,
    transferService,
    storage,
    ledger,
    clock,
    ids,
    {
      basePath: env.STORAGE_BASE_PATH,
      layout: env.STORAGE_LAYOUT,
      batchSize: env.TRANSFER_BATCH_SIZE,
    },
  );
  const sectorBatchScrapeService = new SectorBatchScrapeService(
    discoveryService,
    transferService,
    issuers,
    env.STORAGE_BASE_PATH,
    env.TRANSFER_BATCH_SIZE,
  );

  const summarizer = new RetryingSummarizer(createLlm(), {
    maxAttempts: env.LLM_MAX_ATTEMPTS,
    initialBackoffMs: env.LLM_INITIAL_BACKOFF_MS,
  });
  const extractor = new PdfTextExtractor(storage);
  const concurrency = {
    extractionConcurrency: env.EXTRACTION_CONCURRENCY,
    summaryConcurrency: env.LLM_CONCURRENCY,
  };

  /**
   * Documents come from the metadata sidecars in storage, or from a local directory of PDFs
   * whose paths are relative to that directory.
   */
  const issuerSummaryServiceFor = (localDirectory?: string): IssuerSummaryService =>
    localDirectory
      ? new IssuerSummaryService(
          new LocalDirectoryCatalog(localDirectory),
          new PdfTextExtractor(new LocalFileStorage(localDirectory)),
          summarizer,
          storage,
          issuers,
          templates,
          { basePath: env.STORAGE_BASE_PATH, ...concurrency },
        )
      : new IssuerSummaryService(
          new StorageMetadataCatalog(storage, env.STORAGE_BASE_PATH),
          extractor,
          summarizer,
          storage,
          issuers,
          templates,
          { basePath: env.STORAGE_BASE_PATH, ...concurrency },
        );

  const sectorInsightService = new SectorInsightService(
    storage,
    summarizer,
    templates,
    env.STORAGE_BASE_PATH,
    env.LLM_CONCURRENCY,
  );
  const timeseriesAnalysisService = new TimeseriesAnalysisService(
    storage,
    extractor,
    summarizer,
    issuers,
    templates,
    { basePath: env.STORAGE_BASE_PATH, ...concurrency },
  );

  const downloadService = new StorageDownloadService(storage, env.STORAGE_BASE_PATH);

  const stageRunners: StageRunners = {
    scrape: (date) => scrapeService.scrapeDate(date),
    summarize: (date) => issuerSummaryServiceFor().summarizeRange(date, date),
    insights: (date) => sectorInsightService.generateForDate(date),
  };

  return {
    clock,
    ids,
    issuers,
    storage,
    ledger,
    scrapeService,
    sectorBatchScrapeService,
    issuerSummaryServiceFor,
    sectorInsightService,
    timeseriesAnalysisService,
    downloadService,
    stageRunners,
    close,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;

/**
 * Queue wiring is separate so one-shot commands never open a Redis connection.
 */
export const createQueueRuntime = (runtime: Runtime) => {
  const redis = redisConfigFromUrl(env.REDIS_URL);
  const queue = new BullMqQueue(redis);
  const orchestratorService = new PipelineOrchestratorService(
    queue,
    new TaskFactory(runtime.clock, runtime.ids),
    runtime.stageRunners,
  );

  return { redis, queue, orchestratorService };
};
