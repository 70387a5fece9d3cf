import {
  createQueueRuntime,
  createRuntime,
} from "../application/bootstrap/runtimeFactory";
import type { JobStage } from "../core/entities/pipelineRun";
import { createStageWorker } from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const stageConcurrency: Record<JobStage, number> = {
  scrape: env.QUEUE_CONCURRENCY_SCRAPE,
  summarize: env.QUEUE_CONCURRENCY_SUMMARIZE,
  insights: env.QUEUE_CONCURRENCY_INSIGHTS,
};

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const { redis, orchestratorService } = createQueueRuntime(runtime);
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      storageProvider: env.STORAGE_PROVIDER,
      storageBasePath: env.STORAGE_BASE_PATH,
      llmProvider: env.LLM_PROVIDER,
      ollamaBaseUrl: env.OLLAMA_BASE_URL,
      ledgerProvider: env.LEDGER_PROVIDER,
      issuers: runtime.issuers.size,
      redisUrl: env.REDIS_URL,
      stageConcurrency,
    },
    "Worker runtime configuration",
  );

  const stages: JobStage[] = ["scrape", "summarize", "insights"];
  const workers = stages.map((stage) => ({
    stage,
    worker: createStageWorker(stage, redis, stageConcurrency[stage], (payload) =>
      orchestratorService.processStage(stage, payload),
    ),
  }));

  workers.forEach(({ stage, worker }) => {
    worker.on("active", (job) => {
      if (!job.id) {
        return;
      }

      startedAtByJobId.set(job.id, Date.now());

      logger.info(
        {
          stage,
          jobId: job.id,
          runId: job.data.runId,
          taskId: job.data.taskId,
          date: job.data.date,
          idempotencyKey: job.data.idempotencyKey,
        },
        "Worker job started",
      );
    });

    worker.on("failed", (job, error) => {
      const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
      const durationMs = startedAt ? Date.now() - startedAt : undefined;

      if (job?.id) {
        startedAtByJobId.delete(job.id);
      }

      logger.error(
        {
          stage,
          jobId: job?.id,
          runId: job?.data.runId,
          date: job?.data.date,
          idempotencyKey: job?.data.idempotencyKey,
          attemptsMade: job?.attemptsMade,
          durationMs,
          error: toErrorDetails(error),
        },
        "Worker job failed",
      );
    });

    worker.on("completed", (job) => {
      const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
      const durationMs = startedAt ? Date.now() - startedAt : undefined;

      if (job.id) {
        startedAtByJobId.delete(job.id);
      }

      logger.info(
        {
          stage,
          jobId: job.id,
          runId: job.data.runId,
          date: job.data.date,
          idempotencyKey: job.data.idempotencyKey,
          durationMs,
        },
        "Worker job completed",
      );
    });
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Workers shutting down");
    await Promise.all(workers.map(({ worker }) => worker.close()));
    await runtime.close();
    process.exit(0);
  };

  ["SIGINT", "SIGTERM"].forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  });

  logger.info("Workers online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
