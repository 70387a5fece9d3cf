import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { JobStage } from "../../core/entities/pipelineRun";
import type {
  JobPayload,
  QueuePort,
  TaskFactoryPort,
} from "../../core/ports/outboundPorts";
import { validateCompactDate } from "../../core/rules/disclosureDates";
import { logger } from "../../shared/logger/logger";

export type StageRunner = (
  date: string,
) => Promise<Result<unknown, AppBoundaryError>>;

export type StageRunners = Record<JobStage, StageRunner>;

/**
 * Daily chain: scrape a date, summarize its issuers, then roll summaries up by sector.
 */
export const nextStage: Record<JobStage, JobStage | null> = {
  scrape: "summarize",
  summarize: "insights",
  insights: null,
};

/**
 * Owns stage handoff policy so scheduling behavior stays consistent across CLI and worker-triggered flows.
 */
export class PipelineOrchestratorService {
  constructor(
    private readonly queue: QueuePort,
    private readonly taskFactory: TaskFactoryPort,
    private readonly stages: StageRunners,
  ) {}

  /**
   * Enqueues date work through one policy point while allowing explicit dedupe bypass for operator reruns.
   */
  async enqueueForDate(
    date: string,
    stage: JobStage = "scrape",
    force = false,
  ): Promise<JobPayload> {
    const valid = validateCompactDate(date);
    if (valid.isErr()) {
      throw new Error(valid.error.message);
    }

    const task = this.taskFactory.create(date, stage);
    const idempotencyKey = force
      ? `${task.idempotencyKey}-force-${task.id}`
      : task.idempotencyKey;

    const payload: JobPayload = {
      runId: task.runId,
      taskId: task.id,
      date: task.date,
      idempotencyKey,
      requestedAt: task.requestedAt.toISOString(),
    };
    await this.queue.enqueue(stage, payload);
    return payload;
  }

  /**
   * Runs one stage for a queued job and hands the payload to the next stage.
   * A failed stage throws so the queue's retry policy applies.
   */
  async processStage(stage: JobStage, payload: JobPayload): Promise<void> {
    const result = await this.stages[stage](payload.date);
    if (result.isErr()) {
      throw new Error(
        `Stage ${stage} failed for ${payload.date}: ${result.error.message}`,
      );
    }

    const next = nextStage[stage];
    if (!next) {
      return;
    }

    await this.queue.enqueue(next, {
      ...payload,
      idempotencyKey: `${payload.idempotencyKey}-${next}`,
    });
    logger.info(
      { date: payload.date, from: stage, to: next, runId: payload.runId },
      "Stage handed off",
    );
  }
}
