import { Queue, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { JobStage } from "../../core/entities/pipelineRun";
import type { JobPayload, QueuePort } from "../../core/ports/outboundPorts";
import { jobStages, queueNames } from "./queues";

const countedStates = [
  "waiting",
  "active",
  "completed",
  "failed",
  "delayed",
  "paused",
] as const;

export type QueueStageCounts = Record<(typeof countedStates)[number], number>;

export type QueueCountsSnapshot = Record<JobStage, QueueStageCounts>;

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  removeOnFail: 1_000,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
} as const;

/**
 * One BullMQ queue per pipeline stage. Job ids are the payload's idempotency
 * key, so a date already queued for a stage is not queued twice.
 */
export class BullMqQueue implements QueuePort {
  private readonly queues: Record<JobStage, Queue<JobPayload>>;

  constructor(connection: RedisOptions) {
    const queueFor = (stage: JobStage) =>
      new Queue<JobPayload>(queueNames[stage], { connection, defaultJobOptions });

    this.queues = {
      scrape: queueFor("scrape"),
      summarize: queueFor("summarize"),
      insights: queueFor("insights"),
    };
  }

  // Custom job ids may not contain ":"; task keys only use hyphens.
  async enqueue(stage: JobStage, payload: JobPayload): Promise<void> {
    await this.queues[stage].add(`${stage}-${payload.date}`, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await Promise.all(jobStages.map((stage) => this.queues[stage].close()));
  }

  /**
   * Backlog per stage for the status command; states BullMQ omits count as zero.
   */
  async getQueueCounts(): Promise<QueueCountsSnapshot> {
    const countsFor = async (stage: JobStage): Promise<QueueStageCounts> => {
      const counts = await this.queues[stage].getJobCounts(...countedStates);
      return {
        waiting: counts.waiting ?? 0,
        active: counts.active ?? 0,
        completed: counts.completed ?? 0,
        failed: counts.failed ?? 0,
        delayed: counts.delayed ?? 0,
        paused: counts.paused ?? 0,
      };
    };

    const [scrape, summarize, insights] = await Promise.all([
      countsFor("scrape"),
      countsFor("summarize"),
      countsFor("insights"),
    ]);
    return { scrape, summarize, insights };
  }
}

/**
 * Consumes one stage queue. A processor that throws fails the attempt and
 * BullMQ applies `defaultJobOptions` retries.
 */
export const createStageWorker = (
  stage: JobStage,
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: JobPayload) => Promise<void>,
) =>
  new Worker<JobPayload>(
    queueNames[stage],
    async (job) => {
      await processor(job.data);
    },
    { connection, concurrency },
  );

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const dbValue = parsed.pathname.replace("/", "").trim();
  const parsedDb = Number.parseInt(dbValue, 10);

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number.isFinite(parsedDb) ? parsedDb : 0,
    // BullMQ workers require blocking commands without a retry cap.
    maxRetriesPerRequest: null,
  };
};
