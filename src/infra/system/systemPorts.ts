import { randomUUID } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  ClockPort,
  HoldingAreaPort,
  HoldingFile,
  IdGeneratorPort,
  TaskFactoryPort,
} from "../../core/ports/outboundPorts";
import type {
  JobStage,
  PipelineTaskEntity,
} from "../../core/entities/pipelineRun";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}

/**
 * Centralizes task-id/idempotency policy so every enqueue path follows the same deduplication contract.
 * Uses hyphen delimiters because BullMQ custom job ids cannot include colon.
 */
export class TaskFactory implements TaskFactoryPort {
  constructor(
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  create(date: string, stage: JobStage): PipelineTaskEntity {
    const id = this.ids.next();
    return {
      id,
      runId: this.ids.next(),
      date,
      requestedAt: this.clock.now(),
      stage,
      idempotencyKey: `${date}-${stage}`,
    };
  }
}

/**
 * One private temp directory per holding file; release removes the directory.
 */
export class TempDirHoldingArea implements HoldingAreaPort {
  constructor(private readonly parent: string = tmpdir()) {}

  async acquire(name: string): Promise<HoldingFile> {
    const directory = await mkdtemp(join(this.parent, "disclosure-"));
    const path = join(directory, name.replace(/[^\w.-]/g, "_") || "document.pdf");

    return {
      path,
      write: async (bytes) => {
        await writeFile(path, bytes);
      },
      release: async () => {
        await rm(directory, { recursive: true, force: true });
      },
    };
  }
}
