import { err, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export type RetryPolicy = {
  maxAttempts: number;
  initialBackoffMs: number;
};

export type SummaryPrompt = {
  system: string;
  user: string;
  content: string;
};

const JITTER_MS = 1_000;

const sleepFor = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Wraps the model call with exponential backoff on rate limiting. Any other
 * failure is returned on first sight.
 */
export class RetryingSummarizer {
  constructor(
    private readonly llm: LlmPort,
    private readonly policy: RetryPolicy = { maxAttempts: 5, initialBackoffMs: 2_000 },
    private readonly sleep: (ms: number) => Promise<void> = sleepFor,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * Wait before retry `n` (0-based) is `initialBackoffMs * 2^n` plus up to one second of jitter.
   */
  backoffMs(attempt: number): number {
    return this.policy.initialBackoffMs * 2 ** attempt + this.random() * JITTER_MS;
  }

  async summarize(prompt: SummaryPrompt): Promise<Result<string, AppBoundaryError>> {
    const request = {
      system: prompt.system,
      prompt: prompt.content === "" ? prompt.user : `${prompt.user}\n\n${prompt.content}`,
    };

    for (let attempt = 0; ; attempt += 1) {
      const response = await this.llm.generate(request);
      if (response.isOk() || response.error.code !== "rate_limited") {
        return response;
      }

      if (attempt + 1 >= this.policy.maxAttempts) {
        logger.error(
          { attempts: this.policy.maxAttempts, reason: response.error.message },
          "Model call still rate limited after final attempt",
        );
        return err({
          ...response.error,
          retryable: false,
          message: `Rate limited after ${this.policy.maxAttempts} attempts: ${response.error.message}`,
        });
      }

      const waitMs = this.backoffMs(attempt);
      logger.warn(
        {
          waitMs: Math.round(waitMs),
          attempt: attempt + 1,
          maxAttempts: this.policy.maxAttempts,
        },
        "Model call rate limited; backing off",
      );
      await this.sleep(waitMs);
    }
  }
}
