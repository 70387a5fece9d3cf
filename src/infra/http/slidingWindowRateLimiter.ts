import type { RateLimiterPort } from "../../core/ports/outboundPorts";

const WINDOW_MS = 1_000;

type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Admits at most `maxPerSecond` acquisitions in any trailing one-second window.
 * Callers queue on a promise chain so evict/check/sleep/append runs for one
 * caller at a time.
 */
export class SlidingWindowRateLimiter implements RateLimiterPort {
  private readonly admissions: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxPerSecond = 5,
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = defaultSleep,
  ) {
    if (!Number.isInteger(maxPerSecond) || maxPerSecond < 1) {
      throw new Error(`maxPerSecond must be a positive integer, got ${maxPerSecond}.`);
    }
  }

  /**
   * Resolves once one more request fits in the window, then records it.
   */
  async acquire(): Promise<void> {
    const turn = this.tail.then(() => this.admit());
    // Keep the chain alive even if a sleep implementation rejects.
    this.tail = turn.catch(() => undefined);
    await turn;
  }

  /**
   * Admission timestamps currently inside the window, oldest first.
   */
  snapshot(): number[] {
    return [...this.admissions];
  }

  private async admit(): Promise<void> {
    this.evictExpired(this.now());

    while (this.admissions.length >= this.maxPerSecond) {
      const oldest = this.admissions[0] ?? this.now();
      const waitMs = oldest + WINDOW_MS - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
      this.evictExpired(this.now());
    }

    this.admissions.push(this.now());
  }

  private evictExpired(at: number): void {
    while (this.admissions.length > 0) {
      const oldest = this.admissions[0];
      if (oldest === undefined || at - oldest < WINDOW_MS) {
        return;
      }
      this.admissions.shift();
    }
  }
}
