import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  GenerationRequest,
  LlmPort,
} from "../../core/ports/outboundPorts";
import { RetryingSummarizer } from "./retryingSummarizer";

const failure = (code: AppBoundaryError["code"]): AppBoundaryError => ({
  source: "llm",
  code,
  provider: "fake",
  message: `model said ${code}`,
  retryable: code === "rate_limited",
  httpStatus: code === "rate_limited" ? 429 : 500,
});

const scriptedLlm = (
  responses: Array<Result<string, AppBoundaryError>>,
): LlmPort & { requests: GenerationRequest[] } => {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    generate: async (request) => {
      requests.push(request);
      return responses.shift() ?? err(failure("provider_error"));
    },
  };
};

const prompt = { system: "sys", user: "要約してください", content: "本文" };

describe("RetryingSummarizer", () => {
  it("joins the user prompt and content and returns the first success", async () => {
    const llm = scriptedLlm([ok("summary")]);
    const sleeps: number[] = [];
    const summarizer = new RetryingSummarizer(
      llm,
      { maxAttempts: 5, initialBackoffMs: 2_000 },
      async (ms) => {
        sleeps.push(ms);
      },
      () => 0.5,
    );

    expect((await summarizer.summarize(prompt))._unsafeUnwrap()).toBe("summary");
    expect(llm.requests).toEqual([{ system: "sys", prompt: "要約してください\n\n本文" }]);
    expect(sleeps).toEqual([]);
  });

  it("backs off exponentially with jitter on rate limiting", async () => {
    const llm = scriptedLlm([
      err(failure("rate_limited")),
      err(failure("rate_limited")),
      ok("finally"),
    ]);
    const sleeps: number[] = [];
    const summarizer = new RetryingSummarizer(
      llm,
      { maxAttempts: 5, initialBackoffMs: 2_000 },
      async (ms) => {
        sleeps.push(ms);
      },
      () => 0.25,
    );

    expect((await summarizer.summarize(prompt))._unsafeUnwrap()).toBe("finally");
    expect(sleeps).toEqual([2_250, 4_250]);
    expect(llm.requests).toHaveLength(3);
  });

  it("gives up after the maximum attempt count", async () => {
    const llm = scriptedLlm(
      Array.from({ length: 6 }, () => err(failure("rate_limited"))),
    );
    const sleeps: number[] = [];
    const summarizer = new RetryingSummarizer(
      llm,
      { maxAttempts: 5, initialBackoffMs: 100 },
      async (ms) => {
        sleeps.push(ms);
      },
      () => 0,
    );

    const result = await summarizer.summarize(prompt);

    expect(llm.requests).toHaveLength(5);
    expect(sleeps).toEqual([100, 200, 400, 800]);
    expect(result.isErr() && result.error).toMatchObject({
      code: "rate_limited",
      retryable: false,
      message: "Rate limited after 5 attempts: model said rate_limited",
    });
  });

  it("does not retry other failures", async () => {
    const llm = scriptedLlm([err(failure("timeout")), ok("unused")]);
    const summarizer = new RetryingSummarizer(
      llm,
      { maxAttempts: 5, initialBackoffMs: 100 },
      async () => undefined,
      () => 0,
    );

    const result = await summarizer.summarize(prompt);

    expect(llm.requests).toHaveLength(1);
    expect(result.isErr() && result.error.code).toBe("timeout");
  });
});
