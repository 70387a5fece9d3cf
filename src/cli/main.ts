import { Command, InvalidArgumentError } from "commander";
import type { Result } from "neverthrow";
import {
  createQueueRuntime,
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import type { AppBoundaryError } from "../core/entities/appError";
import type { ScrapeRunRecord } from "../core/entities/pipelineRun";
import { todayInTokyo } from "../core/rules/disclosureDates";
import { listUniqueMarkets } from "../infra/providers/issuers/csvIssuerDirectory";
import { LocalFileStorage } from "../infra/storage/localFileStorage";
import { codeList, env, excludedMarkets } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * `TARGET_DATE` wins; otherwise today's date in Tokyo.
 */
export const defaultDate = (now: Date = new Date()): string =>
  env.TARGET_DATE || todayInTokyo(now);

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const unwrapOrThrow = <T>(result: Result<T, AppBoundaryError>): T => {
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
  return result.value;
};

/**
 * Opens the runtime for one command and always releases its connections.
 */
const withRuntime = async (work: (runtime: Runtime) => Promise<void>): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await work(runtime);
  } finally {
    await runtime.close();
  }
};

export const formatRunHistory = (runs: readonly ScrapeRunRecord[]): string => {
  if (runs.length === 0) {
    return "No scrape runs recorded.";
  }

  return runs
    .map(
      (run) =>
        `${run.date}  ${run.status.padEnd(9)} stored=${run.stored}/${run.discovered} failed=${run.failed} layout=${run.layout} started=${run.startedAt.toISOString()}`,
    )
    .join("\n");
};

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("disclosure-pipeline").description("TDnet disclosure harvesting and summarization CLI");

  cli
    .command("scrape")
    .description("Discover, download and store one date or an inclusive date range")
    .option("--date <yyyymmdd>", "Target date (defaults to TARGET_DATE or today in JST)")
    .option("--start-date <yyyymmdd>", "First date of a range")
    .option("--end-date <yyyymmdd>", "Last date of a range")
    .action(async (opts: { date?: string; startDate?: string; endDate?: string }) => {
      await withRuntime(async (runtime) => {
        if (opts.startDate || opts.endDate) {
          const start = opts.startDate ?? opts.endDate ?? defaultDate();
          const end = opts.endDate ?? start;
          const results = unwrapOrThrow(
            await runtime.scrapeService.scrapeDateRange(start, end),
          );
          logger.info({ start, end, results }, "Range scrape finished");
          return;
        }

        const summary = unwrapOrThrow(
          await runtime.scrapeService.scrapeDate(opts.date ?? defaultDate()),
        );
        logger.info(summary, "Scrape finished");
      });
    });

  cli
    .command("scrape-sectors")
    .description("Store a date range's documents partitioned by sector and size class")
    .option("--start-date <yyyymmdd>", "First date (defaults to today in JST)")
    .option("--end-date <yyyymmdd>", "Last date (defaults to the start date)")
    .action(async (opts: { startDate?: string; endDate?: string }) => {
      await withRuntime(async (runtime) => {
        const start = opts.startDate ?? defaultDate();
        const summary = unwrapOrThrow(
          await runtime.sectorBatchScrapeService.scrapeRange(start, opts.endDate ?? start),
        );
        logger.info(summary, "Sector scrape finished");
      });
    });

  cli
    .command("summarize")
    .description("Write one summary per issuer for a date range")
    .option("--start-date <yyyymmdd>", "First date (defaults to today in JST)")
    .option("--end-date <yyyymmdd>", "Last date (defaults to the start date)")
    .option("--local-dir <dir>", "Read PDFs from a local directory instead of stored metadata")
    .option("--include <text>", "Only documents whose title or storage path contains this text")
    .option("--codes <list>", "Comma-separated issuer codes")
    .option("--max-groups <n>", "Stop after this many issuers", parsePositiveInt)
    .action(
      async (opts: {
        startDate?: string;
        endDate?: string;
        localDir?: string;
        include?: string;
        codes?: string;
        maxGroups?: number;
      }) => {
        await withRuntime(async (runtime) => {
          const start = opts.startDate ?? defaultDate();
          const codes = codeList(opts.codes);
          const report = unwrapOrThrow(
            await runtime
              .issuerSummaryServiceFor(opts.localDir)
              .summarizeRange(start, opts.endDate ?? start, {
                include: opts.include,
                codes: codes.length > 0 ? codes : undefined,
                maxGroups: opts.maxGroups,
              }),
          );
          logger.info(report, "Issuer summaries finished");
        });
      },
    );

  cli
    .command("sector-insights")
    .description("Roll a date's issuer summaries up by sector and size class")
    .option("--date <yyyymmdd>", "Summary date (defaults to today in JST)")
    .action(async (opts: { date?: string }) => {
      await withRuntime(async (runtime) => {
        const report = unwrapOrThrow(
          await runtime.sectorInsightService.generateForDate(opts.date ?? defaultDate()),
        );
        logger.info(report, "Sector insights finished");
      });
    });

  cli
    .command("timeseries")
    .description("Analyze each issuer's sector-partitioned documents over time")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const report = unwrapOrThrow(await runtime.timeseriesAnalysisService.analyze());
        logger.info(report, "Time-series analysis finished");
      });
    });

  cli
    .command("download")
    .description("Copy a date's stored objects into a local directory")
    .option("--date <yyyymmdd>", "Date to copy (defaults to today in JST)")
    .option("--out <dir>", "Output directory", "downloads")
    .action(async (opts: { date?: string; out: string }) => {
      await withRuntime(async (runtime) => {
        const saved = unwrapOrThrow(
          await runtime.downloadService.downloadDate(
            opts.date ?? defaultDate(),
            new LocalFileStorage(opts.out),
          ),
        );
        console.log(`downloaded ${saved.length} files to ${opts.out}`);
        saved.forEach((path) => console.log(path));
      });
    });

  cli
    .command("markets")
    .description("List market labels in the issuer reference table and the excluded set")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const excluded = excludedMarkets();
        console.log("Markets:");
        listUniqueMarkets(runtime.issuers).forEach((market) =>
          console.log(`- ${market}${excluded.has(market) ? " (excluded)" : ""}`),
        );
        console.log("Excluded:");
        excluded.forEach((market) => console.log(`- ${market}`));
      });
    });

  cli
    .command("enqueue")
    .description("Queue a date for the scrape, summarize and insights chain")
    .option("--date <yyyymmdd>", "Target date (defaults to today in JST)")
    .option("--force", "Bypass idempotency dedupe for immediate reruns")
    .action(async (opts: { date?: string; force?: boolean }) => {
      await withRuntime(async (runtime) => {
        const { queue, orchestratorService } = createQueueRuntime(runtime);
        try {
          const payload = await orchestratorService.enqueueForDate(
            opts.date ?? defaultDate(),
            "scrape",
            Boolean(opts.force),
          );
          logger.info(
            { date: payload.date, idempotencyKey: payload.idempotencyKey, force: Boolean(opts.force) },
            "Enqueued scrape task",
          );
        } finally {
          await queue.close();
        }
      });
    });

  cli
    .command("run")
    .description("Start scheduler loop that enqueues today's scrape")
    .action(async () => {
      const runtime = await createRuntime();
      const { orchestratorService } = createQueueRuntime(runtime);

      logger.info(
        { intervalSeconds: env.APP_SCHEDULE_INTERVAL_SECONDS },
        "Scheduler started",
      );

      const tick = async () => {
        const date = defaultDate();
        await orchestratorService.enqueueForDate(date, "scrape");
        logger.info({ date }, "Scheduled scrape enqueued");
      };

      await tick();
      setInterval(() => {
        tick().catch((error: unknown) => {
          logger.error({ error: String(error) }, "Scheduler tick failed");
        });
      }, env.APP_SCHEDULE_INTERVAL_SECONDS * 1_000);
    });

  cli
    .command("status")
    .description("Report queue backlog and configuration")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const { queue } = createQueueRuntime(runtime);
        try {
          const queueCounts = await queue.getQueueCounts();
          logger.info(
            {
              storageProvider: env.STORAGE_PROVIDER,
              storageBasePath: env.STORAGE_BASE_PATH,
              storageLayout: env.STORAGE_LAYOUT,
              llmProvider: env.LLM_PROVIDER,
              ledgerProvider: env.LEDGER_PROVIDER,
              issuers: runtime.issuers.size,
              intervalSeconds: env.APP_SCHEDULE_INTERVAL_SECONDS,
              redis: env.REDIS_URL,
              queueCounts,
            },
            "Runtime status",
          );
        } finally {
          await queue.close();
        }
      });
    });

  cli
    .command("history")
    .description("List recent scrape runs from the run ledger")
    .option("--limit <n>", "Number of runs", parsePositiveInt, 10)
    .action(async (opts: { limit: number }) => {
      await withRuntime(async (runtime) => {
        if (env.LEDGER_PROVIDER === "none") {
          logger.warn("Run ledger disabled; set LEDGER_PROVIDER=postgres to record runs");
        }
        console.log(formatRunHistory(await runtime.ledger.listRecent(opts.limit)));
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
