import { err, ok, type Result } from "neverthrow";
import {
  describeError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  DisclosureDocument,
  DisclosureMetadata,
} from "../../core/entities/disclosure";
import type {
  ScrapeRunRecord,
  StoredDisclosureRecord,
} from "../../core/entities/pipelineRun";
import type {
  ClockPort,
  IdGeneratorPort,
  RunLedgerPort,
  StoragePort,
} from "../../core/ports/outboundPorts";
import {
  expandDateRange,
  validateCompactDate,
} from "../../core/rules/disclosureDates";
import {
  dateDocumentKey,
  metadataKey,
  type DateLayout,
} from "../../core/rules/storageKeys";
import { logger, toErrorDetails } from "../../shared/logger/logger";
import type { DisclosureDiscoveryService } from "./disclosureDiscoveryService";
import type { DocumentTransferService } from "./documentTransferService";

export type ScrapeOptions = {
  basePath: string;
  layout: DateLayout;
  batchSize: number;
};

export type DateScrapeSummary = {
  date: string;
  discovered: number;
  stored: number;
  failed: number;
  metadataKey: string | null;
};

/**
 * Date-range results keyed by date; `-1` marks a date whose run threw.
 */
export type RangeScrapeSummary = Record<string, number>;

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
};

const countBy = <T>(
  items: readonly T[],
  keyOf: (item: T) => string,
): Record<string, number> =>
  items.reduce<Record<string, number>>((counts, item) => {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
    return counts;
  }, {});

export const buildDisclosureMetadata = (
  date: string,
  stored: readonly DisclosureDocument[],
): DisclosureMetadata => ({
  date,
  total_documents: stored.length,
  document_types: countBy(stored, (document) => document.docType),
  companies: countBy(stored, (document) => document.code),
  documents: stored.map((document) => ({
    time: document.time,
    code: document.code,
    company_name: document.companyName,
    title: document.title,
    doc_type: document.docType,
    storage_path: document.storagePath ?? "",
  })),
});

/**
 * Daily scrape: discover, transfer in bounded batches, then write the metadata sidecar.
 */
export class DisclosureScrapeService {
  constructor(
    private readonly discovery: DisclosureDiscoveryService,
    private readonly transfer: DocumentTransferService,
    private readonly storage: StoragePort,
    private readonly ledger: RunLedgerPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly options: ScrapeOptions,
  ) {}

  async scrapeDate(
    date: string,
  ): Promise<Result<DateScrapeSummary, AppBoundaryError>> {
    const valid = validateCompactDate(date);
    if (valid.isErr()) {
      return err(valid.error);
    }

    const startedAt = this.clock.now();
    const documents = await this.discovery.discoverDate(date);
    const stored: DisclosureDocument[] = [];
    let failed = 0;

    const batches = chunk(documents, this.options.batchSize);
    for (const [index, batch] of batches.entries()) {
      const report = await this.transfer.transferBatch(batch, (document) =>
        dateDocumentKey(this.options.basePath, document, date, this.options.layout),
      );
      report.outcomes.forEach((outcome) => {
        if (outcome.success) {
          stored.push(outcome.document);
        }
      });
      failed += report.failed;
      logger.info(
        {
          date,
          batch: index + 1,
          batches: batches.length,
          succeeded: report.succeeded,
          failed: report.failed,
        },
        "Transfer batch finished",
      );
    }

    let sidecarKey: string | null = null;
    if (stored.length > 0) {
      const key = metadataKey(this.options.basePath, date);
      const written = await this.storage.putObject(
        key,
        JSON.stringify(buildDisclosureMetadata(date, stored), null, 2),
        "application/json",
      );
      if (written.isErr()) {
        return err(written.error);
      }
      sidecarKey = written.value;
      logger.info({ date, key }, "Metadata sidecar written");
    }

    const summary: DateScrapeSummary = {
      date,
      discovered: documents.length,
      stored: stored.length,
      failed,
      metadataKey: sidecarKey,
    };
    logger.info(summary, "Date scrape finished");

    await this.recordRun(summary, stored, startedAt);
    return ok(summary);
  }

  /**
   * Runs each date independently; a date that fails is recorded as `-1` and the range continues.
   */
  async scrapeDateRange(
    startDate: string,
    endDate: string,
  ): Promise<Result<RangeScrapeSummary, AppBoundaryError>> {
    const dates = expandDateRange(startDate, endDate);
    if (dates.isErr()) {
      return err(dates.error);
    }

    const results: RangeScrapeSummary = {};
    for (const date of dates.value) {
      try {
        const summary = await this.scrapeDate(date);
        if (summary.isErr()) {
          logger.error({ date, error: summary.error.message }, "Date scrape failed");
          results[date] = -1;
          continue;
        }
        results[date] = summary.value.stored;
      } catch (error) {
        logger.error({ date, error: toErrorDetails(error) }, "Date scrape failed");
        results[date] = -1;
      }
    }

    return ok(results);
  }

  private async recordRun(
    summary: DateScrapeSummary,
    stored: readonly DisclosureDocument[],
    startedAt: Date,
  ): Promise<void> {
    const run: ScrapeRunRecord = {
      id: this.ids.next(),
      date: summary.date,
      layout: this.options.layout,
      discovered: summary.discovered,
      stored: summary.stored,
      failed: summary.failed,
      status:
        summary.discovered > 0 && summary.stored === 0 ? "failed" : "completed",
      startedAt,
      finishedAt: this.clock.now(),
    };
    const records: StoredDisclosureRecord[] = stored.map((document) => ({
      runId: run.id,
      date: summary.date,
      code: document.code,
      companyName: document.companyName,
      title: document.title,
      docType: document.docType,
      storagePath: document.storagePath ?? "",
    }));

    try {
      await this.ledger.recordRun(run, records);
    } catch (error) {
      logger.error(
        { date: summary.date, error: describeError(error) },
        "Run ledger write failed",
      );
    }
  }
}
