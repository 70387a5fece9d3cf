import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StoragePort } from "../../core/ports/outboundPorts";
import { validateCompactDate } from "../../core/rules/disclosureDates";
import {
  renderTemplate,
  type PromptTemplates,
} from "../../core/rules/promptTemplates";
import {
  parseSummaryKey,
  sectorInsightKey,
  summariesPrefix,
} from "../../core/rules/storageKeys";
import { mapWithConcurrency } from "../../shared/concurrency/workerPool";
import { logger } from "../../shared/logger/logger";
import type { RetryingSummarizer } from "./retryingSummarizer";

export type SectorInsightReport = {
  sectors: number;
  written: number;
  failed: number;
  keys: string[];
};

const MARKDOWN = "text/markdown; charset=utf-8";

/**
 * Rolls a date's issuer summaries up into one insight per sector and size class.
 */
export class SectorInsightService {
  constructor(
    private readonly storage: StoragePort,
    private readonly summarizer: RetryingSummarizer,
    private readonly templates: PromptTemplates,
    private readonly basePath: string,
    private readonly concurrency: number,
  ) {}

  async generateForDate(
    date: string,
  ): Promise<Result<SectorInsightReport, AppBoundaryError>> {
    const valid = validateCompactDate(date);
    if (valid.isErr()) {
      return err(valid.error);
    }

    const summaries = await this.collectSummaries(date);
    if (summaries.isErr()) {
      return err(summaries.error);
    }

    const sectors = Array.from(summaries.value.entries());
    if (sectors.length === 0) {
      logger.warn({ date }, "No issuer summaries found for date");
      return ok({ sectors: 0, written: 0, failed: 0, keys: [] });
    }

    const settled = await mapWithConcurrency(
      sectors,
      this.concurrency,
      async ([sectorSizeKey, texts]) => this.writeInsight(date, sectorSizeKey, texts),
    );

    const keys: string[] = [];
    settled.forEach((item, index) => {
      const sectorSizeKey = sectors[index]?.[0];
      if (item.status === "fulfilled" && item.value.isOk()) {
        keys.push(item.value.value);
        logger.info({ date, sectorSizeKey, key: item.value.value }, "Sector insight written");
        return;
      }
      logger.error(
        {
          date,
          sectorSizeKey,
          reason:
            item.status === "rejected"
              ? String(item.reason)
              : item.value.isErr()
                ? item.value.error.message
                : "unknown failure",
        },
        "Sector insight failed",
      );
    });

    return ok({
      sectors: sectors.length,
      written: keys.length,
      failed: sectors.length - keys.length,
      keys,
    });
  }

  /**
   * Summary texts grouped by `{sector}_{size}` as encoded in the artifact file names.
   */
  private async collectSummaries(
    date: string,
  ): Promise<Result<Map<string, string[]>, AppBoundaryError>> {
    const listed = await this.storage.listKeys(summariesPrefix(this.basePath, date));
    if (listed.isErr()) {
      return err(listed.error);
    }

    const grouped = new Map<string, string[]>();
    for (const key of listed.value) {
      const parts = parseSummaryKey(key);
      if (!parts) {
        logger.warn({ key }, "Unrecognized summary file name; skipping");
        continue;
      }

      const body = await this.storage.getObject(key);
      if (body.isErr()) {
        logger.error({ key, reason: body.error.message }, "Summary read failed; skipping");
        continue;
      }

      const sectorSizeKey = `${parts.sector}_${parts.size}`;
      const texts = grouped.get(sectorSizeKey) ?? [];
      texts.push(new TextDecoder().decode(body.value));
      grouped.set(sectorSizeKey, texts);
    }

    return ok(grouped);
  }

  private async writeInsight(
    date: string,
    sectorSizeKey: string,
    texts: string[],
  ): Promise<Result<string, AppBoundaryError>> {
    const variables = {
      sector_name: sectorSizeKey,
      count: String(texts.length),
      summaries: texts.join("\n\n"),
    };

    const insight = await this.summarizer.summarize({
      system: renderTemplate(this.templates.sectorSystem, variables),
      user: renderTemplate(this.templates.sectorUser, variables),
      content: "",
    });
    if (insight.isErr()) {
      return err(insight.error);
    }

    return this.storage.putObject(
      sectorInsightKey(this.basePath, date, sectorSizeKey),
      insight.value,
      MARKDOWN,
    );
  }
}
