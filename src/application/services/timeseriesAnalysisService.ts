import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import { UNKNOWN, type IssuerDirectory } from "../../core/entities/issuer";
import type {
  StoragePort,
  TextExtractorPort,
} from "../../core/ports/outboundPorts";
import { normalizeIssuerCode } from "../../core/rules/issuerCode";
import {
  renderTemplate,
  type PromptTemplates,
} from "../../core/rules/promptTemplates";
import { quarterLabel, sortByQuarter } from "../../core/rules/quarterSequencer";
import {
  sectorTimeseriesKey,
  sectorsPrefix,
  timeseriesSummaryKey,
} from "../../core/rules/storageKeys";
import { mapWithConcurrency } from "../../shared/concurrency/workerPool";
import { logger } from "../../shared/logger/logger";
import { extractionFailureMarker } from "./issuerSummaryService";
import type { RetryingSummarizer } from "./retryingSummarizer";

export type TimeseriesOptions = {
  basePath: string;
  extractionConcurrency: number;
  summaryConcurrency: number;
};

export type TimeseriesReport = {
  sectorGroups: number;
  analyzed: number;
  skipped: number;
  failed: number;
  issuerKeys: string[];
  sectorKeys: string[];
};

type SectorFiles = {
  sector: string;
  size: string;
  filesByCode: Map<string, string[]>;
};

type IssuerSeries = {
  sector: string;
  size: string;
  code: string;
  paths: string[];
};

type PreparedSeries = IssuerSeries & { sections: string[] };

const MARKDOWN = "text/markdown; charset=utf-8";
const MIN_SERIES_LENGTH = 2;

const fileNameOf = (key: string): string => key.split("/").at(-1) ?? key;

/**
 * Groups `{base}/sectors/{sector}/{size}/{file}.pdf` keys by sector, size and issuer code.
 */
export const groupSectorFiles = (prefix: string, keys: readonly string[]): SectorFiles[] => {
  const groups = new Map<string, SectorFiles>();

  for (const key of keys) {
    if (!key.startsWith(prefix) || !key.toLowerCase().endsWith(".pdf")) {
      continue;
    }

    const [sector, size, fileName, ...rest] = key.slice(prefix.length).split("/");
    if (!sector || !size || !fileName || rest.length > 0) {
      logger.debug({ key }, "Key outside the sector layout; skipping");
      continue;
    }

    const code = normalizeIssuerCode(fileName.split("_")[0] ?? "");
    const groupKey = `${sector}/${size}`;
    const group = groups.get(groupKey) ?? { sector, size, filesByCode: new Map<string, string[]>() };
    const files = group.filesByCode.get(code) ?? [];
    files.push(key);
    group.filesByCode.set(code, files);
    groups.set(groupKey, group);
  }

  return Array.from(groups.values());
};

export const documentListLine = (path: string, index: number): string =>
  `${index + 1}. **${quarterLabel(path)}**: ${fileNameOf(path)}`;

export const timeseriesSection = (path: string, text: string): string =>
  `=== ${quarterLabel(path)}: ${fileNameOf(path)} ===\n${text}`;

/**
 * Per-issuer change-over-time summaries from the sector-partitioned store,
 * followed by one time-series insight per sector and size class.
 */
export class TimeseriesAnalysisService {
  constructor(
    private readonly storage: StoragePort,
    private readonly extractor: TextExtractorPort,
    private readonly summarizer: RetryingSummarizer,
    private readonly issuers: IssuerDirectory,
    private readonly templates: PromptTemplates,
    private readonly options: TimeseriesOptions,
  ) {}

  async analyze(): Promise<Result<TimeseriesReport, AppBoundaryError>> {
    const prefix = sectorsPrefix(this.options.basePath);
    const listed = await this.storage.listKeys(prefix);
    if (listed.isErr()) {
      return err(listed.error);
    }

    const sectorGroups = groupSectorFiles(prefix, listed.value);
    const report: TimeseriesReport = {
      sectorGroups: sectorGroups.length,
      analyzed: 0,
      skipped: 0,
      failed: 0,
      issuerKeys: [],
      sectorKeys: [],
    };

    for (const group of sectorGroups) {
      const series: IssuerSeries[] = [];
      group.filesByCode.forEach((paths, code) => {
        if (paths.length < MIN_SERIES_LENGTH) {
          report.skipped += 1;
          return;
        }
        series.push({ sector: group.sector, size: group.size, code, paths: sortByQuarter(paths) });
      });

      logger.info(
        { sector: group.sector, size: group.size, issuers: series.length },
        "Time-series analysis started for sector",
      );

      const { prepared, unreadable } = await this.extractSeries(series);
      unreadable.forEach((issuer) => {
        report.failed += 1;
        logger.error(
          { code: issuer.code, reason: `No document text could be extracted for ${issuer.code}.` },
          "Time-series summary failed",
        );
      });

      const settled = await mapWithConcurrency(
        prepared,
        this.options.summaryConcurrency,
        async (issuer) => this.summarizeIssuer(issuer),
      );

      const summaries: string[] = [];
      settled.forEach((item, index) => {
        const issuer = prepared[index];
        if (item.status === "fulfilled" && item.value.isOk()) {
          summaries.push(item.value.value.summary);
          report.issuerKeys.push(item.value.value.key);
          report.analyzed += 1;
          return;
        }

        report.failed += 1;
        logger.error(
          {
            code: issuer?.code,
            reason:
              item.status === "rejected"
                ? String(item.reason)
                : item.value.isErr()
                  ? item.value.error.message
                  : "unknown failure",
          },
          "Time-series summary failed",
        );
      });

      if (summaries.length === 0) {
        continue;
      }

      const sectorKey = await this.writeSectorInsight(group, summaries);
      if (sectorKey.isErr()) {
        logger.error(
          { sector: group.sector, size: group.size, reason: sectorKey.error.message },
          "Sector time-series insight failed",
        );
        continue;
      }
      report.sectorKeys.push(sectorKey.value);
    }

    return ok(report);
  }

  /**
   * Extracts every document of a sector group in one bounded pool. Sections keep
   * each issuer's quarter order; failed documents become error markers.
   */
  private async extractSeries(
    series: IssuerSeries[],
  ): Promise<{ prepared: PreparedSeries[]; unreadable: IssuerSeries[] }> {
    const jobs = series.flatMap((issuer, issuerIndex) =>
      issuer.paths.map((path) => ({ issuerIndex, path })),
    );

    const results = await mapWithConcurrency(
      jobs,
      this.options.extractionConcurrency,
      async ({ path }) => this.extractor.extractText(path),
    );

    const sectionsByIssuer = series.map((): string[] => []);
    const extractedByIssuer = series.map(() => 0);
    jobs.forEach(({ issuerIndex, path }, index) => {
      const result = results[index];
      if (result?.status === "fulfilled" && result.value.isOk()) {
        extractedByIssuer[issuerIndex] = (extractedByIssuer[issuerIndex] ?? 0) + 1;
        sectionsByIssuer[issuerIndex]?.push(timeseriesSection(path, result.value.value));
        return;
      }
      logger.warn({ code: series[issuerIndex]?.code, path }, "Text extraction failed");
      sectionsByIssuer[issuerIndex]?.push(
        timeseriesSection(path, extractionFailureMarker(fileNameOf(path))),
      );
    });

    const prepared: PreparedSeries[] = [];
    const unreadable: IssuerSeries[] = [];
    series.forEach((issuer, issuerIndex) => {
      if ((extractedByIssuer[issuerIndex] ?? 0) === 0) {
        unreadable.push(issuer);
        return;
      }
      prepared.push({ ...issuer, sections: sectionsByIssuer[issuerIndex] ?? [] });
    });

    return { prepared, unreadable };
  }

  private async summarizeIssuer(
    issuer: PreparedSeries,
  ): Promise<Result<{ key: string; summary: string }, AppBoundaryError>> {
    const summary = await this.summarizer.summarize({
      system: this.templates.timeseriesSystem,
      user: renderTemplate(this.templates.timeseriesUser, {
        company_code: issuer.code,
        company_name: this.issuers.get(issuer.code)?.name ?? UNKNOWN,
        sector_name: issuer.sector,
        document_list: issuer.paths.map(documentListLine).join("\n"),
      }),
      content: issuer.sections.join("\n\n"),
    });
    if (summary.isErr()) {
      return err(summary.error);
    }

    const key = await this.storage.putObject(
      timeseriesSummaryKey(this.options.basePath, issuer.sector, issuer.size, issuer.code),
      summary.value,
      MARKDOWN,
    );
    return key.map((written) => ({ key: written, summary: summary.value }));
  }

  private async writeSectorInsight(
    group: SectorFiles,
    summaries: string[],
  ): Promise<Result<string, AppBoundaryError>> {
    const variables = {
      sector_name: `${group.sector}_${group.size}_時系列分析`,
      count: String(summaries.length),
      summaries: summaries.join("\n\n"),
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
      sectorTimeseriesKey(this.options.basePath, group.sector, group.size),
      insight.value,
      MARKDOWN,
    );
  }
}
