import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CatalogDocument,
  DocumentGroup,
  GroupFilters,
} from "../../core/entities/documentGroup";
import type { IssuerDirectory } from "../../core/entities/issuer";
import type { DocumentCatalogPort } from "../../core/ports/inboundPorts";
import type {
  StoragePort,
  TextExtractorPort,
} from "../../core/ports/outboundPorts";
import { expandDateRange } from "../../core/rules/disclosureDates";
import { groupDocumentsByIssuer } from "../../core/rules/documentGrouper";
import {
  renderTemplate,
  type PromptTemplates,
} from "../../core/rules/promptTemplates";
import { usesFullSummaryPrompt } from "../../core/rules/sizeClassification";
import { summaryKey } from "../../core/rules/storageKeys";
import { mapWithConcurrency } from "../../shared/concurrency/workerPool";
import { logger } from "../../shared/logger/logger";
import type { RetryingSummarizer } from "./retryingSummarizer";

export type IssuerSummaryOptions = {
  basePath: string;
  extractionConcurrency: number;
  summaryConcurrency: number;
};

export type IssuerSummaryReport = {
  outputDate: string;
  groups: number;
  summarized: number;
  failed: number;
  keys: string[];
};

type ExtractedText = { text: string; ok: boolean };

const MARKDOWN = "text/markdown; charset=utf-8";

export const documentSection = (title: string, text: string): string =>
  `--- 文書: ${title} ---\n${text}`;

export const extractionFailureMarker = (title: string): string =>
  `--- テキスト抽出エラー: ${title} ---\n`;

/**
 * Per-issuer summaries over a date range. Artifacts are keyed by the range's last date.
 */
export class IssuerSummaryService {
  constructor(
    private readonly catalog: DocumentCatalogPort,
    private readonly extractor: TextExtractorPort,
    private readonly summarizer: RetryingSummarizer,
    private readonly storage: StoragePort,
    private readonly issuers: IssuerDirectory,
    private readonly templates: PromptTemplates,
    private readonly options: IssuerSummaryOptions,
  ) {}

  async summarizeRange(
    startDate: string,
    endDate: string,
    filters: GroupFilters = {},
  ): Promise<Result<IssuerSummaryReport, AppBoundaryError>> {
    const dates = expandDateRange(startDate, endDate);
    if (dates.isErr()) {
      return err(dates.error);
    }
    const outputDate = dates.value.at(-1) ?? endDate;

    const documents = await this.catalog.listDocuments(dates.value);
    if (documents.isErr()) {
      return err(documents.error);
    }

    const groups = groupDocumentsByIssuer(documents.value, this.issuers, filters);
    logger.info(
      { startDate, endDate, documents: documents.value.length, groups: groups.length },
      "Documents grouped by issuer",
    );

    // All extractions finish before any model call starts.
    const extractable = await this.extractGroups(groups);

    const keys = new Map<number, string>();
    let failed = groups.length - extractable.length;
    const settled = await mapWithConcurrency(
      extractable,
      this.options.summaryConcurrency,
      async (group) => this.summarizeGroup(group, outputDate),
    );

    settled.forEach((item, index) => {
      const group = extractable[index];
      if (item.status === "fulfilled" && item.value.isOk()) {
        keys.set(index, item.value.value);
        logger.info(
          { code: group?.code, done: keys.size, total: extractable.length },
          "Issuer summary written",
        );
        return;
      }

      failed += 1;
      logger.error(
        {
          code: group?.code,
          reason:
            item.status === "fulfilled"
              ? item.value.isErr()
                ? item.value.error.message
                : "unknown failure"
              : String(item.reason),
        },
        "Issuer summary failed",
      );
    });

    return ok({
      outputDate,
      groups: groups.length,
      summarized: keys.size,
      failed,
      keys: extractable.flatMap((_, index) => keys.get(index) ?? []),
    });
  }

  /**
   * Extracts every document with one bounded pool, then joins each group's texts in document order.
   * Groups whose documents all failed extraction are dropped.
   */
  private async extractGroups(groups: DocumentGroup[]): Promise<DocumentGroup[]> {
    const jobs = groups.flatMap((group, groupIndex) =>
      group.documents.map((document) => ({ groupIndex, document })),
    );

    const results = await mapWithConcurrency(
      jobs,
      this.options.extractionConcurrency,
      async ({ document }) => this.extractOne(document),
    );

    const textsByGroup = groups.map((): ExtractedText[] => []);
    jobs.forEach((job, index) => {
      const result = results[index];
      const extracted: ExtractedText =
        result?.status === "fulfilled"
          ? result.value
          : { text: extractionFailureMarker(job.document.title), ok: false };
      textsByGroup[job.groupIndex]?.push(extracted);
    });

    return groups.filter((group, groupIndex) => {
      const texts = textsByGroup[groupIndex] ?? [];
      if (!texts.some((text) => text.ok)) {
        logger.warn({ code: group.code }, "No document text could be extracted; skipping issuer");
        return false;
      }

      group.combinedText = texts
        .map((text, index) =>
          documentSection(group.documents[index]?.title ?? "", text.text),
        )
        .join("\n\n");
      return true;
    });
  }

  private async extractOne(document: CatalogDocument): Promise<ExtractedText> {
    const text = await this.extractor.extractText(document.path);
    if (text.isErr()) {
      logger.warn(
        { code: document.code, path: document.path, reason: text.error.message },
        "Text extraction failed",
      );
      return { text: extractionFailureMarker(document.title), ok: false };
    }
    return { text: text.value, ok: true };
  }

  private async summarizeGroup(
    group: DocumentGroup,
    outputDate: string,
  ): Promise<Result<string, AppBoundaryError>> {
    const fullPrompt = usesFullSummaryPrompt(group.size);
    logger.debug({ code: group.code, size: group.size, fullPrompt }, "Summary prompt selected");

    const summary = await this.summarizer.summarize({
      system: fullPrompt
        ? this.templates.summarySystem
        : this.templates.summarySystemCompact,
      user: renderTemplate(this.templates.summaryUser, {
        company_code: group.code,
        company_name: group.name,
        sector_name: group.sector,
        titles: group.documents.map((document) => `- ${document.title}`).join("\n"),
      }),
      content: group.combinedText,
    });
    if (summary.isErr()) {
      return err(summary.error);
    }
    group.summary = summary.value;

    return this.storage.putObject(
      summaryKey(this.options.basePath, {
        date: outputDate,
        sector: group.sector,
        size: group.size,
        code: group.code,
        name: group.name,
      }),
      summary.value,
      MARKDOWN,
    );
  }
}
