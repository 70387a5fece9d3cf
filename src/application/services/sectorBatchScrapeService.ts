import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { DisclosureDocument } from "../../core/entities/disclosure";
import { UNKNOWN, type IssuerDirectory } from "../../core/entities/issuer";
import { expandDateRange } from "../../core/rules/disclosureDates";
import { normalizeIssuerCode } from "../../core/rules/issuerCode";
import { sectorDocumentKey } from "../../core/rules/storageKeys";
import { logger } from "../../shared/logger/logger";
import type { DisclosureDiscoveryService } from "./disclosureDiscoveryService";
import { chunk } from "./disclosureScrapeService";
import type { DocumentTransferService } from "./documentTransferService";

export type SectorScrapeSummary = {
  discoveredByDate: Record<string, number>;
  discovered: number;
  stored: number;
  failed: number;
};

/**
 * Collects a whole date range first, then stores every document under its issuer's sector and size.
 */
export class SectorBatchScrapeService {
  constructor(
    private readonly discovery: DisclosureDiscoveryService,
    private readonly transfer: DocumentTransferService,
    private readonly issuers: IssuerDirectory,
    private readonly basePath: string,
    private readonly batchSize: number,
  ) {}

  async scrapeRange(
    startDate: string,
    endDate: string,
  ): Promise<Result<SectorScrapeSummary, AppBoundaryError>> {
    const dates = expandDateRange(startDate, endDate);
    if (dates.isErr()) {
      return err(dates.error);
    }

    const discoveredByDate: Record<string, number> = {};
    const documents: DisclosureDocument[] = [];
    for (const date of dates.value) {
      const found = await this.discovery.discoverDate(date);
      discoveredByDate[date] = found.length;
      documents.push(...found);
    }

    logger.info(
      { startDate, endDate, discovered: documents.length },
      "Sector batch collection finished",
    );

    let stored = 0;
    let failed = 0;
    for (const batch of chunk(documents, this.batchSize)) {
      const report = await this.transfer.transferBatch(batch, (document) =>
        this.keyFor(document),
      );
      stored += report.succeeded;
      failed += report.failed;
    }

    logger.info(
      { startDate, endDate, stored, failed },
      "Sector batch scrape finished",
    );
    return ok({ discoveredByDate, discovered: documents.length, stored, failed });
  }

  private keyFor(document: DisclosureDocument): string {
    const issuer = this.issuers.get(normalizeIssuerCode(document.code));
    return sectorDocumentKey(
      this.basePath,
      document,
      issuer?.sector ?? UNKNOWN,
      issuer?.size ?? UNKNOWN,
    );
  }
}
