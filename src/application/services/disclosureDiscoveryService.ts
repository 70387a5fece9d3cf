import type {
  DisclosureDocument,
  ListingRow,
} from "../../core/entities/disclosure";
import type { ListingProviderPort } from "../../core/ports/inboundPorts";
import { classifyDisclosureTitle } from "../../core/rules/documentClassifier";
import { normalizeIssuerCode } from "../../core/rules/issuerCode";
import { isExcludedByMarket } from "../../core/rules/marketFilter";
import { logger } from "../../shared/logger/logger";

/**
 * Listing page indices are three digits wide.
 */
export const MAX_LISTING_PAGE = 999;

export type PageReport = {
  page: number;
  extracted: number;
  classified: number;
  excluded: number;
  documents: DisclosureDocument[];
};

/**
 * Walks a date's listing pages in order and keeps the classified, non-excluded documents.
 */
export class DisclosureDiscoveryService {
  constructor(
    private readonly listing: ListingProviderPort,
    private readonly markets: ReadonlyMap<string, string>,
    private readonly excludedMarkets: ReadonlySet<string>,
  ) {}

  /**
   * Page 1 doubles as the existence probe; pagination stops at the first page
   * that is absent or has no extractable rows.
   */
  async discoverDate(
    date: string,
    onPage?: (report: PageReport) => void,
  ): Promise<DisclosureDocument[]> {
    const documents: DisclosureDocument[] = [];
    logger.info({ date }, "Listing pagination started");

    for (let page = 1; page <= MAX_LISTING_PAGE; page += 1) {
      const response = await this.listing.fetchListingPage(page, date);

      if (response.isErr()) {
        logger.warn(
          { date, page, code: response.error.code, reason: response.error.message },
          "Listing page fetch failed; treating as end of listing",
        );
        break;
      }

      const rows = response.value;
      if (rows === null || rows.length === 0) {
        logger.info(
          { date, page, pages: page - 1, documents: documents.length },
          page === 1 ? "No listing published for date" : "Listing pagination finished",
        );
        break;
      }

      const report = this.filterPage(page, rows);
      logger.debug(
        {
          date,
          page,
          extracted: report.extracted,
          classified: report.classified,
          excluded: report.excluded,
        },
        "Listing page processed",
      );
      onPage?.(report);
      documents.push(...report.documents);
    }

    return documents;
  }

  private filterPage(page: number, rows: ListingRow[]): PageReport {
    let classified = 0;
    let excluded = 0;
    const documents: DisclosureDocument[] = [];

    rows.forEach((row) => {
      const docType = classifyDisclosureTitle(row.title);
      if (docType === null) {
        return;
      }
      classified += 1;

      const rawCode = row.code.trim().toUpperCase();
      if (
        isExcludedByMarket(
          rawCode,
          normalizeIssuerCode(rawCode),
          this.markets,
          this.excludedMarkets,
        )
      ) {
        excluded += 1;
        logger.debug({ code: rawCode }, "Issuer excluded by market");
        return;
      }

      documents.push({
        time: row.time,
        code: rawCode,
        companyName: row.companyName,
        title: row.title,
        docType,
        pdfUrl: row.pdfUrl,
      });
    });

    return { page, extracted: rows.length, classified, excluded, documents };
  }
}
