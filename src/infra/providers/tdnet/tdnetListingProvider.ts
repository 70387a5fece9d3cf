import { ok, err, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { ListingRow } from "../../../core/entities/disclosure";
import type { ListingProviderPort } from "../../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../../http/httpClient";
import { parseListingHtml } from "./listingParser";

export const listingPageUrl = (
  baseUrl: string,
  page: number,
  date: string,
): string =>
  `${baseUrl.replace(/\/+$/, "")}/I_list_${String(page).padStart(3, "0")}_${date}.html`;

/**
 * Reads the exchange's daily disclosure listing pages.
 */
export class TdnetListingProvider implements ListingProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  /**
   * Any non-success status means the page does not exist; transport failures surface as errors.
   */
  async fetchListingPage(
    page: number,
    date: string,
  ): Promise<Result<ListingRow[] | null, AppBoundaryError>> {
    const response = await this.httpClient.requestText({
      url: listingPageUrl(this.baseUrl, page, date),
      method: "GET",
      headers: { "user-agent": this.userAgent },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      if (response.error.code === "non_success_status") {
        return ok(null);
      }

      return err(toBoundaryError("listing", "tdnet", response.error));
    }

    return ok(parseListingHtml(response.value, this.baseUrl));
  }
}
