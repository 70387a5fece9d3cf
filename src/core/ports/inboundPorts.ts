import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { ListingRow } from "../entities/disclosure";
import type { CatalogDocument } from "../entities/documentGroup";

/**
 * Fetches one listing page. `ok(null)` means the page does not exist; an
 * error means the fetch itself failed.
 */
export interface ListingProviderPort {
  fetchListingPage(
    page: number,
    date: string,
  ): Promise<Result<ListingRow[] | null, AppBoundaryError>>;
}

/**
 * Lists previously stored documents for the summarization stages.
 */
export interface DocumentCatalogPort {
  listDocuments(
    dates: string[],
  ): Promise<Result<CatalogDocument[], AppBoundaryError>>;
}
