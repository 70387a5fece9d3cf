import * as cheerio from "cheerio";
import type { ListingRow } from "../../../core/entities/disclosure";

const MIN_CELLS = 6;
const HEADER_LABELS = ["時刻", "コード", "会社名", "タイトル"] as const;

/**
 * Resolves a title-cell href against the listing directory:
 * "/x.pdf" is site-absolute, "x.pdf" is relative to the listing page.
 */
export const resolvePdfUrl = (
  href: string | undefined,
  listingBaseUrl: string,
): string | undefined => {
  const trimmed = href?.trim();
  if (!trimmed) {
    return undefined;
  }

  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  const directory = listingBaseUrl.endsWith("/")
    ? listingBaseUrl
    : `${listingBaseUrl}/`;

  try {
    return new URL(trimmed, directory).toString();
  } catch {
    return undefined;
  }
};

/**
 * Extracts every disclosure row of a listing page. Rows with fewer than six
 * cells and header-like rows are dropped; classification happens later.
 */
export const parseListingHtml = (
  html: string,
  listingBaseUrl: string,
): ListingRow[] => {
  const $ = cheerio.load(html);
  const rows: ListingRow[] = [];

  $("tr").each((_, row) => {
    const cells = $(row).children("td");
    if (cells.length < MIN_CELLS) {
      return;
    }

    const texts = HEADER_LABELS.map((_label, index) =>
      cells.eq(index).text().trim(),
    );
    const isHeaderLike = texts.some(
      (text, index) => text === "" || text === HEADER_LABELS[index],
    );
    if (isHeaderLike) {
      return;
    }

    const [time = "", code = "", companyName = "", title = ""] = texts;
    const href = cells.eq(3).find("a").first().attr("href");

    rows.push({
      time,
      code,
      companyName,
      title,
      pdfUrl: resolvePdfUrl(href, listingBaseUrl),
    });
  });

  return rows;
};
