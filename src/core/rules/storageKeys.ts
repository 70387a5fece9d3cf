import type { DisclosureDocument } from "../entities/disclosure";
import { UNKNOWN } from "../entities/issuer";
import { parseCompactDate, type DateParts } from "./disclosureDates";

export type DateLayout = "date" | "date-flat";

export const TITLE_MAX_LENGTH = 50;
export const COMPANY_MAX_LENGTH = 30;
const SAFE_NAME_MAX_LENGTH = 50;

const ILLEGAL_SEGMENT_CHARS = /[<>:"/\\|?*]/g;
const TRAILING_UNDERSCORES = /_+$/;
const SAFE_NAME_CHARS = /[\p{L}\p{N} _-]/u;

/**
 * Truncates by code point so multi-byte titles are never split mid-character.
 */
const truncate = (value: string, maxLength: number): string =>
  Array.from(value).slice(0, maxLength).join("");

/**
 * Strips path-illegal characters, replaces spaces, truncates and trims trailing underscores.
 */
export const sanitizeSegment = (value: string, maxLength: number): string =>
  truncate(value.replace(ILLEGAL_SEGMENT_CHARS, "").replaceAll(" ", "_"), maxLength)
    .replace(TRAILING_UNDERSCORES, "");

/**
 * Keeps letters, digits, space, hyphen and underscore for artifact file names.
 */
export const safeName = (value: string): string => {
  const kept = Array.from(value)
    .filter((char) => SAFE_NAME_CHARS.test(char))
    .join("");
  return truncate(kept.trim().replaceAll(" ", "_"), SAFE_NAME_MAX_LENGTH);
};

/**
 * Sector and size labels become directory names; only separators are removed.
 */
const directorySegment = (value: string): string => {
  const cleaned = value.replace(ILLEGAL_SEGMENT_CHARS, "").trim();
  return cleaned === "" ? UNKNOWN : cleaned;
};

const joinKey = (...parts: string[]): string =>
  parts.filter((part) => part !== "").join("/");

const datePartsOrThrow = (date: string): DateParts => {
  const parts = parseCompactDate(date);
  if (!parts) {
    throw new Error(`Invalid disclosure date '${date}'; expected YYYYMMDD.`);
  }
  return parts;
};

/**
 * `{base}/{yyyy}/{mm}/{dd}/{docType}/{code}_{title}.pdf`, or without `{docType}` in the flat layout.
 */
export const dateDocumentKey = (
  base: string,
  document: DisclosureDocument,
  date: string,
  layout: DateLayout,
): string => {
  const { yyyy, mm, dd } = datePartsOrThrow(date);
  const fileName = `${document.code}_${sanitizeSegment(document.title, TITLE_MAX_LENGTH)}.pdf`;

  return layout === "date"
    ? joinKey(base, yyyy, mm, dd, document.docType, fileName)
    : joinKey(base, yyyy, mm, dd, fileName);
};

export const sectorDocumentKey = (
  base: string,
  document: DisclosureDocument,
  sector: string,
  size: string,
): string => {
  const fileName = [
    document.code,
    sanitizeSegment(document.companyName, COMPANY_MAX_LENGTH),
    sanitizeSegment(document.title, TITLE_MAX_LENGTH),
  ].join("_");

  return joinKey(
    base,
    "sectors",
    directorySegment(sector),
    directorySegment(size),
    `${fileName}.pdf`,
  );
};

export const datePrefix = (base: string, date: string): string => {
  const { yyyy, mm, dd } = datePartsOrThrow(date);
  return `${joinKey(base, yyyy, mm, dd)}/`;
};

export const metadataKey = (base: string, date: string): string => {
  const { yyyy, mm, dd } = datePartsOrThrow(date);
  return joinKey(base, yyyy, mm, dd, `metadata_${date}.json`);
};

export const sectorsPrefix = (base: string): string =>
  `${joinKey(base, "sectors")}/`;

export const summariesPrefix = (base: string, date: string): string =>
  `${joinKey(base, "insights-summaries", date)}/`;

export type SummaryKeyParts = {
  date: string;
  sector: string;
  size: string;
  code: string;
  name: string;
};

export const summaryKey = (base: string, parts: SummaryKeyParts): string =>
  joinKey(
    base,
    "insights-summaries",
    parts.date,
    `${[
      parts.date,
      safeName(parts.sector),
      safeName(parts.size),
      parts.code,
      safeName(parts.name),
    ].join("__")}_summary.md`,
  );

/**
 * Reverses `summaryKey` for the sector-insight stage. Returns null for foreign file names.
 */
export const parseSummaryKey = (key: string): SummaryKeyParts | null => {
  const fileName = key.split("/").at(-1) ?? "";
  if (!fileName.endsWith("_summary.md")) {
    return null;
  }

  const parts = fileName.slice(0, -"_summary.md".length).split("__");
  const [date, sector, size, code] = parts;
  if (parts.length < 5 || !date || !sector || !size || !code) {
    return null;
  }

  return { date, sector, size, code, name: parts.slice(4).join("__") };
};

export const sectorInsightKey = (
  base: string,
  date: string,
  sectorSizeKey: string,
): string =>
  joinKey(base, "insights-sectors", date, `${safeName(sectorSizeKey)}_insights.md`);

export const timeseriesSummaryKey = (
  base: string,
  sector: string,
  size: string,
  code: string,
): string =>
  joinKey(
    base,
    "sectors-analysis",
    directorySegment(sector),
    directorySegment(size),
    `${code}_timeseries_summary.md`,
  );

export const sectorTimeseriesKey = (
  base: string,
  sector: string,
  size: string,
): string =>
  joinKey(
    base,
    "sectors-analysis",
    directorySegment(sector),
    directorySegment(size),
    "sector_timeseries_insights.md",
  );
