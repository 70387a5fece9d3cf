import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export type DateParts = { yyyy: string; mm: string; dd: string };

const tokyoDateFormat = new Intl.DateTimeFormat("en-CA", {
  timeZone: "Asia/Tokyo",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
});

/**
 * Splits a YYYYMMDD string, rejecting impossible calendar dates such as 20240230.
 */
export const parseCompactDate = (value: string): DateParts | null => {
  const match = COMPACT_DATE.exec(value);
  const yyyy = match?.[1];
  const mm = match?.[2];
  const dd = match?.[3];
  if (!yyyy || !mm || !dd) {
    return null;
  }

  const asUtc = new Date(Date.UTC(Number(yyyy), Number(mm) - 1, Number(dd)));
  if (
    asUtc.getUTCFullYear() !== Number(yyyy) ||
    asUtc.getUTCMonth() !== Number(mm) - 1 ||
    asUtc.getUTCDate() !== Number(dd)
  ) {
    return null;
  }

  return { yyyy, mm, dd };
};

const toUtcMs = (parts: DateParts): number =>
  Date.UTC(Number(parts.yyyy), Number(parts.mm) - 1, Number(parts.dd));

const formatUtc = (ms: number): string =>
  new Date(ms).toISOString().slice(0, 10).replaceAll("-", "");

/**
 * The exchange publishes on Tokyo time, so "today" is the Tokyo calendar date.
 */
export const todayInTokyo = (now: Date): string =>
  tokyoDateFormat.format(now).replaceAll("-", "");

const invalidDate = (message: string): AppBoundaryError => ({
  source: "config",
  code: "config_invalid",
  provider: "cli",
  message,
  retryable: false,
});

export const validateCompactDate = (
  value: string,
): Result<string, AppBoundaryError> =>
  parseCompactDate(value)
    ? ok(value)
    : err(invalidDate(`Invalid date '${value}'; expected YYYYMMDD.`));

/**
 * Expands an inclusive YYYYMMDD range into each calendar day.
 */
export const expandDateRange = (
  start: string,
  end: string,
): Result<string[], AppBoundaryError> => {
  const startParts = parseCompactDate(start);
  const endParts = parseCompactDate(end);
  if (!startParts || !endParts) {
    return err(
      invalidDate(`Invalid date range '${start}'..'${end}'; expected YYYYMMDD.`),
    );
  }

  const from = toUtcMs(startParts);
  const to = toUtcMs(endParts);
  if (from > to) {
    return err(invalidDate(`Start date ${start} is after end date ${end}.`));
  }

  const dates: string[] = [];
  for (let current = from; current <= to; current += DAY_MS) {
    dates.push(formatUtc(current));
  }

  return ok(dates);
};
