import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import {
  UNKNOWN,
  type IssuerDirectory,
  type IssuerInfo,
} from "../../../core/entities/issuer";
import { normalizeIssuerCode } from "../../../core/rules/issuerCode";
import { normalizeSizeClass } from "../../../core/rules/sizeClassification";

/**
 * Column headers of the exchange's listed-issues spreadsheet export.
 */
export const issuerCsvColumns = {
  code: "コード",
  name: "銘柄名",
  market: "市場・商品区分",
  sector: "33業種区分",
  size: "規模区分",
} as const;

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

const catalogError = (
  code: AppBoundaryError["code"],
  message: string,
  cause?: unknown,
): AppBoundaryError => ({
  source: "catalog",
  code,
  provider: "issuer-csv",
  message,
  retryable: false,
  cause,
});

const orUnknown = (value: string | undefined): string => {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" || trimmed === "-" ? UNKNOWN : trimmed;
};

/**
 * Parses the reference table into a directory keyed by normalized code. Rows without a code are skipped.
 */
export const parseIssuerCsv = (
  content: string,
): Result<IssuerDirectory, AppBoundaryError> => {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    return err(
      catalogError(
        "malformed_response",
        error instanceof Error ? error.message : "Issuer CSV could not be parsed.",
        error,
      ),
    );
  }

  const rows = csvRowsSchema.safeParse(records);
  if (!rows.success) {
    return err(catalogError("validation_error", rows.error.message, rows.error));
  }

  const directory = new Map<string, IssuerInfo>();
  rows.data.forEach((row) => {
    const code = normalizeIssuerCode(row[issuerCsvColumns.code] ?? "");
    if (code === "") {
      return;
    }

    directory.set(code, {
      code,
      name: orUnknown(row[issuerCsvColumns.name]),
      market: row[issuerCsvColumns.market]?.trim() ?? "",
      sector: orUnknown(row[issuerCsvColumns.sector]),
      size: normalizeSizeClass(row[issuerCsvColumns.size]),
    });
  });

  return ok(directory);
};

/**
 * Loads the reference table from disk once per process.
 */
export const loadIssuerDirectory = async (
  path: string,
): Promise<Result<IssuerDirectory, AppBoundaryError>> => {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    return err(catalogError("not_found", `Issuer CSV not readable at ${path}.`, error));
  }

  return parseIssuerCsv(content);
};

export const listUniqueMarkets = (directory: IssuerDirectory): string[] =>
  Array.from(
    new Set(
      Array.from(directory.values())
        .map((issuer) => issuer.market)
        .filter((market) => market !== ""),
    ),
  ).sort();
