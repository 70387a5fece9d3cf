import type {
  CatalogDocument,
  DocumentGroup,
  GroupFilters,
} from "../entities/documentGroup";
import { UNKNOWN, type IssuerDirectory } from "../entities/issuer";
import { normalizeIssuerCode } from "./issuerCode";

const matchesFilters = (
  document: CatalogDocument,
  filters: GroupFilters,
  allowedCodes: ReadonlySet<string> | null,
): boolean => {
  if (
    filters.include &&
    !document.title.includes(filters.include) &&
    !document.path.includes(filters.include)
  ) {
    return false;
  }

  if (allowedCodes && !allowedCodes.has(normalizeIssuerCode(document.code))) {
    return false;
  }

  return true;
};

/**
 * Partitions documents into one group per normalized issuer code, in discovery order.
 * Filters apply before grouping; `maxGroups` keeps the first N groups.
 */
export const groupDocumentsByIssuer = (
  documents: readonly CatalogDocument[],
  issuers: IssuerDirectory,
  filters: GroupFilters = {},
): DocumentGroup[] => {
  const allowedCodes =
    filters.codes && filters.codes.length > 0
      ? new Set(filters.codes.map(normalizeIssuerCode))
      : null;

  const groups = new Map<string, DocumentGroup>();

  documents
    .filter((document) => matchesFilters(document, filters, allowedCodes))
    .forEach((document) => {
      const code = normalizeIssuerCode(document.code);
      const existing = groups.get(code);
      if (existing) {
        existing.documents.push(document);
        return;
      }

      const issuer = issuers.get(code);
      groups.set(code, {
        code,
        name: issuer?.name ?? UNKNOWN,
        sector: issuer?.sector ?? UNKNOWN,
        size: issuer?.size ?? UNKNOWN,
        documents: [document],
        combinedText: "",
        summary: "",
      });
    });

  const grouped = Array.from(groups.values());
  return filters.maxGroups !== undefined && filters.maxGroups > 0
    ? grouped.slice(0, filters.maxGroups)
    : grouped;
};
