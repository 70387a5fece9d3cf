export const docTypes = [
  "tanshin",
  "presentation",
  "dividend",
  "other",
] as const;

/**
 * Coarse disclosure category: tanshin is the quarterly/annual financial results report.
 */
export type DocType = (typeof docTypes)[number];

/**
 * One row of a listing page after cell extraction, before classification.
 */
export type ListingRow = {
  time: string;
  code: string;
  companyName: string;
  title: string;
  pdfUrl?: string;
};

export type DisclosureDocument = {
  readonly time: string;
  readonly code: string;
  readonly companyName: string;
  readonly title: string;
  readonly docType: DocType;
  readonly pdfUrl?: string;
  readonly storagePath?: string;
};

export type TransferOutcome = {
  document: DisclosureDocument;
  success: boolean;
  message: string;
};

export type TransferReport = {
  processed: number;
  succeeded: number;
  failed: number;
  outcomes: TransferOutcome[];
};

/**
 * Sidecar JSON written next to a date's stored documents.
 */
export type DisclosureMetadata = {
  date: string;
  total_documents: number;
  document_types: Record<string, number>;
  companies: Record<string, number>;
  documents: Array<{
    time: string;
    code: string;
    company_name: string;
    title: string;
    doc_type: DocType;
    storage_path: string;
  }>;
};
