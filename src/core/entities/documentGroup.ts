/**
 * A document as seen by the summarization stages: either read from a metadata
 * sidecar or discovered by walking a local directory.
 */
export type CatalogDocument = {
  code: string;
  companyName: string;
  title: string;
  docType: string;
  path: string;
};

export type DocumentGroup = {
  code: string;
  name: string;
  sector: string;
  size: string;
  documents: CatalogDocument[];
  combinedText: string;
  summary: string;
};

export type GroupFilters = {
  include?: string;
  codes?: string[];
  maxGroups?: number;
};
