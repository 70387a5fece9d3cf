import { basename } from "node:path";
import fg from "fast-glob";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CatalogDocument } from "../../../core/entities/documentGroup";
import type { DocumentCatalogPort } from "../../../core/ports/inboundPorts";

/**
 * `7203_決算短信.pdf` → code `7203`, title `決算短信`. Names without `_` use the stem for both.
 */
export const documentFromFileName = (relativePath: string): CatalogDocument => {
  const fileName = basename(relativePath);
  const stem = fileName.replace(/\.pdf$/i, "");
  const separator = stem.indexOf("_");

  return {
    code: separator >= 0 ? stem.slice(0, separator) : stem,
    companyName: "",
    title: separator >= 0 ? stem.slice(separator + 1) : stem,
    docType: "tanshin",
    path: relativePath,
  };
};

/**
 * Treats every PDF below a directory as a financial-results document, regardless of date.
 * Paths are relative to the directory so a storage rooted there can read them.
 */
export class LocalDirectoryCatalog implements DocumentCatalogPort {
  constructor(private readonly directory: string) {}

  async listDocuments(
    _dates: string[],
  ): Promise<Result<CatalogDocument[], AppBoundaryError>> {
    try {
      const files = await fg("**/*.{pdf,PDF}", {
        cwd: this.directory,
        onlyFiles: true,
      });
      return ok(files.sort().map(documentFromFileName));
    } catch (error) {
      return err({
        source: "catalog",
        code: "not_found",
        provider: "local-dir",
        message: `Local directory ${this.directory} could not be read.`,
        retryable: false,
        cause: error,
      });
    }
  }
}
