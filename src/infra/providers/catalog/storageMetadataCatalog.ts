import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CatalogDocument } from "../../../core/entities/documentGroup";
import type { DocumentCatalogPort } from "../../../core/ports/inboundPorts";
import type { StoragePort } from "../../../core/ports/outboundPorts";
import { metadataKey } from "../../../core/rules/storageKeys";
import { logger } from "../../../shared/logger/logger";

const metadataSchema = z.object({
  date: z.string(),
  documents: z.array(
    z.object({
      code: z.coerce.string(),
      company_name: z.string().default(""),
      title: z.string().default(""),
      doc_type: z.string().default("other"),
      storage_path: z.string().default(""),
    }),
  ),
});

const metadataError = (
  code: AppBoundaryError["code"],
  message: string,
  cause?: unknown,
): AppBoundaryError => ({
  source: "catalog",
  code,
  provider: "metadata",
  message,
  retryable: false,
  cause,
});

/**
 * Reads the per-date metadata sidecars written by the scrape stage.
 */
export class StorageMetadataCatalog implements DocumentCatalogPort {
  constructor(
    private readonly storage: StoragePort,
    private readonly basePath: string,
  ) {}

  /**
   * Dates without a sidecar are skipped with a warning.
   */
  async listDocuments(
    dates: string[],
  ): Promise<Result<CatalogDocument[], AppBoundaryError>> {
    const documents: CatalogDocument[] = [];

    for (const date of dates) {
      const key = metadataKey(this.basePath, date);
      const object = await this.storage.getObject(key);

      if (object.isErr()) {
        if (object.error.code === "not_found") {
          logger.warn({ date, key }, "Metadata sidecar not found; skipping date");
          continue;
        }
        return err(object.error);
      }

      const parsed = this.parse(key, object.value);
      if (parsed.isErr()) {
        return err(parsed.error);
      }

      documents.push(...parsed.value);
    }

    return ok(documents);
  }

  private parse(
    key: string,
    bytes: Uint8Array,
  ): Result<CatalogDocument[], AppBoundaryError> {
    let json: unknown;
    try {
      json = JSON.parse(new TextDecoder().decode(bytes));
    } catch (error) {
      return err(metadataError("invalid_json", `Metadata ${key} is not valid JSON.`, error));
    }

    const metadata = metadataSchema.safeParse(json);
    if (!metadata.success) {
      return err(
        metadataError("validation_error", `Metadata ${key} failed validation.`, metadata.error),
      );
    }

    return ok(
      metadata.data.documents.map((document) => ({
        code: document.code,
        companyName: document.company_name,
        title: document.title,
        docType: document.doc_type,
        path: document.storage_path,
      })),
    );
  }
}
