import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StoragePort } from "../../core/ports/outboundPorts";
import { validateCompactDate } from "../../core/rules/disclosureDates";
import { datePrefix } from "../../core/rules/storageKeys";
import { logger } from "../../shared/logger/logger";

const contentTypeFor = (key: string): string => {
  if (key.endsWith(".pdf")) return "application/pdf";
  if (key.endsWith(".json")) return "application/json";
  return "application/octet-stream";
};

/**
 * Copies one date's stored objects into another store, keeping paths relative to the base path.
 */
export class StorageDownloadService {
  constructor(
    private readonly source: StoragePort,
    private readonly basePath: string,
  ) {}

  async downloadDate(
    date: string,
    target: StoragePort,
  ): Promise<Result<string[], AppBoundaryError>> {
    const valid = validateCompactDate(date);
    if (valid.isErr()) {
      return err(valid.error);
    }

    const listed = await this.source.listKeys(datePrefix(this.basePath, date));
    if (listed.isErr()) {
      return err(listed.error);
    }

    const saved: string[] = [];
    for (const key of listed.value) {
      const body = await this.source.getObject(key);
      if (body.isErr()) {
        return err(body.error);
      }

      const relative = this.basePath === "" ? key : key.slice(this.basePath.length + 1);
      const written = await target.putObject(relative, body.value, contentTypeFor(key));
      if (written.isErr()) {
        return err(written.error);
      }
      saved.push(written.value);
    }

    logger.info({ date, files: saved.length }, "Date downloaded");
    return ok(saved);
  }
}
