import type {
  DisclosureDocument,
  TransferOutcome,
  TransferReport,
} from "../../core/entities/disclosure";
import { describeError } from "../../core/entities/appError";
import type {
  DocumentDownloaderPort,
  HoldingAreaPort,
  RateLimiterPort,
  StoragePort,
} from "../../core/ports/outboundPorts";
import {
  mapWithConcurrency,
  type SettledItem,
} from "../../shared/concurrency/workerPool";
import { logger } from "../../shared/logger/logger";

const LOGGED_TITLE_LENGTH = 50;
const PDF_CONTENT_TYPE = "application/pdf";

export type StorageKeyFn = (document: DisclosureDocument) => string;

const shortTitle = (title: string): string =>
  Array.from(title).slice(0, LOGGED_TITLE_LENGTH).join("");

/**
 * Moves PDFs from the listing service into storage with bounded parallelism.
 */
export class DocumentTransferService {
  constructor(
    private readonly downloader: DocumentDownloaderPort,
    private readonly storage: StoragePort,
    private readonly holdingArea: HoldingAreaPort,
    private readonly rateLimiter: RateLimiterPort,
    private readonly concurrency = 5,
    private readonly progressEvery = 10,
  ) {}

  /**
   * Item failures are recorded in the report; they never abort the batch.
   */
  async transferBatch(
    documents: readonly DisclosureDocument[],
    keyFor: StorageKeyFn,
  ): Promise<TransferReport> {
    const outcomes = new Map<number, TransferOutcome>();
    let succeeded = 0;
    let failed = 0;

    const onSettled = (
      settled: SettledItem<TransferOutcome>,
      index: number,
    ): void => {
      const document = documents[index];
      if (!document) {
        return;
      }
      const outcome =
        settled.status === "fulfilled"
          ? settled.value
          : this.failure(document, describeError(settled.reason));

      outcomes.set(index, outcome);
      if (outcome.success) {
        succeeded += 1;
        logger.info(
          {
            code: outcome.document.code,
            docType: outcome.document.docType,
            title: shortTitle(outcome.document.title),
            storagePath: outcome.document.storagePath,
          },
          "Document stored",
        );
      } else {
        failed += 1;
        logger.warn(
          {
            code: outcome.document.code,
            title: shortTitle(outcome.document.title),
            reason: outcome.message,
          },
          "Document transfer failed",
        );
      }

      const processed = succeeded + failed;
      if (processed % this.progressEvery === 0 || processed === documents.length) {
        logger.info(
          {
            processed,
            total: documents.length,
            pct: Math.round((processed / documents.length) * 100),
            succeeded,
          },
          "Transfer progress",
        );
      }
    };

    await mapWithConcurrency(
      documents,
      this.concurrency,
      (document) => this.transferOne(document, keyFor),
      onSettled,
    );

    return {
      processed: succeeded + failed,
      succeeded,
      failed,
      // Input order, not completion order.
      outcomes: documents.flatMap((_, index) => outcomes.get(index) ?? []),
    };
  }

  private async transferOne(
    document: DisclosureDocument,
    keyFor: StorageKeyFn,
  ): Promise<TransferOutcome> {
    if (!document.pdfUrl) {
      return this.failure(document, "Document has no PDF URL.");
    }

    await this.rateLimiter.acquire();
    const holding = await this.holdingArea.acquire(`${document.code}.pdf`);

    try {
      const bytes = await this.downloader.download(document.pdfUrl);
      if (bytes.isErr()) {
        return this.failure(document, bytes.error.message);
      }

      await holding.write(bytes.value);
      const uploaded = await this.storage.uploadFile(
        holding.path,
        keyFor(document),
        PDF_CONTENT_TYPE,
      );
      if (uploaded.isErr()) {
        return this.failure(document, uploaded.error.message);
      }

      return {
        document: { ...document, storagePath: uploaded.value },
        success: true,
        message: uploaded.value,
      };
    } finally {
      await holding.release();
    }
  }

  private failure(
    document: DisclosureDocument,
    message: string,
  ): TransferOutcome {
    return { document, success: false, message };
  }
}
