import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { DocumentDownloaderPort } from "../../core/ports/outboundPorts";
import { HttpClient, toBoundaryError } from "./httpClient";

/**
 * Downloads disclosure PDFs over HTTP.
 */
export class HttpDocumentDownloader implements DocumentDownloaderPort {
  constructor(
    private readonly userAgent: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async download(url: string): Promise<Result<Uint8Array, AppBoundaryError>> {
    const response = await this.httpClient.requestBytes({
      url,
      method: "GET",
      headers: { "user-agent": this.userAgent },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("transfer", "tdnet", response.error));
    }

    return ok(response.value);
  }
}
