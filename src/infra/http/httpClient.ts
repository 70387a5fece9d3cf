import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status"
  | "invalid_json";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const readJson = async <T>(
  response: Response,
): Promise<Result<T, HttpClientError>> => {
  try {
    return ok((await response.json()) as T);
  } catch (jsonError) {
    return err({
      code: "invalid_json",
      message: "HTTP response body was not valid JSON.",
      retryable: false,
      cause: jsonError,
    });
  }
};

const readText = async (
  response: Response,
): Promise<Result<string, HttpClientError>> => ok(await response.text());

const readBytes = async (
  response: Response,
): Promise<Result<Uint8Array, HttpClientError>> =>
  ok(new Uint8Array(await response.arrayBuffer()));

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/status policy.
 */
export class HttpClient {
  /**
   * Executes a JSON request with bounded retries.
   */
  async requestJson<T>(
    request: HttpRequest,
  ): Promise<Result<T, HttpClientError>> {
    return this.withRetries(request, readJson<T>);
  }

  /**
   * Fetches a text body, e.g. an HTML listing page.
   */
  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, readText);
  }

  /**
   * Fetches a binary body, e.g. a PDF.
   */
  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<Uint8Array, HttpClientError>> {
    return this.withRetries(request, readBytes);
  }

  private async withRetries<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      // The timeout stays armed while the body streams in.
      return await readBody(response);
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

const mapHttpCode = (error: HttpClientError): AppBoundaryError["code"] => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  if (error.httpStatus === 404) {
    return "not_found";
  }

  if (error.code === "timeout") {
    return "timeout";
  }

  if (error.code === "invalid_json") {
    return "invalid_json";
  }

  return error.code === "transport_error" ? "transport_error" : "provider_error";
};

/**
 * Lifts a transport failure into the boundary error shape shared by all adapters.
 */
export const toBoundaryError = (
  source: AppBoundarySource,
  provider: string,
  error: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(error),
  provider,
  message: error.message,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  cause: error.cause,
});
