import type {
  GenerationRequest,
  LlmPort,
} from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpClient, toBoundaryError } from "../http/httpClient";

type OllamaChatResponse = {
  message?: { content?: string };
};

/**
 * Encapsulates chat-model access so summarization stays portable across LLM providers.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 120_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  /**
   * Single attempt per call; rate-limit backoff belongs to the caller.
   */
  async generate(
    request: GenerationRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<OllamaChatResponse>({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
      },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("llm", "ollama", response.error));
    }

    const content = response.value.message?.content?.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }
}
