import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  GenerationRequest,
  LlmPort,
} from "../../core/ports/outboundPorts";

const PREVIEW_LENGTH = 200;

/**
 * Offline model stand-in: echoes the head of the prompt so local runs produce inspectable output.
 */
export class MockLlm implements LlmPort {
  async generate(
    request: GenerationRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    const preview = request.prompt.slice(0, PREVIEW_LENGTH).trim();
    return ok(`[mock summary]\n${preview}`);
  }
}
