import { err, ok, type Result } from "neverthrow";
import { PDFParse } from "pdf-parse";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  StoragePort,
  TextExtractorPort,
} from "../../core/ports/outboundPorts";

export type PdfTextParser = (bytes: Uint8Array) => Promise<string>;

export const parsePdfText: PdfTextParser = async (bytes) => {
  const parser = new PDFParse({ data: bytes });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
};

/**
 * Reads a stored PDF and returns its plain text.
 */
export class PdfTextExtractor implements TextExtractorPort {
  constructor(
    private readonly storage: StoragePort,
    private readonly parse: PdfTextParser = parsePdfText,
  ) {}

  async extractText(key: string): Promise<Result<string, AppBoundaryError>> {
    const bytes = await this.storage.getObject(key);
    if (bytes.isErr()) {
      return err(bytes.error);
    }

    try {
      return ok((await this.parse(bytes.value)).trim());
    } catch (error) {
      return err({
        source: "extraction",
        code: "provider_error",
        provider: "pdf-parse",
        message: `PDF parsing failed for ${key}: ${error instanceof Error ? error.message : "unknown error"}`,
        retryable: false,
        cause: error,
      });
    }
  }
}
