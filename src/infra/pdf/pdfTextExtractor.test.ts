import { err, ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StoragePort } from "../../core/ports/outboundPorts";
import { PdfTextExtractor, parsePdfText } from "./pdfTextExtractor";

const { parserEvents } = vi.hoisted(() => {
  const parserEvents: string[] = [];
  return { parserEvents };
});

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    constructor(private readonly options: { data: Uint8Array }) {}

    async getText(): Promise<{ text: string }> {
      parserEvents.push("getText");
      if (this.options.data.length === 0) {
        throw new Error("empty document");
      }
      return { text: "決算短信" };
    }

    async destroy(): Promise<void> {
      parserEvents.push("destroy");
    }
  },
}));

const notFound: AppBoundaryError = {
  source: "storage",
  code: "not_found",
  provider: "fake",
  message: "Object does not exist.",
  retryable: false,
};

const storageWith = (objects: Record<string, string>): StoragePort => ({
  uploadFile: async (_path, key) => ok(key),
  putObject: async (key) => ok(key),
  getObject: async (key) => {
    const body = objects[key];
    return body === undefined ? err(notFound) : ok(new TextEncoder().encode(body));
  },
  listKeys: async () => ok(Object.keys(objects)),
});

describe("PdfTextExtractor", () => {
  it("parses the stored bytes and trims the text", async () => {
    const extractor = new PdfTextExtractor(
      storageWith({ "a.pdf": "raw" }),
      async (bytes) => `  parsed:${new TextDecoder().decode(bytes)}\n`,
    );

    expect((await extractor.extractText("a.pdf"))._unsafeUnwrap()).toBe("parsed:raw");
  });

  it("passes storage failures through", async () => {
    const extractor = new PdfTextExtractor(storageWith({}), async () => "unused");

    const result = await extractor.extractText("missing.pdf");
    expect(result.isErr() && result.error.code).toBe("not_found");
  });

  it("reports parser failures as extraction errors", async () => {
    const extractor = new PdfTextExtractor(storageWith({ "a.pdf": "raw" }), async () => {
      throw new Error("bad xref");
    });

    const result = await extractor.extractText("a.pdf");
    expect(result.isErr() && result.error).toMatchObject({
      source: "extraction",
      message: "PDF parsing failed for a.pdf: bad xref",
    });
  });
});

describe("parsePdfText", () => {
  it("releases the parser after reading the text", async () => {
    parserEvents.length = 0;

    await expect(parsePdfText(new Uint8Array([1]))).resolves.toBe("決算短信");
    expect(parserEvents).toEqual(["getText", "destroy"]);
  });

  it("releases the parser when parsing throws", async () => {
    parserEvents.length = 0;

    await expect(parsePdfText(new Uint8Array())).rejects.toThrow("empty document");
    expect(parserEvents).toEqual(["getText", "destroy"]);
  });
});
