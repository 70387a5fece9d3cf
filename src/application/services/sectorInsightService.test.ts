import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  GenerationRequest,
  LlmPort,
  StoragePort,
} from "../../core/ports/outboundPorts";
import type { PromptTemplates } from "../../core/rules/promptTemplates";
import { RetryingSummarizer } from "./retryingSummarizer";
import { SectorInsightService } from "./sectorInsightService";

const templates: PromptTemplates = {
  summarySystem: "",
  summarySystemCompact: "",
  summaryUser: "",
  sectorSystem: "S:{{sector_name}}",
  sectorUser: "{{sector_name}}({{count}})\n{{summaries}}",
  timeseriesSystem: "",
  timeseriesUser: "",
};

const prefix = "disclosures/insights-summaries/20240102/";

const seeded = (objects: Record<string, string>): StoragePort & { written: Map<string, string> } => {
  const written = new Map<string, string>();
  return {
    written,
    uploadFile: async (_path, key) => ok(key),
    putObject: async (key, body) => {
      written.set(key, typeof body === "string" ? body : new TextDecoder().decode(body));
      return ok(key);
    },
    getObject: async (key) => {
      const text = objects[key];
      return text === undefined
        ? err(missingObject)
        : ok(new TextEncoder().encode(text));
    },
    listKeys: async (requested) =>
      ok(Object.keys(objects).filter((key) => key.startsWith(requested))),
  };
};

const missingObject: AppBoundaryError = {
  source: "storage",
  code: "not_found",
  provider: "memory",
  message: "missing",
  retryable: false,
};

const quotaExceeded: AppBoundaryError = {
  source: "llm",
  code: "provider_error",
  provider: "fake",
  message: "quota exceeded",
  retryable: false,
};

const recordingLlm = (
  failFor: (request: GenerationRequest) => boolean = () => false,
): LlmPort & { requests: GenerationRequest[] } => {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    generate: async (request) => {
      requests.push(request);
      return failFor(request) ? err(quotaExceeded) : ok(`insight:${request.system}`);
    },
  };
};

const buildService = (llm: LlmPort, storage: StoragePort) =>
  new SectorInsightService(
    storage,
    new RetryingSummarizer(llm, { maxAttempts: 5, initialBackoffMs: 0 }, async () => undefined),
    templates,
    "disclosures",
    2,
  );

describe("SectorInsightService", () => {
  it("groups issuer summaries by sector and size and writes one insight per group", async () => {
    const storage = seeded({
      [`${prefix}20240102__輸送用機器__Core30__7203__トヨタ自動車_summary.md`]: "トヨタ要約",
      [`${prefix}20240102__情報通信業__Small_1__9984__ソフトバンクグループ_summary.md`]: "SBG要約",
      [`${prefix}20240102__輸送用機器__Core30__7267__本田技研工業_summary.md`]: "ホンダ要約",
      [`${prefix}notes.txt`]: "ignored",
    });
    const llm = recordingLlm();

    const result = await buildService(llm, storage).generateForDate("20240102");

    expect(result._unsafeUnwrap()).toEqual({
      sectors: 2,
      written: 2,
      failed: 0,
      keys: [
        "disclosures/insights-sectors/20240102/輸送用機器_Core30_insights.md",
        "disclosures/insights-sectors/20240102/情報通信業_Small_1_insights.md",
      ],
    });
    expect(llm.requests[0]).toEqual({
      system: "S:輸送用機器_Core30",
      prompt: "輸送用機器_Core30(2)\nトヨタ要約\n\nホンダ要約",
    });
    expect(
      storage.written.get("disclosures/insights-sectors/20240102/情報通信業_Small_1_insights.md"),
    ).toBe("insight:S:情報通信業_Small_1");
  });

  it("returns an empty report when the date has no summaries", async () => {
    const llm = recordingLlm();

    const result = await buildService(llm, seeded({})).generateForDate("20240102");

    expect(result._unsafeUnwrap()).toEqual({ sectors: 0, written: 0, failed: 0, keys: [] });
    expect(llm.requests).toHaveLength(0);
  });

  it("counts a sector whose model call fails", async () => {
    const storage = seeded({
      [`${prefix}20240102__輸送用機器__Core30__7203__トヨタ自動車_summary.md`]: "トヨタ要約",
      [`${prefix}20240102__情報通信業__Small_1__9984__ソフトバンクグループ_summary.md`]: "SBG要約",
    });
    const llm = recordingLlm((request) => request.system === "S:情報通信業_Small_1");

    const result = await buildService(llm, storage).generateForDate("20240102");

    expect(result._unsafeUnwrap()).toMatchObject({ sectors: 2, written: 1, failed: 1 });
    expect(Array.from(storage.written.keys())).toEqual([
      "disclosures/insights-sectors/20240102/輸送用機器_Core30_insights.md",
    ]);
  });

  it("rejects a malformed date", async () => {
    const result = await buildService(recordingLlm(), seeded({})).generateForDate("2024-01-02");

    expect(result.isErr() && result.error.code).toBe("config_invalid");
  });
});
