import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  GenerationRequest,
  LlmPort,
  StoragePort,
  TextExtractorPort,
} from "../../core/ports/outboundPorts";
import type { PromptTemplates } from "../../core/rules/promptTemplates";
import { RetryingSummarizer } from "./retryingSummarizer";
import {
  groupSectorFiles,
  TimeseriesAnalysisService,
} from "./timeseriesAnalysisService";

const templates: PromptTemplates = {
  summarySystem: "",
  summarySystemCompact: "",
  summaryUser: "",
  sectorSystem: "S:{{sector_name}}:{{count}}",
  sectorUser: "{{summaries}}",
  timeseriesSystem: "TS",
  timeseriesUser: "{{company_code}}|{{company_name}}|{{sector_name}}\n{{document_list}}",
};

const core30 = "disclosures/sectors/輸送用機器/TOPIX Core30";
const toyotaLatest = `${core30}/72030_トヨタ自動車_20240510_決算短信.pdf`;
const toyotaEarlier = `${core30}/72030_トヨタ自動車_2023Q4_決算短信.pdf`;
const honda = `${core30}/72670_本田技研工業_2024Q1_決算短信.pdf`;

const unreadable: AppBoundaryError = {
  source: "extraction",
  code: "provider_error",
  provider: "fake",
  message: "bad xref",
  retryable: false,
};

const storageWith = (keys: string[]): StoragePort & { written: Map<string, string> } => {
  const written = new Map<string, string>();
  return {
    written,
    uploadFile: async (_path, key) => ok(key),
    putObject: async (key, body) => {
      written.set(key, typeof body === "string" ? body : new TextDecoder().decode(body));
      return ok(key);
    },
    getObject: async () => ok(new Uint8Array()),
    listKeys: async (prefix) => ok(keys.filter((key) => key.startsWith(prefix))),
  };
};

const extractorFor = (texts: Record<string, string>): TextExtractorPort => ({
  extractText: async (key) => {
    const text = texts[key];
    return text === undefined ? err(unreadable) : ok(text);
  },
});

const recordingLlm = (): LlmPort & { requests: GenerationRequest[] } => {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    generate: async (request) => {
      requests.push(request);
      return ok(`out:${request.system}`);
    },
  };
};

const buildService = (storage: StoragePort, extractor: TextExtractorPort, llm: LlmPort) =>
  new TimeseriesAnalysisService(
    storage,
    extractor,
    new RetryingSummarizer(llm, { maxAttempts: 5, initialBackoffMs: 0 }, async () => undefined),
    new Map([
      ["7203", { code: "7203", name: "トヨタ自動車", market: "プライム（内国株式）", sector: "輸送用機器", size: "TOPIX Core30" }],
    ]),
    templates,
    { basePath: "disclosures", extractionConcurrency: 2, summaryConcurrency: 2 },
  );

describe("groupSectorFiles", () => {
  it("groups PDFs by sector, size and normalized issuer code", () => {
    const groups = groupSectorFiles("disclosures/sectors/", [
      toyotaLatest,
      honda,
      toyotaEarlier,
      `${core30}/memo.txt`,
      "disclosures/sectors/stray.pdf",
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0]?.sector).toBe("輸送用機器");
    expect(groups[0]?.size).toBe("TOPIX Core30");
    expect(Array.from(groups[0]?.filesByCode.entries() ?? [])).toEqual([
      ["7203", [toyotaLatest, toyotaEarlier]],
      ["7267", [honda]],
    ]);
  });
});

describe("TimeseriesAnalysisService", () => {
  it("summarizes issuers with at least two documents oldest first, then the sector", async () => {
    const storage = storageWith([toyotaLatest, honda, toyotaEarlier]);
    const llm = recordingLlm();
    const extractor = extractorFor({ [toyotaLatest]: "今期", [toyotaEarlier]: "前期" });

    const result = await buildService(storage, extractor, llm).analyze();

    expect(result._unsafeUnwrap()).toEqual({
      sectorGroups: 1,
      analyzed: 1,
      skipped: 1,
      failed: 0,
      issuerKeys: ["disclosures/sectors-analysis/輸送用機器/TOPIX Core30/7203_timeseries_summary.md"],
      sectorKeys: ["disclosures/sectors-analysis/輸送用機器/TOPIX Core30/sector_timeseries_insights.md"],
    });

    expect(llm.requests).toEqual([
      {
        system: "TS",
        prompt: [
          "7203|トヨタ自動車|輸送用機器",
          "1. **2023年Q4**: 72030_トヨタ自動車_2023Q4_決算短信.pdf",
          "2. **2024年05月**: 72030_トヨタ自動車_20240510_決算短信.pdf",
          "",
          "=== 2023年Q4: 72030_トヨタ自動車_2023Q4_決算短信.pdf ===",
          "前期",
          "",
          "=== 2024年05月: 72030_トヨタ自動車_20240510_決算短信.pdf ===",
          "今期",
        ].join("\n"),
      },
      { system: "S:輸送用機器_TOPIX Core30_時系列分析:1", prompt: "out:TS" },
    ]);
    expect(
      storage.written.get("disclosures/sectors-analysis/輸送用機器/TOPIX Core30/sector_timeseries_insights.md"),
    ).toBe("out:S:輸送用機器_TOPIX Core30_時系列分析:1");
  });

  it("extracts a sector's documents in one bounded pool before any summary call", async () => {
    const keys = ["1111", "2222", "3333", "4444"].flatMap((code) =>
      [1, 2, 3, 4].map((quarter) => `${core30}/${code}0_社${code}_2024Q${quarter}_決算短信.pdf`),
    );
    const events: string[] = [];
    let inFlight = 0;
    let maxInFlight = 0;
    const extractor: TextExtractorPort = {
      extractText: async (key) => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        events.push("extract");
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight -= 1;
        return ok(key);
      },
    };
    const llm: LlmPort = {
      generate: async (request) => {
        events.push("generate");
        return ok(`out:${request.system}`);
      },
    };

    const result = await buildService(storageWith(keys), extractor, llm).analyze();

    expect(result._unsafeUnwrap()).toMatchObject({ analyzed: 4, failed: 0 });
    expect(maxInFlight).toBe(2);
    expect(events.filter((event) => event === "extract")).toHaveLength(16);
    expect(events.indexOf("generate")).toBe(16);
  });

  it("fails an issuer whose documents all fail extraction and skips its sector insight", async () => {
    const storage = storageWith([toyotaLatest, toyotaEarlier]);
    const llm = recordingLlm();

    const result = await buildService(storage, extractorFor({}), llm).analyze();

    expect(result._unsafeUnwrap()).toMatchObject({ analyzed: 0, failed: 1, sectorKeys: [] });
    expect(llm.requests).toHaveLength(0);
    expect(storage.written.size).toBe(0);
  });

  it("falls back to Unknown for an issuer missing from the reference table", async () => {
    const first = "disclosures/sectors/Unknown/Unknown/40000_未登録社_2024Q1_決算短信.pdf";
    const second = "disclosures/sectors/Unknown/Unknown/40000_未登録社_2024Q2_決算短信.pdf";
    const llm = recordingLlm();

    await buildService(storageWith([first, second]), extractorFor({ [first]: "a", [second]: "b" }), llm).analyze();

    expect(llm.requests[0]?.prompt.split("\n")[0]).toBe("4000|Unknown|Unknown");
  });
});
