import { ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { IssuerInfo } from "../../core/entities/issuer";
import type { ListingProviderPort } from "../../core/ports/inboundPorts";
import type { StoragePort } from "../../core/ports/outboundPorts";
import { DisclosureDiscoveryService } from "./disclosureDiscoveryService";
import { DocumentTransferService } from "./documentTransferService";
import { SectorBatchScrapeService } from "./sectorBatchScrapeService";

const listing: ListingProviderPort = {
  fetchListingPage: async (page, date) => {
    if (page > 1) {
      return ok([]);
    }
    if (date === "20240104") {
      return ok([
        { time: "15:00", code: "72030", companyName: "トヨタ自動車", title: "2024年3月期 第3四半期決算短信", pdfUrl: "https://x.test/a.pdf" },
      ]);
    }
    if (date === "20240105") {
      return ok([
        { time: "16:00", code: "40000", companyName: "未登録社", title: "決算説明資料", pdfUrl: "https://x.test/b.pdf" },
      ]);
    }
    return ok(null);
  },
};

const toyota: IssuerInfo = {
  code: "7203",
  name: "トヨタ自動車",
  market: "プライム（内国株式）",
  sector: "輸送用機器",
  size: "TOPIX Core30",
};

describe("SectorBatchScrapeService", () => {
  it("stores documents under sector and size with an Unknown fallback", async () => {
    const keys: string[] = [];
    const storage: StoragePort = {
      uploadFile: async (_path, key) => {
        keys.push(key);
        return ok(key);
      },
      putObject: async (key) => ok(key),
      getObject: async () => ok(new Uint8Array()),
      listKeys: async () => ok([]),
    };
    const service = new SectorBatchScrapeService(
      new DisclosureDiscoveryService(listing, new Map(), new Set()),
      new DocumentTransferService(
        { download: async () => ok(new Uint8Array([1])) },
        storage,
        {
          acquire: async (name) => ({
            path: `/scratch/${name}`,
            write: async () => undefined,
            release: async () => undefined,
          }),
        },
        { acquire: async () => undefined },
        1,
        10,
      ),
      new Map([["7203", toyota]]),
      "disclosures",
      50,
    );

    const result = await service.scrapeRange("20240104", "20240106");

    expect(result._unsafeUnwrap()).toEqual({
      discoveredByDate: { "20240104": 1, "20240105": 1, "20240106": 0 },
      discovered: 2,
      stored: 2,
      failed: 0,
    });
    expect(keys).toEqual([
      "disclosures/sectors/輸送用機器/TOPIX Core30/72030_トヨタ自動車_2024年3月期_第3四半期決算短信.pdf",
      "disclosures/sectors/Unknown/Unknown/40000_未登録社_決算説明資料.pdf",
    ]);
  });
});
