import { describe, expect, it } from "vitest";
import type { CatalogDocument } from "../entities/documentGroup";
import type { IssuerInfo } from "../entities/issuer";
import { groupDocumentsByIssuer } from "./documentGrouper";
import { normalizeIssuerCode } from "./issuerCode";

const doc = (code: string, title: string, path = `x/${code}_${title}.pdf`): CatalogDocument => ({
  code,
  companyName: `Company ${code}`,
  title,
  docType: "tanshin",
  path,
});

const issuers = new Map<string, IssuerInfo>([
  [
    "7203",
    {
      code: "7203",
      name: "トヨタ自動車",
      market: "プライム（内国株式）",
      sector: "輸送用機器",
      size: "Core30",
    },
  ],
]);

describe("groupDocumentsByIssuer", () => {
  const documents = [
    doc("72030", "決算短信"),
    doc("99990", "決算説明資料"),
    doc("7203", "配当予想"),
    doc("99995", "業績修正"),
  ];

  it("creates one group per normalized code in discovery order", () => {
    const groups = groupDocumentsByIssuer(documents, issuers);

    expect(groups.map((group) => group.code)).toEqual(["7203", "9999"]);
    expect(groups[0]?.documents.map((item) => item.title)).toEqual([
      "決算短信",
      "配当予想",
    ]);
    expect(groups[1]?.documents.map((item) => item.title)).toEqual([
      "決算説明資料",
      "業績修正",
    ]);
  });

  it("attaches issuer info and falls back to the unknown sentinel", () => {
    const groups = groupDocumentsByIssuer(documents, issuers);

    expect(groups[0]).toMatchObject({
      name: "トヨタ自動車",
      sector: "輸送用機器",
      size: "Core30",
    });
    expect(groups[1]).toMatchObject({
      name: "Unknown",
      sector: "Unknown",
      size: "Unknown",
    });
  });

  it("partitions the input without losing or mixing documents", () => {
    const groups = groupDocumentsByIssuer(documents, issuers);
    const regrouped = groups.flatMap((group) => group.documents);

    expect(regrouped).toHaveLength(documents.length);
    expect(new Set(regrouped)).toEqual(new Set(documents));
    groups.forEach((group) => {
      group.documents.forEach((item) => {
        expect(normalizeIssuerCode(item.code)).toBe(group.code);
      });
    });
  });

  it("applies include, code and group-count filters before grouping", () => {
    expect(
      groupDocumentsByIssuer(documents, issuers, { include: "資料" }).map(
        (group) => group.code,
      ),
    ).toEqual(["9999"]);

    expect(
      groupDocumentsByIssuer(documents, issuers, { codes: ["72030"] }).map(
        (group) => group.documents.length,
      ),
    ).toEqual([2]);

    expect(
      groupDocumentsByIssuer(documents, issuers, { maxGroups: 1 }).map(
        (group) => group.code,
      ),
    ).toEqual(["7203"]);
  });

  it("matches the include filter against the storage path", () => {
    const groups = groupDocumentsByIssuer(
      [doc("1301", "決算短信", "disclosures/2024/01/05/presentation/1301_x.pdf")],
      issuers,
      { include: "presentation" },
    );

    expect(groups).toHaveLength(1);
  });
});
