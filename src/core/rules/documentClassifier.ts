import type { DocType } from "../entities/disclosure";

/**
 * Keyword groups in priority order. The first group with a substring hit wins,
 * so "決算説明資料" is a tanshin document, not a presentation.
 */
export const classificationRules: ReadonlyArray<{
  docType: DocType;
  keywords: readonly string[];
}> = [
  {
    docType: "tanshin",
    keywords: [
      "決算短信",
      "決算短",
      "短信",
      "決算",
      "業績",
      "financial results",
      "earnings",
    ],
  },
  {
    docType: "presentation",
    keywords: [
      "説明資料",
      "補足資料",
      "プレゼンテーション",
      "資料",
      "説明",
      "presentation",
      "supplementary",
    ],
  },
  {
    docType: "dividend",
    keywords: ["配当", "配当金", "配当政策", "dividend"],
  },
  {
    docType: "other",
    keywords: [
      "開示事項",
      "経過",
      "変更",
      "修正",
      "訂正",
      "重要",
      "revision",
      "correction",
    ],
  },
];

/**
 * Maps a disclosure title to its category, or `null` when the document is not of interest.
 */
export const classifyDisclosureTitle = (title: string): DocType | null => {
  const haystack = title.toLowerCase();

  for (const rule of classificationRules) {
    if (rule.keywords.some((keyword) => haystack.includes(keyword))) {
      return rule.docType;
    }
  }

  return null;
};
