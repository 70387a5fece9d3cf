/**
 * Market segments whose issuers are skipped unless EXCLUDED_MARKETS overrides the list.
 */
export const DEFAULT_EXCLUDED_MARKETS: readonly string[] = [
  "ETF・ETN",
  "PRO Market",
  "REIT・ベンチャーファンド・カントリーファンド・インフラファンド",
  "出資証券",
  "プライム（外国株式）",
  "スタンダード（外国株式）",
  "グロース（外国株式）",
];

/**
 * Returns true when the issuer's market label is excluded. The raw listing code
 * is looked up before the normalized one; an unmapped issuer is always kept.
 */
export const isExcludedByMarket = (
  rawCode: string,
  normalizedCode: string,
  markets: ReadonlyMap<string, string>,
  excludedMarkets: ReadonlySet<string>,
): boolean => {
  const market = markets.get(rawCode) ?? markets.get(normalizedCode);
  if (market === undefined) {
    return false;
  }

  return excludedMarkets.has(market);
};
