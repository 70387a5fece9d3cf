export const UNKNOWN = "Unknown";

export type IssuerInfo = {
  code: string;
  name: string;
  market: string;
  sector: string;
  size: string;
};

/**
 * Read-only issuer reference keyed by normalized code.
 */
export type IssuerDirectory = ReadonlyMap<string, IssuerInfo>;

/**
 * Derives the code -> market label view used by the market filter.
 */
export const marketMapOf = (
  directory: IssuerDirectory,
): ReadonlyMap<string, string> => {
  const markets = new Map<string, string>();
  directory.forEach((issuer, code) => {
    if (issuer.market) {
      markets.set(code, issuer.market);
    }
  });
  return markets;
};
