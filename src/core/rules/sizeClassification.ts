import { UNKNOWN } from "../entities/issuer";

const SIZE_QUALIFIER = "TOPIX ";
const FULL_SUMMARY_SIZES = ["Core30", "Large70", "Mid400"];

/**
 * "TOPIX Small 1" -> "Small 1"; blank or "-" -> "Unknown".
 */
export const normalizeSizeClass = (raw: string | undefined): string => {
  const size = raw?.trim() ?? "";
  if (size === "" || size === "-") {
    return UNKNOWN;
  }

  if (size.startsWith(SIZE_QUALIFIER)) {
    const stripped = size.slice(SIZE_QUALIFIER.length).trim();
    return stripped === "" ? UNKNOWN : stripped;
  }

  return size;
};

/**
 * Large-cap issuers get the full summary prompt; everything else, including unknown sizes, the compact one.
 */
export const usesFullSummaryPrompt = (size: string): boolean => {
  if (size === "" || size === UNKNOWN) {
    return false;
  }

  return FULL_SUMMARY_SIZES.some((label) => size.includes(label));
};
