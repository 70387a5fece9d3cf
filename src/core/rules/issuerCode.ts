const FOUR_DIGITS = /^\d{4}$/;
const FIVE_DIGITS = /^\d{5}$/;

/**
 * Canonicalizes an issuer code so listing rows and the reference table share one join key.
 * Listing pages publish five-character codes ("72030"), the reference table four ("7203").
 */
export const normalizeIssuerCode = (raw: string): string => {
  const code = raw.trim().toUpperCase();

  if (code.length === 5 && code.endsWith("0") && FOUR_DIGITS.test(code.slice(0, 4))) {
    return code.slice(0, 4);
  }

  if (FIVE_DIGITS.test(code)) {
    return code.slice(0, 4);
  }

  return code;
};
