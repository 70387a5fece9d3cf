import { describe, expect, it } from "vitest";
import { normalizeIssuerCode } from "./issuerCode";

describe("normalizeIssuerCode", () => {
  it("drops the trailing zero of five-character listing codes", () => {
    expect(normalizeIssuerCode("72030")).toBe("7203");
    expect(normalizeIssuerCode(" 99840 ")).toBe("9984");
  });

  it("drops the check digit of other all-digit five-character codes", () => {
    expect(normalizeIssuerCode("72035")).toBe("7203");
  });

  it("uppercases alphanumeric codes and keeps their length", () => {
    expect(normalizeIssuerCode("130a0")).toBe("130A0");
    expect(normalizeIssuerCode("285a")).toBe("285A");
  });

  it("returns empty input unchanged", () => {
    expect(normalizeIssuerCode("")).toBe("");
    expect(normalizeIssuerCode("   ")).toBe("");
  });

  it("is idempotent", () => {
    const samples = [
      "72030",
      "72035",
      "7203",
      "130A0",
      " 13010 ",
      "abc",
      "123456",
      "0",
      "",
    ];

    samples.forEach((sample) => {
      const once = normalizeIssuerCode(sample);
      expect(normalizeIssuerCode(once)).toBe(once);
    });
  });
});
