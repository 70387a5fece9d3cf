import { describe, expect, it } from "vitest";
import {
  expandDateRange,
  parseCompactDate,
  todayInTokyo,
  validateCompactDate,
} from "./disclosureDates";

describe("parseCompactDate", () => {
  it("splits valid dates", () => {
    expect(parseCompactDate("20240101")).toEqual({
      yyyy: "2024",
      mm: "01",
      dd: "01",
    });
  });

  it("rejects malformed and impossible dates", () => {
    expect(parseCompactDate("2024-01-01")).toBeNull();
    expect(parseCompactDate("20240230")).toBeNull();
    expect(parseCompactDate("2024011")).toBeNull();
  });
});

describe("expandDateRange", () => {
  it("expands an inclusive range across a month boundary", () => {
    const result = expandDateRange("20240130", "20240202");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual([
      "20240130",
      "20240131",
      "20240201",
      "20240202",
    ]);
  });

  it("returns a single day when start equals end", () => {
    expect(expandDateRange("20240229", "20240229")._unsafeUnwrap()).toEqual([
      "20240229",
    ]);
  });

  it("rejects reversed ranges as configuration errors", () => {
    const result = expandDateRange("20240202", "20240201");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected config error");
    }

    expect(result.error.code).toBe("config_invalid");
    expect(result.error.message).toBe(
      "Start date 20240202 is after end date 20240201.",
    );
  });
});

describe("validateCompactDate", () => {
  it("flags malformed dates", () => {
    const result = validateCompactDate("2024/01/01");
    expect(result.isErr()).toBe(true);
  });
});

describe("todayInTokyo", () => {
  it("uses the Tokyo calendar day", () => {
    expect(todayInTokyo(new Date("2024-01-01T15:30:00.000Z"))).toBe("20240102");
    expect(todayInTokyo(new Date("2024-01-01T14:59:00.000Z"))).toBe("20240101");
  });
});
