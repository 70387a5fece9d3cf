import { describe, expect, it } from "vitest";
import { renderTemplate } from "./promptTemplates";

describe("renderTemplate", () => {
  it("fills every occurrence of known placeholders", () => {
    expect(
      renderTemplate("{{company_code}} {{company_name}} / {{company_code}}", {
        company_code: "7203",
        company_name: "トヨタ自動車",
      }),
    ).toBe("7203 トヨタ自動車 / 7203");
  });

  it("leaves unknown or unset placeholders untouched", () => {
    expect(renderTemplate("{{titles}} {{other}}", { count: "3" })).toBe(
      "{{titles}} {{other}}",
    );
  });

  it("inserts values literally, including replacement patterns", () => {
    expect(renderTemplate("[{{summaries}}]", { summaries: "$& and $1" })).toBe(
      "[$& and $1]",
    );
  });
});
