/**
 * Template bodies loaded once at startup and shared read-only by the summarization stages.
 */
export type PromptTemplates = Readonly<{
  summarySystem: string;
  summarySystemCompact: string;
  summaryUser: string;
  sectorSystem: string;
  sectorUser: string;
  timeseriesSystem: string;
  timeseriesUser: string;
}>;

export const promptTemplateFiles = {
  summarySystem: "summary_system_prompt.md",
  summarySystemCompact: "summary_system_prompt_small.md",
  summaryUser: "summary_user_prompt.md",
  sectorSystem: "sector_system_prompt.md",
  sectorUser: "sector_user_prompt.md",
  timeseriesSystem: "timeseries_system_prompt.md",
  timeseriesUser: "timeseries_user_prompt.md",
} as const satisfies Record<keyof PromptTemplates, string>;

export type PromptVariables = Partial<
  Record<
    | "company_code"
    | "company_name"
    | "sector_name"
    | "titles"
    | "count"
    | "summaries"
    | "document_list",
    string
  >
>;

/**
 * Replaces `{{name}}` placeholders; unknown placeholders are left in place.
 */
export const renderTemplate = (
  template: string,
  variables: PromptVariables,
): string =>
  template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => {
    const value = Object.entries(variables).find(([key]) => key === name)?.[1];
    return value ?? placeholder;
  });
