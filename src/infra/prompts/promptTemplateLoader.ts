import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  promptTemplateFiles,
  type PromptTemplates,
} from "../../core/rules/promptTemplates";

export const defaultPromptsDir = fileURLToPath(
  new URL("../../../prompts/", import.meta.url),
);

/**
 * Reads every template up front so a missing file fails the command before any work starts.
 */
export const loadPromptTemplates = async (
  directory: string = defaultPromptsDir,
): Promise<Result<PromptTemplates, AppBoundaryError>> => {
  const read = (file: string): Promise<string> =>
    readFile(join(directory, file), "utf8");

  try {
    const [
      summarySystem,
      summarySystemCompact,
      summaryUser,
      sectorSystem,
      sectorUser,
      timeseriesSystem,
      timeseriesUser,
    ] = await Promise.all([
      read(promptTemplateFiles.summarySystem),
      read(promptTemplateFiles.summarySystemCompact),
      read(promptTemplateFiles.summaryUser),
      read(promptTemplateFiles.sectorSystem),
      read(promptTemplateFiles.sectorUser),
      read(promptTemplateFiles.timeseriesSystem),
      read(promptTemplateFiles.timeseriesUser),
    ]);

    return ok(
      Object.freeze({
        summarySystem,
        summarySystemCompact,
        summaryUser,
        sectorSystem,
        sectorUser,
        timeseriesSystem,
        timeseriesUser,
      }),
    );
  } catch (error) {
    return err({
      source: "config",
      code: "config_invalid",
      provider: "prompts",
      message: `Prompt templates could not be read from ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      retryable: false,
      cause: error,
    });
  }
};
