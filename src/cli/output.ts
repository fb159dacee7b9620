import { AnalysisResult } from "../analysis/analyzer";
import { styleText } from "./theme";

export const RESULTS_HEADER = "Analysis Results:";
export const RESULTS_RULE = "----------------";

export interface FormatOptions {
  color: boolean;
}

/**
 * Text block printed after an analysis, starting with a blank line.
 */
export function formatAnalysisResults(result: AnalysisResult, options: FormatOptions): string {
  return [
    "",
    styleText(RESULTS_HEADER, "header", options.color),
    styleText(RESULTS_RULE, "rule", options.color),
    result.text
  ].join("\n");
}

export function formatAnalysisJson(target: string, result: AnalysisResult): string {
  return JSON.stringify(
    {
      target,
      ok: result.ok,
      provider: result.provider,
      model: result.model ?? null,
      used_fallback: result.usedFallback,
      analysis: result.text,
      errors: result.errors,
      usage: result.usage ?? null
    },
    null,
    2
  );
}

export function formatError(message: string, options: FormatOptions): string {
  return styleText(message, "error", options.color);
}
