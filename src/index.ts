export { DiffAnalyzer } from "./analysis/analyzer";
export type { AnalysisError, AnalysisResult, DiffAnalyzerOptions } from "./analysis/analyzer";
export { buildDiffArgs, execGit, getGitDiff, GitDiffError, PACKAGE_JSON_EXCLUDE } from "./git/diff";
export type { GitCommandResult, GitCommandRunner, GitDiffOptions } from "./git/diff";
export { Logger, getLogger } from "./logger";
export type { LoggerOptions, LogSink } from "./logger";
export * from "./providers";
export { buildAuthorshipPrompt } from "./shared/prompts";
export { redactText } from "./shared/redaction";
export { ConfigError, DEFAULTS, findConfigFile, loadAnalyzerConfig, resolveSettings } from "./shared/config";
export { parseAnalyzerConfig, validateAnalyzerConfig } from "./shared/validate";
export type { ValidationResult } from "./shared/validate";
export type * from "./shared/types";
export { runCli } from "./cli/program";
