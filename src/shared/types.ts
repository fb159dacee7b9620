export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVEL_NAMES: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export const CONFIG_VERSION = "diff-timer.v1";

export interface ProviderConfigFile {
  model?: string;
  max_tokens?: number;
  timeout_ms?: number;
  max_retries?: number;
  base_url?: string;
}

export interface DiffConfigFile {
  exclude?: string[];
}

/** Shape of `.diff-timer.yaml`. */
export interface AnalyzerConfigFile {
  version: typeof CONFIG_VERSION;
  log_level?: LogLevel;
  primary?: ProviderConfigFile;
  fallback?: ProviderConfigFile;
  diff?: DiffConfigFile;
}

export interface ProviderSettings {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  baseUrl?: string;
  organization?: string;
}

export interface AnalyzerSettings {
  target: string;
  cwd: string;
  primary: ProviderSettings;
  fallback: ProviderSettings;
  excludes: string[];
  redactSecrets: boolean;
  json: boolean;
  logLevel: LogLevel;
}

export type SettingsEnv = Record<string, string | undefined>;

/** Values given on the command line; each one wins over env and file. */
export interface SettingsOverrides {
  anthropicKey?: string;
  openaiKey?: string;
  model?: string;
  fallbackModel?: string;
  maxTokens?: number;
  exclude?: string[];
  cwd?: string;
  redactSecrets?: boolean;
  json?: boolean;
  logLevel?: LogLevel;
}
