import {
  AnalyzerConfigFile,
  CONFIG_VERSION,
  DiffConfigFile,
  LOG_LEVEL_NAMES,
  LogLevel,
  ProviderConfigFile
} from "./types";

export interface ValidationResult {
  ok: boolean;
  errors: string[];
  warnings: string[];
}

export interface ParsedConfig {
  config: AnalyzerConfigFile;
  result: ValidationResult;
}

const PROVIDER_SECTIONS = ["primary", "fallback"] as const;
const PROVIDER_KEYS = ["model", "max_tokens", "timeout_ms", "max_retries", "base_url"];
const SECRET_KEYS = ["api_key", "apiKey", "key"];
const TOP_LEVEL_KEYS = ["version", "log_level", "primary", "fallback", "diff"];

function resultBase(): ValidationResult {
  return { ok: true, errors: [], warnings: [] };
}

function addError(result: ValidationResult, message: string) {
  result.ok = false;
  result.errors.push(message);
}

function addWarning(result: ValidationResult, message: string) {
  result.warnings.push(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

function readPositiveInt(
  result: ValidationResult,
  section: Record<string, unknown>,
  key: string,
  label: string,
  allowZero = false
): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  const min = allowZero ? 0 : 1;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    addError(result, `config: ${label}.${key} must be an integer >= ${min}.`);
    return undefined;
  }
  return value;
}

function readString(
  result: ValidationResult,
  section: Record<string, unknown>,
  key: string,
  label: string
): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    addError(result, `config: ${label}.${key} must be a non-empty string.`);
    return undefined;
  }
  return value;
}

function parseProviderSection(
  result: ValidationResult,
  raw: unknown,
  label: string
): ProviderConfigFile | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    addError(result, `config: ${label} must be a mapping.`);
    return undefined;
  }

  for (const key of Object.keys(raw)) {
    if (SECRET_KEYS.includes(key)) {
      addWarning(result, `config: ${label}.${key} is ignored; pass API keys by flag or environment variable.`);
    } else if (!PROVIDER_KEYS.includes(key)) {
      addWarning(result, `config: unknown key "${label}.${key}".`);
    }
  }

  const baseUrl = readString(result, raw, "base_url", label);
  if (baseUrl !== undefined && !/^https?:\/\//.test(baseUrl)) {
    addError(result, `config: ${label}.base_url must start with http:// or https://.`);
  }

  return {
    model: readString(result, raw, "model", label),
    max_tokens: readPositiveInt(result, raw, "max_tokens", label),
    timeout_ms: readPositiveInt(result, raw, "timeout_ms", label),
    max_retries: readPositiveInt(result, raw, "max_retries", label, true),
    base_url: baseUrl
  };
}

function parseDiffSection(result: ValidationResult, raw: unknown): DiffConfigFile | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    addError(result, "config: diff must be a mapping.");
    return undefined;
  }
  const exclude = raw.exclude;
  if (exclude === undefined) return {};
  if (!Array.isArray(exclude)) {
    addError(result, "config: diff.exclude must be a list.");
    return {};
  }

  const globs: string[] = [];
  for (const entry of exclude) {
    if (typeof entry !== "string" || entry.trim() === "") {
      addError(result, "config: diff.exclude contains an entry that is not a non-empty string.");
      continue;
    }
    globs.push(entry);
  }
  return { exclude: globs };
}

/**
 * Validate a parsed YAML document and narrow it to {@link AnalyzerConfigFile}.
 * Invalid fields are dropped from `config` and reported in `result.errors`.
 */
export function parseAnalyzerConfig(raw: unknown): ParsedConfig {
  const result = resultBase();
  const config: AnalyzerConfigFile = { version: CONFIG_VERSION };

  if (raw === null || raw === undefined) {
    addWarning(result, "config: file is empty.");
    return { config, result };
  }
  if (!isRecord(raw)) {
    addError(result, "config: top level must be a mapping.");
    return { config, result };
  }

  if (raw.version !== CONFIG_VERSION) {
    addError(result, `config: unsupported version "${String(raw.version ?? "missing")}", expected "${CONFIG_VERSION}".`);
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      addWarning(result, `config: unknown key "${key}".`);
    }
  }

  if (raw.log_level !== undefined) {
    if (isLogLevel(raw.log_level)) {
      config.log_level = raw.log_level;
    } else {
      addError(result, `config: log_level "${String(raw.log_level)}" must be one of ${LOG_LEVEL_NAMES.join(", ")}.`);
    }
  }

  for (const section of PROVIDER_SECTIONS) {
    const parsed = parseProviderSection(result, raw[section], section);
    if (parsed) config[section] = parsed;
  }

  const diff = parseDiffSection(result, raw.diff);
  if (diff) config.diff = diff;

  return { config, result };
}

export function validateAnalyzerConfig(raw: unknown): ValidationResult {
  return parseAnalyzerConfig(raw).result;
}
