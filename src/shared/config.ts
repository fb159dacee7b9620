import fs from "fs";
import path from "path";
import yaml from "yaml";
import {
  AnalyzerConfigFile,
  AnalyzerSettings,
  LOG_LEVEL_NAMES,
  LogLevel,
  ProviderConfigFile,
  ProviderSettings,
  SettingsEnv,
  SettingsOverrides
} from "./types";
import { ParsedConfig, parseAnalyzerConfig } from "./validate";
import { ANTHROPIC_DEFAULT_MODEL } from "../providers/anthropic-provider";
import { OPENAI_DEFAULT_MODEL } from "../providers/openai-provider";

export const DEFAULT_CONFIG_FILENAME = ".diff-timer.yaml";

export interface SettingsDefaults {
  primaryModel: string;
  fallbackModel: string;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  logLevel: LogLevel;
}

export const DEFAULTS: SettingsDefaults = {
  primaryModel: ANTHROPIC_DEFAULT_MODEL,
  fallbackModel: OPENAI_DEFAULT_MODEL,
  maxTokens: 1000,
  timeoutMs: 120000,
  maxRetries: 2,
  logLevel: "info"
};

export class ConfigError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadYamlFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`, filePath);
  }
  try {
    return yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`, filePath);
  }
}

export function loadAnalyzerConfig(filePath: string): ParsedConfig {
  return parseAnalyzerConfig(loadYamlFile(filePath));
}

/**
 * Locate the config file: an explicit path must exist, the implicit
 * `.diff-timer.yaml` in the working directory is optional.
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`, resolved);
    }
    return resolved;
  }
  const implicit = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  return fs.existsSync(implicit) ? implicit : null;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

function envLogLevel(env: SettingsEnv): LogLevel | undefined {
  const raw = env.DIFF_TIMER_LOG_LEVEL?.toLowerCase();
  return LOG_LEVEL_NAMES.find((level) => level === raw);
}

function resolveProvider(
  file: ProviderConfigFile | undefined,
  input: {
    apiKey?: string;
    model?: string;
    defaultModel: string;
    maxTokens?: number;
    baseUrl?: string;
    organization?: string;
  }
): ProviderSettings {
  return {
    apiKey: nonEmpty(input.apiKey),
    model: input.model ?? file?.model ?? input.defaultModel,
    maxTokens: input.maxTokens ?? file?.max_tokens ?? DEFAULTS.maxTokens,
    timeoutMs: file?.timeout_ms ?? DEFAULTS.timeoutMs,
    maxRetries: file?.max_retries ?? DEFAULTS.maxRetries,
    baseUrl: nonEmpty(input.baseUrl) ?? file?.base_url,
    organization: nonEmpty(input.organization)
  };
}

/**
 * Merge flags, environment, config file and defaults, in that order of precedence.
 */
export function resolveSettings(input: {
  target: string;
  overrides: SettingsOverrides;
  env: SettingsEnv;
  file?: AnalyzerConfigFile;
  cwd: string;
}): AnalyzerSettings {
  const { overrides, env, file } = input;

  const fileExcludes = file?.diff?.exclude ?? [];
  const excludes = Array.from(new Set([...fileExcludes, ...(overrides.exclude ?? [])]));

  return {
    target: input.target,
    cwd: input.cwd,
    primary: resolveProvider(file?.primary, {
      apiKey: overrides.anthropicKey ?? env.ANTHROPIC_API_KEY,
      model: overrides.model,
      defaultModel: DEFAULTS.primaryModel,
      maxTokens: overrides.maxTokens,
      baseUrl: env.ANTHROPIC_BASE_URL
    }),
    fallback: resolveProvider(file?.fallback, {
      apiKey: overrides.openaiKey ?? env.OPENAI_API_KEY,
      model: overrides.fallbackModel,
      defaultModel: DEFAULTS.fallbackModel,
      maxTokens: overrides.maxTokens,
      baseUrl: env.OPENAI_BASE_URL,
      organization: env.OPENAI_ORG_ID
    }),
    excludes,
    redactSecrets: overrides.redactSecrets ?? false,
    json: overrides.json ?? false,
    logLevel: overrides.logLevel ?? envLogLevel(env) ?? file?.log_level ?? DEFAULTS.logLevel
  };
}
