import path from "path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { DiffAnalyzer } from "../analysis/analyzer";
import { getGitDiff, GitCommandRunner } from "../git/diff";
import { getLogger, Logger, LogSink } from "../logger";
import { createProviders, ProviderFactory } from "../providers/provider-factory";
import { ConfigError, findConfigFile, loadAnalyzerConfig, resolveSettings } from "../shared/config";
import { redactText } from "../shared/redaction";
import { AnalyzerConfigFile, LOG_LEVEL_NAMES, LogLevel, SettingsEnv } from "../shared/types";
import { ValidationResult } from "../shared/validate";
import { VERSION } from "../version";
import { formatAnalysisJson, formatAnalysisResults, formatError } from "./output";
import { shouldUseColor } from "./theme";

export const MISSING_PRIMARY_KEY_MESSAGE =
  "Error: Anthropic API key not provided. Set ANTHROPIC_API_KEY environment variable or use --anthropic-key";
export const NO_DIFF_MESSAGE = "No diff found or error occurred";

export interface CliDeps {
  env?: SettingsEnv;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  color?: boolean;
  logSink?: LogSink;
  gitRunner?: GitCommandRunner;
  providerFactory?: ProviderFactory;
}

interface RawCliOptions {
  anthropicKey?: string;
  openaiKey?: string;
  config?: string;
  model?: string;
  fallbackModel?: string;
  maxTokens?: number;
  exclude?: string[];
  cwd?: string;
  redactSecrets?: boolean;
  json?: boolean;
  logLevel?: LogLevel;
}

interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
  color: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function resolveIo(deps: CliDeps): CliIo {
  return {
    out: deps.stdout ?? ((text) => process.stdout.write(`${text}\n`)),
    err: deps.stderr ?? ((text) => process.stderr.write(`${text}\n`)),
    color: deps.color ?? shouldUseColor(process.stdout, deps.env ?? process.env)
  };
}

export function buildProgram(
  io: CliIo,
  onAnalyze: (target: string, options: RawCliOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name("diff-timer")
    .description("Estimate how long a git diff took a human to write, using an LLM")
    .version(VERSION, "-V, --version", "Display version number")
    .argument("<target>", "Git diff target (e.g., HEAD~1 or main...feature)")
    .option("--anthropic-key <key>", "Anthropic API key (default: $ANTHROPIC_API_KEY)")
    .option("--openai-key <key>", "OpenAI API key for fallback (default: $OPENAI_API_KEY)")
    .option("-c, --config <path>", "Path to a YAML config file (default: ./.diff-timer.yaml)")
    .option("--model <name>", "Anthropic model for the primary analysis")
    .option("--fallback-model <name>", "OpenAI model for the fallback analysis")
    .option("--max-tokens <n>", "Output token budget for the analysis", parsePositiveInt)
    .option(
      "--exclude <glob>",
      "Extra path to leave out of the diff, repeatable (package*.json is always excluded)",
      collect
    )
    .option("-C, --cwd <dir>", "Repository directory to run git in")
    .option("--redact-secrets", "Mask credentials in the diff before sending it")
    .option("--json", "Print the result as JSON")
    .addOption(new Option("--log-level <level>", "Log verbosity on stderr").choices(LOG_LEVEL_NAMES))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.replace(/\n$/, "")),
      writeErr: (text) => io.err(text.replace(/\n$/, ""))
    })
    .action(async (target: string, options: RawCliOptions) => {
      await onAnalyze(target, options);
    });

  return program;
}

function reportValidation(result: ValidationResult, io: CliIo, logger: Logger, configPath: string): boolean {
  for (const warning of result.warnings) {
    logger.warn(warning, { configPath });
  }
  if (result.ok) return true;
  io.err(formatError(`Invalid configuration in ${configPath}:`, io));
  for (const error of result.errors) {
    io.err(formatError(`  - ${error}`, io));
  }
  return false;
}

async function analyzeTarget(target: string, options: RawCliOptions, deps: CliDeps, io: CliIo): Promise<number> {
  const env = deps.env ?? process.env;
  const cwd = path.resolve(deps.cwd ?? process.cwd(), options.cwd ?? ".");

  let configPath: string | null;
  let file: AnalyzerConfigFile | undefined;
  let validation: ValidationResult | undefined;
  try {
    configPath = findConfigFile(cwd, options.config);
    if (configPath) {
      const parsed = loadAnalyzerConfig(configPath);
      file = parsed.config;
      validation = parsed.result;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(formatError(`Error: ${error.message}`, io));
      return 1;
    }
    throw error;
  }

  const settings = resolveSettings({ target, overrides: options, env, file, cwd });
  const logger = deps.logSink ? new Logger({ sink: deps.logSink, prettyPrint: false }) : getLogger();
  logger.setLevel(settings.logLevel);

  if (!settings.primary.apiKey) {
    io.err(formatError(MISSING_PRIMARY_KEY_MESSAGE, io));
    return 1;
  }

  if (configPath && validation && !reportValidation(validation, io, logger, configPath)) {
    return 1;
  }

  let diffText = await getGitDiff(target, {
    cwd,
    excludes: settings.excludes,
    runner: deps.gitRunner,
    logger
  });
  if (!diffText) {
    io.out(NO_DIFF_MESSAGE);
    return 0;
  }

  if (settings.redactSecrets) {
    const redaction = redactText(diffText);
    diffText = redaction.text;
    logger.info("Redacted secrets from diff", { masked: redaction.masked_count, kinds: redaction.kinds });
  }

  const providers = (deps.providerFactory ?? createProviders)(settings);
  const analyzer = new DiffAnalyzer({
    primary: providers.primary,
    fallback: providers.fallback,
    maxTokens: settings.primary.maxTokens,
    fallbackMaxTokens: settings.fallback.maxTokens,
    logger
  });

  logger.debug("Analyzing diff", { target, bytes: Buffer.byteLength(diffText), fallback: analyzer.hasFallback() });
  const result = await analyzer.analyze(diffText);

  io.out(settings.json ? formatAnalysisJson(target, result) : formatAnalysisResults(result, io));
  return 0;
}

/**
 * Parse `argv` (without the node and script entries) and run one analysis.
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = resolveIo(deps);
  let exitCode = 0;

  const program = buildProgram(io, async (target, options) => {
    exitCode = await analyzeTarget(target, options, deps, io);
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
