/**
 * Git diff retrieval.
 */

import { execFile } from "child_process";
import { getLogger, Logger } from "../logger";

/** Lock files and manifests churn mechanically; they never count as authored code. */
export const PACKAGE_JSON_EXCLUDE = ":!package*.json";

// Large refactors can produce very long diffs
const MAX_DIFF_BUFFER = 64 * 1024 * 1024;

export interface GitCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type GitCommandRunner = (args: string[], options: { cwd: string }) => Promise<GitCommandResult>;

export interface GitDiffOptions {
  cwd?: string;
  excludes?: string[];
  runner?: GitCommandRunner;
  logger?: Logger;
}

export class GitDiffError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message);
    this.name = "GitDiffError";
  }
}

/**
 * Run git without a shell. Non-zero exits resolve with their code; failures to
 * start git at all (missing binary, bad cwd, buffer overflow) reject.
 */
export const execGit: GitCommandRunner = (args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      "git",
      args,
      { cwd: options.cwd, encoding: "utf8", maxBuffer: MAX_DIFF_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }
        reject(error);
      }
    );
  });

function toPathspec(glob: string): string {
  return glob.startsWith(":!") || glob.startsWith(":(exclude)") ? glob : `:!${glob}`;
}

/**
 * Arguments for `git diff <target> -- . ':!package*.json' [':!<extra>'...]`.
 */
export function buildDiffArgs(target: string, extraExcludes: string[] = []): string[] {
  const pathspecs = [PACKAGE_JSON_EXCLUDE];
  for (const glob of extraExcludes) {
    const spec = toPathspec(glob.trim());
    if (spec !== ":!" && !pathspecs.includes(spec)) {
      pathspecs.push(spec);
    }
  }
  return ["diff", target, "--", ".", ...pathspecs];
}

/**
 * Diff the working tree against `target`. Returns "" when git fails; the
 * failure is logged, never thrown.
 */
export async function getGitDiff(target: string, options: GitDiffOptions = {}): Promise<string> {
  const runner = options.runner ?? execGit;
  const logger = (options.logger ?? getLogger()).child({ target });
  const cwd = options.cwd ?? process.cwd();
  const args = buildDiffArgs(target, options.excludes);

  logger.debug("Running git diff", { args, cwd });

  try {
    const result = await runner(args, { cwd });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new GitDiffError(
        `git diff exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ""}`,
        result.exitCode,
        stderr
      );
    }
    logger.debug("git diff finished", { bytes: Buffer.byteLength(result.stdout) });
    return result.stdout;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error getting git diff: ${message}`, {
      exitCode: error instanceof GitDiffError ? error.exitCode : undefined
    });
    return "";
  }
}
