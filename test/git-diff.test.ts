import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import {
  buildDiffArgs,
  getGitDiff,
  GitCommandRunner,
  PACKAGE_JSON_EXCLUDE
} from "../src/git/diff";
import { Logger } from "../src/logger";
import { captureLogs } from "./helpers";

function recordingRunner(result: { stdout?: string; stderr?: string; exitCode?: number }) {
  const calls: Array<{ args: string[]; cwd: string }> = [];
  const runner: GitCommandRunner = async (args, options) => {
    calls.push({ args, cwd: options.cwd });
    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode: result.exitCode ?? 0 };
  };
  return { runner, calls };
}

describe("buildDiffArgs", () => {
  it("always excludes package*.json verbatim", () => {
    for (const target of ["HEAD~1", "main...feature", "v1.0.0", "--cached", "a b c", "'; rm -rf /'"]) {
      const args = buildDiffArgs(target);
      expect(args).toEqual(["diff", target, "--", ".", ":!package*.json"]);
      expect(args).toContain(PACKAGE_JSON_EXCLUDE);
    }
  });

  it("appends extra excludes once each", () => {
    expect(buildDiffArgs("HEAD", ["dist/**", ":!*.lock", "package*.json", "dist/**", "  "])).toEqual([
      "diff",
      "HEAD",
      "--",
      ".",
      ":!package*.json",
      ":!dist/**",
      ":!*.lock"
    ]);
  });
});

describe("getGitDiff", () => {
  it("returns git stdout unchanged", async () => {
    const diff = "diff --git a/src/a.ts b/src/a.ts\n+const a = 1;\n";
    const { runner, calls } = recordingRunner({ stdout: diff });
    const logs = captureLogs();

    const result = await getGitDiff("HEAD~1", {
      runner,
      cwd: "/repo",
      logger: new Logger({ sink: logs.sink, level: "error" })
    });

    expect(result).toBe(diff);
    expect(calls).toEqual([{ args: ["diff", "HEAD~1", "--", ".", ":!package*.json"], cwd: "/repo" }]);
    expect(logs.entries).toHaveLength(0);
  });

  it("logs and returns an empty string when git exits non-zero", async () => {
    const { runner } = recordingRunner({
      exitCode: 128,
      stderr: "fatal: bad revision 'nope'\n"
    });
    const logs = captureLogs();

    const result = await getGitDiff("nope", { runner, logger: new Logger({ sink: logs.sink }) });

    expect(result).toBe("");
    expect(logs.messages()).toEqual([
      "Error getting git diff: git diff exited with code 128: fatal: bad revision 'nope'"
    ]);
    expect(logs.entries[0]).toMatchObject({ level: 50, exitCode: 128, target: "nope" });
  });

  it("returns an empty string when git cannot be started", async () => {
    const logs = captureLogs();
    const missingDir = path.join(os.tmpdir(), "diff-timer-does-not-exist", String(Date.now()));

    const result = await getGitDiff("HEAD", { cwd: missingDir, logger: new Logger({ sink: logs.sink }) });

    expect(result).toBe("");
    expect(logs.messages()).toHaveLength(1);
    expect(logs.messages()[0]).toMatch(/^Error getting git diff: /);
  });

  it("returns an empty string when the runner rejects", async () => {
    const runner: GitCommandRunner = async () => {
      throw new Error("spawn git ENOENT");
    };
    const logs = captureLogs();

    const result = await getGitDiff("HEAD", { runner, logger: new Logger({ sink: logs.sink }) });

    expect(result).toBe("");
    expect(logs.messages()).toEqual(["Error getting git diff: spawn git ENOENT"]);
  });
});
