import childProcess from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ReportOutput } from "../src/types.mts";

export function createTempDir(prefix = "rapids-pre-commit-hooks-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function writeText(filePath: string, content: string | Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

export function cleanupTempDir(dirPath: string): void {
  fs.rmSync(dirPath, { recursive: true, force: true });
}

export function git(cwd: string, ...args: string[]): string {
  const result = childProcess.spawnSync(
    "git",
    ["-c", "user.name=Test", "-c", "user.email=test@example.com", "-c", "commit.gpgsign=false", ...args],
    { cwd, encoding: "utf8" }
  );
  if (result.error || result.status !== 0) {
    throw new Error(`git ${args.join(" ")} failed: ${result.stderr}`);
  }
  return result.stdout;
}

export function createTempRepo(branch = "main"): string {
  const repoPath = createTempDir();
  git(repoPath, "init", "--quiet", `--initial-branch=${branch}`);
  return repoPath;
}

export interface CapturedOutput extends ReportOutput {
  lines: string[];
  warnings: string[];
}

export function captureOutput(): CapturedOutput {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    print(message = "") {
      lines.push(message);
    },
    warn(message) {
      warnings.push(message);
    }
  };
}

export const hasGitCommand: boolean = (() => {
  const result = childProcess.spawnSync("git", ["--version"], { encoding: "utf8" });
  return !result.error && result.status === 0;
})();
