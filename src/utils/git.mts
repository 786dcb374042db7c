import childProcess from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { GitError } from "../errors.mjs";

const BRANCH_PATTERN = /^branch-(\d+)\.(\d+)$/;
const TARGET_BRANCH_ENV_VARS = ["TARGET_BRANCH", "GITHUB_BASE_REF", "RAPIDS_BASE_BRANCH"] as const;

export interface OldFile {
  commit: string;
  path: string;
}

// Type changes are reported as modifications.
export type ChangeType = "A" | "M" | "R" | "C";

export interface ChangedFile {
  changeType: ChangeType;
  // The version at the merge base, or null for added and untracked files.
  old: OldFile | null;
}

export type ChangedFiles = Map<string, ChangedFile>;

export type GitEnvironment = Partial<Record<(typeof TARGET_BRANCH_ENV_VARS)[number], string>>;

export interface TargetBranchOptions {
  targetBranch?: string;
  mainBranch?: string;
}

function splitNul(output: string): string[] {
  return output.split("\0").filter((field) => field.length > 0);
}

export class GitRepository {
  constructor(readonly cwd: string = process.cwd()) {}

  run(args: string[]): string {
    const result = childProcess.spawnSync("git", args, { cwd: this.cwd, encoding: "utf8" });
    if (result.error) {
      throw new GitError(`failed to run git: ${result.error.message}`, args);
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim();
      throw new GitError(detail || `git ${args.join(" ")} failed`, args);
    }
    return result.stdout;
  }

  // Like run(), but a non-zero exit status means "no answer".
  tryRun(args: string[]): string | null {
    const result = childProcess.spawnSync("git", args, { cwd: this.cwd, encoding: "utf8" });
    if (result.error) {
      throw new GitError(`failed to run git: ${result.error.message}`, args);
    }
    return result.status === 0 ? result.stdout : null;
  }

  topLevel(): string {
    return this.run(["rev-parse", "--show-toplevel"]).trim();
  }

  branches(): string[] {
    return this.run(["for-each-ref", "--format=%(refname:short)", "refs/heads/"])
      .split("\n")
      .filter((name) => name.length > 0);
  }

  remotes(): string[] {
    return this.run(["remote"])
      .split("\n")
      .filter((name) => name.length > 0);
  }

  /**
   * Resolves the branch a pull request targets. Explicit names (the
   * `targetBranch` option, then the environment, then `rapidsai.baseBranch`,
   * then `mainBranch`) are returned whether or not they exist locally; the
   * newest `branch-YY.MM` is the fallback.
   */
  targetBranch(env: GitEnvironment, options: TargetBranchOptions = {}): string | null {
    if (options.targetBranch) {
      return options.targetBranch;
    }
    for (const variable of TARGET_BRANCH_ENV_VARS) {
      const name = env[variable];
      if (name) {
        return name;
      }
    }

    const configured = this.tryRun(["config", "--get", "rapidsai.baseBranch"])?.trim();
    if (configured) {
      return configured;
    }
    if (options.mainBranch) {
      return options.mainBranch;
    }

    const releaseBranches = this.branches()
      .map((name) => ({ name, match: BRANCH_PATTERN.exec(name) }))
      .flatMap(({ name, match }) =>
        match ? [{ name, major: Number(match[1]), minor: Number(match[2]) }] : []
      )
      .sort((a, b) => b.major - a.major || b.minor - a.minor);
    return releaseBranches[0]?.name ?? null;
  }

  /**
   * The most recently committed of the branch, its configured upstream and
   * any remote branch of the same name. Falls back to HEAD, which is null in
   * a repository without commits.
   */
  targetBranchUpstreamCommit(branch: string | null): string | null {
    const head = this.tryRun(["rev-parse", "--verify", "--quiet", "HEAD"])?.trim() || null;
    if (branch === null) {
      return head;
    }

    const candidates = new Set([
      `refs/heads/${branch}`,
      ...this.remotes().map((remote) => `refs/remotes/${remote}/${branch}`)
    ]);
    const upstream = this.tryRun(["rev-parse", "--symbolic-full-name", `${branch}@{upstream}`])?.trim();
    if (upstream) {
      candidates.add(upstream);
    }

    const newest = this.run([
      "for-each-ref",
      "--sort=-committerdate",
      "--format=%(objectname) %(refname)",
      "refs/heads/",
      "refs/remotes/"
    ])
      .split("\n")
      .map((line) => line.split(" "))
      .find(([commit, ref]) => commit && ref && candidates.has(ref));
    return newest ? newest[0] : head;
  }

  /**
   * Files that differ between the merge base of `commit` and HEAD and the
   * working tree, plus untracked files. Without a commit every file counts
   * as added.
   */
  changedFiles(commit: string | null): ChangedFiles {
    const changed: ChangedFiles = new Map();
    const untracked = splitNul(
      this.run(["ls-files", "--others", "--exclude-standard", "--full-name", "-z", ":/"])
    );

    if (commit === null) {
      for (const file of [...splitNul(this.run(["ls-files", "--full-name", "-z", ":/"])), ...untracked]) {
        changed.set(file, { changeType: "A", old: null });
      }
      return changed;
    }

    const base = this.run(["merge-base", commit, "HEAD"]).trim();
    const fields = this.run([
      "diff",
      "--name-status",
      "-z",
      "--find-renames",
      "--find-copies",
      "--find-copies-harder",
      base
    ]).split("\0");

    let index = 0;
    while (index < fields.length && fields[index].length > 0) {
      const status = fields[index];
      if (status.startsWith("R") || status.startsWith("C")) {
        changed.set(fields[index + 2], {
          changeType: status.startsWith("R") ? "R" : "C",
          old: { commit: base, path: fields[index + 1] }
        });
        index += 3;
        continue;
      }
      if (status === "A") {
        changed.set(fields[index + 1], { changeType: "A", old: null });
      } else if (status !== "D") {
        changed.set(fields[index + 1], { changeType: "M", old: { commit: base, path: fields[index + 1] } });
      }
      index += 2;
    }

    for (const file of untracked) {
      changed.set(file, { changeType: "A", old: null });
    }
    return changed;
  }

  readFile(file: OldFile): string {
    return this.run(["show", `${file.commit}:${file.path}`]);
  }

  // Path of `filename` relative to the top level, with forward slashes.
  relativePath(filename: string): string {
    const absolute = path.resolve(fs.realpathSync(this.cwd), filename);
    return path.relative(this.topLevel(), absolute).split(path.sep).join("/");
  }
}
