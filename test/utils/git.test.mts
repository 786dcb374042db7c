import childProcess from "node:child_process";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { GitError } from "../../src/errors.mts";
import { GitRepository } from "../../src/utils/git.mts";
import { cleanupTempDir, createTempDir, createTempRepo, git, hasGitCommand, writeText } from "../helpers.mts";

const testIfGit = hasGitCommand ? test : test.skip;

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      cleanupTempDir(dir);
    }
  }
});

function commitAll(repo: string, message: string): void {
  git(repo, "add", ".");
  git(repo, "commit", "--quiet", "-m", message);
}

// Committer dates have one-second resolution, so ordering tests pin them.
function commitAt(repo: string, message: string, date: string): void {
  git(repo, "add", ".");
  const result = childProcess.spawnSync(
    "git",
    [
      "-c",
      "user.name=Test",
      "-c",
      "user.email=test@example.com",
      "-c",
      "commit.gpgsign=false",
      "commit",
      "--quiet",
      "-m",
      message
    ],
    { cwd: repo, encoding: "utf8", env: { ...process.env, GIT_COMMITTER_DATE: date } }
  );
  expect(result.status).toBe(0);
}

function repoWithReleaseBranches(): string {
  const repo = createTempRepo("main");
  tempDirs.push(repo);
  writeText(path.join(repo, "README.md"), "hello\n");
  commitAll(repo, "Initial commit");
  git(repo, "branch", "branch-24.06");
  git(repo, "branch", "branch-24.10");
  git(repo, "branch", "branch-24.08");
  return repo;
}

testIfGit("picks the newest release branch as the target", () => {
  const repository = new GitRepository(repoWithReleaseBranches());
  expect(repository.targetBranch({})).toBe("branch-24.10");
});

testIfGit("prefers explicit target branches in order", () => {
  const repo = repoWithReleaseBranches();
  const repository = new GitRepository(repo);
  const env = {
    TARGET_BRANCH: "from-target",
    GITHUB_BASE_REF: "from-github",
    RAPIDS_BASE_BRANCH: "from-rapids"
  };

  expect(repository.targetBranch(env, { targetBranch: "from-option", mainBranch: "main" })).toBe("from-option");
  expect(repository.targetBranch(env)).toBe("from-target");
  expect(repository.targetBranch({ GITHUB_BASE_REF: "from-github", RAPIDS_BASE_BRANCH: "from-rapids" })).toBe(
    "from-github"
  );
  expect(repository.targetBranch({ RAPIDS_BASE_BRANCH: "from-rapids" })).toBe("from-rapids");

  git(repo, "config", "rapidsai.baseBranch", "from-config");
  expect(repository.targetBranch({}, { mainBranch: "main" })).toBe("from-config");
  git(repo, "config", "--unset", "rapidsai.baseBranch");
  expect(repository.targetBranch({}, { mainBranch: "main" })).toBe("main");
});

testIfGit("returns no target branch without release branches", () => {
  const repo = createTempRepo("main");
  tempDirs.push(repo);
  writeText(path.join(repo, "README.md"), "hello\n");
  commitAll(repo, "Initial commit");

  expect(new GitRepository(repo).targetBranch({})).toBeNull();
});

testIfGit("resolves the newest of a branch and its remote copies", () => {
  const repo = createTempRepo("branch-24.08");
  tempDirs.push(repo);
  writeText(path.join(repo, "README.md"), "hello\n");
  commitAt(repo, "Initial commit", "2024-01-01T00:00:00Z");
  const local = git(repo, "rev-parse", "HEAD").trim();

  const repository = new GitRepository(repo);
  expect(repository.targetBranchUpstreamCommit("branch-24.08")).toBe(local);

  git(repo, "checkout", "--quiet", "-b", "feature");
  writeText(path.join(repo, "README.md"), "newer\n");
  commitAt(repo, "Newer commit", "2024-02-01T00:00:00Z");
  const newer = git(repo, "rev-parse", "HEAD").trim();
  git(repo, "remote", "add", "upstream", "https://example.invalid/repo.git");
  git(repo, "update-ref", "refs/remotes/upstream/branch-24.08", newer);

  expect(repository.targetBranchUpstreamCommit("branch-24.08")).toBe(newer);
  expect(repository.targetBranchUpstreamCommit("no-such-branch")).toBe(newer);
  expect(repository.targetBranchUpstreamCommit(null)).toBe(newer);
});

testIfGit("has no upstream commit in an empty repository", () => {
  const repo = createTempRepo("main");
  tempDirs.push(repo);
  expect(new GitRepository(repo).targetBranchUpstreamCommit(null)).toBeNull();
});

testIfGit("reports renamed, modified and untracked files", () => {
  const repo = createTempRepo("branch-24.08");
  tempDirs.push(repo);
  writeText(path.join(repo, "old-name.txt"), "a fairly long line so the rename is detected\n");
  writeText(path.join(repo, "modified.txt"), "before\n");
  writeText(path.join(repo, "deleted.txt"), "gone\n");
  commitAll(repo, "Initial commit");
  const base = git(repo, "rev-parse", "HEAD").trim();

  git(repo, "checkout", "--quiet", "-b", "feature");
  git(repo, "mv", "old-name.txt", "new-name.txt");
  git(repo, "rm", "--quiet", "deleted.txt");
  writeText(path.join(repo, "modified.txt"), "after\n");
  writeText(path.join(repo, "added.txt"), "added\n");
  git(repo, "add", "added.txt");
  writeText(path.join(repo, "sub", "untracked.txt"), "new\n");

  const repository = new GitRepository(repo);
  const commit = repository.targetBranchUpstreamCommit("branch-24.08");
  expect(commit).toBe(base);

  const changed = repository.changedFiles(commit);
  expect(Object.fromEntries(changed)).toEqual({
    "new-name.txt": { changeType: "R", old: { commit: base, path: "old-name.txt" } },
    "modified.txt": { changeType: "M", old: { commit: base, path: "modified.txt" } },
    "added.txt": { changeType: "A", old: null },
    "sub/untracked.txt": { changeType: "A", old: null }
  });
  expect(repository.readFile({ commit: base, path: "modified.txt" })).toBe("before\n");
  expect(repository.relativePath(path.join(repo, "sub", "untracked.txt"))).toBe("sub/untracked.txt");
});

testIfGit("counts every file as added without a commit", () => {
  const repo = createTempRepo("main");
  tempDirs.push(repo);
  writeText(path.join(repo, "tracked.txt"), "tracked\n");
  git(repo, "add", "tracked.txt");
  writeText(path.join(repo, "untracked.txt"), "untracked\n");

  expect(Object.fromEntries(new GitRepository(repo).changedFiles(null))).toEqual({
    "tracked.txt": { changeType: "A", old: null },
    "untracked.txt": { changeType: "A", old: null }
  });
});

testIfGit("raises GitError outside a repository", () => {
  const dir = createTempDir();
  tempDirs.push(dir);
  expect(() => new GitRepository(dir).topLevel()).toThrow(GitError);
});
