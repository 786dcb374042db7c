import fs from "node:fs";
import { ConfigurationError } from "../errors.mjs";
import type { Linter } from "../linter.mjs";
import type { LintOptions, Span } from "../types.mjs";

export const HARDCODED_VERSION_CHECK_NAME = "verify-hardcoded-version";

// Groups of one or two digits, so 26.2 and 26.02.0 both stand for 26.02.00.
const HARDCODED_VERSION_PATTERN = /(?<!\d)((\d{1,2})\.(\d{1,2}))(?:\.(\d{1,2}))?(?!\d)/g;
const VERSION_FILE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{1,2})\n$/;

export interface HardcodedVersionOptions extends LintOptions {
  versionFile: string;
}

export interface FullVersion {
  major: number;
  minor: number;
  patch: number;
}

export interface HardcodedVersionMatch {
  fullVersion: Span;
  majorMinorVersion: Span;
  patchVersion: Span | null;
}

export function findHardcodedVersions(content: string, version: FullVersion): HardcodedVersionMatch[] {
  const matches: HardcodedVersionMatch[] = [];
  for (const match of content.matchAll(HARDCODED_VERSION_PATTERN)) {
    const [full, majorMinor, major, minor, patch] = match;
    if (
      Number(major) !== version.major ||
      Number(minor) !== version.minor ||
      (patch !== undefined && Number(patch) !== version.patch)
    ) {
      continue;
    }
    const start = match.index ?? 0;
    const end = start + full.length;
    matches.push({
      fullVersion: [start, end],
      majorMinorVersion: [start, start + majorMinor.length],
      patchVersion: patch === undefined ? null : [end - patch.length, end]
    });
  }
  return matches;
}

export function readVersionFile(filename: string): FullVersion {
  let content: string;
  try {
    content = fs.readFileSync(filename, "utf8");
  } catch (error) {
    throw new ConfigurationError(`cannot read version file ${filename}`, { cause: error });
  }
  const match = VERSION_FILE_PATTERN.exec(content);
  if (!match) {
    throw new ConfigurationError(
      `version file ${filename} must contain exactly one MAJOR.MINOR.PATCH version followed by a newline`
    );
  }
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function checkHardcodedVersion(
  linter: Linter,
  options: HardcodedVersionOptions,
  readVersion: (filename: string) => FullVersion = readVersionFile
): void {
  if (linter.filename === options.versionFile) {
    return;
  }
  const version = readVersion(options.versionFile);
  for (const match of findHardcodedVersions(linter.content, version)) {
    linter.addWarning(
      match.fullVersion,
      `do not hard-code version, read from ${options.versionFile} file instead`
    );
  }
}
