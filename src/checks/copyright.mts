import { Lines } from "../lines.mjs";
import type { Linter } from "../linter.mjs";
import type { LintCheck, LintOptions, Span } from "../types.mjs";
import {
  type ChangedFiles,
  type ChangeType,
  type GitEnvironment,
  GitRepository
} from "../utils/git.mjs";

export const COPYRIGHT_CHECK_NAME = "verify-copyright";
export const DEFAULT_SPDX_LICENSE_IDENTIFIER = "Apache-2.0";

const COPYRIGHT_PATTERN = /Copyright *(?:\(c\))? *((\d{4})(?:-(\d{4}))?),? *NVIDIA C(?:ORPORATION|orporation)/g;
const SPDX_COPYRIGHT_TAG = "SPDX-FileCopyrightText: ";
const SPDX_COPYRIGHT_TAG_PATTERN = /SPDX-FileCopyrightText: *$/;
const SPDX_LICENSE_TAG = "SPDX-License-Identifier: ";
const SPDX_LICENSE_PATTERN = /^(SPDX-License-Identifier: *)(\S(?:.*\S)?)\s*$/;

const LONG_FORM_TEXTS: Readonly<Record<string, readonly string[]>> = {
  "Apache-2.0": [
    'Licensed under the Apache License, Version 2.0 (the "License");',
    "you may not use this file except in compliance with the License.",
    "You may obtain a copy of the License at",
    "",
    "    http://www.apache.org/licenses/LICENSE-2.0",
    "",
    "Unless required by applicable law or agreed to in writing, software",
    'distributed under the License is distributed on an "AS IS" BASIS,',
    "WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.",
    "See the License for the specific language governing permissions and",
    "limitations under the License."
  ]
};

export interface CopyrightOptions extends LintOptions {
  spdx: boolean;
  forceSpdx: boolean;
  spdxLicenseIdentifier: string;
  mainBranch?: string;
  targetBranch?: string;
}

/**
 * One copyright header. `span` runs from the SPDX tag (or `Copyright`) to the
 * end of the header: the copyright line, a following
 * `SPDX-License-Identifier` line and any long-form license text after them.
 */
export interface CopyrightMatch {
  span: Span;
  spdxFileCopyrightTextTagSpan: Span | null;
  // `Copyright ...` up to the end of its line.
  fullCopyrightTextSpan: Span;
  // `Copyright ... NVIDIA CORPORATION` without trailing text.
  nvidiaCopyrightTextSpan: Span;
  yearsSpan: Span;
  firstYearSpan: Span;
  lastYearSpan: Span | null;
  spdxLicenseIdentifierTagSpan: Span | null;
  spdxLicenseIdentifierTextSpan: Span | null;
  longFormTextSpan: Span | null;
  // Comment leader before the header, such as `# ` or `/* `.
  prefix: string;
}

export interface FileChange {
  changeType: ChangeType;
  oldFilename: string | null;
  oldContent: string | null;
}

function spanText(content: string, span: Span): string {
  return content.slice(span[0], span[1]);
}

function lineText(lines: Lines, line: number): string {
  return spanText(lines.content, lines.pos[line]);
}

// Lines after the first one of a `/*` comment continue with ` * `.
export function continuationPrefix(prefix: string): string {
  return prefix.replace("/*", " *");
}

/**
 * Finds the long-form license text on the lines after the one holding
 * `index`, each line carrying the same comment prefix. One blank comment line
 * may come first; the returned span then starts at its end.
 */
export function findLongFormText(lines: Lines, identifier: string, index: number): Span | null {
  const text = LONG_FORM_TEXTS[identifier];
  if (!text) {
    return null;
  }

  const line = lines.lineForPos(index);
  const prefix = continuationPrefix(lines.content.slice(lines.pos[line][0], index));
  const blank = prefix.trimEnd();
  let current = line + 1;
  if (current >= lines.pos.length) {
    return null;
  }

  let start = lines.pos[current][0];
  if (lineText(lines, current).trimEnd() === blank) {
    start = lines.pos[current][1];
    current += 1;
  }

  for (const expected of text) {
    if (current >= lines.pos.length) {
      return null;
    }
    const wanted = expected === "" ? blank : prefix + expected;
    if (lineText(lines, current).trimEnd() !== wanted.trimEnd()) {
      return null;
    }
    current += 1;
  }
  return [start, lines.pos[current - 1][1]];
}

export function matchCopyright(lines: Lines, start = 0): CopyrightMatch | null {
  const { content } = lines;
  const pattern = new RegExp(COPYRIGHT_PATTERN.source, "g");
  pattern.lastIndex = start;
  const match = pattern.exec(content);
  if (!match) {
    return null;
  }

  const matchStart = match.index;
  const line = lines.lineForPos(matchStart);
  const [lineStart, lineEnd] = lines.pos[line];

  const tag = SPDX_COPYRIGHT_TAG_PATTERN.exec(content.slice(lineStart, matchStart));
  const spdxFileCopyrightTextTagSpan: Span | null = tag ? [lineStart + tag.index, matchStart] : null;
  const headerStart = spdxFileCopyrightTextTagSpan ? spdxFileCopyrightTextTagSpan[0] : matchStart;
  const prefix = content.slice(lineStart, headerStart);

  const yearsStart = matchStart + match[0].indexOf(match[1]);
  const yearsSpan: Span = [yearsStart, yearsStart + match[1].length];

  let spdxLicenseIdentifierTagSpan: Span | null = null;
  let spdxLicenseIdentifierTextSpan: Span | null = null;
  let end = lineEnd;
  let lastHeaderIndex = headerStart;
  if (line + 1 < lines.pos.length) {
    const next = lines.pos[line + 1];
    const continuation = continuationPrefix(prefix);
    const text = lineText(lines, line + 1);
    const identifier = text.startsWith(continuation)
      ? SPDX_LICENSE_PATTERN.exec(text.slice(continuation.length))
      : null;
    if (identifier) {
      const tagStart = next[0] + continuation.length;
      const textStart = tagStart + identifier[1].length;
      spdxLicenseIdentifierTagSpan = [tagStart, textStart];
      spdxLicenseIdentifierTextSpan = [textStart, textStart + identifier[2].length];
      end = spdxLicenseIdentifierTextSpan[1];
      lastHeaderIndex = tagStart;
    }
  }

  const identifier = spdxLicenseIdentifierTextSpan
    ? spanText(content, spdxLicenseIdentifierTextSpan)
    : DEFAULT_SPDX_LICENSE_IDENTIFIER;
  const longFormTextSpan = findLongFormText(lines, identifier, lastHeaderIndex);

  return {
    span: [headerStart, longFormTextSpan ? longFormTextSpan[1] : end],
    spdxFileCopyrightTextTagSpan,
    fullCopyrightTextSpan: [matchStart, lineEnd],
    nvidiaCopyrightTextSpan: [matchStart, matchStart + match[0].length],
    yearsSpan,
    firstYearSpan: [yearsStart, yearsStart + 4],
    lastYearSpan: match[3] === undefined ? null : [yearsStart + 5, yearsStart + 9],
    spdxLicenseIdentifierTagSpan,
    spdxLicenseIdentifierTextSpan,
    longFormTextSpan,
    prefix
  };
}

export function matchAllCopyright(lines: Lines): CopyrightMatch[] {
  const matches: CopyrightMatch[] = [];
  let match = matchCopyright(lines);
  while (match !== null) {
    matches.push(match);
    match = matchCopyright(lines, match.span[1]);
  }
  return matches;
}

// The text between (and around) copyright headers.
export function stripCopyright(content: string, matches: CopyrightMatch[]): string[] {
  const pieces: string[] = [];
  let start = 0;
  for (const match of matches) {
    pieces.push(content.slice(start, match.span[0]));
    start = match.span[1];
  }
  pieces.push(content.slice(start));
  return pieces;
}

function samePieces(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((piece, index) => piece === b[index]);
}

function firstYear(content: string, match: CopyrightMatch): number {
  return Number(spanText(content, match.firstYearSpan));
}

function lastYear(content: string, match: CopyrightMatch): number {
  return Number(spanText(content, match.lastYearSpan ?? match.firstYearSpan));
}

function revertCopyrightChanges(
  linter: Linter,
  change: FileChange,
  oldContent: string,
  oldMatches: CopyrightMatch[],
  newMatches: CopyrightMatch[]
): void {
  newMatches.forEach((newMatch, index) => {
    const oldMatch = oldMatches[index];
    const oldText = spanText(oldContent, oldMatch.fullCopyrightTextSpan);
    if (oldText === spanText(linter.content, newMatch.fullCopyrightTextSpan)) {
      return;
    }
    const sameYears =
      spanText(oldContent, oldMatch.yearsSpan) === spanText(linter.content, newMatch.yearsSpan);
    const warning = linter
      .addWarning(
        sameYears ? newMatch.fullCopyrightTextSpan : newMatch.yearsSpan,
        "copyright is not out of date and should not be updated"
      )
      .addReplacement(newMatch.fullCopyrightTextSpan, oldText);

    if ((change.changeType === "R" || change.changeType === "C") && change.oldFilename !== null) {
      const verb = change.changeType === "R" ? "renamed" : "copied";
      const wholeFile: Span = [0, linter.content.length];
      warning
        .addNote(wholeFile, `file was ${verb} from '${change.oldFilename}' and is assumed to share history with it`)
        .addNote(
          wholeFile,
          "change file contents if you want its copyright dates to only be determined by its own edit history"
        );
    }
  });
}

// Only the newest notice has to carry the current year.
function updateCopyrightYears(linter: Linter, matches: CopyrightMatch[], currentYear: number): void {
  if (matches.length === 0) {
    linter.addWarning([0, 0], "no copyright notice found");
    return;
  }

  const newest = matches.reduce((best, match) =>
    lastYear(linter.content, match) >= lastYear(linter.content, best) ? match : best
  );
  if (lastYear(linter.content, newest) >= currentYear) {
    return;
  }
  linter
    .addWarning(newest.yearsSpan, "copyright is out of date")
    .addReplacement(
      newest.nvidiaCopyrightTextSpan,
      `Copyright (c) ${firstYear(linter.content, newest)}-${currentYear}, NVIDIA CORPORATION`
    );
}

function applySpdxChecks(linter: Linter, match: CopyrightMatch, identifier: string): void {
  const [textStart, textEnd] = match.fullCopyrightTextSpan;

  if (match.spdxFileCopyrightTextTagSpan === null) {
    linter
      .addWarning(match.fullCopyrightTextSpan, "include SPDX-FileCopyrightText header")
      .addReplacement([textStart, textStart], SPDX_COPYRIGHT_TAG);
  }

  const tagSpan = match.spdxLicenseIdentifierTagSpan;
  const textSpan = match.spdxLicenseIdentifierTextSpan;
  if (tagSpan === null || textSpan === null) {
    linter
      .addWarning([match.span[0], textEnd], "no SPDX-License-Identifier header found")
      .addReplacement(
        [textEnd, textEnd],
        `\n${continuationPrefix(match.prefix)}${SPDX_LICENSE_TAG}${identifier}`
      );
  } else if (spanText(linter.content, textSpan) !== identifier) {
    linter
      .addWarning([tagSpan[0], textSpan[1]], "SPDX-License-Identifier is incorrect")
      .addReplacement(textSpan, identifier);
  }

  if (match.longFormTextSpan !== null) {
    const headerEnd = textSpan ? textSpan[1] : textEnd;
    linter
      .addWarning(match.longFormTextSpan, "remove long-form copyright text")
      .addReplacement([headerEnd, match.longFormTextSpan[1]], "");
  }
}

export function applyCopyrightCheck(
  linter: Linter,
  options: Pick<CopyrightOptions, "spdx" | "forceSpdx" | "spdxLicenseIdentifier">,
  change: FileChange,
  currentYear: number
): void {
  const newMatches = matchAllCopyright(linter.lines);
  const changed = linter.content !== change.oldContent;

  if (changed) {
    const oldContent = change.oldContent;
    const oldMatches = oldContent === null ? [] : matchAllCopyright(new Lines(oldContent));
    if (
      oldContent !== null &&
      samePieces(stripCopyright(oldContent, oldMatches), stripCopyright(linter.content, newMatches))
    ) {
      revertCopyrightChanges(linter, change, oldContent, oldMatches, newMatches);
    } else {
      updateCopyrightYears(linter, newMatches, currentYear);
    }
  }

  if ((options.forceSpdx || (options.spdx && changed)) && newMatches.length > 0) {
    applySpdxChecks(linter, newMatches[0], options.spdxLicenseIdentifier);
  }
}

export interface CopyrightCheckContext {
  repository?: GitRepository;
  env?: GitEnvironment;
  currentYear?: number;
  warn?: (message: string) => void;
}

/**
 * Builds the check against the files changed since the merge base with the
 * target branch. Git is consulted once, on the first file.
 */
export function createCopyrightCheck(context: CopyrightCheckContext = {}): LintCheck<CopyrightOptions> {
  const repository = context.repository ?? new GitRepository();
  const currentYear = context.currentYear ?? new Date().getFullYear();
  const warn = context.warn ?? ((message: string) => console.warn(message));
  let changedFiles: ChangedFiles | null = null;

  const loadChangedFiles = (options: CopyrightOptions): ChangedFiles => {
    const branch = repository.targetBranch(context.env ?? process.env, {
      targetBranch: options.targetBranch,
      mainBranch: options.mainBranch
    });
    if (branch === null) {
      warn(
        "Could not determine target branch. Try setting the TARGET_BRANCH environment variable, " +
          "or setting the rapidsai.baseBranch configuration option."
      );
    }
    return repository.changedFiles(repository.targetBranchUpstreamCommit(branch));
  };

  return (linter, options) => {
    const changed = (changedFiles ??= loadChangedFiles(options));
    const filename = repository.relativePath(linter.filename);
    if (filename === ".." || filename.startsWith("../")) {
      warn(`File "${linter.filename}" is outside of the repository. Not running linter on it.`);
      return;
    }

    const file = changed.get(filename);
    if (file === undefined) {
      if (options.forceSpdx) {
        applyCopyrightCheck(
          linter,
          options,
          { changeType: "M", oldFilename: filename, oldContent: linter.content },
          currentYear
        );
      }
      return;
    }

    applyCopyrightCheck(
      linter,
      options,
      {
        changeType: file.changeType,
        oldFilename: file.old?.path ?? null,
        oldContent: file.old === null ? null : repository.readFile(file.old)
      },
      currentYear
    );
  };
}
