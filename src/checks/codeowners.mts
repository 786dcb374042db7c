import type { Linter } from "../linter.mjs";
import type { LintOptions, Span } from "../types.mjs";
import type { LintWarning } from "../warnings.mjs";

export const CODEOWNERS_CHECK_NAME = "verify-codeowners";

const OWNER_PATTERN_SOURCE = String.raw`(?:[^\n#\s\\]|\\[^\n])+`;
const OWNER_PATTERN = new RegExp(String.raw`\s+(${OWNER_PATTERN_SOURCE})`, "g");
const LINE_PATTERN = new RegExp(
  String.raw`^(${OWNER_PATTERN_SOURCE})((?:\s+${OWNER_PATTERN_SOURCE})+)`
);

export interface CodeownersOptions extends LintOptions {
  projectPrefix: string;
}

export interface FilePattern {
  filename: string;
  pos: Span;
}

export interface Owner {
  owner: string;
  pos: Span;
  posWithLeadingWhitespace: Span;
}

export interface CodeownersLine {
  file: FilePattern;
  owners: Owner[];
}

export type OwnerTemplate = (projectPrefix: string) => string;

export interface RequiredCodeownersLine {
  file: string;
  owners: OwnerTemplate[];
  allowExtra?: boolean;
  // Files whose lines must appear earlier in CODEOWNERS.
  after?: string[];
}

export function hardCodedCodeowners(owner: string): OwnerTemplate {
  return () => owner;
}

export function projectCodeowners(category: string): OwnerTemplate {
  return (projectPrefix) => `@rapidsai/${projectPrefix}-${category}-codeowners`;
}

export const REQUIRED_CODEOWNERS_LINES: readonly RequiredCodeownersLine[] = [
  {
    file: "CMakeLists.txt",
    owners: [projectCodeowners("cmake")]
  },
  {
    file: "pyproject.toml",
    owners: [hardCodedCodeowners("@rapidsai/ci-codeowners")],
    allowExtra: true,
    after: ["CMakeLists.txt"]
  }
];

export interface FoundCodeownersLine {
  required: RequiredCodeownersLine;
  pos: Span;
}

export function parseCodeownersLine(line: string, skip: number): CodeownersLine | null {
  const lineMatch = LINE_PATTERN.exec(line);
  if (!lineMatch) {
    return null;
  }

  const filename = lineMatch[1];
  const owners: Owner[] = [];
  const ownersSkip = skip + filename.length;
  for (const ownerMatch of lineMatch[2].matchAll(OWNER_PATTERN)) {
    const whitespaceStart = ownerMatch.index ?? 0;
    const end = whitespaceStart + ownerMatch[0].length;
    const start = end - ownerMatch[1].length;
    owners.push({
      owner: ownerMatch[1],
      pos: [start + ownersSkip, end + ownersSkip],
      posWithLeadingWhitespace: [whitespaceStart + ownersSkip, end + ownersSkip]
    });
  }

  return {
    file: { filename, pos: [skip, skip + filename.length] },
    owners
  };
}

export function checkCodeownersLine(
  linter: Linter,
  options: CodeownersOptions,
  codeownersLine: CodeownersLine,
  foundLines: FoundCodeownersLine[],
  requiredLines: readonly RequiredCodeownersLine[] = REQUIRED_CODEOWNERS_LINES
): void {
  const required = requiredLines.find((candidate) => candidate.file === codeownersLine.file.filename);
  if (!required) {
    return;
  }

  const requiredOwners = required.owners.map((template) => template(options.projectPrefix));
  let warning: LintWarning | null = null;
  const incorrectOwners = (): LintWarning =>
    (warning ??= linter.addWarning(
      codeownersLine.file.pos,
      `file '${codeownersLine.file.filename}' has incorrect owners`
    ));

  if (!required.allowExtra) {
    for (const owner of codeownersLine.owners) {
      if (!requiredOwners.includes(owner.owner)) {
        incorrectOwners().addReplacement(owner.posWithLeadingWhitespace, "");
      }
    }
  }

  const presentOwners = new Set(codeownersLine.owners.map((owner) => owner.owner));
  const missingOwners = requiredOwners.filter((owner) => !presentOwners.has(owner));
  const lastOwner = codeownersLine.owners[codeownersLine.owners.length - 1];
  if (missingOwners.length > 0 && lastOwner) {
    const end = lastOwner.pos[1];
    incorrectOwners().addReplacement(
      [end, end],
      missingOwners.map((owner) => ` ${owner}`).join("")
    );
  }

  foundLines.push({ required, pos: codeownersLine.file.pos });
}

function checkOrdering(linter: Linter, foundLines: FoundCodeownersLine[]): void {
  for (const found of foundLines) {
    for (const afterFile of found.required.after ?? []) {
      const later = foundLines.filter(
        (candidate) => candidate.required.file === afterFile && candidate.pos[0] > found.pos[0]
      );
      if (later.length === 0) {
        continue;
      }
      const warning = linter.addWarning(
        found.pos,
        `file '${found.required.file}' should come after '${afterFile}'`
      );
      for (const candidate of later) {
        warning.addNote(candidate.pos, `file '${afterFile}' is here`);
      }
    }
  }
}

export function checkCodeowners(
  linter: Linter,
  options: CodeownersOptions,
  requiredLines: readonly RequiredCodeownersLine[] = REQUIRED_CODEOWNERS_LINES
): void {
  const foundLines: FoundCodeownersLine[] = [];
  for (const [begin, end] of linter.lines.pos) {
    const codeownersLine = parseCodeownersLine(linter.content.slice(begin, end), begin);
    if (codeownersLine) {
      checkCodeownersLine(linter, options, codeownersLine, foundLines, requiredLines);
    }
  }

  checkOrdering(linter, foundLines);

  const foundFiles = new Set(foundLines.map((found) => found.required.file));
  let newText = requiredLines
    .filter((required) => !foundFiles.has(required.file))
    .map(
      (required) =>
        `${required.file} ${required.owners.map((template) => template(options.projectPrefix)).join(" ")}\n`
    )
    .join("");
  if (newText.length === 0) {
    return;
  }

  if (linter.content.length > 0 && !linter.content.endsWith("\n")) {
    newText = `\n${newText}`;
  }
  const contentLength = linter.content.length;
  linter
    .addWarning([0, 0], "missing required codeowners")
    .addReplacement([contentLength, contentLength], newText);
}
