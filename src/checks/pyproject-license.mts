import type { Linter } from "../linter.mjs";
import type { Span } from "../types.mjs";
import {
  findTableAppendLocation,
  findValueLocation,
  parseToml,
  scanTomlLayout
} from "../utils/toml.mjs";

export const PYPROJECT_LICENSE_CHECK_NAME = "verify-pyproject-license";
export const RAPIDS_LICENSE = "Apache 2.0";
export const ACCEPTABLE_LICENSES: ReadonlySet<string> = new Set([RAPIDS_LICENSE, "BSD-3-Clause"]);

const LICENSE_ENTRY = `license = { text = ${JSON.stringify(RAPIDS_LICENSE)} }\n`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function licenseText(project: unknown): { present: boolean; text: string | null } {
  if (!isRecord(project) || project.license === undefined) {
    return { present: false, text: null };
  }
  const license = project.license;
  if (typeof license === "string") {
    return { present: true, text: license };
  }
  if (isRecord(license) && typeof license.text === "string") {
    return { present: true, text: license.text };
  }
  return { present: true, text: null };
}

function addMissingLicense(linter: Linter, layout: ReturnType<typeof scanTomlLayout>): void {
  const message = `add project.license with value { text = ${JSON.stringify(RAPIDS_LICENSE)} }`;
  const append = findTableAppendLocation(layout, ["project"]);
  if (append) {
    const pos: Span = [append.position, append.position];
    linter
      .addWarning(pos, message)
      .addReplacement(pos, `${append.needsNewline ? "\n" : ""}${LICENSE_ENTRY}`);
    return;
  }

  const end = linter.content.length;
  const needsNewline = end > 0 && !linter.content.endsWith("\n");
  linter
    .addWarning([end, end], message)
    .addReplacement([end, end], `${needsNewline ? "\n" : ""}[project]\n${LICENSE_ENTRY}`);
}

export function checkPyprojectLicense(linter: Linter): void {
  const document = parseToml(linter.filename, linter.content);
  const layout = scanTomlLayout(linter.content);
  const { present, text } = licenseText(document.project);

  if (!present) {
    addMissingLicense(linter, layout);
    return;
  }
  if (text !== null && ACCEPTABLE_LICENSES.has(text)) {
    return;
  }

  const pos =
    findValueLocation(layout, ["project", "license", "text"]) ??
    findValueLocation(layout, ["project", "license"]);
  if (pos) {
    linter.addWarning(pos, `license should be ${JSON.stringify(RAPIDS_LICENSE)}`);
  }
}
