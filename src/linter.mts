import { getDisabledEnabledBoundaries, isWarningRangeEnabled } from "./directives.mjs";
import { OverlappingReplacementsError } from "./errors.mjs";
import { Lines } from "./lines.mjs";
import type { DirectiveRange, Span } from "./types.mjs";
import { compareSpans, LintWarning, type Replacement } from "./warnings.mjs";

export class Linter {
  readonly filename: string;
  readonly content: string;
  readonly checkName: string;
  readonly lines: Lines;
  readonly warnings: LintWarning[] = [];
  readonly boundaries: DirectiveRange[];

  constructor(filename: string, content: string, checkName = "") {
    this.filename = filename;
    this.content = content;
    this.checkName = checkName;
    this.lines = new Lines(content);
    this.boundaries = getDisabledEnabledBoundaries(this.lines, checkName);
  }

  addWarning(pos: Span, msg: string): LintWarning {
    const warning = new LintWarning(pos, msg);
    this.warnings.push(warning);
    return warning;
  }

  isWarningEnabled(warning: LintWarning): boolean {
    return isWarningRangeEnabled(this.boundaries, warning.pos);
  }

  enabledWarnings(): LintWarning[] {
    return this.warnings
      .filter((warning) => this.isWarningEnabled(warning))
      .sort((a, b) => compareSpans(a.pos, b.pos));
  }

  fix(): string {
    const replacements: Replacement[] = this.warnings
      .filter((warning) => this.isWarningEnabled(warning))
      .flatMap((warning) => warning.replacements)
      .sort((a, b) => compareSpans(a.pos, b.pos));

    for (let index = 0; index + 1 < replacements.length; index += 1) {
      const current = replacements[index];
      const next = replacements[index + 1];
      if (current.pos[1] > next.pos[0]) {
        throw new OverlappingReplacementsError(current, next);
      }
    }

    let cursor = 0;
    let fixed = "";
    for (const replacement of replacements) {
      fixed += this.content.slice(cursor, replacement.pos[0]);
      fixed += replacement.newText;
      cursor = replacement.pos[1];
    }
    return fixed + this.content.slice(cursor);
  }
}
