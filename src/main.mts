import fs from "node:fs";
import { BinaryFileError } from "./errors.mjs";
import { Linter } from "./linter.mjs";
import { Reporter } from "./reporter.mjs";
import type { LintCheck, LintOptions } from "./types.mjs";

function decodeText(bytes: Buffer): string | null {
  if (bytes.includes(0)) {
    return null;
  }
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

export class LintMain<TOptions extends LintOptions = LintOptions> {
  readonly checkName: string;
  private readonly reporter: Reporter;
  private readonly checks: LintCheck<TOptions>[] = [];

  constructor(checkName: string, reporter: Reporter = new Reporter()) {
    this.checkName = checkName;
    this.reporter = reporter;
  }

  addCheck(check: LintCheck<TOptions>): this {
    this.checks.push(check);
    return this;
  }

  /**
   * Lints every file in `options.files` and returns the process exit status:
   * 1 when any enabled warning was reported, 0 otherwise.
   */
  run(options: TOptions): number {
    let warningsFound = false;

    for (const file of options.files) {
      const content = decodeText(fs.readFileSync(file));
      if (content === null) {
        this.reporter.warn(new BinaryFileError(file).message);
        continue;
      }

      const linter = new Linter(file, content, this.checkName);
      for (const check of this.checks) {
        check(linter, options);
      }

      // Overlapping replacements throw here, before anything is reported as applied.
      const fixed = options.fix ? linter.fix() : content;
      this.reporter.printWarnings(linter, options.fix);
      if (fixed !== content) {
        fs.writeFileSync(file, fixed, "utf8");
      }

      if (linter.enabledWarnings().length > 0) {
        warningsFound = true;
      }
    }

    return warningsFound ? 1 : 0;
  }
}
