import type { Command } from "commander";
import {
  HARDCODED_VERSION_CHECK_NAME,
  type HardcodedVersionOptions,
  checkHardcodedVersion
} from "../checks/hardcoded-version.mjs";
import { LintMain } from "../main.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

interface HardcodedVersionCommandOptions extends CommonOptions {
  versionFile: string;
}

export function registerHardcodedVersionCommand(program: Command, context: CliContext): void {
  lintCommand(
    program,
    HARDCODED_VERSION_CHECK_NAME,
    "Verify that files do not contain hard-coded software versions."
  )
    .option("--version-file <file>", "file to read the version from", "VERSION")
    .action((files: string[], options: HardcodedVersionCommandOptions) => {
      const main = new LintMain<HardcodedVersionOptions>(HARDCODED_VERSION_CHECK_NAME, context.reporter);
      main.addCheck(checkHardcodedVersion);
      context.setExitCode(
        main.run({ files, fix: options.fix ?? false, versionFile: options.versionFile })
      );
    });
}
