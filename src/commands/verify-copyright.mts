import type { Command } from "commander";
import {
  COPYRIGHT_CHECK_NAME,
  type CopyrightOptions,
  DEFAULT_SPDX_LICENSE_IDENTIFIER,
  createCopyrightCheck
} from "../checks/copyright.mjs";
import { LintMain } from "../main.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

interface CopyrightCommandOptions extends CommonOptions {
  spdx?: boolean;
  forceSpdx?: boolean;
  spdxLicenseIdentifier: string;
  mainBranch?: string;
  targetBranch?: string;
}

export function registerCopyrightCommand(program: Command, context: CliContext): void {
  lintCommand(
    program,
    COPYRIGHT_CHECK_NAME,
    "Verify that changed files carry an up-to-date NVIDIA copyright notice."
  )
    .option("--spdx", "require SPDX headers in changed files")
    .option("--force-spdx", "require SPDX headers in every file, changed or not")
    .option(
      "--spdx-license-identifier <identifier>",
      "expected SPDX-License-Identifier",
      DEFAULT_SPDX_LICENSE_IDENTIFIER
    )
    .option("--main-branch <branch>", "branch to compare against when no target branch is configured")
    .option("--target-branch <branch>", "branch to compare against, overriding the environment and git config")
    .action((files: string[], options: CopyrightCommandOptions) => {
      const main = new LintMain<CopyrightOptions>(COPYRIGHT_CHECK_NAME, context.reporter);
      main.addCheck(createCopyrightCheck({ warn: (message) => context.reporter.warn(message) }));
      context.setExitCode(
        main.run({
          files,
          fix: options.fix ?? false,
          spdx: options.spdx ?? false,
          forceSpdx: options.forceSpdx ?? false,
          spdxLicenseIdentifier: options.spdxLicenseIdentifier,
          mainBranch: options.mainBranch,
          targetBranch: options.targetBranch
        })
      );
    });
}
