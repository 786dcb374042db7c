import type { Command } from "commander";
import { CODEOWNERS_CHECK_NAME, type CodeownersOptions, checkCodeowners } from "../checks/codeowners.mjs";
import { LintMain } from "../main.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

interface CodeownersCommandOptions extends CommonOptions {
  projectPrefix: string;
}

export function registerCodeownersCommand(program: Command, context: CliContext): void {
  lintCommand(program, CODEOWNERS_CHECK_NAME, "Verify that the CODEOWNERS file has the correct codeowners.")
    .requiredOption(
      "--project-prefix <prefix>",
      "project prefix to insert for project-specific team names"
    )
    .action((files: string[], options: CodeownersCommandOptions) => {
      const main = new LintMain<CodeownersOptions>(CODEOWNERS_CHECK_NAME, context.reporter);
      main.addCheck(checkCodeowners);
      context.setExitCode(
        main.run({ files, fix: options.fix ?? false, projectPrefix: options.projectPrefix })
      );
    });
}
