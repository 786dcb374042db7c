import type { Command } from "commander";
import { CONDA_YES_CHECK_NAME, checkCondaYes } from "../checks/verify-conda-yes.mjs";
import { LintMain } from "../main.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

export function registerCondaYesCommand(program: Command, context: CliContext): void {
  lintCommand(
    program,
    CONDA_YES_CHECK_NAME,
    "Verify that interactive conda commands in shell scripts pass -y."
  ).action((files: string[], options: CommonOptions) => {
    const main = new LintMain(CONDA_YES_CHECK_NAME, context.reporter);
    main.addCheck(checkCondaYes);
    context.setExitCode(main.run({ files, fix: options.fix ?? false }));
  });
}
