import type { Command } from "commander";
import {
  PYPROJECT_LICENSE_CHECK_NAME,
  RAPIDS_LICENSE,
  checkPyprojectLicense
} from "../checks/pyproject-license.mjs";
import { LintMain } from "../main.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

export function registerPyprojectLicenseCommand(program: Command, context: CliContext): void {
  lintCommand(
    program,
    PYPROJECT_LICENSE_CHECK_NAME,
    `Verify that pyproject.toml has the correct license ("${RAPIDS_LICENSE}").`
  ).action((files: string[], options: CommonOptions) => {
    const main = new LintMain(PYPROJECT_LICENSE_CHECK_NAME, context.reporter);
    main.addCheck(checkPyprojectLicense);
    context.setExitCode(main.run({ files, fix: options.fix ?? false }));
  });
}
