import chalk from "chalk";
import { Command } from "commander";
import { registerAlphaSpecCommand } from "./commands/verify-alpha-spec.mjs";
import { registerCodeownersCommand } from "./commands/verify-codeowners.mjs";
import { registerCondaYesCommand } from "./commands/verify-conda-yes.mjs";
import { registerCopyrightCommand } from "./commands/verify-copyright.mjs";
import { registerHardcodedVersionCommand } from "./commands/verify-hardcoded-version.mjs";
import { registerPyprojectLicenseCommand } from "./commands/verify-pyproject-license.mjs";
import type { CliContext } from "./commands/shared.mjs";
import { isLintError } from "./errors.mjs";
import { Reporter } from "./reporter.mjs";

export const FATAL_EXIT_CODE = 2;

export function formatError(error: unknown): string {
  if (isLintError(error)) {
    const lines = [chalk.red(`Error: ${error.message}`)];
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`));
    }
    return lines.join("\n");
  }
  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }
  return chalk.red(`Error: ${String(error)}`);
}

export function createProgram(context: CliContext): Command {
  const program = new Command()
    .name("rapids-pre-commit-hooks")
    .description("Source-text linters for pre-commit hooks");

  registerCodeownersCommand(program, context);
  registerAlphaSpecCommand(program, context);
  registerPyprojectLicenseCommand(program, context);
  registerHardcodedVersionCommand(program, context);
  registerCondaYesCommand(program, context);
  registerCopyrightCommand(program, context);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram({
    reporter: new Reporter(),
    setExitCode(code) {
      process.exitCode = code;
    }
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(formatError(error));
    process.exitCode = FATAL_EXIT_CODE;
  }
}
