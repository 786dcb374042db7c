import type { Command } from "commander";
import type { Reporter } from "../reporter.mjs";

export interface CliContext {
  reporter: Reporter;
  setExitCode(code: number): void;
}

export interface CommonOptions {
  fix?: boolean;
}

export function lintCommand(program: Command, name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .argument("<file...>", "files to lint")
    .option("--fix", "apply suggested fixes to the files");
}
