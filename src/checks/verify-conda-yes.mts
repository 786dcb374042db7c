import type { Linter } from "../linter.mjs";
import { type ShellCommand, splitShellCommands } from "../utils/shell.mjs";

export const CONDA_YES_CHECK_NAME = "verify-conda-yes";

const YES_ARGS = ["-y", "--yes"];

export const INTERACTIVE_CONDA_COMMANDS: ReadonlySet<string> = new Set([
  "clean",
  "create",
  "install",
  "remove",
  "uninstall",
  "update",
  "upgrade"
]);

const GLOBAL_FLAGS = new Set(["-h", "--help", "--no-plugins", "-V"]);
const EARLY_EXIT_FLAGS = new Set(["-h", "--help", "-V"]);

function checkCondaCommand(linter: Linter, command: ShellCommand): void {
  if (command[0]?.word !== "conda") {
    return;
  }

  const commandIndex = command.findIndex((part, index) => index > 0 && !GLOBAL_FLAGS.has(part.word));
  if (commandIndex < 0) {
    return;
  }
  if (command.slice(1, commandIndex).some((part) => EARLY_EXIT_FLAGS.has(part.word))) {
    return;
  }

  const subcommand = command[commandIndex];
  if (!INTERACTIVE_CONDA_COMMANDS.has(subcommand.word)) {
    return;
  }
  if (command.slice(commandIndex).some((part) => YES_ARGS.includes(part.word))) {
    return;
  }

  const end = subcommand.pos[1];
  linter
    .addWarning([command[0].pos[0], end], `add ${YES_ARGS[0]} argument`)
    .addReplacement([end, end], ` ${YES_ARGS[0]}`);
}

export function checkCondaYes(linter: Linter): void {
  for (const command of splitShellCommands(linter.content, linter.filename)) {
    checkCondaCommand(linter, command);
  }
}
