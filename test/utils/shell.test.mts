import { expect, test } from "vitest";
import { SourceParseError } from "../../src/errors.mts";
import { splitShellCommands } from "../../src/utils/shell.mts";

test("splits words with quotes, escapes and comments removed", () => {
  const commands = splitShellCommands("echo 'a b' \"c\\\"d\" e\\ f # comment\nls | wc -l && x");

  expect(commands.map((command) => command.map((part) => part.word))).toEqual([
    ["echo", "a b", 'c"d', "e f"],
    ["ls"],
    ["wc", "-l"],
    ["x"]
  ]);
  expect(commands[0].map((part) => part.pos)).toEqual([
    [0, 4],
    [5, 10],
    [11, 17],
    [18, 22]
  ]);
});

test("drops leading reserved words", () => {
  const commands = splitShellCommands("if true; then\n  do_it\nfi\nwhile ! false; do x; done\n");
  expect(commands.map((command) => command.map((part) => part.word))).toEqual([
    ["true"],
    ["do_it"],
    ["fi"],
    ["false"],
    ["x"],
    ["done"]
  ]);
});

test("rejects unterminated quotes", () => {
  expect(() => splitShellCommands("echo 'oops", "build.sh")).toThrow(SourceParseError);
  expect(() => splitShellCommands("echo 'oops", "build.sh")).toThrow(
    "Failed to parse build.sh: unterminated quote"
  );
});

test("skips heredoc bodies up to their delimiter", () => {
  const commands = splitShellCommands(
    "cat <<EOF > out.txt\nconda install cudf\nEOF\ncat <<-'END'\n\tconda remove x\n\tEND\nls\n"
  );
  expect(commands.map((command) => command.map((part) => part.word))).toEqual([
    ["cat", ">", "out.txt"],
    ["cat"],
    ["ls"]
  ]);
});

test("keeps redirections with an ampersand in the command", () => {
  const commands = splitShellCommands("make 2>&1 --quiet\nrun &>log.txt\nread <&3 & wait\n");
  expect(commands.map((command) => command.map((part) => part.word))).toEqual([
    ["make", "2>&1", "--quiet"],
    ["run", "&>log.txt"],
    ["read", "<&3"],
    ["wait"]
  ]);
});
