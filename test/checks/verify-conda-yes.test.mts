import { expect, test } from "vitest";
import { CONDA_YES_CHECK_NAME, checkCondaYes } from "../../src/checks/verify-conda-yes.mts";
import { Linter } from "../../src/linter.mts";

function lint(content: string): Linter {
  const linter = new Linter("ci/build.sh", content, CONDA_YES_CHECK_NAME);
  checkCondaYes(linter);
  return linter;
}

test("adds -y to interactive conda commands", () => {
  const content =
    "conda install cudf\n" +
    "conda create -y -n env\n" +
    "conda --help install\n" +
    "conda list\n" +
    "if conda remove foo; then\n" +
    "  echo hi\n" +
    "fi\n";
  const remove = content.indexOf("conda remove");
  const linter = lint(content);

  expect(linter.warnings.map((warning) => [warning.pos, warning.msg])).toEqual([
    [[0, 13], "add -y argument"],
    [[remove, remove + 12], "add -y argument"]
  ]);
  expect(linter.fix()).toBe(
    content.replace("conda install", "conda install -y").replace("conda remove", "conda remove -y")
  );
});

test("accepts --yes and global flags before the subcommand", () => {
  expect(lint("conda --no-plugins update --yes --all\n").warnings).toEqual([]);
  expect(lint("conda -V\n").warnings).toEqual([]);
});

test("follows line continuations", () => {
  const linter = lint("conda \\\n  install pkg\n");
  expect(linter.warnings.map((warning) => warning.pos)).toEqual([[0, 17]]);
  expect(linter.fix()).toBe("conda \\\n  install -y pkg\n");
});

test("ignores conda mentioned in comments and arguments", () => {
  expect(lint("# conda install cudf\necho conda install\n").warnings).toEqual([]);
});

test("ignores conda commands inside heredoc bodies", () => {
  expect(lint("cat <<EOF\nconda install cudf\nEOF\n").warnings).toEqual([]);
});

test("reads arguments after a redirection", () => {
  expect(lint("conda install cudf 2>&1 --yes\n").warnings).toEqual([]);
  const linter = lint("conda install cudf 2>&1\n");
  expect(linter.warnings.map((warning) => warning.pos)).toEqual([[0, 13]]);
});
