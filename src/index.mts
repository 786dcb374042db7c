export { Lines } from "./lines.mjs";
export { Linter } from "./linter.mjs";
export { LintMain } from "./main.mjs";
export { Reporter, consoleOutput } from "./reporter.mjs";
export { LintWarning, Note, Replacement, compareSpans } from "./warnings.mjs";
export { findDirectives, getDisabledEnabledBoundaries, isWarningRangeEnabled } from "./directives.mjs";
export {
  BinaryFileError,
  ConfigurationError,
  GitError,
  LintError,
  OverlappingReplacementsError,
  PositionOutOfRangeError,
  SourceParseError,
  isLintError
} from "./errors.mjs";
export { checkCodeowners } from "./checks/codeowners.mjs";
export { createAlphaSpecCheck } from "./checks/alpha-spec.mjs";
export { checkPyprojectLicense } from "./checks/pyproject-license.mjs";
export { checkHardcodedVersion } from "./checks/hardcoded-version.mjs";
export { checkCondaYes } from "./checks/verify-conda-yes.mjs";
export { createCopyrightCheck } from "./checks/copyright.mjs";
export type { CopyrightOptions } from "./checks/copyright.mjs";
export { createProgram } from "./cli.mjs";
export type { DirectiveRange, LintCheck, LintOptions, NewlineStyle, ReportOutput, Span } from "./types.mjs";
