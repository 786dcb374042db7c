import type { Linter } from "./linter.mjs";

export type Span = [number, number];

export type NewlineStyle = "\n" | "\r\n" | "\r";

export interface DirectiveRange {
  pos: Span;
  enabled: boolean;
}

export interface LintOptions {
  fix: boolean;
  files: string[];
}

export type LintCheck<TOptions extends LintOptions = LintOptions> = (
  linter: Linter,
  options: TOptions
) => void;

export interface ReportOutput {
  print(message?: string): void;
  warn(message: string): void;
}
