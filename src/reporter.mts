import chalk, { type ChalkInstance } from "chalk";
import type { Linter } from "./linter.mjs";
import type { ReportOutput, Span } from "./types.mjs";
import type { Note, Replacement } from "./warnings.mjs";

export const consoleOutput: ReportOutput = {
  print(message = "") {
    console.log(message);
  },
  warn(message) {
    console.warn(message);
  }
};

interface LineSlices {
  before: string;
  marked: string;
  after: string;
  // The span continues past the end of its first line.
  truncated: boolean;
}

function sliceLine(linter: Linter, pos: Span): LineSlices {
  const [lineBegin, lineEnd] = linter.lines.pos[linter.lines.lineForPos(pos[0])];
  const right = Math.min(pos[1], lineEnd);
  return {
    before: linter.content.slice(lineBegin, pos[0]),
    marked: linter.content.slice(pos[0], right),
    after: linter.content.slice(right, lineEnd),
    truncated: pos[1] > lineEnd
  };
}

export class Reporter {
  constructor(
    private readonly output: ReportOutput = consoleOutput,
    private readonly style: ChalkInstance = chalk
  ) {}

  printWarnings(linter: Linter, fixApplied: boolean): void {
    for (const warning of linter.enabledWarnings()) {
      this.printLocation(linter, warning.pos);
      this.printHighlighted(linter, warning.pos);
      this.output.print(`${this.style.bold("warning:")} ${warning.msg}`);
      this.output.print();

      for (const note of warning.notes) {
        this.printNote(linter, note);
      }
      for (const replacement of warning.replacements) {
        this.printReplacement(linter, replacement, fixApplied);
      }
    }
  }

  warn(message: string): void {
    this.output.warn(this.style.yellow(message));
  }

  private printLocation(linter: Linter, pos: Span): void {
    const lineIndex = linter.lines.lineForPos(pos[0]);
    const column = pos[0] - linter.lines.pos[lineIndex][0];
    this.output.print(`In file ${this.style.bold(`${linter.filename}:${lineIndex + 1}:${column + 1}`)}:`);
  }

  private printHighlighted(linter: Linter, pos: Span): void {
    const { before, marked, after } = sliceLine(linter, pos);
    this.output.print(` ${before}${this.style.bold(marked)}${after}`);
  }

  private printNote(linter: Linter, note: Note): void {
    this.printLocation(linter, note.pos);
    this.printHighlighted(linter, note.pos);
    this.output.print(`${this.style.bold("note:")} ${note.msg}`);
    this.output.print();
  }

  private printReplacement(linter: Linter, replacement: Replacement, fixApplied: boolean): void {
    const { before, marked, after, truncated } = sliceLine(linter, replacement.pos);
    const newLines = replacement.newText.split(/\r\n|\r|\n/);
    const tooLong = truncated || newLines.length > 1;

    this.printLocation(linter, replacement.pos);
    this.output.print(this.style.red(`-${before}${this.style.bold(marked)}${after}`));
    this.output.print(
      this.style.green(`+${before}${this.style.bold(newLines[0])}${tooLong ? "" : after}`)
    );

    let note: string;
    if (fixApplied) {
      note = tooLong ? "suggested fix applied but is too long to display" : "suggested fix applied";
    } else {
      note = tooLong ? "suggested fix is too long to display, use --fix to apply it" : "suggested fix";
    }
    this.output.print(`${this.style.bold("note:")} ${note}`);
    this.output.print();
  }
}
