import type { Span } from "./types.mjs";

function formatPos(pos: Span): string {
  return `[${pos[0]}, ${pos[1]}]`;
}

export class Note {
  constructor(
    readonly pos: Span,
    readonly msg: string
  ) {}

  toString(): string {
    return `Note(pos=${formatPos(this.pos)}, msg=${JSON.stringify(this.msg)})`;
  }
}

export class Replacement {
  constructor(
    readonly pos: Span,
    readonly newText: string
  ) {}

  toString(): string {
    return `Replacement(pos=${formatPos(this.pos)}, newText=${JSON.stringify(this.newText)})`;
  }
}

export class LintWarning {
  readonly replacements: Replacement[] = [];
  readonly notes: Note[] = [];

  constructor(
    readonly pos: Span,
    readonly msg: string
  ) {}

  addReplacement(pos: Span, newText: string): this {
    this.replacements.push(new Replacement(pos, newText));
    return this;
  }

  addNote(pos: Span, msg: string): this {
    this.notes.push(new Note(pos, msg));
    return this;
  }
}

export function compareSpans(a: Span, b: Span): number {
  return a[0] - b[0] || a[1] - b[1];
}
