import TOML from "@iarna/toml";
import { SourceParseError } from "../errors.mjs";
import type { Span } from "../types.mjs";

export type TomlDocument = ReturnType<typeof TOML.parse>;

interface TomlEntry {
  path: string[];
  valueSpan: Span;
  // Entries of an inline table value, relative to this entry's path.
  inline: TomlEntry[];
}

interface TomlTableHeader {
  path: string[];
  // Offset just past the last non-blank line of the table body.
  bodyEnd: number;
  bodyEndsWithNewline: boolean;
}

export interface TomlLayout {
  entries: TomlEntry[];
  tables: TomlTableHeader[];
}

const BARE_KEY_PATTERN = /[A-Za-z0-9_-]/;

export function parseToml(filename: string, content: string): TomlDocument {
  try {
    return TOML.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SourceParseError(filename, detail, { cause: error });
  }
}

class Scanner {
  index = 0;

  constructor(readonly content: string) {}

  peek(offset = 0): string {
    return this.content.charAt(this.index + offset);
  }

  atEnd(): boolean {
    return this.index >= this.content.length;
  }

  skipInlineSpace(): void {
    while (this.peek() === " " || this.peek() === "\t") {
      this.index += 1;
    }
  }

  skipToLineEnd(): void {
    while (!this.atEnd() && this.peek() !== "\n") {
      this.index += 1;
    }
  }

  // Whitespace, newlines and comments.
  skipTrivia(): void {
    while (!this.atEnd()) {
      const char = this.peek();
      if (char === " " || char === "\t" || char === "\r" || char === "\n") {
        this.index += 1;
      } else if (char === "#") {
        this.skipToLineEnd();
      } else {
        return;
      }
    }
  }

  readKeyPart(): string {
    const quote = this.peek();
    if (quote === '"' || quote === "'") {
      const [begin, end] = this.readString();
      const raw = this.content.slice(begin + 1, end - 1);
      return quote === '"' ? parseBasicString(raw) : raw;
    }
    const begin = this.index;
    while (BARE_KEY_PATTERN.test(this.peek())) {
      this.index += 1;
    }
    return this.content.slice(begin, this.index);
  }

  readKey(): string[] {
    const parts = [this.readKeyPart()];
    this.skipInlineSpace();
    while (this.peek() === ".") {
      this.index += 1;
      this.skipInlineSpace();
      parts.push(this.readKeyPart());
      this.skipInlineSpace();
    }
    return parts;
  }

  readString(): Span {
    const begin = this.index;
    const quote = this.peek();
    const multiline = this.content.startsWith(quote.repeat(3), this.index);
    this.index += multiline ? 3 : 1;

    while (!this.atEnd()) {
      const char = this.peek();
      if (quote === '"' && char === "\\") {
        this.index += 2;
        continue;
      }
      if (multiline) {
        if (this.content.startsWith(quote.repeat(3), this.index)) {
          this.index += 3;
          while (this.peek() === quote) {
            this.index += 1;
          }
          return [begin, this.index];
        }
      } else if (char === quote) {
        this.index += 1;
        return [begin, this.index];
      } else if (char === "\n") {
        break;
      }
      this.index += 1;
    }
    return [begin, this.index];
  }

  readValue(): { span: Span; inline: TomlEntry[] } {
    const begin = this.index;
    const char = this.peek();
    if (char === '"' || char === "'") {
      return { span: this.readString(), inline: [] };
    }
    if (char === "{") {
      const inline = this.readInlineTable();
      return { span: [begin, this.index], inline };
    }
    if (char === "[") {
      this.readArray();
      return { span: [begin, this.index], inline: [] };
    }

    while (!this.atEnd() && !/[#\n,}\]]/.test(this.peek())) {
      this.index += 1;
    }
    let end = this.index;
    while (end > begin && /\s/.test(this.content.charAt(end - 1))) {
      end -= 1;
    }
    return { span: [begin, end], inline: [] };
  }

  readInlineTable(): TomlEntry[] {
    const entries: TomlEntry[] = [];
    this.index += 1;
    for (;;) {
      this.skipInlineSpace();
      if (this.atEnd() || this.peek() === "}") {
        this.index += 1;
        return entries;
      }
      const start = this.index;
      entries.push(this.readEntry());
      this.skipInlineSpace();
      if (this.peek() === ",") {
        this.index += 1;
      } else if (this.index === start) {
        return entries;
      }
    }
  }

  readArray(): void {
    this.index += 1;
    for (;;) {
      this.skipTrivia();
      if (this.atEnd() || this.peek() === "]") {
        this.index += 1;
        return;
      }
      const start = this.index;
      this.readValue();
      this.skipTrivia();
      if (this.peek() === ",") {
        this.index += 1;
      } else if (this.index === start) {
        return;
      }
    }
  }

  readEntry(): TomlEntry {
    const path = this.readKey();
    this.skipInlineSpace();
    if (this.peek() === "=") {
      this.index += 1;
    }
    this.skipInlineSpace();
    const { span, inline } = this.readValue();
    return { path, valueSpan: span, inline };
  }
}

function parseBasicString(raw: string): string {
  return raw.replace(/\\(["\\bfnrt])/g, (_, escaped: string) => {
    const escapes: Record<string, string> = { b: "\b", f: "\f", n: "\n", r: "\r", t: "\t" };
    return escapes[escaped] ?? escaped;
  });
}

function lastContentEnd(content: string, begin: number, end: number): number {
  let position = end;
  while (position > begin) {
    const previousNewline = position < 2 ? -1 : content.lastIndexOf("\n", position - 2);
    const lineStart = Math.max(begin, previousNewline + 1);
    if (content.slice(lineStart, position).trim().length > 0) {
      return position;
    }
    position = lineStart;
  }
  return begin;
}

/**
 * Records where every key, value and table header of a TOML document sits in
 * its source text.
 */
export function scanTomlLayout(content: string): TomlLayout {
  const scanner = new Scanner(content);
  const entries: TomlEntry[] = [];
  const tables: TomlTableHeader[] = [];
  let tablePath: string[] = [];
  let current: { path: string[]; headerEnd: number } | null = null;

  const closeTable = (end: number): void => {
    if (current) {
      const bodyEnd = lastContentEnd(content, current.headerEnd, end);
      tables.push({
        path: current.path,
        bodyEnd,
        bodyEndsWithNewline: content.charAt(bodyEnd - 1) === "\n"
      });
    }
  };

  for (;;) {
    scanner.skipTrivia();
    if (scanner.atEnd()) {
      break;
    }

    if (scanner.peek() === "[") {
      const headerStart = scanner.index;
      const arrayTable = scanner.peek(1) === "[";
      scanner.index += arrayTable ? 2 : 1;
      scanner.skipInlineSpace();
      const path = scanner.readKey();
      scanner.skipToLineEnd();
      closeTable(headerStart);
      const headerEnd = scanner.atEnd() ? scanner.index : scanner.index + 1;
      tablePath = path;
      current = { path, headerEnd };
      continue;
    }

    const entry = scanner.readEntry();
    entries.push({ ...entry, path: [...tablePath, ...entry.path] });
    scanner.skipToLineEnd();
  }
  closeTable(content.length);

  return { entries, tables };
}

function samePath(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((part, index) => part === b[index]);
}

function findInEntries(entries: TomlEntry[], key: string[]): Span | null {
  for (const entry of entries) {
    if (samePath(entry.path, key)) {
      return entry.valueSpan;
    }
    if (entry.path.length < key.length && samePath(entry.path, key.slice(0, entry.path.length))) {
      const nested = findInEntries(entry.inline, key.slice(entry.path.length));
      if (nested) {
        return nested;
      }
    }
  }
  return null;
}

export function findValueLocation(layout: TomlLayout, key: string[]): Span | null {
  return findInEntries(layout.entries, key);
}

/**
 * Where a new key belongs at the end of the table headed `[key]`, or null when
 * the document has no such header.
 */
export function findTableAppendLocation(
  layout: TomlLayout,
  key: string[]
): { position: number; needsNewline: boolean } | null {
  const table = layout.tables.find((candidate) => samePath(candidate.path, key));
  if (!table) {
    return null;
  }
  return { position: table.bodyEnd, needsNewline: !table.bodyEndsWithNewline };
}
