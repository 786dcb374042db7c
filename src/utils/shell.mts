import { SourceParseError } from "../errors.mjs";
import type { Span } from "../types.mjs";

export interface ShellWord {
  // Text after quote removal; expansions are kept verbatim.
  word: string;
  pos: Span;
}

export type ShellCommand = ShellWord[];

const OPERATOR_CHARS = new Set([";", "&", "|", "(", ")"]);
const RESERVED_WORDS = new Set(["if", "then", "elif", "else", "do", "while", "until", "!", "{", "time"]);
const DELIMITER_END = /[\s;&|()<>]/;

interface Heredoc {
  delimiter: string;
  stripTabs: boolean;
}

// Reads the delimiter word after `<<`, with quotes and backslashes removed.
function readHeredocDelimiter(input: string, start: number): { delimiter: string; end: number } {
  let index = start;
  while (input[index] === " " || input[index] === "\t") {
    index += 1;
  }
  let delimiter = "";
  let quote: string | null = null;
  while (index < input.length) {
    const char = input[index];
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else {
        delimiter += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
    } else if (char === "\\" && index + 1 < input.length) {
      index += 1;
      delimiter += input[index];
    } else if (DELIMITER_END.test(char)) {
      break;
    } else {
      delimiter += char;
    }
    index += 1;
  }
  return { delimiter, end: index };
}

// Returns the index just past the line that closes the heredoc body starting at `start`.
function skipHeredocBody(input: string, start: number, heredoc: Heredoc): number {
  let index = start;
  while (index < input.length) {
    const lineEnd = input.indexOf("\n", index);
    const end = lineEnd < 0 ? input.length : lineEnd;
    let line = input.slice(index, end);
    if (heredoc.stripTabs) {
      line = line.replace(/^\t+/, "");
    }
    index = lineEnd < 0 ? input.length : lineEnd + 1;
    if (line === heredoc.delimiter) {
      break;
    }
  }
  return index;
}

// `2>&1`, `<&3` and `&>file` redirect rather than run in the background.
function isRedirectionAmpersand(input: string, index: number): boolean {
  const previous = input[index - 1];
  return previous === ">" || previous === "<" || input[index + 1] === ">";
}

/**
 * Splits shell source into simple commands. Commands end at newlines, `;`,
 * `&`, `&&`, `||`, `|` and parentheses; leading reserved words such as `then`
 * or `do` are dropped so the command itself comes first. Heredoc operators
 * and their bodies are skipped.
 */
export function splitShellCommands(input: string, filename = "<input>"): ShellCommand[] {
  const commands: ShellCommand[] = [];
  let command: ShellCommand = [];
  let current = "";
  let wordStart = -1;
  let quote: "'" | '"' | null = null;
  const heredocs: Heredoc[] = [];

  const flush = (end: number): void => {
    if (wordStart >= 0) {
      command.push({ word: current, pos: [wordStart, end] });
      current = "";
      wordStart = -1;
    }
  };

  const endCommand = (end: number): void => {
    flush(end);
    while (command.length > 0 && RESERVED_WORDS.has(command[0].word)) {
      command.shift();
    }
    if (command.length > 0) {
      commands.push(command);
    }
    command = [];
  };

  const startWord = (index: number): void => {
    if (wordStart < 0) {
      wordStart = index;
    }
  };

  let index = 0;
  while (index < input.length) {
    const char = input[index];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      index += 1;
      continue;
    }

    if (quote === '"') {
      if (char === "\\" && index + 1 < input.length) {
        const next = input[index + 1];
        if (next !== "\n") {
          current += '"$`\\'.includes(next) ? next : `\\${next}`;
        }
        index += 2;
        continue;
      }
      if (char === '"') {
        quote = null;
      } else {
        current += char;
      }
      index += 1;
      continue;
    }

    if (char === "\\") {
      const next = input[index + 1];
      if (next === "\n") {
        // Line continuation.
        index += 2;
        continue;
      }
      startWord(index);
      current += next ?? "\\";
      index += 2;
      continue;
    }

    if (char === "'" || char === '"') {
      startWord(index);
      quote = char;
      index += 1;
      continue;
    }

    if (char === "#" && wordStart < 0) {
      while (index < input.length && input[index] !== "\n") {
        index += 1;
      }
      continue;
    }

    if (char === "<" && input[index + 1] === "<" && input[index + 2] !== "<") {
      flush(index);
      const stripTabs = input[index + 2] === "-";
      const { delimiter, end } = readHeredocDelimiter(input, index + (stripTabs ? 3 : 2));
      heredocs.push({ delimiter, stripTabs });
      index = end;
      continue;
    }

    if (char === "&" && isRedirectionAmpersand(input, index)) {
      startWord(index);
      current += char;
      index += 1;
      continue;
    }

    if (char === "\n") {
      endCommand(index);
      index += 1;
      for (const heredoc of heredocs.splice(0)) {
        index = skipHeredocBody(input, index, heredoc);
      }
      continue;
    }

    if (OPERATOR_CHARS.has(char)) {
      endCommand(index);
      index += 1;
      continue;
    }

    if (/\s/.test(char)) {
      flush(index);
      index += 1;
      continue;
    }

    startWord(index);
    current += char;
    index += 1;
  }

  if (quote !== null) {
    throw new SourceParseError(filename, "unterminated quote");
  }

  endCommand(input.length);
  return commands;
}
