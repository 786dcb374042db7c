import type { NewlineStyle } from "./types.mjs";

export const DIRECTIVE_MARKER = "rapids-pre-commit-hooks";

// Order matters: ties in newline counts resolve to the earliest entry.
export const NEWLINE_STYLES: readonly NewlineStyle[] = ["\n", "\r\n", "\r"];
