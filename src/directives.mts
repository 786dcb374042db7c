import { DIRECTIVE_MARKER } from "./constants.mjs";
import type { Lines } from "./lines.mjs";
import type { DirectiveRange, Span } from "./types.mjs";

interface Directive {
  index: number;
  enabled: boolean;
  nextLine: boolean;
}

interface Piece extends DirectiveRange {
  source: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function createDirectivePattern(marker: string): RegExp {
  return new RegExp(
    `\\b${escapeRegExp(marker)}:[ \\t]*(enable|disable)(-next-line)?\\b(?:[ \\t]*\\[([^\\]\\n]+)\\])?(?![ \\t]*\\[)`,
    "g"
  );
}

const DIRECTIVE_PATTERN = createDirectivePattern(DIRECTIVE_MARKER);

function appliesToCheck(names: string | undefined, checkName: string): boolean {
  if (names === undefined) {
    return true;
  }
  return names
    .split(",")
    .map((name) => name.trim())
    .includes(checkName);
}

export function findDirectives(content: string, checkName: string): Directive[] {
  const directives: Directive[] = [];
  for (const match of content.matchAll(DIRECTIVE_PATTERN)) {
    if (!appliesToCheck(match[3], checkName)) {
      continue;
    }
    directives.push({
      index: match.index ?? 0,
      enabled: match[1] === "enable",
      nextLine: match[2] !== undefined
    });
  }
  return directives;
}

function collectRanges(lines: Lines, directives: Directive[]): {
  ranges: DirectiveRange[];
  overrides: DirectiveRange[];
} {
  const length = lines.content.length;
  const ranges: DirectiveRange[] = [];
  const overrides: DirectiveRange[] = [];
  let start = 0;
  let enabled = true;

  for (const directive of directives) {
    if (!directive.nextLine) {
      ranges.push({ pos: [start, directive.index], enabled });
      start = directive.index;
      enabled = directive.enabled;
      continue;
    }

    const target = lines.pos[lines.lineForPos(directive.index) + 1];
    if (!target) {
      continue;
    }
    const last = overrides[overrides.length - 1];
    if (last && last.pos[0] === target[0]) {
      overrides[overrides.length - 1] = { pos: target, enabled: directive.enabled };
    } else {
      overrides.push({ pos: target, enabled: directive.enabled });
    }
  }
  ranges.push({ pos: [start, length], enabled });

  const nonEmpty = ranges.filter((range) => range.pos[0] < range.pos[1]);
  return {
    ranges: nonEmpty.length > 0 ? nonEmpty : [{ pos: [0, length], enabled }],
    overrides
  };
}

function applyOverrides(ranges: DirectiveRange[], overrides: DirectiveRange[], length: number): DirectiveRange[] {
  const cuts = [
    ...new Set([
      0,
      length,
      ...ranges.map((range) => range.pos[0]),
      ...overrides.flatMap((override) => override.pos)
    ])
  ].sort((a, b) => a - b);

  const pieces: Piece[] = [];
  let rangeIndex = 0;
  let overrideIndex = 0;

  // Empty target lines still get a range of their own.
  const advanceOverridesTo = (position: number): void => {
    while (overrideIndex < overrides.length) {
      const [overrideBegin, overrideEnd] = overrides[overrideIndex].pos;
      if (overrideBegin < overrideEnd && overrideEnd <= position) {
        overrideIndex += 1;
      } else if (overrideBegin === position && overrideEnd === position) {
        pieces.push({ ...overrides[overrideIndex], source: -(overrideIndex + 1) });
        overrideIndex += 1;
      } else {
        return;
      }
    }
  };

  for (let index = 0; index + 1 < cuts.length; index += 1) {
    const begin = cuts[index];
    const end = cuts[index + 1];
    advanceOverridesTo(begin);

    while (ranges[rangeIndex].pos[1] <= begin) {
      rangeIndex += 1;
    }

    const override = overrides[overrideIndex];
    const piece: Piece =
      override && override.pos[0] <= begin && end <= override.pos[1]
        ? { pos: [begin, end], enabled: override.enabled, source: -(overrideIndex + 1) }
        : { pos: [begin, end], enabled: ranges[rangeIndex].enabled, source: rangeIndex };

    const previous = pieces[pieces.length - 1];
    if (previous && previous.source === piece.source && previous.pos[1] === begin) {
      previous.pos = [previous.pos[0], end];
    } else {
      pieces.push(piece);
    }
  }
  advanceOverridesTo(length);

  if (pieces.length === 0) {
    return ranges;
  }
  return pieces.map(({ pos, enabled }) => ({ pos, enabled }));
}

export function getDisabledEnabledBoundaries(lines: Lines, checkName: string): DirectiveRange[] {
  const { ranges, overrides } = collectRanges(lines, findDirectives(lines.content, checkName));
  return applyOverrides(ranges, overrides, lines.content.length);
}

export function isWarningRangeEnabled(boundaries: DirectiveRange[], pos: Span): boolean {
  const [start, end] = pos;
  const empty = start === end;

  let low = 0;
  let high = boundaries.length;
  while (low < high) {
    const middle = (low + high) >> 1;
    const rangeEnd = boundaries[middle].pos[1];
    if (empty ? rangeEnd < start : rangeEnd <= start) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }

  for (let index = low; index < boundaries.length; index += 1) {
    const { pos: rangePos, enabled } = boundaries[index];
    if (empty ? rangePos[0] > end : rangePos[0] >= end) {
      break;
    }
    if (enabled) {
      return true;
    }
  }
  return false;
}
