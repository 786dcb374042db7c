import { NEWLINE_STYLES } from "./constants.mjs";
import { PositionOutOfRangeError } from "./errors.mjs";
import type { NewlineStyle, Span } from "./types.mjs";

export class Lines {
  readonly content: string;
  readonly pos: Span[] = [];
  readonly newlineCount: Record<NewlineStyle, number> = { "\n": 0, "\r\n": 0, "\r": 0 };
  readonly newlineStyle: NewlineStyle;

  constructor(content: string) {
    this.content = content;
    this.calculateLines();
    this.newlineStyle = this.dominantNewlineStyle();
  }

  lineForPos(index: number): number {
    if (index < 0 || index > this.content.length) {
      throw new PositionOutOfRangeError(`Position ${index} is not in the string`, index);
    }

    let low = 0;
    let high = this.pos.length - 1;
    while (low <= high) {
      const middle = (low + high) >> 1;
      const [begin, end] = this.pos[middle];
      if (index < begin) {
        high = middle - 1;
      } else if (index > end) {
        low = middle + 1;
      } else {
        return middle;
      }
    }

    throw new PositionOutOfRangeError(`Position ${index} is inside a line separator`, index);
  }

  private calculateLines(): void {
    let lineBegin = 0;
    let lineEnd = 0;
    let state: "plain" | "sawCr" = "plain";

    const closeLine = (): void => {
      this.pos.push([lineBegin, lineEnd]);
      lineEnd += 1;
      lineBegin = lineEnd;
    };

    for (const char of this.content) {
      if (state === "plain") {
        if (char === "\r") {
          closeLine();
          state = "sawCr";
        } else if (char === "\n") {
          closeLine();
          this.newlineCount["\n"] += 1;
        } else {
          lineEnd += char.length;
        }
        continue;
      }

      if (char === "\r") {
        this.newlineCount["\r"] += 1;
        closeLine();
      } else if (char === "\n") {
        this.newlineCount["\r\n"] += 1;
        lineEnd += 1;
        lineBegin = lineEnd;
        state = "plain";
      } else {
        this.newlineCount["\r"] += 1;
        lineEnd += char.length;
        state = "plain";
      }
    }

    if (state === "sawCr") {
      this.newlineCount["\r"] += 1;
    }
    this.pos.push([lineBegin, lineEnd]);
  }

  private dominantNewlineStyle(): NewlineStyle {
    let style: NewlineStyle = "\n";
    let count = 0;
    for (const candidate of NEWLINE_STYLES) {
      if (this.newlineCount[candidate] > count) {
        style = candidate;
        count = this.newlineCount[candidate];
      }
    }
    return style;
  }
}
