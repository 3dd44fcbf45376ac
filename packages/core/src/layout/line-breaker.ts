import type { LineRecord } from "@imagetext/contracts";

import type { FontFace } from "../ports/rasterizer.js";
import type { TextMeasurer } from "./metrics-probe.js";

export interface WrappedLine extends LineRecord {
  /** Tokens joined into `text`; a token may itself contain spaces. */
  words: readonly string[];
}

export interface LineBreakResult {
  lines: readonly WrappedLine[];
  maxLineHeight: number;
  maxLineOffset: number;
}

export interface LineBreakParams {
  tokens: readonly string[];
  innerWidth: number;
  font: FontFace;
  fontSize: number;
}

interface BreakState {
  words: readonly string[];
  width: number;
  lines: readonly WrappedLine[];
  maxLineHeight: number;
  maxLineOffset: number;
}

const EMPTY_STATE: BreakState = {
  words: [],
  width: 0,
  lines: [],
  maxLineHeight: 0,
  maxLineOffset: 0
};

/**
 * Greedy word wrap. Every measured candidate feeds the running maximum line
 * height and baseline offset, accepted or not. A token that is wider than the
 * budget on its own gets a line to itself and overflows.
 */
export const breakLines = (
  measurer: TextMeasurer,
  { tokens, innerWidth, font, fontSize }: LineBreakParams
): LineBreakResult => {
  const measure = (text: string) => measurer.measure(font, fontSize, text);

  const addToken = (state: BreakState, token: string): BreakState => {
    const words = [...state.words, token];
    const metrics = measure(words.join(" "));
    const measured: BreakState = {
      ...state,
      maxLineHeight: Math.max(state.maxLineHeight, metrics.height),
      maxLineOffset: Math.max(state.maxLineOffset, metrics.baselineOffset)
    };

    if (metrics.width < innerWidth) {
      return { ...measured, words, width: metrics.width };
    }

    if (state.words.length === 0) {
      return {
        ...measured,
        words: [],
        width: 0,
        lines: [...state.lines, { text: token, width: metrics.width, offset: 0, words }]
      };
    }

    const closedText = state.words.join(" ");
    const closed: WrappedLine = {
      text: closedText,
      width: measure(closedText).width,
      offset: 0,
      words: state.words
    };

    return addToken({ ...measured, words: [], width: 0, lines: [...state.lines, closed] }, token);
  };

  const final = tokens.reduce(addToken, EMPTY_STATE);
  const lines =
    final.words.length === 0
      ? final.lines
      : [
          ...final.lines,
          { text: final.words.join(" "), width: final.width, offset: 0, words: final.words }
        ];

  return {
    lines,
    maxLineHeight: final.maxLineHeight,
    maxLineOffset: final.maxLineOffset
  };
};
