import type { Alignment, PaddingBox, PositionedLine, TextLayout, TextRun } from "@imagetext/contracts";

import { MissingConfigurationError, ValidationError } from "../errors/domain-errors.js";
import type { FontFace, Rasterizer } from "../ports/rasterizer.js";
import { fitHeadline } from "./headline-fitter.js";
import { breakLines, type WrappedLine } from "./line-breaker.js";
import { withMeasurementCanvas, type TextMeasurer } from "./metrics-probe.js";
import type { TextImageSettings } from "./settings.js";
import { tokenize } from "./tokenizer.js";

export type ConfiguredSettings = TextImageSettings & {
  readonly text: string;
  readonly width: number;
  readonly font: FontFace;
};

interface MeasuredText {
  mode: TextLayout["mode"];
  lines: readonly WrappedLine[];
  fontSize: number;
  lineHeight: number;
  lineOffset: number;
}

export interface RunContext {
  align: Alignment;
  mode: TextLayout["mode"];
  paddingLeft: number;
  innerWidth: number;
  isLastLine: boolean;
  measureWord: (word: string) => number;
}

export const requireConfigured = (settings: TextImageSettings): ConfiguredSettings => {
  const { text, width, font } = settings;
  if (width === undefined) {
    throw new MissingConfigurationError("Undefined image width; use setWidth.");
  }
  if (text === undefined) {
    throw new MissingConfigurationError("Undefined text; use setText.");
  }
  if (font === undefined) {
    throw new MissingConfigurationError("Undefined font; use setFont.");
  }

  return { ...settings, text, width, font };
};

export const innerWidthOf = (width: number, padding: PaddingBox): number =>
  width - padding.left - padding.right;

const justifyRuns = (line: WrappedLine, context: RunContext): TextRun[] => {
  const widths = line.words.map(context.measureWord);
  const used = widths.reduce((sum, width) => sum + width, 0);
  const gap = (context.innerWidth - used) / (line.words.length - 1);

  let cursor = context.paddingLeft;
  return line.words.map((word, index) => {
    const run = { text: word, x: Math.round(cursor) };
    cursor += (widths[index] ?? 0) + gap;
    return run;
  });
};

/** Horizontal placement of a line; justified lines come back as one run per word. */
export const positionRuns = (line: WrappedLine, context: RunContext): TextRun[] => {
  const { align, paddingLeft, innerWidth } = context;

  switch (align) {
    case "right":
      return [{ text: line.text, x: paddingLeft + innerWidth - line.width }];
    case "center":
      return [{ text: line.text, x: Math.round(paddingLeft + (innerWidth - line.width) / 2) }];
    case "justify":
      if (context.mode === "paragraph" && !context.isLastLine && line.words.length > 1) {
        return justifyRuns(line, context);
      }
      return [{ text: line.text, x: paddingLeft - line.offset }];
    case "left":
      return [{ text: line.text, x: paddingLeft - line.offset }];
  }
};

const measureParagraph = (
  measurer: TextMeasurer,
  config: ConfiguredSettings,
  tokens: readonly string[],
  innerWidth: number
): MeasuredText => {
  const result = breakLines(measurer, {
    tokens,
    innerWidth,
    font: config.font,
    fontSize: config.fontSize
  });

  return {
    mode: "paragraph",
    lines: result.lines,
    fontSize: config.fontSize,
    lineHeight: result.maxLineHeight,
    lineOffset: result.maxLineOffset
  };
};

const measureHeadline = (
  measurer: TextMeasurer,
  config: ConfiguredSettings,
  tokens: readonly string[],
  innerWidth: number
): MeasuredText => {
  const fit = fitHeadline(measurer, {
    text: tokens.join(" "),
    innerWidth,
    font: config.font,
    referenceSize: config.headlineScale,
    refinementPasses: config.headlineRefinement
  });

  return {
    mode: "headline",
    lines: [{ ...fit.line, words: tokens }],
    fontSize: fit.fontSize,
    lineHeight: fit.lineHeight,
    lineOffset: fit.lineOffset
  };
};

/**
 * Measures and positions the text. Headline mode (font size 0) scales a single
 * line to the inner width; paragraph mode wraps at the configured size.
 * Non-zero line height and line offset settings replace the measured values.
 */
export const layoutText = <TCanvas>(
  rasterizer: Rasterizer<TCanvas>,
  settings: TextImageSettings
): TextLayout => {
  const config = requireConfigured(settings);
  const { padding } = config;
  const innerWidth = innerWidthOf(config.width, padding);
  if (innerWidth <= 0) {
    throw new ValidationError(
      `Padding leaves no room for text: inner width is ${innerWidth}px.`
    );
  }

  const tokens = tokenize(config.text);
  if (tokens.length === 0) {
    throw new MissingConfigurationError("Text contains no words to render.");
  }

  return withMeasurementCanvas(rasterizer, (probe) => {
    const measured =
      config.fontSize > 0
        ? measureParagraph(probe, config, tokens, innerWidth)
        : measureHeadline(probe, config, tokens, innerWidth);

    const lineHeight = config.lineHeight || measured.lineHeight;
    const lineOffset = config.lineOffset || measured.lineOffset;
    const measureWord = (word: string) =>
      probe.measure(config.font, measured.fontSize, word).width;

    const lines = measured.lines.map(
      (line, index): PositionedLine => ({
        text: line.text,
        width: line.width,
        offset: line.offset,
        y: padding.top + lineHeight - lineOffset + index * lineHeight,
        runs: positionRuns(line, {
          align: config.align,
          mode: measured.mode,
          paddingLeft: padding.left,
          innerWidth,
          isLastLine: index === measured.lines.length - 1,
          measureWord
        })
      })
    );

    return {
      mode: measured.mode,
      width: config.width,
      height: padding.top + padding.bottom + lines.length * lineHeight,
      innerWidth,
      fontSize: measured.fontSize,
      lineHeight,
      lineOffset,
      lines
    };
  });
};
