import type { LineRecord } from "@imagetext/contracts";

import { RasterizerError } from "../errors/domain-errors.js";
import type { FontFace } from "../ports/rasterizer.js";
import type { TextMeasurer, TextMetrics } from "./metrics-probe.js";

export const DEFAULT_HEADLINE_SCALE = 1000;

// Refinement stops once the measured width is this close to the target.
const REFINEMENT_TOLERANCE_PX = 0.5;

export interface HeadlineFitParams {
  text: string;
  innerWidth: number;
  font: FontFace;
  /** Font size of the probe measurement. */
  referenceSize?: number;
  /** Extra proportional corrections after the fine-tuning measurement. */
  refinementPasses?: number;
}

export interface HeadlineFit {
  line: LineRecord;
  fontSize: number;
  lineHeight: number;
  lineOffset: number;
  measurements: number;
}

const rescale = (fontSize: number, metrics: TextMetrics, innerWidth: number, text: string): number => {
  if (metrics.width <= 0) {
    throw new RasterizerError(`Headline "${text}" measured zero width at ${fontSize}px.`);
  }

  return fontSize / (metrics.width / innerWidth);
};

/**
 * Finds the font size that makes `text` span `innerWidth` on one line, from a
 * probe at `referenceSize` scaled linearly and then measured again at the
 * derived size.
 */
export const fitHeadline = (
  measurer: TextMeasurer,
  {
    text,
    innerWidth,
    font,
    referenceSize = DEFAULT_HEADLINE_SCALE,
    refinementPasses = 0
  }: HeadlineFitParams
): HeadlineFit => {
  const reference = measurer.measure(font, referenceSize, text);
  let fontSize = rescale(referenceSize, reference, innerWidth, text);
  let metrics = measurer.measure(font, fontSize, text);
  let measurements = 2;

  for (
    let pass = 0;
    pass < refinementPasses && Math.abs(metrics.width - innerWidth) > REFINEMENT_TOLERANCE_PX;
    pass += 1
  ) {
    fontSize = rescale(fontSize, metrics, innerWidth, text);
    metrics = measurer.measure(font, fontSize, text);
    measurements += 1;
  }

  return {
    line: { text, width: metrics.width, offset: metrics.leftBearing },
    fontSize,
    lineHeight: metrics.height,
    lineOffset: metrics.baselineOffset,
    measurements
  };
};
