import type { BoundingBox } from "@imagetext/contracts";

import { toRasterizerError, type DomainError } from "../errors/domain-errors.js";
import type { FontFace, Rasterizer } from "../ports/rasterizer.js";

export interface TextMetrics {
  width: number;
  height: number;
  /** Depth of the lower edge below the baseline. */
  baselineOffset: number;
  /** Horizontal distance from the origin to the left edge. */
  leftBearing: number;
}

export interface TextMeasurer {
  measure(font: FontFace, size: number, text: string): TextMetrics;
}

export const toTextMetrics = (box: BoundingBox): TextMetrics => {
  const [lowerLeftX, lowerLeftY, lowerRightX, , , , , upperLeftY] = box;
  return {
    width: lowerRightX - lowerLeftX,
    height: lowerLeftY - upperLeftY,
    baselineOffset: lowerLeftY,
    leftBearing: lowerLeftX
  };
};

export class MetricsProbe<TCanvas> implements TextMeasurer {
  constructor(
    private readonly rasterizer: Rasterizer<TCanvas>,
    private readonly canvas: TCanvas
  ) {}

  measure(font: FontFace, size: number, text: string): TextMetrics {
    try {
      return toTextMetrics(this.rasterizer.measureText(this.canvas, font, size, text));
    } catch (error) {
      throw toRasterizerError(error, `measure "${text}" at ${size}px`);
    }
  }
}

/**
 * Destroys `canvas`. While `pending` is propagating, a failed release is
 * recorded on it instead of replacing it.
 */
export const releaseCanvas = <TCanvas>(
  rasterizer: Rasterizer<TCanvas>,
  canvas: TCanvas,
  pending?: DomainError
): void => {
  try {
    rasterizer.destroyCanvas(canvas);
  } catch (error) {
    if (!pending) {
      throw toRasterizerError(error, "release a canvas");
    }
    pending.suppressed.push(error);
  }
};

/**
 * Runs `measure` against a 1x1 scratch canvas that is destroyed as soon as
 * `measure` returns or throws.
 */
export const withMeasurementCanvas = <TCanvas, T>(
  rasterizer: Rasterizer<TCanvas>,
  measure: (probe: MetricsProbe<TCanvas>) => T
): T => {
  let canvas: TCanvas;
  try {
    canvas = rasterizer.createCanvas(1, 1);
  } catch (error) {
    throw toRasterizerError(error, "allocate the measurement canvas");
  }

  let result: T;
  try {
    result = measure(new MetricsProbe(rasterizer, canvas));
  } catch (error) {
    const failure = toRasterizerError(error, "measure text");
    releaseCanvas(rasterizer, canvas, failure);
    throw failure;
  }

  releaseCanvas(rasterizer, canvas);
  return result;
};
