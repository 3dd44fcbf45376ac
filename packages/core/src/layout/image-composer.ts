import type { TextLayout } from "@imagetext/contracts";

import { toRasterizerError } from "../errors/domain-errors.js";
import type { Rasterizer } from "../ports/rasterizer.js";
import type { ConfiguredSettings } from "./layout-engine.js";
import { releaseCanvas } from "./metrics-probe.js";

type ComposeSettings = Pick<ConfiguredSettings, "font" | "backgroundColor" | "textColor">;

/**
 * Draws a computed layout onto a new canvas owned by the caller. On failure the
 * partial canvas is destroyed before the error propagates.
 */
export const composeImage = <TCanvas>(
  rasterizer: Rasterizer<TCanvas>,
  settings: ComposeSettings,
  layout: TextLayout
): TCanvas => {
  let canvas: TCanvas;
  try {
    canvas = rasterizer.createCanvas(layout.width, layout.height);
  } catch (error) {
    throw toRasterizerError(error, `allocate a ${layout.width}x${layout.height} canvas`);
  }

  try {
    const background = rasterizer.allocateColor(canvas, settings.backgroundColor);
    rasterizer.fill(canvas, 0, 0, background);

    const ink = rasterizer.allocateColor(canvas, settings.textColor);
    for (const line of layout.lines) {
      for (const run of line.runs) {
        rasterizer.drawText(canvas, settings.font, layout.fontSize, run.x, line.y, ink, run.text);
      }
    }

    return canvas;
  } catch (error) {
    const failure = toRasterizerError(error, "draw the text image");
    releaseCanvas(rasterizer, canvas, failure);
    throw failure;
  }
};
