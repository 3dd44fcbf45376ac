import type { BoundingBox, ColorChannels } from "@imagetext/contracts";

/** Color handle returned by {@link Rasterizer.allocateColor}, only valid on the canvas it was allocated on. */
export type ColorId = number;

export interface FontFace {
  /** Source file the face was loaded from. */
  path: string;
  /** Name the rasterizer knows the face by. */
  family: string;
}

/**
 * Glyph rasterization and pixel buffer access. All calls are synchronous;
 * failures are thrown and abort the current build.
 */
export interface Rasterizer<TCanvas> {
  loadFont(path: string): FontFace;
  createCanvas(width: number, height: number): TCanvas;
  destroyCanvas(canvas: TCanvas): void;
  /**
   * Bounding box of `text` drawn with its baseline origin at (0, 0), in
   * corner order lower-left, lower-right, upper-right, upper-left. Y grows
   * downwards, so the lower-left Y is the depth below the baseline.
   */
  measureText(canvas: TCanvas, font: FontFace, size: number, text: string): BoundingBox;
  /** Three channels allocate an opaque color, four an alpha-aware one (0 opaque, 127 transparent). */
  allocateColor(canvas: TCanvas, channels: ColorChannels): ColorId;
  /** Flood fill from the seed pixel. */
  fill(canvas: TCanvas, x: number, y: number, color: ColorId): void;
  /** Draws `text` with its baseline origin at (x, y). */
  drawText(
    canvas: TCanvas,
    font: FontFace,
    size: number,
    x: number,
    y: number,
    color: ColorId,
    text: string
  ): void;
}
