import { accessSync, constants } from "node:fs";
import { basename, extname } from "node:path";

import { createCanvas, GlobalFonts, type Canvas } from "@napi-rs/canvas";
import type { BoundingBox, ColorChannels } from "@imagetext/contracts";
import { FontUnreadableError, type ColorId, type FontFace, type Rasterizer } from "@imagetext/core";

import { cssFromRgba, floodFill, rgbaFromChannels, type Rgba } from "./raster-canvas.js";

export interface InkExtents {
  /** Distance the ink reaches left of the origin; negative when it starts to the right. */
  actualBoundingBoxLeft: number;
  actualBoundingBoxRight: number;
  actualBoundingBoxAscent: number;
  actualBoundingBoxDescent: number;
}

/** Canvas ink extents as a whole-pixel box with the baseline origin at (0, 0), Y down. */
export const boundingBoxFromMetrics = (metrics: InkExtents): BoundingBox => {
  const left = Math.round(-metrics.actualBoundingBoxLeft);
  const right = Math.round(metrics.actualBoundingBoxRight);
  const below = Math.round(metrics.actualBoundingBoxDescent);
  const above = Math.round(-metrics.actualBoundingBoxAscent);
  return [left, below, right, below, right, above, left, above];
};

/**
 * Rasterizer backed by Skia through @napi-rs/canvas. Fonts are registered
 * globally under a per-path family name, so loading the same file twice is
 * free.
 */
export class SkiaRasterizer implements Rasterizer<Canvas> {
  private readonly families = new Map<string, string>();
  private readonly palettes = new WeakMap<Canvas, Rgba[]>();

  loadFont(path: string): FontFace {
    const known = this.families.get(path);
    if (known) {
      return { path, family: known };
    }

    try {
      accessSync(path, constants.R_OK);
    } catch (error) {
      throw new FontUnreadableError(path, { cause: error });
    }

    const family = `imagetext-${this.families.size + 1}-${basename(path, extname(path))}`;
    if (!GlobalFonts.registerFromPath(path, family)) {
      throw new FontUnreadableError(path);
    }

    this.families.set(path, family);
    return { path, family };
  }

  createCanvas(width: number, height: number): Canvas {
    const canvas = createCanvas(width, height);
    this.palettes.set(canvas, []);
    return canvas;
  }

  destroyCanvas(canvas: Canvas): void {
    this.palettes.delete(canvas);
  }

  measureText(canvas: Canvas, font: FontFace, size: number, text: string): BoundingBox {
    const ctx = canvas.getContext("2d");
    ctx.font = `${size}px "${font.family}"`;
    return boundingBoxFromMetrics(ctx.measureText(text));
  }

  allocateColor(canvas: Canvas, channels: ColorChannels): ColorId {
    const palette = this.paletteOf(canvas);
    palette.push(rgbaFromChannels(channels));
    return palette.length - 1;
  }

  fill(canvas: Canvas, x: number, y: number, color: ColorId): void {
    const ctx = canvas.getContext("2d");
    const image = ctx.getImageData(0, 0, canvas.width, canvas.height);
    floodFill(image.data, canvas.width, canvas.height, Math.floor(x), Math.floor(y), this.colorOf(canvas, color));
    ctx.putImageData(image, 0, 0);
  }

  drawText(
    canvas: Canvas,
    font: FontFace,
    size: number,
    x: number,
    y: number,
    color: ColorId,
    text: string
  ): void {
    const ctx = canvas.getContext("2d");
    ctx.font = `${size}px "${font.family}"`;
    ctx.textBaseline = "alphabetic";
    ctx.textAlign = "left";
    ctx.fillStyle = cssFromRgba(this.colorOf(canvas, color));
    ctx.fillText(text, x, y);
  }

  toPng(canvas: Canvas): Buffer {
    return canvas.toBuffer("image/png");
  }

  private paletteOf(canvas: Canvas): Rgba[] {
    const palette = this.palettes.get(canvas);
    if (!palette) {
      throw new Error("Canvas was not created by this rasterizer or was already destroyed.");
    }
    return palette;
  }

  private colorOf(canvas: Canvas, color: ColorId): Rgba {
    const rgba = this.paletteOf(canvas)[color];
    if (!rgba) {
      throw new Error(`Color ${color} was not allocated on this canvas.`);
    }
    return rgba;
  }
}
