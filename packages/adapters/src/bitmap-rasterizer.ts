import type { BoundingBox, ColorChannels } from "@imagetext/contracts";
import type { ColorId, FontFace, Rasterizer } from "@imagetext/core";

import { glyphRows, loadBitmapFont, type BitmapFont } from "./bitmap-font.js";
import { encodePngRgba } from "./png-encoder.js";
import { RasterCanvas, rgbaFromChannels, type Rgba } from "./raster-canvas.js";

/**
 * Rasterizer over {@link RasterCanvas} and JSON pixel fonts. Each font unit
 * becomes `size / unitsPerEm` device pixels, so any size renders, just blocky.
 */
export class BitmapRasterizer implements Rasterizer<RasterCanvas> {
  private readonly fonts = new Map<string, BitmapFont>();

  loadFont(path: string): FontFace {
    const font = this.fontAt(path);
    return { path, family: font.name };
  }

  createCanvas(width: number, height: number): RasterCanvas {
    return new RasterCanvas(width, height);
  }

  destroyCanvas(canvas: RasterCanvas): void {
    canvas.palette.length = 0;
  }

  measureText(_canvas: RasterCanvas, face: FontFace, size: number, text: string): BoundingBox {
    const font = this.fontAt(face.path);
    const scale = size / font.unitsPerEm;
    const chars = Array.from(text).length;
    const units = chars === 0 ? 0 : chars * font.advance - (font.advance - font.glyphWidth);

    const right = Math.round(units * scale);
    const below = Math.round(font.descent * scale);
    const above = -Math.round(font.ascent * scale);
    return [0, below, right, below, right, above, 0, above];
  }

  allocateColor(canvas: RasterCanvas, channels: ColorChannels): ColorId {
    canvas.palette.push(rgbaFromChannels(channels));
    return canvas.palette.length - 1;
  }

  fill(canvas: RasterCanvas, x: number, y: number, color: ColorId): void {
    canvas.floodFill(x, y, this.colorOf(canvas, color));
  }

  drawText(
    canvas: RasterCanvas,
    face: FontFace,
    size: number,
    x: number,
    y: number,
    color: ColorId,
    text: string
  ): void {
    const font = this.fontAt(face.path);
    const ink = this.colorOf(canvas, color);
    const scale = size / font.unitsPerEm;
    const top = y - font.ascent * scale;

    let cursorX = x;
    for (const char of text) {
      const rows = glyphRows(font, char);
      for (let row = 0; row < rows.length; row += 1) {
        const mask = rows[row] ?? 0;
        for (let col = 0; col < font.glyphWidth; col += 1) {
          const bit = 1 << (font.glyphWidth - 1 - col);
          if ((mask & bit) === 0) continue;
          canvas.fillRect(cursorX + col * scale, top + row * scale, scale, scale, ink);
        }
      }
      cursorX += font.advance * scale;
    }
  }

  toPng(canvas: RasterCanvas): Buffer {
    return encodePngRgba({ width: canvas.width, height: canvas.height, rgba: canvas.data });
  }

  private fontAt(path: string): BitmapFont {
    const cached = this.fonts.get(path);
    if (cached) {
      return cached;
    }

    const font = loadBitmapFont(path);
    this.fonts.set(path, font);
    return font;
  }

  private colorOf(canvas: RasterCanvas, color: ColorId): Rgba {
    const rgba = canvas.palette[color];
    if (!rgba) {
      throw new Error(`Color ${color} was not allocated on this canvas.`);
    }
    return rgba;
  }
}
