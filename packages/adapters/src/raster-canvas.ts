import type { ColorChannels } from "@imagetext/contracts";

export type Rgba = { r: number; g: number; b: number; a: number };

// Fourth color channel: 0 is opaque, 127 and above fully transparent.
const MAX_TRANSPARENCY = 127;

export const clampByte = (value: number): number => Math.max(0, Math.min(255, Math.round(value)));

export const rgbaFromChannels = (channels: ColorChannels): Rgba => {
  const [r, g, b, transparency = 0] = channels;
  const opacity = 1 - Math.min(transparency, MAX_TRANSPARENCY) / MAX_TRANSPARENCY;
  return { r, g, b, a: clampByte(opacity * 255) };
};

export const cssFromRgba = ({ r, g, b, a }: Rgba): string =>
  `rgba(${r}, ${g}, ${b}, ${Number((a / 255).toFixed(4))})`;

/**
 * Replaces the 4-connected region sharing the seed pixel's color with `color`.
 * Works on any RGBA byte buffer.
 */
export const floodFill = (
  data: Uint8Array | Uint8ClampedArray,
  width: number,
  height: number,
  seedX: number,
  seedY: number,
  color: Rgba
): void => {
  if (seedX < 0 || seedY < 0 || seedX >= width || seedY >= height) {
    return;
  }

  const seed = (seedY * width + seedX) * 4;
  const target = [data[seed], data[seed + 1], data[seed + 2], data[seed + 3]];
  if (
    target[0] === color.r &&
    target[1] === color.g &&
    target[2] === color.b &&
    target[3] === color.a
  ) {
    return;
  }

  const matches = (idx: number): boolean =>
    data[idx] === target[0] &&
    data[idx + 1] === target[1] &&
    data[idx + 2] === target[2] &&
    data[idx + 3] === target[3];

  const stack: number[] = [seedX, seedY];
  while (stack.length > 0) {
    const y = stack.pop() ?? 0;
    const x = stack.pop() ?? 0;
    const idx = (y * width + x) * 4;
    if (!matches(idx)) {
      continue;
    }

    data[idx] = color.r;
    data[idx + 1] = color.g;
    data[idx + 2] = color.b;
    data[idx + 3] = color.a;

    if (x > 0) stack.push(x - 1, y);
    if (x < width - 1) stack.push(x + 1, y);
    if (y > 0) stack.push(x, y - 1);
    if (y < height - 1) stack.push(x, y + 1);
  }
};

export class RasterCanvas {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
  readonly palette: Rgba[] = [];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height * 4);
  }

  private index(x: number, y: number): number {
    return (y * this.width + x) * 4;
  }

  getPixel(x: number, y: number): Rgba {
    const idx = this.index(x, y);
    return {
      r: this.data[idx] ?? 0,
      g: this.data[idx + 1] ?? 0,
      b: this.data[idx + 2] ?? 0,
      a: this.data[idx + 3] ?? 0
    };
  }

  blendPixel(x: number, y: number, color: Rgba): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }

    const idx = this.index(x, y);
    const dst = this.getPixel(x, y);
    const dstA = dst.a / 255;

    const srcA = color.a / 255;
    const outA = srcA + dstA * (1 - srcA);
    if (outA <= 0) {
      this.data[idx] = 0;
      this.data[idx + 1] = 0;
      this.data[idx + 2] = 0;
      this.data[idx + 3] = 0;
      return;
    }

    const outR = (color.r * srcA + dst.r * dstA * (1 - srcA)) / outA;
    const outG = (color.g * srcA + dst.g * dstA * (1 - srcA)) / outA;
    const outB = (color.b * srcA + dst.b * dstA * (1 - srcA)) / outA;

    this.data[idx] = clampByte(outR);
    this.data[idx + 1] = clampByte(outG);
    this.data[idx + 2] = clampByte(outB);
    this.data[idx + 3] = clampByte(outA * 255);
  }

  /** Edges are rounded independently so adjacent fractional cells leave no gaps. */
  fillRect(x: number, y: number, w: number, h: number, color: Rgba): void {
    const x0 = Math.max(0, Math.round(x));
    const y0 = Math.max(0, Math.round(y));
    const x1 = Math.min(this.width, Math.round(x + w));
    const y1 = Math.min(this.height, Math.round(y + h));

    for (let yy = y0; yy < y1; yy += 1) {
      for (let xx = x0; xx < x1; xx += 1) {
        this.blendPixel(xx, yy, color);
      }
    }
  }

  floodFill(x: number, y: number, color: Rgba): void {
    floodFill(this.data, this.width, this.height, Math.floor(x), Math.floor(y), color);
  }
}
