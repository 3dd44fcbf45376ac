import type { Rasterizer } from "@imagetext/core";

export const RUNTIME_CONFIG = Symbol("RUNTIME_CONFIG");
export const TEXT_RASTERIZER = Symbol("TEXT_RASTERIZER");

/** A rasterizer whose canvases can be written out as PNG. */
export type PngRasterizer<TCanvas = unknown> = Rasterizer<TCanvas> & {
  toPng(canvas: TCanvas): Buffer;
};
