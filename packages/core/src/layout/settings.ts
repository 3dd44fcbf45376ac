import type { Alignment, ColorChannels, PaddingBox } from "@imagetext/contracts";

import type { FontFace } from "../ports/rasterizer.js";
import { DEFAULT_HEADLINE_SCALE } from "./headline-fitter.js";

/** Staged configuration; `text`, `width` and `font` stay unset until provided. */
export interface TextImageSettings {
  readonly text?: string;
  readonly width?: number;
  readonly font?: FontFace;
  /** 0 selects headline mode. */
  readonly fontSize: number;
  readonly padding: PaddingBox;
  readonly align: Alignment;
  readonly backgroundColor: ColorChannels;
  readonly textColor: ColorChannels;
  /** 0 means derived from the measured text. */
  readonly lineHeight: number;
  /** 0 means derived from the measured text. */
  readonly lineOffset: number;
  readonly headlineScale: number;
  readonly headlineRefinement: number;
}

export const DEFAULT_SETTINGS: TextImageSettings = {
  fontSize: 0,
  padding: { top: 0, right: 0, bottom: 0, left: 0 },
  align: "left",
  backgroundColor: [0, 0, 0, 127],
  textColor: [255, 255, 255],
  lineHeight: 0,
  lineOffset: 0,
  headlineScale: DEFAULT_HEADLINE_SCALE,
  headlineRefinement: 0
};
