import {
  alignmentSchema,
  renderTextRequestSchema,
  type Alignment,
  type PaddingBox,
  type RenderTextRequest,
  type TextLayout
} from "@imagetext/contracts";
import { z } from "zod";

import {
  DomainError,
  FontUnreadableError,
  InvalidAlignmentError,
  ValidationError
} from "../errors/domain-errors.js";
import type { FontFace, Rasterizer } from "../ports/rasterizer.js";
import { parseColor } from "../layout/color-spec.js";
import { composeImage } from "../layout/image-composer.js";
import { layoutText, requireConfigured } from "../layout/layout-engine.js";
import { expandPadding, paddingFromInput } from "../layout/padding.js";
import { DEFAULT_SETTINGS, type TextImageSettings } from "../layout/settings.js";

type SafeParseSchema<T> = {
  safeParse(input: unknown): { success: true; data: T } | { success: false; error: Error };
};

const parseOrThrow = <T>(schema: SafeParseSchema<T>, input: unknown, label: string): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label}: ${parsed.error.message}`);
  }
  return parsed.data;
};

const positiveIntSchema = z.number().int().positive();
const nonNegativeIntSchema = z.number().int().min(0);
const fontSizeSchema = z.number().finite().min(0);

export interface FromRequestOptions {
  /** Maps the request's font reference to a path the rasterizer can load. */
  resolveFontPath?: (font: string) => string;
}

/**
 * Chained configuration for one text image. Setters validate eagerly and
 * `build()` lays the text out and draws it. Instances are not meant to be
 * shared between concurrent builds.
 */
export class ImageText<TCanvas> {
  private settings: TextImageSettings = DEFAULT_SETTINGS;
  private lastLayout: TextLayout | null = null;

  constructor(private readonly rasterizer: Rasterizer<TCanvas>) {}

  static fromRequest<TCanvas>(
    rasterizer: Rasterizer<TCanvas>,
    input: unknown,
    options: FromRequestOptions = {}
  ): ImageText<TCanvas> {
    const request: RenderTextRequest = parseOrThrow(renderTextRequestSchema, input, "render request");
    const resolveFontPath = options.resolveFontPath ?? ((font: string) => font);
    const image = new ImageText(rasterizer)
      .setText(request.text)
      .setWidth(request.width)
      .setFont(resolveFontPath(request.font), request.fontSize);

    if (request.padding !== undefined) {
      const { top, right, bottom, left } = paddingFromInput(request.padding);
      image.setPadding(top, right, bottom, left);
    }
    if (request.align !== undefined) {
      image.setAlign(request.align);
    }
    if (request.backgroundColor !== undefined) {
      image.setBackgroundColor(request.backgroundColor);
    }
    if (request.color !== undefined) {
      image.setColor(request.color);
    }
    if (request.lineHeight !== undefined) {
      image.setLineHeight(request.lineHeight);
    }
    if (request.lineOffset !== undefined) {
      image.setLineOffset(request.lineOffset);
    }
    if (request.headlineScale !== undefined) {
      image.setInitialHeadlineScale(request.headlineScale);
    }
    if (request.headlineRefinement !== undefined) {
      image.setHeadlineRefinement(request.headlineRefinement);
    }

    return image;
  }

  setText(text: string): this {
    return this.update({ text });
  }

  setWidth(width: number): this {
    return this.update({ width: parseOrThrow(positiveIntSchema, width, "width") });
  }

  /** Loads the font now so an unreadable file fails here rather than at build time. */
  setFont(fontPath: string, fontSize?: number): this {
    let font: FontFace;
    try {
      font = this.rasterizer.loadFont(fontPath);
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }
      throw new FontUnreadableError(fontPath, { cause: error });
    }

    this.update({ font });
    return fontSize === undefined ? this : this.setFontSize(fontSize);
  }

  /** 0 switches to headline mode. */
  setFontSize(fontSize: number): this {
    return this.update({ fontSize: parseOrThrow(fontSizeSchema, fontSize, "font size") });
  }

  setPadding(top: number, right?: number, bottom?: number, left?: number): this {
    const values = [top, right, bottom, left].filter(
      (value): value is number => value !== undefined
    );
    for (const value of values) {
      parseOrThrow(nonNegativeIntSchema, value, "padding");
    }

    return this.update({ padding: expandPadding(top, right, bottom, left) });
  }

  setAlign(align: string): this {
    const parsed = alignmentSchema.safeParse(align);
    if (!parsed.success) {
      throw new InvalidAlignmentError(align);
    }
    return this.update({ align: parsed.data });
  }

  setBackgroundColor(color: unknown): this {
    return this.update({ backgroundColor: parseColor(color) });
  }

  setColor(color: unknown): this {
    return this.update({ textColor: parseColor(color) });
  }

  /** 0 restores the measured line height. */
  setLineHeight(lineHeight: number): this {
    return this.update({
      lineHeight: parseOrThrow(nonNegativeIntSchema, lineHeight, "line height")
    });
  }

  /** 0 restores the measured baseline offset. */
  setLineOffset(lineOffset: number): this {
    return this.update({
      lineOffset: parseOrThrow(nonNegativeIntSchema, lineOffset, "line offset")
    });
  }

  /** Reference font size for the headline probe; larger is more precise and more expensive. */
  setInitialHeadlineScale(scale: number): this {
    return this.update({
      headlineScale: parseOrThrow(positiveIntSchema, scale, "headline scale")
    });
  }

  setHeadlineRefinement(passes: number): this {
    return this.update({
      headlineRefinement: parseOrThrow(nonNegativeIntSchema, passes, "headline refinement")
    });
  }

  getPaddingTop(): number {
    return this.settings.padding.top;
  }

  getPaddingRight(): number {
    return this.settings.padding.right;
  }

  getPaddingBottom(): number {
    return this.settings.padding.bottom;
  }

  getPaddingLeft(): number {
    return this.settings.padding.left;
  }

  getPadding(): PaddingBox {
    return { ...this.settings.padding };
  }

  getAlign(): Alignment {
    return this.settings.align;
  }

  /** Offset used by the last layout, or the configured override before any layout. */
  getLineOffset(): number {
    return this.lastLayout?.lineOffset ?? this.settings.lineOffset;
  }

  getLineHeight(): number {
    return this.lastLayout?.lineHeight ?? this.settings.lineHeight;
  }

  getFontSize(): number {
    return this.lastLayout?.fontSize ?? this.settings.fontSize;
  }

  layout(): TextLayout {
    const layout = layoutText(this.rasterizer, this.settings);
    this.lastLayout = layout;
    return layout;
  }

  /** Lays out and draws the text, returning the canvas together with the layout drawn on it. */
  render(): { canvas: TCanvas; layout: TextLayout } {
    const config = requireConfigured(this.settings);
    const layout = this.layout();
    return { canvas: composeImage(this.rasterizer, config, layout), layout };
  }

  build(): TCanvas {
    return this.render().canvas;
  }

  private update(patch: Partial<TextImageSettings>): this {
    this.settings = { ...this.settings, ...patch };
    this.lastLayout = null;
    return this;
  }
}
