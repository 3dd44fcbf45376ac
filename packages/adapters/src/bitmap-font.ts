import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { FontUnreadableError } from "@imagetext/core";
import { z } from "zod";

/** Pixel font shipped with the package, usable without any system fonts. */
export const BUILTIN_FONT_PATH = fileURLToPath(new URL("../fonts/pixel-5x7.json", import.meta.url));

const rowSchema = z.number().int().min(0);

export const bitmapFontSchema = z
  .object({
    name: z.string().min(1),
    unitsPerEm: z.number().int().positive(),
    ascent: z.number().int().positive(),
    descent: z.number().int().min(0),
    advance: z.number().int().positive(),
    glyphWidth: z.number().int().positive().max(31),
    fallback: z.string().length(1),
    glyphs: z.record(z.string().length(1), z.array(rowSchema))
  })
  .refine((font) => font.glyphWidth <= font.advance, {
    message: "glyphWidth must not exceed advance"
  })
  .refine((font) => font.glyphs[font.fallback] !== undefined, {
    message: "fallback glyph is missing"
  });

export type BitmapFont = z.infer<typeof bitmapFontSchema>;

/**
 * Glyph rows for `char`, tried as-is, then upper-cased, then the fallback.
 * Each row is a bit mask with the leftmost pixel in the highest bit.
 */
export const glyphRows = (font: BitmapFont, char: string): readonly number[] =>
  font.glyphs[char] ?? font.glyphs[char.toUpperCase()] ?? font.glyphs[font.fallback] ?? [];

export const loadBitmapFont = (path: string): BitmapFont => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new FontUnreadableError(path, { cause: error });
  }

  const parsed = bitmapFontSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FontUnreadableError(path, { cause: parsed.error });
  }
  return parsed.data;
};
