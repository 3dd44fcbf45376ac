import { z } from "zod";

const nonEmptyString = z.string().trim().min(1);
const pixelCount = z.number().int().min(0).max(8192);
const colorChannel = z.number().int().min(0).max(255);

export const alignmentSchema = z.enum(["left", "right", "center", "justify"]);

export const hexColorSchema = z
  .string()
  .regex(/^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i, "Expected #RGB or #RRGGBB.");

export const rgbColorSchema = z.tuple([colorChannel, colorChannel, colorChannel]);

export const rgbaColorSchema = z.tuple([
  colorChannel,
  colorChannel,
  colorChannel,
  colorChannel
]);

export const colorChannelsSchema = z.union([rgbColorSchema, rgbaColorSchema]);

export const colorInputSchema = z.union([hexColorSchema, colorChannelsSchema]);

export const paddingInputSchema = z.union([
  pixelCount,
  z.array(pixelCount).min(1).max(4)
]);

export const paddingBoxSchema = z.object({
  top: pixelCount,
  right: pixelCount,
  bottom: pixelCount,
  left: pixelCount
});

export const boundingBoxSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number()
]);

export const lineRecordSchema = z.object({
  text: z.string(),
  width: z.number(),
  offset: z.number()
});

export const textRunSchema = z.object({
  text: z.string(),
  x: z.number()
});

export const positionedLineSchema = lineRecordSchema.extend({
  y: z.number(),
  runs: z.array(textRunSchema).min(1)
});

export const textLayoutSchema = z.object({
  mode: z.enum(["headline", "paragraph"]),
  width: z.number().int().positive(),
  height: z.number().int().nonnegative(),
  innerWidth: z.number().positive(),
  fontSize: z.number().positive(),
  lineHeight: z.number(),
  lineOffset: z.number(),
  lines: z.array(positionedLineSchema)
});

export const renderTextRequestSchema = z.object({
  text: nonEmptyString.max(5_000),
  width: z.number().int().positive().max(8192),
  font: nonEmptyString.max(255),
  fontSize: z.number().min(0).max(2_000).optional(),
  padding: paddingInputSchema.optional(),
  align: alignmentSchema.optional(),
  backgroundColor: colorInputSchema.optional(),
  color: colorInputSchema.optional(),
  lineHeight: pixelCount.optional(),
  lineOffset: pixelCount.optional(),
  headlineScale: z.number().int().positive().max(10_000).optional(),
  headlineRefinement: z.number().int().min(0).max(10).optional()
});

export type Alignment = z.infer<typeof alignmentSchema>;
export type ColorChannels = z.infer<typeof colorChannelsSchema>;
export type PaddingInput = z.infer<typeof paddingInputSchema>;
export type PaddingBox = z.infer<typeof paddingBoxSchema>;
export type BoundingBox = z.infer<typeof boundingBoxSchema>;
export type LineRecord = z.infer<typeof lineRecordSchema>;
export type TextRun = z.infer<typeof textRunSchema>;
export type PositionedLine = z.infer<typeof positionedLineSchema>;
export type TextLayout = z.infer<typeof textLayoutSchema>;
export type RenderTextRequest = z.infer<typeof renderTextRequestSchema>;
