import { colorChannelsSchema, type ColorChannels } from "@imagetext/contracts";

import { InvalidColorFormatError } from "../errors/domain-errors.js";

const SHORT_HEX = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i;
const LONG_HEX = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

const hexChannel = (digits: string): number =>
  Number.parseInt(digits.length === 1 ? digits + digits : digits, 16);

const parseHexColor = (input: string): ColorChannels => {
  const match = SHORT_HEX.exec(input) ?? LONG_HEX.exec(input);
  if (!match) {
    throw new InvalidColorFormatError();
  }

  const [, red = "", green = "", blue = ""] = match;
  return [hexChannel(red), hexChannel(green), hexChannel(blue)];
};

/**
 * Normalizes `#RGB`, `#RRGGBB`, `[R, G, B]` or `[R, G, B, A]` into a channel
 * tuple. Tuple members must be integers in 0..255.
 */
export const parseColor = (input: unknown): ColorChannels => {
  if (typeof input === "string") {
    return parseHexColor(input);
  }

  const parsed = colorChannelsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidColorFormatError();
  }

  return parsed.data;
};
