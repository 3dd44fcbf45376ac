import type { PaddingBox, PaddingInput } from "@imagetext/contracts";

/**
 * CSS shorthand: one value for all sides, two for vertical/horizontal, three
 * for top/horizontal/bottom, four for top/right/bottom/left.
 */
export const expandPadding = (
  top: number,
  right?: number,
  bottom?: number,
  left?: number
): PaddingBox => {
  if (right === undefined) {
    return { top, right: top, bottom: top, left: top };
  }

  if (bottom === undefined) {
    return { top, right, bottom: top, left: right };
  }

  if (left === undefined) {
    return { top, right, bottom, left: right };
  }

  return { top, right, bottom, left };
};

export const paddingFromInput = (input: PaddingInput): PaddingBox => {
  if (typeof input === "number") {
    return expandPadding(input);
  }

  const [top = 0, right, bottom, left] = input;
  return expandPadding(top, right, bottom, left);
};
