import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { FontUnreadableError, ImageText } from "@imagetext/core";

import {
  BUILTIN_FONT_PATH,
  BitmapRasterizer,
  RasterCanvas,
  glyphRows,
  loadBitmapFont,
  rgbaFromChannels
} from "../src/index.js";

test("adapters: bitmap font metrics scale with the font size", () => {
  const rasterizer = new BitmapRasterizer();
  const face = rasterizer.loadFont(BUILTIN_FONT_PATH);
  const canvas = rasterizer.createCanvas(1, 1);

  assert.equal(face.family, "Pixel 5x7");
  assert.deepEqual(rasterizer.measureText(canvas, face, 16, "HELLO"), [0, 2, 58, 2, 58, -14, 0, -14]);
  assert.deepEqual(rasterizer.measureText(canvas, face, 8, "HI"), [0, 1, 11, 1, 11, -7, 0, -7]);
  assert.deepEqual(rasterizer.measureText(canvas, face, 16, ""), [0, 2, 0, 2, 0, -14, 0, -14]);
});

test("adapters: bitmap glyph lookup falls back to upper case and then to the fallback glyph", () => {
  const font = loadBitmapFont(BUILTIN_FONT_PATH);

  assert.deepEqual(glyphRows(font, "h"), [17, 17, 17, 31, 17, 17, 17]);
  assert.deepEqual(glyphRows(font, "~"), [14, 17, 1, 2, 4, 0, 4]);
});

test("adapters: unreadable or malformed bitmap fonts are rejected", () => {
  const rasterizer = new BitmapRasterizer();
  const dir = mkdtempSync(join(tmpdir(), "imagetext-fonts-"));
  const broken = join(dir, "broken.json");
  const incomplete = join(dir, "incomplete.json");
  writeFileSync(broken, "{ not json");
  writeFileSync(incomplete, JSON.stringify({ name: "Tiny", unitsPerEm: 8 }));

  assert.throws(() => rasterizer.loadFont(join(dir, "absent.json")), FontUnreadableError);
  assert.throws(() => rasterizer.loadFont(broken), FontUnreadableError);
  assert.throws(
    () => rasterizer.loadFont(incomplete),
    (error: unknown) => error instanceof FontUnreadableError && error.fontPath === incomplete
  );
});

test("adapters: fourth color channel maps 0..127 onto opaque..transparent", () => {
  assert.deepEqual(rgbaFromChannels([10, 20, 30]), { r: 10, g: 20, b: 30, a: 255 });
  assert.deepEqual(rgbaFromChannels([10, 20, 30, 0]), { r: 10, g: 20, b: 30, a: 255 });
  assert.deepEqual(rgbaFromChannels([10, 20, 30, 64]), { r: 10, g: 20, b: 30, a: 126 });
  assert.deepEqual(rgbaFromChannels([10, 20, 30, 127]), { r: 10, g: 20, b: 30, a: 0 });
  assert.deepEqual(rgbaFromChannels([10, 20, 30, 200]), { r: 10, g: 20, b: 30, a: 0 });
});

test("adapters: flood fill stops at pixels of another color", () => {
  const canvas = new RasterCanvas(3, 3);
  canvas.fillRect(1, 1, 1, 1, { r: 0, g: 0, b: 255, a: 255 });

  canvas.floodFill(0, 0, { r: 255, g: 0, b: 0, a: 255 });

  assert.deepEqual(canvas.getPixel(0, 0), { r: 255, g: 0, b: 0, a: 255 });
  assert.deepEqual(canvas.getPixel(2, 2), { r: 255, g: 0, b: 0, a: 255 });
  assert.deepEqual(canvas.getPixel(1, 1), { r: 0, g: 0, b: 255, a: 255 });
});

test("adapters: bitmap rasterizer renders a full image text build", () => {
  const rasterizer = new BitmapRasterizer();
  const image = new ImageText(rasterizer)
    .setText("HI")
    .setWidth(40)
    .setPadding(4)
    .setFont(BUILTIN_FONT_PATH, 8)
    .setColor("#FF0000")
    .setBackgroundColor("#000000");

  const canvas = image.build();

  assert.equal(canvas.width, 40);
  assert.equal(canvas.height, 16);
  assert.equal(image.getLineHeight(), 8);
  assert.equal(image.getLineOffset(), 1);

  const red = { r: 255, g: 0, b: 0, a: 255 };
  const black = { r: 0, g: 0, b: 0, a: 255 };
  assert.deepEqual(canvas.getPixel(0, 0), black);
  assert.deepEqual(canvas.getPixel(4, 4), red);
  assert.deepEqual(canvas.getPixel(5, 4), black);
  assert.deepEqual(canvas.getPixel(6, 7), red);
  assert.deepEqual(canvas.getPixel(11, 4), red);
  assert.deepEqual(canvas.getPixel(39, 15), black);
});

test("adapters: default background stays transparent", () => {
  const rasterizer = new BitmapRasterizer();
  const canvas = new ImageText(rasterizer)
    .setText("HI")
    .setWidth(20)
    .setFont(BUILTIN_FONT_PATH, 8)
    .build();

  assert.deepEqual(canvas.getPixel(19, 0), { r: 0, g: 0, b: 0, a: 0 });
  assert.deepEqual(canvas.getPixel(0, 1), { r: 255, g: 255, b: 255, a: 255 });
});
