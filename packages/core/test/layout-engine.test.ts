import assert from "node:assert/strict";
import test from "node:test";

import {
  DEFAULT_SETTINGS,
  MissingConfigurationError,
  ValidationError,
  layoutText,
  positionRuns,
  type TextImageSettings
} from "../src/index.js";
import { FakeRasterizer, fakeFont, type FakeRasterizerOptions } from "./fake-rasterizer.js";

const settings = (overrides: Partial<TextImageSettings>): TextImageSettings => ({
  ...DEFAULT_SETTINGS,
  text: "The quick brown fox",
  width: 200,
  font: fakeFont,
  fontSize: 20,
  ...overrides
});

const layout = (overrides: Partial<TextImageSettings>, options?: FakeRasterizerOptions) => {
  const rasterizer = new FakeRasterizer(options);
  return { rasterizer, layout: layoutText(rasterizer, settings(overrides)) };
};

test("layout: single paragraph line with derived metrics", () => {
  const { rasterizer, layout: result } = layout({});

  assert.equal(result.mode, "paragraph");
  assert.equal(result.innerWidth, 200);
  assert.equal(result.fontSize, 20);
  assert.equal(result.lineHeight, 20);
  assert.equal(result.lineOffset, 4);
  assert.equal(result.height, 20);
  assert.deepEqual(result.lines, [
    {
      text: "The quick brown fox",
      width: 190,
      offset: 0,
      y: 16,
      runs: [{ text: "The quick brown fox", x: 0 }]
    }
  ]);
  assert.equal(rasterizer.created.length, 1);
  assert.deepEqual(rasterizer.destroyed, rasterizer.created);
});

test("layout: canvas height and baselines include padding", () => {
  const padding = { top: 10, right: 20, bottom: 30, left: 40 };
  const { layout: result } = layout({ width: 180, padding });

  assert.equal(result.innerWidth, 120);
  assert.equal(result.height, 10 + 30 + 2 * 20);
  assert.deepEqual(
    result.lines.map((line) => line.y),
    [26, 46]
  );
  assert.deepEqual(
    result.lines.map((line) => line.runs[0]?.x),
    [40, 40]
  );
});

test("layout: right and center alignment", () => {
  const padding = { top: 0, right: 20, bottom: 0, left: 40 };

  const right = layout({ width: 180, padding, align: "right" }).layout;
  assert.deepEqual(
    right.lines.map((line) => line.runs[0]?.x),
    [70, 70]
  );

  const center = layout({ width: 180, padding, align: "center" }).layout;
  assert.deepEqual(
    center.lines.map((line) => line.runs[0]?.x),
    [55, 55]
  );
});

test("layout: center alignment rounds the free space split", () => {
  const runs = positionRuns(
    { text: "word", width: 40, offset: 0, words: ["word"] },
    {
      align: "center",
      mode: "paragraph",
      paddingLeft: 0,
      innerWidth: 100,
      isLastLine: true,
      measureWord: () => 40
    }
  );
  assert.deepEqual(runs, [{ text: "word", x: 30 }]);

  const odd = positionRuns(
    { text: "word", width: 41, offset: 0, words: ["word"] },
    {
      align: "center",
      mode: "paragraph",
      paddingLeft: 0,
      innerWidth: 100,
      isLastLine: true,
      measureWord: () => 41
    }
  );
  assert.deepEqual(odd, [{ text: "word", x: 30 }]);
});

test("layout: explicit line height and offset win over measured values", () => {
  const { layout: result } = layout({ width: 120, lineHeight: 30, lineOffset: 6 });

  assert.equal(result.lineHeight, 30);
  assert.equal(result.lineOffset, 6);
  assert.equal(result.height, 60);
  assert.deepEqual(
    result.lines.map((line) => line.y),
    [24, 54]
  );
});

test("layout: headline mode fits one line to the inner width", () => {
  const padding = { top: 10, right: 10, bottom: 10, left: 10 };
  const { layout: result } = layout(
    { text: "Hello world", width: 240, padding, fontSize: 0 },
    { bearing: 3 }
  );

  assert.equal(result.mode, "headline");
  assert.equal(result.fontSize, 40);
  assert.equal(result.lineHeight, 32);
  assert.equal(result.lineOffset, 0);
  assert.equal(result.height, 52);
  assert.deepEqual(result.lines, [
    {
      text: "Hello world",
      width: 220,
      offset: 3,
      y: 42,
      runs: [{ text: "Hello world", x: 7 }]
    }
  ]);
});

test("layout: headline normalizes whitespace and non-breaking markers", () => {
  const { rasterizer, layout: result } = layout({
    text: "  Hello \n world&nbsp;now ",
    fontSize: 0
  });

  assert.equal(result.lines[0]?.text, "Hello world now");
  assert.equal(rasterizer.measured[0]?.text, "Hello world now");
});

test("layout: justify spreads words except on the last line", () => {
  const { layout: result } = layout({ text: "aa bb cc dd", width: 100, align: "justify" });

  assert.deepEqual(
    result.lines.map((line) => line.runs),
    [
      [
        { text: "aa", x: 0 },
        { text: "bb", x: 40 },
        { text: "cc", x: 80 }
      ],
      [{ text: "dd", x: 0 }]
    ]
  );
});

test("layout: justify keeps non-breaking groups as one run", () => {
  const { layout: result } = layout({ text: "The&nbsp;quick brown fox", width: 120, align: "justify" });

  assert.deepEqual(result.lines[0]?.runs, [{ text: "The quick", x: 0 }]);
});

test("layout: justify falls back to left in headline mode", () => {
  const { layout: result } = layout({ text: "Hello world", width: 220, fontSize: 0, align: "justify" });

  assert.deepEqual(result.lines[0]?.runs, [{ text: "Hello world", x: 0 }]);
});

test("layout: missing width, text or font is a configuration error", () => {
  const rasterizer = new FakeRasterizer();

  const cases: Array<[string, Partial<TextImageSettings>]> = [
    ["width", { width: undefined }],
    ["text", { text: undefined }],
    ["font", { font: undefined }]
  ];

  for (const [field, overrides] of cases) {
    assert.throws(
      () => layoutText(rasterizer, settings(overrides)),
      (error: unknown) =>
        error instanceof MissingConfigurationError && error.message.includes(field)
    );
  }
  assert.equal(rasterizer.created.length, 0);
});

test("layout: padding wider than the image is rejected before measuring", () => {
  const rasterizer = new FakeRasterizer();

  assert.throws(
    () =>
      layoutText(rasterizer, settings({ width: 100, padding: { top: 0, right: 50, bottom: 0, left: 50 } })),
    ValidationError
  );
  assert.equal(rasterizer.created.length, 0);
});

test("layout: blank text is rejected", () => {
  assert.throws(() => layout({ text: "  \n\t " }), MissingConfigurationError);
});
