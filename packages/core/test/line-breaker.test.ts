import assert from "node:assert/strict";
import test from "node:test";

import { breakLines, tokenize, withMeasurementCanvas } from "../src/index.js";
import { FakeRasterizer, fakeFont } from "./fake-rasterizer.js";

// 20px with the fake's default advance is 10px per character.
const wrap = (text: string, innerWidth: number, rasterizer = new FakeRasterizer()) =>
  withMeasurementCanvas(rasterizer, (probe) =>
    breakLines(probe, { tokens: tokenize(text), innerWidth, font: fakeFont, fontSize: 20 })
  );

test("line breaker: wraps greedily and re-measures the closed line", () => {
  const rasterizer = new FakeRasterizer();
  const result = wrap("The quick brown fox", 120, rasterizer);

  assert.deepEqual(
    result.lines.map(({ text, width, offset }) => ({ text, width, offset })),
    [
      { text: "The quick", width: 90, offset: 0 },
      { text: "brown fox", width: 90, offset: 0 }
    ]
  );
  assert.deepEqual(
    rasterizer.measured.map((entry) => entry.text),
    ["The", "The quick", "The quick brown", "The quick", "brown", "brown fox"]
  );
});

test("line breaker: tracks the tallest candidate and the deepest baseline offset", () => {
  const result = wrap("The quick brown fox", 120);

  assert.equal(result.maxLineHeight, 20);
  assert.equal(result.maxLineOffset, 4);
});

test("line breaker: text without descenders has no baseline offset", () => {
  const result = wrap("Hello world", 500);

  assert.equal(result.lines.length, 1);
  assert.equal(result.maxLineHeight, 16);
  assert.equal(result.maxLineOffset, 0);
});

test("line breaker: keeps everything on one line when it fits", () => {
  const result = wrap("The quick brown fox", 200);

  assert.equal(result.lines.length, 1);
  assert.equal(result.lines[0]?.text, "The quick brown fox");
  assert.equal(result.lines[0]?.width, 190);
});

test("line breaker: a candidate exactly as wide as the budget is rejected", () => {
  const result = wrap("aa bb", 50);

  assert.deepEqual(
    result.lines.map((line) => line.text),
    ["aa", "bb"]
  );
});

test("line breaker: an overlong word gets its own overflowing line", () => {
  const result = wrap("a extraordinary b", 50);

  assert.deepEqual(
    result.lines.map(({ text, width }) => ({ text, width })),
    [
      { text: "a", width: 10 },
      { text: "extraordinary", width: 130 },
      { text: "b", width: 10 }
    ]
  );
});

test("line breaker: an overlong first word is kept", () => {
  const result = wrap("extraordinary b", 50);

  assert.deepEqual(
    result.lines.map((line) => line.text),
    ["extraordinary", "b"]
  );
});

test("line breaker: non-breaking tokens stay together", () => {
  const result = wrap("aa&nbsp;bb cc", 60);

  assert.deepEqual(
    result.lines.map((line) => line.words),
    [["aa bb"], ["cc"]]
  );
});

test("line breaker: never splits words and respects the budget", () => {
  const text =
    "Pack my box with five dozen liquor jugs while the sphinx of black quartz judges my vow";
  const tokens = tokenize(text);
  const innerWidth = 170;
  const result = wrap(text, innerWidth);

  assert.deepEqual(
    result.lines.flatMap((line) => line.words),
    tokens
  );
  assert.equal(result.lines.map((line) => line.text).join(" "), tokens.join(" "));
  for (const line of result.lines) {
    assert.ok(line.width < innerWidth || line.words.length === 1, line.text);
    assert.equal(line.width, line.text.length * 10);
  }
});
