import { describe, expect, test } from "vitest";

import { parseSgr } from "./sgr.js";

const params = (...values: number[]) => values.map((value) => [value]);

describe("parseSgr", () => {
  test("no parameters means reset", () => {
    expect(parseSgr([])).toEqual([{ kind: "reset" }]);
  });

  test("style flags on and off", () => {
    expect(parseSgr(params(1, 3, 7, 9, 22, 27))).toEqual([
      { kind: "flag", flag: "bold", on: true },
      { kind: "flag", flag: "italic", on: true },
      { kind: "flag", flag: "reverse", on: true },
      { kind: "flag", flag: "strikethrough", on: true },
      { kind: "flag", flag: "bold", on: false },
      { kind: "flag", flag: "dim", on: false },
      { kind: "flag", flag: "reverse", on: false },
    ]);
  });

  test("basic and bright colours", () => {
    expect(parseSgr(params(32, 47, 91, 104))).toEqual([
      { kind: "foreground", color: { type: "indexed", index: 2 } },
      { kind: "background", color: { type: "indexed", index: 7 } },
      { kind: "foreground", color: { type: "indexed", index: 9 } },
      { kind: "background", color: { type: "indexed", index: 12 } },
    ]);
  });

  test("default colours", () => {
    expect(parseSgr(params(39, 49))).toEqual([
      { kind: "foreground", color: { type: "default" } },
      { kind: "background", color: { type: "default" } },
    ]);
  });

  test("256-colour and truecolor with semicolons", () => {
    expect(parseSgr(params(38, 5, 123, 48, 2, 1, 2, 3, 1))).toEqual([
      { kind: "foreground", color: { type: "indexed", index: 123 } },
      { kind: "background", color: { type: "rgb", r: 1, g: 2, b: 3 } },
      { kind: "flag", flag: "bold", on: true },
    ]);
  });

  test("colon sub-parameters, with and without a colour space id", () => {
    expect(parseSgr([[38, 2, 10, 20, 30], [48, 2, 0, 40, 50, 60], [38, 5, 9]])).toEqual([
      { kind: "foreground", color: { type: "rgb", r: 10, g: 20, b: 30 } },
      { kind: "background", color: { type: "rgb", r: 40, g: 50, b: 60 } },
      { kind: "foreground", color: { type: "indexed", index: 9 } },
    ]);
  });

  test("underline style sub-parameter", () => {
    expect(parseSgr([[4, 3], [4, 0]])).toEqual([
      { kind: "flag", flag: "underline", on: true },
      { kind: "flag", flag: "underline", on: false },
    ]);
  });

  test("truncated truecolor is dropped without eating later codes as colours", () => {
    expect(parseSgr(params(1, 38, 2, 5))).toEqual([{ kind: "flag", flag: "bold", on: true }]);
  });

  test("channel values are clamped to a byte", () => {
    expect(parseSgr(params(38, 2, 300, 0, 0))).toEqual([
      { kind: "foreground", color: { type: "rgb", r: 255, g: 0, b: 0 } },
    ]);
  });

  test("unknown codes are ignored", () => {
    expect(parseSgr(params(8, 60, 1))).toEqual([{ kind: "flag", flag: "bold", on: true }]);
  });
});
