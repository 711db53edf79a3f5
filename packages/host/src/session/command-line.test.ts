import { expect, test } from "vitest";

import { splitCommandLine } from "./command-line.js";

test("splits on runs of whitespace", () => {
  expect(splitCommandLine("  code   --wait\t-n ")).toEqual(["code", "--wait", "-n"]);
});

test("quotes group words", () => {
  expect(splitCommandLine(`vim -c "set nu" 'a b'`)).toEqual(["vim", "-c", "set nu", "a b"]);
});

test("quotes join with adjacent text", () => {
  expect(splitCommandLine(`--flag="x y"z`)).toEqual(["--flag=x yz"]);
});

test("escapes", () => {
  expect(splitCommandLine(String.raw`a\ b "c\"d" 'e\f'`)).toEqual(["a b", 'c"d', String.raw`e\f`]);
});

test("empty quotes make an empty word", () => {
  expect(splitCommandLine(`edit ""`)).toEqual(["edit", ""]);
});

test("blank input has no words", () => {
  expect(splitCommandLine("   ")).toEqual([]);
});

test("an unterminated quote is an error", () => {
  expect(() => splitCommandLine(`vim "oops`)).toThrow(SyntaxError);
});
