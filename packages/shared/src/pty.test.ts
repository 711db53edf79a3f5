import { expect, test } from "vitest";

import { isValidTerminalSize } from "./pty.js";

test("sizes must be positive integers", () => {
  expect(isValidTerminalSize({ rows: 24, cols: 80 })).toBe(true);
  expect(isValidTerminalSize({ rows: 0, cols: 80 })).toBe(false);
  expect(isValidTerminalSize({ rows: 24, cols: 1.5 })).toBe(false);
  expect(isValidTerminalSize({ rows: Number.NaN, cols: 80 })).toBe(false);
});
