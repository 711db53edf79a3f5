import { expect, test } from "vitest";

import { isHostEvent } from "./events.js";

test("accepts each event kind", () => {
  expect(isHostEvent({ type: "key", key: "ctrl+c" })).toBe(true);
  expect(isHostEvent({ type: "key", key: "a", text: "a", modifiers: { shift: false } })).toBe(true);
  expect(isHostEvent({ type: "paste", text: "hi" })).toBe(true);
  expect(isHostEvent({ type: "mouse", action: "scroll-up", button: "none", row: 0, col: 3 })).toBe(true);
  expect(isHostEvent({ type: "resize", rows: 24, cols: 80 })).toBe(true);
  expect(isHostEvent({ type: "focus", focused: false })).toBe(true);
  expect(isHostEvent({ type: "hover", row: 1, col: 1 })).toBe(true);
});

test("rejects malformed messages", () => {
  expect(isHostEvent(null)).toBe(false);
  expect(isHostEvent("key")).toBe(false);
  expect(isHostEvent({ type: "key" })).toBe(false);
  expect(isHostEvent({ type: "mouse", action: "click", button: "left", row: 0, col: 0 })).toBe(false);
  expect(isHostEvent({ type: "resize", rows: "24", cols: 80 })).toBe(false);
  expect(isHostEvent({ type: "unknown" })).toBe(false);
});
