import { readFileSync } from "node:fs";

type Range = readonly [number, number];

interface WidthTable {
  zero: Range[];
  wide: Range[];
}

function isRangeList(value: unknown): value is Range[] {
  return (
    Array.isArray(value) &&
    value.every(
      (entry) =>
        Array.isArray(entry) &&
        entry.length === 2 &&
        typeof entry[0] === "number" &&
        typeof entry[1] === "number",
    )
  );
}

function loadWidthTable(): WidthTable {
  const raw = readFileSync(new URL("../data/char-widths.json", import.meta.url), "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("char-widths.json must contain an object");
  }
  const zero: unknown = Reflect.get(parsed, "zero");
  const wide: unknown = Reflect.get(parsed, "wide");
  if (!isRangeList(zero) || !isRangeList(wide)) {
    throw new Error("char-widths.json must contain `zero` and `wide` range lists");
  }
  return { zero, wide };
}

const TABLE = loadWidthTable();

function inRanges(ranges: Range[], codePoint: number): boolean {
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const range = ranges[mid];
    if (!range) return false;
    if (codePoint < range[0]) hi = mid - 1;
    else if (codePoint > range[1]) lo = mid + 1;
    else return true;
  }
  return false;
}

/** Number of terminal columns a code point occupies: 0, 1 or 2. */
export function charWidth(codePoint: number): 0 | 1 | 2 {
  if (codePoint < 0x300) return 1;
  if (inRanges(TABLE.zero, codePoint)) return 0;
  if (inRanges(TABLE.wide, codePoint)) return 2;
  return 1;
}

/** Width of a grapheme: the width of its first code point. */
export function graphemeWidth(text: string): 0 | 1 | 2 {
  const codePoint = text.codePointAt(0);
  return codePoint === undefined ? 0 : charWidth(codePoint);
}
