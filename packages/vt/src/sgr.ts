import type { Color, SgrAttribute, StyleFlag } from "@termbed/shared";
import { DEFAULT_COLOR } from "@termbed/shared";

/** A CSI parameter with its colon-separated sub-parameters; empty values read as 0. */
export type CsiParam = readonly number[];

const FLAG_ON: Record<number, StyleFlag> = {
  1: "bold",
  2: "dim",
  3: "italic",
  4: "underline",
  5: "blink",
  6: "blink",
  7: "reverse",
  9: "strikethrough",
  21: "underline",
};

const FLAG_OFF: Record<number, StyleFlag[]> = {
  22: ["bold", "dim"],
  23: ["italic"],
  24: ["underline"],
  25: ["blink"],
  27: ["reverse"],
  29: ["strikethrough"],
};

function clampByte(value: number | undefined): number {
  return Math.max(0, Math.min(255, value ?? 0));
}

function indexed(index: number | undefined): Color {
  return { type: "indexed", index: clampByte(index) };
}

function rgb(r: number | undefined, g: number | undefined, b: number | undefined): Color {
  return { type: "rgb", r: clampByte(r), g: clampByte(g), b: clampByte(b) };
}

interface ExtendedColor {
  color: Color | null;
  consumed: number;
}

/**
 * Reads the colour after a 38/48 selector. Handles both `38;5;n` / `38;2;r;g;b`
 * and the colon forms `38:5:n`, `38:2:r:g:b`, `38:2::r:g:b`.
 */
function readExtendedColor(params: readonly CsiParam[], at: number): ExtendedColor {
  const head = params[at] ?? [];
  if (head.length > 1) {
    const sub = head.slice(1);
    if (sub[0] === 5) return { color: indexed(sub[1]), consumed: 0 };
    if (sub[0] === 2) {
      const channels = sub.length >= 5 ? sub.slice(2) : sub.slice(1);
      return { color: rgb(channels[0], channels[1], channels[2]), consumed: 0 };
    }
    return { color: null, consumed: 0 };
  }

  const mode = params[at + 1]?.[0];
  if (mode === 5) {
    const index = params[at + 2]?.[0];
    return { color: index === undefined ? null : indexed(index), consumed: 2 };
  }
  if (mode === 2) {
    if (params.length < at + 5) return { color: null, consumed: params.length - at - 1 };
    return {
      color: rgb(params[at + 2]?.[0], params[at + 3]?.[0], params[at + 4]?.[0]),
      consumed: 4,
    };
  }
  return { color: null, consumed: mode === undefined ? 0 : 1 };
}

function basicColor(code: number): { target: "foreground" | "background"; color: Color } | null {
  if (code >= 30 && code <= 37) return { target: "foreground", color: indexed(code - 30) };
  if (code >= 40 && code <= 47) return { target: "background", color: indexed(code - 40) };
  if (code >= 90 && code <= 97) return { target: "foreground", color: indexed(code - 90 + 8) };
  if (code >= 100 && code <= 107) return { target: "background", color: indexed(code - 100 + 8) };
  if (code === 39) return { target: "foreground", color: DEFAULT_COLOR };
  if (code === 49) return { target: "background", color: DEFAULT_COLOR };
  return null;
}

function colorAttribute(target: "foreground" | "background", color: Color): SgrAttribute {
  return target === "foreground" ? { kind: "foreground", color } : { kind: "background", color };
}

export function parseSgr(params: readonly CsiParam[]): SgrAttribute[] {
  if (params.length === 0) return [{ kind: "reset" }];

  const attributes: SgrAttribute[] = [];
  for (let i = 0; i < params.length; i++) {
    const param = params[i] ?? [0];
    const code = param[0] ?? 0;
    const flagOn = FLAG_ON[code];
    const flagsOff = FLAG_OFF[code];

    if (code === 0) {
      attributes.push({ kind: "reset" });
    } else if (code === 4 && param.length > 1) {
      attributes.push({ kind: "flag", flag: "underline", on: (param[1] ?? 0) !== 0 });
    } else if (flagOn) {
      attributes.push({ kind: "flag", flag: flagOn, on: true });
    } else if (flagsOff) {
      for (const flag of flagsOff) attributes.push({ kind: "flag", flag, on: false });
    } else if (code === 38 || code === 48) {
      const { color, consumed } = readExtendedColor(params, i);
      if (color) attributes.push(colorAttribute(code === 38 ? "foreground" : "background", color));
      i += consumed;
    } else {
      const basic = basicColor(code);
      if (basic) attributes.push(colorAttribute(basic.target, basic.color));
    }
  }
  return attributes;
}
