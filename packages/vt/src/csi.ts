import type { CursorShape, EraseDisplayMode, EraseLineMode, TerminalMode, TerminalOp } from "@termbed/shared";

import type { CsiParam } from "./sgr.js";
import { parseSgr } from "./sgr.js";

export interface CsiSequence {
  /** Private marker from the start of the parameters (`?`, `>`, `<`, `=`), or "". */
  prefix: string;
  params: readonly CsiParam[];
  intermediates: string;
  final: string;
}

const ERASE_LINE: Record<number, EraseLineMode> = { 0: "to-end", 1: "to-start", 2: "all" };
const ERASE_DISPLAY: Record<number, EraseDisplayMode> = {
  0: "to-end",
  1: "to-start",
  2: "all",
  3: "scrollback",
};

const PRIVATE_MODES: Record<number, TerminalMode> = {
  1: "application-cursor-keys",
  7: "autowrap",
  25: "cursor-visible",
  47: "alternate-screen",
  1047: "alternate-screen",
  1049: "alternate-screen-save-cursor",
  1000: "mouse-click",
  1002: "mouse-drag",
  1003: "mouse-motion",
  1006: "mouse-sgr",
  2004: "bracketed-paste",
};

const PUBLIC_MODES: Record<number, TerminalMode> = {
  4: "insert",
};

const CURSOR_STYLES: Record<number, { shape: CursorShape; blinking: boolean }> = {
  0: { shape: "block", blinking: true },
  1: { shape: "block", blinking: true },
  2: { shape: "block", blinking: false },
  3: { shape: "underline", blinking: true },
  4: { shape: "underline", blinking: false },
  5: { shape: "bar", blinking: true },
  6: { shape: "bar", blinking: false },
};

function raw(seq: CsiSequence, index: number): number {
  return seq.params[index]?.[0] ?? 0;
}

/** Parameter where 0 and "missing" both mean `fallback` (counts, 1-based positions). */
function count(seq: CsiSequence, index: number, fallback = 1): number {
  const value = raw(seq, index);
  return value === 0 ? fallback : value;
}

function modeOps(seq: CsiSequence, table: Record<number, TerminalMode>): TerminalOp[] {
  const enabled = seq.final === "h";
  const ops: TerminalOp[] = [];
  for (const param of seq.params) {
    const mode = table[param[0] ?? 0];
    if (mode) ops.push({ type: "set-mode", mode, enabled });
  }
  return ops;
}

function dispatchPrivate(seq: CsiSequence): TerminalOp[] | null {
  if (seq.prefix === "?" && (seq.final === "h" || seq.final === "l")) {
    return modeOps(seq, PRIVATE_MODES);
  }
  if (seq.prefix === ">" && seq.final === "c" && raw(seq, 0) === 0) {
    return [{ type: "report", query: "secondary-device-attributes" }];
  }
  return null;
}

function dispatchWithIntermediates(seq: CsiSequence): TerminalOp[] | null {
  if (seq.intermediates === " " && seq.final === "q") {
    const style = CURSOR_STYLES[raw(seq, 0)];
    return style ? [{ type: "set-cursor-style", ...style }] : null;
  }
  return null;
}

function dispatchCursor(seq: CsiSequence): TerminalOp | null {
  switch (seq.final) {
    case "A":
      return { type: "cursor-move", mode: "relative", direction: "up", count: count(seq, 0) };
    case "B":
    case "e":
      return { type: "cursor-move", mode: "relative", direction: "down", count: count(seq, 0) };
    case "C":
    case "a":
      return { type: "cursor-move", mode: "relative", direction: "forward", count: count(seq, 0) };
    case "D":
      return { type: "cursor-move", mode: "relative", direction: "back", count: count(seq, 0) };
    case "E":
      return { type: "cursor-move", mode: "line", direction: "next", count: count(seq, 0) };
    case "F":
      return { type: "cursor-move", mode: "line", direction: "previous", count: count(seq, 0) };
    case "G":
    case "`":
      return { type: "cursor-move", mode: "column", col: count(seq, 0) - 1 };
    case "d":
      return { type: "cursor-move", mode: "row", row: count(seq, 0) - 1 };
    case "H":
    case "f":
      return { type: "cursor-move", mode: "absolute", row: count(seq, 0) - 1, col: count(seq, 1) - 1 };
    default:
      return null;
  }
}

function dispatchEdit(seq: CsiSequence): TerminalOp | null {
  switch (seq.final) {
    case "J": {
      const mode = ERASE_DISPLAY[raw(seq, 0)];
      return mode ? { type: "erase-display", mode } : null;
    }
    case "K": {
      const mode = ERASE_LINE[raw(seq, 0)];
      return mode ? { type: "erase-line", mode } : null;
    }
    case "X":
      return { type: "erase-chars", count: count(seq, 0) };
    case "@":
      return { type: "insert-chars", count: count(seq, 0) };
    case "P":
      return { type: "delete-chars", count: count(seq, 0) };
    case "L":
      return { type: "insert-lines", count: count(seq, 0) };
    case "M":
      return { type: "delete-lines", count: count(seq, 0) };
    case "S":
      return { type: "scroll", direction: "up", count: count(seq, 0) };
    case "T":
      return { type: "scroll", direction: "down", count: count(seq, 0) };
    case "r": {
      const bottom = raw(seq, 1);
      return { type: "set-scroll-region", top: count(seq, 0) - 1, bottom: bottom === 0 ? null : bottom - 1 };
    }
    default:
      return null;
  }
}

function dispatchMisc(seq: CsiSequence): TerminalOp[] | null {
  switch (seq.final) {
    case "m":
      return [{ type: "set-attributes", attributes: parseSgr(seq.params) }];
    case "h":
    case "l":
      return modeOps(seq, PUBLIC_MODES);
    case "s":
      return [{ type: "save-cursor" }];
    case "u":
      return [{ type: "restore-cursor" }];
    case "n":
      if (raw(seq, 0) === 5) return [{ type: "report", query: "status" }];
      if (raw(seq, 0) === 6) return [{ type: "report", query: "cursor-position" }];
      return null;
    case "c":
      return raw(seq, 0) === 0 ? [{ type: "report", query: "device-attributes" }] : null;
    default:
      return null;
  }
}

/**
 * Maps a complete control sequence to operations. Returns `null` for
 * sequences outside the supported subset; the caller discards those.
 */
export function dispatchCsi(seq: CsiSequence): TerminalOp[] | null {
  if (seq.prefix !== "") return dispatchPrivate(seq);
  if (seq.intermediates !== "") return dispatchWithIntermediates(seq);

  const single = dispatchCursor(seq) ?? dispatchEdit(seq);
  if (single) return [single];
  return dispatchMisc(seq);
}
