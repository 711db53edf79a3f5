import type { Cell, ScreenSnapshot, TerminalSize } from "@termbed/shared";

import { ScreenBuffer } from "./screen.js";

/** Plain text of one row, wide-character trailers skipped and trailing blanks trimmed. */
export function lineText(line: ReadonlyArray<Cell>): string {
  return line
    .filter((cell) => cell.width !== 0)
    .map((cell) => cell.char)
    .join("")
    .trimEnd();
}

/** Every row of a snapshot as plain text. */
export function snapshotText(snapshot: ScreenSnapshot): string[] {
  return snapshot.lines.map(lineText);
}

/**
 * A static frame showing `text` one line per row, clipped to `size`, with the
 * cursor hidden. Tabs and control characters are shown as spaces.
 */
export function renderDocument(text: string, size: TerminalSize): ScreenSnapshot {
  const screen = new ScreenBuffer({ rows: size.rows, cols: size.cols, scrollbackLimit: 0 });
  screen.apply({ type: "set-mode", mode: "cursor-visible", enabled: false });
  screen.apply({ type: "set-mode", mode: "autowrap", enabled: false });

  const lines = text.replace(/\r\n/g, "\n").split("\n").slice(0, size.rows);
  lines.forEach((line, row) => {
    screen.apply({ type: "cursor-move", mode: "absolute", row, col: 0 });
    let used = 0;
    for (const char of line.replace(/[\x00-\x1f\x7f]/g, " ")) {
      if (used >= size.cols) break;
      screen.apply({ type: "print", text: char });
      used++;
    }
  });
  screen.apply({ type: "cursor-move", mode: "absolute", row: 0, col: 0 });
  return screen.snapshot();
}
