import type { Cell, CellAttributes, Color } from "@termbed/shared";
import { DEFAULT_COLOR } from "@termbed/shared";

/** The graphic rendition applied to newly printed cells. */
export type Pen = { -readonly [K in keyof CellAttributes]: CellAttributes[K] };

export function defaultPen(): Pen {
  return {
    fg: DEFAULT_COLOR,
    bg: DEFAULT_COLOR,
    bold: false,
    dim: false,
    italic: false,
    underline: false,
    blink: false,
    reverse: false,
    strikethrough: false,
  };
}

function frozen(cell: Cell): Cell {
  return Object.freeze(cell);
}

export const BLANK: Cell = frozen({ ...defaultPen(), char: " ", width: 1 });

export function freezeColor(color: Color): Color {
  return color.type === "default" ? DEFAULT_COLOR : Object.freeze({ ...color });
}

export function makeCell(pen: Pen, char: string, width: 0 | 1 | 2): Cell {
  return frozen({ ...pen, char, width });
}

/** Erased cells keep the current background colour and nothing else. */
export function blankCell(bg: Color = DEFAULT_COLOR): Cell {
  if (bg.type === "default") return BLANK;
  return frozen({ ...defaultPen(), bg, char: " ", width: 1 });
}

export function blankRow(cols: number, bg?: Color): Cell[] {
  const cell = blankCell(bg);
  return Array.from({ length: cols }, () => cell);
}

export function isBlankRow(row: readonly Cell[]): boolean {
  return row.every((cell) => cell === BLANK);
}

/** Truncates or pads a row to `cols`, never leaving half of a wide character. */
export function fitRow(row: readonly Cell[], cols: number): Cell[] {
  const fitted = row.slice(0, cols);
  while (fitted.length < cols) fitted.push(BLANK);
  repairWide(fitted);
  return fitted;
}

/**
 * Replaces orphaned halves of wide characters with blanks: a lead cell whose
 * trailer is gone, or a trailer with no lead before it.
 */
export function repairWide(row: Cell[]): void {
  for (let col = 0; col < row.length; col++) {
    const cell = row[col];
    if (!cell) continue;
    if (cell.width === 2 && row[col + 1]?.width !== 0) {
      row[col] = blankCell(cell.bg);
    } else if (cell.width === 0 && row[col - 1]?.width !== 2) {
      row[col] = blankCell(cell.bg);
    }
  }
}
