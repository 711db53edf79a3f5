export interface DefaultColor {
  readonly type: "default";
}

export interface IndexedColor {
  readonly type: "indexed";
  readonly index: number;
}

export interface RgbColor {
  readonly type: "rgb";
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type Color = DefaultColor | IndexedColor | RgbColor;

export const DEFAULT_COLOR: DefaultColor = Object.freeze({ type: "default" });

export type StyleFlag =
  | "bold"
  | "dim"
  | "italic"
  | "underline"
  | "blink"
  | "reverse"
  | "strikethrough";

export interface CellAttributes {
  readonly fg: Color;
  readonly bg: Color;
  readonly bold: boolean;
  readonly dim: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly blink: boolean;
  readonly reverse: boolean;
  readonly strikethrough: boolean;
}

/**
 * One grid position. `width` is 2 for the lead cell of a wide character,
 * 0 for the cell it spills into, 1 otherwise.
 */
export interface Cell extends CellAttributes {
  readonly char: string;
  readonly width: 0 | 1 | 2;
}

export type CursorShape = "block" | "underline" | "bar";

export interface CursorState {
  readonly row: number;
  readonly col: number;
  readonly visible: boolean;
  readonly shape: CursorShape;
  readonly blinking: boolean;
}

export type MouseTracking = "off" | "click" | "drag" | "motion";

export interface TerminalModes {
  readonly applicationCursorKeys: boolean;
  readonly autowrap: boolean;
  readonly insert: boolean;
  readonly bracketedPaste: boolean;
  readonly mouseTracking: MouseTracking;
  readonly sgrMouse: boolean;
}

export const DEFAULT_TERMINAL_MODES: TerminalModes = Object.freeze({
  applicationCursorKeys: false,
  autowrap: true,
  insert: false,
  bracketedPaste: false,
  mouseTracking: "off",
  sgrMouse: false,
});

export interface ScreenSnapshot {
  readonly rows: number;
  readonly cols: number;
  readonly lines: ReadonlyArray<ReadonlyArray<Cell>>;
  readonly cursor: CursorState;
  readonly alternateScreen: boolean;
  readonly modes: TerminalModes;
  readonly title: string;
  readonly scrollbackLength: number;
  /** Rows changed since the previous snapshot, ascending. */
  readonly dirtyRows: ReadonlyArray<number>;
}
