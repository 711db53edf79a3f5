import type { Color, CursorShape, StyleFlag } from "./terminal.js";

export interface PrintOp {
  type: "print";
  text: string;
}

export type ControlOpType =
  | "carriage-return"
  | "line-feed"
  | "backspace"
  | "tab"
  | "bell"
  | "index"
  | "next-line"
  | "reverse-index"
  | "save-cursor"
  | "restore-cursor"
  | "reset";

export interface ControlOp {
  type: ControlOpType;
}

export interface CursorMoveAbsolute {
  type: "cursor-move";
  mode: "absolute";
  row: number;
  col: number;
}

export interface CursorMoveColumn {
  type: "cursor-move";
  mode: "column";
  col: number;
}

export interface CursorMoveRow {
  type: "cursor-move";
  mode: "row";
  row: number;
}

export interface CursorMoveRelative {
  type: "cursor-move";
  mode: "relative";
  direction: "up" | "down" | "forward" | "back";
  count: number;
}

export interface CursorMoveLine {
  type: "cursor-move";
  mode: "line";
  direction: "next" | "previous";
  count: number;
}

/** Coordinates are 0-based; the parser converts from the 1-based wire form. */
export type CursorMoveOp =
  | CursorMoveAbsolute
  | CursorMoveColumn
  | CursorMoveRow
  | CursorMoveRelative
  | CursorMoveLine;

export type EraseLineMode = "to-end" | "to-start" | "all";
export type EraseDisplayMode = "to-end" | "to-start" | "all" | "scrollback";

export interface EraseLineOp {
  type: "erase-line";
  mode: EraseLineMode;
}

export interface EraseDisplayOp {
  type: "erase-display";
  mode: EraseDisplayMode;
}

export interface CountOp {
  type: "erase-chars" | "insert-chars" | "delete-chars" | "insert-lines" | "delete-lines";
  count: number;
}

export interface ScrollOp {
  type: "scroll";
  direction: "up" | "down";
  count: number;
}

export interface SetScrollRegionOp {
  type: "set-scroll-region";
  top: number;
  /** `null` means the last row of the screen. */
  bottom: number | null;
}

export type SgrAttribute =
  | { kind: "reset" }
  | { kind: "flag"; flag: StyleFlag; on: boolean }
  | { kind: "foreground"; color: Color }
  | { kind: "background"; color: Color };

export interface SetAttributesOp {
  type: "set-attributes";
  attributes: SgrAttribute[];
}

export type TerminalMode =
  | "insert"
  | "application-cursor-keys"
  | "autowrap"
  | "cursor-visible"
  | "alternate-screen"
  | "alternate-screen-save-cursor"
  | "mouse-click"
  | "mouse-drag"
  | "mouse-motion"
  | "mouse-sgr"
  | "bracketed-paste";

export interface SetModeOp {
  type: "set-mode";
  mode: TerminalMode;
  enabled: boolean;
}

export interface SetCursorStyleOp {
  type: "set-cursor-style";
  shape: CursorShape;
  blinking: boolean;
}

export interface SetTitleOp {
  type: "set-title";
  title: string;
}

export type ReportQuery =
  | "status"
  | "cursor-position"
  | "device-attributes"
  | "secondary-device-attributes";

export interface ReportOp {
  type: "report";
  query: ReportQuery;
}

export type TerminalOp =
  | PrintOp
  | ControlOp
  | CursorMoveOp
  | EraseLineOp
  | EraseDisplayOp
  | CountOp
  | ScrollOp
  | SetScrollRegionOp
  | SetAttributesOp
  | SetModeOp
  | SetCursorStyleOp
  | SetTitleOp
  | ReportOp;
