export type { TerminalSize, PtySpawnOptions, ProcessExit } from "./pty.js";
export { DEFAULT_TERMINAL_SIZE, DEFAULT_TERMINAL_TYPE, isValidTerminalSize } from "./pty.js";

export type {
  DefaultColor,
  IndexedColor,
  RgbColor,
  Color,
  StyleFlag,
  CellAttributes,
  Cell,
  CursorShape,
  CursorState,
  MouseTracking,
  TerminalModes,
  ScreenSnapshot,
} from "./terminal.js";
export { DEFAULT_COLOR, DEFAULT_TERMINAL_MODES } from "./terminal.js";

export type {
  PrintOp,
  ControlOpType,
  ControlOp,
  CursorMoveAbsolute,
  CursorMoveColumn,
  CursorMoveRow,
  CursorMoveRelative,
  CursorMoveLine,
  CursorMoveOp,
  EraseLineMode,
  EraseDisplayMode,
  EraseLineOp,
  EraseDisplayOp,
  CountOp,
  ScrollOp,
  SetScrollRegionOp,
  SgrAttribute,
  SetAttributesOp,
  TerminalMode,
  SetModeOp,
  SetCursorStyleOp,
  SetTitleOp,
  ReportQuery,
  ReportOp,
  TerminalOp,
} from "./ops.js";

export type {
  KeyModifiers,
  HostKeyEvent,
  HostPasteEvent,
  MouseAction,
  MouseButton,
  HostMouseEvent,
  HostResizeEvent,
  HostFocusEvent,
  HostHoverEvent,
  HostEvent,
} from "./events.js";
export { isHostEvent } from "./events.js";

export type { EditorSettings } from "./settings.js";
export { DEFAULT_EDITOR_SETTINGS, pickEditorSettings } from "./settings.js";
