import type {
  Cell,
  CursorMoveOp,
  CursorShape,
  CursorState,
  EraseDisplayMode,
  EraseLineMode,
  MouseTracking,
  ScreenSnapshot,
  SgrAttribute,
  TerminalMode,
  TerminalModes,
  TerminalOp,
  TerminalSize,
} from "@termbed/shared";
import { DEFAULT_TERMINAL_MODES, isValidTerminalSize } from "@termbed/shared";

import type { Pen } from "./cells.js";
import { blankCell, blankRow, defaultPen, fitRow, freezeColor, isBlankRow, makeCell, repairWide } from "./cells.js";
import { graphemeWidth } from "./width.js";

export const DEFAULT_SCROLLBACK_LIMIT = 1000;
const TAB_WIDTH = 8;

export interface ScreenBufferOptions {
  rows: number;
  cols: number;
  scrollbackLimit?: number | undefined;
}

type Modes = { -readonly [K in keyof TerminalModes]: TerminalModes[K] };

interface SavedCursor {
  row: number;
  col: number;
  pen: Pen;
  pendingWrap: boolean;
}

/**
 * Where the cursor stood before a run of consecutive resizes, so shrinking
 * and growing back restores it. Cleared by the next applied op.
 */
interface ResizeAnchor {
  col: number;
  /** Cursor row before these resizes; restored on the alternate screen. */
  row: number;
  /** Rows moved into scrollback by these resizes that may be pulled back. */
  pushed: number;
}

const MOUSE_MODES: Partial<Record<TerminalMode, MouseTracking>> = {
  "mouse-click": "click",
  "mouse-drag": "drag",
  "mouse-motion": "motion",
};

/**
 * The emulated terminal's grid. Mutated only through {@link apply} and
 * {@link resize}; {@link snapshot} hands out frozen copies.
 */
export class ScreenBuffer {
  private rows: number;
  private cols: number;
  private readonly scrollbackLimit: number;

  private primary: Cell[][];
  private alternate: Cell[][];
  private useAlternate = false;
  private scrollback: Cell[][] = [];

  private cursorRow = 0;
  private cursorCol = 0;
  private pendingWrap = false;
  private cursorVisible = true;
  private cursorShape: CursorShape = "block";
  private cursorBlinking = true;

  private pen: Pen = defaultPen();
  private modeState: Modes = { ...DEFAULT_TERMINAL_MODES };
  private scrollTop = 0;
  private scrollBottom: number;
  private saved: { primary: SavedCursor | null; alternate: SavedCursor | null } = {
    primary: null,
    alternate: null,
  };
  private titleText = "";

  private dirty = new Set<number>();
  private resizeAnchor: ResizeAnchor | null = null;
  /** Primary cursor row, kept in step with resizes while the alternate screen is shown. */
  private primaryCursorRow = 0;

  constructor(options: ScreenBufferOptions) {
    if (!isValidTerminalSize(options)) {
      throw new RangeError(`Invalid screen size ${options.rows}x${options.cols}`);
    }
    this.rows = options.rows;
    this.cols = options.cols;
    this.scrollbackLimit = Math.max(0, options.scrollbackLimit ?? DEFAULT_SCROLLBACK_LIMIT);
    this.primary = this.blankGrid();
    this.alternate = this.blankGrid();
    this.scrollBottom = this.rows - 1;
    this.markAllDirty();
  }

  get size(): TerminalSize {
    return { rows: this.rows, cols: this.cols };
  }

  get cursor(): CursorState {
    return {
      row: this.cursorRow,
      col: this.cursorCol,
      visible: this.cursorVisible,
      shape: this.cursorShape,
      blinking: this.cursorBlinking,
    };
  }

  get modes(): TerminalModes {
    return { ...this.modeState };
  }

  get alternateScreen(): boolean {
    return this.useAlternate;
  }

  get title(): string {
    return this.titleText;
  }

  get scrollbackLength(): number {
    return this.scrollback.length;
  }

  /** Rows in scrollback, oldest first, as frozen copies. */
  scrollbackLines(): ReadonlyArray<ReadonlyArray<Cell>> {
    return Object.freeze(this.scrollback.map((row) => Object.freeze(row.slice())));
  }

  private get grid(): Cell[][] {
    return this.useAlternate ? this.alternate : this.primary;
  }

  private blankGrid(): Cell[][] {
    return Array.from({ length: this.rows }, () => blankRow(this.cols));
  }

  private line(row: number): Cell[] {
    const grid = this.grid;
    let line = grid[row];
    if (!line) {
      line = blankRow(this.cols);
      grid[row] = line;
    }
    return line;
  }

  private markDirty(from: number, to = from): void {
    for (let row = Math.max(0, from); row <= Math.min(this.rows - 1, to); row++) {
      this.dirty.add(row);
    }
  }

  private markAllDirty(): void {
    this.markDirty(0, this.rows - 1);
  }

  apply(op: TerminalOp): void {
    this.resizeAnchor = null;
    const beforeRow = this.cursorRow;
    const beforeCol = this.cursorCol;

    this.dispatch(op);

    if (beforeRow !== this.cursorRow || beforeCol !== this.cursorCol) {
      this.markDirty(beforeRow);
      this.markDirty(this.cursorRow);
    }
  }

  private dispatch(op: TerminalOp): void {
    switch (op.type) {
      case "print":
        this.print(op.text);
        return;
      case "carriage-return":
        this.cursorCol = 0;
        this.pendingWrap = false;
        return;
      case "line-feed":
      case "index":
        this.index();
        return;
      case "next-line":
        this.cursorCol = 0;
        this.index();
        return;
      case "reverse-index":
        this.reverseIndex();
        return;
      case "backspace":
        if (this.cursorCol > 0) this.cursorCol--;
        this.pendingWrap = false;
        return;
      case "tab":
        this.cursorCol = Math.min(this.cols - 1, (Math.floor(this.cursorCol / TAB_WIDTH) + 1) * TAB_WIDTH);
        this.pendingWrap = false;
        return;
      case "bell":
        return;
      case "save-cursor":
        this.saveCursor();
        return;
      case "restore-cursor":
        this.restoreCursor();
        return;
      case "reset":
        this.reset();
        return;
      case "cursor-move":
        this.moveCursor(op);
        return;
      case "erase-line":
        this.eraseLine(op.mode);
        return;
      case "erase-display":
        this.eraseDisplay(op.mode);
        return;
      case "erase-chars":
        this.fill(this.cursorRow, this.cursorCol, this.cursorCol + op.count);
        return;
      case "insert-chars":
        this.insertChars(op.count);
        return;
      case "delete-chars":
        this.deleteChars(op.count);
        return;
      case "insert-lines":
        this.insertLines(op.count);
        return;
      case "delete-lines":
        this.deleteLines(op.count);
        return;
      case "scroll":
        if (op.direction === "up") this.scrollUp(op.count);
        else this.scrollDown(op.count);
        return;
      case "set-scroll-region":
        this.setScrollRegion(op.top, op.bottom);
        return;
      case "set-attributes":
        for (const attribute of op.attributes) this.applyAttribute(attribute);
        return;
      case "set-mode":
        this.setMode(op.mode, op.enabled);
        return;
      case "set-cursor-style":
        this.cursorShape = op.shape;
        this.cursorBlinking = op.blinking;
        this.markDirty(this.cursorRow);
        return;
      case "set-title":
        this.titleText = op.title;
        return;
      case "report":
        return;
    }
  }

  // --- printing ---

  private print(text: string): void {
    const width = graphemeWidth(text);
    if (width === 0) {
      this.combine(text);
      return;
    }
    if (width === 2 && this.cols < 2) return;

    if (this.pendingWrap) {
      this.pendingWrap = false;
      if (this.modeState.autowrap) {
        this.cursorCol = 0;
        this.index();
      }
    }

    if (width === 2 && this.cursorCol === this.cols - 1) {
      if (this.modeState.autowrap) {
        this.fill(this.cursorRow, this.cursorCol, this.cols);
        this.cursorCol = 0;
        this.index();
      } else {
        this.cursorCol = this.cols - 2;
      }
    }

    if (this.modeState.insert) this.insertChars(width);

    const line = this.line(this.cursorRow);
    line[this.cursorCol] = makeCell(this.pen, text, width);
    if (width === 2) line[this.cursorCol + 1] = makeCell(this.pen, "", 0);
    repairWide(line);
    this.markDirty(this.cursorRow);

    const next = this.cursorCol + width;
    if (next >= this.cols) {
      this.cursorCol = this.cols - 1;
      this.pendingWrap = this.modeState.autowrap;
    } else {
      this.cursorCol = next;
    }
  }

  /** Attaches a zero-width mark to the grapheme left of the cursor. */
  private combine(mark: string): void {
    let col = this.pendingWrap ? this.cursorCol : this.cursorCol - 1;
    const line = this.line(this.cursorRow);
    if (line[col]?.width === 0) col--;
    const target = line[col];
    if (!target || target.width === 0) return;
    line[col] = Object.freeze({ ...target, char: target.char + mark });
    this.markDirty(this.cursorRow);
  }

  // --- cursor ---

  private clampCursor(): void {
    this.cursorRow = Math.max(0, Math.min(this.rows - 1, this.cursorRow));
    this.cursorCol = Math.max(0, Math.min(this.cols - 1, this.cursorCol));
  }

  private moveCursor(op: CursorMoveOp): void {
    this.pendingWrap = false;
    switch (op.mode) {
      case "absolute":
        this.cursorRow = op.row;
        this.cursorCol = op.col;
        break;
      case "column":
        this.cursorCol = op.col;
        break;
      case "row":
        this.cursorRow = op.row;
        break;
      case "relative":
        if (op.direction === "up") this.cursorRow = Math.max(this.upperLimit(), this.cursorRow - op.count);
        else if (op.direction === "down") this.cursorRow = Math.min(this.lowerLimit(), this.cursorRow + op.count);
        else if (op.direction === "forward") this.cursorCol += op.count;
        else this.cursorCol -= op.count;
        break;
      case "line":
        this.cursorCol = 0;
        if (op.direction === "next") this.cursorRow = Math.min(this.lowerLimit(), this.cursorRow + op.count);
        else this.cursorRow = Math.max(this.upperLimit(), this.cursorRow - op.count);
        break;
    }
    this.clampCursor();
  }

  /** Relative moves stop at the scroll margins when they start inside them. */
  private upperLimit(): number {
    return this.cursorRow >= this.scrollTop ? this.scrollTop : 0;
  }

  private lowerLimit(): number {
    return this.cursorRow <= this.scrollBottom ? this.scrollBottom : this.rows - 1;
  }

  private saveCursor(): void {
    const slot: SavedCursor = {
      row: this.cursorRow,
      col: this.cursorCol,
      pen: { ...this.pen },
      pendingWrap: this.pendingWrap,
    };
    if (this.useAlternate) this.saved.alternate = slot;
    else this.saved.primary = slot;
  }

  private restoreCursor(): void {
    const slot = this.useAlternate ? this.saved.alternate : this.saved.primary;
    if (slot) {
      this.cursorRow = slot.row;
      this.cursorCol = slot.col;
      this.pen = { ...slot.pen };
      this.pendingWrap = slot.pendingWrap;
    } else {
      this.cursorRow = 0;
      this.cursorCol = 0;
      this.pen = defaultPen();
      this.pendingWrap = false;
    }
    this.clampCursor();
  }

  // --- scrolling ---

  private index(): void {
    this.pendingWrap = false;
    if (this.cursorRow === this.scrollBottom) {
      this.scrollUp(1);
    } else if (this.cursorRow < this.rows - 1) {
      this.cursorRow++;
    }
  }

  private reverseIndex(): void {
    this.pendingWrap = false;
    if (this.cursorRow === this.scrollTop) {
      this.scrollDown(1);
    } else if (this.cursorRow > 0) {
      this.cursorRow--;
    }
  }

  private scrollUp(count: number): void {
    const grid = this.grid;
    const height = this.scrollBottom - this.scrollTop + 1;
    const n = Math.min(Math.max(count, 0), height);
    const keep = !this.useAlternate && this.scrollTop === 0;
    for (let i = 0; i < n; i++) {
      const [removed] = grid.splice(this.scrollTop, 1);
      if (keep && removed) this.pushScrollback(removed);
      grid.splice(this.scrollBottom, 0, blankRow(this.cols, this.pen.bg));
    }
    this.markDirty(this.scrollTop, this.scrollBottom);
  }

  private scrollDown(count: number): void {
    const grid = this.grid;
    const height = this.scrollBottom - this.scrollTop + 1;
    const n = Math.min(Math.max(count, 0), height);
    for (let i = 0; i < n; i++) {
      grid.splice(this.scrollBottom, 1);
      grid.splice(this.scrollTop, 0, blankRow(this.cols, this.pen.bg));
    }
    this.markDirty(this.scrollTop, this.scrollBottom);
  }

  private pushScrollback(row: Cell[]): void {
    if (this.scrollbackLimit === 0) return;
    this.scrollback.push(row);
    if (this.scrollback.length > this.scrollbackLimit) {
      this.scrollback.splice(0, this.scrollback.length - this.scrollbackLimit);
    }
  }

  private setScrollRegion(top: number, bottom: number | null): void {
    const last = Math.min(bottom ?? this.rows - 1, this.rows - 1);
    const first = Math.max(0, top);
    if (first >= last) return;
    this.scrollTop = first;
    this.scrollBottom = last;
    this.cursorRow = 0;
    this.cursorCol = 0;
    this.pendingWrap = false;
  }

  // --- editing ---

  /** Blanks columns [from, to) of a row with the pen's background. */
  private fill(row: number, from: number, to: number): void {
    const line = this.line(row);
    const cell = blankCell(this.pen.bg);
    for (let col = Math.max(0, from); col < Math.min(this.cols, to); col++) {
      line[col] = cell;
    }
    repairWide(line);
    this.markDirty(row);
  }

  private eraseLine(mode: EraseLineMode): void {
    this.pendingWrap = false;
    if (mode === "to-end") this.fill(this.cursorRow, this.cursorCol, this.cols);
    else if (mode === "to-start") this.fill(this.cursorRow, 0, this.cursorCol + 1);
    else this.fill(this.cursorRow, 0, this.cols);
  }

  private eraseDisplay(mode: EraseDisplayMode): void {
    this.pendingWrap = false;
    switch (mode) {
      case "to-end":
        this.fill(this.cursorRow, this.cursorCol, this.cols);
        for (let row = this.cursorRow + 1; row < this.rows; row++) this.fill(row, 0, this.cols);
        return;
      case "to-start":
        for (let row = 0; row < this.cursorRow; row++) this.fill(row, 0, this.cols);
        this.fill(this.cursorRow, 0, this.cursorCol + 1);
        return;
      case "all":
        for (let row = 0; row < this.rows; row++) this.fill(row, 0, this.cols);
        return;
      case "scrollback":
        this.scrollback = [];
        return;
    }
  }

  private insertChars(count: number): void {
    this.pendingWrap = false;
    const line = this.line(this.cursorRow);
    const n = Math.min(Math.max(count, 0), this.cols - this.cursorCol);
    const blanks = Array.from({ length: n }, () => blankCell(this.pen.bg));
    line.splice(this.cursorCol, 0, ...blanks);
    line.length = this.cols;
    repairWide(line);
    this.markDirty(this.cursorRow);
  }

  private deleteChars(count: number): void {
    this.pendingWrap = false;
    const line = this.line(this.cursorRow);
    const n = Math.min(Math.max(count, 0), this.cols - this.cursorCol);
    line.splice(this.cursorCol, n);
    while (line.length < this.cols) line.push(blankCell(this.pen.bg));
    repairWide(line);
    this.markDirty(this.cursorRow);
  }

  private insertLines(count: number): void {
    if (this.cursorRow < this.scrollTop || this.cursorRow > this.scrollBottom) return;
    const grid = this.grid;
    const n = Math.min(Math.max(count, 0), this.scrollBottom - this.cursorRow + 1);
    grid.splice(this.scrollBottom - n + 1, n);
    const blanks = Array.from({ length: n }, () => blankRow(this.cols, this.pen.bg));
    grid.splice(this.cursorRow, 0, ...blanks);
    this.cursorCol = 0;
    this.pendingWrap = false;
    this.markDirty(this.cursorRow, this.scrollBottom);
  }

  private deleteLines(count: number): void {
    if (this.cursorRow < this.scrollTop || this.cursorRow > this.scrollBottom) return;
    const grid = this.grid;
    const n = Math.min(Math.max(count, 0), this.scrollBottom - this.cursorRow + 1);
    grid.splice(this.cursorRow, n);
    const blanks = Array.from({ length: n }, () => blankRow(this.cols, this.pen.bg));
    grid.splice(this.scrollBottom - n + 1, 0, ...blanks);
    this.cursorCol = 0;
    this.pendingWrap = false;
    this.markDirty(this.cursorRow, this.scrollBottom);
  }

  // --- attributes and modes ---

  private applyAttribute(attribute: SgrAttribute): void {
    switch (attribute.kind) {
      case "reset":
        this.pen = defaultPen();
        return;
      case "flag":
        this.pen[attribute.flag] = attribute.on;
        return;
      case "foreground":
        this.pen.fg = freezeColor(attribute.color);
        return;
      case "background":
        this.pen.bg = freezeColor(attribute.color);
        return;
    }
  }

  private setMode(mode: TerminalMode, enabled: boolean): void {
    switch (mode) {
      case "insert":
        this.modeState.insert = enabled;
        return;
      case "application-cursor-keys":
        this.modeState.applicationCursorKeys = enabled;
        return;
      case "autowrap":
        this.modeState.autowrap = enabled;
        if (!enabled) this.pendingWrap = false;
        return;
      case "cursor-visible":
        this.cursorVisible = enabled;
        this.markDirty(this.cursorRow);
        return;
      case "alternate-screen":
        if (enabled) this.enterAlternate(false);
        else this.leaveAlternate(false);
        return;
      case "alternate-screen-save-cursor":
        if (enabled) this.enterAlternate(true);
        else this.leaveAlternate(true);
        return;
      case "mouse-sgr":
        this.modeState.sgrMouse = enabled;
        return;
      case "bracketed-paste":
        this.modeState.bracketedPaste = enabled;
        return;
      case "mouse-click":
      case "mouse-drag":
      case "mouse-motion":
        this.modeState.mouseTracking = enabled ? (MOUSE_MODES[mode] ?? "off") : "off";
        return;
    }
  }

  private enterAlternate(saveCursor: boolean): void {
    if (this.useAlternate) return;
    if (saveCursor) this.saveCursor();
    this.primaryCursorRow = this.cursorRow;
    this.alternate = this.blankGrid();
    this.useAlternate = true;
    this.pendingWrap = false;
    this.markAllDirty();
  }

  private leaveAlternate(restoreCursor: boolean): void {
    if (!this.useAlternate) return;
    this.useAlternate = false;
    this.alternate = this.blankGrid();
    if (restoreCursor) this.restoreCursor();
    this.pendingWrap = false;
    this.markAllDirty();
  }

  private reset(): void {
    this.primary = this.blankGrid();
    this.alternate = this.blankGrid();
    this.useAlternate = false;
    this.primaryCursorRow = 0;
    this.cursorRow = 0;
    this.cursorCol = 0;
    this.pendingWrap = false;
    this.cursorVisible = true;
    this.cursorShape = "block";
    this.cursorBlinking = true;
    this.pen = defaultPen();
    this.modeState = { ...DEFAULT_TERMINAL_MODES };
    this.scrollTop = 0;
    this.scrollBottom = this.rows - 1;
    this.saved = { primary: null, alternate: null };
    this.markAllDirty();
  }

  // --- resize ---

  /**
   * Resizes both grids. Shrinking drops blank rows below the cursor first,
   * then moves top rows into scrollback; growing pulls those rows back
   * before adding blank rows at the bottom.
   */
  resize(rows: number, cols: number): void {
    if (!isValidTerminalSize({ rows, cols })) {
      throw new RangeError(`Invalid screen size ${rows}x${cols}`);
    }
    const anchor = this.resizeAnchor ?? { col: this.cursorCol, row: this.cursorRow, pushed: 0 };

    // Heights first, so rows moved into scrollback keep their full width.
    const primaryCursor = this.useAlternate ? this.primaryCursorRow : this.cursorRow;
    const primaryRow = this.resizePrimaryHeight(rows, primaryCursor, anchor);
    const savedPrimary = this.saved.primary;
    if (savedPrimary) savedPrimary.row += primaryRow - primaryCursor;
    this.resizeAlternateHeight(rows);

    this.primary = this.primary.map((row) => fitRow(row, cols));
    this.alternate = this.alternate.map((row) => fitRow(row, cols));
    this.cols = cols;

    this.rows = rows;
    if (this.useAlternate) {
      this.primaryCursorRow = primaryRow;
      this.cursorRow = Math.min(anchor.row, rows - 1);
    } else {
      this.cursorRow = primaryRow;
    }
    this.cursorCol = Math.min(anchor.col, cols - 1);
    this.clampCursor();
    this.clampSaved();

    this.pendingWrap = false;
    this.scrollTop = 0;
    this.scrollBottom = rows - 1;
    this.dirty.clear();
    this.markAllDirty();
    this.resizeAnchor = anchor;
  }

  private resizePrimaryHeight(rows: number, cursorRow: number, anchor: ResizeAnchor): number {
    const grid = this.primary;
    let row = cursorRow;
    let excess = grid.length - rows;

    while (excess > 0 && grid.length - 1 > row && isBlankRow(grid[grid.length - 1] ?? [])) {
      grid.pop();
      excess--;
    }
    while (excess > 0) {
      if (row > 0) {
        const removed = grid.shift();
        if (removed) this.pushScrollback(removed);
        anchor.pushed++;
        row--;
      } else {
        grid.pop();
      }
      excess--;
    }

    let missing = rows - grid.length;
    while (missing > 0 && anchor.pushed > 0 && this.scrollback.length > 0) {
      const restored = this.scrollback.pop();
      if (restored) grid.unshift(restored);
      anchor.pushed--;
      row++;
      missing--;
    }
    while (missing > 0) {
      grid.push(blankRow(this.cols));
      missing--;
    }
    return row;
  }

  private resizeAlternateHeight(rows: number): void {
    const grid = this.alternate;
    while (grid.length > rows) grid.pop();
    while (grid.length < rows) grid.push(blankRow(this.cols));
  }

  private clampSaved(): void {
    for (const slot of [this.saved.primary, this.saved.alternate]) {
      if (!slot) continue;
      slot.row = Math.max(0, Math.min(this.rows - 1, slot.row));
      slot.col = Math.max(0, Math.min(this.cols - 1, slot.col));
    }
  }

  // --- snapshot ---

  /** Frozen view of the current state; clears the dirty-row set. */
  snapshot(): ScreenSnapshot {
    const lines = Object.freeze(this.grid.map((row) => Object.freeze(row.slice())));
    const dirtyRows = Object.freeze([...this.dirty].sort((a, b) => a - b));
    this.dirty.clear();
    return Object.freeze({
      rows: this.rows,
      cols: this.cols,
      lines,
      cursor: Object.freeze(this.cursor),
      alternateScreen: this.useAlternate,
      modes: Object.freeze(this.modes),
      title: this.titleText,
      scrollbackLength: this.scrollback.length,
      dirtyRows,
    });
  }
}
