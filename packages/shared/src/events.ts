export interface KeyModifiers {
  ctrl?: boolean | undefined;
  alt?: boolean | undefined;
  shift?: boolean | undefined;
  meta?: boolean | undefined;
}

/**
 * `key` is a key name ("up", "f5", "enter", "a") and may carry modifier
 * prefixes ("ctrl+left"). `text` is the printable character the key
 * produced, when there is one.
 */
export interface HostKeyEvent {
  type: "key";
  key: string;
  text?: string | undefined;
  modifiers?: KeyModifiers | undefined;
}

export interface HostPasteEvent {
  type: "paste";
  text: string;
}

export type MouseAction = "down" | "up" | "move" | "scroll-up" | "scroll-down";
export type MouseButton = "left" | "middle" | "right" | "none";

/** `row` and `col` are 0-based cell coordinates. */
export interface HostMouseEvent {
  type: "mouse";
  action: MouseAction;
  button: MouseButton;
  row: number;
  col: number;
  modifiers?: KeyModifiers | undefined;
}

export interface HostResizeEvent {
  type: "resize";
  rows: number;
  cols: number;
}

export interface HostFocusEvent {
  type: "focus";
  focused: boolean;
}

export interface HostHoverEvent {
  type: "hover";
  row: number;
  col: number;
}

export type HostEvent =
  | HostKeyEvent
  | HostPasteEvent
  | HostMouseEvent
  | HostResizeEvent
  | HostFocusEvent
  | HostHoverEvent;

const MOUSE_ACTIONS: ReadonlySet<string> = new Set(["down", "up", "move", "scroll-up", "scroll-down"]);
const MOUSE_BUTTONS: ReadonlySet<string> = new Set(["left", "middle", "right", "none"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isKeyEvent(msg: Record<string, unknown>): boolean {
  return (
    msg["type"] === "key" &&
    typeof msg["key"] === "string" &&
    (msg["text"] === undefined || typeof msg["text"] === "string")
  );
}

function isPasteEvent(msg: Record<string, unknown>): boolean {
  return msg["type"] === "paste" && typeof msg["text"] === "string";
}

function isMouseEvent(msg: Record<string, unknown>): boolean {
  return (
    msg["type"] === "mouse" &&
    typeof msg["action"] === "string" &&
    MOUSE_ACTIONS.has(msg["action"]) &&
    typeof msg["button"] === "string" &&
    MOUSE_BUTTONS.has(msg["button"]) &&
    isNumber(msg["row"]) &&
    isNumber(msg["col"])
  );
}

function isResizeEvent(msg: Record<string, unknown>): boolean {
  return msg["type"] === "resize" && isNumber(msg["rows"]) && isNumber(msg["cols"]);
}

function isFocusEvent(msg: Record<string, unknown>): boolean {
  return msg["type"] === "focus" && typeof msg["focused"] === "boolean";
}

function isHoverEvent(msg: Record<string, unknown>): boolean {
  return msg["type"] === "hover" && isNumber(msg["row"]) && isNumber(msg["col"]);
}

export function isHostEvent(msg: unknown): msg is HostEvent {
  if (!isRecord(msg)) return false;
  return (
    isKeyEvent(msg) ||
    isPasteEvent(msg) ||
    isMouseEvent(msg) ||
    isResizeEvent(msg) ||
    isFocusEvent(msg) ||
    isHoverEvent(msg)
  );
}
