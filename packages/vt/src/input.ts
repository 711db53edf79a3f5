import type {
  HostEvent,
  HostKeyEvent,
  HostMouseEvent,
  KeyModifiers,
  MouseTracking,
  TerminalModes,
} from "@termbed/shared";
import { DEFAULT_TERMINAL_TYPE } from "@termbed/shared";

export interface InputContext {
  modes: TerminalModes;
  /** `TERM` the child runs under; vt100-style types get BS for Backspace. */
  terminalType?: string | undefined;
}

const ESC = "\x1b";
const CSI = "\x1b[";
const SS3 = "\x1bO";

const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

/** Keys sent as `CSI <final>` (or `SS3 <final>` in application mode for arrows). */
const CURSOR_KEYS: Record<string, string> = {
  up: "A",
  down: "B",
  right: "C",
  left: "D",
  home: "H",
  end: "F",
};

const ARROWS = new Set(["up", "down", "right", "left"]);

/** Keys sent as `CSI <code> ~`. */
const TILDE_KEYS: Record<string, number> = {
  insert: 2,
  delete: 3,
  pageup: 5,
  pagedown: 6,
  f5: 15,
  f6: 17,
  f7: 18,
  f8: 19,
  f9: 20,
  f10: 21,
  f11: 23,
  f12: 24,
};

/** F1-F4 are `SS3 P`..`SS3 S`, or `CSI 1;<mod> P`.. with modifiers. */
const SS3_KEYS: Record<string, string> = {
  f1: "P",
  f2: "Q",
  f3: "R",
  f4: "S",
};

const KEY_ALIASES: Record<string, string> = {
  return: "enter",
  esc: "escape",
  del: "delete",
  ins: "insert",
  pgup: "pageup",
  page_up: "pageup",
  pgdn: "pagedown",
  pgdown: "pagedown",
  page_down: "pagedown",
  arrowup: "up",
  arrowdown: "down",
  arrowleft: "left",
  arrowright: "right",
  spacebar: "space",
};

const BACKSPACE_AS_BS = /^(vt52|vt100|vt102|ansi)/;

const encoder = new TextEncoder();

interface Modifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

interface ParsedKey {
  name: string;
  modifiers: Modifiers;
}

function normalizeModifiers(modifiers: KeyModifiers | undefined): Modifiers {
  return {
    ctrl: modifiers?.ctrl ?? false,
    alt: modifiers?.alt ?? false,
    shift: modifiers?.shift ?? false,
    meta: modifiers?.meta ?? false,
  };
}

/** Splits "ctrl+shift+left" into the key name and its modifiers. */
function parseKey(event: HostKeyEvent): ParsedKey {
  const modifiers = normalizeModifiers(event.modifiers);
  // A trailing "+" after a separator is the plus key itself ("ctrl++").
  const plusKey = event.key === "+" || event.key.endsWith("++");
  const parts = (plusKey ? event.key.slice(0, -1) : event.key).split("+").filter((part) => part !== "");
  let name = plusKey ? "+" : (parts.pop() ?? "");
  for (const part of parts) {
    const prefix = part.toLowerCase();
    if (prefix === "ctrl" || prefix === "control") modifiers.ctrl = true;
    else if (prefix === "alt" || prefix === "option") modifiers.alt = true;
    else if (prefix === "shift") modifiers.shift = true;
    else if (prefix === "meta" || prefix === "cmd" || prefix === "super") modifiers.meta = true;
  }
  if (name.length > 1) {
    const lower = name.toLowerCase();
    name = KEY_ALIASES[lower] ?? lower;
  }
  return { name, modifiers };
}

/** xterm modifier parameter: 1 + shift(1) + alt(2) + ctrl(4) + meta(8). */
function modifierParam(modifiers: Modifiers): number {
  return (
    1 +
    (modifiers.shift ? 1 : 0) +
    (modifiers.alt ? 2 : 0) +
    (modifiers.ctrl ? 4 : 0) +
    (modifiers.meta ? 8 : 0)
  );
}

function controlChar(char: string): string | null {
  if (char === " ") return "\x00";
  if (char === "?") return "\x7f";
  const code = char.toUpperCase().charCodeAt(0);
  // @ A-Z [ \ ] ^ _
  if (char.length === 1 && code >= 0x40 && code <= 0x5f) {
    return String.fromCharCode(code - 0x40);
  }
  return null;
}

function specialKey(key: ParsedKey, context: InputContext): string | null {
  const { name, modifiers } = key;
  const mod = modifierParam(modifiers);

  const cursorFinal = CURSOR_KEYS[name];
  if (cursorFinal) {
    if (mod > 1) return `${CSI}1;${mod}${cursorFinal}`;
    if (context.modes.applicationCursorKeys && ARROWS.has(name)) return `${SS3}${cursorFinal}`;
    return `${CSI}${cursorFinal}`;
  }

  const tilde = TILDE_KEYS[name];
  if (tilde !== undefined) {
    return mod > 1 ? `${CSI}${tilde};${mod}~` : `${CSI}${tilde}~`;
  }

  const ss3Final = SS3_KEYS[name];
  if (ss3Final) {
    return mod > 1 ? `${CSI}1;${mod}${ss3Final}` : `${SS3}${ss3Final}`;
  }

  return null;
}

function editingKey(key: ParsedKey, context: InputContext): string | null {
  const { name, modifiers } = key;
  const alt = modifiers.alt || modifiers.meta ? ESC : "";
  switch (name) {
    case "enter":
      return `${alt}\r`;
    case "tab":
      return modifiers.shift ? `${CSI}Z` : `${alt}\t`;
    case "escape":
      return `${alt}${ESC}`;
    case "backspace": {
      const terminalType = context.terminalType ?? DEFAULT_TERMINAL_TYPE;
      if (modifiers.ctrl) return `${alt}\x08`;
      return `${alt}${BACKSPACE_AS_BS.test(terminalType) ? "\x08" : "\x7f"}`;
    }
    case "space":
      return modifiers.ctrl ? `${alt}\x00` : `${alt} `;
    default:
      return null;
  }
}

function translateKey(event: HostKeyEvent, context: InputContext): string | null {
  const key = parseKey(event);

  const special = specialKey(key, context) ?? editingKey(key, context);
  if (special !== null) return special;

  const text = event.text ?? ([...key.name].length === 1 ? key.name : "");
  if (text === "") return null;

  const alt = key.modifiers.alt || key.modifiers.meta ? ESC : "";
  if (key.modifiers.ctrl) {
    const control = controlChar(text);
    return control === null ? null : `${alt}${control}`;
  }
  return `${alt}${text}`;
}

function translatePaste(text: string, modes: TerminalModes): string | null {
  if (text === "") return null;
  const normalized = text.replace(/\r\n|\n/g, "\r");
  if (!modes.bracketedPaste) return normalized;
  const body = normalized.split(PASTE_END).join("");
  return `${PASTE_START}${body}${PASTE_END}`;
}

const BUTTON_CODES: Record<HostMouseEvent["button"], number> = {
  left: 0,
  middle: 1,
  right: 2,
  none: 3,
};

/** Largest 1-based coordinate the legacy single-byte encoding can carry in ASCII. */
const X10_MAX_COORD = 94;

function mouseButtonCode(event: HostMouseEvent, tracking: MouseTracking): number | null {
  switch (event.action) {
    case "scroll-up":
      return 64;
    case "scroll-down":
      return 65;
    case "down":
    case "up":
      return event.button === "none" ? null : BUTTON_CODES[event.button];
    case "move":
      if (event.button === "none") return tracking === "motion" ? 32 + BUTTON_CODES.none : null;
      return tracking === "click" ? null : 32 + BUTTON_CODES[event.button];
  }
}

function translateMouse(event: HostMouseEvent, modes: TerminalModes): string | null {
  if (modes.mouseTracking === "off") return null;
  let code = mouseButtonCode(event, modes.mouseTracking);
  if (code === null) return null;

  const modifiers = normalizeModifiers(event.modifiers);
  if (modifiers.shift) code += 4;
  if (modifiers.alt || modifiers.meta) code += 8;
  if (modifiers.ctrl) code += 16;

  const x = Math.max(0, Math.floor(event.col)) + 1;
  const y = Math.max(0, Math.floor(event.row)) + 1;

  if (modes.sgrMouse) {
    return `${CSI}<${code};${x};${y}${event.action === "up" ? "m" : "M"}`;
  }
  if (x > X10_MAX_COORD || y > X10_MAX_COORD) return null;
  // Legacy reports cannot say which button was released.
  const legacy = event.action === "up" ? BUTTON_CODES.none + (code & ~3) : code;
  return `${CSI}M${String.fromCharCode(32 + legacy, 32 + x, 32 + y)}`;
}

function translateToString(event: HostEvent, context: InputContext): string | null {
  switch (event.type) {
    case "key":
      return translateKey(event, context);
    case "paste":
      return translatePaste(event.text, context.modes);
    case "mouse":
      return translateMouse(event, context.modes);
    case "resize":
    case "focus":
    case "hover":
      return null;
  }
}

/**
 * Encodes a host UI event as the bytes the child expects on its input, or
 * `null` when the event has no terminal encoding.
 */
export function translateInput(event: HostEvent, context: InputContext): Uint8Array | null {
  const text = translateToString(event, context);
  return text === null ? null : encoder.encode(text);
}
