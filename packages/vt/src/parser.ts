import type { ControlOpType, TerminalOp } from "@termbed/shared";

import { dispatchCsi } from "./csi.js";
import { charWidth } from "./width.js";

export type ParserState =
  | "ground"
  | "escape"
  | "escape-intermediate"
  | "csi-entry"
  | "csi-param"
  | "csi-intermediate"
  | "csi-ignore"
  | "osc-string"
  | "osc-escape";

export const MAX_PARAMS = 32;
export const MAX_PARAM_VALUE = 65535;
export const MAX_OSC_LENGTH = 4096;

const ESC = 0x1b;
const BEL = 0x07;
const CAN = 0x18;
const SUB = 0x1a;
const DEL = 0x7f;

const C0_CONTROLS: Record<number, ControlOpType> = {
  0x07: "bell",
  0x08: "backspace",
  0x09: "tab",
  0x0a: "line-feed",
  0x0b: "line-feed",
  0x0c: "line-feed",
  0x0d: "carriage-return",
};

const ESC_FINALS: Record<string, ControlOpType> = {
  "7": "save-cursor",
  "8": "restore-cursor",
  D: "index",
  E: "next-line",
  M: "reverse-index",
  c: "reset",
};

/** Introducers of DCS, SOS, PM and APC strings, which are consumed and dropped. */
const IGNORED_STRINGS = new Set(["P", "X", "^", "_"]);

const isIntermediate = (code: number): boolean => code >= 0x20 && code <= 0x2f;
const isParamByte = (code: number): boolean => code >= 0x30 && code <= 0x3f;
const isFinal = (code: number): boolean => code >= 0x40 && code <= 0x7e;
const isPrivateMarker = (code: number): boolean => code >= 0x3c && code <= 0x3f;

/**
 * Streaming decoder from PTY output to {@link TerminalOp}s.
 *
 * State survives between `feed` calls, so a sequence or UTF-8 character split
 * across chunks decodes the same as when delivered whole.
 */
export class EscapeParser {
  private current: ParserState = "ground";
  private decoder = new TextDecoder("utf-8");

  private prefix = "";
  private params: number[][] = [];
  private intermediates = "";
  private overflow = false;

  private oscKind: "osc" | "ignored" = "osc";
  private oscBuffer = "";

  private ops: TerminalOp[] = [];

  get state(): ParserState {
    return this.current;
  }

  feed(input: Uint8Array | string): TerminalOp[] {
    const text = typeof input === "string" ? input : this.decoder.decode(input, { stream: true });
    for (const char of text) {
      this.advance(char);
    }
    const ops = this.ops;
    this.ops = [];
    return ops;
  }

  /** Drops any partial sequence and buffered UTF-8 bytes. */
  reset(): void {
    this.decoder = new TextDecoder("utf-8");
    this.ops = [];
    this.toGround();
  }

  private toGround(): void {
    this.current = "ground";
    this.prefix = "";
    this.params = [];
    this.intermediates = "";
    this.overflow = false;
    this.oscBuffer = "";
  }

  private advance(char: string): void {
    const code = char.codePointAt(0) ?? 0;

    if (code === CAN || code === SUB) {
      this.toGround();
      return;
    }
    if (code === ESC) {
      if (this.current === "osc-string") {
        this.current = "osc-escape";
        return;
      }
      this.toGround();
      this.current = "escape";
      return;
    }

    switch (this.current) {
      case "ground":
        this.ground(char, code);
        return;
      case "escape":
        this.escape(char, code);
        return;
      case "escape-intermediate":
        this.escapeIntermediate(code);
        return;
      case "csi-entry":
      case "csi-param":
      case "csi-intermediate":
        this.csi(char, code);
        return;
      case "csi-ignore":
        this.csiIgnore(code);
        return;
      case "osc-string":
        this.oscString(char, code);
        return;
      case "osc-escape":
        this.oscEscape(char);
        return;
    }
  }

  private ground(char: string, code: number): void {
    if (code < 0x20) {
      this.execute(code);
      return;
    }
    if (code === DEL || (code >= 0x80 && code < 0xa0)) return;
    this.print(char, code);
  }

  private print(char: string, code: number): void {
    if (charWidth(code) === 0) {
      const previous = this.ops[this.ops.length - 1];
      if (previous?.type === "print") {
        this.ops[this.ops.length - 1] = { type: "print", text: previous.text + char };
        return;
      }
    }
    this.ops.push({ type: "print", text: char });
  }

  private execute(code: number): void {
    const control = C0_CONTROLS[code];
    if (control) this.ops.push({ type: control });
  }

  private escape(char: string, code: number): void {
    if (code < 0x20) {
      this.execute(code);
      return;
    }
    if (char === "[") {
      this.current = "csi-entry";
      return;
    }
    if (char === "]" || IGNORED_STRINGS.has(char)) {
      this.oscKind = char === "]" ? "osc" : "ignored";
      this.current = "osc-string";
      return;
    }
    if (isIntermediate(code)) {
      this.current = "escape-intermediate";
      return;
    }
    const control = ESC_FINALS[char];
    if (control) this.ops.push({ type: control });
    this.toGround();
  }

  /** Charset designations and similar: consumed up to their final byte. */
  private escapeIntermediate(code: number): void {
    if (code < 0x20) {
      this.execute(code);
      return;
    }
    if (isIntermediate(code)) return;
    this.toGround();
  }

  private csi(char: string, code: number): void {
    if (code < 0x20) {
      this.execute(code);
      return;
    }
    if (code === DEL) return;

    if (isParamByte(code)) {
      this.csiParam(char, code);
      return;
    }
    if (isIntermediate(code)) {
      this.intermediates += char;
      this.current = "csi-intermediate";
      return;
    }
    if (isFinal(code)) {
      this.dispatch(char);
      return;
    }
    // Anything else (non-ASCII) cannot belong to a control sequence.
    this.toGround();
  }

  /** A malformed sequence: consumed up to its final byte, then dropped. */
  private csiIgnore(code: number): void {
    if (code < 0x20) {
      this.execute(code);
      return;
    }
    if (code === DEL || isParamByte(code) || isIntermediate(code)) return;
    this.toGround();
  }

  private csiParam(char: string, code: number): void {
    if (this.current === "csi-intermediate") {
      this.current = "csi-ignore";
      return;
    }
    if (isPrivateMarker(code)) {
      if (this.current === "csi-entry") {
        this.prefix = char;
        this.current = "csi-param";
      } else {
        this.current = "csi-ignore";
      }
      return;
    }

    this.current = "csi-param";
    if (char === ";") {
      if (this.params.length === 0) this.params.push([0]);
      if (this.params.length >= MAX_PARAMS) {
        this.overflow = true;
        return;
      }
      this.params.push([0]);
    } else if (char === ":") {
      if (this.params.length === 0) this.params.push([0]);
      const param = this.params[this.params.length - 1];
      if (param && param.length < MAX_PARAMS) param.push(0);
    } else {
      if (this.params.length === 0) this.params.push([0]);
      const param = this.params[this.params.length - 1];
      if (param) {
        const last = param.length - 1;
        param[last] = Math.min(MAX_PARAM_VALUE, (param[last] ?? 0) * 10 + (code - 0x30));
      }
    }
  }

  private dispatch(final: string): void {
    if (!this.overflow) {
      const ops = dispatchCsi({
        prefix: this.prefix,
        params: this.params,
        intermediates: this.intermediates,
        final,
      });
      if (ops) this.ops.push(...ops);
    }
    this.toGround();
  }

  private oscString(char: string, code: number): void {
    if (code === BEL) {
      this.finishOsc();
      return;
    }
    if (code < 0x20) return;
    if (this.oscKind === "ignored") return;
    if (this.oscBuffer.length >= MAX_OSC_LENGTH) {
      this.overflow = true;
      return;
    }
    this.oscBuffer += char;
  }

  private oscEscape(char: string): void {
    if (char === "\\") {
      this.finishOsc();
      return;
    }
    // ESC followed by anything but `\` aborts the string and starts a new escape.
    this.toGround();
    this.current = "escape";
    this.escape(char, char.codePointAt(0) ?? 0);
  }

  private finishOsc(): void {
    if (this.oscKind === "osc" && !this.overflow) {
      const separator = this.oscBuffer.indexOf(";");
      const command = separator === -1 ? this.oscBuffer : this.oscBuffer.slice(0, separator);
      const payload = separator === -1 ? "" : this.oscBuffer.slice(separator + 1);
      if (command === "0" || command === "2") {
        this.ops.push({ type: "set-title", title: payload });
      }
    }
    this.toGround();
  }
}
