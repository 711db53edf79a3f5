export type { ParserState } from "./parser.js";
export { EscapeParser, MAX_OSC_LENGTH, MAX_PARAMS, MAX_PARAM_VALUE } from "./parser.js";
export type { CsiParam } from "./sgr.js";
export { parseSgr } from "./sgr.js";
export type { ScreenBufferOptions } from "./screen.js";
export { DEFAULT_SCROLLBACK_LIMIT, ScreenBuffer } from "./screen.js";
export type { InputContext } from "./input.js";
export { translateInput } from "./input.js";
export { reportReply } from "./reports.js";
export { charWidth, graphemeWidth } from "./width.js";
export { lineText, renderDocument, snapshotText } from "./text.js";
