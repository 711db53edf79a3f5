export * from "./pty/index.js";

export { openTerminalSession, withTerminalSession } from "./session/session.js";
export type {
  SessionState,
  TerminalSession,
  TerminalSessionEvents,
  TerminalSessionOptions,
} from "./session/session.js";
export { openEditorSession, withEditorSession } from "./session/editor.js";
export type { EditorSession, EditorSessionOptions } from "./session/editor.js";
export { splitCommandLine } from "./session/command-line.js";

export * from "./settings/index.js";

export { loadHostConfig } from "./config.js";
export type { HostConfig, LoadHostConfigOptions } from "./config.js";
export { loadEditorSettings, openConfiguredEditorSession } from "./launch.js";
export type { ConfiguredEditorDeps } from "./launch.js";
