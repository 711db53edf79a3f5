import { join } from "node:path";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";

import type { EditorSettings, ProcessExit, ScreenSnapshot } from "@termbed/shared";
import { DEFAULT_EDITOR_SETTINGS } from "@termbed/shared";
import { renderDocument } from "@termbed/vt";

import type { PtyBridgeDeps } from "../pty/types.js";
import { splitCommandLine } from "./command-line.js";
import { openTerminalSession } from "./session.js";
import type { TerminalSession, TerminalSessionEvents, TerminalSessionOptions } from "./session.js";

export interface EditorSessionOptions extends Omit<TerminalSessionOptions, "command" | "args"> {
  content?: string | undefined;
  /** File extension for the temp document, so the editor picks a syntax. */
  language?: string | undefined;
  /** Editor command line; wins over `editorEnv` and settings. */
  editor?: string | undefined;
  /** Environment variable holding the editor command, such as `VISUAL`. */
  editorEnv?: string | undefined;
  settings?: EditorSettings | undefined;
  /** Where the document's temp directory is created; defaults to the OS temp dir. */
  tempDir?: string | undefined;
}

export interface EditorSession extends TerminalSession {
  /** The document being edited. */
  readonly path: string;
  getText: () => Promise<string>;
  setText: (text: string) => Promise<void>;
}

const LANGUAGE_PATTERN = /^[A-Za-z0-9_+-]+$/;

function documentName(language: string | undefined): string {
  return `buffer.${language !== undefined && LANGUAGE_PATTERN.test(language) ? language : "txt"}`;
}

function editorCommandLine(options: EditorSessionOptions, settings: EditorSettings): string {
  if (options.editor !== undefined && options.editor.trim() !== "") return options.editor;
  if (options.editorEnv !== undefined) {
    const fromEnv = options.env?.[options.editorEnv] ?? process.env[options.editorEnv];
    if (fromEnv !== undefined && fromEnv.trim() !== "") return fromEnv;
  }
  return settings.editor;
}

function editorCommand(options: EditorSessionOptions, settings: EditorSettings, path: string): [string, string[]] {
  const line = editorCommandLine(options, settings);
  const [command, ...args] = splitCommandLine(line);
  if (command === undefined || command === "") {
    throw new TypeError(`Editor command is empty: ${JSON.stringify(line)}`);
  }
  return [command, [...args, path]];
}

async function startEditor(
  dir: string,
  path: string,
  options: EditorSessionOptions,
  settings: EditorSettings,
  deps: PtyBridgeDeps,
  events: TerminalSessionEvents,
): Promise<TerminalSession> {
  try {
    await writeFile(path, options.content ?? "", "utf-8");
    const [command, args] = editorCommand(options, settings, path);
    return openTerminalSession(
      {
        ...options,
        command,
        args,
        size: options.size ?? { rows: settings.rows, cols: settings.cols },
        terminalType: options.terminalType ?? settings.terminal_type,
        scrollbackLimit: options.scrollbackLimit ?? settings.scrollback_limit,
        maxPendingWrite: options.maxPendingWrite ?? settings.max_pending_write,
      },
      deps,
      { ...events, onExit: undefined },
    );
  } catch (err) {
    await rm(dir, { recursive: true, force: true });
    throw err;
  }
}

/**
 * Opens `options.content` in an external editor on a pseudo-terminal. The
 * document lives in a fresh temp directory until {@link EditorSession.close}.
 */
export async function openEditorSession(
  options: EditorSessionOptions,
  deps: PtyBridgeDeps,
  events: TerminalSessionEvents = {},
): Promise<EditorSession> {
  const settings = options.settings ?? DEFAULT_EDITOR_SETTINGS;
  const dir = await mkdtemp(join(options.tempDir ?? tmpdir(), "termbed-"));
  const path = join(dir, documentName(options.language));

  const session = await startEditor(dir, path, options, settings, deps, events);

  let documentText: string | null = null;
  let documentView: ScreenSnapshot | null = null;

  const showDocument = (): void => {
    if (documentText === null) return;
    const view = renderDocument(documentText, session.size);
    documentView = view;
    const onUpdate = events.onUpdate;
    if (!onUpdate) return;
    try {
      onUpdate(view);
    } catch (err) {
      console.error("Session update listener failed:", err);
    }
  };

  const loadDocument = async (): Promise<void> => {
    try {
      documentText = await readFile(path, "utf-8");
    } catch (err) {
      console.warn(`Failed to read edited document at ${path}:`, err);
      return;
    }
    showDocument();
  };

  const exited = session.exited.then(async (exit: ProcessExit) => {
    if (session.state !== "closed") await loadDocument();
    const onExit = events.onExit;
    if (onExit) {
      try {
        onExit(exit);
      } catch (err) {
        console.error("Session exit listener failed:", err);
      }
    }
    return exit;
  });

  let closing: Promise<void> | null = null;

  const close = async (): Promise<void> => {
    await session.close();
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      console.warn(`Failed to remove editor temp dir ${dir}:`, err);
    }
  };

  return {
    path,
    get pid() { return session.pid; },
    get state() { return session.state; },
    get size() { return session.size; },
    exited,
    snapshot: () => documentView ?? session.snapshot(),
    send: (event) => {
      session.send(event);
      if (event.type === "resize") showDocument();
    },
    resize: (rows, cols) => {
      session.resize(rows, cols);
      showDocument();
    },
    write: (data) => session.write(data),
    getText: () => readFile(path, "utf-8"),
    setText: (text) => writeFile(path, text, "utf-8"),
    close: () => {
      closing ??= close();
      return closing;
    },
  };
}

/** Opens an editor for the duration of `fn`; the temp document is removed afterwards. */
export async function withEditorSession<T>(
  options: EditorSessionOptions,
  deps: PtyBridgeDeps,
  fn: (session: EditorSession) => Promise<T> | T,
  events: TerminalSessionEvents = {},
): Promise<T> {
  const session = await openEditorSession(options, deps, events);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
