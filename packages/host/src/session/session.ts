import type { HostEvent, ProcessExit, ScreenSnapshot, TerminalOp, TerminalSize } from "@termbed/shared";
import { DEFAULT_TERMINAL_SIZE, DEFAULT_TERMINAL_TYPE } from "@termbed/shared";
import { EscapeParser, ScreenBuffer, reportReply, translateInput } from "@termbed/vt";

import { openPtyBridge } from "../pty/bridge.js";
import type { PtyBridge, PtyBridgeDeps, PtyBridgeOptions } from "../pty/types.js";

export type SessionState = "running" | "exited" | "closed";

export interface TerminalSessionOptions extends PtyBridgeOptions {
  scrollbackLimit?: number | undefined;
}

export interface TerminalSessionEvents {
  onUpdate?: ((snapshot: ScreenSnapshot) => void) | undefined;
  onExit?: ((exit: ProcessExit) => void) | undefined;
  onBell?: (() => void) | undefined;
  onTitle?: ((title: string) => void) | undefined;
}

export interface TerminalSession {
  readonly pid: number;
  readonly state: SessionState;
  readonly size: TerminalSize;
  /** Settles after the last output chunk has been applied. */
  readonly exited: Promise<ProcessExit>;
  snapshot: () => ScreenSnapshot;
  send: (event: HostEvent) => void;
  resize: (rows: number, cols: number) => void;
  write: (data: string | Uint8Array) => void;
  close: () => Promise<void>;
}

interface SessionContext {
  bridge: PtyBridge;
  parser: EscapeParser;
  screen: ScreenBuffer;
  events: TerminalSessionEvents;
  state: SessionState;
  latest: ScreenSnapshot;
}

function safeNotify(name: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    console.error(`Session ${name} listener failed:`, err);
  }
}

function publish(ctx: SessionContext): void {
  const snapshot = ctx.screen.snapshot();
  ctx.latest = snapshot;
  const onUpdate = ctx.events.onUpdate;
  if (onUpdate) safeNotify("update", () => onUpdate(snapshot));
}

function applyOp(ctx: SessionContext, op: TerminalOp): void {
  ctx.screen.apply(op);
  switch (op.type) {
    case "report":
      ctx.bridge.write(reportReply(op.query, ctx.screen.cursor));
      break;
    case "bell": {
      const onBell = ctx.events.onBell;
      if (onBell) safeNotify("bell", onBell);
      break;
    }
    case "set-title": {
      const onTitle = ctx.events.onTitle;
      if (onTitle) safeNotify("title", () => onTitle(op.title));
      break;
    }
    default:
      break;
  }
}

function processChunk(ctx: SessionContext, chunk: Uint8Array): void {
  for (const op of ctx.parser.feed(chunk)) applyOp(ctx, op);
  publish(ctx);
}

async function runReadLoop(ctx: SessionContext): Promise<void> {
  try {
    for await (const chunk of ctx.bridge.read()) {
      if (ctx.state === "closed") break;
      processChunk(ctx, chunk);
    }
  } catch (err) {
    console.error(`Read loop for ${ctx.bridge.command} failed:`, err);
  }
}

/**
 * Starts `options.command` on a pseudo-terminal and keeps a screen in sync
 * with its output. Hosts read frozen snapshots; input goes through
 * {@link TerminalSession.send}.
 *
 * @throws {SpawnError} when the child cannot be started.
 */
export function openTerminalSession(
  options: TerminalSessionOptions,
  deps: PtyBridgeDeps,
  events: TerminalSessionEvents = {},
): TerminalSession {
  const size = options.size ?? DEFAULT_TERMINAL_SIZE;
  const terminalType = options.terminalType ?? DEFAULT_TERMINAL_TYPE;
  const screen = new ScreenBuffer({ rows: size.rows, cols: size.cols, scrollbackLimit: options.scrollbackLimit });
  const bridge = openPtyBridge(options, deps);

  const ctx: SessionContext = {
    bridge,
    parser: new EscapeParser(),
    screen,
    events,
    state: "running",
    latest: screen.snapshot(),
  };

  const loop = runReadLoop(ctx);
  let reported = false;
  const exited = loop
    .then(() => bridge.exited)
    .then((exit) => {
      if (ctx.state === "running") ctx.state = "exited";
      const onExit = ctx.events.onExit;
      if (!reported && onExit) safeNotify("exit", () => onExit(exit));
      reported = true;
      return exit;
    });
  exited.catch((err: unknown) => {
    console.error(`Exit handling for ${bridge.command} failed:`, err);
  });

  const resize = (rows: number, cols: number): void => {
    if (ctx.state === "closed") return;
    bridge.resize(rows, cols);
    screen.resize(rows, cols);
    publish(ctx);
  };

  let closing: Promise<void> | null = null;

  return {
    get pid() { return bridge.pid; },
    get state() { return ctx.state; },
    get size() { return screen.size; },
    exited,
    snapshot: () => ctx.latest,
    send: (event) => {
      if (event.type === "resize") {
        resize(event.rows, event.cols);
        return;
      }
      if (ctx.state !== "running") return;
      const bytes = translateInput(event, { modes: screen.modes, terminalType });
      if (bytes !== null) bridge.write(bytes);
    },
    resize,
    write: (data) => {
      if (ctx.state !== "running") return;
      bridge.write(data);
    },
    close: () => {
      if (closing) return closing;
      ctx.state = "closed";
      bridge.close();
      closing = loop;
      return closing;
    },
  };
}

/** Opens a session for the duration of `fn` and closes it on every path. */
export async function withTerminalSession<T>(
  options: TerminalSessionOptions,
  deps: PtyBridgeDeps,
  fn: (session: TerminalSession) => Promise<T> | T,
  events: TerminalSessionEvents = {},
): Promise<T> {
  const session = openTerminalSession(options, deps, events);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
