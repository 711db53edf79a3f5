import type { ProcessExit, TerminalSize } from "@termbed/shared";
import { DEFAULT_TERMINAL_SIZE, DEFAULT_TERMINAL_TYPE, isValidTerminalSize } from "@termbed/shared";

import { createOutputChannel } from "./channel.js";
import type { OutputChannel } from "./channel.js";
import { SpawnError } from "./errors.js";
import { resolveExecutable } from "./resolve.js";
import type {
  IDisposable,
  PtyBridge,
  PtyBridgeDeps,
  PtyBridgeOptions,
  PtyFactoryOptions,
  PtyProcess,
} from "./types.js";
import { createWriteQueue } from "./write-queue.js";
import type { WriteQueue } from "./write-queue.js";

export const DEFAULT_HIGH_WATER_CHUNKS = 256;
export const DEFAULT_MAX_PENDING_WRITE = 64 * 1024;
export const DEFAULT_FLUSH_CHUNK_SIZE = 4096;

interface BridgeContext {
  command: string;
  process: PtyProcess;
  size: TerminalSize;
  exit: ProcessExit | undefined;
  closed: boolean;
  channel: OutputChannel;
  writes: WriteQueue;
  disposables: IDisposable[];
  exitCallbacks: Array<(exit: ProcessExit) => void>;
  resolveExited: (exit: ProcessExit) => void;
}

function assertSize(size: TerminalSize): void {
  if (!isValidTerminalSize(size)) {
    throw new RangeError(`Invalid terminal size ${size.rows}x${size.cols}`);
  }
}

function buildChildEnv(
  extra: Record<string, string> | undefined,
  size: TerminalSize,
  terminalType: string,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  Object.assign(env, extra);
  env["TERM"] = terminalType;
  env["COLUMNS"] = String(size.cols);
  env["LINES"] = String(size.rows);
  return env;
}

function buildExitValue(e: { exitCode: number; signal?: number | undefined }): ProcessExit {
  return e.signal !== undefined && e.signal !== 0 ? { exitCode: e.exitCode, signal: e.signal } : { exitCode: e.exitCode };
}

function spawnProcess(
  deps: PtyBridgeDeps,
  command: string,
  file: string,
  args: string[],
  options: PtyFactoryOptions,
): PtyProcess {
  try {
    return deps.factory(file, args, options);
  } catch (err: unknown) {
    if (err instanceof SpawnError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new SpawnError("pty-allocation-failed", command, `Failed to start ${command}: ${detail}`, {
      cause: err,
    });
  }
}

function notifyExit(ctx: BridgeContext, exit: ProcessExit, callback: (exit: ProcessExit) => void): void {
  try {
    callback(exit);
  } catch (err) {
    console.error(`Exit listener for ${ctx.command} failed:`, err);
  }
}

function handleExit(ctx: BridgeContext, e: { exitCode: number; signal?: number | undefined }): void {
  if (ctx.exit !== undefined) return;
  const exit = buildExitValue(e);
  ctx.exit = exit;
  ctx.writes.clear();
  ctx.channel.end();
  ctx.resolveExited(exit);
  for (const cb of [...ctx.exitCallbacks]) notifyExit(ctx, exit, cb);
  ctx.exitCallbacks.length = 0;
}

function attachEvents(ctx: BridgeContext): void {
  const encoder = new TextEncoder();
  const dataDisposable = ctx.process.onData((data) => {
    ctx.channel.push(encoder.encode(data));
  });
  const exitDisposable = ctx.process.onExit((e) => handleExit(ctx, e));
  ctx.disposables.push(dataDisposable, exitDisposable);
}

function closeBridge(ctx: BridgeContext): void {
  if (ctx.closed) return;
  ctx.closed = true;
  ctx.writes.clear();
  ctx.channel.end({ discard: true });
  // The exit listener stays attached so `exited` still settles after the kill.
  ctx.disposables[0]?.dispose();
  if (ctx.exit !== undefined) return;
  try {
    ctx.process.kill();
  } catch (err) {
    console.warn(`Failed to kill ${ctx.command} (pid ${ctx.process.pid}):`, err);
  }
}

function subscribeExit(ctx: BridgeContext, callback: (exit: ProcessExit) => void): IDisposable {
  const exit = ctx.exit;
  if (exit !== undefined) {
    let cancelled = false;
    queueMicrotask(() => {
      if (!cancelled) notifyExit(ctx, exit, callback);
    });
    return { dispose: () => { cancelled = true; } };
  }
  ctx.exitCallbacks.push(callback);
  return {
    dispose: () => {
      const idx = ctx.exitCallbacks.indexOf(callback);
      if (idx !== -1) ctx.exitCallbacks.splice(idx, 1);
    },
  };
}

/**
 * Spawns `options.command` on a new pseudo-terminal.
 *
 * @throws {SpawnError} when the executable is missing or not executable, or
 * the pseudo-terminal cannot be allocated.
 */
export function openPtyBridge(options: PtyBridgeOptions, deps: PtyBridgeDeps): PtyBridge {
  const size = { ...(options.size ?? DEFAULT_TERMINAL_SIZE) };
  assertSize(size);
  const terminalType = options.terminalType ?? DEFAULT_TERMINAL_TYPE;
  const cwd = options.cwd ?? process.cwd();
  const env = buildChildEnv(options.env, size, terminalType);

  const resolveFile = deps.resolveExecutable ?? resolveExecutable;
  const file = resolveFile(options.command, { env, cwd });
  const proc = spawnProcess(deps, options.command, file, options.args ?? [], {
    env,
    cols: size.cols,
    rows: size.rows,
    cwd,
    name: terminalType,
  });

  const schedule = deps.schedule ?? ((task: () => void) => { setImmediate(task); });
  let resolveExited: (exit: ProcessExit) => void = () => undefined;
  const exited = new Promise<ProcessExit>((resolve) => {
    resolveExited = resolve;
  });

  const ctx: BridgeContext = {
    command: options.command,
    process: proc,
    size,
    exit: undefined,
    closed: false,
    channel: createOutputChannel({
      highWaterChunks: options.highWaterChunks ?? DEFAULT_HIGH_WATER_CHUNKS,
      onPause: () => proc.pause?.(),
      onResume: () => proc.resume?.(),
    }),
    writes: createWriteQueue((data) => proc.write(data), {
      maxPending: options.maxPendingWrite ?? DEFAULT_MAX_PENDING_WRITE,
      flushChunkSize: options.flushChunkSize ?? DEFAULT_FLUSH_CHUNK_SIZE,
      schedule,
    }),
    disposables: [],
    exitCallbacks: [],
    resolveExited,
  };
  attachEvents(ctx);

  const decoder = new TextDecoder();

  return {
    get pid() { return proc.pid; },
    command: options.command,
    get size() { return { ...ctx.size }; },
    get exit() { return ctx.exit; },
    exited,
    write: (data) => {
      if (ctx.closed || ctx.exit !== undefined) return;
      const text = typeof data === "string" ? data : decoder.decode(data, { stream: true });
      ctx.writes.enqueue(text);
    },
    resize: (rows, cols) => {
      assertSize({ rows, cols });
      if (ctx.closed || ctx.exit !== undefined) return;
      proc.resize(cols, rows);
      ctx.size = { rows, cols };
    },
    read: () => ctx.channel.take(),
    onExit: (cb) => subscribeExit(ctx, cb),
    close: () => closeBridge(ctx),
  };
}

/** Opens a bridge for the duration of `fn` and closes it on every path. */
export async function withPtyBridge<T>(
  options: PtyBridgeOptions,
  deps: PtyBridgeDeps,
  fn: (bridge: PtyBridge) => Promise<T> | T,
): Promise<T> {
  const bridge = openPtyBridge(options, deps);
  try {
    return await fn(bridge);
  } finally {
    bridge.close();
  }
}
