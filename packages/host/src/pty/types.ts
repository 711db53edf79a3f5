import type { ProcessExit, PtySpawnOptions, TerminalSize } from "@termbed/shared";

export interface PtyProcess {
  readonly pid: number;
  write: (data: string) => void;
  resize: (cols: number, rows: number) => void;
  kill: (signal?: string) => void;
  /** Flow control; factories without it never pause. */
  pause?: (() => void) | undefined;
  resume?: (() => void) | undefined;
  onData: (callback: (data: string) => void) => IDisposable;
  onExit: (callback: (exit: { exitCode: number; signal?: number | undefined }) => void) => IDisposable;
}

export interface IDisposable {
  dispose: () => void;
}

export interface PtyFactoryOptions {
  env: Record<string, string>;
  cols: number;
  rows: number;
  cwd: string;
  /** Terminal type node-pty announces; also in `env.TERM`. */
  name: string;
}

export type PtyFactory = (
  file: string,
  args: string[],
  options: PtyFactoryOptions,
) => PtyProcess;

export interface ResolveOptions {
  env: Record<string, string | undefined>;
  cwd: string;
}

export type ExecutableResolver = (command: string, options: ResolveOptions) => string;

export type Scheduler = (task: () => void) => void;

export interface PtyBridgeOptions extends PtySpawnOptions {
  /** Unread output chunks that pause the PTY. */
  highWaterChunks?: number | undefined;
  /** Queued input, in characters, beyond which the oldest is dropped. */
  maxPendingWrite?: number | undefined;
  flushChunkSize?: number | undefined;
}

export interface PtyBridgeDeps {
  factory: PtyFactory;
  resolveExecutable?: ExecutableResolver | undefined;
  /** Runs queued write flushes; defaults to `setImmediate`. */
  schedule?: Scheduler | undefined;
}

/** One pseudo-terminal with one child process attached. */
export interface PtyBridge {
  readonly pid: number;
  readonly command: string;
  readonly size: TerminalSize;
  /** Absent while the child runs. */
  readonly exit: ProcessExit | undefined;
  readonly exited: Promise<ProcessExit>;
  write: (data: string | Uint8Array) => void;
  resize: (rows: number, cols: number) => void;
  read: () => AsyncIterable<Uint8Array>;
  onExit: (callback: (exit: ProcessExit) => void) => IDisposable;
  close: () => void;
}
