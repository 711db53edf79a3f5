export interface TerminalSize {
  rows: number;
  cols: number;
}

export const DEFAULT_TERMINAL_SIZE: Readonly<TerminalSize> = Object.freeze({ rows: 24, cols: 80 });

export const DEFAULT_TERMINAL_TYPE = "xterm-256color";

export interface PtySpawnOptions {
  command: string;
  args?: string[] | undefined;
  env?: Record<string, string> | undefined;
  cwd?: string | undefined;
  size?: TerminalSize | undefined;
  terminalType?: string | undefined;
}

export interface ProcessExit {
  exitCode: number;
  signal?: number | undefined;
}

export function isValidTerminalSize(size: TerminalSize): boolean {
  return (
    Number.isInteger(size.rows) &&
    Number.isInteger(size.cols) &&
    size.rows > 0 &&
    size.cols > 0
  );
}
