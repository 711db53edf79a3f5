import { vi } from "vitest";

import type { IDisposable, PtyProcess } from "./types.js";

/** In-process `PtyProcess` for tests: output and exit are driven by hand. */
export interface MockPtyProcess extends PtyProcess {
  simulateData: (data: string) => void;
  simulateExit: (exitCode: number, signal?: number) => void;
}

export function createMockProcess(pid = 4242): MockPtyProcess {
  let dataCallback: ((data: string) => void) | null = null;
  let exitCallback: ((e: { exitCode: number; signal?: number }) => void) | null = null;

  return {
    pid,
    write: vi.fn(),
    resize: vi.fn(),
    kill: vi.fn(),
    pause: vi.fn(),
    resume: vi.fn(),
    onData: (cb): IDisposable => {
      dataCallback = cb;
      return { dispose: () => { dataCallback = null; } };
    },
    onExit: (cb): IDisposable => {
      exitCallback = cb;
      return { dispose: () => { exitCallback = null; } };
    },
    simulateData: (data) => dataCallback?.(data),
    simulateExit: (exitCode, signal) => {
      const exit = signal !== undefined ? { exitCode, signal } : { exitCode };
      exitCallback?.(exit);
    },
  };
}
