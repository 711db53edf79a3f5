import { test as base, describe, expect, vi } from "vitest";

import { snapshotText } from "@termbed/vt";

import { SpawnError } from "../pty/errors.js";
import { createMockProcess } from "../pty/testing.js";
import type { MockPtyProcess } from "../pty/testing.js";
import type { PtyBridgeDeps } from "../pty/types.js";
import { openTerminalSession, withTerminalSession } from "./session.js";

interface SessionFixtures {
  mockProcess: MockPtyProcess;
  deps: PtyBridgeDeps;
}

const test = base.extend<SessionFixtures>({
  mockProcess: async ({ }, use) => {
    await use(createMockProcess(1234));
  },
  deps: async ({ mockProcess }, use) => {
    await use({
      factory: () => mockProcess,
      resolveExecutable: (command) => `/usr/bin/${command}`,
      schedule: (task) => task(),
    });
  },
});

const SMALL = { command: "vim", size: { rows: 4, cols: 10 } };

describe("screen updates", () => {
  test("output lands on the screen", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    mockProcess.simulateData("Hello\r\n");
    mockProcess.simulateExit(0);
    await session.exited;

    const snapshot = session.snapshot();
    expect(snapshotText(snapshot)[0]).toBe("Hello");
    expect(snapshot.cursor).toMatchObject({ row: 1, col: 0 });
  });

  test("cursor addressing then print", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    mockProcess.simulateData("abc\x1b[1;1HX");
    mockProcess.simulateExit(0);
    await session.exited;

    expect(session.snapshot().lines[0]?.[0]?.char).toBe("X");
    expect(snapshotText(session.snapshot())[0]).toBe("Xbc");
  });

  test("each chunk publishes one frozen snapshot", async ({ deps, mockProcess }) => {
    const onUpdate = vi.fn();
    const session = openTerminalSession(SMALL, deps, { onUpdate });
    const initial = session.snapshot();

    mockProcess.simulateData("one");
    await vi.waitFor(() => expect(onUpdate).toHaveBeenCalledTimes(1));
    mockProcess.simulateData("two");
    await vi.waitFor(() => expect(onUpdate).toHaveBeenCalledTimes(2));

    expect(snapshotText(initial)[0]).toBe("");
    expect(snapshotText(session.snapshot())[0]).toBe("onetwo");
    expect(onUpdate).toHaveBeenLastCalledWith(session.snapshot());
    expect(Object.isFrozen(session.snapshot().lines)).toBe(true);
    await session.close();
  });

  test("device status queries are answered on the pty", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    mockProcess.simulateData("\x1b[2;3H\x1b[6n\x1b[5n");
    mockProcess.simulateExit(0);
    await session.exited;

    expect(mockProcess.write).toHaveBeenCalledWith("\x1b[2;3R");
    expect(mockProcess.write).toHaveBeenCalledWith("\x1b[0n");
  });

  test("bell and title changes are reported", async ({ deps, mockProcess }) => {
    const onBell = vi.fn();
    const onTitle = vi.fn();
    const session = openTerminalSession(SMALL, deps, { onBell, onTitle });

    mockProcess.simulateData("\x07\x1b]2;notes.md\x07");
    mockProcess.simulateExit(0);
    await session.exited;

    expect(onBell).toHaveBeenCalledTimes(1);
    expect(onTitle).toHaveBeenCalledWith("notes.md");
    expect(session.snapshot().title).toBe("notes.md");
  });

  test("a failing listener is logged and the loop keeps going", async ({ deps, mockProcess }) => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const onUpdate = vi.fn(() => {
      throw new Error("render failed");
    });
    const session = openTerminalSession(SMALL, deps, { onUpdate });

    mockProcess.simulateData("a");
    mockProcess.simulateData("b");
    mockProcess.simulateExit(0);
    await session.exited;

    expect(onUpdate).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledTimes(2);
    expect(snapshotText(session.snapshot())[0]).toBe("ab");
    error.mockRestore();
  });
});

describe("exit", () => {
  test("exit is reported once, after the final output", async ({ deps, mockProcess }) => {
    const order: string[] = [];
    const session = openTerminalSession(SMALL, deps, {
      onUpdate: (snapshot) => order.push(`update:${snapshotText(snapshot)[0] ?? ""}`),
      onExit: (exit) => order.push(`exit:${exit.exitCode}`),
    });

    mockProcess.simulateData("bye");
    mockProcess.simulateExit(0);
    mockProcess.simulateExit(0);

    expect(await session.exited).toEqual({ exitCode: 0 });
    expect(order).toEqual(["update:bye", "exit:0"]);
    expect(session.state).toBe("exited");
  });

  test("input after exit is ignored", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);
    mockProcess.simulateExit(0);
    await session.exited;

    session.send({ type: "key", key: "a", text: "a" });
    session.write("raw");

    expect(mockProcess.write).not.toHaveBeenCalled();
  });

  test("resizing after exit reflows the final frame only", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);
    mockProcess.simulateExit(0);
    await session.exited;

    session.resize(6, 12);

    expect(mockProcess.resize).not.toHaveBeenCalled();
    expect(session.snapshot()).toMatchObject({ rows: 6, cols: 12 });
  });

  test("spawn failures propagate", ({ deps }) => {
    const resolveExecutable = (command: string): string => {
      throw new SpawnError("not-found", command, `Command not found on PATH: ${command}`);
    };

    expect(() => openTerminalSession({ command: "nope" }, { ...deps, resolveExecutable })).toThrow(SpawnError);
  });
});

describe("input", () => {
  test("keys follow the screen's cursor-key mode", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    session.send({ type: "key", key: "up" });
    mockProcess.simulateData("\x1b[?1h");
    await vi.waitFor(() => expect(session.snapshot().modes.applicationCursorKeys).toBe(true));
    session.send({ type: "key", key: "up" });

    expect(mockProcess.write).toHaveBeenNthCalledWith(1, "\x1b[A");
    expect(mockProcess.write).toHaveBeenNthCalledWith(2, "\x1bOA");
    await session.close();
  });

  test("paste is bracketed once the child asks for it", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    mockProcess.simulateData("\x1b[?2004h");
    await vi.waitFor(() => expect(session.snapshot().modes.bracketedPaste).toBe(true));
    session.send({ type: "paste", text: "x\ny" });

    expect(mockProcess.write).toHaveBeenCalledWith("\x1b[200~x\ry\x1b[201~");
    await session.close();
  });

  test("events without an encoding write nothing", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    session.send({ type: "focus", focused: true });
    session.send({ type: "mouse", action: "down", button: "left", row: 0, col: 0 });

    expect(mockProcess.write).not.toHaveBeenCalled();
    await session.close();
  });

  test("resize events resize both the pty and the screen", async ({ deps, mockProcess }) => {
    const onUpdate = vi.fn();
    const session = openTerminalSession(SMALL, deps, { onUpdate });

    session.send({ type: "resize", rows: 8, cols: 20 });

    expect(mockProcess.resize).toHaveBeenCalledWith(20, 8);
    expect(session.size).toEqual({ rows: 8, cols: 20 });
    expect(onUpdate).toHaveBeenCalledTimes(1);
    expect(session.snapshot()).toMatchObject({ rows: 8, cols: 20 });
    await session.close();
  });
});

describe("close", () => {
  test("close stops the loop, kills the child and is idempotent", async ({ deps, mockProcess }) => {
    const session = openTerminalSession(SMALL, deps);

    const first = session.close();
    const second = session.close();
    await first;

    expect(second).toBe(first);
    expect(session.state).toBe("closed");
    expect(mockProcess.kill).toHaveBeenCalledTimes(1);
  });

  test("withTerminalSession closes on the way out", async ({ deps, mockProcess }) => {
    const pid = await withTerminalSession(SMALL, deps, (session) => session.pid);

    expect(pid).toBe(1234);
    expect(mockProcess.kill).toHaveBeenCalledTimes(1);
  });
});
