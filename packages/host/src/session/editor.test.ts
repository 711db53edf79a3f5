import { basename, dirname, join } from "node:path";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";

import { test as base, describe, expect, vi } from "vitest";

import { DEFAULT_EDITOR_SETTINGS } from "@termbed/shared";
import { snapshotText } from "@termbed/vt";

import { SpawnError } from "../pty/errors.js";
import { createMockProcess } from "../pty/testing.js";
import type { MockPtyProcess } from "../pty/testing.js";
import type { PtyBridgeDeps, PtyFactory } from "../pty/types.js";
import { openEditorSession, withEditorSession } from "./editor.js";

interface EditorFixtures {
  tempDir: string;
  mockProcess: MockPtyProcess;
  factory: PtyFactory;
  deps: PtyBridgeDeps;
}

const test = base.extend<EditorFixtures>({
  tempDir: async ({ }, use) => {
    const dir = await mkdtemp(join(tmpdir(), "termbed-editor-test-"));
    await use(dir);
    await rm(dir, { recursive: true, force: true });
  },
  mockProcess: async ({ }, use) => {
    await use(createMockProcess(99));
  },
  factory: async ({ mockProcess }, use) => {
    await use(vi.fn<PtyFactory>(() => mockProcess));
  },
  deps: async ({ factory }, use) => {
    await use({
      factory,
      resolveExecutable: (command) => `/usr/bin/${command}`,
      schedule: (task) => task(),
    });
  },
});

describe("opening", () => {
  test("writes the document and appends its path to the editor command", async ({ tempDir, deps, factory }) => {
    const session = await openEditorSession(
      { content: "# Notes\n", language: "md", editor: "code --wait", tempDir },
      deps,
    );

    expect(basename(session.path)).toBe("buffer.md");
    expect(dirname(dirname(session.path))).toBe(tempDir);
    expect(await session.getText()).toBe("# Notes\n");
    expect(factory).toHaveBeenCalledWith(
      "/usr/bin/code",
      ["--wait", session.path],
      expect.objectContaining({ rows: 24, cols: 80, name: "xterm-256color" }),
    );
    await session.close();
  });

  test("quoted arguments in the editor command are kept together", async ({ tempDir, deps, factory }) => {
    const session = await openEditorSession({ editor: `vim -c "set nu"`, tempDir }, deps);

    expect(factory).toHaveBeenCalledWith("/usr/bin/vim", ["-c", "set nu", session.path], expect.anything());
    await session.close();
  });

  test("the editor can come from a named environment variable", async ({ tempDir, deps, factory }) => {
    const session = await openEditorSession(
      { editorEnv: "MY_EDITOR", env: { MY_EDITOR: "nano -w" }, tempDir },
      deps,
    );

    expect(factory).toHaveBeenCalledWith("/usr/bin/nano", ["-w", session.path], expect.anything());
    await session.close();
  });

  test("settings supply the editor and terminal defaults", async ({ tempDir, deps, factory }) => {
    const settings = { ...DEFAULT_EDITOR_SETTINGS, editor: "emacs -nw", rows: 30, cols: 100, terminal_type: "vt220" };
    const session = await openEditorSession({ settings, tempDir }, deps);

    expect(basename(session.path)).toBe("buffer.txt");
    expect(factory).toHaveBeenCalledWith(
      "/usr/bin/emacs",
      ["-nw", session.path],
      expect.objectContaining({ rows: 30, cols: 100, name: "vt220" }),
    );
    expect(session.size).toEqual({ rows: 30, cols: 100 });
    await session.close();
  });

  test("an unusable language falls back to .txt", async ({ tempDir, deps }) => {
    const session = await openEditorSession({ language: "../etc", editor: "vim", tempDir }, deps);

    expect(basename(session.path)).toBe("buffer.txt");
    await session.close();
  });

  test("a failed spawn removes the temp directory", async ({ tempDir, deps }) => {
    const resolveExecutable = (command: string): string => {
      throw new SpawnError("not-found", command, `Command not found on PATH: ${command}`);
    };

    await expect(openEditorSession({ editor: "nope", tempDir }, { ...deps, resolveExecutable })).rejects.toThrow(
      SpawnError,
    );
    expect(await readdir(tempDir)).toEqual([]);
  });

  test("an empty editor command is rejected", async ({ tempDir, deps }) => {
    const settings = { ...DEFAULT_EDITOR_SETTINGS, editor: "''" };

    await expect(openEditorSession({ settings, tempDir }, deps)).rejects.toThrow(TypeError);
    expect(await readdir(tempDir)).toEqual([]);
  });
});

describe("editing", () => {
  test("setText replaces the document on disk", async ({ tempDir, deps }) => {
    const session = await openEditorSession({ content: "old", editor: "vim", tempDir }, deps);

    await session.setText("new");

    expect(await session.getText()).toBe("new");
    await session.close();
  });

  test("after exit the snapshot shows the saved document", async ({ tempDir, deps, mockProcess }) => {
    const onUpdate = vi.fn();
    const onExit = vi.fn();
    const session = await openEditorSession(
      { content: "draft", editor: "vim", size: { rows: 3, cols: 8 }, tempDir },
      deps,
      { onUpdate, onExit },
    );

    mockProcess.simulateData("\x1b[2J\x1b[Hediting...");
    await session.setText("first line\nsecond\n");
    mockProcess.simulateExit(0);

    expect(await session.exited).toEqual({ exitCode: 0 });
    const snapshot = session.snapshot();
    expect(snapshotText(snapshot)).toEqual(["first li", "second", ""]);
    expect(snapshot.cursor.visible).toBe(false);
    expect(onUpdate).toHaveBeenLastCalledWith(snapshot);
    expect(onExit).toHaveBeenCalledTimes(1);
    expect(onExit).toHaveBeenCalledWith({ exitCode: 0 });
    await session.close();
  });

  test("resizing after exit re-lays out the document", async ({ tempDir, deps, mockProcess }) => {
    const session = await openEditorSession(
      { content: "abcdef", editor: "vim", size: { rows: 2, cols: 4 }, tempDir },
      deps,
    );
    mockProcess.simulateExit(0);
    await session.exited;
    expect(snapshotText(session.snapshot())).toEqual(["abcd", ""]);

    session.resize(2, 6);

    expect(snapshotText(session.snapshot())).toEqual(["abcdef", ""]);
  });
});

describe("closing", () => {
  test("close removes the temp directory and is idempotent", async ({ tempDir, deps, mockProcess }) => {
    const session = await openEditorSession({ editor: "vim", tempDir }, deps);
    const dir = dirname(session.path);

    await Promise.all([session.close(), session.close()]);

    expect(existsSync(dir)).toBe(false);
    expect(mockProcess.kill).toHaveBeenCalledTimes(1);
  });

  test("withEditorSession returns the callback's result and cleans up", async ({ tempDir, deps }) => {
    let dir = "";
    const text = await withEditorSession({ content: "kept", editor: "vim", tempDir }, deps, (session) => {
      dir = dirname(session.path);
      return session.getText();
    });

    expect(text).toBe("kept");
    expect(existsSync(dir)).toBe(false);
  });
});
