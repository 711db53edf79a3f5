import { join } from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";

import { test as base, expect, vi } from "vitest";

import { loadHostConfig } from "./config.js";

interface ConfigFixtures {
  dir: string;
}

const test = base.extend<ConfigFixtures>({
  dir: async ({ }, use) => {
    const dir = await mkdtemp(join(tmpdir(), "termbed-config-test-"));
    await use(dir);
    await rm(dir, { recursive: true, force: true });
  },
});

test("without variables there are no overrides and data lives under home", ({ dir }) => {
  const config = loadHostConfig({ env: {}, envFile: join(dir, "missing.env"), homeDir: "/home/tester" });

  expect(config.overrides).toEqual({});
  expect(config.dataDir).toBe(join("/home/tester", ".termbed"));
});

test("editor precedence is TERMBED_EDITOR, then VISUAL, then EDITOR", ({ dir }) => {
  const envFile = join(dir, "missing.env");

  expect(loadHostConfig({ env: { EDITOR: "vi" }, envFile }).overrides.editor).toBe("vi");
  expect(loadHostConfig({ env: { EDITOR: "vi", VISUAL: "code -w" }, envFile }).overrides.editor).toBe("code -w");
  expect(
    loadHostConfig({ env: { EDITOR: "vi", VISUAL: "code -w", TERMBED_EDITOR: "hx" }, envFile }).overrides.editor,
  ).toBe("hx");
});

test("terminal variables become settings", ({ dir }) => {
  const config = loadHostConfig({
    env: {
      TERMBED_TERM: "screen-256color",
      TERMBED_ROWS: "40",
      TERMBED_COLS: "132",
      TERMBED_SCROLLBACK: "0",
      TERMBED_MAX_PENDING_WRITE: "1024",
      TERMBED_DATA_DIR: "/var/lib/termbed",
    },
    envFile: join(dir, "missing.env"),
  });

  expect(config.overrides).toEqual({
    terminal_type: "screen-256color",
    rows: 40,
    cols: 132,
    scrollback_limit: 0,
    max_pending_write: 1024,
  });
  expect(config.dataDir).toBe("/var/lib/termbed");
});

test("invalid numbers are ignored with a warning", ({ dir }) => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

  const config = loadHostConfig({ env: { TERMBED_ROWS: "tall", TERMBED_COLS: "0" }, envFile: join(dir, "missing.env") });

  expect(config.overrides).toEqual({});
  expect(warn).toHaveBeenCalledWith("Ignoring invalid environment settings: rows, cols");
  warn.mockRestore();
});

test("a .env file fills in variables that are not already set", async ({ dir }) => {
  const envFile = join(dir, ".env");
  await writeFile(envFile, "TERMBED_EDITOR=nano\nTERMBED_ROWS=50\n", "utf-8");
  const env: Record<string, string | undefined> = { TERMBED_ROWS: "30" };

  const config = loadHostConfig({ env, envFile });

  expect(config.overrides).toEqual({ editor: "nano", rows: 30 });
  expect(env["TERMBED_EDITOR"]).toBe("nano");
  expect(config.env).toBe(env);
});
