import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

import { parse } from "dotenv";

import type { EditorSettings } from "@termbed/shared";
import { pickEditorSettings } from "@termbed/shared";

import { isNotFound } from "./errors.js";

export interface LoadHostConfigOptions {
  /** Variables to read; `.env` entries are added where absent. Defaults to a copy of `process.env`. */
  env?: Record<string, string | undefined> | undefined;
  /** Defaults to `.env` in the working directory. */
  envFile?: string | undefined;
  homeDir?: string | undefined;
}

export interface HostConfig {
  dataDir: string;
  env: Record<string, string | undefined>;
  /** Settings the environment sets; they win over the settings store. */
  overrides: Partial<EditorSettings>;
}

const NUMERIC_VARIABLES = {
  TERMBED_ROWS: "rows",
  TERMBED_COLS: "cols",
  TERMBED_SCROLLBACK: "scrollback_limit",
  TERMBED_MAX_PENDING_WRITE: "max_pending_write",
} as const;

function readEnvFile(path: string): Record<string, string> {
  try {
    return parse(readFileSync(path, "utf-8"));
  } catch (err: unknown) {
    if (isNotFound(err)) return {};
    throw err;
  }
}

function firstSet(env: Record<string, string | undefined>, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") return value;
  }
  return undefined;
}

function collectOverrides(env: Record<string, string | undefined>): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const editor = firstSet(env, ["TERMBED_EDITOR", "VISUAL", "EDITOR"]);
  if (editor !== undefined) raw["editor"] = editor;
  const term = firstSet(env, ["TERMBED_TERM"]);
  if (term !== undefined) raw["terminal_type"] = term;
  for (const [name, key] of Object.entries(NUMERIC_VARIABLES)) {
    const value = env[name];
    if (value === undefined || value.trim() === "") continue;
    raw[key] = /^\d+$/.test(value.trim()) ? Number(value) : value;
  }
  return raw;
}

/**
 * Reads host configuration from the environment, after merging in a `.env`
 * file. Values already in the environment win over the file.
 */
export function loadHostConfig(options: LoadHostConfigOptions = {}): HostConfig {
  const env = options.env ?? { ...process.env };
  const fromFile = readEnvFile(options.envFile ?? resolve(".env"));
  for (const [key, value] of Object.entries(fromFile)) {
    if (env[key] === undefined) env[key] = value;
  }

  const { settings, rejected } = pickEditorSettings(collectOverrides(env));
  if (rejected.length > 0) {
    console.warn(`Ignoring invalid environment settings: ${rejected.join(", ")}`);
  }

  const dataDir = firstSet(env, ["TERMBED_DATA_DIR"]) ?? join(options.homeDir ?? homedir(), ".termbed");
  return { dataDir, env, overrides: settings };
}
