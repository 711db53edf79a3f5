import { join } from "node:path";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";

import type { EditorSettings } from "@termbed/shared";
import { DEFAULT_EDITOR_SETTINGS, pickEditorSettings } from "@termbed/shared";

import { isNotFound } from "../errors.js";

export interface SettingsStoreDeps {
  dataDir: string;
}

export interface SettingsStore {
  getSettings: () => Promise<EditorSettings>;
  updateSettings: (patch: Partial<EditorSettings>) => Promise<EditorSettings>;
}

function settingsPath(dataDir: string): string {
  return join(dataDir, "settings.json");
}

export function createSettingsStore(deps: SettingsStoreDeps): SettingsStore {
  const { dataDir } = deps;
  const filePath = settingsPath(dataDir);

  async function getSettings(): Promise<EditorSettings> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return { ...DEFAULT_EDITOR_SETTINGS };
      }
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`Corrupt settings file at ${filePath}, returning defaults`);
      return { ...DEFAULT_EDITOR_SETTINGS };
    }
    const { settings, rejected } = pickEditorSettings(parsed);
    if (rejected.length > 0) {
      console.warn(`Ignoring invalid settings in ${filePath}: ${rejected.join(", ")}`);
    }
    return { ...DEFAULT_EDITOR_SETTINGS, ...settings };
  }

  return {
    getSettings,

    async updateSettings(patch) {
      const { settings, rejected } = pickEditorSettings(patch);
      if (rejected.length > 0) {
        throw new TypeError(`Invalid settings: ${rejected.join(", ")}`);
      }
      const current = await getSettings();
      const updated: EditorSettings = { ...current, ...settings };
      await mkdir(dataDir, { recursive: true });
      const tmpPath = filePath + ".tmp";
      await writeFile(tmpPath, JSON.stringify(updated, null, 2), "utf-8");
      await rename(tmpPath, filePath);
      return updated;
    },
  };
}
