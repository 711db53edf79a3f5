import type { EditorSettings } from "@termbed/shared";

import { loadHostConfig } from "./config.js";
import type { LoadHostConfigOptions } from "./config.js";
import type { PtyBridgeDeps } from "./pty/types.js";
import { openEditorSession } from "./session/editor.js";
import type { EditorSession, EditorSessionOptions } from "./session/editor.js";
import type { TerminalSessionEvents } from "./session/session.js";
import { createSettingsStore } from "./settings/store.js";

export interface ConfiguredEditorDeps extends PtyBridgeDeps {
  config?: LoadHostConfigOptions | undefined;
}

/** Stored settings, with the environment's overrides on top. */
export async function loadEditorSettings(config: LoadHostConfigOptions = {}): Promise<EditorSettings> {
  const { dataDir, overrides } = loadHostConfig(config);
  const stored = await createSettingsStore({ dataDir }).getSettings();
  return { ...stored, ...overrides };
}

/** Opens an editor session with settings taken from the store and the environment. */
export async function openConfiguredEditorSession(
  options: Omit<EditorSessionOptions, "settings">,
  deps: ConfiguredEditorDeps,
  events: TerminalSessionEvents = {},
): Promise<EditorSession> {
  const settings = await loadEditorSettings(deps.config);
  return openEditorSession({ ...options, settings }, deps, events);
}
