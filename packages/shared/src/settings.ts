export interface EditorSettings {
  editor: string;
  terminal_type: string;
  rows: number;
  cols: number;
  scrollback_limit: number;
  max_pending_write: number;
}

export const DEFAULT_EDITOR_SETTINGS: EditorSettings = {
  editor: "vim",
  terminal_type: "xterm-256color",
  rows: 24,
  cols: 80,
  scrollback_limit: 1000,
  max_pending_write: 64 * 1024,
};

type SettingKind = "string" | "positive-int" | "non-negative-int";

const SETTING_KINDS: Record<keyof EditorSettings, SettingKind> = {
  editor: "string",
  terminal_type: "string",
  rows: "positive-int",
  cols: "positive-int",
  scrollback_limit: "non-negative-int",
  max_pending_write: "positive-int",
};

function matchesKind(kind: SettingKind, value: unknown): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string" && value.trim() !== "";
    case "positive-int":
      return typeof value === "number" && Number.isInteger(value) && value > 0;
    case "non-negative-int":
      return typeof value === "number" && Number.isInteger(value) && value >= 0;
  }
}

function isSettingKey(key: string): key is keyof EditorSettings {
  return Object.prototype.hasOwnProperty.call(SETTING_KINDS, key);
}

/**
 * Keeps only known keys whose values have the right shape. Unknown and
 * ill-typed entries are reported in `rejected`.
 */
export function pickEditorSettings(value: unknown): {
  settings: Partial<EditorSettings>;
  rejected: string[];
} {
  const settings: Partial<EditorSettings> = {};
  const rejected: string[] = [];
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { settings, rejected };
  }

  for (const [key, entry] of Object.entries(value)) {
    if (!isSettingKey(key) || !matchesKind(SETTING_KINDS[key], entry)) {
      rejected.push(key);
      continue;
    }
    if (typeof entry === "string") {
      if (key === "editor" || key === "terminal_type") settings[key] = entry;
    } else if (typeof entry === "number") {
      if (key !== "editor" && key !== "terminal_type") settings[key] = entry;
    }
  }
  return { settings, rejected };
}
