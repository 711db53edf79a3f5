export { createSettingsStore } from "./store.js";
export type { SettingsStore, SettingsStoreDeps } from "./store.js";
