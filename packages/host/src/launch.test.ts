import { join } from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";

import { test as base, expect, vi } from "vitest";
import { DEFAULT_EDITOR_SETTINGS } from "@termbed/shared";

import { loadEditorSettings, openConfiguredEditorSession } from "./launch.js";
import { createMockProcess } from "./pty/testing.js";
import type { PtyFactory } from "./pty/types.js";
import { createSettingsStore } from "./settings/store.js";

interface LaunchFixtures {
  dataDir: string;
}

const test = base.extend<LaunchFixtures>({
  dataDir: async ({ }, use) => {
    const dir = await mkdtemp(join(tmpdir(), "termbed-launch-test-"));
    await use(dir);
    await rm(dir, { recursive: true, force: true });
  },
});

test("environment overrides win over stored settings", async ({ dataDir }) => {
  await createSettingsStore({ dataDir }).updateSettings({ editor: "nano", rows: 30 });

  const settings = await loadEditorSettings({
    env: { TERMBED_DATA_DIR: dataDir, TERMBED_EDITOR: "hx" },
    envFile: join(dataDir, "missing.env"),
  });

  expect(settings).toEqual({ ...DEFAULT_EDITOR_SETTINGS, editor: "hx", rows: 30 });
});

test("openConfiguredEditorSession launches the configured editor", async ({ dataDir }) => {
  await createSettingsStore({ dataDir }).updateSettings({ editor: "nano", cols: 100 });
  const factory = vi.fn<PtyFactory>(() => createMockProcess(7));

  const session = await openConfiguredEditorSession(
    { content: "text", tempDir: dataDir },
    {
      factory,
      resolveExecutable: (command) => `/bin/${command}`,
      config: { env: { TERMBED_DATA_DIR: dataDir }, envFile: join(dataDir, "missing.env") },
    },
  );

  expect(factory).toHaveBeenCalledWith(
    "/bin/nano",
    [session.path],
    expect.objectContaining({ rows: 24, cols: 100 }),
  );
  await session.close();
});
