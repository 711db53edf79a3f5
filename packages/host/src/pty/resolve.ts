import { accessSync, constants, statSync } from "node:fs";
import { delimiter, join, resolve } from "node:path";

import { SpawnError } from "./errors.js";
import type { ExecutableResolver } from "./types.js";

type Probe = "ok" | "missing" | "denied";

function probe(path: string): Probe {
  const stat = statSync(path, { throwIfNoEntry: false });
  if (!stat?.isFile()) return "missing";
  try {
    accessSync(path, constants.X_OK);
    return "ok";
  } catch {
    return "denied";
  }
}

/**
 * Finds the file `command` names: a path when it contains a slash, else the
 * first executable match on `PATH`.
 */
export const resolveExecutable: ExecutableResolver = (command, { env, cwd }) => {
  if (command.trim() === "") {
    throw new SpawnError("not-found", command, "No command given");
  }

  if (command.includes("/")) {
    const path = resolve(cwd, command);
    const status = probe(path);
    if (status === "ok") return path;
    throw new SpawnError(
      status === "denied" ? "permission-denied" : "not-found",
      command,
      status === "denied" ? `Permission denied: ${path}` : `No such file: ${path}`,
    );
  }

  let denied: string | null = null;
  for (const dir of (env["PATH"] ?? "").split(delimiter)) {
    if (dir === "") continue;
    const candidate = join(resolve(cwd, dir), command);
    const status = probe(candidate);
    if (status === "ok") return candidate;
    if (status === "denied") denied ??= candidate;
  }

  if (denied !== null) {
    throw new SpawnError("permission-denied", command, `Permission denied: ${denied}`);
  }
  throw new SpawnError("not-found", command, `Command not found on PATH: ${command}`);
};
