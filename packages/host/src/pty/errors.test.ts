import { expect, test } from "vitest";

import { SpawnError } from "./errors.js";

test("SpawnError carries reason, command and cause", () => {
  const cause = new Error("ENOENT");
  const error = new SpawnError("not-found", "vim", "Command not found on PATH: vim", { cause });

  expect(error).toBeInstanceOf(Error);
  expect(error.name).toBe("SpawnError");
  expect(error.reason).toBe("not-found");
  expect(error.command).toBe("vim");
  expect(error.cause).toBe(cause);
  expect(error.message).toBe("Command not found on PATH: vim");
});
