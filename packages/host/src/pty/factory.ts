import * as pty from "node-pty";

import type { PtyFactory, PtyFactoryOptions, PtyProcess } from "./types.js";

export const nodePtyFactory: PtyFactory = (
  file: string,
  args: string[],
  options: PtyFactoryOptions,
): PtyProcess => {
  const proc = pty.spawn(file, args, {
    name: options.name,
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd,
    env: options.env,
  });

  return {
    get pid() { return proc.pid; },
    write: (data) => proc.write(data),
    resize: (cols, rows) => proc.resize(cols, rows),
    kill: (signal) => proc.kill(signal),
    pause: () => proc.pause(),
    resume: () => proc.resume(),
    onData: (cb) => proc.onData(cb),
    onExit: (cb) => proc.onExit(cb),
  };
};
