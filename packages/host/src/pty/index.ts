export type {
  ExecutableResolver,
  IDisposable,
  PtyBridge,
  PtyBridgeDeps,
  PtyBridgeOptions,
  PtyFactory,
  PtyFactoryOptions,
  PtyProcess,
  ResolveOptions,
  Scheduler,
} from "./types.js";
export {
  DEFAULT_FLUSH_CHUNK_SIZE,
  DEFAULT_HIGH_WATER_CHUNKS,
  DEFAULT_MAX_PENDING_WRITE,
  openPtyBridge,
  withPtyBridge,
} from "./bridge.js";
export { SpawnError } from "./errors.js";
export type { SpawnErrorReason } from "./errors.js";
export { nodePtyFactory } from "./factory.js";
export { resolveExecutable } from "./resolve.js";
