export type SpawnErrorReason = "not-found" | "permission-denied" | "pty-allocation-failed";

/** The child could not be started. Fatal to session creation. */
export class SpawnError extends Error {
  readonly reason: SpawnErrorReason;
  readonly command: string;

  constructor(reason: SpawnErrorReason, command: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SpawnError";
    this.reason = reason;
    this.command = command;
  }
}
