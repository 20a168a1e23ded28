// src/errors.ts
import type { ExecutionResult } from "./remote-channel.js";

export type ErrorKind =
  | "configuration"
  | "size-limit"
  | "cluster-unavailable"
  | "context-invalidated"
  | "remote-execution"
  | "transport"
  | "concurrent-execution"
  | "sync-extraction"
  | "session-destroyed";

export abstract class CellsyncError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing or invalid cluster id, credentials or sync settings.
export class ConfigurationError extends CellsyncError {
  readonly kind = "configuration";
  readonly problems: string[];

  constructor(problems: string[]) {
    super(problems.join("\n"));
    this.problems = problems;
  }
}

export class SizeLimitExceededError extends CellsyncError {
  readonly kind = "size-limit";

  constructor(
    message: string,
    public readonly limitBytes: number,
    public readonly actualBytes: number,
    public readonly path?: string,
  ) {
    super(message);
  }
}

export class ClusterUnavailableError extends CellsyncError {
  readonly kind = "cluster-unavailable";
}

/**
 * Raised inside the session when the remote execution context is gone.
 * Carries whatever reported the loss so a failed retry can surface it
 * unchanged. Never reaches callers of the session facade.
 */
export class ContextInvalidatedError extends CellsyncError {
  readonly kind = "context-invalidated";
  readonly result?: ExecutionResult;

  constructor(
    message: string,
    options: { cause?: unknown; result?: ExecutionResult } = {},
  ) {
    super(message, { cause: options.cause });
    this.result = options.result;
  }
}

// The user's code failed on the cluster. Such failures normally travel
// inside an ExecutionResult; this form is for callers that want to throw.
export class RemoteExecutionError extends CellsyncError {
  readonly kind = "remote-execution";

  constructor(
    message: string,
    public readonly remoteName: string,
    public readonly traceback: string[] = [],
  ) {
    super(message);
  }

  static fromResult(result: ExecutionResult): RemoteExecutionError | null {
    if (result.status === "ok") return null;
    for (const chunk of result.chunks) {
      if (chunk.kind === "error") {
        return new RemoteExecutionError(
          `${chunk.name}: ${chunk.message}`,
          chunk.name,
          chunk.traceback,
        );
      }
    }
    return new RemoteExecutionError(`command ended with status ${result.status}`, "Error");
  }
}

export class TransportError extends CellsyncError {
  readonly kind = "transport";
  readonly status?: number;
  readonly errorCode?: string;

  constructor(
    message: string,
    options: { status?: number; errorCode?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.errorCode = options.errorCode;
  }
}

export class ConcurrentExecutionError extends CellsyncError {
  readonly kind = "concurrent-execution";

  constructor() {
    super("another execution is already in flight for this session");
  }
}

export class SyncExtractionError extends CellsyncError {
  readonly kind = "sync-extraction";
}

export class SessionDestroyedError extends CellsyncError {
  readonly kind = "session-destroyed";

  constructor(sessionId: string) {
    super(`session ${sessionId} has been shut down`);
  }
}

export function isCellsyncError(err: unknown): err is CellsyncError {
  return err instanceof CellsyncError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// errno-style code ("ENOENT", ...) of a Node system error, if any.
// Checked by shape: fs errors may come from another realm's Error.
export function errnoCode(err: unknown): string | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
  ) {
    return err.code;
  }
  return undefined;
}
