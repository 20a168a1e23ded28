// src/execution-session.ts
import { EventEmitter } from "node:events";
import type {
  ExecutionResult,
  RemoteChannel,
  RemoteContext,
} from "./remote-channel.js";
import { errorText } from "./remote-channel.js";
import { isContextLostError, isContextLostResult } from "./context-errors.js";
import {
  ClusterUnavailableError,
  ConcurrentExecutionError,
  ContextInvalidatedError,
  SessionDestroyedError,
  isCellsyncError,
  errorMessage,
} from "./errors.js";
import { childOrNull, errorMeta, type Logger } from "./logger.js";
import { DeadlineExceeded, wait, withDeadline } from "./util.js";
import {
  COMMAND_EXECUTION_TIMEOUT_MS,
  CONTEXT_CREATION_TIMEOUT_MS,
  TEARDOWN_TIMEOUT_MS,
  RECONNECT_DELAY_MS,
} from "./constants.js";

export type ContextState =
  | "UNINITIALIZED"
  | "CREATING"
  | "ACTIVE"
  | "INVALIDATED"
  | "RECREATING"
  | "DESTROYED";

export type StateChange = { from: ContextState; to: ContextState };

// Upper bound for each best-effort teardown call during shutdown.

export interface ExecutionSessionOptions {
  sessionId: string;
  clusterId: string;
  channel: RemoteChannel;
  logger?: Logger;
  creationTimeoutMs?: number;
  executionTimeoutMs?: number;
  reconnectDelayMs?: number;
}

/**
 * What the sync coordinator needs from a session: a place to run the
 * extraction program. Setup runs are allowed while recreating, so the
 * forced re-sync can complete before the session is declared active.
 */
export interface SetupExecutor {
  readonly sessionId: string;
  runSetup(code: string): Promise<ExecutionResult>;
}

/**
 * Owns one remote execution context. The context is created lazily,
 * classified as lost from error text, and rebuilt by `recreate`. At most
 * one dispatch is in flight; a second is rejected, not queued.
 */
export class ExecutionSession implements SetupExecutor {
  readonly sessionId: string;
  readonly clusterId: string;
  private readonly channel: RemoteChannel;
  private readonly logger: Logger;
  private readonly creationTimeoutMs: number;
  private readonly executionTimeoutMs: number;
  private readonly reconnectDelayMs: number;
  private readonly events = new EventEmitter();

  private _state: ContextState = "UNINITIALIZED";
  private context: RemoteContext | null = null;
  // context abandoned on invalidation, destroyed best-effort on recreate
  private staleContext: RemoteContext | null = null;
  private inFlight = false;

  constructor({
    sessionId,
    clusterId,
    channel,
    logger,
    creationTimeoutMs = CONTEXT_CREATION_TIMEOUT_MS,
    executionTimeoutMs = COMMAND_EXECUTION_TIMEOUT_MS,
    reconnectDelayMs = RECONNECT_DELAY_MS,
  }: ExecutionSessionOptions) {
    this.sessionId = sessionId;
    this.clusterId = clusterId;
    this.channel = channel;
    this.logger = childOrNull(logger, "session");
    this.creationTimeoutMs = creationTimeoutMs;
    this.executionTimeoutMs = executionTimeoutMs;
    this.reconnectDelayMs = reconnectDelayMs;
  }

  get state(): ContextState {
    return this._state;
  }

  get contextId(): string | null {
    return this.context?.contextId ?? null;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    this.events.on("state", listener);
    return () => {
      this.events.off("state", listener);
    };
  }

  private transition(to: ContextState) {
    const from = this._state;
    if (from === to || from === "DESTROYED") return;
    this._state = to;
    this.logger.debug("state", { from, to, sessionId: this.sessionId });
    this.events.emit("state", { from, to } satisfies StateChange);
  }

  private assertAlive() {
    if (this._state === "DESTROYED") {
      throw new SessionDestroyedError(this.sessionId);
    }
  }

  private async allocate(): Promise<RemoteContext> {
    const t0 = Date.now();
    try {
      const context = await withDeadline(this.creationTimeoutMs, (signal) =>
        this.channel.createContext(this.clusterId, { signal }),
      );
      this.logger.info("execution context ready", {
        contextId: context.contextId,
        ms: Date.now() - t0,
      });
      return context;
    } catch (err) {
      if (err instanceof DeadlineExceeded) {
        throw new ClusterUnavailableError(
          `execution context on cluster ${this.clusterId} was not ready within ${Math.round(this.creationTimeoutMs / 1000)}s`,
          { cause: err },
        );
      }
      if (err instanceof ClusterUnavailableError) throw err;
      throw new ClusterUnavailableError(
        `could not create an execution context on cluster ${this.clusterId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  /**
   * Create the remote context if none has been created yet. Failure is
   * fatal for the request and leaves the session UNINITIALIZED.
   */
  async ensureContext(): Promise<void> {
    this.assertAlive();
    if (this._state === "CREATING") throw new ConcurrentExecutionError();
    if (this._state !== "UNINITIALIZED") return;
    this.transition("CREATING");
    try {
      this.context = await this.allocate();
    } catch (err) {
      this.transition("UNINITIALIZED");
      throw err;
    }
    this.transition("ACTIVE");
  }

  async run(code: string): Promise<ExecutionResult> {
    this.assertAlive();
    if (this.inFlight) throw new ConcurrentExecutionError();
    if (this._state === "UNINITIALIZED") await this.ensureContext();
    return this.dispatch(code, ["ACTIVE"]);
  }

  runSetup(code: string): Promise<ExecutionResult> {
    return this.dispatch(code, ["ACTIVE", "RECREATING"]);
  }

  private async dispatch(
    code: string,
    allowed: readonly ContextState[],
  ): Promise<ExecutionResult> {
    this.assertAlive();
    if (this.inFlight) throw new ConcurrentExecutionError();
    const context = this.context;
    if (!context || !allowed.includes(this._state)) {
      throw new ContextInvalidatedError(
        `no usable execution context (state ${this._state})`,
      );
    }
    this.inFlight = true;
    try {
      let result: ExecutionResult;
      try {
        result = await withDeadline(this.executionTimeoutMs, (signal) =>
          this.channel.run(context, code, { signal }),
        );
      } catch (err) {
        if (err instanceof DeadlineExceeded) {
          // The command may still be running remotely; the context stays usable.
          this.logger.warn("command timed out", {
            contextId: context.contextId,
            ms: this.executionTimeoutMs,
          });
          return timeoutResult(this.executionTimeoutMs);
        }
        if (!isCellsyncError(err) || err.kind === "transport") {
          if (isContextLostError(err)) {
            throw this.invalidate(errorMessage(err), { cause: err });
          }
        }
        throw err;
      }
      if (isContextLostResult(result)) {
        throw this.invalidate(errorText(result), { result });
      }
      return result;
    } finally {
      this.inFlight = false;
    }
  }

  private invalidate(
    reason: string,
    detail: { cause?: unknown; result?: ExecutionResult },
  ): ContextInvalidatedError {
    this.logger.warn("execution context lost", {
      contextId: this.context?.contextId,
      reason,
    });
    this.staleContext = this.context;
    this.context = null;
    this.transition("INVALIDATED");
    return new ContextInvalidatedError(reason, detail);
  }

  /**
   * Replace a lost context: fixed backoff, new context, then `resync`
   * (which may dispatch setup code) before the session is ACTIVE again.
   * On any failure the session stays INVALIDATED and the error surfaces.
   */
  async recreate(resync: () => Promise<unknown>): Promise<void> {
    this.assertAlive();
    if (this.inFlight) throw new ConcurrentExecutionError();
    if (this._state !== "INVALIDATED") {
      throw new Error(`cannot recreate a context in state ${this._state}`);
    }
    this.transition("RECREATING");
    try {
      await wait(this.reconnectDelayMs);
      await this.discardStale();
      this.context = await this.allocate();
      await resync();
    } catch (err) {
      if (this.state === "DESTROYED") throw err;
      if (this.context) {
        this.staleContext = this.context;
        this.context = null;
      }
      this.transition("INVALIDATED");
      if (err instanceof ContextInvalidatedError) {
        throw new ClusterUnavailableError(
          `execution context was lost again during recovery: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
    this.transition("ACTIVE");
  }

  private async discardStale() {
    const stale = this.staleContext;
    if (!stale) return;
    this.staleContext = null;
    try {
      await withDeadline(TEARDOWN_TIMEOUT_MS, (signal) =>
        this.channel.destroyContext(stale, { signal }),
      );
    } catch (err) {
      // usually already gone
      this.logger.debug("could not destroy stale context", {
        contextId: stale.contextId,
        ...errorMeta(err),
      });
    }
  }

  /**
   * Tear down the remote context. Never throws; failures are logged and
   * each remote call is bounded by TEARDOWN_TIMEOUT_MS.
   */
  async shutdown(cleanupCode?: string): Promise<void> {
    if (this._state === "DESTROYED") return;
    const context = this.context;
    this.context = null;
    this.transition("DESTROYED");
    if (context && cleanupCode) {
      try {
        await withDeadline(TEARDOWN_TIMEOUT_MS, (signal) =>
          this.channel.run(context, cleanupCode, { signal }),
        );
      } catch (err) {
        this.logger.warn("remote cleanup failed", errorMeta(err));
      }
    }
    if (context) {
      try {
        await withDeadline(TEARDOWN_TIMEOUT_MS, (signal) =>
          this.channel.destroyContext(context, { signal }),
        );
        this.logger.info("execution context destroyed", {
          contextId: context.contextId,
        });
      } catch (err) {
        this.logger.warn("could not destroy execution context", {
          contextId: context.contextId,
          ...errorMeta(err),
        });
      }
    }
    await this.discardStale();
  }
}

function timeoutResult(ms: number): ExecutionResult {
  return {
    status: "timeout",
    chunks: [
      {
        kind: "error",
        name: "TimeoutError",
        message: `command did not finish within ${Math.round(ms / 1000)}s`,
        traceback: [],
      },
    ],
    reconnected: false,
  };
}
