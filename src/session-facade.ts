// src/session-facade.ts
import { rm } from "node:fs/promises";
import type { ValidConfig } from "./config.js";
import { resolveSourceRoot } from "./config.js";
import { DatabricksChannel } from "./databricks.js";
import {
  ConcurrentExecutionError,
  ConfigurationError,
  ContextInvalidatedError,
} from "./errors.js";
import {
  ExecutionSession,
  type ContextState,
  type StateChange,
} from "./execution-session.js";
import { childOrNull, errorMeta, type Logger } from "./logger.js";
import { ManifestStore } from "./manifest.js";
import {
  okResult,
  type ExecutionResult,
  type RemoteChannel,
} from "./remote-channel.js";
import { deriveSessionPaths, newSessionId } from "./session-paths.js";
import { SyncCoordinator, type SyncOutcome } from "./session-sync.js";

export interface SessionFacadeOptions {
  clusterId: string;
  channel: RemoteChannel;
  sourceRoot: string;
  sync: ValidConfig["sync"];
  sessionId?: string;
  // local state home; defaults to getCellsyncHome()
  home?: string;
  logger?: Logger;
  creationTimeoutMs?: number;
  executionTimeoutMs?: number;
  reconnectDelayMs?: number;
  uploadTimeoutMs?: number;
  remoteCallTimeoutMs?: number;
}

/**
 * The single entry point for a host: `execute` and `shutdown`. Context
 * loss is absorbed here with one recovery and one retry per request;
 * every other error propagates unchanged.
 */
export class SessionFacade {
  readonly sessionId: string;
  readonly sourceRoot: string;
  private readonly session: ExecutionSession;
  private readonly coordinator: SyncCoordinator;
  private readonly localDir: string;
  private readonly logger: Logger;
  private executing = false;
  private closed = false;
  private _lastSync: SyncOutcome | null = null;

  constructor({
    clusterId,
    channel,
    sourceRoot,
    sync,
    sessionId = newSessionId(),
    home,
    logger,
    creationTimeoutMs,
    executionTimeoutMs,
    reconnectDelayMs,
    uploadTimeoutMs,
    remoteCallTimeoutMs,
  }: SessionFacadeOptions) {
    this.sessionId = sessionId;
    this.sourceRoot = sourceRoot;
    this.logger = childOrNull(logger, "facade");
    const paths = deriveSessionPaths(sessionId, home);
    this.localDir = paths.dir;
    this.session = new ExecutionSession({
      sessionId,
      clusterId,
      channel,
      logger,
      creationTimeoutMs,
      executionTimeoutMs,
      reconnectDelayMs,
    });
    this.coordinator = new SyncCoordinator({
      sessionId,
      sourceRoot,
      sync,
      channel,
      store: new ManifestStore(paths.manifestDb, sourceRoot),
      logger,
      uploadTimeoutMs,
      remoteCallTimeoutMs,
    });
  }

  get state(): ContextState {
    return this.session.state;
  }

  // Outcome of the most recent sync that ran, forced or not.
  get lastSync(): SyncOutcome | null {
    return this._lastSync;
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    return this.session.onStateChange(listener);
  }

  async execute(code: string): Promise<ExecutionResult> {
    if (!code.trim()) return okResult();
    if (this.executing) throw new ConcurrentExecutionError();
    this.executing = true;
    try {
      return await this.executeOnce(code);
    } finally {
      this.executing = false;
    }
  }

  private async executeOnce(code: string): Promise<ExecutionResult> {
    await this.session.ensureContext();
    if (this.session.state === "INVALIDATED") {
      // an earlier recovery failed; the forced re-sync replaces the normal one
      await this.recover();
      return this.retry(code);
    }
    try {
      this._lastSync = await this.coordinator.syncIfNeeded(this.session);
      return await this.session.run(code);
    } catch (err) {
      if (!(err instanceof ContextInvalidatedError)) throw err;
      this.logger.info("recovering lost execution context", {
        sessionId: this.sessionId,
      });
      await this.recover();
      return this.retry(code);
    }
  }

  private async recover(): Promise<void> {
    await this.session.recreate(async () => {
      this._lastSync = await this.coordinator.syncIfNeeded(this.session, {
        force: true,
      });
    });
  }

  private async retry(code: string): Promise<ExecutionResult> {
    try {
      const result = await this.session.run(code);
      return { ...result, reconnected: true };
    } catch (err) {
      if (!(err instanceof ContextInvalidatedError)) throw err;
      this.logger.warn("execution context lost again after recovery", {
        sessionId: this.sessionId,
      });
      if (err.result) return { ...err.result, reconnected: true };
      throw err.cause ?? err;
    }
  }

  /**
   * Destroy the remote context, remove remote and local session state.
   * Safe to call more than once; never throws.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.session.shutdown(this.coordinator.cleanupCode() ?? undefined);
    await this.coordinator.cleanup();
    try {
      await rm(this.localDir, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn("could not remove local session state", {
        dir: this.localDir,
        ...errorMeta(err),
      });
    }
    this.logger.debug("session closed", { sessionId: this.sessionId });
  }
}

export interface OpenSessionOptions {
  cwd?: string;
  home?: string;
  logger?: Logger;
  channel?: RemoteChannel;
}

// Build a facade for a validated configuration, talking to Databricks
// unless a channel is supplied.
export function openSession(
  config: ValidConfig,
  { cwd = process.cwd(), home, logger, channel }: OpenSessionOptions = {},
): SessionFacade {
  let remote = channel;
  if (!remote) {
    if (!config.host || !config.token) {
      throw new ConfigurationError([
        `Databricks host and token are required. Set DATABRICKS_HOST and DATABRICKS_TOKEN or add host and token to the [${config.profile}] profile in ~/.databrickscfg.`,
      ]);
    }
    remote = new DatabricksChannel({
      host: config.host,
      token: config.token,
      logger,
    });
  }
  return new SessionFacade({
    clusterId: config.clusterId,
    channel: remote,
    sourceRoot: resolveSourceRoot(config.sync, cwd),
    sync: config.sync,
    home,
    logger,
  });
}
