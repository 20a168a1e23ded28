// src/session-sync.ts
import type { SyncConfig } from "./config.js";
import type { SetupExecutor } from "./execution-session.js";
import { compileExclusions } from "./ignore.js";
import type { Manifest, ManifestStore } from "./manifest.js";
import { packFiles } from "./pack.js";
import { errorText, type RemoteChannel } from "./remote-channel.js";
import { cleanupProgram, dbfsUri, extractionProgram } from "./remote-setup.js";
import {
  emptyPlan,
  isEmptyPlan,
  limitsFromMegabytes,
  scanTree,
  type ScanResult,
  type SyncPlan,
} from "./scan.js";
import { stagingArchivePath, stagingDir, workspaceDir } from "./session-paths.js";
import { SyncExtractionError, TransportError } from "./errors.js";
import { childOrNull, errorMeta, type Logger } from "./logger.js";
import { DeadlineExceeded, formatBytes, withDeadline } from "./util.js";
import { TEARDOWN_TIMEOUT_MS, UPLOAD_TIMEOUT_MS } from "./constants.js";

export interface SyncCoordinatorOptions {
  sessionId: string;
  sourceRoot: string;
  sync: SyncConfig;
  channel: RemoteChannel;
  store: ManifestStore;
  logger?: Logger;
  uploadTimeoutMs?: number;
  // staging deletes and the workspace lookup
  remoteCallTimeoutMs?: number;
}

export type SyncOutcome = {
  synced: boolean;
  plan: SyncPlan;
  archiveBytes: number;
};

/**
 * Ships local changes to the session workspace. The manifest is written
 * exactly once per sync, after the remote extraction reports success;
 * any earlier failure leaves it untouched so the next attempt computes
 * the same plan.
 */
export class SyncCoordinator {
  readonly sessionId: string;
  readonly sourceRoot: string;
  private readonly sync: SyncConfig;
  private readonly channel: RemoteChannel;
  private readonly store: ManifestStore;
  private readonly logger: Logger;
  private readonly uploadTimeoutMs: number;
  private readonly remoteCallTimeoutMs: number;
  private workspace: string | null = null;
  private staged = false;

  constructor({
    sessionId,
    sourceRoot,
    sync,
    channel,
    store,
    logger,
    uploadTimeoutMs = UPLOAD_TIMEOUT_MS,
    remoteCallTimeoutMs = TEARDOWN_TIMEOUT_MS,
  }: SyncCoordinatorOptions) {
    this.sessionId = sessionId;
    this.sourceRoot = sourceRoot;
    this.sync = sync;
    this.channel = channel;
    this.store = store;
    this.logger = childOrNull(logger, "sync");
    this.uploadTimeoutMs = uploadTimeoutMs;
    this.remoteCallTimeoutMs = remoteCallTimeoutMs;
  }

  private async bounded<T>(
    what: string,
    ms: number,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    try {
      return await withDeadline(ms, call);
    } catch (err) {
      if (err instanceof DeadlineExceeded) {
        throw new TransportError(`${what} timed out after ${ms} ms`, { cause: err });
      }
      throw err;
    }
  }

  async workspacePath(): Promise<string> {
    if (this.workspace == null) {
      const root = await this.bounded(
        "workspace lookup",
        this.remoteCallTimeoutMs,
        (signal) => this.channel.workspaceRoot({ signal }),
      );
      this.workspace = workspaceDir(root, this.sessionId);
    }
    return this.workspace;
  }

  // Compute the plan against `previous` without touching the remote side.
  async plan(previous: Manifest): Promise<ScanResult> {
    const ignorer = await compileExclusions({
      root: this.sourceRoot,
      useIgnoreFile: this.sync.useGitignore,
      patterns: this.sync.exclude,
      logger: this.logger.child("ignore"),
    });
    return scanTree({
      root: this.sourceRoot,
      ignorer,
      previous,
      limits: limitsFromMegabytes(this.sync.maxSizeMb, this.sync.maxFileSizeMb),
      logger: this.logger.child("scan"),
    });
  }

  /**
   * Sync when something changed, or unconditionally when `force` is set.
   * A forced sync ignores the manifest and rebuilds the remote workspace
   * from scratch.
   */
  async syncIfNeeded(
    executor: SetupExecutor,
    { force = false }: { force?: boolean } = {},
  ): Promise<SyncOutcome> {
    if (!this.sync.enabled) {
      return { synced: false, plan: emptyPlan(), archiveBytes: 0 };
    }
    const previous: Manifest = force ? new Map() : this.store.load();
    const { plan, candidate } = await this.plan(previous);
    if (!force && isEmptyPlan(plan)) {
      this.logger.debug("no local changes");
      return { synced: false, plan, archiveBytes: 0 };
    }

    let archiveUri: string | null = null;
    let archiveBytes = 0;
    if (plan.added.length || plan.modified.length) {
      const archive = await packFiles(this.sourceRoot, plan);
      archiveBytes = archive.length;
      const remotePath = stagingArchivePath(this.sessionId);
      this.staged = true;
      await this.bounded(`upload to ${remotePath}`, this.uploadTimeoutMs, (signal) =>
        this.channel.upload(archive, remotePath, { signal }),
      );
      archiveUri = dbfsUri(remotePath);
      this.logger.debug("uploaded archive", {
        remotePath,
        size: formatBytes(archiveBytes),
      });
    }

    const result = await executor.runSetup(
      extractionProgram({
        workspaceDir: await this.workspacePath(),
        archiveUri,
        removed: plan.removed,
        clean: force,
      }),
    );
    if (result.status !== "ok") {
      throw new SyncExtractionError(
        `remote extraction failed (${result.status}): ${errorText(result) || "no error output"}`,
      );
    }

    this.store.replace(candidate);
    this.logger.info("files synced", {
      added: plan.added.length,
      modified: plan.modified.length,
      removed: plan.removed.length,
      bytes: plan.bytes,
      forced: force,
    });
    return { synced: true, plan, archiveBytes };
  }

  // Remote program that removes this session's workspace, if one was made.
  cleanupCode(): string | null {
    return this.workspace ? cleanupProgram(this.workspace) : null;
  }

  /** Best-effort removal of the staging directory; never throws. */
  async cleanup(): Promise<void> {
    if (this.staged) {
      try {
        await this.bounded(
          "staging removal",
          this.remoteCallTimeoutMs,
          (signal) => this.channel.remove(stagingDir(this.sessionId), { signal }),
        );
      } catch (err) {
        this.logger.warn("could not remove staging directory", {
          path: stagingDir(this.sessionId),
          ...errorMeta(err),
        });
      }
    }
    this.store.close();
  }
}
