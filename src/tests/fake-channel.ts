// tests/fake-channel.ts
//
// In-process RemoteChannel for session and sync tests. User runs are
// answered by `onRun`; extraction programs are recorded and answered ok
// unless `onSetup` says otherwise.

import fsp from "node:fs/promises";
import os from "node:os";
import { dirname, join } from "node:path";
import type {
  CallOptions,
  ExecutionResult,
  RemoteChannel,
  RemoteContext,
} from "../remote-channel";
import { okResult } from "../remote-channel";
import type { LogEntry, LogSink } from "../logger";
import { StructuredLogger } from "../logger";

export type RunHandler = (
  context: RemoteContext,
  code: string,
) => Promise<ExecutionResult> | ExecutionResult;

export function isSetupCode(code: string): boolean {
  return code.includes("_cellsync_apply(");
}

export function isCleanupCode(code: string): boolean {
  return code.includes("_cellsync_cleanup(");
}

export class FakeChannel implements RemoteChannel {
  created: RemoteContext[] = [];
  destroyed: string[] = [];
  userRuns: { contextId: string; code: string }[] = [];
  setupRuns: { contextId: string; code: string }[] = [];
  cleanupRuns: { contextId: string; code: string }[] = [];
  uploads: { path: string; bytes: Uint8Array }[] = [];
  removed: string[] = [];

  onRun: RunHandler = () => okResult([{ kind: "stdout", text: "ok" }]);
  onSetup: RunHandler = () => okResult();
  onCreate: (clusterId: string, opts: CallOptions) => Promise<void> | void = () => {};
  onDestroy: (context: RemoteContext) => Promise<void> | void = () => {};
  onUpload: (remotePath: string, opts: CallOptions) => Promise<void> | void = () => {};
  onRemove: (remotePath: string, opts: CallOptions) => Promise<void> | void = () => {};

  private next = 0;

  async createContext(
    clusterId: string,
    opts: CallOptions = {},
  ): Promise<RemoteContext> {
    await this.onCreate(clusterId, opts);
    const context = { clusterId, contextId: `ctx-${++this.next}` };
    this.created.push(context);
    return context;
  }

  async run(context: RemoteContext, code: string): Promise<ExecutionResult> {
    const entry = { contextId: context.contextId, code };
    if (isSetupCode(code)) {
      this.setupRuns.push(entry);
      return this.onSetup(context, code);
    }
    if (isCleanupCode(code)) {
      this.cleanupRuns.push(entry);
      return okResult();
    }
    this.userRuns.push(entry);
    return this.onRun(context, code);
  }

  async upload(
    bytes: Uint8Array,
    remotePath: string,
    opts: CallOptions = {},
  ): Promise<void> {
    await this.onUpload(remotePath, opts);
    this.uploads.push({ path: remotePath, bytes });
  }

  async remove(remotePath: string, opts: CallOptions = {}): Promise<void> {
    this.removed.push(remotePath);
    await this.onRemove(remotePath, opts);
  }

  async destroyContext(context: RemoteContext): Promise<void> {
    this.destroyed.push(context.contextId);
    await this.onDestroy(context);
  }

  async workspaceRoot(): Promise<string> {
    return "/Workspace/Users/dev_example.com/cellsync";
  }
}

// Logger that keeps every entry for assertions.
export function captureLogger(): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry) => {
    entries.push(entry);
  };
  return { logger: new StructuredLogger({ sink }), entries };
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), `cellsync-${prefix}-`));
}

export async function writeFiles(
  root: string,
  files: Record<string, string | Buffer>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, ...rel.split("/"));
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}

// Removed-path list embedded in an extraction program.
export function removedInSetup(code: string): string[] {
  const m = /_cellsync_apply\((".*?"), (None|".*?"), (\[.*?\]), (True|False)\)/.exec(code);
  if (!m) throw new Error("not an extraction program");
  const parsed: unknown = JSON.parse(m[3]);
  if (!Array.isArray(parsed)) throw new Error("removed list is not an array");
  return parsed.map(String);
}

export function setupIsClean(code: string): boolean {
  return /_cellsync_apply\(.*, True\)\n/.test(code);
}
