// src/remote-channel.ts
//
// Transport seam between the session core and the cloud execution API.

export type RichPayload =
  | { type: "image"; mimeType: string; base64: string }
  | { type: "table"; columns: string[]; rows: unknown[][] };

export type OutputChunk =
  | { kind: "stdout"; text: string }
  | { kind: "stderr"; text: string }
  | { kind: "rich"; payload: RichPayload }
  | { kind: "error"; name: string; message: string; traceback: string[] };

export type ExecutionStatus = "ok" | "error" | "timeout";

export interface ExecutionResult {
  status: ExecutionStatus;
  chunks: OutputChunk[];
  // true when the remote context had to be recreated to produce this result
  reconnected: boolean;
}

export interface RemoteContext {
  clusterId: string;
  contextId: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface RemoteChannel {
  // Allocate a context on the cluster and resolve once it is ready.
  createContext(clusterId: string, opts?: CallOptions): Promise<RemoteContext>;
  run(
    context: RemoteContext,
    code: string,
    opts?: CallOptions,
  ): Promise<ExecutionResult>;
  upload(bytes: Uint8Array, remotePath: string, opts?: CallOptions): Promise<void>;
  // Recursive delete of a staging path.
  remove(remotePath: string, opts?: CallOptions): Promise<void>;
  destroyContext(context: RemoteContext, opts?: CallOptions): Promise<void>;
  // Per-user directory under which session workspaces are created.
  workspaceRoot(opts?: CallOptions): Promise<string>;
}

export function okResult(chunks: OutputChunk[] = []): ExecutionResult {
  return { status: "ok", chunks, reconnected: false };
}

export function errorResult(
  name: string,
  message: string,
  traceback: string[] = [],
): ExecutionResult {
  return {
    status: "error",
    chunks: [{ kind: "error", name, message, traceback }],
    reconnected: false,
  };
}

// Text of every error chunk, for classification and reporting.
export function errorText(result: ExecutionResult): string {
  return result.chunks
    .map((c) =>
      c.kind === "error"
        ? [`${c.name}: ${c.message}`, ...c.traceback].join("\n")
        : "",
    )
    .filter(Boolean)
    .join("\n");
}
