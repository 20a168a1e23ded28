// src/databricks.ts
//
// RemoteChannel over the Databricks REST API: Command Execution 1.2 for
// contexts and commands, DBFS 2.0 for staging, SCIM Me for the user name.

import path from "node:path";
import { z } from "zod";
import { TransportError, errorMessage } from "./errors.js";
import { childOrNull, errorMeta, type Logger } from "./logger.js";
import type {
  CallOptions,
  ExecutionResult,
  OutputChunk,
  RemoteChannel,
  RemoteContext,
} from "./remote-channel.js";
import { userWorkspaceRoot } from "./session-paths.js";
import { wait } from "./util.js";

const DEFAULT_POLL_INTERVAL_MS = 1_000;
// DBFS add-block and read accept at most 1MB per call.
const DBFS_BLOCK_BYTES = 1024 * 1024;

const MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  svg: "image/svg+xml",
  webp: "image/webp",
};

const idResponse = z.object({ id: z.string() });

const contextStatusResponse = z.object({
  id: z.string().optional(),
  status: z.string(),
});

const commandResults = z
  .object({
    resultType: z.string().optional(),
    data: z.unknown().optional(),
    cause: z.string().optional(),
    summary: z.string().optional(),
    schema: z.array(z.object({ name: z.string() }).passthrough()).optional(),
    fileName: z.string().optional(),
    fileNames: z.array(z.string()).optional(),
  })
  .passthrough();

const commandStatusResponse = z.object({
  id: z.string().optional(),
  status: z.string(),
  results: commandResults.nullish(),
});

type CommandResults = z.infer<typeof commandResults>;

const handleResponse = z.object({ handle: z.number() });

const readResponse = z.object({
  bytes_read: z.number(),
  data: z.string().default(""),
});

const meResponse = z.object({ userName: z.string() });

const apiError = z
  .object({
    error_code: z.string().optional(),
    message: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface DatabricksChannelOptions {
  host: string;
  token: string;
  logger?: Logger;
  fetch?: FetchLike;
  pollIntervalMs?: number;
}

export class DatabricksChannel implements RemoteChannel {
  private readonly base: string;
  private readonly token: string;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly pollIntervalMs: number;
  private root: string | null = null;

  constructor({
    host,
    token,
    logger,
    fetch: fetchImpl = fetch,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
  }: DatabricksChannelOptions) {
    const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
    this.base = withScheme.replace(/\/+$/, "");
    this.token = token;
    this.logger = childOrNull(logger, "databricks");
    this.fetchImpl = fetchImpl;
    this.pollIntervalMs = pollIntervalMs;
  }

  private async request<T extends z.ZodTypeAny>(
    method: "GET" | "POST",
    endpoint: string,
    schema: T,
    {
      body,
      query,
      signal,
    }: {
      body?: Record<string, unknown>;
      query?: Record<string, string | number>;
      signal?: AbortSignal;
    } = {},
  ): Promise<z.infer<T>> {
    let url = `${this.base}${endpoint}`;
    if (query) {
      const params = new URLSearchParams();
      for (const [k, v] of Object.entries(query)) params.set(k, String(v));
      url += `?${params.toString()}`;
    }
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
        },
        body: body ? JSON.stringify(body) : undefined,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new TransportError(`${method} ${endpoint} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const text = await res.text();
    if (!res.ok) {
      throw httpError(method, endpoint, res.status, text);
    }
    let data: unknown = {};
    if (text.trim()) {
      try {
        data = JSON.parse(text);
      } catch (err) {
        throw new TransportError(`${method} ${endpoint}: response is not JSON`, {
          status: res.status,
          cause: err,
        });
      }
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(
        `${method} ${endpoint}: unexpected response: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
          .join("; ")}`,
        { status: res.status },
      );
    }
    return parsed.data;
  }

  private async poll(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await wait(this.pollIntervalMs);
    signal?.throwIfAborted();
  }

  async createContext(
    clusterId: string,
    { signal }: CallOptions = {},
  ): Promise<RemoteContext> {
    const { id } = await this.request("POST", "/api/1.2/contexts/create", idResponse, {
      body: { clusterId, language: "python" },
      signal,
    });
    this.logger.debug("context requested", { clusterId, contextId: id });
    for (;;) {
      const { status } = await this.request(
        "GET",
        "/api/1.2/contexts/status",
        contextStatusResponse,
        { query: { clusterId, contextId: id }, signal },
      );
      if (status === "Running") {
        return { clusterId, contextId: id };
      }
      if (status === "Error") {
        throw new TransportError(`execution context ${id} failed to start`);
      }
      await this.poll(signal);
    }
  }

  async run(
    context: RemoteContext,
    code: string,
    { signal }: CallOptions = {},
  ): Promise<ExecutionResult> {
    const { clusterId, contextId } = context;
    const { id } = await this.request("POST", "/api/1.2/commands/execute", idResponse, {
      body: { clusterId, contextId, language: "python", command: code },
      signal,
    });
    for (;;) {
      const res = await this.request(
        "GET",
        "/api/1.2/commands/status",
        commandStatusResponse,
        { query: { clusterId, contextId, commandId: id }, signal },
      );
      if (res.status === "Finished" || res.status === "Error") {
        return this.toResult(res.results ?? null);
      }
      if (res.status === "Cancelled") {
        return {
          status: "error",
          chunks: [
            {
              kind: "error",
              name: "Cancelled",
              message: res.results?.cause ?? "command was cancelled",
              traceback: [],
            },
          ],
          reconnected: false,
        };
      }
      await this.poll(signal);
    }
  }

  private async toResult(results: CommandResults | null): Promise<ExecutionResult> {
    if (!results) return { status: "ok", chunks: [], reconnected: false };
    if (results.cause) {
      return {
        status: "error",
        chunks: [errorChunk(results.cause, results.summary)],
        reconnected: false,
      };
    }
    const chunks: OutputChunk[] = [];
    switch (results.resultType) {
      case "image":
      case "images": {
        const refs = results.fileNames ?? (results.fileName ? [results.fileName] : []);
        for (const ref of refs) {
          const image = await this.loadImage(ref);
          if (image) chunks.push({ kind: "rich", payload: image });
        }
        break;
      }
      case "table": {
        const columns = (results.schema ?? []).map((c) => c.name);
        const rows = Array.isArray(results.data)
          ? results.data.map((row: unknown) => (Array.isArray(row) ? row : [row]))
          : [];
        chunks.push({ kind: "rich", payload: { type: "table", columns, rows } });
        break;
      }
      default: {
        if (results.data != null) {
          const text = typeof results.data === "string"
            ? results.data
            : JSON.stringify(results.data);
          if (text) chunks.push({ kind: "stdout", text });
        } else if (results.summary) {
          chunks.push({ kind: "stdout", text: results.summary });
        }
      }
    }
    return { status: "ok", chunks, reconnected: false };
  }

  // Images come back as data URLs or as FileStore paths; a failed download
  // drops the image with a warning rather than failing the command.
  private async loadImage(
    ref: string,
  ): Promise<{ type: "image"; mimeType: string; base64: string } | null> {
    const dataUrl = /^data:([^;,]+);base64,(.*)$/s.exec(ref);
    if (dataUrl) {
      return { type: "image", mimeType: dataUrl[1], base64: dataUrl[2] };
    }
    const fullPath = `/FileStore${ref.startsWith("/") ? ref : `/${ref}`}`;
    try {
      const bytes = await this.readFile(fullPath);
      return {
        type: "image",
        mimeType: mimeTypeFor(ref),
        base64: bytes.toString("base64"),
      };
    } catch (err) {
      this.logger.warn("could not download image", { path: fullPath, ...errorMeta(err) });
      return null;
    }
  }

  async readFile(dbfsPath: string): Promise<Buffer> {
    const parts: Buffer[] = [];
    let offset = 0;
    for (;;) {
      const { bytes_read, data } = await this.request("GET", "/api/2.0/dbfs/read", readResponse, {
        query: { path: dbfsPath, offset, length: DBFS_BLOCK_BYTES },
      });
      if (bytes_read <= 0) break;
      parts.push(Buffer.from(data, "base64"));
      offset += bytes_read;
      if (bytes_read < DBFS_BLOCK_BYTES) break;
    }
    return Buffer.concat(parts);
  }

  async upload(
    bytes: Uint8Array,
    remotePath: string,
    { signal }: CallOptions = {},
  ): Promise<void> {
    const { handle } = await this.request("POST", "/api/2.0/dbfs/create", handleResponse, {
      body: { path: remotePath, overwrite: true },
      signal,
    });
    const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    for (let start = 0; start < buf.length; start += DBFS_BLOCK_BYTES) {
      await this.request("POST", "/api/2.0/dbfs/add-block", z.unknown(), {
        body: {
          handle,
          data: buf.subarray(start, start + DBFS_BLOCK_BYTES).toString("base64"),
        },
        signal,
      });
    }
    await this.request("POST", "/api/2.0/dbfs/close", z.unknown(), {
      body: { handle },
      signal,
    });
    this.logger.debug("uploaded", { path: remotePath, bytes: buf.length });
  }

  async remove(remotePath: string, { signal }: CallOptions = {}): Promise<void> {
    await this.request("POST", "/api/2.0/dbfs/delete", z.unknown(), {
      body: { path: remotePath, recursive: true },
      signal,
    });
  }

  async destroyContext(
    context: RemoteContext,
    { signal }: CallOptions = {},
  ): Promise<void> {
    await this.request("POST", "/api/1.2/contexts/destroy", z.unknown(), {
      body: { clusterId: context.clusterId, contextId: context.contextId },
      signal,
    });
  }

  async workspaceRoot({ signal }: CallOptions = {}): Promise<string> {
    if (this.root == null) {
      const { userName } = await this.request(
        "GET",
        "/api/2.0/preview/scim/v2/Me",
        meResponse,
        { signal },
      );
      this.root = userWorkspaceRoot(userName);
    }
    return this.root;
  }
}

function httpError(
  method: string,
  endpoint: string,
  status: number,
  text: string,
): TransportError {
  let errorCode: string | undefined;
  let message = text.trim() || `HTTP ${status}`;
  try {
    const parsed = apiError.safeParse(JSON.parse(text));
    if (parsed.success) {
      errorCode = parsed.data.error_code;
      message = parsed.data.message ?? parsed.data.error ?? message;
    }
  } catch {
    // not JSON; keep the raw body
  }
  const detail = errorCode ? `${errorCode}: ${message}` : message;
  return new TransportError(`${method} ${endpoint} (${status}) ${detail}`, {
    status,
    errorCode,
  });
}

/**
 * Split a remote `cause` such as "NameError: name 'x' is not defined"
 * into an exception name and message. The summary carries the traceback.
 */
export function errorChunk(cause: string, summary?: string): OutputChunk {
  const firstLine = cause.trim().split("\n")[0] ?? "";
  const m = /^([A-Za-z_][\w.]*(?:Error|Exception|Exit|Interrupt|Warning)):\s*(.*)$/.exec(
    firstLine,
  );
  const name = m ? m[1] : "Error";
  const message = m ? m[2] : cause.trim();
  const traceback = summary ? summary.split("\n") : [];
  return { kind: "error", name, message, traceback };
}

export function mimeTypeFor(file: string): string {
  const ext = path.posix.extname(file).slice(1).toLowerCase();
  return MIME_TYPES[ext] ?? "image/png";
}
