// src/render.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { ExecutionResult, OutputChunk, RichPayload } from "./remote-channel.js";
import { formatBytes } from "./util.js";

export const RECONNECT_NOTICE = "Session reconnected. Variables have been reset.";

export type Rendered = { stdout: string; stderr: string };

function cell(v: unknown): string {
  if (v === null || v === undefined) return "null";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean" || typeof v === "bigint") {
    return String(v);
  }
  return JSON.stringify(v);
}

export function renderTable(columns: string[], rows: unknown[][]): string {
  const width = Math.max(columns.length, ...rows.map((r) => r.length));
  const heading = Array.from({ length: width }, (_, i) => columns[i] ?? `_${i}`);
  const table = new AsciiTable3().setHeading(...heading).setStyle("unicode-round");
  heading.forEach((_, idx) => table.setAlign(idx + 1, AlignmentEnum.LEFT));
  for (const row of rows) {
    table.addRow(...heading.map((_, i) => cell(row[i])));
  }
  return table.toString();
}

function renderRich(payload: RichPayload): string {
  if (payload.type === "table") {
    return renderTable(payload.columns, payload.rows);
  }
  const bytes = Buffer.byteLength(payload.base64, "base64");
  return `[image ${payload.mimeType}, ${formatBytes(bytes)}]\n`;
}

function renderChunk(chunk: OutputChunk, out: Rendered) {
  switch (chunk.kind) {
    case "stdout":
      out.stdout += withNewline(chunk.text);
      break;
    case "stderr":
      out.stderr += withNewline(chunk.text);
      break;
    case "rich":
      out.stdout += withNewline(renderRich(chunk.payload));
      break;
    case "error":
      out.stderr += withNewline(`${chunk.name}: ${chunk.message}`);
      for (const line of chunk.traceback) {
        out.stderr += withNewline(line);
      }
      break;
  }
}

function withNewline(text: string): string {
  return !text || text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Terminal text for a result: remote output on stdout, errors and the
 * reconnection notice on stderr.
 */
export function renderResult(result: ExecutionResult): Rendered {
  const out: Rendered = { stdout: "", stderr: "" };
  if (result.reconnected) {
    out.stderr += `${RECONNECT_NOTICE}\n`;
  }
  for (const chunk of result.chunks) {
    renderChunk(chunk, out);
  }
  return out;
}
