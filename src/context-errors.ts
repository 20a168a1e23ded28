// src/context-errors.ts
//
// The execution API reports a lost context as an ordinary error payload,
// not a typed fault, so loss is recognized from the error text. Keep these
// lists explicit; add a signature here when the API grows a new phrasing.

import type { ExecutionResult } from "./remote-channel.js";

// Phrases that only the API uses for a dead context. These are the only
// ones applied to a command's error result, whose text may come from user
// code.
export const RESULT_LOST_SIGNATURES: readonly RegExp[] = [
  /context\s*(not\s*found|does\s*not\s*exist|is\s*invalid|expired)/i,
  /invalid\s*context/i,
];

// Transport failures come from the API itself and may name the context
// more loosely.
export const CONTEXT_LOST_SIGNATURES: readonly RegExp[] = [
  ...RESULT_LOST_SIGNATURES,
  /\bcontext_id\b/i,
  /execution\s*context/i,
];

function matchesAny(text: string, signatures: readonly RegExp[]): boolean {
  // every signature mentions "context"
  if (!text.toLowerCase().includes("context")) return false;
  return signatures.some((re) => re.test(text));
}

export function isContextLostMessage(text: string): boolean {
  return matchesAny(text, CONTEXT_LOST_SIGNATURES);
}

export function isContextLostError(err: unknown): boolean {
  if (err instanceof Error) return isContextLostMessage(err.message);
  return typeof err === "string" && isContextLostMessage(err);
}

/**
 * Only the headline of the first error chunk is inspected, never the
 * traceback, so user code that mentions contexts is not mistaken for a
 * lost one.
 */
export function isContextLostResult(result: ExecutionResult): boolean {
  if (result.status !== "error") return false;
  const chunk = result.chunks.find((c) => c.kind === "error");
  if (!chunk || chunk.kind !== "error") return false;
  const headline = `${chunk.name}: ${chunk.message}`.split("\n")[0] ?? "";
  return matchesAny(headline, RESULT_LOST_SIGNATURES);
}
