// src/path-rel.ts
import { join, relative, sep } from "node:path";

/**
 * Manifest keys are root-relative and always use "/". The root itself
 * maps to "".
 */
export function toRel(abs: string, root: string): string {
  return relative(root, abs).split(sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel === "" ? root : join(root, ...rel.split("/"));
}

/** Accepts user-typed paths: backslashes become "/", leading "/" dropped. */
export function normalizeRel(input: string): string {
  return input.replace(/\\/g, "/").replace(/^\/+/, "");
}
