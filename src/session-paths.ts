// src/session-paths.ts
import fs from "node:fs";
import os from "node:os";
import { join, posix } from "node:path";
import { randomUUID } from "node:crypto";
import {
  CLI_NAME,
  STAGING_ARCHIVE,
  STAGING_ROOT,
  WORKSPACE_DIR_NAME,
} from "./constants.js";

// Local state home

export function getCellsyncHome(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.CELLSYNC_HOME?.trim();
  if (explicit) {
    return ensureDir(expandHome(explicit));
  }

  const xdg = env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return ensureDir(join(expandHome(xdg), CLI_NAME));
  }

  const home = os.homedir();
  if (process.platform === "darwin") {
    return ensureDir(join(home, "Library", "Application Support", CLI_NAME));
  }
  if (process.platform === "win32") {
    const appData = env.APPDATA || join(home, "AppData", "Roaming");
    return ensureDir(join(appData, CLI_NAME));
  }
  return ensureDir(join(home, ".local", "share", CLI_NAME));
}

function ensureDir(p: string): string {
  fs.mkdirSync(p, { recursive: true });
  return p;
}

function expandHome(p: string): string {
  if (p.startsWith("~")) {
    return join(os.homedir(), p.slice(1));
  }
  return p;
}

export function newSessionId(): string {
  return randomUUID().slice(0, 8);
}

export function sessionDir(sessionId: string, home = getCellsyncHome()): string {
  return join(home, "sessions", sessionId);
}

export function deriveSessionPaths(sessionId: string, home = getCellsyncHome()) {
  const dir = sessionDir(sessionId, home);
  return {
    dir,
    manifestDb: join(dir, "manifest.db"),
  };
}

// Remote paths. Everything a session writes lives under its id, so
// concurrent sessions never collide and cleanup is one prefix delete.

export function stagingDir(sessionId: string): string {
  return posix.join(STAGING_ROOT, sessionId);
}

export function stagingArchivePath(sessionId: string): string {
  return posix.join(stagingDir(sessionId), STAGING_ARCHIVE);
}

export function workspaceDir(workspaceRoot: string, sessionId: string): string {
  return posix.join(workspaceRoot, sessionId);
}

export function userWorkspaceRoot(userName: string): string {
  return posix.join(
    "/Workspace/Users",
    sanitizePathComponent(userName),
    WORKSPACE_DIR_NAME,
  );
}

/**
 * Make an arbitrary string (e.g. a user name from the API) safe as a
 * single path component: no traversal, no separators, no shell-special
 * characters.
 */
export function sanitizePathComponent(value: string): string {
  const sanitized = value
    .replace(/\.\./g, "")
    .replace(/[/\\]/g, "_")
    .replace(/[^a-zA-Z0-9._@-]/g, "_")
    .replace(/^[. ]+|[. ]+$/g, "");
  return sanitized || "unknown";
}
