// src/scan.ts
import * as walk from "@nodelib/fs.walk";
import { lstatSync } from "node:fs";
import { stat } from "node:fs/promises";
import { fileDigest } from "./hash.js";
import type { Ignorer } from "./ignore.js";
import type { Manifest } from "./manifest.js";
import { toRel } from "./path-rel.js";
import type { Logger } from "./logger.js";
import {
  ConfigurationError,
  SizeLimitExceededError,
  errnoCode,
} from "./errors.js";
import { formatBytes, mapLimit } from "./util.js";
import { MEGABYTE } from "./constants.js";

const WALK_CONCURRENCY = 64;
const HASH_CONCURRENCY = 16;

export type SizeLimits = {
  maxFileBytes?: number;
  maxTotalBytes?: number;
};

export type SyncPlan = {
  added: string[];
  modified: string[];
  removed: string[];
  bytes: number; // total size of added + modified
};

export type ScanResult = {
  plan: SyncPlan;
  // every included file with its fresh hash; persisted only after the
  // remote side confirms extraction
  candidate: Manifest;
  totalBytes: number;
};

export interface ScanOptions {
  root: string;
  ignorer: Ignorer;
  previous: Manifest;
  limits?: SizeLimits;
  logger?: Logger;
  hashConcurrency?: number;
}

type Found = { rel: string; abs: string; size: number };

export function limitsFromMegabytes(
  maxSizeMb?: number,
  maxFileSizeMb?: number,
): SizeLimits {
  return {
    maxTotalBytes: maxSizeMb != null ? Math.floor(maxSizeMb * MEGABYTE) : undefined,
    maxFileBytes:
      maxFileSizeMb != null ? Math.floor(maxFileSizeMb * MEGABYTE) : undefined,
  };
}

export function isEmptyPlan(plan: SyncPlan): boolean {
  return !plan.added.length && !plan.modified.length && !plan.removed.length;
}

export function emptyPlan(): SyncPlan {
  return { added: [], modified: [], removed: [], bytes: 0 };
}

async function assertDirectory(root: string) {
  try {
    const st = await stat(root);
    if (st.isDirectory()) return;
  } catch {
    // fall through
  }
  throw new ConfigurationError([`sync source ${root} is not a directory`]);
}

// The walk stream of fs.walk 1.x ends but never closes, so it is read
// through its events rather than async iteration. A throwing onEntry
// stops the walk and rejects.
function consumeWalk(
  root: string,
  options: walk.Options,
  onEntry: (entry: walk.Entry) => void,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const stream = walk.walkStream(root, options);
    let settled = false;
    const fail = (err: unknown) => {
      if (settled) return;
      settled = true;
      stream.destroy();
      reject(err);
    };
    stream.on("data", (entry: walk.Entry) => {
      if (settled) return;
      try {
        onEntry(entry);
      } catch (err) {
        fail(err);
      }
    });
    stream.once("error", fail);
    stream.once("end", () => {
      if (settled) return;
      settled = true;
      resolve();
    });
  });
}

/**
 * Walk the source tree, enforcing size limits as files are discovered,
 * then hash what was found and diff it against the previous manifest.
 * Excluded directories are never descended into.
 */
export async function scanTree({
  root,
  ignorer,
  previous,
  limits = {},
  logger,
  hashConcurrency = HASH_CONCURRENCY,
}: ScanOptions): Promise<ScanResult> {
  const t0 = Date.now();
  await assertDirectory(root);

  const found: Found[] = [];
  let totalBytes = 0;
  await consumeWalk(
    root,
    {
      stats: true,
      followSymbolicLinks: false,
      concurrency: WALK_CONCURRENCY,
      // Do not descend into excluded directories
      deepFilter: (e) => !ignorer.ignoresDir(toRel(e.path, root)),
      entryFilter: (e) => {
        if (!e.dirent.isFile()) {
          if (e.dirent.isSymbolicLink()) {
            logger?.debug("skipping symlink", { path: toRel(e.path, root) });
          }
          return false;
        }
        return !ignorer.ignoresFile(toRel(e.path, root));
      },
      // vanished or unreadable entries are skipped, not fatal
      errorFilter: (error) => {
        logger?.warn("skipping unreadable path", {
          path: error.path,
          code: error.code,
        });
        return true;
      },
    },
    (entry) => {
      const rel = toRel(entry.path, root);
      const size = entry.stats?.size ?? lstatSync(entry.path).size;
      if (limits.maxFileBytes != null && size > limits.maxFileBytes) {
        throw new SizeLimitExceededError(
          `${rel} is ${formatBytes(size)}, over the per-file limit of ${formatBytes(limits.maxFileBytes)}; exclude it or raise sync.maxFileSizeMb`,
          limits.maxFileBytes,
          size,
          rel,
        );
      }
      totalBytes += size;
      if (limits.maxTotalBytes != null && totalBytes > limits.maxTotalBytes) {
        throw new SizeLimitExceededError(
          `included files exceed the total limit of ${formatBytes(limits.maxTotalBytes)} (at least ${formatBytes(totalBytes)}); add exclusions or raise sync.maxSizeMb`,
          limits.maxTotalBytes,
          totalBytes,
        );
      }
      found.push({ rel, abs: entry.path, size });
    },
  );

  found.sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0));

  const hashes = await mapLimit(found, hashConcurrency, async (f) => {
    try {
      return await fileDigest(f.abs, f.size);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        logger?.debug("file vanished before hashing", { path: f.rel });
        return null;
      }
      throw err;
    }
  });

  const candidate: Manifest = new Map();
  const plan = emptyPlan();
  found.forEach((f, i) => {
    const hash = hashes[i];
    if (hash == null) return;
    candidate.set(f.rel, { hash, size: f.size });
    const prev = previous.get(f.rel);
    if (!prev) {
      plan.added.push(f.rel);
      plan.bytes += f.size;
    } else if (prev.hash !== hash) {
      plan.modified.push(f.rel);
      plan.bytes += f.size;
    }
  });
  for (const rel of previous.keys()) {
    if (!candidate.has(rel)) plan.removed.push(rel);
  }
  plan.removed.sort();

  logger?.debug("scan complete", {
    root,
    files: candidate.size,
    added: plan.added.length,
    modified: plan.modified.length,
    removed: plan.removed.length,
    ms: Date.now() - t0,
  });
  return { plan, candidate, totalBytes };
}
