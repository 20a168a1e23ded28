// src/pack.ts
import JSZip from "jszip";
import { readFile } from "node:fs/promises";
import type { SyncPlan } from "./scan.js";
import { toAbs } from "./path-rel.js";
import { mapLimit } from "./util.js";

// Fixed entry timestamp so identical inputs produce identical archives.
export const ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

const READ_CONCURRENCY = 16;

export function packEntries(plan: SyncPlan): string[] {
  return [...plan.added, ...plan.modified].sort();
}

/**
 * Build one zip archive holding the current bytes of every added or
 * modified path, named relative to the source root and ordered
 * lexicographically. Removed paths are not represented in the archive.
 */
export async function packFiles(root: string, plan: SyncPlan): Promise<Buffer> {
  const entries = packEntries(plan);
  const contents = await mapLimit(entries, READ_CONCURRENCY, (rel) =>
    readFile(toAbs(rel, root)),
  );
  const zip = new JSZip();
  entries.forEach((rel, i) => {
    zip.file(rel, contents[i], {
      binary: true,
      date: ENTRY_DATE,
      createFolders: false,
    });
  });
  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
    platform: "UNIX",
  });
}

export async function listArchive(archive: Uint8Array): Promise<string[]> {
  const zip = await JSZip.loadAsync(archive);
  return Object.keys(zip.files);
}
