// src/manifest.ts
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type ManifestEntry = {
  hash: string; // base64 sha256 of the file contents
  size: number;
};

// relative path (forward slashes) -> entry
export type Manifest = Map<string, ManifestEntry>;

type ManifestRow = { path: string; hash: string; size: number };

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  "synchronous = FULL",
];

export function openManifestDb(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }
  db.exec(`
  CREATE TABLE IF NOT EXISTS manifest (
    root  TEXT NOT NULL,          -- absolute source root
    path  TEXT NOT NULL,          -- relative, forward slashes
    hash  TEXT NOT NULL,
    size  INTEGER NOT NULL,
    PRIMARY KEY (root, path)
  );
`);
  return db;
}

/**
 * Durable record of the files last confirmed extracted on the remote side,
 * for one source root. `replace` swaps the whole set in one transaction.
 */
export class ManifestStore {
  private readonly db: Database.Database;
  private closed = false;

  constructor(
    readonly dbPath: string,
    readonly root: string,
  ) {
    this.db = openManifestDb(dbPath);
  }

  load(): Manifest {
    const rows = this.db
      .prepare<[string], ManifestRow>(
        `SELECT path, hash, size FROM manifest WHERE root = ? ORDER BY path`,
      )
      .all(this.root);
    const manifest: Manifest = new Map();
    for (const row of rows) {
      manifest.set(row.path, { hash: row.hash, size: row.size });
    }
    return manifest;
  }

  replace(manifest: Manifest): void {
    const del = this.db.prepare<[string]>(`DELETE FROM manifest WHERE root = ?`);
    const ins = this.db.prepare<[string, string, string, number]>(
      `INSERT INTO manifest(root, path, hash, size) VALUES (?, ?, ?, ?)`,
    );
    const tx = this.db.transaction((entries: Manifest) => {
      del.run(this.root);
      for (const [path, { hash, size }] of entries) {
        ins.run(this.root, path, hash, size);
      }
    });
    tx(manifest);
  }

  clear(): void {
    this.replace(new Map());
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
