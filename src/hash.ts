// src/hash.ts
import { createHash, type Hash } from "node:crypto";
import { createReadStream } from "node:fs";
import { readFile } from "node:fs/promises";

/** Content hash used by the manifest; digests are base64 strings. */
export const HASH_ALG = "sha256";

// Files up to this size are read whole; larger ones are streamed.
const WHOLE_READ_LIMIT = 8 * 1024 * 1024;

const newHash = (): Hash => createHash(HASH_ALG);

export function bufferDigest(data: Uint8Array | string): string {
  return newHash().update(data).digest("base64");
}

export async function fileDigest(file: string, size?: number): Promise<string> {
  if (size !== undefined && size <= WHOLE_READ_LIMIT) {
    return bufferDigest(await readFile(file));
  }
  const hash = newHash();
  for await (const chunk of createReadStream(file, { highWaterMark: 1 << 20 })) {
    hash.update(chunk);
  }
  return hash.digest("base64");
}
