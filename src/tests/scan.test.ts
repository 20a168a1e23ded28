// tests/scan.test.ts
//
// Change detection against a previous manifest, exclusion pruning and
// size limits.

import fsp from "node:fs/promises";
import { join } from "node:path";
import { createIgnorer } from "../ignore";
import type { Manifest } from "../manifest";
import { isEmptyPlan, limitsFromMegabytes, scanTree } from "../scan";
import { bufferDigest } from "../hash";
import { ConfigurationError, SizeLimitExceededError } from "../errors";
import { mkTmp, writeFiles } from "./fake-channel";

describe("scanTree", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("scan");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  const scan = (previous: Manifest = new Map(), patterns: string[] = []) =>
    scanTree({ root: tmp, ignorer: createIgnorer(patterns), previous });

  test("first scan reports every file as added, sorted", async () => {
    await writeFiles(tmp, { "b.py": "bb", "a.py": "a", "pkg/mod.py": "mod" });
    const { plan, candidate, totalBytes } = await scan();
    expect(plan.added).toEqual(["a.py", "b.py", "pkg/mod.py"]);
    expect(plan.modified).toEqual([]);
    expect(plan.removed).toEqual([]);
    expect(plan.bytes).toBe(6);
    expect(totalBytes).toBe(6);
    expect(candidate.get("a.py")).toEqual({ hash: bufferDigest("a"), size: 1 });
  });

  test("walks deep and empty trees to completion", async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 40; i++) files[`d${i % 4}/sub${i % 3}/f${i}.py`] = "x";
    await writeFiles(tmp, files);
    await fsp.mkdir(join(tmp, "empty", "deeper"), { recursive: true });
    const { candidate } = await scan();
    expect(candidate.size).toBe(40);

    const bare = await mkTmp("scan-bare");
    const none = await scanTree({ root: bare, ignorer: createIgnorer(), previous: new Map() });
    expect(none.candidate.size).toBe(0);
    await fsp.rm(bare, { recursive: true, force: true });
  });

  test("a failed scan can be followed by a full one", async () => {
    await writeFiles(tmp, { "a.py": "a", "big.bin": Buffer.alloc(4096) });
    await expect(
      scanTree({
        root: tmp,
        ignorer: createIgnorer(),
        previous: new Map(),
        limits: { maxFileBytes: 1024 },
      }),
    ).rejects.toBeInstanceOf(SizeLimitExceededError);
    const { plan } = await scan();
    expect(plan.added).toEqual(["a.py", "big.bin"]);
  });

  test("unchanged tree yields an empty plan", async () => {
    await writeFiles(tmp, { "a.py": "print(1)\n" });
    const first = await scan();
    const second = await scan(first.candidate);
    expect(isEmptyPlan(second.plan)).toBe(true);
    expect(second.plan.bytes).toBe(0);
  });

  test("classifies modified and removed paths", async () => {
    await writeFiles(tmp, { "a.py": "one", "b.py": "two", "c/d.py": "three" });
    const first = await scan();
    await writeFiles(tmp, { "a.py": "one!" });
    await fsp.rm(join(tmp, "c"), { recursive: true });
    const { plan } = await scan(first.candidate);
    expect(plan.added).toEqual([]);
    expect(plan.modified).toEqual(["a.py"]);
    expect(plan.removed).toEqual(["c/d.py"]);
    expect(plan.bytes).toBe(4);
  });

  test("a touched file with identical content is unchanged", async () => {
    await writeFiles(tmp, { "a.py": "same" });
    const first = await scan();
    await writeFiles(tmp, { "a.py": "same" });
    expect(isEmptyPlan((await scan(first.candidate)).plan)).toBe(true);
  });

  test("newly excluded paths count as removed", async () => {
    await writeFiles(tmp, { "a.py": "a", "out.log": "log" });
    const first = await scan();
    const { plan, candidate } = await scan(first.candidate, ["*.log"]);
    expect(plan.removed).toEqual(["out.log"]);
    expect(candidate.has("out.log")).toBe(false);
  });

  test("excluded directories and the metadata directory are skipped", async () => {
    await writeFiles(tmp, {
      "main.py": "x",
      "node_modules/lib/index.js": "y",
      ".cellsync/config.json": "{}",
    });
    const { plan } = await scan(new Map(), ["node_modules/"]);
    expect(plan.added).toEqual(["main.py"]);
  });

  test("symlinks are not synced", async () => {
    await writeFiles(tmp, { "real.py": "r" });
    await fsp.symlink(join(tmp, "real.py"), join(tmp, "link.py"));
    const { plan } = await scan();
    expect(plan.added).toEqual(["real.py"]);
  });

  test("a file over the per-file limit fails the scan", async () => {
    await writeFiles(tmp, { "small.py": "x", "big.bin": Buffer.alloc(2048) });
    const err = await scanTree({
      root: tmp,
      ignorer: createIgnorer(),
      previous: new Map(),
      limits: { maxFileBytes: 1024 },
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SizeLimitExceededError);
    if (!(err instanceof SizeLimitExceededError)) return;
    expect(err.path).toBe("big.bin");
    expect(err.actualBytes).toBe(2048);
    expect(err.limitBytes).toBe(1024);
  });

  test("an aggregate over the total limit fails the scan", async () => {
    await writeFiles(tmp, {
      "a.bin": Buffer.alloc(600),
      "b.bin": Buffer.alloc(600),
    });
    await expect(
      scanTree({
        root: tmp,
        ignorer: createIgnorer(),
        previous: new Map(),
        limits: { maxTotalBytes: 1000 },
      }),
    ).rejects.toBeInstanceOf(SizeLimitExceededError);
  });

  test("excluded files do not count toward limits", async () => {
    await writeFiles(tmp, { "a.py": "a", "data.bin": Buffer.alloc(4096) });
    const { plan } = await scanTree({
      root: tmp,
      ignorer: createIgnorer(["*.bin"]),
      previous: new Map(),
      limits: { maxFileBytes: 1024, maxTotalBytes: 1024 },
    });
    expect(plan.added).toEqual(["a.py"]);
  });

  test("a missing source root is a configuration error", async () => {
    await expect(
      scanTree({
        root: join(tmp, "nope"),
        ignorer: createIgnorer(),
        previous: new Map(),
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("limitsFromMegabytes converts to bytes", () => {
    expect(limitsFromMegabytes(1, 0.5)).toEqual({
      maxTotalBytes: 1024 * 1024,
      maxFileBytes: 512 * 1024,
    });
    expect(limitsFromMegabytes()).toEqual({
      maxTotalBytes: undefined,
      maxFileBytes: undefined,
    });
  });
});
