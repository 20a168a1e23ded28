// src/ignore.ts
import ignore from "ignore";
import path from "node:path";
import { readFile } from "node:fs/promises";
import { IGNORE_FILE, METADATA_DIR } from "./constants.js";
import { normalizeRel } from "./path-rel.js";
import { errorMeta, type Logger } from "./logger.js";
import { errnoCode } from "./errors.js";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // file path relative to the source root
  ignoresDir: (r: string) => boolean; // directory path relative to the source root
  rules: string[]; // compiled rules, in evaluation order
};

export interface ExclusionOptions {
  root: string;
  useIgnoreFile: boolean;
  patterns?: string[];
  logger?: Logger;
}

// The tool's own metadata directory is excluded before any other rule is
// consulted, so no negation can bring it back.
export const FIXED_RULE = `${METADATA_DIR}/`;

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

// Order is significant (last match wins), so duplicates are kept.
export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.push(cleaned);
  }
  return out;
}

export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

/**
 * Read gitignore-style rules from the ignore file at the source root.
 * Missing, unreadable or malformed files yield no rules.
 */
export async function readIgnoreFile(
  root: string,
  logger?: Logger,
): Promise<string[]> {
  const file = path.join(root, IGNORE_FILE);
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      logger?.warn("ignore file unreadable; continuing without it", {
        file,
        ...errorMeta(err),
      });
    }
    return [];
  }
  if (content.includes("\0")) {
    logger?.warn("ignore file is not text; continuing without it", { file });
    return [];
  }
  const rules = content
    .split(/\r?\n/)
    .filter((line) => line.trim() && !line.trimStart().startsWith("#"))
    .map((line) => line.trimEnd());
  try {
    ignore().add(rules);
  } catch (err) {
    logger?.warn("ignore file is malformed; continuing without it", {
      file,
      ...errorMeta(err),
    });
    return [];
  }
  return rules;
}

export function createIgnorer(patterns: string[] = []): Ignorer {
  const fixed = ignore({ allowRelativePaths: true }).add(FIXED_RULE);
  const rules = normalizeIgnorePatterns(patterns);
  const matcher = ignore({ allowRelativePaths: true }).add(rules);
  const test = (r: string, asDir: boolean) => {
    const rel = normalizeRel(r).replace(/\/+$/, "");
    if (!rel) return false;
    const probe = asDir ? `${rel}/` : rel;
    return fixed.ignores(probe) || matcher.ignores(probe);
  };
  return {
    ignoresFile: (r) => test(r, false),
    ignoresDir: (r) => test(r, true),
    rules: [FIXED_RULE, ...rules],
  };
}

/**
 * Compile the exclusion rule set for one sync pass: the fixed metadata
 * rule, then ignore-file rules in file order, then user patterns in
 * configuration order.
 */
export async function compileExclusions({
  root,
  useIgnoreFile,
  patterns = [],
  logger,
}: ExclusionOptions): Promise<Ignorer> {
  const fileRules = useIgnoreFile ? await readIgnoreFile(root, logger) : [];
  let userRules = normalizeIgnorePatterns(patterns);
  try {
    ignore().add(userRules);
  } catch (err) {
    logger?.warn("invalid exclude pattern dropped", errorMeta(err));
    userRules = userRules.filter((rule) => {
      try {
        ignore().add(rule);
        return true;
      } catch {
        return false;
      }
    });
  }
  const ignorer = createIgnorer([...fileRules, ...userRules]);
  logger?.debug("compiled exclusions", {
    root,
    ignoreFileRules: fileRules.length,
    userRules: userRules.length,
  });
  return ignorer;
}
