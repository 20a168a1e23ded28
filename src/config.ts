// src/config.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { CONFIG_FILE, METADATA_DIR } from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { errorMeta, type Logger } from "./logger.js";

const syncSchema = z
  .object({
    enabled: z.boolean().default(true),
    source: z.string().min(1).default("."),
    exclude: z.array(z.string()).default([]),
    maxSizeMb: z.number().optional(),
    maxFileSizeMb: z.number().optional(),
    useGitignore: z.boolean().default(true),
  })
  .strict();

const fileSchema = z
  .object({
    sync: syncSchema.default({}),
  })
  .passthrough();

export type SyncConfig = z.infer<typeof syncSchema>;

export interface Config {
  clusterId: string | null;
  host: string | null;
  token: string | null;
  profile: string;
  sync: SyncConfig;
  // project config file that was read, if any
  configFile: string | null;
  // problems found while reading the config file
  problems: string[];
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
  configPath?: string;
  logger?: Logger;
}

export function defaultSyncConfig(): SyncConfig {
  return syncSchema.parse({});
}

export function defaultConfigPath(cwd: string): string {
  return path.join(cwd, METADATA_DIR, CONFIG_FILE);
}

type IniProfiles = Record<string, Record<string, string>>;

// Minimal reader for ~/.databrickscfg: [profile] sections of key = value.
export function parseIniProfiles(text: string): IniProfiles {
  const out: IniProfiles = {};
  let section: Record<string, string> | null = null;
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith(";")) continue;
    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      const name = header[1].trim();
      section = out[name] ?? (out[name] = {});
      continue;
    }
    const eq = line.indexOf("=");
    if (eq <= 0 || !section) continue;
    section[line.slice(0, eq).trim().toLowerCase()] = line.slice(eq + 1).trim();
  }
  return out;
}

function readProfile(home: string, profile: string): Record<string, string> {
  let text: string;
  try {
    text = fs.readFileSync(path.join(home, ".databrickscfg"), "utf8");
  } catch {
    return {};
  }
  return parseIniProfiles(text)[profile] ?? {};
}

function readSyncFile(
  file: string,
  logger?: Logger,
): { sync: SyncConfig; problems: string[]; found: boolean } {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch {
    return { sync: defaultSyncConfig(), problems: [], found: false };
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    logger?.warn("config file is not valid JSON; using defaults", {
      file,
      ...errorMeta(err),
    });
    return { sync: defaultSyncConfig(), problems: [], found: true };
  }
  const parsed = fileSchema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${file}: ${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    return { sync: defaultSyncConfig(), problems, found: true };
  }
  return { sync: parsed.data.sync, problems: [], found: true };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Resolve configuration. The cluster id comes from DATABRICKS_CLUSTER_ID,
 * else from the active ~/.databrickscfg profile; host and token the same
 * way. Sync settings come from the project config file.
 */
export function loadConfig({
  cwd = process.cwd(),
  env = process.env,
  home = os.homedir(),
  configPath,
  logger,
}: LoadConfigOptions = {}): Config {
  const profileName = nonEmpty(env.DATABRICKS_CONFIG_PROFILE) ?? "DEFAULT";
  const profile = readProfile(home, profileName);
  const file = configPath ? path.resolve(cwd, configPath) : defaultConfigPath(cwd);
  const { sync, problems, found } = readSyncFile(file, logger);
  return {
    clusterId: nonEmpty(env.DATABRICKS_CLUSTER_ID) ?? nonEmpty(profile.cluster_id),
    host: nonEmpty(env.DATABRICKS_HOST) ?? nonEmpty(profile.host),
    token: nonEmpty(env.DATABRICKS_TOKEN) ?? nonEmpty(profile.token),
    profile: profileName,
    sync,
    configFile: found ? file : null,
    problems,
  };
}

export function validateConfig(config: Config): string[] {
  const errors = [...config.problems];
  if (!config.clusterId) {
    errors.push(
      "Cluster ID is not configured. Set DATABRICKS_CLUSTER_ID or add cluster_id to your ~/.databrickscfg profile.",
    );
  }
  const { maxSizeMb, maxFileSizeMb } = config.sync;
  if (maxSizeMb != null && !(maxSizeMb > 0)) {
    errors.push("sync.maxSizeMb must be a positive number.");
  }
  if (maxFileSizeMb != null && !(maxFileSizeMb > 0)) {
    errors.push("sync.maxFileSizeMb must be a positive number.");
  }
  return errors;
}

export type ValidConfig = Config & { clusterId: string };

export function requireValidConfig(config: Config): ValidConfig {
  const errors = validateConfig(config);
  if (errors.length || !config.clusterId) {
    throw new ConfigurationError(errors);
  }
  return { ...config, clusterId: config.clusterId };
}

export function resolveSourceRoot(sync: SyncConfig, cwd = process.cwd()): string {
  return path.resolve(cwd, sync.source);
}
