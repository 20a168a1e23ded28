#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { Command } from "commander";
import { z } from "zod";
import { CLI_NAME } from "./constants.js";
import {
  loadConfig,
  requireValidConfig,
  resolveSourceRoot,
  validateConfig,
  type Config,
} from "./config.js";
import {
  ConfigurationError,
  RemoteExecutionError,
  isCellsyncError,
} from "./errors.js";
import { collectIgnoreOption, compileExclusions } from "./ignore.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import type { ExecutionResult } from "./remote-channel.js";
import { renderResult, renderTable } from "./render.js";
import { limitsFromMegabytes, scanTree, type ScanResult } from "./scan.js";
import { openSession, type SessionFacade } from "./session-facade.js";
import { formatBytes } from "./util.js";

type GlobalOpts = { logLevel?: string; config?: string };

// The user's code failed remotely vs. the tool could not proceed.
const EXIT_USER_FAILURE = 1;
const EXIT_FATAL = 2;

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function globalsOf(command: Command): { logger: Logger; configPath?: string } {
  const globals: GlobalOpts = command.optsWithGlobals();
  return {
    logger: new ConsoleLogger(parseLogLevel(globals.logLevel, "warn")),
    configPath: globals.config,
  };
}

function writeResult(result: ExecutionResult) {
  const { stdout, stderr } = renderResult(result);
  if (stderr) process.stderr.write(stderr);
  if (stdout) process.stdout.write(stdout);
}

/**
 * Execute one shell cell. Session errors other than configuration problems
 * are reported and the shell keeps going.
 */
export async function runCell(
  session: Pick<SessionFacade, "execute">,
  code: string,
  write: {
    result: (result: ExecutionResult) => void;
    error: (text: string) => void;
  } = { result: writeResult, error: (text) => process.stderr.write(text) },
): Promise<void> {
  try {
    write.result(await session.execute(code));
  } catch (err) {
    if (!isCellsyncError(err) || err.kind === "configuration") throw err;
    write.error(`${err.name}: ${err.message}\n`);
  }
}

async function withSession<T>(
  command: Command,
  fn: (session: SessionFacade) => Promise<T>,
): Promise<T> {
  const { logger, configPath } = globalsOf(command);
  const config = requireValidConfig(loadConfig({ configPath, logger }));
  const session = openSession(config, { logger });
  const stop = () => {
    void session.shutdown().finally(() => process.exit(130));
  };
  process.once("SIGINT", stop);
  try {
    return await fn(session);
  } finally {
    process.off("SIGINT", stop);
    await session.shutdown();
  }
}

async function readStdin(): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of process.stdin) {
    parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(parts).toString("utf8");
}

export async function planSync({
  config,
  cwd = process.cwd(),
  exclude = [],
  logger,
}: {
  config: Config;
  cwd?: string;
  exclude?: string[];
  logger?: Logger;
}): Promise<ScanResult> {
  const root = resolveSourceRoot(config.sync, cwd);
  const ignorer = await compileExclusions({
    root,
    useIgnoreFile: config.sync.useGitignore,
    patterns: [...config.sync.exclude, ...exclude],
    logger,
  });
  return scanTree({
    root,
    ignorer,
    previous: new Map(),
    limits: limitsFromMegabytes(config.sync.maxSizeMb, config.sync.maxFileSizeMb),
    logger,
  });
}

// Resolved settings as label/value pairs; the token is never shown.
export function describeConfig(config: Config, cwd = process.cwd()): [string, string][] {
  const { sync } = config;
  return [
    ["profile", config.profile],
    ["cluster id", config.clusterId ?? "-"],
    ["host", config.host ?? "-"],
    ["token", config.token ? "(set)" : "-"],
    ["config file", config.configFile ?? "-"],
    ["sync", sync.enabled ? "enabled" : "disabled"],
    ["source", resolveSourceRoot(sync, cwd)],
    ["exclude", sync.exclude.length ? sync.exclude.join(", ") : "-"],
    ["use .gitignore", String(sync.useGitignore)],
    ["max size", sync.maxSizeMb != null ? `${sync.maxSizeMb} MB` : "-"],
    ["max file size", sync.maxFileSizeMb != null ? `${sync.maxFileSizeMb} MB` : "-"],
  ];
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Run code on a Databricks cluster with your local files synced")
    .version(readVersion())
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "warn",
    )
    .option("--config <file>", "project config file (default .cellsync/config.json)");

  program
    .command("run")
    .description("sync local files and execute a file, -c code, or stdin")
    .argument("[file]", "python file to execute")
    .option("-c, --code <code>", "code to execute")
    .action(async (file: string | undefined, opts: { code?: string }, command: Command) => {
      const code =
        opts.code ?? (file ? fs.readFileSync(file, "utf8") : await readStdin());
      const failure = await withSession(command, async (session) => {
        const result = await session.execute(code);
        writeResult(result);
        return RemoteExecutionError.fromResult(result);
      });
      if (failure) process.exitCode = EXIT_USER_FAILURE;
    });

  program
    .command("shell")
    .description("interactive session; a blank line runs the cell")
    .action(async (_opts: unknown, command: Command) => {
      await withSession(command, async (session) => {
        const rl = readline.createInterface({
          input: process.stdin,
          output: process.stdout,
          terminal: process.stdin.isTTY,
        });
        let cell: string[] = [];
        const prompt = () => {
          rl.setPrompt(cell.length ? "... " : ">>> ");
          rl.prompt();
        };
        prompt();
        for await (const line of rl) {
          if (line.trim() || !cell.length) {
            if (line.trim()) cell.push(line);
            prompt();
            continue;
          }
          const code = cell.join("\n");
          cell = [];
          await runCell(session, code);
          prompt();
        }
        if (cell.length) {
          await runCell(session, cell.join("\n"));
        }
      });
    });

  program
    .command("plan")
    .description("show what a first sync would upload")
    .option("--json", "output JSON", false)
    .option(
      "--exclude <pattern>",
      "extra exclusion pattern (repeatable)",
      collectIgnoreOption,
      [],
    )
    .action(async (opts: { json: boolean; exclude: string[] }, command: Command) => {
      const { logger, configPath } = globalsOf(command);
      const config = loadConfig({ configPath, logger });
      if (config.problems.length) throw new ConfigurationError(config.problems);
      const { plan, candidate } = await planSync({
        config,
        exclude: opts.exclude,
        logger,
      });
      if (opts.json) {
        console.log(
          JSON.stringify(
            {
              files: plan.added.map((p) => ({ path: p, size: candidate.get(p)?.size ?? 0 })),
              bytes: plan.bytes,
            },
            null,
            2,
          ),
        );
        return;
      }
      if (!plan.added.length) {
        console.log("nothing to sync");
        return;
      }
      console.log(
        renderTable(
          ["Path", "Size"],
          plan.added.map((p) => [p, formatBytes(candidate.get(p)?.size ?? 0)]),
        ),
      );
      console.log(`${plan.added.length} files, ${formatBytes(plan.bytes)}`);
    });

  program
    .command("config")
    .description("show resolved configuration and validation problems")
    .action(async (_opts: unknown, command: Command) => {
      const { logger, configPath } = globalsOf(command);
      const config = loadConfig({ configPath, logger });
      console.log(renderTable(["Setting", "Value"], describeConfig(config)));
      const problems = validateConfig(config);
      for (const problem of problems) {
        console.error(`⚠️ ${problem}`);
      }
      if (problems.length) process.exitCode = 1;
    });

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  const program = buildProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (isCellsyncError(err)) {
      console.error(`${CLI_NAME}: ${err.message}`);
      process.exitCode = EXIT_FATAL;
      return;
    }
    throw err;
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`${CLI_NAME} fatal:`, err);
    process.exit(EXIT_FATAL);
  });
}
