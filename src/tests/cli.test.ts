// tests/cli.test.ts

import fsp from "node:fs/promises";
import { buildProgram, describeConfig, planSync, runCell } from "../cli";
import { ConfigurationError, TransportError } from "../errors";
import { okResult, type ExecutionResult } from "../remote-channel";
import { loadConfig } from "../config";
import { mkTmp, writeFiles } from "./fake-channel";

describe("cli", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkTmp("cli");
  });

  afterEach(async () => {
    await fsp.rm(cwd, { recursive: true, force: true });
  });

  test("registers the user-facing commands", () => {
    const program = buildProgram();
    expect(program.commands.map((c) => c.name())).toEqual([
      "run",
      "shell",
      "plan",
      "config",
    ]);
    expect(program.version()).toBe("0.1.0");
  });

  test("plan lists what a first sync would ship", async () => {
    await writeFiles(cwd, {
      ".gitignore": "*.log\n",
      "a.py": "print(1)\n",
      "run.log": "noise",
      "tmp/scratch.py": "x",
      ".cellsync/config.json": JSON.stringify({ sync: { exclude: ["tmp/"] } }),
    });
    const config = loadConfig({ cwd, home: cwd, env: {} });
    const { plan } = await planSync({ config, cwd, exclude: ["nothing-here"] });
    expect(plan.added).toEqual([".gitignore", "a.py"]);
    expect(plan.bytes).toBe(6 + 9);
  });

  test("describeConfig never shows the token", () => {
    const config = loadConfig({
      cwd,
      home: cwd,
      env: { DATABRICKS_CLUSTER_ID: "c-1", DATABRICKS_TOKEN: "test-secret" },
    });
    const rows = describeConfig(config, cwd);
    expect(rows).toContainEqual(["cluster id", "c-1"]);
    expect(rows).toContainEqual(["token", "(set)"]);
    expect(rows).toContainEqual(["source", cwd]);
    expect(rows.some(([, value]) => value.includes("test-secret"))).toBe(false);
  });

  test("a failing cell is reported and the shell carries on", async () => {
    const results: ExecutionResult[] = [];
    const errors: string[] = [];
    const write = {
      result: (r: ExecutionResult) => {
        results.push(r);
      },
      error: (text: string) => {
        errors.push(text);
      },
    };
    const failing = {
      execute: async (): Promise<ExecutionResult> => {
        throw new TransportError("staging removal timed out after 20 ms");
      },
    };
    await runCell(failing, "x = 1", write);
    expect(errors).toEqual(["TransportError: staging removal timed out after 20 ms\n"]);

    await runCell({ execute: async () => okResult() }, "x = 2", write);
    expect(results).toEqual([okResult()]);

    const misconfigured = {
      execute: async (): Promise<ExecutionResult> => {
        throw new ConfigurationError(["cluster id is not set"]);
      },
    };
    await expect(runCell(misconfigured, "x = 3", write)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});
