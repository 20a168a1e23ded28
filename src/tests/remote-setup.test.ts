// tests/remote-setup.test.ts

import { cleanupProgram, dbfsUri, extractionProgram } from "../remote-setup";
import {
  deriveSessionPaths,
  getCellsyncHome,
  newSessionId,
  sanitizePathComponent,
  stagingArchivePath,
  stagingDir,
  userWorkspaceRoot,
  workspaceDir,
} from "../session-paths";
import fsp from "node:fs/promises";
import { join } from "node:path";
import { mkTmp } from "./fake-channel";

describe("remote programs", () => {
  test("extraction embeds its arguments as python literals", () => {
    const code = extractionProgram({
      workspaceDir: "/Workspace/Users/dev/cellsync/s1",
      archiveUri: "dbfs:/tmp/cellsync/s1/project.zip",
      removed: ["old.py", "it's.py"],
      clean: false,
    });
    expect(code).toContain(
      `_cellsync_apply("/Workspace/Users/dev/cellsync/s1", "dbfs:/tmp/cellsync/s1/project.zip", ["old.py","it's.py"], False)\n`,
    );
    expect(code).toContain("sys.path.insert(0, workspace)");
    expect(code).toContain("importlib.invalidate_caches()");
    expect(code.trimEnd().endsWith("del _cellsync_apply")).toBe(true);
  });

  test("removal-only extraction passes no archive and can wipe first", () => {
    const code = extractionProgram({
      workspaceDir: "/w",
      archiveUri: null,
      removed: [],
      clean: true,
    });
    expect(code).toContain(`_cellsync_apply("/w", None, [], True)\n`);
  });

  test("cleanup removes the workspace and its sys.path entry", () => {
    const code = cleanupProgram("/w/s1");
    expect(code).toContain(`_cellsync_cleanup("/w/s1")`);
    expect(code).toContain("shutil.rmtree(workspace, ignore_errors=True)");
  });

  test("dbfsUri prefixes the scheme", () => {
    expect(dbfsUri("/tmp/cellsync/s1/project.zip")).toBe(
      "dbfs:/tmp/cellsync/s1/project.zip",
    );
  });
});

describe("session paths", () => {
  test("remote paths are scoped by session", () => {
    expect(stagingDir("s1")).toBe("/tmp/cellsync/s1");
    expect(stagingArchivePath("s1")).toBe("/tmp/cellsync/s1/project.zip");
    expect(workspaceDir("/Workspace/Users/dev/cellsync", "s1")).toBe(
      "/Workspace/Users/dev/cellsync/s1",
    );
    expect(userWorkspaceRoot("dev@example.com")).toBe(
      "/Workspace/Users/dev@example.com/cellsync",
    );
  });

  test.each([
    ["user@example.com", "user@example.com"],
    ["../etc/passwd", "_etc_passwd"],
    ["a/b\\c", "a_b_c"],
    ["name with spaces", "name_with_spaces"],
    ["..", "unknown"],
    [". hidden .", "_hidden_"],
    ["", "unknown"],
  ])("sanitizePathComponent(%p) = %p", (input, expected) => {
    expect(sanitizePathComponent(input)).toBe(expected);
  });

  test("session ids are short and distinct", () => {
    const a = newSessionId();
    const b = newSessionId();
    expect(a).toMatch(/^[0-9a-f]{8}$/);
    expect(a).not.toBe(b);
  });

  test("local state lives under CELLSYNC_HOME", async () => {
    const tmp = await mkTmp("home");
    const home = getCellsyncHome({ CELLSYNC_HOME: join(tmp, "state") });
    expect(home).toBe(join(tmp, "state"));
    expect((await fsp.stat(home)).isDirectory()).toBe(true);
    expect(deriveSessionPaths("s1", home)).toEqual({
      dir: join(home, "sessions", "s1"),
      manifestDb: join(home, "sessions", "s1", "manifest.db"),
    });
    await fsp.rm(tmp, { recursive: true, force: true });
  });
});
