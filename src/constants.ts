// src/constants.ts

export const CLI_NAME = "cellsync";

// Local metadata directory, always excluded from sync.
export const METADATA_DIR = ".cellsync";

export const CONFIG_FILE = "config.json";

export const IGNORE_FILE = ".gitignore";

// Remote staging area (DBFS) and per-user workspace directory name.
export const STAGING_ROOT = "/tmp/cellsync";
export const STAGING_ARCHIVE = "project.zip";
export const WORKSPACE_DIR_NAME = "cellsync";

export const CONTEXT_CREATION_TIMEOUT_MS = 5 * 60_000;
export const COMMAND_EXECUTION_TIMEOUT_MS = 10 * 60_000;
export const RECONNECT_DELAY_MS = 1_000;
// archive upload to staging
export const UPLOAD_TIMEOUT_MS = 5 * 60_000;
// short remote calls: staging deletes, workspace lookup, context teardown
export const TEARDOWN_TIMEOUT_MS = 30_000;

export const MEGABYTE = 1024 * 1024;
