// src/remote-setup.ts
//
// Programs executed in the remote Python context to apply a sync and to
// clean up after a session. Values are embedded as JSON literals, which
// Python reads as str / list[str].

export interface ExtractionOptions {
  workspaceDir: string;
  // dbfs: URI of the uploaded archive; null when only removals are applied
  archiveUri: string | null;
  removed: string[];
  // wipe the workspace first (full re-sync)
  clean: boolean;
}

function py(value: string | string[] | null | boolean): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  return JSON.stringify(value);
}

export function extractionProgram({
  workspaceDir,
  archiveUri,
  removed,
  clean,
}: ExtractionOptions): string {
  return `
def _cellsync_apply(workspace, archive, removed, clean):
    import importlib
    import os
    import shutil
    import sys
    import zipfile

    if clean and os.path.isdir(workspace):
        shutil.rmtree(workspace)
    os.makedirs(workspace, exist_ok=True)
    root = os.path.realpath(workspace)

    if archive is not None:
        local = os.path.join(workspace, ".cellsync-upload.zip")
        dbutils.fs.cp(archive, "file:" + local)
        try:
            with zipfile.ZipFile(local) as zf:
                zf.extractall(workspace)
        finally:
            os.remove(local)

    for rel in removed:
        target = os.path.realpath(os.path.join(workspace, rel))
        if not target.startswith(root + os.sep):
            continue
        if os.path.isfile(target) or os.path.islink(target):
            os.remove(target)
        parent = os.path.dirname(target)
        while parent.startswith(root + os.sep) and os.path.isdir(parent) and not os.listdir(parent):
            os.rmdir(parent)
            parent = os.path.dirname(parent)

    if workspace not in sys.path:
        sys.path.insert(0, workspace)
    importlib.invalidate_caches()

_cellsync_apply(${py(workspaceDir)}, ${py(archiveUri)}, ${py(removed)}, ${py(clean)})
del _cellsync_apply
`;
}

export function cleanupProgram(workspaceDir: string): string {
  return `
def _cellsync_cleanup(workspace):
    import shutil
    import sys

    while workspace in sys.path:
        sys.path.remove(workspace)
    shutil.rmtree(workspace, ignore_errors=True)

_cellsync_cleanup(${py(workspaceDir)})
del _cellsync_cleanup
`;
}

// DBFS API paths are addressed as dbfs: URIs from inside the cluster.
export function dbfsUri(path: string): string {
  return `dbfs:${path}`;
}
