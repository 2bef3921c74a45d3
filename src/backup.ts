import type { Stats } from "fs";
import fs from "fs/promises";
import path from "path";
import { ConfsyncError, ioFailure, isErrnoException } from "./errors";
import {
  appendLine,
  copyInChunks,
  ensureDir,
  filesEqual,
  listEntries,
  statOrNull,
  writeThenRename
} from "./filesystem";
import { formatHistoryLine, parseHistoryLine } from "./history";
import {
  SIDECAR_EXTENSION,
  classifyAliasEntries,
  getEntryPath,
  getSidecarPath
} from "./layout";
import { silentDiagnostics } from "./diagnostics";
import type { DiagnosticsSink } from "./diagnostics";
import type { BackupResult, Layout, ProgressListener } from "./types";

export interface BackupOptions {
  layout: Layout;
  profile: string;
  alias: string;
  source: string;
  /** Copy even when the repository already holds identical contents. */
  force?: boolean;
  onProgress?: ProgressListener;
  now?: () => Date;
  diagnostics?: DiagnosticsSink;
}

async function statSource(source: string): Promise<Stats> {
  let stat: Stats;
  try {
    stat = await fs.stat(source);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfsyncError("NotFound", `Source file not found: ${source}`);
    }
    throw ioFailure(`Failed to read ${source}`, error);
  }
  if (!stat.isFile()) {
    throw new ConfsyncError("NotAFile", `Not a regular file: ${source}`);
  }
  return stat;
}

async function isUnchanged(source: string, destination: string): Promise<boolean> {
  try {
    const existing = await statOrNull(destination);
    if (!existing) {
      return false;
    }
    return await filesEqual(source, destination);
  } catch (error) {
    throw ioFailure(`Failed to compare ${source} with ${destination}`, error);
  }
}

/**
 * Keeps one data file and one sidecar per alias when the tracked file's name
 * changes: stale data files and leftover partials go, and the old sidecar
 * carries over under the new name.
 */
async function pruneStaleEntries(aliasDir: string, destination: string): Promise<void> {
  const dataName = path.basename(destination);
  const sidecarName = `${dataName}${SIDECAR_EXTENSION}`;
  const { data, sidecars, partials } = classifyAliasEntries(await listEntries(aliasDir));

  const carried = sidecars.includes(sidecarName) ? null : sidecars[0] ?? null;
  if (carried) {
    await fs.rename(path.join(aliasDir, carried), path.join(aliasDir, sidecarName));
  }

  const stale = [...data, ...sidecars, ...partials].filter(
    (name) => name !== dataName && name !== sidecarName && name !== carried
  );
  for (const name of stale) {
    await fs.rm(path.join(aliasDir, name), { recursive: true, force: true });
  }
}

/**
 * Copies a tracked file into `<profile>/<alias>/` and appends a history line.
 * Identical repository contents make this a no-op unless `force` is set.
 */
export async function backupFile(options: BackupOptions): Promise<BackupResult> {
  const { layout, profile, alias, source, onProgress } = options;
  const force = options.force ?? false;
  const now = options.now ?? (() => new Date());
  const diagnostics = options.diagnostics ?? silentDiagnostics;

  const destination = getEntryPath(layout, profile, alias, source);
  const sidecar = getSidecarPath(destination);
  const sourceStat = await statSource(source);

  if (!force && (await isUnchanged(source, destination))) {
    await diagnostics.record({
      level: "info",
      action: "BACKUP",
      message: `${alias} is already backed up`,
      profile
    });
    return {
      alias,
      status: "unchanged",
      source,
      destination,
      bytes: sourceStat.size,
      entry: null
    };
  }

  const aliasDir = path.dirname(destination);
  try {
    await ensureDir(aliasDir);
    await pruneStaleEntries(aliasDir, destination);
  } catch (error) {
    throw ioFailure(`Failed to prepare ${aliasDir}`, error);
  }

  let bytes: number;
  try {
    bytes = await writeThenRename(destination, (tempPath) =>
      copyInChunks(source, tempPath, onProgress)
    );
  } catch (error) {
    throw ioFailure(`Failed to copy ${source} to ${destination}`, error);
  }

  const line = formatHistoryLine(now(), source);
  try {
    await appendLine(sidecar, line);
  } catch (error) {
    throw ioFailure(`Failed to write history ${sidecar}`, error);
  }

  await diagnostics.record({
    level: "info",
    action: "BACKUP",
    message: `Copied ${source} to ${destination}`,
    profile
  });
  return {
    alias,
    status: "copied",
    source,
    destination,
    bytes,
    entry: parseHistoryLine(line)
  };
}
