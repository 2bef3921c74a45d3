import fs from "fs/promises";
import path from "path";
import { ConfsyncError, ioFailure } from "./errors";
import { copyInChunks, ensureDir, fileExists, writeThenRename } from "./filesystem";
import { getAliasDir, readAliasEntries } from "./layout";
import { silentDiagnostics } from "./diagnostics";
import type { DiagnosticsSink } from "./diagnostics";
import type { Layout, ProgressListener, RestoreResult } from "./types";

export interface RestoreOptions {
  layout: Layout;
  profile: string;
  alias: string;
  destination: string;
  overwrite?: boolean;
  /** Resolve and check everything without writing. */
  dryRun?: boolean;
  onProgress?: ProgressListener;
  diagnostics?: DiagnosticsSink;
}

/** Path of the single data file stored for `alias`. */
export async function locateEntry(layout: Layout, profile: string, alias: string): Promise<string> {
  const aliasDir = getAliasDir(layout, profile, alias);
  const entries = await readAliasEntries(layout, profile, alias);
  if (!entries || entries.data.length === 0) {
    throw new ConfsyncError("NotFound", `No backup of "${alias}" in profile "${profile}"`);
  }
  if (entries.data.length > 1) {
    throw new ConfsyncError(
      "IoFailure",
      `Expected one backup file in ${aliasDir}, found ${entries.data.length}`
    );
  }
  return path.join(aliasDir, entries.data[0]);
}

/**
 * Copies the repository copy of `alias` to `destination`. An existing
 * destination is left untouched unless `overwrite` is set.
 */
export async function restoreFile(options: RestoreOptions): Promise<RestoreResult> {
  const { layout, profile, alias, destination, onProgress } = options;
  const overwrite = options.overwrite ?? false;
  const dryRun = options.dryRun ?? false;
  const diagnostics = options.diagnostics ?? silentDiagnostics;

  const source = await locateEntry(layout, profile, alias);

  let exists: boolean;
  try {
    exists = await fileExists(destination);
  } catch (error) {
    throw ioFailure(`Failed to check ${destination}`, error);
  }
  if (exists && !overwrite) {
    throw new ConfsyncError(
      "WouldOverwrite",
      `${destination} already exists (use --overwrite to replace it)`
    );
  }

  if (dryRun) {
    let size: number;
    try {
      ({ size } = await fs.stat(source));
    } catch (error) {
      throw ioFailure(`Failed to read ${source}`, error);
    }
    return { alias, source, destination, bytes: size, overwritten: exists, dryRun: true };
  }

  let bytes: number;
  try {
    await ensureDir(path.dirname(destination));
    bytes = await writeThenRename(destination, (tempPath) =>
      copyInChunks(source, tempPath, onProgress)
    );
  } catch (error) {
    throw ioFailure(`Failed to restore ${source} to ${destination}`, error);
  }

  await diagnostics.record({
    level: "info",
    action: "RESTORE",
    message: `Restored ${alias} to ${destination}`,
    profile
  });
  return { alias, source, destination, bytes, overwritten: exists, dryRun: false };
}
