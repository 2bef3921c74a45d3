import type { Dirent } from "fs";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ConfsyncError, ioFailure, isErrnoException } from "./errors";
import { isPartialName, listEntries } from "./filesystem";
import { envPath } from "./paths";
import type { Layout } from "./types";

export const APP_NAME = "confsync";
export const CONFIG_FILE = "config.toml";
export const SIDECAR_EXTENSION = ".cmt";
export const DIAGNOSTICS_FILE = "log.txt";
export const DEFAULT_PROFILE = "default";
export const HISTORY_LOG_FILE = "history.log";

// Names already taken inside the data dir and the profile root.
const RESERVED_NAMES: Record<"alias" | "profile", readonly string[]> = {
  alias: [HISTORY_LOG_FILE],
  profile: [DIAGNOSTICS_FILE]
};

/**
 * Resolves the config and data directories by platform convention.
 * `CONFSYNC_CONFIG_DIR` and `CONFSYNC_DATA_DIR` take precedence.
 */
export function resolveLayout(
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): Layout {
  const defaults = platformDirs(env, platform, home);
  return {
    configDir: envPath(env, "CONFSYNC_CONFIG_DIR") ?? defaults.configDir,
    dataDir: envPath(env, "CONFSYNC_DATA_DIR") ?? defaults.dataDir
  };
}

function platformDirs(env: NodeJS.ProcessEnv, platform: NodeJS.Platform, home: string): Layout {
  if (platform === "darwin") {
    const root = path.join(home, "Library", "Application Support", APP_NAME);
    return { configDir: root, dataDir: root };
  }
  if (platform === "win32") {
    const appData = envPath(env, "APPDATA") ?? path.join(home, "AppData", "Roaming");
    const root = path.join(appData, APP_NAME);
    return { configDir: path.join(root, "config"), dataDir: path.join(root, "data") };
  }
  const configHome = envPath(env, "XDG_CONFIG_HOME") ?? path.join(home, ".config");
  const dataHome = envPath(env, "XDG_DATA_HOME") ?? path.join(home, ".local", "share");
  return {
    configDir: path.join(configHome, APP_NAME),
    dataDir: path.join(dataHome, APP_NAME)
  };
}

/**
 * Rejects names that would escape their parent directory or land on a file
 * the repository keeps for itself (`.git`, `history.log`). Leading dots are
 * refused outright.
 */
export function assertSegment(kind: "alias" | "profile", name: string): void {
  const invalid =
    name.length === 0 ||
    name.startsWith(".") ||
    name.includes("/") ||
    name.includes("\\") ||
    name.includes("\0");
  if (invalid) {
    throw new ConfsyncError("InvalidInput", `Invalid ${kind} name: "${name}"`);
  }
  if (RESERVED_NAMES[kind].includes(name)) {
    throw new ConfsyncError("InvalidInput", `Reserved ${kind} name: "${name}"`);
  }
}

export function getConfigPath(layout: Layout): string {
  return path.join(layout.configDir, CONFIG_FILE);
}

export function getDiagnosticsPath(layout: Layout): string {
  return path.join(layout.dataDir, DIAGNOSTICS_FILE);
}

export function getProfileRoot(layout: Layout, profile: string): string {
  assertSegment("profile", profile);
  return path.join(layout.dataDir, profile);
}

export function getAliasDir(layout: Layout, profile: string, alias: string): string {
  assertSegment("alias", alias);
  return path.join(getProfileRoot(layout, profile), alias);
}

export function getEntryPath(
  layout: Layout,
  profile: string,
  alias: string,
  sourcePath: string
): string {
  return path.join(getAliasDir(layout, profile, alias), path.basename(sourcePath));
}

export function getSidecarPath(entryPath: string): string {
  return `${entryPath}${SIDECAR_EXTENSION}`;
}

export interface AliasEntries {
  /** Data files; a clean alias directory holds exactly one. */
  data: string[];
  sidecars: string[];
  partials: string[];
}

/**
 * Sorts the names in an alias directory. A sidecar is the entry named after
 * another entry plus `.cmt`; only unpaired names fall back to the suffix, so
 * a tracked file may itself end in `.cmt`.
 */
export function classifyAliasEntries(names: readonly string[]): AliasEntries {
  const partials = names.filter((name) => isPartialName(name));
  const rest = names.filter((name) => !isPartialName(name));
  const present = new Set(rest);
  const pairedData = rest.filter((name) => present.has(`${name}${SIDECAR_EXTENSION}`));
  const pairedSidecars = new Set(pairedData.map((name) => `${name}${SIDECAR_EXTENSION}`));
  const paired = new Set(pairedData);

  const data: string[] = [...pairedData];
  const sidecars: string[] = [...pairedSidecars];
  for (const name of rest) {
    if (paired.has(name) || pairedSidecars.has(name)) {
      continue;
    }
    if (name.endsWith(SIDECAR_EXTENSION)) {
      sidecars.push(name);
    } else {
      data.push(name);
    }
  }
  const byName = (a: string, b: string): number => a.localeCompare(b);
  return { data: data.sort(byName), sidecars: sidecars.sort(byName), partials };
}

/** Classified contents of `<profile>/<alias>/`, or null when it does not exist. */
export async function readAliasEntries(
  layout: Layout,
  profile: string,
  alias: string
): Promise<AliasEntries | null> {
  const aliasDir = getAliasDir(layout, profile, alias);
  try {
    return classifyAliasEntries(await listEntries(aliasDir));
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw ioFailure(`Failed to read ${aliasDir}`, error);
  }
}

export async function listProfiles(layout: Layout): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(layout.dataDir, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw ioFailure(`Failed to read ${layout.dataDir}`, error);
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

export async function ensureProfileRoot(layout: Layout, profile: string): Promise<string> {
  const root = getProfileRoot(layout, profile);
  try {
    await fs.mkdir(root, { recursive: true });
  } catch (error) {
    throw ioFailure(`Failed to create repository ${root}`, error);
  }
  return root;
}

export async function deleteProfile(layout: Layout, profile: string): Promise<string> {
  const root = getProfileRoot(layout, profile);
  try {
    await fs.access(root);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfsyncError("NotFound", `Repository does not exist: ${root}`);
    }
    throw ioFailure(`Failed to access ${root}`, error);
  }
  try {
    await fs.rm(root, { recursive: true, force: true });
  } catch (error) {
    throw ioFailure(`Failed to delete ${root}`, error);
  }
  return root;
}
