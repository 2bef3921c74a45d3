import fs from "fs/promises";
import path from "path";
import * as TOML from "@iarna/toml";
import { ConfsyncError, describeError, ioFailure, isErrnoException } from "./errors";
import { writeThenRename } from "./filesystem";
import { DEFAULT_PROFILE, assertSegment, getConfigPath } from "./layout";
import { createDefaultConfig } from "./templates";
import type { ConfsyncConfigFile, Layout, StorageConfig } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStorageConfig(value: unknown): value is StorageConfig {
  if (!isRecord(value)) {
    return false;
  }
  if (typeof value.local !== "boolean") {
    return false;
  }
  if (typeof value.repo_url !== "string") {
    return false;
  }
  return value.profile === undefined || typeof value.profile === "string";
}

function isConfsyncConfigFile(value: unknown): value is ConfsyncConfigFile {
  if (!isRecord(value)) {
    return false;
  }
  if (!isStorageConfig(value.storage)) {
    return false;
  }
  const tracking = value.tracking;
  if (!isRecord(tracking)) {
    return false;
  }
  const files = tracking.files;
  if (!isRecord(files)) {
    return false;
  }
  return Object.values(files).every((entry) => typeof entry === "string");
}

function normalizeConfig(config: ConfsyncConfigFile): ConfsyncConfigFile {
  const storage: StorageConfig = {
    local: config.storage.local,
    repo_url: config.storage.repo_url
  };
  if (config.storage.profile !== undefined) {
    storage.profile = config.storage.profile;
  }
  return {
    storage,
    tracking: { files: Object.fromEntries(Object.entries(config.tracking.files)) }
  };
}

function toDocument(config: ConfsyncConfigFile): TOML.JsonMap {
  const storage: TOML.JsonMap = {
    local: config.storage.local,
    repo_url: config.storage.repo_url
  };
  if (config.storage.profile !== undefined) {
    storage.profile = config.storage.profile;
  }
  return {
    storage,
    tracking: { files: { ...config.tracking.files } }
  };
}

export function serializeConfig(config: ConfsyncConfigFile): string {
  return TOML.stringify(toDocument(config));
}

export function parseConfig(raw: string, configPath: string): ConfsyncConfigFile {
  let parsed: unknown;
  try {
    parsed = TOML.parse(raw);
  } catch (error) {
    throw new ConfsyncError("ConfigCorrupt", `Invalid TOML in ${configPath}`, describeError(error));
  }
  if (!isConfsyncConfigFile(parsed)) {
    throw new ConfsyncError("ConfigCorrupt", `Invalid config format in ${configPath}`);
  }
  return normalizeConfig(parsed);
}

export async function configExists(layout: Layout): Promise<boolean> {
  try {
    const stat = await fs.stat(getConfigPath(layout));
    return stat.isFile();
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw ioFailure("Failed to check config", error);
  }
}

export async function readRawConfig(layout: Layout): Promise<string | null> {
  const configPath = getConfigPath(layout);
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw ioFailure(`Failed to read ${configPath}`, error);
  }
}

/**
 * Loads the config document. A missing file yields the default document;
 * a malformed one is always a `ConfigCorrupt` error.
 */
export async function readConfig(layout: Layout): Promise<ConfsyncConfigFile> {
  const configPath = getConfigPath(layout);
  const raw = await readRawConfig(layout);
  if (raw === null) {
    return createDefaultConfig(configPath);
  }
  return parseConfig(raw, configPath);
}

export async function writeConfig(layout: Layout, config: ConfsyncConfigFile): Promise<void> {
  const configPath = getConfigPath(layout);
  const contents = serializeConfig(config);
  try {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await writeThenRename(configPath, async (tempPath) => {
      await fs.writeFile(tempPath, contents, { encoding: "utf8", flag: "wx" });
    });
  } catch (error) {
    throw ioFailure(`Failed to write ${configPath}`, error);
  }
}

export async function deleteConfig(layout: Layout): Promise<string> {
  const configPath = getConfigPath(layout);
  try {
    await fs.unlink(configPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfsyncError("NotFound", `Config file does not exist: ${configPath}`);
    }
    throw ioFailure(`Failed to delete ${configPath}`, error);
  }
  return configPath;
}

export function isTracked(config: ConfsyncConfigFile, alias: string): boolean {
  return Object.prototype.hasOwnProperty.call(config.tracking.files, alias);
}

export function findAliasByPath(config: ConfsyncConfigFile, target: string): string | null {
  const resolved = path.resolve(target);
  for (const [alias, trackedPath] of Object.entries(config.tracking.files)) {
    if (path.resolve(trackedPath) === resolved) {
      return alias;
    }
  }
  return null;
}

export function getTrackedPath(config: ConfsyncConfigFile, alias: string): string {
  if (!isTracked(config, alias)) {
    throw new ConfsyncError("NotFound", `"${alias}" is not tracked`);
  }
  return config.tracking.files[alias];
}

async function canonicalize(inputPath: string): Promise<string> {
  try {
    return await fs.realpath(inputPath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new ConfsyncError("NotFound", `No such file: ${inputPath}`);
    }
    throw ioFailure(`Failed to resolve ${inputPath}`, error);
  }
}

/** Registers `alias` for the file at `inputPath` and returns its canonical path. */
export async function addTracking(
  layout: Layout,
  inputPath: string,
  alias: string
): Promise<string> {
  assertSegment("alias", alias);
  const canonical = await canonicalize(inputPath);
  let isFile: boolean;
  try {
    isFile = (await fs.stat(canonical)).isFile();
  } catch (error) {
    throw ioFailure(`Failed to stat ${canonical}`, error);
  }
  if (!isFile) {
    throw new ConfsyncError("NotAFile", `Not a regular file: ${canonical}`);
  }

  const config = await readConfig(layout);
  const existing = findAliasByPath(config, canonical);
  if (existing !== null) {
    throw new ConfsyncError("DuplicatePath", `${canonical} is already tracked as "${existing}"`);
  }
  if (isTracked(config, alias)) {
    throw new ConfsyncError("DuplicateAlias", `Alias "${alias}" is already in use`);
  }

  config.tracking.files = { ...config.tracking.files, [alias]: canonical };
  await writeConfig(layout, config);
  return canonical;
}

/** Drops `alias` from the registry. Repository data is left in place. */
export async function removeTracking(layout: Layout, alias: string): Promise<string> {
  const config = await readConfig(layout);
  const removedPath = getTrackedPath(config, alias);
  const { [alias]: _removed, ...remaining } = config.tracking.files;
  config.tracking.files = remaining;
  await writeConfig(layout, config);
  return removedPath;
}

export async function resolveAlias(layout: Layout, alias: string): Promise<string> {
  const config = await readConfig(layout);
  return getTrackedPath(config, alias);
}

export function activeProfile(config: ConfsyncConfigFile, override?: string): string {
  return override ?? config.storage.profile ?? DEFAULT_PROFILE;
}
