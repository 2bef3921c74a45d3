import { backupFile } from "./backup";
import { configExists, isTracked, readConfig, writeConfig } from "./config";
import { silentDiagnostics } from "./diagnostics";
import type { DiagnosticsSink } from "./diagnostics";
import { ConfsyncError } from "./errors";
import { DEFAULT_PROFILE, getConfigPath, getProfileRoot } from "./layout";
import { createRecorder } from "./recorder";
import type { CommitRecorder } from "./recorder";
import { SELF_ALIAS, createDefaultConfig } from "./templates";
import type { BackupResult, ConfsyncConfigFile, Layout } from "./types";

export interface InitOptions {
  layout: Layout;
  profile?: string;
  repoUrl?: string;
  local?: boolean;
  force?: boolean;
  recorder?: CommitRecorder;
  diagnostics?: DiagnosticsSink;
}

export interface InitResult {
  action: "created" | "reinitialized";
  configPath: string;
  repository: string;
  recorder: string;
  backup: BackupResult | null;
}

async function loadForReinit(
  layout: Layout,
  diagnostics: DiagnosticsSink
): Promise<ConfsyncConfigFile> {
  try {
    return await readConfig(layout);
  } catch (error) {
    if (error instanceof ConfsyncError && error.kind === "ConfigCorrupt") {
      await diagnostics.record({
        level: "warn",
        action: "INIT",
        message: `Replacing unreadable config: ${error.message}`
      });
      return createDefaultConfig(getConfigPath(layout));
    }
    throw error;
  }
}

/**
 * Writes the config document, prepares the profile repository and backs up
 * the config file itself. Refuses to touch an existing config without `force`.
 */
export async function initConfig(options: InitOptions): Promise<InitResult> {
  const { layout } = options;
  const profile = options.profile ?? DEFAULT_PROFILE;
  const diagnostics = options.diagnostics ?? silentDiagnostics;
  const configPath = getConfigPath(layout);
  const exists = await configExists(layout);

  if (exists && !options.force) {
    throw new ConfsyncError(
      "Conflict",
      `Config already exists: ${configPath} (use --force to reinitialize)`
    );
  }

  const config = exists
    ? await loadForReinit(layout, diagnostics)
    : createDefaultConfig(configPath);
  const repoUrl = options.repoUrl?.trim() ?? "";
  config.storage.repo_url = repoUrl;
  config.storage.local = options.local === true || repoUrl.length === 0;
  await writeConfig(layout, config);
  await diagnostics.record({ level: "info", action: "INIT", message: "Config saved", profile });

  const recorder = options.recorder ?? createRecorder(config, layout);
  await recorder.init(profile, config.storage.local ? undefined : repoUrl);
  await diagnostics.record({
    level: "info",
    action: "INIT",
    message: `Initialized ${recorder.name} repository`,
    profile
  });

  const backup = isTracked(config, SELF_ALIAS)
    ? await backupFile({
        layout,
        profile,
        alias: SELF_ALIAS,
        source: config.tracking.files[SELF_ALIAS],
        force: true,
        diagnostics
      })
    : null;

  return {
    action: exists ? "reinitialized" : "created",
    configPath,
    repository: getProfileRoot(layout, profile),
    recorder: recorder.name,
    backup
  };
}
