#!/usr/bin/env node
import { backupFile } from "./backup";
import {
  activeProfile,
  addTracking,
  configExists,
  deleteConfig,
  findAliasByPath,
  isTracked,
  readConfig,
  readRawConfig,
  removeTracking,
  resolveAlias
} from "./config";
import { FileDiagnostics, recordAlongside } from "./diagnostics";
import type { DiagnosticsSink } from "./diagnostics";
import { editConfig, viewConfig } from "./editor";
import { ConfsyncError, ExitCodes, describeError } from "./errors";
import { readHistory } from "./history";
import { initConfig } from "./init";
import {
  deleteProfile,
  getConfigPath,
  getDiagnosticsPath,
  listProfiles,
  resolveLayout
} from "./layout";
import { resolvePath } from "./paths";
import { GitRecorder, createRecorder } from "./recorder";
import { restoreFile } from "./restore";
import { getStatus } from "./status";
import type { Layout, ProgressListener } from "./types";

const VERSION = "0.1.0";

type Command =
  | "init"
  | "add"
  | "remove"
  | "backup"
  | "restore"
  | "list"
  | "status"
  | "config"
  | "delete"
  | "profiles"
  | "paths"
  | "git"
  | "version";

const COMMANDS: readonly Command[] = [
  "init",
  "add",
  "remove",
  "backup",
  "restore",
  "list",
  "status",
  "config",
  "delete",
  "profiles",
  "paths",
  "git",
  "version"
];

interface ParsedArgs {
  command: Command | null;
  unknownCommand?: string;
  positionals: string[];
  profile?: string;
  message?: string;
  path?: string;
  to?: string;
  alias?: string;
  local: boolean;
  force: boolean;
  push: boolean;
  overwrite: boolean;
  dryRun: boolean;
  tracked: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    command: null,
    positionals: [],
    local: false,
    force: false,
    push: false,
    overwrite: false,
    dryRun: false,
    tracked: false,
    verbose: false,
    quiet: false,
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("-")) {
      if (!result.command && !result.unknownCommand) {
        if (isCommand(arg)) {
          result.command = arg;
          if (arg === "git") {
            // everything after `git` belongs to git
            result.positionals.push(...args.slice(i + 1));
            break;
          }
        } else {
          result.unknownCommand = arg;
        }
        continue;
      }
      result.positionals.push(arg);
      continue;
    }
    if (arg === "-P" || arg === "--profile") {
      result.profile = args[i + 1];
      i += 1;
      continue;
    }
    if (arg === "-m" || arg === "--message") {
      result.message = args[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--path") {
      result.path = args[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--to") {
      result.to = args[i + 1];
      i += 1;
      continue;
    }
    if (arg === "-a" || arg === "--alias") {
      result.alias = args[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--local") {
      result.local = true;
      continue;
    }
    if (arg === "-f" || arg === "--force") {
      result.force = true;
      continue;
    }
    if (arg === "--push") {
      result.push = true;
      continue;
    }
    if (arg === "-o" || arg === "--overwrite") {
      result.overwrite = true;
      continue;
    }
    if (arg === "-d" || arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }
    if (arg === "-t" || arg === "--tracked") {
      result.tracked = true;
      continue;
    }
    if (arg === "-V" || arg === "--verbose") {
      result.verbose = true;
      continue;
    }
    if (arg === "-q" || arg === "--quiet") {
      result.quiet = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
  }

  return result;
}

function printHelp(): void {
  const lines = [
    "confsync <command> [options]",
    "",
    "Commands:",
    "  init [repo-url]           Create the config and the profile repository",
    "  add <alias> <path>        Track a file and back it up",
    "  remove <alias>            Stop tracking a file (or --path <path>)",
    "  backup [alias]            Back up one tracked file, or all of them",
    "  restore <alias>           Copy a backup to its tracked path (or --to <path>)",
    "  list <alias>              Show backup history (or --tracked)",
    "  status                    Compare tracked files with their backups",
    "  config <show|view|edit|path>",
    "                            Print, page or edit the config, or show its location",
    "  delete <config|local|remote|all>",
    "                            Delete the config, the profile repository or its remote",
    "  profiles                  List profile repositories",
    "  paths                     Show directories in use",
    "  git <args...>             Run git inside the profile repository",
    "  version                   Print version",
    "",
    "Options:",
    "  -P, --profile <name>  Profile to use (default: storage.profile or \"default\")",
    "  -m, --message <text>  Commit message for backup",
    "  -f, --force           Back up unchanged files; confirm init/delete",
    "      --push            Push after committing (remote storage only)",
    "      --local           Keep the repository local on init",
    "  -o, --overwrite       Let restore replace an existing file",
    "  -d, --dry-run         Show what restore would do",
    "  -t, --tracked         List tracked files",
    "  -V, --verbose         Print diagnostics and copy progress",
    "  -q, --quiet           Hide warnings",
    "  -h, --help            Show help"
  ];
  console.log(lines.join("\n"));
}

interface Context {
  args: ParsedArgs;
  layout: Layout;
  diagnostics: DiagnosticsSink;
  warn: (message: string) => void;
  progress?: ProgressListener;
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) {
    throw new ConfsyncError("InvalidInput", `Usage: confsync ${usage}`);
  }
  return value;
}

async function requireInitialized(layout: Layout): Promise<void> {
  if (!(await configExists(layout))) {
    throw new ConfsyncError("NotFound", "confsync is not initialized; run `confsync init`");
  }
}

async function runInit(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  const result = await initConfig({
    layout,
    profile: args.profile,
    repoUrl: args.positionals[0],
    local: args.local,
    force: args.force,
    diagnostics
  });
  console.log(`${result.action === "created" ? "Created" : "Reinitialized"} ${result.configPath}`);
  console.log(`Repository: ${result.repository} (${result.recorder})`);
  console.log("Use `confsync add <alias> <path>` to track files");
}

async function runAdd(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  const alias = requireArg(args.positionals[0], "add <alias> <path>");
  const inputPath = resolvePath(requireArg(args.positionals[1], "add <alias> <path>"), process.env);
  const canonical = await addTracking(layout, inputPath, alias);
  console.log(`Added ${canonical} to tracking as ${alias}`);

  const config = await readConfig(layout);
  const profile = activeProfile(config, args.profile);
  await diagnostics.record({
    level: "info",
    action: "ADD",
    message: `Added ${canonical} as ${alias}`,
    profile
  });
  const result = await backupFile({
    layout,
    profile,
    alias,
    source: canonical,
    force: true,
    onProgress: ctx.progress,
    diagnostics
  });
  console.log(`Copied ${result.source} to ${result.destination}`);
  await createRecorder(config, layout).commit(profile, args.message ?? `Track ${alias}`);
}

async function runRemove(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  let alias: string | undefined = args.positionals[0] ?? args.alias;
  if (!alias && args.path) {
    const config = await readConfig(layout);
    const target = resolvePath(args.path, process.env);
    alias = findAliasByPath(config, target) ?? undefined;
    if (!alias) {
      throw new ConfsyncError("NotFound", `${target} is not tracked`);
    }
  }
  const removedAlias = requireArg(alias, "remove <alias> | remove --path <path>");
  const removedPath = await removeTracking(layout, removedAlias);
  await diagnostics.record({
    level: "info",
    action: "REMOVE",
    message: `Untracked ${removedAlias} (${removedPath})`
  });
  console.log(`Untracked ${removedAlias} (${removedPath})`);
}

async function runBackup(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  const config = await readConfig(layout);
  const profile = activeProfile(config, args.profile);
  const requested = args.positionals[0] ?? args.alias;
  if (requested && !isTracked(config, requested)) {
    throw new ConfsyncError("NotFound", `"${requested}" is not tracked`);
  }
  const aliases = requested
    ? [requested]
    : Object.keys(config.tracking.files).sort((a, b) => a.localeCompare(b));

  let copied = 0;
  let failures = 0;
  for (const alias of aliases) {
    try {
      const result = await backupFile({
        layout,
        profile,
        alias,
        source: config.tracking.files[alias],
        force: args.force,
        onProgress: ctx.progress,
        diagnostics
      });
      if (result.status === "unchanged") {
        console.log(`${alias}: already backed up`);
        continue;
      }
      copied += 1;
      console.log(`${alias}: copied ${result.source} to ${result.destination}`);
    } catch (error) {
      if (!(error instanceof ConfsyncError)) {
        throw error;
      }
      failures += 1;
      console.error(`${alias}: ${error.message}`);
      await recordAlongside(
        diagnostics,
        { level: "error", action: "BACKUP", message: error.message, profile },
        (message) => console.error(message)
      );
    }
  }

  if (copied > 0) {
    const message = args.message ?? (requested ? requested : `Backup of ${copied} file(s)`);
    await createRecorder(config, layout).commit(profile, message, { push: args.push });
    if (args.push && config.storage.local) {
      ctx.warn("Storage is local; nothing was pushed");
    }
  }
  console.log(`Copied: ${copied}, unchanged: ${aliases.length - copied - failures}, failed: ${failures}`);
  if (failures > 0) {
    process.exitCode = ExitCodes.Failure;
  }
}

async function runRestore(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  const alias = requireArg(args.positionals[0] ?? args.alias, "restore <alias> [--to <path>]");
  const config = await readConfig(layout);
  const profile = activeProfile(config, args.profile);
  const destination = args.to
    ? resolvePath(args.to, process.env)
    : await resolveAlias(layout, alias);
  const result = await restoreFile({
    layout,
    profile,
    alias,
    destination,
    overwrite: args.overwrite,
    dryRun: args.dryRun,
    onProgress: ctx.progress,
    diagnostics
  });
  const verb = result.dryRun ? "Would restore" : "Restored";
  console.log(`${verb} ${result.source} to ${result.destination} (${result.bytes} bytes)`);
}

async function runList(ctx: Context): Promise<void> {
  const { args, layout } = ctx;
  const config = await readConfig(layout);
  if (args.tracked) {
    const entries = Object.entries(config.tracking.files).sort(([a], [b]) => a.localeCompare(b));
    entries.forEach(([alias, trackedPath]) => {
      console.log(`${alias.padEnd(15)} ${trackedPath}`);
    });
    return;
  }
  const alias = requireArg(args.positionals[0] ?? args.alias, "list <alias> | list --tracked");
  const profile = activeProfile(config, args.profile);
  const history = await readHistory({
    layout,
    profile,
    alias,
    tracked: isTracked(config, alias)
  });
  if (history.length === 0) {
    console.log(`No history found for ${alias}`);
    return;
  }
  console.log(`=== ${alias} ===`);
  history.forEach((entry) => console.log(entry.line));
}

async function runStatus(ctx: Context): Promise<void> {
  const { args, layout } = ctx;
  const config = await readConfig(layout);
  const entries = await getStatus({ layout, profile: activeProfile(config, args.profile), config });
  if (entries.length === 0) {
    console.log("No tracked files.");
    return;
  }
  entries.forEach((entry) => {
    const suffix = entry.reason ? ` (${entry.reason})` : "";
    console.log(`${entry.status}: ${entry.alias} ${entry.path}${suffix}`);
  });
  if (entries.some((entry) => entry.status !== "ok")) {
    process.exitCode = ExitCodes.Validation;
  }
}

async function runConfig(ctx: Context): Promise<void> {
  const { args, layout } = ctx;
  const action = args.positionals[0] ?? "show";
  if (action === "path") {
    console.log(getConfigPath(layout));
    return;
  }
  if (action === "edit") {
    await editConfig({ layout, env: process.env });
    console.log(`Config saved: ${getConfigPath(layout)}`);
    return;
  }
  if (action === "view") {
    await viewConfig({ layout, env: process.env });
    return;
  }
  if (action !== "show") {
    throw new ConfsyncError("InvalidInput", "Usage: confsync config <show|view|edit|path>");
  }
  const raw = await readRawConfig(layout);
  if (raw === null) {
    throw new ConfsyncError("NotFound", `Config file does not exist: ${getConfigPath(layout)}`);
  }
  process.stdout.write(raw.endsWith("\n") ? raw : `${raw}\n`);
}

const DELETE_TARGETS = ["config", "local", "remote", "all"] as const;
type DeleteTarget = (typeof DELETE_TARGETS)[number];

function isDeleteTarget(value: string): value is DeleteTarget {
  return DELETE_TARGETS.some((target) => target === value);
}

async function runDelete(ctx: Context): Promise<void> {
  const { args, layout, diagnostics } = ctx;
  const usage = "delete <config|local|remote|all> --force";
  const target = requireArg(args.positionals[0], usage);
  if (!isDeleteTarget(target)) {
    throw new ConfsyncError("InvalidInput", `Usage: confsync ${usage}`);
  }
  if (!args.force) {
    throw new ConfsyncError("InvalidInput", "Use --force to delete. There is no undo.");
  }

  const config = await readConfig(layout);
  const profile = activeProfile(config, args.profile);
  const hasRemote = !config.storage.local && config.storage.repo_url.length > 0;
  if (target === "remote" && !hasRemote) {
    throw new ConfsyncError("InvalidInput", "Storage is local; there is no remote to delete");
  }
  if ((target === "remote" || target === "all") && hasRemote) {
    const output = await new GitRecorder(layout).deleteRemote(profile);
    await diagnostics.record({ level: "info", action: "DELETE", message: "Deleted remote main", profile });
    console.log(`Remote branch deleted${output.trim() ? `: ${output.trim()}` : ""}`);
  }
  if (target === "local" || target === "all") {
    const root = await deleteProfile(layout, profile);
    await diagnostics.record({ level: "info", action: "DELETE", message: `Deleted ${root}`, profile });
    console.log(`Local repository deleted: ${root}`);
  }
  if (target === "config" || target === "all") {
    const configPath = await deleteConfig(layout);
    await diagnostics.record({ level: "info", action: "DELETE", message: `Deleted ${configPath}` });
    console.log(`Config deleted: ${configPath}`);
  }
}

async function runGitCommand(ctx: Context): Promise<void> {
  const { args, layout } = ctx;
  const config = await readConfig(layout);
  const profile = activeProfile(config, args.profile);
  const output = await new GitRecorder(layout).run(profile, args.positionals);
  process.stdout.write(output);
}

async function runProfiles(ctx: Context): Promise<void> {
  const { args, layout } = ctx;
  const config = await readConfig(layout);
  const active = activeProfile(config, args.profile);
  const profiles = await listProfiles(layout);
  if (profiles.length === 0) {
    console.log("No profile repositories.");
    return;
  }
  profiles.forEach((profile) => {
    console.log(`${profile === active ? "*" : " "} ${profile}`);
  });
}

function runPaths(layout: Layout): void {
  console.log(`Config dir:  ${layout.configDir}`);
  console.log(`Data dir:    ${layout.dataDir}`);
  console.log(`Config path: ${getConfigPath(layout)}`);
  console.log(`Log path:    ${getDiagnosticsPath(layout)}`);
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.unknownCommand) {
    throw new ConfsyncError("InvalidInput", `Unknown command: ${args.unknownCommand}`);
  }
  const command = args.command;
  if (args.help || !command) {
    printHelp();
    return;
  }

  const layout = resolveLayout(process.env);
  if (command === "version") {
    console.log(`confsync ${VERSION}`);
    return;
  }
  if (command === "paths") {
    runPaths(layout);
    return;
  }

  const ctx: Context = {
    args,
    layout,
    diagnostics: new FileDiagnostics(getDiagnosticsPath(layout), { echo: args.verbose }),
    warn: (message) => {
      if (!args.quiet) {
        console.warn(message);
      }
    },
    progress: args.verbose
      ? (percent) => console.log(`Progress: ${percent.toFixed(2)}%`)
      : undefined
  };

  try {
    await dispatch(command, ctx);
  } catch (error) {
    await recordAlongside(
      ctx.diagnostics,
      {
        level: "error",
        action: command.toUpperCase(),
        message: describeError(error),
        profile: args.profile
      },
      (message) => console.error(message)
    );
    throw error;
  }
}

async function dispatch(command: Command, ctx: Context): Promise<void> {
  if (command !== "init") {
    await requireInitialized(ctx.layout);
  }
  switch (command) {
    case "init":
      return await runInit(ctx);
    case "add":
      return await runAdd(ctx);
    case "remove":
      return await runRemove(ctx);
    case "backup":
      return await runBackup(ctx);
    case "restore":
      return await runRestore(ctx);
    case "list":
      return await runList(ctx);
    case "status":
      return await runStatus(ctx);
    case "config":
      return await runConfig(ctx);
    case "delete":
      return await runDelete(ctx);
    case "profiles":
      return await runProfiles(ctx);
    case "git":
      return await runGitCommand(ctx);
    default:
      throw new ConfsyncError("InvalidInput", `Unknown command: ${command}`);
  }
}

run().catch((error: unknown) => {
  if (error instanceof ConfsyncError) {
    console.error(error.message);
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});
