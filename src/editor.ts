import { spawn } from "child_process";
import { configExists, readConfig } from "./config";
import { ConfsyncError, describeError } from "./errors";
import { getConfigPath } from "./layout";
import type { ConfsyncConfigFile, Layout } from "./types";

/** Starts `command` attached to the terminal and resolves with its exit code. */
export type Launcher = (command: string, args: string[]) => Promise<number>;

export const launchAttached: Launcher = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit" });
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? 1));
  });

export function pickEditor(env: NodeJS.ProcessEnv): string {
  return env.VISUAL || env.EDITOR || "nano";
}

export function pickPager(env: NodeJS.ProcessEnv): string {
  return env.PAGER || "less";
}

// `program` may carry its own flags, as in EDITOR="code --wait".
async function openWith(program: string, file: string, launch: Launcher): Promise<void> {
  const [command, ...args] = program.trim().split(/\s+/);
  let code: number;
  try {
    code = await launch(command, [...args, file]);
  } catch (error) {
    throw new ConfsyncError("IoFailure", `Failed to start ${command}`, describeError(error));
  }
  if (code !== 0) {
    throw new ConfsyncError("IoFailure", `${command} exited with code ${code}`);
  }
}

export interface OpenConfigOptions {
  layout: Layout;
  env: NodeJS.ProcessEnv;
  launch?: Launcher;
}

async function requireConfigPath(layout: Layout): Promise<string> {
  const configPath = getConfigPath(layout);
  if (!(await configExists(layout))) {
    throw new ConfsyncError("NotFound", `Config file does not exist: ${configPath}`);
  }
  return configPath;
}

/** Opens the config in `$VISUAL`/`$EDITOR`, then re-reads it so a broken edit surfaces at once. */
export async function editConfig(options: OpenConfigOptions): Promise<ConfsyncConfigFile> {
  const configPath = await requireConfigPath(options.layout);
  await openWith(pickEditor(options.env), configPath, options.launch ?? launchAttached);
  return await readConfig(options.layout);
}

export async function viewConfig(options: OpenConfigOptions): Promise<void> {
  const configPath = await requireConfigPath(options.layout);
  await openWith(pickPager(options.env), configPath, options.launch ?? launchAttached);
}
