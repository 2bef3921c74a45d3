import { execFile } from "child_process";
import fs from "fs/promises";
import path from "path";
import { promisify } from "util";
import { ConfsyncError, describeError, ioFailure, isErrnoException } from "./errors";
import { appendLine, fileExists } from "./filesystem";
import { formatHistoryLine, parseHistory } from "./history";
import { HISTORY_LOG_FILE, ensureProfileRoot, getProfileRoot } from "./layout";
import type { ConfsyncConfigFile, HistoryEntry, Layout } from "./types";

const execFileAsync = promisify(execFile);

export interface CommitOptions {
  push?: boolean;
}

/** Records a backup durably once the repository tree has been written. */
export interface CommitRecorder {
  readonly name: string;
  init(profile: string, remoteUrl?: string): Promise<void>;
  commit(profile: string, message: string, options?: CommitOptions): Promise<void>;
}

async function requireRepository(layout: Layout, profile: string): Promise<string> {
  const root = getProfileRoot(layout, profile);
  if (!(await fileExists(root))) {
    throw new ConfsyncError("NotFound", `Repository does not exist: ${root}`);
  }
  return root;
}

export class HistoryLogRecorder implements CommitRecorder {
  public readonly name = "history-log";
  private readonly layout: Layout;
  private readonly now: () => Date;

  constructor(layout: Layout, now: () => Date = () => new Date()) {
    this.layout = layout;
    this.now = now;
  }

  async init(profile: string): Promise<void> {
    await ensureProfileRoot(this.layout, profile);
  }

  async commit(profile: string, message: string): Promise<void> {
    const root = await requireRepository(this.layout, profile);
    const logPath = path.join(root, HISTORY_LOG_FILE);
    try {
      await appendLine(logPath, formatHistoryLine(this.now(), message));
    } catch (error) {
      throw ioFailure(`Failed to write ${logPath}`, error);
    }
  }

  async listCommits(profile: string): Promise<HistoryEntry[]> {
    const logPath = path.join(getProfileRoot(this.layout, profile), HISTORY_LOG_FILE);
    try {
      return parseHistory(await fs.readFile(logPath, "utf8"));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw ioFailure(`Failed to read ${logPath}`, error);
    }
  }
}

/** Runs git with `args` inside `cwd` and resolves with its stdout. */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", args, { cwd });
  return stdout;
};

export class GitRecorder implements CommitRecorder {
  public readonly name = "git";
  private readonly layout: Layout;
  private readonly runner: GitRunner;

  constructor(layout: Layout, runner: GitRunner = runGit) {
    this.layout = layout;
    this.runner = runner;
  }

  private async git(root: string, args: string[]): Promise<string> {
    try {
      return await this.runner(args, root);
    } catch (error) {
      throw new ConfsyncError("VcsFailure", `git ${args[0]} failed`, describeError(error));
    }
  }

  async init(profile: string, remoteUrl?: string): Promise<void> {
    const root = await ensureProfileRoot(this.layout, profile);
    await this.git(root, ["init", "--initial-branch=main"]);
    await this.git(root, ["config", "pull.rebase", "true"]);
    if (!remoteUrl) {
      return;
    }
    const remotes = (await this.git(root, ["remote"])).split(/\r?\n/);
    if (remotes.includes("origin")) {
      await this.git(root, ["remote", "set-url", "origin", remoteUrl]);
      return;
    }
    await this.git(root, ["remote", "add", "origin", remoteUrl]);
  }

  async commit(profile: string, message: string, options: CommitOptions = {}): Promise<void> {
    const root = await requireRepository(this.layout, profile);
    await this.git(root, ["add", "."]);
    const pending = await this.git(root, ["status", "--porcelain"]);
    if (pending.trim().length > 0) {
      await this.git(root, ["commit", "-m", message]);
    }
    if (options.push) {
      const remoteHead = await this.git(root, ["ls-remote", "--heads", "origin", "main"]);
      if (remoteHead.trim().length > 0) {
        await this.git(root, ["pull", "origin", "main"]);
      }
      await this.git(root, ["push", "-u", "origin", "main"]);
    }
  }

  /** Runs an arbitrary git command inside the profile repository. */
  async run(profile: string, args: string[]): Promise<string> {
    if (args.length === 0) {
      throw new ConfsyncError("InvalidInput", "No git command provided");
    }
    const root = await requireRepository(this.layout, profile);
    return await this.git(root, args);
  }

  /** Deletes the `main` branch on `origin`. */
  async deleteRemote(profile: string): Promise<string> {
    const root = await requireRepository(this.layout, profile);
    return await this.git(root, ["push", "--delete", "origin", "main"]);
  }
}

/** Git when the config names a remote, the profile's history log otherwise. */
export function createRecorder(
  config: ConfsyncConfigFile,
  layout: Layout,
  runner?: GitRunner
): CommitRecorder {
  if (config.storage.local || config.storage.repo_url.length === 0) {
    return new HistoryLogRecorder(layout);
  }
  return new GitRecorder(layout, runner);
}
