import fs from "fs/promises";
import path from "path";
import { ConfsyncError, ioFailure } from "./errors";
import { getAliasDir, readAliasEntries } from "./layout";
import type { HistoryEntry, Layout } from "./types";

const HISTORY_LINE = /^\[(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\] (.*)$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatHistoryLine(date: Date, message: string): string {
  return `[${formatTimestamp(date)}] ${message}`;
}

export function parseHistoryLine(line: string): HistoryEntry {
  const match = HISTORY_LINE.exec(line);
  if (!match) {
    return { timestamp: null, source: line, line };
  }
  return { timestamp: match[1], source: match[2], line };
}

export function parseHistory(raw: string): HistoryEntry[] {
  return raw
    .split(/\r?\n/)
    .filter((line) => line.length > 0)
    .map((line) => parseHistoryLine(line));
}

export interface ReadHistoryOptions {
  layout: Layout;
  profile: string;
  alias: string;
  /** Whether the registry currently tracks `alias`. */
  tracked: boolean;
}

/**
 * Reads the alias's sidecar in file order. A tracked alias with no backup yet
 * has an empty history; an untracked alias without a sidecar is `NotFound`.
 */
export async function readHistory(options: ReadHistoryOptions): Promise<HistoryEntry[]> {
  const { layout, profile, alias, tracked } = options;
  const aliasDir = getAliasDir(layout, profile, alias);
  const entries = await readAliasEntries(layout, profile, alias);
  const sidecars = (entries?.sidecars ?? []).map((name) => path.join(aliasDir, name));

  if (sidecars.length === 0) {
    if (tracked) {
      return [];
    }
    throw new ConfsyncError("NotFound", `No history for "${alias}" in profile "${profile}"`);
  }
  if (sidecars.length > 1) {
    throw new ConfsyncError(
      "IoFailure",
      `Expected one history file in ${aliasDir}, found ${sidecars.length}`
    );
  }

  let raw: string;
  try {
    raw = await fs.readFile(sidecars[0], "utf8");
  } catch (error) {
    throw ioFailure(`Failed to read ${sidecars[0]}`, error);
  }
  return parseHistory(raw);
}
