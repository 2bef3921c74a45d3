import { randomBytes } from "crypto";
import type { Stats } from "fs";
import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import { isErrnoException } from "./errors";
import type { ProgressListener } from "./types";

export const CHUNK_SIZE = 8 * 1024;
const PARTIAL_EXTENSION = ".partial";

const PARTIAL_NAME = /\.[0-9a-f]{12}\.partial$/;

/** Unique sibling of `target` used while it is being written. */
export function partialPath(target: string): string {
  return `${target}.${randomBytes(6).toString("hex")}${PARTIAL_EXTENSION}`;
}

export function isPartialName(name: string): boolean {
  return PARTIAL_NAME.test(name);
}

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/** Stats a path, or null when it does not exist. */
export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/** Appends one line with a single write in append mode. */
export async function appendLine(target: string, line: string): Promise<void> {
  await fs.appendFile(target, `${line}\n`, { encoding: "utf8", flag: "a" });
}

export async function listEntries(target: string): Promise<string[]> {
  return await fs.readdir(target);
}

async function readFull(handle: FileHandle, buffer: Buffer): Promise<number> {
  let filled = 0;
  while (filled < buffer.length) {
    const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, null);
    if (bytesRead === 0) {
      break;
    }
    filled += bytesRead;
  }
  return filled;
}

async function writeFull(handle: FileHandle, buffer: Buffer, length: number): Promise<void> {
  let offset = 0;
  while (offset < length) {
    const { bytesWritten } = await handle.write(buffer, offset, length - offset);
    offset += bytesWritten;
  }
}

/**
 * Size check first, then a block-by-block comparison.
 * Both paths must exist.
 */
export async function filesEqual(left: string, right: string): Promise<boolean> {
  const [leftStat, rightStat] = await Promise.all([fs.stat(left), fs.stat(right)]);
  if (leftStat.size !== rightStat.size) {
    return false;
  }

  const leftHandle = await fs.open(left, "r");
  try {
    const rightHandle = await fs.open(right, "r");
    try {
      const leftBuffer = Buffer.alloc(CHUNK_SIZE);
      const rightBuffer = Buffer.alloc(CHUNK_SIZE);
      for (;;) {
        const leftRead = await readFull(leftHandle, leftBuffer);
        const rightRead = await readFull(rightHandle, rightBuffer);
        if (leftRead !== rightRead) {
          return false;
        }
        if (leftRead === 0) {
          return true;
        }
        if (!leftBuffer.subarray(0, leftRead).equals(rightBuffer.subarray(0, rightRead))) {
          return false;
        }
      }
    } finally {
      await rightHandle.close();
    }
  } finally {
    await leftHandle.close();
  }
}

/** Streams `source` into `target` in fixed-size chunks and returns the byte count. */
export async function copyInChunks(
  source: string,
  target: string,
  onProgress?: ProgressListener
): Promise<number> {
  const input = await fs.open(source, "r");
  try {
    const { size } = await input.stat();
    const output = await fs.open(target, "wx");
    try {
      const buffer = Buffer.alloc(CHUNK_SIZE);
      let copied = 0;
      for (;;) {
        const bytesRead = await readFull(input, buffer);
        if (bytesRead === 0) {
          break;
        }
        await writeFull(output, buffer, bytesRead);
        copied += bytesRead;
        if (size > 0) {
          onProgress?.(Math.min(100, (copied / size) * 100));
        }
      }
      if (copied === 0) {
        onProgress?.(100);
      }
      return copied;
    } finally {
      await output.close();
    }
  } finally {
    await input.close();
  }
}

/**
 * Runs `write` against a fresh sibling temp path and renames it over `target`.
 * An existing target's permission bits carry over to the replacement.
 * The temp file is removed when anything fails after it was created.
 */
export async function writeThenRename<T>(
  target: string,
  write: (tempPath: string) => Promise<T>
): Promise<T> {
  const tempPath = partialPath(target);
  try {
    const result = await write(tempPath);
    const existing = await statOrNull(target);
    if (existing) {
      await fs.chmod(tempPath, existing.mode & 0o7777);
    }
    await fs.rename(tempPath, target);
    return result;
  } catch (error) {
    if (!(isErrnoException(error) && error.code === "EEXIST")) {
      await fs.rm(tempPath, { force: true });
    }
    throw error;
  }
}
