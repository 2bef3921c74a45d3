import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { backupFile } from "../src/backup";
import type { DiagnosticsSink } from "../src/diagnostics";
import { ConfsyncError } from "../src/errors";
import { CHUNK_SIZE } from "../src/filesystem";
import { readHistory } from "../src/history";
import { restoreFile } from "../src/restore";
import type { DiagnosticEvent, Layout } from "../src/types";

async function withLayout<T>(fn: (layout: Layout, root: string) => Promise<T>): Promise<T> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "confsync-"));
  try {
    const layout = { configDir: path.join(root, "config"), dataDir: path.join(root, "data") };
    return await fn(layout, root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

async function writeFile(filePath: string, contents: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
}

function collectDiagnostics(): { sink: DiagnosticsSink; events: DiagnosticEvent[] } {
  const events: DiagnosticEvent[] = [];
  return {
    events,
    sink: {
      record: async (event) => {
        events.push(event);
      }
    }
  };
}

const fixedNow = (): Date => new Date(2024, 0, 2, 3, 4, 5);

void test("backupFile copies into profile/alias/basename and appends history", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "home", "a.conf");
    await writeFile(source, "v1");

    const result = await backupFile({ layout, profile: "default", alias: "a", source, now: fixedNow });

    const destination = path.join(layout.dataDir, "default", "a", "a.conf");
    assert.equal(result.status, "copied");
    assert.equal(result.destination, destination);
    assert.equal(result.bytes, 2);
    assert.equal(await fs.readFile(destination, "utf8"), "v1");
    assert.equal(
      await fs.readFile(`${destination}.cmt`, "utf8"),
      `[2024-01-02 03:04:05] ${source}\n`
    );
    assert.deepStrictEqual(result.entry, {
      timestamp: "2024-01-02 03:04:05",
      source,
      line: `[2024-01-02 03:04:05] ${source}`
    });
    assert.deepStrictEqual(
      (await fs.readdir(path.dirname(destination))).sort(),
      ["a.conf", "a.conf.cmt"]
    );
  });
});

void test("backupFile skips an unchanged source without adding history", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");

    const first = await backupFile({ layout, profile: "default", alias: "a", source });
    const second = await backupFile({ layout, profile: "default", alias: "a", source });

    assert.equal(first.status, "copied");
    assert.equal(second.status, "unchanged");
    assert.equal(second.entry, null);
    const history = await readHistory({ layout, profile: "default", alias: "a", tracked: true });
    assert.equal(history.length, 1);
  });
});

void test("backupFile copies again when contents change at the same size", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");
    await backupFile({ layout, profile: "default", alias: "a", source });

    await writeFile(source, "v2");
    const result = await backupFile({ layout, profile: "default", alias: "a", source });

    assert.equal(result.status, "copied");
    assert.equal(await fs.readFile(result.destination, "utf8"), "v2");
    const history = await readHistory({ layout, profile: "default", alias: "a", tracked: true });
    assert.equal(history.length, 2);
  });
});

void test("backupFile copies again when the size changes", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");
    await backupFile({ layout, profile: "default", alias: "a", source });

    await writeFile(source, "version two");
    const result = await backupFile({ layout, profile: "default", alias: "a", source });

    assert.equal(result.status, "copied");
    assert.equal(result.bytes, 11);
    const history = await readHistory({ layout, profile: "default", alias: "a", tracked: true });
    assert.equal(history.length, 2);
  });
});

void test("backupFile notices a change past the first block", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "big.bin");
    const contents = Buffer.alloc(CHUNK_SIZE * 2 + 17, 0x61);
    await writeFile(source, contents);
    await backupFile({ layout, profile: "default", alias: "big", source });

    contents[contents.length - 1] = 0x62;
    await writeFile(source, contents);
    const result = await backupFile({ layout, profile: "default", alias: "big", source });

    assert.equal(result.status, "copied");
    assert.deepStrictEqual(await fs.readFile(result.destination), contents);
  });
});

void test("backupFile with force copies unchanged contents", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");
    await backupFile({ layout, profile: "default", alias: "a", source });
    const result = await backupFile({ layout, profile: "default", alias: "a", source, force: true });

    assert.equal(result.status, "copied");
    const history = await readHistory({ layout, profile: "default", alias: "a", tracked: true });
    assert.equal(history.length, 2);
  });
});

void test("backupFile reports progress up to 100 percent", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "big.bin");
    await writeFile(source, Buffer.alloc(20000, 1));
    const progress: number[] = [];

    await backupFile({
      layout,
      profile: "default",
      alias: "big",
      source,
      onProgress: (percent) => progress.push(percent)
    });

    assert.equal(progress.length, 3);
    assert.equal(progress[2], 100);
    assert.ok(progress[0] < progress[1]);
  });
});

void test("backupFile fails for missing sources and directories", async () => {
  await withLayout(async (layout, root) => {
    await assert.rejects(
      backupFile({ layout, profile: "default", alias: "a", source: path.join(root, "nope") }),
      (error) => {
        assert.ok(error instanceof ConfsyncError);
        assert.equal(error.kind, "NotFound");
        return true;
      }
    );
    await fs.mkdir(path.join(root, "dir"));
    await assert.rejects(
      backupFile({ layout, profile: "default", alias: "a", source: path.join(root, "dir") }),
      (error) => {
        assert.ok(error instanceof ConfsyncError);
        assert.equal(error.kind, "NotAFile");
        return true;
      }
    );
  });
});

void test("backupFile keeps one data file and carries history over a rename", async () => {
  await withLayout(async (layout, root) => {
    const first = path.join(root, "a.conf");
    const second = path.join(root, "renamed.conf");
    await writeFile(first, "v1");
    await writeFile(second, "v2");

    await backupFile({ layout, profile: "default", alias: "a", source: first });
    await backupFile({ layout, profile: "default", alias: "a", source: second });

    const aliasDir = path.join(layout.dataDir, "default", "a");
    assert.deepStrictEqual((await fs.readdir(aliasDir)).sort(), [
      "renamed.conf",
      "renamed.conf.cmt"
    ]);
    const history = await readHistory({ layout, profile: "default", alias: "a", tracked: true });
    assert.deepStrictEqual(
      history.map((entry) => entry.source),
      [first, second]
    );
  });
});

void test("backupFile records diagnostics for copies and skips", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");
    const { sink, events } = collectDiagnostics();

    const result = await backupFile({ layout, profile: "work", alias: "a", source, diagnostics: sink });
    await backupFile({ layout, profile: "work", alias: "a", source, diagnostics: sink });

    assert.deepStrictEqual(events, [
      {
        level: "info",
        action: "BACKUP",
        message: `Copied ${source} to ${result.destination}`,
        profile: "work"
      },
      { level: "info", action: "BACKUP", message: "a is already backed up", profile: "work" }
    ]);
  });
});

void test("profiles keep separate repository trees", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "a.conf");
    await writeFile(source, "v1");

    const home = await backupFile({ layout, profile: "home", alias: "a", source });
    const work = await backupFile({ layout, profile: "work", alias: "a", source });

    assert.equal(home.status, "copied");
    assert.equal(work.status, "copied");
    assert.equal(work.destination, path.join(layout.dataDir, "work", "a", "a.conf"));
  });
});

void test("a tracked file ending in .cmt backs up, restores and keeps history", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "notes.cmt");
    await writeFile(source, "first");
    await backupFile({ layout, profile: "default", alias: "n", source, now: fixedNow });
    await writeFile(source, "second");
    await backupFile({ layout, profile: "default", alias: "n", source, now: fixedNow });

    const aliasDir = path.join(layout.dataDir, "default", "n");
    assert.deepStrictEqual((await fs.readdir(aliasDir)).sort(), ["notes.cmt", "notes.cmt.cmt"]);

    const destination = path.join(root, "restored", "notes.cmt");
    await restoreFile({ layout, profile: "default", alias: "n", destination });
    assert.equal(await fs.readFile(destination, "utf8"), "second");

    const history = await readHistory({ layout, profile: "default", alias: "n", tracked: true });
    assert.deepStrictEqual(
      history.map((entry) => entry.line),
      [`[2024-01-02 03:04:05] ${source}`, `[2024-01-02 03:04:05] ${source}`]
    );
  });
});

void test("a tracked file ending in .partial is an ordinary backup", async () => {
  await withLayout(async (layout, root) => {
    const source = path.join(root, "x.partial");
    await writeFile(source, "kept");
    await backupFile({ layout, profile: "default", alias: "x", source });

    const destination = path.join(root, "out.conf");
    const result = await restoreFile({ layout, profile: "default", alias: "x", destination });
    assert.equal(result.source, path.join(layout.dataDir, "default", "x", "x.partial"));
    assert.equal(await fs.readFile(destination, "utf8"), "kept");
  });
});

void test("backupFile never writes into the repository's own files", async () => {
  await withLayout(async (layout, root) => {
    const gitDir = path.join(layout.dataDir, "default", ".git");
    await writeFile(path.join(gitDir, "HEAD"), "ref: refs/heads/main\n");
    const source = path.join(root, "gitconfig");
    await writeFile(source, "[user]\n");

    for (const alias of [".git", "history.log"]) {
      await assert.rejects(
        backupFile({ layout, profile: "default", alias, source }),
        (error) => {
          assert.ok(error instanceof ConfsyncError);
          assert.equal(error.kind, "InvalidInput");
          return true;
        }
      );
    }
    assert.deepStrictEqual(await fs.readdir(gitDir), ["HEAD"]);
    assert.deepStrictEqual(await fs.readdir(path.join(layout.dataDir, "default")), [".git"]);
  });
});
