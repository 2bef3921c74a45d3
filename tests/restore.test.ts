import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { backupFile } from "../src/backup";
import { ConfsyncError } from "../src/errors";
import { locateEntry, restoreFile } from "../src/restore";
import type { Layout } from "../src/types";

async function withLayout<T>(fn: (layout: Layout, root: string) => Promise<T>): Promise<T> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "confsync-"));
  try {
    const layout = { configDir: path.join(root, "config"), dataDir: path.join(root, "data") };
    return await fn(layout, root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

async function backedUp(layout: Layout, root: string, contents: string): Promise<string> {
  const source = path.join(root, "home", "a.conf");
  await fs.mkdir(path.dirname(source), { recursive: true });
  await fs.writeFile(source, contents, "utf8");
  await backupFile({ layout, profile: "default", alias: "a", source });
  return source;
}

void test("restoreFile refuses to overwrite and leaves the destination untouched", async () => {
  await withLayout(async (layout, root) => {
    const source = await backedUp(layout, root, "from repo");
    await fs.writeFile(source, "local edits", "utf8");

    await assert.rejects(
      restoreFile({ layout, profile: "default", alias: "a", destination: source }),
      (error) => {
        assert.ok(error instanceof ConfsyncError);
        assert.equal(error.kind, "WouldOverwrite");
        return true;
      }
    );
    assert.equal(await fs.readFile(source, "utf8"), "local edits");
  });
});

void test("restoreFile replaces an existing file with overwrite", async () => {
  await withLayout(async (layout, root) => {
    const source = await backedUp(layout, root, "from repo");
    await fs.writeFile(source, "local edits", "utf8");

    const result = await restoreFile({
      layout,
      profile: "default",
      alias: "a",
      destination: source,
      overwrite: true
    });

    assert.equal(result.overwritten, true);
    assert.equal(result.bytes, 9);
    assert.equal(await fs.readFile(source, "utf8"), "from repo");
    assert.deepStrictEqual(await fs.readdir(path.dirname(source)), ["a.conf"]);
  });
});

void test("restoreFile creates missing parent directories", async () => {
  await withLayout(async (layout, root) => {
    await backedUp(layout, root, "from repo");
    const destination = path.join(root, "elsewhere", "deep", "a.conf");

    const result = await restoreFile({ layout, profile: "default", alias: "a", destination });

    assert.equal(result.overwritten, false);
    assert.equal(result.source, path.join(layout.dataDir, "default", "a", "a.conf"));
    assert.equal(await fs.readFile(destination, "utf8"), "from repo");
  });
});

void test("restoreFile dry run writes nothing", async () => {
  await withLayout(async (layout, root) => {
    await backedUp(layout, root, "from repo");
    const destination = path.join(root, "fresh.conf");

    const result = await restoreFile({
      layout,
      profile: "default",
      alias: "a",
      destination,
      dryRun: true
    });

    assert.equal(result.dryRun, true);
    assert.equal(result.bytes, 9);
    await assert.rejects(fs.access(destination));
  });
});

void test("restoreFile reports aliases without a backup", async () => {
  await withLayout(async (layout, root) => {
    await assert.rejects(
      restoreFile({
        layout,
        profile: "default",
        alias: "never",
        destination: path.join(root, "never.conf")
      }),
      (error) => {
        assert.ok(error instanceof ConfsyncError);
        assert.equal(error.kind, "NotFound");
        return true;
      }
    );

    // a sidecar alone is not a backup
    const aliasDir = path.join(layout.dataDir, "default", "lonely");
    await fs.mkdir(aliasDir, { recursive: true });
    await fs.writeFile(path.join(aliasDir, "lonely.conf.cmt"), "", "utf8");
    await assert.rejects(locateEntry(layout, "default", "lonely"), (error) => {
      assert.ok(error instanceof ConfsyncError);
      assert.equal(error.kind, "NotFound");
      return true;
    });
  });
});

void test("locateEntry skips the sidecar", async () => {
  await withLayout(async (layout, root) => {
    await backedUp(layout, root, "v1");
    assert.equal(
      await locateEntry(layout, "default", "a"),
      path.join(layout.dataDir, "default", "a", "a.conf")
    );
  });
});

void test("restoreFile keeps the permission bits of a file it replaces", async () => {
  await withLayout(async (layout, root) => {
    const source = await backedUp(layout, root, "Host example\n");
    await fs.chmod(source, 0o600);

    await restoreFile({ layout, profile: "default", alias: "a", destination: source, overwrite: true });

    assert.equal((await fs.stat(source)).mode & 0o777, 0o600);
    assert.equal(await fs.readFile(source, "utf8"), "Host example\n");
  });
});

void test("restoreFile leaves unrelated neighbours of the destination alone", async () => {
  await withLayout(async (layout, root) => {
    await backedUp(layout, root, "from repo");
    const destination = path.join(root, "target", "a.conf");
    const neighbour = `${destination}.partial`;
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(neighbour, "user data", "utf8");

    await restoreFile({ layout, profile: "default", alias: "a", destination });

    assert.equal(await fs.readFile(neighbour, "utf8"), "user data");
    assert.deepStrictEqual((await fs.readdir(path.dirname(destination))).sort(), [
      "a.conf",
      "a.conf.partial"
    ]);
  });
});
