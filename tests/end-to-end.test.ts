import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { backupFile } from "../src/backup";
import { addTracking, resolveAlias } from "../src/config";
import { readHistory } from "../src/history";
import { restoreFile } from "../src/restore";

void test("track, back up twice and restore the latest contents", async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "confsync-"));
  try {
    const layout = { configDir: path.join(root, "config"), dataDir: path.join(root, "data") };
    const file = path.join(root, "a.conf");
    await fs.writeFile(file, "v1", "utf8");

    const tracked = await addTracking(layout, file, "a");
    assert.equal(await resolveAlias(layout, "a"), tracked);

    await backupFile({ layout, profile: "default", alias: "a", source: tracked });
    assert.equal(
      (await readHistory({ layout, profile: "default", alias: "a", tracked: true })).length,
      1
    );

    await fs.writeFile(file, "v2", "utf8");
    await backupFile({ layout, profile: "default", alias: "a", source: tracked });
    assert.equal(
      (await readHistory({ layout, profile: "default", alias: "a", tracked: true })).length,
      2
    );

    const destination = path.join(root, "restored", "a.conf");
    const result = await restoreFile({ layout, profile: "default", alias: "a", destination });
    assert.equal(result.overwritten, false);
    assert.equal(await fs.readFile(destination, "utf8"), "v2");
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
});
