import { ioFailure } from "./errors";
import { filesEqual, statOrNull } from "./filesystem";
import { getEntryPath } from "./layout";
import type { ConfsyncConfigFile, Layout, StatusEntry } from "./types";

export interface StatusOptions {
  layout: Layout;
  profile: string;
  config: ConfsyncConfigFile;
}

export async function getStatus(options: StatusOptions): Promise<StatusEntry[]> {
  const { layout, profile, config } = options;
  const aliases = Object.keys(config.tracking.files).sort((a, b) => a.localeCompare(b));

  const results: StatusEntry[] = [];
  for (const alias of aliases) {
    const source = config.tracking.files[alias];
    const destination = getEntryPath(layout, profile, alias, source);
    try {
      const sourceStat = await statOrNull(source);
      if (!sourceStat) {
        results.push({ alias, path: source, status: "missing", reason: "source missing" });
        continue;
      }
      if (!sourceStat.isFile()) {
        results.push({ alias, path: source, status: "missing", reason: "not a regular file" });
        continue;
      }

      const stored = await statOrNull(destination);
      if (!stored) {
        results.push({ alias, path: source, status: "pending", reason: "not backed up" });
        continue;
      }
      if (!(await filesEqual(source, destination))) {
        results.push({ alias, path: source, status: "modified", reason: "content changed" });
        continue;
      }
      results.push({ alias, path: source, status: "ok" });
    } catch (error) {
      throw ioFailure(`Failed to check ${alias}`, error);
    }
  }

  return results;
}
