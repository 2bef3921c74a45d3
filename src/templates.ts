import type { ConfsyncConfigFile } from "./types";

export const SELF_ALIAS = "confsync";

/** Fresh document that tracks the config file itself. */
export function createDefaultConfig(configPath: string): ConfsyncConfigFile {
  return {
    storage: {
      local: true,
      repo_url: ""
    },
    tracking: {
      files: {
        [SELF_ALIAS]: configPath
      }
    }
  };
}
