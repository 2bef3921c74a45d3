import os from "os";
import path from "path";

const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function expandHome(inputPath: string, home: string = os.homedir()): string {
  if (inputPath === "~") {
    return home;
  }
  if (inputPath.startsWith("~/") || inputPath.startsWith(`~${path.sep}`)) {
    return path.join(home, inputPath.slice(2));
  }
  return inputPath;
}

/** Substitutes `$NAME` and `${NAME}`; unset names are left as written. */
export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  return inputPath.replace(
    ENV_REFERENCE,
    (match: string, braced: string | undefined, bare: string | undefined): string => {
      const value = env[braced ?? bare ?? ""];
      return value && value.length > 0 ? value : match;
    }
  );
}

export interface ResolvePathOptions {
  home?: string;
  cwd?: string;
}

/** Expands env references and `~`, then makes the result absolute. */
export function resolvePath(
  inputPath: string,
  env: NodeJS.ProcessEnv,
  options: ResolvePathOptions = {}
): string {
  const expanded = expandHome(expandEnv(inputPath.trim(), env), options.home);
  return path.resolve(options.cwd ?? process.cwd(), expanded);
}

/** Reads an env var as a path, or null when unset or blank. */
export function envPath(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name];
  if (!value || value.trim().length === 0) {
    return null;
  }
  return resolvePath(value, env);
}
