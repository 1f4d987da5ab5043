import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { LsfJobDescriptorV1 } from "./jobDescriptor.js";

export type EnvironmentSpec = LsfJobDescriptorV1["environment"];

export type EnvironmentResolution =
  | { ok: true; activateScript: string; prefix: string }
  | { ok: false; reason: string };

export interface EnvironmentResolver {
  resolve(env: EnvironmentSpec): Promise<EnvironmentResolution>;
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/")) return path.join(homeDir, p.slice(2));
  return p;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves `source <conda>/bin/activate <name>` against the filesystem:
 * `base` (or the installation root) maps to the root prefix, anything else
 * to `<root>/envs/<name>`, and an absolute name to that directory.
 */
export class CondaEnvironmentResolver implements EnvironmentResolver {
  private readonly homeDir: string;

  constructor(opts: { homeDir?: string } = {}) {
    this.homeDir = opts.homeDir ?? os.homedir();
  }

  async resolve(env: EnvironmentSpec): Promise<EnvironmentResolution> {
    const activateScript = path.resolve(expandHome(env.activate_script, this.homeDir));
    if (!(await isFile(activateScript))) {
      return { ok: false, reason: `activate script not found: ${activateScript}` };
    }

    const root = path.dirname(path.dirname(activateScript));
    const name = expandHome(env.name, this.homeDir);

    let prefix: string;
    if (name === "base" || path.resolve(root, name) === root) prefix = root;
    else if (path.isAbsolute(name)) prefix = name;
    else prefix = path.join(root, "envs", name);

    if (!(await isDirectory(prefix))) {
      return { ok: false, reason: `conda environment not found: ${env.name} (looked in ${prefix})` };
    }
    return { ok: true, activateScript, prefix };
  }
}
