import { promises as fs } from "fs";
import path from "path";
import type { RunId } from "../core/ids.js";

export interface RunWorkspace {
  rootDir: string;
  metaDir: string;
  outDir: string;
  metaPath(name: string): string;
  outPath(name: string): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** `<runsDir>/<runId>/meta` holds the script and job id, `out` holds local job output. */
export async function createRunWorkspace(runsDir: string, runId: RunId): Promise<RunWorkspace> {
  const root = path.resolve(runsDir, runId);
  const metaDir = path.join(root, "meta");
  const outDir = path.join(root, "out");

  await fs.mkdir(metaDir, { recursive: true });
  await fs.mkdir(outDir, { recursive: true });

  return {
    rootDir: root,
    metaDir,
    outDir,
    metaPath: (name: string) => safeJoin(metaDir, name),
    outPath: (name: string) => safeJoin(outDir, name)
  };
}
