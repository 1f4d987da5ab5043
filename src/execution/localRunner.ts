import { spawn } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { renderBsubScriptV1 } from "./lsf/bsubScriptV1.js";
import { hasArrayIndex, normalizeJobDescriptor, type LsfJobDescriptorV1 } from "./lsf/jobDescriptor.js";
import { resolveOutputPath } from "./lsf/outputTemplate.js";

export interface LocalRunInput {
  descriptor: LsfJobDescriptorV1;
  /** Stands in for the LSF job id in `%J` and `LSB_JOBID`. */
  jobId: string;
  arrayIndex?: number;
  scriptPath: string;
  homeDir?: string;
  env?: Record<string, string>;
  /** Start the `-o`/`-e` files empty instead of appending to them. */
  truncateOutput?: boolean;
}

export interface LocalRunResult {
  exitCode: number;
  outputPath: string;
  errorPath: string | null;
  startedAt: string;
  finishedAt: string;
}

/**
 * Runs a job descriptor on this machine the way an LSF execution host would:
 * one shell process for the rendered script, `LSB_*` variables set, and
 * stdout/stderr appended to the resolved `-o`/`-e` files.
 */
export class LocalLsfRunner {
  async execute(input: LocalRunInput): Promise<LocalRunResult> {
    const d = normalizeJobDescriptor(input.descriptor);
    const arrayIndex = input.arrayIndex ?? 0;
    if (!hasArrayIndex(d, arrayIndex)) {
      throw new Error(`array index ${arrayIndex} is not part of job ${d.job_name}`);
    }

    const ids = { jobId: input.jobId, arrayIndex };
    const where = { workingDir: d.working_dir, homeDir: input.homeDir };
    const outputPath = resolveOutputPath(d.output_path, ids, where);
    const errorPath = d.error_path ? resolveOutputPath(d.error_path, ids, where) : null;

    const script = renderBsubScriptV1(input.descriptor);
    await fs.mkdir(path.dirname(input.scriptPath), { recursive: true });
    await fs.writeFile(input.scriptPath, script, { encoding: "utf8", mode: 0o700 });

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    if (errorPath) await fs.mkdir(path.dirname(errorPath), { recursive: true });

    const flags = input.truncateOutput ? "w" : "a";
    const out = await fs.open(outputPath, flags);
    const err = errorPath ? await fs.open(errorPath, flags) : null;
    const startedAt = new Date().toISOString();

    try {
      const child = spawn(d.shell, [input.scriptPath], {
        cwd: path.dirname(input.scriptPath),
        env: {
          ...process.env,
          ...(input.homeDir ? { HOME: input.homeDir } : {}),
          ...input.env,
          LSB_JOBID: input.jobId,
          LSB_JOBINDEX: String(arrayIndex),
          LSB_JOBNAME: d.array ? `${d.job_name}[${arrayIndex}]` : d.job_name,
          LSB_PROJECT_NAME: d.project
        },
        stdio: ["ignore", out.fd, err ? err.fd : out.fd]
      });

      const exitCode = await new Promise<number>((resolve, reject) => {
        child.on("error", reject);
        child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
          resolve(code ?? (signal ? 128 + os.constants.signals[signal] : 1));
        });
      });

      return { exitCode, outputPath, errorPath, startedAt, finishedAt: new Date().toISOString() };
    } finally {
      await out.close();
      if (err) await err.close();
    }
  }
}
