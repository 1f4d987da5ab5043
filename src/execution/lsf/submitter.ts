import { spawnSync } from "child_process";
import { promises as fs } from "fs";

export interface LsfSubmitResult {
  lsfJobId: string;
  queue: string | null;
  stdout: string;
  stderr: string;
}

export interface LsfSubmitter {
  /** `cwd` is the submission directory; LSF resolves relative `-o`/`-e` paths against it. */
  submit(scriptPath: string, opts?: { cwd?: string }): Promise<LsfSubmitResult>;
}

export function parseBsubJobId(output: string): { jobId: string; queue: string | null } | null {
  const m = /Job <(\d+)> is submitted to (?:default )?queue <([^>]*)>/.exec(output);
  if (m && m[1]) return { jobId: m[1], queue: m[2] ? m[2] : null };

  const bare = /Job <(\d+)>/.exec(output);
  return bare && bare[1] ? { jobId: bare[1], queue: null } : null;
}

/**
 * Submits with `bsub < script`: LSF only honours `#BSUB` lines when the
 * script arrives on stdin.
 */
export class BsubSubmitter implements LsfSubmitter {
  async submit(scriptPath: string, opts: { cwd?: string } = {}): Promise<LsfSubmitResult> {
    const script = await fs.readFile(scriptPath, "utf8");
    const res = spawnSync("bsub", [], {
      input: script,
      cwd: opts.cwd,
      stdio: ["pipe", "pipe", "pipe"]
    });
    const stdout = res.stdout ? res.stdout.toString("utf8") : "";
    const stderr = res.stderr ? res.stderr.toString("utf8") : "";

    if (res.error) {
      throw res.error;
    }
    if (res.status !== 0) {
      throw new Error(`bsub failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`);
    }

    const parsed = parseBsubJobId(stdout) ?? parseBsubJobId(stderr);
    if (!parsed) {
      throw new Error(`unable to parse bsub job id from output: ${stdout || stderr}`);
    }

    return { lsfJobId: parsed.jobId, queue: parsed.queue, stdout, stderr };
  }
}
