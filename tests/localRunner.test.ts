import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, realpath, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { LocalLsfRunner } from "../src/execution/localRunner.js";
import type { LsfJobDescriptorV1 } from "../src/execution/lsf/jobDescriptor.js";

describe.sequential("LocalLsfRunner", () => {
  let tmpDir: string;
  let homeDir: string;
  let workDir: string;
  let invocationsLog: string;
  const runner = new LocalLsfRunner();

  function job(overrides: Partial<LsfJobDescriptorV1> = {}): LsfJobDescriptorV1 {
    return {
      version: 1,
      job_name: "SERIALJOB",
      project: "um_dke",
      output_path: path.join(tmpDir, "results", "SERIALJOB.%J.%I"),
      time_limit: { value: "23:59", enabled: false },
      memory_mb: 16000,
      working_dir: workDir,
      environment: { kind: "conda", activate_script: "~/anaconda3/bin/activate", name: "eeg" },
      command: { argv: ["python", "-u", "main.py"] },
      shell: "sh",
      ...overrides
    };
  }

  beforeAll(async () => {
    tmpDir = await realpath(await mkdtemp(path.join(os.tmpdir(), "bsubgate-local-")));
    homeDir = path.join(tmpDir, "home");
    workDir = path.join(tmpDir, "pipeline");
    invocationsLog = path.join(tmpDir, "invocations.log");

    const condaRoot = path.join(homeDir, "anaconda3");
    const envBin = path.join(condaRoot, "envs", "eeg", "bin");
    await mkdir(path.join(condaRoot, "bin"), { recursive: true });
    await mkdir(envBin, { recursive: true });
    await mkdir(workDir, { recursive: true });

    await writeFile(
      path.join(condaRoot, "bin", "activate"),
      [`export PATH="${envBin}:$PATH"`, "export CONDA_DEFAULT_ENV=eeg", ""].join("\n"),
      "utf8"
    );

    const python = path.join(envBin, "python");
    await writeFile(
      python,
      [
        "#!/bin/sh",
        `echo invoked >> "${invocationsLog}"`,
        'if [ "$1" = "--fail" ]; then echo boom >&2; exit 3; fi',
        'echo "python $* cwd=$(pwd) env=$CONDA_DEFAULT_ENV job=$LSB_JOBID index=$LSB_JOBINDEX"',
        ""
      ].join("\n"),
      "utf8"
    );
    await chmod(python, 0o755);
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("runs the command once in the working directory with the environment active", async () => {
    const res = await runner.execute({
      descriptor: job(),
      jobId: "4711",
      scriptPath: path.join(tmpDir, "run1", "job.bsub"),
      homeDir
    });

    expect(res.exitCode).toBe(0);
    expect(res.outputPath).toBe(path.join(tmpDir, "results", "SERIALJOB.4711.0"));
    expect(res.errorPath).toBeNull();
    expect(await readFile(res.outputPath, "utf8")).toBe(`python -u main.py cwd=${workDir} env=eeg job=4711 index=0\n`);
    expect(await readFile(invocationsLog, "utf8")).toBe("invoked\n");
    expect(await readFile(path.join(tmpDir, "run1", "job.bsub"), "utf8")).toContain(". ~/anaconda3/bin/activate eeg\n");
  });

  it("passes the exit code through and writes stderr to the -e file", async () => {
    const res = await runner.execute({
      descriptor: job({
        command: { argv: ["python", "--fail"] },
        error_path: path.join(tmpDir, "results", "SERIALJOB.%J.err")
      }),
      jobId: "4712",
      scriptPath: path.join(tmpDir, "run2", "job.bsub"),
      homeDir
    });

    expect(res.exitCode).toBe(3);
    expect(res.errorPath).toBe(path.join(tmpDir, "results", "SERIALJOB.4712.err"));
    expect(await readFile(path.join(tmpDir, "results", "SERIALJOB.4712.err"), "utf8")).toBe("boom\n");
    expect(await readFile(res.outputPath, "utf8")).toBe("");
  });

  it("sets the array index for array elements", async () => {
    const res = await runner.execute({
      descriptor: job({ array: { start: 1, end: 4 } }),
      jobId: "4713",
      arrayIndex: 3,
      scriptPath: path.join(tmpDir, "run3", "job.bsub"),
      homeDir
    });

    expect(res.outputPath).toBe(path.join(tmpDir, "results", "SERIALJOB.4713.3"));
    expect(await readFile(res.outputPath, "utf8")).toBe(`python -u main.py cwd=${workDir} env=eeg job=4713 index=3\n`);
  });

  it("appends to an existing output file unless asked to start it empty", async () => {
    const outputPath = path.join(tmpDir, "results", "SERIALJOB.4714.0");
    await writeFile(outputPath, "stale\n", "utf8");

    await runner.execute({ descriptor: job(), jobId: "4714", scriptPath: path.join(tmpDir, "run5", "job.bsub"), homeDir });
    const line = `python -u main.py cwd=${workDir} env=eeg job=4714 index=0\n`;
    expect(await readFile(outputPath, "utf8")).toBe(`stale\n${line}`);

    await runner.execute({
      descriptor: job(),
      jobId: "4714",
      scriptPath: path.join(tmpDir, "run5", "job.bsub"),
      homeDir,
      truncateOutput: true
    });
    expect(await readFile(outputPath, "utf8")).toBe(line);
  });

  it("reports a job killed by a signal as 128 plus the signal number", async () => {
    const res = await runner.execute({
      descriptor: job({ command: { argv: ["sh", "-c", "kill -TERM $$"] } }),
      jobId: "4715",
      scriptPath: path.join(tmpDir, "run6", "job.bsub"),
      homeDir
    });
    expect(res.exitCode).toBe(128 + os.constants.signals.SIGTERM);
  });

  it("rejects an index outside the job", async () => {
    await expect(
      runner.execute({ descriptor: job(), jobId: "1", arrayIndex: 5, scriptPath: path.join(tmpDir, "run4", "job.bsub") })
    ).rejects.toThrow("array index 5 is not part of job SERIALJOB");
  });

  it("checks membership of very large arrays without enumerating them", async () => {
    const descriptor = job({ array: { start: 1, end: Number.MAX_SAFE_INTEGER, step: 2 } });
    await expect(
      runner.execute({ descriptor, jobId: "1", arrayIndex: 4, scriptPath: path.join(tmpDir, "run7", "job.bsub") })
    ).rejects.toThrow("array index 4 is not part of job SERIALJOB");
  });
});
