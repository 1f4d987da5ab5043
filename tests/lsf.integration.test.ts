import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, realpath, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { Pool } from "pg";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { applySqlFile } from "../src/db/bootstrap.js";
import { createDb, createMemoryPool } from "../src/db/connection.js";
import { PostgresStore } from "../src/store/postgresStore.js";
import { LocalObjectStore } from "../src/artifacts/localObjectStore.js";
import { ArtifactService } from "../src/artifacts/artifactService.js";
import { PolicyEngine } from "../src/policy/policy.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import { isRunId, newArtifactId, newProjectId, type RunId } from "../src/core/ids.js";
import type { JsonObject } from "../src/core/json.js";
import { deriveRunId, localJobIdForRun } from "../src/runs/runIdentity.js";
import { BSUB_SCRIPT_VERSION, renderBsubScriptV1 } from "../src/execution/lsf/bsubScriptV1.js";
import { normalizeJobDescriptor, type LsfJobDescriptorV1 } from "../src/execution/lsf/jobDescriptor.js";
import type { LsfScheduler, LsfSchedulerQueryResult } from "../src/execution/lsf/scheduler.js";
import type { LsfSubmitter } from "../src/execution/lsf/submitter.js";
import {
  zArtifactGetOutput,
  zArtifactPreviewTextOutput,
  zLsfJobCollectOutput,
  zLsfJobGetOutput,
  zLsfJobRenderOutput,
  zLsfJobValidateOutput,
  zLsfRunLocalOutput,
  zLsfSubmitOutput
} from "../src/mcp/toolSchemas.js";

function asRunId(value: string): RunId {
  if (!isRunId(value)) throw new Error(`not a run id: ${value}`);
  return value;
}

describe.sequential("lsf gateway (stubbed bsub/bjobs)", () => {
  let tmpDir: string;
  let homeDir: string;
  let workDir: string;
  let resultsDir: string;
  let invocationsLog: string;
  let pool: Pool;
  let store: PostgresStore;
  let policy: PolicyEngine;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  const projectId = newProjectId();
  let submitCalls = 0;
  let nextJobId = "4711";
  let submittedScript = "";
  let submittedCwd: string | undefined;
  let schedulerCalls = 0;
  let schedulerMode: "unavailable" | "running" | "done" = "running";
  let submitRunId: RunId | null = null;

  function job(overrides: Partial<LsfJobDescriptorV1> = {}): LsfJobDescriptorV1 {
    return {
      version: 1,
      job_name: "SERIALJOB",
      project: "um_dke",
      output_path: path.join(resultsDir, "SERIALJOB.%J.%I"),
      time_limit: { value: "23:59", enabled: false },
      memory_mb: 16000,
      working_dir: workDir,
      environment: { kind: "conda", activate_script: "~/anaconda3/bin/activate", name: "eeg" },
      command: { argv: ["python", "-u", "main.py"] },
      shell: "sh",
      ...overrides
    };
  }

  function submitRunIdFor(descriptor: LsfJobDescriptorV1): RunId {
    return deriveRunId({
      toolName: "lsf_submit",
      contractVersion: "v1",
      policyHash: policy.policyHash,
      canonicalParams: {
        project_id: projectId,
        lsf: { script_version: BSUB_SCRIPT_VERSION, descriptor: normalizeJobDescriptor(descriptor) }
      }
    }).runId;
  }

  function textOf(res: CallToolResult): string {
    return res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
  }

  async function call(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  async function callOk(name: string, args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const res = await call(name, args);
    if (res.isError) throw new Error(`${name} failed: ${textOf(res)}`);
    if (!res.structuredContent) throw new Error(`${name} returned no structured content`);
    return res.structuredContent;
  }

  async function callError(name: string, args: Record<string, unknown>): Promise<string> {
    const outcome = await call(name, args).then(
      (res) => (res.isError ? textOf(res) : null),
      (e: unknown) => (e instanceof Error ? e.message : String(e))
    );
    if (outcome === null) throw new Error(`${name} unexpectedly succeeded`);
    return outcome;
  }

  async function preview(artifactId: string | null): Promise<string> {
    if (artifactId === null) throw new Error("no artifact to preview");
    return zArtifactPreviewTextOutput.parse(await callOk("artifact_preview_text", { artifact_id: artifactId })).preview;
  }

  beforeAll(async () => {
    tmpDir = await realpath(await mkdtemp(path.join(os.tmpdir(), "bsubgate-gateway-")));
    homeDir = path.join(tmpDir, "home");
    workDir = path.join(homeDir, "projects", "eeg_thesis", "pipeline");
    resultsDir = path.join(homeDir, "bsub_results");
    invocationsLog = path.join(tmpDir, "invocations.log");

    const condaRoot = path.join(homeDir, "anaconda3");
    const envBin = path.join(condaRoot, "envs", "eeg", "bin");
    await mkdir(path.join(condaRoot, "bin"), { recursive: true });
    await mkdir(envBin, { recursive: true });
    await mkdir(workDir, { recursive: true });
    await mkdir(resultsDir, { recursive: true });
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
        'if [ "$1" = "--big" ]; then head -c 2048 /dev/zero | tr "\\000" x; exit 0; fi',
        'echo "python $* cwd=$(pwd) env=$CONDA_DEFAULT_ENV job=$LSB_JOBID index=$LSB_JOBINDEX"',
        ""
      ].join("\n"),
      "utf8"
    );
    await chmod(python, 0o755);

    pool = createMemoryPool();
    await applySqlFile(pool, path.resolve("db/schema.sql"));
    store = new PostgresStore(createDb(pool));
    const artifacts = new ArtifactService(store, new LocalObjectStore(path.join(tmpDir, "objects")));

    policy = new PolicyEngine({
      version: 1,
      runtime: { instance_id: "test" },
      tool_allowlist: [
        "lsf_job_validate",
        "lsf_job_render",
        "lsf_submit",
        "lsf_job_get",
        "lsf_job_collect",
        "lsf_run_local",
        "artifact_get",
        "artifact_preview_text"
      ],
      quotas: { max_preview_bytes: 8192, max_preview_lines: 200, max_collect_output_bytes: 1024 },
      lsf: {
        projects_allowlist: ["um_dke"],
        queues_allowlist: ["short"],
        environments_allowlist: ["eeg"],
        working_dir_prefix_allowlist: [path.join(homeDir, "projects")],
        max_mem_mb: 32000,
        max_time_limit_minutes: 1440,
        max_array_size: 100,
        allow_scheduler_queries: true
      }
    });

    const lsfSubmitter: LsfSubmitter = {
      submit: async (scriptPath: string, opts?: { cwd?: string }) => {
        submitCalls += 1;
        submittedScript = await readFile(scriptPath, "utf8");
        submittedCwd = opts?.cwd;
        return {
          lsfJobId: nextJobId,
          queue: "normal",
          stdout: `Job <${nextJobId}> is submitted to queue <normal>.\n`,
          stderr: ""
        };
      }
    };

    const lsfScheduler: LsfScheduler = {
      query: async (jobId: string): Promise<LsfSchedulerQueryResult> => {
        schedulerCalls += 1;
        if (schedulerMode === "unavailable") return { info: null, warnings: ["bjobs unavailable: fake"] };
        const stateRaw = schedulerMode === "running" ? "RUN" : "DONE";
        const normalizedState = schedulerMode === "running" ? "running" : "succeeded";
        const exitCode = schedulerMode === "running" ? null : 0;
        return {
          info: {
            source: "bjobs",
            stateRaw,
            normalizedState,
            exitCode,
            elements: [{ jobId, stateRaw, normalizedState, exitCode }]
          },
          warnings: []
        };
      }
    };

    const server = createGatewayServer({
      policy,
      store,
      artifacts,
      runsDir: path.join(tmpDir, "runs"),
      lsfSubmitter,
      lsfScheduler,
      homeDir
    });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "bsubgate-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await pool.end();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("renders and validates without submitting", async () => {
    const rendered = zLsfJobRenderOutput.parse(await callOk("lsf_job_render", { descriptor: job() }));
    expect(rendered).toEqual({ script_version: "bsub_script_v1", script: renderBsubScriptV1(job()) });

    const valid = zLsfJobValidateOutput.parse(await callOk("lsf_job_validate", { descriptor: job() }));
    expect(valid.ok).toBe(true);
    expect(valid.issues).toEqual([]);

    const fixture = await readFile(path.resolve("tests/fixtures/serial.bsub"), "utf8");
    const fromScript = zLsfJobValidateOutput.parse(
      await callOk("lsf_job_validate", { script: fixture, check_filesystem: false })
    );
    expect(fromScript.ok).toBe(true);
    expect(fromScript.descriptor?.job_name).toBe("SERIALJOB");
    expect(fromScript.descriptor?.time_limit).toEqual({ value: "23:59", enabled: false });

    const missing = zLsfJobValidateOutput.parse(
      await callOk("lsf_job_validate", { descriptor: job({ working_dir: path.join(workDir, "missing") }) })
    );
    expect(missing.ok).toBe(false);
    expect(missing.issues.map((i) => i.code)).toEqual(["working_dir_missing"]);

    expect(await callError("lsf_job_validate", { descriptor: job(), script: fixture })).toContain(
      "pass exactly one of descriptor or script"
    );
    expect(submitCalls).toBe(0);
  });

  it("submits once and replays identical submissions", async () => {
    const first = zLsfSubmitOutput.parse(await callOk("lsf_submit", { project_id: projectId, descriptor: job() }));
    expect(first.lsf_job_id).toBe("4711");
    expect(first.queue).toBe("normal");
    expect(first.output_path_template).toBe(path.join(resultsDir, "SERIALJOB.%J.%I"));
    expect(first.provenance_run_id).toBe(submitRunIdFor(job()));
    expect(submitCalls).toBe(1);
    expect(submittedScript).toBe(renderBsubScriptV1(job()));
    expect(submittedCwd).toBe(workDir);

    const run = await store.getRun(asRunId(first.provenance_run_id));
    expect(run?.status).toBe("queued");
    expect(run?.lsfJobId).toBe("4711");

    expect(await preview(first.lsf_script_artifact_id)).toBe(renderBsubScriptV1(job()));
    const scriptArtifact = zArtifactGetOutput.parse(await callOk("artifact_get", { artifact_id: first.lsf_script_artifact_id }));
    expect(scriptArtifact.artifact.type).toBe("LSF_SCRIPT");
    expect(scriptArtifact.artifact.created_by_run_id).toBe(first.provenance_run_id);

    const second = zLsfSubmitOutput.parse(await callOk("lsf_submit", { project_id: projectId, descriptor: job() }));
    expect(second).toEqual(first);
    expect(submitCalls).toBe(1);

    submitRunId = asRunId(first.provenance_run_id);
  });

  it("reports scheduler state and refuses to collect an unfinished job", async () => {
    if (!submitRunId) throw new Error("submit test did not run");
    schedulerMode = "running";

    const state = zLsfJobGetOutput.parse(await callOk("lsf_job_get", { run_id: submitRunId }));
    expect(state).toEqual({
      target_run_id: submitRunId,
      lsf_job_id: "4711",
      state: "running",
      source: "store+bjobs",
      exit_code: null,
      elements: [{ job_id: "4711", state: "running", exit_code: null }],
      warnings: []
    });

    expect(await callError("lsf_job_collect", { run_id: submitRunId })).toContain("lsf job 4711 is not finished (state=running)");

    schedulerMode = "unavailable";
    const fallback = zLsfJobGetOutput.parse(await callOk("lsf_job_get", { run_id: submitRunId }));
    expect(fallback.state).toBe("queued");
    expect(fallback.source).toBe("store");
    expect(fallback.warnings).toEqual(["bjobs unavailable: fake"]);
  });

  it("collects the output file once the job is done", async () => {
    if (!submitRunId) throw new Error("submit test did not run");
    schedulerMode = "done";
    await writeFile(path.join(resultsDir, "SERIALJOB.4711.0"), "epoch 1 loss 0.50\n", "utf8");

    const collected = zLsfJobCollectOutput.parse(await callOk("lsf_job_collect", { run_id: submitRunId }));
    expect(collected.state).toBe("succeeded");
    expect(collected.exit_code).toBe(0);
    expect(collected.lsf_job_id).toBe("4711");
    expect(collected.warnings).toEqual([]);
    expect(Object.keys(collected.artifacts_by_role)).toEqual(["output"]);

    const outputId = collected.artifacts_by_role["output"];
    if (!outputId) throw new Error("missing output artifact");
    expect(await preview(outputId)).toBe("epoch 1 loss 0.50\n");

    const target = await store.getRun(submitRunId);
    expect(target?.status).toBe("succeeded");
    expect(target?.exitCode).toBe(0);
    expect(target?.finishedAt).not.toBeNull();

    const after = zLsfJobGetOutput.parse(await callOk("lsf_job_get", { run_id: submitRunId }));
    expect(after.state).toBe("succeeded");
    expect(after.source).toBe("store");

    const queriesBefore = schedulerCalls;
    const again = zLsfJobCollectOutput.parse(await callOk("lsf_job_collect", { run_id: submitRunId }));
    expect(again).toEqual(collected);
    expect(schedulerCalls).toBe(queriesBefore);
  });

  it("blocks submissions the policy denies", async () => {
    const denied = job({ project: "other" });
    expect(await callError("lsf_submit", { project_id: projectId, descriptor: denied })).toContain(
      "policy denied lsf project: other"
    );
    expect(submitCalls).toBe(1);

    const run = await store.getRun(submitRunIdFor(denied));
    expect(run?.status).toBe("blocked");
    expect(run?.error).toContain("policy denied lsf project: other");
  });

  it("fails submissions whose descriptor does not validate", async () => {
    const broken = job({ working_dir: path.join(homeDir, "projects", "gone") });
    expect(await callError("lsf_submit", { project_id: projectId, descriptor: broken })).toContain("working_dir_missing");
    expect(submitCalls).toBe(1);

    const run = await store.getRun(submitRunIdFor(broken));
    expect(run?.status).toBe("failed");
  });

  it("runs a job locally exactly once and replays the result", async () => {
    const first = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: job() }));
    const jobId = localJobIdForRun(asRunId(first.provenance_run_id));

    expect(first.local_job_id).toBe(jobId);
    expect(first.array_index).toBe(0);
    expect(first.exit_code).toBe(0);
    expect(first.output_path).toBe(path.join(resultsDir, `SERIALJOB.${jobId}.0`));
    expect(first.error_artifact_id).toBeNull();
    expect(first.warnings).toEqual([]);
    expect(await preview(first.output_artifact_id)).toBe(`python -u main.py cwd=${workDir} env=eeg job=${jobId} index=0\n`);
    expect(await preview(first.lsf_script_artifact_id)).toBe(renderBsubScriptV1(job()));

    const run = await store.getRun(asRunId(first.provenance_run_id));
    expect(run?.status).toBe("succeeded");
    expect(run?.exitCode).toBe(0);

    const second = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: job() }));
    expect(second).toEqual(first);
    expect(await readFile(invocationsLog, "utf8")).toBe("invoked\n");
  });

  it("records a failed local run with its exit code", async () => {
    const failing = job({ command: { argv: ["python", "--fail"] } });
    const res = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: failing }));
    expect(res.exit_code).toBe(3);
    expect(await preview(res.output_artifact_id)).toBe("boom\n");

    const run = await store.getRun(asRunId(res.provenance_run_id));
    expect(run?.status).toBe("failed");
    expect(run?.exitCode).toBe(3);
    expect(run?.error).toBe("job exit_code=3");
  });

  it("blocks an oversized job array before enumerating it", async () => {
    const callsBefore = submitCalls;
    const huge = job({ array: { start: 1, end: 1_000_000_000 } });
    expect(await callError("lsf_submit", { project_id: projectId, descriptor: huge })).toContain(
      "policy denied array size 1000000000 (max 100)"
    );
    expect(submitCalls).toBe(callsBefore);
    expect((await store.getRun(submitRunIdFor(huge)))?.status).toBe("blocked");

    const stepped = job({ array: { start: 1, end: 1_000_000_000, step: 2 } });
    expect(
      await callError("lsf_run_local", { project_id: projectId, descriptor: stepped, array_index: 4 })
    ).toContain("array_index 4 is not part of job SERIALJOB");
  });

  it("collects every element of an array job with separate error files", async () => {
    nextJobId = "4712";
    schedulerMode = "done";
    const sweep = job({
      job_name: "SWEEP",
      output_path: path.join(resultsDir, "SWEEP.%J.%I.out"),
      error_path: path.join(resultsDir, "SWEEP.%J.%I.err"),
      array: { start: 1, end: 3, step: 2 }
    });
    const submitted = zLsfSubmitOutput.parse(await callOk("lsf_submit", { project_id: projectId, descriptor: sweep }));
    nextJobId = "4711";
    expect(submitted.lsf_job_id).toBe("4712");

    await writeFile(path.join(resultsDir, "SWEEP.4712.1.out"), "element 1\n", "utf8");
    await writeFile(path.join(resultsDir, "SWEEP.4712.1.err"), "warning 1\n", "utf8");
    await writeFile(path.join(resultsDir, "SWEEP.4712.3.out"), "element 3\n", "utf8");

    const collected = zLsfJobCollectOutput.parse(
      await callOk("lsf_job_collect", { run_id: submitted.provenance_run_id })
    );
    expect(collected.state).toBe("succeeded");
    expect(Object.keys(collected.artifacts_by_role)).toEqual(["output[1]", "error[1]", "output[3]"]);
    expect(collected.warnings).toEqual([`error[3] file not found: ${path.join(resultsDir, "SWEEP.4712.3.err")}`]);
    expect(await preview(collected.artifacts_by_role["output[1]"] ?? null)).toBe("element 1\n");
    expect(await preview(collected.artifacts_by_role["error[1]"] ?? null)).toBe("warning 1\n");
    expect(await preview(collected.artifacts_by_role["output[3]"] ?? null)).toBe("element 3\n");

    const roles = (await store.listRunOutputs(asRunId(submitted.provenance_run_id))).map((o) => o.role).sort();
    expect(roles).toEqual(["error[1]", "lsf_script", "output[1]", "output[3]"]);
  });

  it("blocks a collect over the output cap and reuses the partial import on retry", async () => {
    nextJobId = "4713";
    schedulerMode = "done";
    const big = job({ job_name: "BIG", output_path: path.join(resultsDir, "BIG.%J.%I"), array: { start: 1, end: 2 } });
    const submitted = zLsfSubmitOutput.parse(await callOk("lsf_submit", { project_id: projectId, descriptor: big }));
    nextJobId = "4711";
    const targetRunId = asRunId(submitted.provenance_run_id);

    const oversized = path.join(resultsDir, "BIG.4713.2");
    await writeFile(path.join(resultsDir, "BIG.4713.1"), "small 1\n", "utf8");
    await writeFile(oversized, "x".repeat(2048), "utf8");

    expect(await callError("lsf_job_collect", { run_id: targetRunId })).toContain(
      `policy denied output[2] output: ${oversized} exceeds max_bytes=1024`
    );
    const collectRunId = deriveRunId({
      toolName: "lsf_job_collect",
      contractVersion: "v1",
      policyHash: policy.policyHash,
      canonicalParams: { target_run_id: targetRunId }
    }).runId;
    expect((await store.getRun(collectRunId))?.status).toBe("blocked");
    expect((await store.getRun(targetRunId))?.status).toBe("queued");
    const partial = (await store.listRunOutputs(targetRunId)).find((o) => o.role === "output[1]");
    if (!partial) throw new Error("output[1] was not linked");

    await writeFile(oversized, "small 2\n", "utf8");
    const collected = zLsfJobCollectOutput.parse(await callOk("lsf_job_collect", { run_id: targetRunId }));
    expect(collected.artifacts_by_role["output[1]"]).toBe(partial.artifactId);
    expect(await preview(collected.artifacts_by_role["output[2]"] ?? null)).toBe("small 2\n");
    expect((await store.getRun(collectRunId))?.status).toBe("succeeded");
    expect((await store.getRun(targetRunId))?.status).toBe("succeeded");
  });

  it("keeps the exit code of a local run whose output is over the cap and does not rerun it", async () => {
    const invocations = async () => (await readFile(invocationsLog, "utf8")).split("\n").filter((l) => l === "invoked").length;
    const before = await invocations();
    const noisy = job({ command: { argv: ["python", "--big"] } });

    const first = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: noisy }));
    const outputPath = path.join(resultsDir, `SERIALJOB.${first.local_job_id}.0`);
    expect(first.exit_code).toBe(0);
    expect(first.output_path).toBe(outputPath);
    expect(first.output_artifact_id).toBeNull();
    expect(first.warnings).toEqual([`output skipped: ${outputPath} exceeds max_bytes=1024`]);
    expect((await store.getRun(asRunId(first.provenance_run_id)))?.status).toBe("succeeded");

    const second = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: noisy }));
    expect(second).toEqual(first);
    expect(await invocations()).toBe(before + 1);
    expect((await readFile(outputPath, "utf8")).length).toBe(2048);
  });

  it("starts the output file fresh when a run that never finished is retried", async () => {
    const retried = job({ command: { argv: ["python", "-u", "retry.py"] } });
    const canonicalParams: JsonObject = {
      project_id: projectId,
      lsf: { script_version: BSUB_SCRIPT_VERSION, descriptor: normalizeJobDescriptor(retried) },
      array_index: 0
    };
    const { runId, paramsHash } = deriveRunId({
      toolName: "lsf_run_local",
      contractVersion: "v1",
      policyHash: policy.policyHash,
      canonicalParams
    });
    await store.createRun({
      runId,
      projectId,
      toolName: "lsf_run_local",
      contractVersion: "v1",
      paramsHash,
      canonicalParams,
      policyHash: policy.policyHash,
      status: "running",
      requestedBy: null,
      policySnapshot: null,
      environment: null
    });
    const jobId = localJobIdForRun(runId);
    await writeFile(path.join(resultsDir, `SERIALJOB.${jobId}.0`), "partial output\n", "utf8");

    const res = zLsfRunLocalOutput.parse(await callOk("lsf_run_local", { project_id: projectId, descriptor: retried }));
    expect(res.provenance_run_id).toBe(runId);
    expect(await preview(res.output_artifact_id)).toBe(`python -u retry.py cwd=${workDir} env=eeg job=${jobId} index=0\n`);
  });

  it("rejects unknown artifacts", async () => {
    const id = newArtifactId();
    expect(await callError("artifact_get", { artifact_id: id })).toContain(`unknown artifact_id: ${id}`);
  });
});
