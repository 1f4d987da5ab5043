import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { promises as fs } from "fs";
import path from "path";
import type { ArtifactRecord } from "../core/artifact.js";
import { isArtifactId, isProjectId, isRunId, type ArtifactId, type ProjectId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { ArtifactService } from "../artifacts/artifactService.js";
import { ObjectTooLargeError } from "../artifacts/localObjectStore.js";
import type { PostgresStore } from "../store/postgresStore.js";
import type { PolicyEngine } from "../policy/policy.js";
import { ToolRun, requestedByFromExtra } from "../runs/toolRun.js";
import { deriveRunId, localJobIdForRun } from "../runs/runIdentity.js";
import { createRunWorkspace } from "../execution/workspace.js";
import { LocalLsfRunner } from "../execution/localRunner.js";
import { BSUB_SCRIPT_VERSION, parseBsubScriptV1, renderBsubScriptV1 } from "../execution/lsf/bsubScriptV1.js";
import { CondaEnvironmentResolver, expandHome, type EnvironmentResolver } from "../execution/lsf/environment.js";
import {
  arrayIndices,
  arraySize,
  hasArrayIndex,
  normalizeJobDescriptor,
  type LsfJobDescriptorV1
} from "../execution/lsf/jobDescriptor.js";
import { resolveOutputPath } from "../execution/lsf/outputTemplate.js";
import { BjobsScheduler, type LsfScheduler } from "../execution/lsf/scheduler.js";
import { BsubSubmitter, type LsfSubmitter } from "../execution/lsf/submitter.js";
import { validateJobDescriptor, type JobDescriptorValidation } from "../execution/lsf/validate.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zArtifactGetInput,
  zArtifactGetOutput,
  zArtifactPreviewTextInput,
  zArtifactPreviewTextOutput,
  zLsfJobCollectInput,
  zLsfJobCollectOutput,
  zLsfJobDescriptor,
  zLsfJobGetInput,
  zLsfJobGetOutput,
  zLsfJobRenderInput,
  zLsfJobRenderOutput,
  zLsfJobValidateInput,
  zLsfJobValidateOutput,
  zLsfRunLocalInput,
  zLsfRunLocalOutput,
  zLsfSubmitInput,
  zLsfSubmitOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  policy: PolicyEngine;
  store: PostgresStore;
  artifacts: ArtifactService;
  runsDir: string;
  lsfSubmitter?: LsfSubmitter;
  lsfScheduler?: LsfScheduler;
  environmentResolver?: EnvironmentResolver;
  localRunner?: LocalLsfRunner;
  /** Replaces the process home directory for `~/` paths. */
  homeDir?: string;
}

function toArtifactSummary(a: ArtifactRecord): JsonObject {
  return {
    artifact_id: a.artifactId,
    project_id: a.projectId,
    type: a.type,
    mime_type: a.mimeType,
    size_bytes: a.sizeBytes.toString(),
    checksum_sha256: a.checksumSha256,
    label: a.label,
    created_at: a.createdAt,
    created_by_run_id: a.createdByRunId,
    metadata: a.metadata
  };
}

function requireProjectId(value: string): ProjectId {
  if (!isProjectId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid project_id: ${value}`);
  return value;
}

function requireRunId(value: string): RunId {
  if (!isRunId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${value}`);
  return value;
}

function requireArtifactId(value: string): ArtifactId {
  if (!isArtifactId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid artifact_id: ${value}`);
  return value;
}

function assertValid(validation: JobDescriptorValidation): void {
  if (validation.ok) return;
  const details = validation.issues.map((i) => `${i.code} (${i.field}): ${i.message}`).join("; ");
  throw new McpError(ErrorCode.InvalidParams, `invalid job descriptor: ${details}`);
}

function descriptorFromParams(params: JsonObject | null, runId: RunId): LsfJobDescriptorV1 {
  const lsf = params?.["lsf"];
  const raw = typeof lsf === "object" && lsf !== null && "descriptor" in lsf ? lsf.descriptor : undefined;
  const parsed = zLsfJobDescriptor.safeParse(raw);
  if (!parsed.success) throw new Error(`run ${runId} has no stored job descriptor`);
  return parsed.data;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.lstat(filePath);
    return st.isFile() && !st.isSymbolicLink();
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return false;
    throw e;
  }
}

/** Records the outcome on the run, then rethrows. Policy denials end as `blocked`. */
async function failRun(toolRun: ToolRun | null, e: unknown): Promise<never> {
  if (e instanceof McpError) {
    if (toolRun) {
      if (e.code === ErrorCode.InvalidRequest) await toolRun.finishBlocked(e.message);
      else await toolRun.finishFailure(e.message);
    }
    throw e;
  }
  if (e instanceof Error) {
    if (toolRun) await toolRun.finishFailure(e.message);
    throw e;
  }
  if (toolRun) await toolRun.finishFailure("unknown error");
  throw new Error("unknown error");
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "bsubgate",
    version: "0.1.0"
  });

  const submitter = deps.lsfSubmitter ?? new BsubSubmitter();
  const scheduler = deps.lsfScheduler ?? new BjobsScheduler();
  const resolver = deps.environmentResolver ?? new CondaEnvironmentResolver({ homeDir: deps.homeDir });
  const localRunner = deps.localRunner ?? new LocalLsfRunner();

  function openRun(input: {
    runId: RunId;
    projectId: ProjectId;
    toolName: string;
    contractVersion: string;
    paramsHash: `sha256:${string}`;
    canonicalParams: JsonObject;
    requestedBy: string | null;
  }): ToolRun {
    return new ToolRun(
      { store: deps.store, artifacts: deps.artifacts },
      {
        ...input,
        policyHash: deps.policy.policyHash,
        policySnapshot: deps.policy.snapshot(),
        environment: envSnapshot()
      }
    );
  }

  /** Throws `ObjectTooLargeError` past `max_collect_output_bytes`. */
  function importJobOutputFile(input: { projectId: ProjectId; createdByRunId: RunId; filePath: string }): Promise<ArtifactRecord> {
    return deps.artifacts.importArtifact({
      projectId: input.projectId,
      source: { kind: "local_path", path: input.filePath },
      type: "JOB_OUTPUT",
      label: path.basename(input.filePath),
      createdByRunId: input.createdByRunId,
      maxBytes: deps.policy.maxCollectOutputBytes()
    });
  }

  async function importJobOutput(input: {
    projectId: ProjectId;
    createdByRunId: RunId;
    filePath: string;
    role: string;
  }): Promise<ArtifactRecord> {
    try {
      return await importJobOutputFile(input);
    } catch (e) {
      if (e instanceof ObjectTooLargeError) {
        throw new McpError(ErrorCode.InvalidRequest, `policy denied ${input.role} output: ${e.message}`);
      }
      throw e;
    }
  }

  mcp.registerTool(
    "lsf_job_validate",
    {
      description: "Check an LSF job descriptor (or a bsub script) against the filesystem and conda installation.",
      inputSchema: zLsfJobValidateInput,
      outputSchema: zLsfJobValidateOutput
    },
    async (args) => {
      deps.policy.assertToolAllowed("lsf_job_validate");

      if ((args.descriptor === undefined) === (args.script === undefined)) {
        throw new McpError(ErrorCode.InvalidParams, "pass exactly one of descriptor or script");
      }

      let descriptor: LsfJobDescriptorV1;
      let scriptWarnings: string[] = [];
      if (args.descriptor) {
        descriptor = args.descriptor;
      } else {
        try {
          const parsed = parseBsubScriptV1(args.script ?? "");
          descriptor = parsed.descriptor;
          scriptWarnings = parsed.warnings;
        } catch (e) {
          throw new McpError(ErrorCode.InvalidParams, `unreadable bsub script: ${e instanceof Error ? e.message : String(e)}`);
        }
      }

      const validation = await validateJobDescriptor(descriptor, {
        resolver,
        checkFilesystem: args.check_filesystem,
        homeDir: deps.homeDir
      });

      return {
        content: [
          {
            type: "text",
            text: validation.ok ? `${descriptor.job_name}: ok` : `${descriptor.job_name}: ${validation.issues.length} issue(s)`
          }
        ],
        structuredContent: {
          ok: validation.ok,
          issues: validation.issues,
          descriptor,
          script_warnings: scriptWarnings
        }
      };
    }
  );

  mcp.registerTool(
    "lsf_job_render",
    {
      description: "Render an LSF job descriptor as a bsub job script.",
      inputSchema: zLsfJobRenderInput,
      outputSchema: zLsfJobRenderOutput
    },
    async (args) => {
      deps.policy.assertToolAllowed("lsf_job_render");

      let script: string;
      try {
        script = renderBsubScriptV1(args.descriptor);
      } catch (e) {
        throw new McpError(ErrorCode.InvalidParams, e instanceof Error ? e.message : String(e));
      }

      return {
        content: [{ type: "text", text: script }],
        structuredContent: { script_version: BSUB_SCRIPT_VERSION, script }
      };
    }
  );

  mcp.registerTool(
    "lsf_submit",
    {
      description: "Validate, policy-check and submit an LSF job with bsub. Identical submissions replay.",
      inputSchema: zLsfSubmitInput,
      outputSchema: zLsfSubmitOutput
    },
    async (args, extra) => {
      const toolName = "lsf_submit";
      const contractVersion = "v1";
      let toolRun: ToolRun | null = null;

      try {
        deps.policy.assertToolAllowed(toolName);
        const projectId = requireProjectId(args.project_id);
        const descriptor: LsfJobDescriptorV1 = args.descriptor;
        const normalized = normalizeJobDescriptor(descriptor);

        const canonicalParams: JsonObject = {
          project_id: projectId,
          lsf: {
            script_version: BSUB_SCRIPT_VERSION,
            descriptor: normalized
          }
        };

        const { runId, paramsHash } = deriveRunId({
          toolName,
          contractVersion,
          policyHash: deps.policy.policyHash,
          canonicalParams
        });

        const existing = await deps.store.getRun(runId);
        if (existing?.resultJson) {
          return {
            content: [{ type: "text", text: `Replayed ${toolName} (${runId})` }],
            structuredContent: existing.resultJson
          };
        }

        const run = openRun({
          runId,
          projectId,
          toolName,
          contractVersion,
          paramsHash,
          canonicalParams,
          requestedBy: requestedByFromExtra(extra)
        });
        await run.start();
        toolRun = run;

        assertValid(await validateJobDescriptor(descriptor, { resolver, homeDir: deps.homeDir }));
        deps.policy.enforceJobDescriptor(descriptor, arraySize(normalized), deps.homeDir);

        await run.event("lsf.submit.plan", `project=${normalized.project} queue=${normalized.queue ?? "default"}`, {
          project: normalized.project,
          queue: normalized.queue,
          memory_mb: normalized.memory_mb,
          time_limit: normalized.time_limit,
          array: normalized.array,
          environment: normalized.environment.name
        });

        const ws = await createRunWorkspace(deps.runsDir, runId);
        const script = renderBsubScriptV1(descriptor);
        const scriptPath = ws.metaPath("job.bsub");
        await fs.writeFile(scriptPath, script, "utf8");

        const scriptArtifactId = await run.createOutputArtifact({
          type: "LSF_SCRIPT",
          label: "job.bsub",
          role: "lsf_script",
          source: { kind: "inline_text", text: script }
        });
        await run.event("lsf.submit.script_artifact", `artifact=${scriptArtifactId}`, {
          lsf_script_artifact_id: scriptArtifactId
        });

        const submit = await submitter.submit(scriptPath, {
          cwd: path.resolve(expandHome(normalized.working_dir, deps.homeDir))
        });
        await fs.writeFile(ws.metaPath("lsf_job_id.txt"), submit.lsfJobId + "\n", "utf8");
        await run.recordLsfJobId(submit.lsfJobId);
        await run.event("lsf.submit.ok", `job_id=${submit.lsfJobId}`, {
          lsf_job_id: submit.lsfJobId,
          queue: submit.queue
        });

        const structured = await run.checkpointQueued(
          {
            lsf_job_id: submit.lsfJobId,
            queue: submit.queue ?? normalized.queue,
            lsf_script_artifact_id: scriptArtifactId,
            output_path_template: normalized.output_path
          },
          "lsf submitted"
        );

        return {
          content: [{ type: "text", text: `lsf job ${submit.lsfJobId} submitted (run ${runId})` }],
          structuredContent: structured
        };
      } catch (e) {
        return failRun(toolRun, e);
      }
    }
  );

  mcp.registerTool(
    "lsf_job_get",
    {
      description: "Report the state of an lsf_submit run, refined by bjobs while it is not final.",
      inputSchema: zLsfJobGetInput,
      outputSchema: zLsfJobGetOutput
    },
    async (args) => {
      deps.policy.assertToolAllowed("lsf_job_get");
      const targetRunId = requireRunId(args.run_id);

      const targetRun = await deps.store.getRun(targetRunId);
      if (!targetRun) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${targetRunId}`);
      if (targetRun.toolName !== "lsf_submit") {
        throw new McpError(ErrorCode.InvalidParams, `run ${targetRunId} is not an lsf_submit run`);
      }

      const warnings: string[] = [];
      let state: string = targetRun.status;
      let exitCode = targetRun.exitCode;
      let source: "store" | "store+bjobs" = "store";
      let elements: JsonObject[] = [];

      const pending = targetRun.status === "queued" || targetRun.status === "running";
      if (pending && targetRun.lsfJobId) {
        if (!deps.policy.schedulerQueriesAllowed()) {
          warnings.push("scheduler queries disabled by policy");
        } else {
          const q = await scheduler.query(targetRun.lsfJobId);
          warnings.push(...q.warnings);
          if (q.info) {
            state = q.info.normalizedState;
            exitCode = q.info.exitCode;
            source = "store+bjobs";
            elements = q.info.elements.map((el) => ({
              job_id: el.jobId,
              state: el.normalizedState,
              exit_code: el.exitCode
            }));
          }
        }
      }

      return {
        content: [{ type: "text", text: `${targetRunId}: ${state}` }],
        structuredContent: {
          target_run_id: targetRunId,
          lsf_job_id: targetRun.lsfJobId,
          state,
          source,
          exit_code: exitCode,
          elements,
          warnings
        }
      };
    }
  );

  mcp.registerTool(
    "lsf_job_collect",
    {
      description: "Register the -o/-e files of a finished lsf_submit run as artifacts and finalize its status.",
      inputSchema: zLsfJobCollectInput,
      outputSchema: zLsfJobCollectOutput
    },
    async (args, extra) => {
      const toolName = "lsf_job_collect";
      const contractVersion = "v1";
      let toolRun: ToolRun | null = null;

      try {
        deps.policy.assertToolAllowed(toolName);
        const targetRunId = requireRunId(args.run_id);

        const targetRun = await deps.store.getRun(targetRunId);
        if (!targetRun) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${targetRunId}`);
        if (targetRun.toolName !== "lsf_submit") {
          throw new McpError(ErrorCode.InvalidParams, `run ${targetRunId} is not an lsf_submit run`);
        }
        const lsfJobId = targetRun.lsfJobId;
        if (!lsfJobId) throw new McpError(ErrorCode.InvalidParams, `run ${targetRunId} was never submitted`);

        const canonicalParams: JsonObject = { target_run_id: targetRunId };
        const { runId, paramsHash } = deriveRunId({
          toolName,
          contractVersion,
          policyHash: deps.policy.policyHash,
          canonicalParams
        });

        const existing = await deps.store.getRun(runId);
        if (existing?.status === "succeeded" && existing.resultJson) {
          return {
            content: [{ type: "text", text: `Replayed ${toolName} (${runId})` }],
            structuredContent: existing.resultJson
          };
        }

        const run = openRun({
          runId,
          projectId: targetRun.projectId,
          toolName,
          contractVersion,
          paramsHash,
          canonicalParams,
          requestedBy: requestedByFromExtra(extra)
        });
        await run.start();
        toolRun = run;

        const warnings: string[] = [];
        let state: "succeeded" | "failed";
        let exitCode: number | null;

        if (targetRun.finishedAt && (targetRun.status === "succeeded" || targetRun.status === "failed")) {
          state = targetRun.status;
          exitCode = targetRun.exitCode;
        } else {
          if (!deps.policy.schedulerQueriesAllowed()) {
            throw new McpError(ErrorCode.InvalidRequest, "policy denied scheduler queries");
          }
          const q = await scheduler.query(lsfJobId);
          warnings.push(...q.warnings);
          if (!q.info) {
            throw new McpError(ErrorCode.InvalidRequest, `lsf job ${lsfJobId} state unavailable: ${q.warnings.join("; ")}`);
          }
          const observed = q.info.normalizedState;
          if (observed !== "succeeded" && observed !== "failed") {
            throw new McpError(ErrorCode.InvalidRequest, `lsf job ${lsfJobId} is not finished (state=${observed})`);
          }
          state = observed;
          exitCode = q.info.exitCode;
        }

        await run.event("lsf.collect.state", `job_id=${lsfJobId} state=${state}`, { state, exit_code: exitCode });

        const descriptor = normalizeJobDescriptor(
          descriptorFromParams(await deps.store.getParamSet(targetRun.paramsHash), targetRunId)
        );
        const streams: Array<{ kind: "output" | "error"; template: string }> = [
          { kind: "output", template: descriptor.output_path }
        ];
        if (descriptor.error_path) streams.push({ kind: "error", template: descriptor.error_path });

        deps.policy.assertArraySizeAllowed(arraySize(descriptor));
        const indices = arrayIndices(descriptor, deps.policy.maxArraySize());

        const byRoleExisting = new Map<string, ArtifactId>();
        for (const o of await deps.store.listRunOutputs(targetRunId)) byRoleExisting.set(o.role, o.artifactId);

        const artifactsByRole: Record<string, ArtifactId> = {};
        for (const arrayIndex of indices) {
          for (const stream of streams) {
            const role = descriptor.array ? `${stream.kind}[${arrayIndex}]` : stream.kind;
            const known = byRoleExisting.get(role);
            if (known) {
              artifactsByRole[role] = known;
              continue;
            }

            const filePath = resolveOutputPath(
              stream.template,
              { jobId: lsfJobId, arrayIndex },
              { workingDir: descriptor.working_dir, homeDir: deps.homeDir }
            );
            if (!(await isRegularFile(filePath))) {
              warnings.push(`${role} file not found: ${filePath}`);
              continue;
            }

            const artifact = await importJobOutput({
              projectId: targetRun.projectId,
              createdByRunId: targetRunId,
              filePath,
              role
            });
            await deps.store.addRunOutput(targetRunId, artifact.artifactId, role);
            artifactsByRole[role] = artifact.artifactId;
          }
        }

        await deps.store.updateRun(targetRunId, {
          status: state,
          finishedAt: targetRun.finishedAt ?? new Date().toISOString(),
          exitCode,
          error: state === "succeeded" ? null : `lsf job exit_code=${exitCode ?? "unknown"}`
        });
        await deps.store.addRunEvent(targetRunId, "lsf.collect.outputs_registered", "outputs registered", {
          artifacts_by_role: artifactsByRole
        });
        await deps.store.addRunEvent(
          targetRunId,
          state === "succeeded" ? "lsf.collect.done" : "lsf.collect.failed",
          state === "succeeded" ? "collect done" : "collect failed",
          { exit_code: exitCode }
        );

        const structured = await run.finishSuccess(
          {
            target_run_id: targetRunId,
            lsf_job_id: lsfJobId,
            state,
            exit_code: exitCode,
            artifacts_by_role: artifactsByRole,
            warnings
          },
          "lsf collect ok"
        );

        return {
          content: [{ type: "text", text: `lsf job ${lsfJobId} collected (target ${targetRunId})` }],
          structuredContent: structured
        };
      } catch (e) {
        return failRun(toolRun, e);
      }
    }
  );

  mcp.registerTool(
    "lsf_run_local",
    {
      description: "Run one element of an LSF job on this machine the way an execution host would, and capture its output.",
      inputSchema: zLsfRunLocalInput,
      outputSchema: zLsfRunLocalOutput
    },
    async (args, extra) => {
      const toolName = "lsf_run_local";
      const contractVersion = "v1";
      let toolRun: ToolRun | null = null;

      try {
        deps.policy.assertToolAllowed(toolName);
        const projectId = requireProjectId(args.project_id);
        const descriptor: LsfJobDescriptorV1 = args.descriptor;
        const normalized = normalizeJobDescriptor(descriptor);
        const arrayIndex = args.array_index ?? (normalized.array ? normalized.array.start : 0);

        const canonicalParams: JsonObject = {
          project_id: projectId,
          lsf: {
            script_version: BSUB_SCRIPT_VERSION,
            descriptor: normalized
          },
          array_index: arrayIndex
        };

        const { runId, paramsHash } = deriveRunId({
          toolName,
          contractVersion,
          policyHash: deps.policy.policyHash,
          canonicalParams
        });

        const existing = await deps.store.getRun(runId);
        if ((existing?.status === "succeeded" || existing?.status === "failed") && existing.resultJson) {
          return {
            content: [{ type: "text", text: `Replayed ${toolName} (${runId})` }],
            structuredContent: existing.resultJson
          };
        }

        const run = openRun({
          runId,
          projectId,
          toolName,
          contractVersion,
          paramsHash,
          canonicalParams,
          requestedBy: requestedByFromExtra(extra)
        });
        await run.start();
        toolRun = run;

        assertValid(await validateJobDescriptor(descriptor, { resolver, homeDir: deps.homeDir }));
        if (!hasArrayIndex(normalized, arrayIndex)) {
          throw new McpError(ErrorCode.InvalidParams, `array_index ${arrayIndex} is not part of job ${normalized.job_name}`);
        }
        deps.policy.enforceJobDescriptor(descriptor, 1, deps.homeDir);

        const jobId = localJobIdForRun(runId);
        const ws = await createRunWorkspace(deps.runsDir, runId);
        const scriptPath = ws.metaPath("job.bsub");

        await run.event("lsf.local.plan", `job_id=${jobId} index=${arrayIndex} shell=${normalized.shell}`, {
          local_job_id: jobId,
          array_index: arrayIndex,
          shell: normalized.shell,
          working_dir: normalized.working_dir
        });

        const res = await localRunner.execute({
          descriptor,
          jobId,
          arrayIndex,
          scriptPath,
          homeDir: deps.homeDir,
          truncateOutput: existing !== null
        });
        await run.event("lsf.local.exit", `exit_code=${res.exitCode}`, {
          exit_code: res.exitCode,
          started_at: res.startedAt,
          finished_at: res.finishedAt
        });

        const scriptArtifactId = await run.createOutputArtifact({
          type: "LSF_SCRIPT",
          label: "job.bsub",
          role: "lsf_script",
          source: { kind: "local_path", path: scriptPath }
        });

        // Oversized streams are skipped with a warning; the exit code is still recorded.
        const warnings: string[] = [];
        const importStream = async (filePath: string, role: string): Promise<ArtifactId | null> => {
          try {
            const artifact = await importJobOutputFile({ projectId, createdByRunId: runId, filePath });
            await run.linkOutput(artifact.artifactId, role);
            return artifact.artifactId;
          } catch (e) {
            if (!(e instanceof ObjectTooLargeError)) throw e;
            const warning = `${role} skipped: ${e.message}`;
            warnings.push(warning);
            await run.event("lsf.local.output_skipped", warning, { role, path: filePath });
            return null;
          }
        };

        const outputArtifactId = await importStream(res.outputPath, "output");
        const errorArtifactId = res.errorPath ? await importStream(res.errorPath, "error") : null;

        const structured = await run.finishExited(
          res.exitCode,
          {
            local_job_id: jobId,
            array_index: arrayIndex,
            exit_code: res.exitCode,
            output_path: res.outputPath,
            output_artifact_id: outputArtifactId,
            error_artifact_id: errorArtifactId,
            lsf_script_artifact_id: scriptArtifactId,
            warnings
          },
          `local job ${jobId} exit_code=${res.exitCode}`
        );

        return {
          content: [{ type: "text", text: `local job ${jobId} exited ${res.exitCode} (run ${runId})` }],
          structuredContent: structured
        };
      } catch (e) {
        return failRun(toolRun, e);
      }
    }
  );

  mcp.registerTool(
    "artifact_get",
    {
      description: "Get artifact metadata by ID.",
      inputSchema: zArtifactGetInput,
      outputSchema: zArtifactGetOutput
    },
    async (args) => {
      deps.policy.assertToolAllowed("artifact_get");
      const artifactId = requireArtifactId(args.artifact_id);

      const artifact = await deps.artifacts.getArtifact(artifactId);
      if (!artifact) throw new McpError(ErrorCode.InvalidParams, `unknown artifact_id: ${artifactId}`);

      return {
        content: [{ type: "text", text: `${artifact.artifactId} ${artifact.type} ${artifact.sizeBytes} bytes` }],
        structuredContent: { artifact: toArtifactSummary(artifact) }
      };
    }
  );

  mcp.registerTool(
    "artifact_preview_text",
    {
      description: "Preview the start of a text artifact, capped by policy.",
      inputSchema: zArtifactPreviewTextInput,
      outputSchema: zArtifactPreviewTextOutput
    },
    async (args) => {
      deps.policy.assertToolAllowed("artifact_preview_text");
      const artifactId = requireArtifactId(args.artifact_id);

      const artifact = await deps.artifacts.getArtifact(artifactId);
      if (!artifact) throw new McpError(ErrorCode.InvalidParams, `unknown artifact_id: ${artifactId}`);

      const { preview, truncated } = await deps.artifacts.previewText(artifactId, deps.policy.previewCaps());
      return {
        content: [{ type: "text", text: preview }],
        structuredContent: { artifact_id: artifactId, preview, truncated }
      };
    }
  );

  return mcp;
}
