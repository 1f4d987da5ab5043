import type { ArtifactType } from "../core/artifact.js";
import type { ArtifactId, ProjectId, RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunStatus } from "../core/run.js";
import type { ArtifactService, ArtifactImportSource } from "../artifacts/artifactService.js";
import type { PostgresStore } from "../store/postgresStore.js";

/**
 * One provenance-tracked tool invocation. Every event is persisted and also
 * buffered, so the final log artifact holds the whole run as JSON lines.
 */
export class ToolRun {
  readonly runId: RunId;
  private readonly logLines: string[] = [];

  constructor(
    private readonly deps: {
      store: PostgresStore;
      artifacts: ArtifactService;
    },
    private readonly info: {
      runId: RunId;
      projectId: ProjectId;
      toolName: string;
      contractVersion: string;
      paramsHash: `sha256:${string}`;
      canonicalParams: JsonObject;
      policyHash: `sha256:${string}`;
      requestedBy: string | null;
      policySnapshot: JsonObject | null;
      environment: JsonObject | null;
    }
  ) {
    this.runId = info.runId;
  }

  get projectId(): ProjectId {
    return this.info.projectId;
  }

  async start(initialStatus: Extract<RunStatus, "queued" | "running"> = "running"): Promise<void> {
    await this.deps.store.createRun({
      runId: this.runId,
      projectId: this.info.projectId,
      toolName: this.info.toolName,
      contractVersion: this.info.contractVersion,
      paramsHash: this.info.paramsHash,
      canonicalParams: this.info.canonicalParams,
      policyHash: this.info.policyHash,
      status: initialStatus,
      requestedBy: this.info.requestedBy,
      policySnapshot: this.info.policySnapshot,
      environment: this.info.environment
    });

    const now = new Date().toISOString();
    await this.deps.store.updateRun(this.runId, { startedAt: now });
    await this.event("run.started", `tool=${this.info.toolName}`, {
      now,
      params_hash: this.info.paramsHash,
      policy_hash: this.info.policyHash
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, message, data });
    this.logLines.push(line);
    await this.deps.store.addRunEvent(this.runId, kind, message, data);
  }

  async linkOutput(artifactId: ArtifactId, role: string): Promise<void> {
    await this.deps.store.addRunOutput(this.runId, artifactId, role);
  }

  async createOutputArtifact(input: {
    type: ArtifactType;
    label: string;
    role: string;
    source: ArtifactImportSource;
    maxBytes?: bigint | null;
  }): Promise<ArtifactId> {
    const artifact = await this.deps.artifacts.importArtifact({
      projectId: this.info.projectId,
      source: input.source,
      type: input.type,
      label: input.label,
      createdByRunId: this.runId,
      maxBytes: input.maxBytes ?? null
    });

    await this.linkOutput(artifact.artifactId, input.role);
    return artifact.artifactId;
  }

  async recordLsfJobId(lsfJobId: string): Promise<void> {
    await this.deps.store.updateRun(this.runId, { lsfJobId });
  }

  async finishSuccess(result: JsonObject, summary: string): Promise<JsonObject> {
    return this.finish("succeeded", null, summary, result, null);
  }

  /** Ends a run whose job ran to completion, successfully or not. */
  async finishExited(exitCode: number, result: JsonObject, summary: string): Promise<JsonObject> {
    if (exitCode === 0) return this.finish("succeeded", null, summary, result, 0);
    return this.finish("failed", `job exit_code=${exitCode}`, summary, result, exitCode);
  }

  async checkpointQueued(result: JsonObject, summary: string): Promise<JsonObject> {
    await this.event("run.queued", summary, null);
    const logArtifactId = await this.writeLog();

    const resultWithProvenance: JsonObject = {
      ...result,
      provenance_run_id: this.runId,
      log_artifact_id: logArtifactId
    };

    await this.deps.store.updateRun(this.runId, {
      status: "queued",
      error: null,
      logArtifactId,
      resultJson: resultWithProvenance
    });

    return resultWithProvenance;
  }

  async finishBlocked(reason: string): Promise<void> {
    await this.finish("blocked", reason, `blocked: ${reason}`, null, null);
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", errorMessage, `failed: ${errorMessage}`, null, null);
  }

  private async writeLog(): Promise<ArtifactId> {
    return this.createOutputArtifact({
      type: "LOG",
      label: `${this.info.toolName}.log`,
      source: { kind: "inline_text", text: this.logLines.join("\n") + "\n" },
      role: "log"
    });
  }

  private async finish(
    status: RunStatus,
    error: string | null,
    finalMessage: string,
    result: JsonObject | null,
    exitCode: number | null
  ): Promise<JsonObject> {
    await this.event(`run.${status}`, finalMessage, error ? { error } : null);
    const logArtifactId = await this.writeLog();

    const now = new Date().toISOString();
    const resultWithProvenance: JsonObject | null = result
      ? {
          ...result,
          provenance_run_id: this.runId,
          log_artifact_id: logArtifactId
        }
      : null;

    await this.deps.store.updateRun(this.runId, {
      status,
      finishedAt: now,
      error,
      logArtifactId,
      resultJson: resultWithProvenance,
      ...(exitCode !== null ? { exitCode } : {})
    });

    return resultWithProvenance ?? { provenance_run_id: this.runId, log_artifact_id: logArtifactId };
  }
}

export function requestedByFromExtra(extra: {
  authInfo?: { clientId: string; extra?: Record<string, unknown> } | undefined;
  sessionId?: string | undefined;
}): string | null {
  const subject = extra.authInfo?.extra?.["subject"];
  return (typeof subject === "string" ? subject : null) ?? extra.authInfo?.clientId ?? extra.sessionId ?? null;
}
