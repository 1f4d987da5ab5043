import type { Kysely, Selectable } from "kysely";
import { isArtifactType, type ArtifactRecord, type ArtifactType } from "../core/artifact.js";
import type { JsonObject } from "../core/json.js";
import { isRunStatus, type RunRecord, type RunStatus } from "../core/run.js";
import { isArtifactId, isProjectId, isRunId, type ArtifactId, type ProjectId, type RunId } from "../core/ids.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function sha256Column(value: string, column: string): `sha256:${string}` {
  if (!value.startsWith("sha256:")) throw new Error(`corrupt ${column}: ${value}`);
  return `sha256:${value.slice("sha256:".length)}`;
}

function runIdColumn(value: string): RunId {
  if (!isRunId(value)) throw new Error(`corrupt run_id: ${value}`);
  return value;
}

function projectIdColumn(value: string): ProjectId {
  if (!isProjectId(value)) throw new Error(`corrupt project_id: ${value}`);
  return value;
}

function artifactIdColumn(value: string): ArtifactId {
  if (!isArtifactId(value)) throw new Error(`corrupt artifact_id: ${value}`);
  return value;
}

export interface RunEvent {
  kind: string;
  message: string | null;
  data: JsonObject | null;
  ts: string;
}

export type RunPatch = Partial<
  Pick<RunRecord, "status" | "startedAt" | "finishedAt" | "lsfJobId" | "exitCode" | "error" | "logArtifactId" | "resultJson">
>;

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async ensureProject(projectId: ProjectId, name: string | null = null): Promise<void> {
    await this.db
      .insertInto("projects")
      .values({ project_id: projectId, name, metadata: {} })
      .onConflict((oc) => oc.column("project_id").doNothing())
      .execute();
  }

  async createArtifact(input: {
    artifactId: ArtifactId;
    projectId: ProjectId;
    type: ArtifactType;
    uri: string;
    mimeType: string;
    sizeBytes: bigint;
    checksumSha256: `sha256:${string}`;
    label: string | null;
    createdByRunId?: RunId | null;
    metadata: JsonObject;
  }): Promise<ArtifactRecord> {
    await this.ensureProject(input.projectId);

    await this.db
      .insertInto("artifacts")
      .values({
        artifact_id: input.artifactId,
        project_id: input.projectId,
        type: input.type,
        uri: input.uri,
        mime_type: input.mimeType,
        size_bytes: input.sizeBytes.toString(),
        checksum_sha256: input.checksumSha256,
        label: input.label,
        created_by_run_id: input.createdByRunId ?? null,
        metadata: input.metadata
      })
      .execute();

    const created = await this.getArtifact(input.artifactId);
    if (!created) throw new Error(`artifact vanished after insert: ${input.artifactId}`);
    return created;
  }

  async getArtifact(artifactId: ArtifactId): Promise<ArtifactRecord | null> {
    const row = await this.db
      .selectFrom("artifacts")
      .selectAll()
      .where("artifact_id", "=", artifactId)
      .executeTakeFirst();

    return row ? this.mapArtifact(row) : null;
  }

  async ensureParamSet(paramsHash: `sha256:${string}`, canonicalParams: JsonObject): Promise<void> {
    await this.db
      .insertInto("param_sets")
      .values({ params_hash: paramsHash, canonical_json: canonicalParams })
      .onConflict((oc) => oc.column("params_hash").doNothing())
      .execute();
  }

  async getParamSet(paramsHash: `sha256:${string}`): Promise<JsonObject | null> {
    const row = await this.db
      .selectFrom("param_sets")
      .select(["canonical_json"])
      .where("params_hash", "=", paramsHash)
      .executeTakeFirst();
    return row ? row.canonical_json : null;
  }

  async createRun(input: {
    runId: RunId;
    projectId: ProjectId;
    toolName: string;
    contractVersion: string;
    paramsHash: `sha256:${string}`;
    canonicalParams: JsonObject;
    policyHash: `sha256:${string}`;
    status: RunStatus;
    requestedBy: string | null;
    policySnapshot: JsonObject | null;
    environment: JsonObject | null;
  }): Promise<RunRecord> {
    await this.ensureProject(input.projectId);
    await this.ensureParamSet(input.paramsHash, input.canonicalParams);

    await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        project_id: input.projectId,
        tool_name: input.toolName,
        contract_version: input.contractVersion,
        params_hash: input.paramsHash,
        policy_hash: input.policyHash,
        status: input.status,
        requested_by: input.requestedBy,
        policy_snapshot: input.policySnapshot ?? null,
        environment: input.environment ?? null
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .execute();

    const row = await this.db
      .selectFrom("runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async updateRun(runId: RunId, patch: RunPatch): Promise<void> {
    let q = this.db.updateTable("runs").where("run_id", "=", runId);
    let touched = false;

    if (patch.status) {
      q = q.set({ status: patch.status });
      touched = true;
    }
    if (patch.startedAt !== undefined) {
      q = q.set({ started_at: patch.startedAt });
      touched = true;
    }
    if (patch.finishedAt !== undefined) {
      q = q.set({ finished_at: patch.finishedAt });
      touched = true;
    }
    if (patch.lsfJobId !== undefined) {
      q = q.set({ lsf_job_id: patch.lsfJobId });
      touched = true;
    }
    if (patch.exitCode !== undefined) {
      q = q.set({ exit_code: patch.exitCode });
      touched = true;
    }
    if (patch.error !== undefined) {
      q = q.set({ error: patch.error });
      touched = true;
    }
    if (patch.logArtifactId !== undefined) {
      q = q.set({ log_artifact_id: patch.logArtifactId });
      touched = true;
    }
    if (patch.resultJson !== undefined) {
      q = q.set({ result_json: patch.resultJson });
      touched = true;
    }

    if (!touched) return;
    await q.execute();
  }

  async addRunOutput(runId: RunId, artifactId: ArtifactId, role: string): Promise<void> {
    await this.db
      .insertInto("run_outputs")
      .values({ run_id: runId, artifact_id: artifactId, role })
      .onConflict((oc) => oc.columns(["run_id", "artifact_id", "role"]).doNothing())
      .execute();
  }

  async listRunOutputs(runId: RunId): Promise<Array<{ artifactId: ArtifactId; role: string }>> {
    const rows = await this.db.selectFrom("run_outputs").selectAll().where("run_id", "=", runId).execute();
    return rows
      .map((r) => ({ artifactId: artifactIdColumn(r.artifact_id), role: r.role }))
      .sort((a, b) => a.role.localeCompare(b.role) || a.artifactId.localeCompare(b.artifactId));
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        run_id: runId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEvent[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id")
      .execute();
    return rows.map((r) => ({ kind: r.kind, message: r.message, data: r.data, ts: toIso(r.ts) }));
  }

  private mapArtifact(row: Selectable<DB["artifacts"]>): ArtifactRecord {
    const type: ArtifactType = isArtifactType(row.type) ? row.type : "UNKNOWN";
    return {
      artifactId: artifactIdColumn(row.artifact_id),
      projectId: projectIdColumn(row.project_id),
      type,
      uri: row.uri,
      mimeType: row.mime_type,
      sizeBytes: BigInt(row.size_bytes),
      checksumSha256: sha256Column(row.checksum_sha256, "checksum_sha256"),
      label: row.label,
      createdAt: toIso(row.created_at),
      createdByRunId: row.created_by_run_id ? runIdColumn(row.created_by_run_id) : null,
      metadata: row.metadata ?? {}
    };
  }

  private mapRun(row: Selectable<DB["runs"]>): RunRecord {
    if (!isRunStatus(row.status)) throw new Error(`corrupt run status: ${row.status}`);
    return {
      runId: runIdColumn(row.run_id),
      projectId: projectIdColumn(row.project_id),
      toolName: row.tool_name,
      contractVersion: row.contract_version,
      paramsHash: sha256Column(row.params_hash, "params_hash"),
      policyHash: sha256Column(row.policy_hash, "policy_hash"),
      status: row.status,
      requestedBy: row.requested_by,
      createdAt: toIso(row.created_at),
      startedAt: toIsoOrNull(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at),
      policySnapshot: row.policy_snapshot,
      environment: row.environment,
      lsfJobId: row.lsf_job_id,
      exitCode: row.exit_code,
      error: row.error,
      resultJson: row.result_json,
      logArtifactId: row.log_artifact_id ? artifactIdColumn(row.log_artifact_id) : null
    };
  }
}
