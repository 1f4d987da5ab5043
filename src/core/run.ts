import type { ArtifactId, ProjectId, RunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export const RUN_STATUSES = ["queued", "running", "succeeded", "failed", "blocked"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some((s) => s === value);
}

export interface RunRecord {
  runId: RunId;
  projectId: ProjectId;
  toolName: string;
  contractVersion: string;
  paramsHash: `sha256:${string}`;
  policyHash: `sha256:${string}`;
  status: RunStatus;
  requestedBy: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  policySnapshot: JsonObject | null;
  environment: JsonObject | null;
  /** Scheduler job id once `bsub` accepted the job. */
  lsfJobId: string | null;
  exitCode: number | null;
  error: string | null;
  resultJson: JsonObject | null;
  logArtifactId: ArtifactId | null;
}
