import type { ArtifactId, ProjectId, RunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type ArtifactType = "LSF_SCRIPT" | "JOB_OUTPUT" | "JSON" | "TEXT" | "LOG" | "UNKNOWN";

export const ARTIFACT_TYPES: readonly ArtifactType[] = ["LSF_SCRIPT", "JOB_OUTPUT", "JSON", "TEXT", "LOG", "UNKNOWN"];

export function isArtifactType(value: string): value is ArtifactType {
  return ARTIFACT_TYPES.some((t) => t === value);
}

export function mimeTypeForArtifactType(type: ArtifactType): string {
  switch (type) {
    case "JSON":
      return "application/json";
    case "LSF_SCRIPT":
      return "text/x-shellscript";
    case "JOB_OUTPUT":
    case "TEXT":
    case "LOG":
      return "text/plain";
    case "UNKNOWN":
    default:
      return "application/octet-stream";
  }
}

export interface ArtifactRecord {
  artifactId: ArtifactId;
  projectId: ProjectId;
  type: ArtifactType;
  uri: string;
  mimeType: string;
  sizeBytes: bigint;
  checksumSha256: `sha256:${string}`;
  label: string | null;
  createdAt: string;
  createdByRunId: RunId | null;
  metadata: JsonObject;
}
