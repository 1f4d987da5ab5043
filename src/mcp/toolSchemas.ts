import * as z from "zod/v4";
import { ARTIFACT_TYPES } from "../core/artifact.js";
import { zLsfJobDescriptor } from "../execution/lsf/descriptorFile.js";

export { zLsfJobDescriptor };

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zProjectId = z.string().regex(new RegExp(`^proj_${ulid26}$`), "invalid project_id");
export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zArtifactId = z.string().regex(new RegExp(`^art_${ulid26}$`), "invalid artifact_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zArtifactType = z.enum(ARTIFACT_TYPES);

export const zArtifactSummary = z.object({
  artifact_id: zArtifactId,
  project_id: zProjectId,
  type: zArtifactType,
  mime_type: z.string(),
  size_bytes: z.string(),
  checksum_sha256: zSha256,
  label: z.string().nullable(),
  created_at: z.string(),
  created_by_run_id: zRunId.nullable(),
  metadata: z.record(z.string(), z.unknown())
});

export const zProvenance = z.object({
  provenance_run_id: zRunId,
  log_artifact_id: zArtifactId
});

const zIssue = z.object({
  code: z.string(),
  field: z.string(),
  message: z.string()
});

export const zLsfJobValidateInput = z.object({
  descriptor: zLsfJobDescriptor.optional(),
  script: z.string().min(1).max(65536).optional(),
  check_filesystem: z.boolean().default(true)
});

export const zLsfJobValidateOutput = z.object({
  ok: z.boolean(),
  issues: z.array(zIssue),
  descriptor: zLsfJobDescriptor.nullable(),
  script_warnings: z.array(z.string())
});

export const zLsfJobRenderInput = z.object({
  descriptor: zLsfJobDescriptor
});

export const zLsfJobRenderOutput = z.object({
  script_version: z.string(),
  script: z.string()
});

export const zLsfSubmitInput = z.object({
  project_id: zProjectId,
  descriptor: zLsfJobDescriptor
});

export const zLsfSubmitOutput = zProvenance.extend({
  lsf_job_id: z.string(),
  queue: z.string().nullable(),
  lsf_script_artifact_id: zArtifactId,
  output_path_template: z.string()
});

export const zLsfState = z.enum(["queued", "running", "succeeded", "failed", "blocked", "unknown"]);

export const zLsfJobGetInput = z.object({
  run_id: zRunId
});

export const zLsfJobGetOutput = z.object({
  target_run_id: zRunId,
  lsf_job_id: z.string().nullable(),
  state: zLsfState,
  source: z.enum(["store", "store+bjobs"]),
  exit_code: z.number().int().nullable(),
  elements: z.array(
    z.object({
      job_id: z.string(),
      state: zLsfState,
      exit_code: z.number().int().nullable()
    })
  ),
  warnings: z.array(z.string())
});

export const zLsfJobCollectInput = z.object({
  run_id: zRunId
});

export const zLsfJobCollectOutput = zProvenance.extend({
  target_run_id: zRunId,
  lsf_job_id: z.string(),
  state: z.enum(["succeeded", "failed"]),
  exit_code: z.number().int().nullable(),
  artifacts_by_role: z.record(z.string(), zArtifactId),
  warnings: z.array(z.string())
});

export const zLsfRunLocalInput = z.object({
  project_id: zProjectId,
  descriptor: zLsfJobDescriptor,
  array_index: z.number().int().min(0).optional()
});

export const zLsfRunLocalOutput = zProvenance.extend({
  local_job_id: z.string(),
  array_index: z.number().int(),
  exit_code: z.number().int(),
  output_path: z.string(),
  output_artifact_id: zArtifactId.nullable(),
  error_artifact_id: zArtifactId.nullable(),
  lsf_script_artifact_id: zArtifactId,
  warnings: z.array(z.string())
});

export const zArtifactGetInput = z.object({
  artifact_id: zArtifactId
});

export const zArtifactGetOutput = z.object({
  artifact: zArtifactSummary
});

export const zArtifactPreviewTextInput = z.object({
  artifact_id: zArtifactId
});

export const zArtifactPreviewTextOutput = z.object({
  artifact_id: zArtifactId,
  preview: z.string(),
  truncated: z.boolean()
});
