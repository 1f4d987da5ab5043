import { ulid } from "ulid";
import { createHash } from "crypto";
import { encodeCrockfordBase32_128bits } from "./canonicalJson.js";

export type ProjectId = `proj_${string}`;
export type ArtifactId = `art_${string}`;
export type RunId = `run_${string}`;

export function newProjectId(): ProjectId {
  return `proj_${ulid()}`;
}

export function newArtifactId(): ArtifactId {
  return `art_${ulid()}`;
}

export function isRunId(value: string): value is RunId {
  return /^run_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

export function isArtifactId(value: string): value is ArtifactId {
  return /^art_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

export function isProjectId(value: string): value is ProjectId {
  return /^proj_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

export function deriveRunIdFromParts(parts: string[]): RunId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  const digest = h.digest();
  const first16 = digest.subarray(0, 16);
  return `run_${encodeCrockfordBase32_128bits(first16)}`;
}
