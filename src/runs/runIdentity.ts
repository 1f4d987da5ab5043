import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { deriveRunIdFromParts, type RunId } from "../core/ids.js";

export interface RunIdentityInput {
  toolName: string;
  contractVersion: string;
  policyHash: `sha256:${string}`;
  canonicalParams: unknown;
}

export function deriveCanonicalParamsHash(canonicalParams: unknown): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(canonicalParams));
}

/** Same tool, contract, policy and parameters always map to the same run. */
export function deriveRunId(input: RunIdentityInput): { runId: RunId; paramsHash: `sha256:${string}` } {
  const paramsHash = deriveCanonicalParamsHash(input.canonicalParams);
  const runId = deriveRunIdFromParts([
    `tool=${input.toolName}`,
    `contract=${input.contractVersion}`,
    `policy=${input.policyHash}`,
    `params=${paramsHash}`
  ]);
  return { runId, paramsHash };
}

/**
 * Numeric stand-in for an LSF job id when a run executes locally, stable for
 * a given run so `%J` resolves to the same file on replay.
 */
export function localJobIdForRun(runId: RunId): string {
  const h = sha256Prefixed(runId).slice("sha256:".length, "sha256:".length + 8);
  return String((Number.parseInt(h, 16) % 900000) + 100000);
}
