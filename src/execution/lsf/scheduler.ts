import { spawnSync } from "child_process";

export type LsfNormalizedState = "queued" | "running" | "succeeded" | "failed" | "unknown";

export interface LsfElementState {
  /** `1234` for a plain job, `1234[7]` for an array element. */
  jobId: string;
  stateRaw: string;
  normalizedState: LsfNormalizedState;
  exitCode: number | null;
}

export interface LsfSchedulerInfo {
  source: "bjobs";
  stateRaw: string;
  normalizedState: LsfNormalizedState;
  exitCode: number | null;
  elements: LsfElementState[];
}

export interface LsfSchedulerQueryResult {
  info: LsfSchedulerInfo | null;
  warnings: string[];
}

export interface LsfScheduler {
  query(jobId: string): Promise<LsfSchedulerQueryResult>;
}

export function normalizeLsfState(stateRaw: string, exitCode: number | null): LsfNormalizedState {
  const s = String(stateRaw).trim().toUpperCase();
  switch (s) {
    case "PEND":
    case "PSUSP":
    case "WAIT":
      return "queued";
    case "RUN":
    case "USUSP":
    case "SSUSP":
    case "PROV":
      return "running";
    case "DONE":
      return exitCode === null || exitCode === 0 ? "succeeded" : "failed";
    case "EXIT":
      return "failed";
    default:
      return "unknown";
  }
}

function parseExitCodeField(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed || trimmed === "-") return null;
  const n = Number.parseInt(trimmed, 10);
  return Number.isInteger(n) ? n : null;
}

export function parseBjobsRows(stdout: string): LsfElementState[] {
  return stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map((l) => {
      const [job, index, state, exit] = l.split("|");
      const exitCode = parseExitCodeField(exit ?? "");
      const stateRaw = (state ?? "").trim();
      const base = (job ?? "").trim();
      const arrayIndex = Number.parseInt((index ?? "").trim(), 10);
      return {
        jobId: base && Number.isInteger(arrayIndex) && arrayIndex > 0 ? `${base}[${arrayIndex}]` : base,
        stateRaw,
        normalizedState: normalizeLsfState(stateRaw, exitCode),
        exitCode
      };
    })
    .filter((r) => r.jobId.length > 0);
}

const STATE_PRIORITY: LsfNormalizedState[] = ["running", "queued", "unknown", "failed", "succeeded"];

/** Collapses array elements into one job state: anything still active wins. */
export function summarizeElements(elements: LsfElementState[]): LsfSchedulerInfo | null {
  if (!elements.length) return null;
  for (const state of STATE_PRIORITY) {
    const match = elements.find((e) => e.normalizedState === state);
    if (!match) continue;
    const exitCodes = elements.map((e) => e.exitCode).filter((c): c is number => c !== null);
    const exitCode =
      state === "failed" || state === "succeeded"
        ? exitCodes.find((c) => c !== 0) ?? (state === "succeeded" ? 0 : exitCodes[0] ?? null)
        : null;
    return { source: "bjobs", stateRaw: match.stateRaw, normalizedState: state, exitCode, elements };
  }
  return null;
}

export class BjobsScheduler implements LsfScheduler {
  async query(jobId: string): Promise<LsfSchedulerQueryResult> {
    const res = spawnSync("bjobs", ["-a", "-noheader", "-o", "jobid jobindex stat exit_code delimiter='|'", jobId], {
      stdio: ["ignore", "pipe", "pipe"]
    });
    const stdout = res.stdout ? res.stdout.toString("utf8") : "";
    const stderr = res.stderr ? res.stderr.toString("utf8") : "";

    if (res.error) {
      return { info: null, warnings: [`bjobs unavailable: ${res.error.message}`] };
    }
    if (res.status !== 0) {
      return { info: null, warnings: [`bjobs failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`] };
    }

    const elements = parseBjobsRows(stdout);
    if (!elements.length) {
      return { info: null, warnings: [stderr.trim() ? `bjobs: ${stderr.trim()}` : "bjobs returned no rows"] };
    }

    return { info: summarizeElements(elements), warnings: [] };
  }
}
