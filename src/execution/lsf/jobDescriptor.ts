export type LsfShell = "zsh" | "bash" | "sh";

export interface LsfJobArray {
  start: number;
  end: number;
  step?: number | null;
  max_concurrent?: number | null;
}

export interface LsfJobDescriptorV1 {
  version: 1;
  job_name: string;
  project: string;
  queue?: string | null;
  /** `-o` path; `%J` is the job id and `%I` the array index. */
  output_path: string;
  /** `-e` path. When absent stderr is written to `output_path` too. */
  error_path?: string | null;
  /** `-W [hour:]minute`. A disabled limit is still rendered, commented out. */
  time_limit?: { value: string; enabled: boolean } | null;
  memory_mb: number;
  array?: LsfJobArray | null;
  working_dir: string;
  environment: {
    kind: "conda";
    activate_script: string;
    name: string;
  };
  command: {
    argv: string[];
  };
  shell?: LsfShell;
}

export type NormalizedJobDescriptor = {
  version: 1;
  job_name: string;
  project: string;
  queue: string | null;
  output_path: string;
  error_path: string | null;
  time_limit: { value: string; enabled: boolean } | null;
  memory_mb: number;
  array: { start: number; end: number; step: number; max_concurrent: number | null } | null;
  working_dir: string;
  environment: { kind: "conda"; activate_script: string; name: string };
  command: { argv: string[] };
  shell: LsfShell;
};

export const DEFAULT_SHELL: LsfShell = "zsh";

export function normalizeJobDescriptor(d: LsfJobDescriptorV1): NormalizedJobDescriptor {
  return {
    version: 1,
    job_name: d.job_name,
    project: d.project,
    queue: d.queue ?? null,
    output_path: d.output_path,
    error_path: d.error_path ?? null,
    time_limit: d.time_limit ? { value: d.time_limit.value.trim(), enabled: d.time_limit.enabled } : null,
    memory_mb: d.memory_mb,
    array: d.array
      ? {
          start: d.array.start,
          end: d.array.end,
          step: d.array.step ?? 1,
          max_concurrent: d.array.max_concurrent ?? null
        }
      : null,
    working_dir: d.working_dir,
    environment: {
      kind: "conda",
      activate_script: d.environment.activate_script,
      name: d.environment.name
    },
    command: { argv: [...d.command.argv] },
    shell: d.shell ?? DEFAULT_SHELL
  };
}

function assertStep(step: number): void {
  if (!Number.isInteger(step) || step < 1) throw new Error(`invalid array step: ${step}`);
}

/** Number of elements the job submits; `1` for a plain job. */
export function arraySize(d: NormalizedJobDescriptor): number {
  if (!d.array) return 1;
  assertStep(d.array.step);
  if (d.array.end < d.array.start) return 0;
  return Math.floor((d.array.end - d.array.start) / d.array.step) + 1;
}

export function hasArrayIndex(d: NormalizedJobDescriptor, index: number): boolean {
  if (!d.array) return index === 0;
  assertStep(d.array.step);
  const { start, end, step } = d.array;
  return Number.isInteger(index) && start <= index && index <= end && (index - start) % step === 0;
}

/** Array indices in submission order; `[0]` for a plain job. Refuses arrays larger than `maxSize`. */
export function arrayIndices(d: NormalizedJobDescriptor, maxSize: number): number[] {
  const size = arraySize(d);
  if (size > maxSize) throw new Error(`job array has ${size} elements (max ${maxSize})`);
  if (!d.array) return [0];
  const out: number[] = [];
  for (let i = d.array.start; i <= d.array.end; i += d.array.step) out.push(i);
  return out;
}

export function formatJobNameDirective(d: NormalizedJobDescriptor): string {
  if (!d.array) return d.job_name;
  const { start, end, step, max_concurrent } = d.array;
  const range = start === end ? `${start}` : `${start}-${end}${step !== 1 ? `:${step}` : ""}`;
  return `${d.job_name}[${range}]${max_concurrent !== null ? `%${max_concurrent}` : ""}`;
}
