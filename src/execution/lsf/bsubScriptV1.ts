import {
  formatJobNameDirective,
  normalizeJobDescriptor,
  type LsfJobArray,
  type LsfJobDescriptorV1,
  type LsfShell
} from "./jobDescriptor.js";
import { shellWord, splitShellWords } from "./shellWords.js";
import { parseTimeLimit } from "./timeLimit.js";

export const BSUB_SCRIPT_VERSION = "bsub_script_v1";

function directiveValue(value: string, option: string): string {
  if (/["\r\n]/.test(value)) throw new Error(`invalid characters in ${option} value: ${value}`);
  if (value.length === 0) throw new Error(`empty ${option} value`);
  return /[\s[\]]/.test(value) ? `"${value}"` : value;
}

function assertEnvName(name: string): void {
  if (!/^[A-Za-z0-9_.\-/~]+$/.test(name)) {
    throw new Error(`invalid environment name: ${name}`);
  }
}

export function renderBsubScriptV1(descriptor: LsfJobDescriptorV1): string {
  const d = normalizeJobDescriptor(descriptor);

  if (!Number.isInteger(d.memory_mb) || d.memory_mb < 1) throw new Error(`invalid memory_mb: ${d.memory_mb}`);
  if (d.command.argv.length < 1) throw new Error("command.argv must be non-empty");
  assertEnvName(d.environment.name);

  const lines: string[] = [];
  lines.push(`#!/usr/bin/env ${d.shell}`);
  lines.push(`#BSUB -J ${directiveValue(formatJobNameDirective(d), "-J")}`);
  lines.push(`#BSUB -P ${directiveValue(d.project, "-P")}`);
  if (d.queue) lines.push(`#BSUB -q ${directiveValue(d.queue, "-q")}`);
  lines.push(`#BSUB -o ${directiveValue(d.output_path, "-o")}`);
  if (d.error_path) lines.push(`#BSUB -e ${directiveValue(d.error_path, "-e")}`);
  if (d.time_limit) {
    if (d.time_limit.enabled) {
      parseTimeLimit(d.time_limit.value);
      lines.push(`#BSUB -W ${d.time_limit.value}`);
    } else {
      // LSF only reads "#BSUB"; the space keeps the limit on record but inactive.
      lines.push(`# BSUB -W ${directiveValue(d.time_limit.value, "-W")}`);
    }
  }
  lines.push(`#BSUB -M ${d.memory_mb}`);
  lines.push("");
  lines.push(`cd ${shellWord(d.working_dir)}`);
  lines.push(
    `${d.shell === "sh" ? "." : "source"} ${shellWord(d.environment.activate_script)} ${shellWord(d.environment.name)}`
  );
  lines.push(d.command.argv.map((a) => shellWord(a)).join(" "));
  lines.push("");

  return lines.join("\n");
}

export interface ParsedBsubScript {
  descriptor: LsfJobDescriptorV1;
  warnings: string[];
}

interface ScriptFields {
  shell: LsfShell | null;
  jobName: string | null;
  array: LsfJobArray | null;
  project: string | null;
  queue: string | null;
  outputPath: string | null;
  errorPath: string | null;
  timeLimit: { value: string; enabled: boolean } | null;
  memoryMb: number | null;
  workingDir: string | null;
  environment: { activateScript: string; name: string } | null;
  argv: string[] | null;
}

const MEMORY_UNITS_MB: Record<string, number> = { KB: 1 / 1024, MB: 1, GB: 1024, TB: 1024 * 1024 };

function parseMemoryMb(value: string): number {
  const m = /^(\d+)\s*([KMGT]B)?$/i.exec(value.trim());
  if (!m) throw new Error(`invalid -M value: ${value}`);
  const amount = Number.parseInt(m[1] ?? "", 10);
  const unit = (m[2] ?? "MB").toUpperCase();
  const factor = MEMORY_UNITS_MB[unit] ?? 1;
  return Math.ceil(amount * factor);
}

function parseJobNameDirective(value: string): { jobName: string; array: LsfJobArray | null } {
  const m = /^([^[\]%]+)(?:\[(\d+)(?:-(\d+))?(?::(\d+))?\])?(?:%(\d+))?$/.exec(value);
  if (!m || !m[1]) throw new Error(`invalid -J value: ${value}`);
  const jobName = m[1];
  if (m[2] === undefined) {
    if (m[5] !== undefined) throw new Error(`job slot limit without an array in -J: ${value}`);
    return { jobName, array: null };
  }
  const start = Number.parseInt(m[2], 10);
  const end = m[3] !== undefined ? Number.parseInt(m[3], 10) : start;
  return {
    jobName,
    array: {
      start,
      end,
      step: m[4] !== undefined ? Number.parseInt(m[4], 10) : null,
      max_concurrent: m[5] !== undefined ? Number.parseInt(m[5], 10) : null
    }
  };
}

function parseShebang(line: string): LsfShell | null {
  const m = /^#!\s*(?:\/usr\/bin\/env\s+)?(?:\S*\/)?(zsh|bash|sh)\s*$/.exec(line.trim());
  if (!m) return null;
  const shell = m[1];
  return shell === "zsh" || shell === "bash" || shell === "sh" ? shell : null;
}

/**
 * Reads a `bsub` job script back into a descriptor. Accepts scripts written
 * by {@link renderBsubScriptV1} as well as hand-written ones with several
 * options per `#BSUB` line and free-form comments.
 */
export function parseBsubScriptV1(text: string): ParsedBsubScript {
  const warnings: string[] = [];
  const lines = text.split(/\r?\n/);

  const found: ScriptFields = {
    shell: null,
    jobName: null,
    array: null,
    project: null,
    queue: null,
    outputPath: null,
    errorPath: null,
    timeLimit: null,
    memoryMb: null,
    workingDir: null,
    environment: null,
    argv: null
  };

  const first = lines[0] ?? "";
  if (first.startsWith("#!")) {
    found.shell = parseShebang(first);
    if (!found.shell) warnings.push(`unsupported interpreter: ${first.slice(2).trim()}`);
  }

  function applyOption(option: string, value: string, enabled: boolean): void {
    if (!enabled) {
      if (option === "-W") found.timeLimit = { value, enabled: false };
      else warnings.push(`ignoring disabled directive: ${option} ${value}`);
      return;
    }
    switch (option) {
      case "-J": {
        const parsed = parseJobNameDirective(value);
        found.jobName = parsed.jobName;
        found.array = parsed.array;
        return;
      }
      case "-P":
        found.project = value;
        return;
      case "-q":
        found.queue = value;
        return;
      case "-o":
        found.outputPath = value;
        return;
      case "-e":
        found.errorPath = value;
        return;
      case "-W":
        found.timeLimit = { value, enabled: true };
        return;
      case "-M":
        found.memoryMb = parseMemoryMb(value);
        return;
      default:
        warnings.push(`unsupported directive option: ${option}`);
    }
  }

  for (const raw of lines.slice(first.startsWith("#!") ? 1 : 0)) {
    const line = raw.trim();
    if (!line) continue;

    const directive = /^#(\s*)BSUB\s+(.*)$/.exec(line);
    if (directive) {
      const enabled = (directive[1] ?? "").length === 0;
      const words = splitShellWords(directive[2] ?? "");
      for (let i = 0; i < words.length; i++) {
        const option = words[i] ?? "";
        if (!option.startsWith("-")) {
          warnings.push(`unexpected directive word: ${option}`);
          continue;
        }
        const next = words[i + 1];
        if (next === undefined || next.startsWith("-")) {
          warnings.push(`unsupported directive option: ${option}`);
          continue;
        }
        applyOption(option, next, enabled);
        i++;
      }
      continue;
    }

    if (line.startsWith("#")) continue;

    const words = splitShellWords(line);
    const [verb, ...rest] = words;
    if (!verb) continue;

    if (verb === "cd") {
      if (!rest[0]) throw new Error("cd without a directory");
      found.workingDir = rest[0];
      continue;
    }
    if (verb === "source" || verb === ".") {
      const [activateScript, name] = rest;
      if (!activateScript || !name) throw new Error(`environment activation needs a script and a name: ${line}`);
      found.environment = { activateScript, name };
      continue;
    }
    if (found.argv) throw new Error(`bsub script has more than one command line: ${line}`);
    found.argv = words;
  }

  const { jobName, project, outputPath, memoryMb, workingDir, environment, argv } = found;
  if (jobName === null) throw new Error("bsub script is missing -J");
  if (project === null) throw new Error("bsub script is missing -P");
  if (outputPath === null) throw new Error("bsub script is missing -o");
  if (memoryMb === null) throw new Error("bsub script is missing -M");
  if (workingDir === null) throw new Error("bsub script is missing a cd into the working directory");
  if (environment === null) throw new Error("bsub script is missing an environment activation");
  if (argv === null) throw new Error("bsub script is missing a command");

  const descriptor: LsfJobDescriptorV1 = {
    version: 1,
    job_name: jobName,
    project,
    queue: found.queue,
    output_path: outputPath,
    error_path: found.errorPath,
    time_limit: found.timeLimit,
    memory_mb: memoryMb,
    array: found.array,
    working_dir: workingDir,
    environment: { kind: "conda", activate_script: environment.activateScript, name: environment.name },
    command: { argv },
    ...(found.shell ? { shell: found.shell } : {})
  };

  return { descriptor, warnings };
}
