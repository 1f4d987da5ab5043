import { promises as fs } from "fs";
import path from "path";
import type { LsfJobDescriptorV1 } from "./jobDescriptor.js";
import { expandHome, type EnvironmentResolver } from "./environment.js";
import { scanOutputTemplate } from "./outputTemplate.js";
import { parseTimeLimit } from "./timeLimit.js";

export type JobDescriptorIssueCode =
  | "job_name_invalid"
  | "working_dir_not_absolute"
  | "working_dir_missing"
  | "working_dir_not_directory"
  | "environment_unresolved"
  | "output_template_unknown_placeholder"
  | "memory_not_positive"
  | "time_limit_invalid"
  | "array_invalid"
  | "command_empty";

export interface JobDescriptorIssue {
  code: JobDescriptorIssueCode;
  field: string;
  message: string;
}

export interface JobDescriptorValidation {
  ok: boolean;
  issues: JobDescriptorIssue[];
}

export interface ValidateOptions {
  resolver: EnvironmentResolver;
  /** Skip the working directory and environment lookups (render-only checks). */
  checkFilesystem?: boolean;
  homeDir?: string;
}

function checkStatic(d: LsfJobDescriptorV1): JobDescriptorIssue[] {
  const issues: JobDescriptorIssue[] = [];

  if (!/^[^\s[\]%"]{1,128}$/.test(d.job_name)) {
    issues.push({ code: "job_name_invalid", field: "job_name", message: `invalid job name: ${JSON.stringify(d.job_name)}` });
  }

  if (!Number.isInteger(d.memory_mb) || d.memory_mb < 1) {
    issues.push({ code: "memory_not_positive", field: "memory_mb", message: `memory_mb must be a positive integer, got ${d.memory_mb}` });
  }

  if (d.time_limit?.enabled) {
    try {
      parseTimeLimit(d.time_limit.value);
    } catch (e) {
      issues.push({ code: "time_limit_invalid", field: "time_limit.value", message: e instanceof Error ? e.message : String(e) });
    }
  }

  for (const field of ["output_path", "error_path"] as const) {
    const template = d[field];
    if (template === null || template === undefined) continue;
    const scan = scanOutputTemplate(template);
    if (scan.unknown.length > 0) {
      issues.push({
        code: "output_template_unknown_placeholder",
        field,
        message: `unsupported placeholder(s) in ${field}: ${scan.unknown.join(", ")}`
      });
    }
  }

  if (d.array) {
    const { start, end } = d.array;
    const step = d.array.step ?? 1;
    const maxConcurrent = d.array.max_concurrent ?? null;
    const valid =
      Number.isSafeInteger(start) &&
      Number.isSafeInteger(end) &&
      Number.isInteger(step) &&
      start >= 1 &&
      end >= start &&
      step >= 1 &&
      (maxConcurrent === null || (Number.isInteger(maxConcurrent) && maxConcurrent >= 1));
    if (!valid) {
      issues.push({ code: "array_invalid", field: "array", message: `invalid job array: ${JSON.stringify(d.array)}` });
    }
  }

  if (d.command.argv.length === 0 || d.command.argv.every((a) => a.trim().length === 0)) {
    issues.push({ code: "command_empty", field: "command.argv", message: "command.argv must name a program" });
  }

  return issues;
}

async function checkWorkingDir(d: LsfJobDescriptorV1, homeDir: string | undefined): Promise<JobDescriptorIssue | null> {
  const dir = expandHome(d.working_dir, homeDir);
  if (!path.isAbsolute(dir)) {
    return { code: "working_dir_not_absolute", field: "working_dir", message: `working_dir must be absolute: ${d.working_dir}` };
  }
  try {
    const st = await fs.stat(dir);
    if (!st.isDirectory()) {
      return { code: "working_dir_not_directory", field: "working_dir", message: `working_dir is not a directory: ${dir}` };
    }
  } catch {
    return { code: "working_dir_missing", field: "working_dir", message: `working_dir does not exist: ${dir}` };
  }
  return null;
}

export async function validateJobDescriptor(d: LsfJobDescriptorV1, opts: ValidateOptions): Promise<JobDescriptorValidation> {
  const issues = checkStatic(d);

  if (opts.checkFilesystem ?? true) {
    const wd = await checkWorkingDir(d, opts.homeDir);
    if (wd) issues.push(wd);

    const env = await opts.resolver.resolve(d.environment);
    if (!env.ok) {
      issues.push({ code: "environment_unresolved", field: "environment", message: env.reason });
    }
  } else {
    const dir = expandHome(d.working_dir, opts.homeDir);
    if (!path.isAbsolute(dir)) {
      issues.push({ code: "working_dir_not_absolute", field: "working_dir", message: `working_dir must be absolute: ${d.working_dir}` });
    }
  }

  return { ok: issues.length === 0, issues };
}
