import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { JsonObject } from "../core/json.js";
import { expandHome } from "../execution/lsf/environment.js";
import { parseTimeLimit } from "../execution/lsf/timeLimit.js";
import type { LsfJobDescriptorV1 } from "../execution/lsf/jobDescriptor.js";

export const zPolicyConfig = z.object({
  version: z.number().int(),
  runtime: z.object({ instance_id: z.string() }).optional(),
  tool_allowlist: z.array(z.string()),
  quotas: z.object({
    max_preview_bytes: z.number().int().positive().optional(),
    max_preview_lines: z.number().int().positive().optional(),
    max_collect_output_bytes: z.number().int().positive().optional()
  }),
  lsf: z
    .object({
      projects_allowlist: z.array(z.string()),
      queues_allowlist: z.array(z.string()).optional(),
      environments_allowlist: z.array(z.string()),
      working_dir_prefix_allowlist: z.array(z.string()),
      max_mem_mb: z.number().int().positive(),
      max_time_limit_minutes: z.number().int().positive(),
      max_array_size: z.number().int().positive().optional(),
      allow_scheduler_queries: z.boolean().optional()
    })
    .optional()
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;
type LsfPolicy = NonNullable<PolicyConfig["lsf"]>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}(.*)$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)(\/.*)?$/.exec(trimmed);
  if (!m) return value;

  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? `${v}${m[2] ?? ""}` : null;
}

function expandPolicyEnv(policy: PolicyConfig): PolicyConfig {
  if (!policy.lsf) return policy;
  const prefixes = policy.lsf.working_dir_prefix_allowlist
    .map((p) => expandEnvToken(p))
    .filter((p): p is string => typeof p === "string" && p.trim().length > 0);

  return {
    ...policy,
    lsf: {
      ...policy.lsf,
      working_dir_prefix_allowlist: prefixes
    }
  };
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = sha256Prefixed(stableJsonStringify(policy));
  }

  static async loadFromFile(filePath: string): Promise<PolicyEngine> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = zPolicyConfig.safeParse(YAML.parse(raw));
    if (!parsed.success) {
      throw new Error(`invalid policy at ${filePath}: ${z.prettifyError(parsed.error)}`);
    }
    return new PolicyEngine(expandPolicyEnv(parsed.data));
  }

  snapshot(): JsonObject {
    return structuredClone(this.policy);
  }

  runtimeInstanceId(): string | null {
    const raw = this.policy.runtime?.instance_id;
    if (typeof raw !== "string") return null;
    const trimmed = raw.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  previewCaps(): { maxBytes: number; maxLines: number } {
    return {
      maxBytes: this.policy.quotas.max_preview_bytes ?? 8192,
      maxLines: this.policy.quotas.max_preview_lines ?? 200
    };
  }

  maxCollectOutputBytes(): bigint {
    return BigInt(this.policy.quotas.max_collect_output_bytes ?? 16 * 1024 * 1024);
  }

  assertToolAllowed(toolName: string): void {
    if (!this.policy.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied tool: ${toolName}`);
    }
  }

  private requireLsf(): LsfPolicy {
    if (!this.policy.lsf) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied lsf (no lsf config)`);
    }
    return this.policy.lsf;
  }

  schedulerQueriesAllowed(): boolean {
    return this.policy.lsf?.allow_scheduler_queries ?? false;
  }

  assertProjectAllowed(project: string): void {
    const lsf = this.requireLsf();
    if (!lsf.projects_allowlist.includes(project)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied lsf project: ${project}`);
    }
  }

  assertQueueAllowed(queue: string | null | undefined): void {
    if (queue === null || queue === undefined) return;
    const lsf = this.requireLsf();
    if (!(lsf.queues_allowlist ?? []).includes(queue)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied lsf queue: ${queue}`);
    }
  }

  assertEnvironmentAllowed(name: string): void {
    const lsf = this.requireLsf();
    if (!lsf.environments_allowlist.includes(name)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied environment: ${name}`);
    }
  }

  assertWorkingDirAllowed(workingDir: string, homeDir?: string): void {
    const lsf = this.requireLsf();
    const resolved = path.resolve(expandHome(workingDir, homeDir));
    const allowed = lsf.working_dir_prefix_allowlist.some((prefix) => {
      const p = path.resolve(expandHome(prefix, homeDir));
      return resolved === p || resolved.startsWith(p + path.sep);
    });
    if (!allowed) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied working_dir outside allowlist: ${resolved}`);
    }
  }

  /** Memory, run limit and array size caps. A disabled run limit is not capped. */
  enforceResources(input: { memoryMb: number; timeLimit: { value: string; enabled: boolean } | null; arraySize: number }): void {
    const lsf = this.requireLsf();

    if (input.memoryMb > lsf.max_mem_mb) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied memory_mb=${input.memoryMb} (max ${lsf.max_mem_mb})`);
    }

    if (input.timeLimit?.enabled) {
      const minutes = parseTimeLimit(input.timeLimit.value).totalMinutes;
      if (minutes > lsf.max_time_limit_minutes) {
        throw new McpError(
          ErrorCode.InvalidRequest,
          `policy denied time_limit=${input.timeLimit.value} (max ${lsf.max_time_limit_minutes} minutes)`
        );
      }
    }

    this.assertArraySizeAllowed(input.arraySize);
  }

  maxArraySize(): number {
    return this.policy.lsf?.max_array_size ?? 1000;
  }

  assertArraySizeAllowed(arraySize: number): void {
    const maxArray = this.maxArraySize();
    if (arraySize > maxArray) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied array size ${arraySize} (max ${maxArray})`);
    }
  }

  enforceJobDescriptor(d: LsfJobDescriptorV1, arraySize: number, homeDir?: string): void {
    this.assertProjectAllowed(d.project);
    this.assertQueueAllowed(d.queue);
    this.assertEnvironmentAllowed(d.environment.name);
    this.assertWorkingDirAllowed(d.working_dir, homeDir);
    this.enforceResources({ memoryMb: d.memory_mb, timeLimit: d.time_limit ?? null, arraySize });
  }
}
