import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import type { LsfJobDescriptorV1 } from "./jobDescriptor.js";

export const zLsfJobDescriptor = z.object({
  version: z.literal(1),
  job_name: z.string().min(1).max(128),
  project: z.string().min(1),
  queue: z.string().min(1).nullable().optional(),
  output_path: z.string().min(1),
  error_path: z.string().min(1).nullable().optional(),
  time_limit: z
    .object({
      value: z.string().min(1),
      enabled: z.boolean().default(true)
    })
    .nullable()
    .optional(),
  memory_mb: z.number().int(),
  array: z
    .object({
      start: z.number().int(),
      end: z.number().int(),
      step: z.number().int().nullable().optional(),
      max_concurrent: z.number().int().nullable().optional()
    })
    .nullable()
    .optional(),
  working_dir: z.string().min(1),
  environment: z.object({
    kind: z.literal("conda").default("conda"),
    activate_script: z.string().min(1),
    name: z.string().min(1)
  }),
  command: z.object({
    argv: z.array(z.string()).min(1)
  }),
  shell: z.enum(["zsh", "bash", "sh"]).optional()
});

/** Reads a job descriptor from a `.yaml`/`.yml` or `.json` file. */
export async function loadJobDescriptorFile(filePath: string): Promise<LsfJobDescriptorV1> {
  const raw = await fs.readFile(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();
  const data: unknown = ext === ".json" ? JSON.parse(raw) : YAML.parse(raw);
  const parsed = zLsfJobDescriptor.safeParse(data);
  if (!parsed.success) {
    throw new Error(`invalid job descriptor at ${filePath}: ${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}
