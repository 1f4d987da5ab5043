import { promises as fs } from "fs";
import { parseBsubScriptV1 } from "../execution/lsf/bsubScriptV1.js";
import { loadJobDescriptorFile } from "../execution/lsf/descriptorFile.js";
import { CondaEnvironmentResolver, type EnvironmentResolver } from "../execution/lsf/environment.js";
import type { LsfJobDescriptorV1 } from "../execution/lsf/jobDescriptor.js";
import { validateJobDescriptor } from "../execution/lsf/validate.js";
import { parseCliArgs, stringArg, type CliIo } from "./args.js";

export function validateUsage(): string {
  return [
    "usage:",
    "  tsx scripts/lsf_validate.ts --job <descriptor.yaml|.json> [--fs true|false]",
    "  tsx scripts/lsf_validate.ts --script <job.bsub> [--fs true|false]",
    "",
    "notes:",
    "  - --fs false skips the working directory and conda lookups",
    "  - exits 1 when any issue is found",
    ""
  ].join("\n");
}

/** Prints one `code<TAB>field<TAB>message` line per issue. Returns 0 ok, 1 issues, 2 usage. */
export async function runLsfValidate(
  argv: string[],
  io: CliIo,
  resolver: EnvironmentResolver = new CondaEnvironmentResolver()
): Promise<number> {
  const args = parseCliArgs(argv);
  const job = stringArg(args, "job");
  const script = stringArg(args, "script");
  if (args.help || (job === null) === (script === null)) {
    io.stderr(validateUsage());
    return args.help ? 0 : 2;
  }

  let descriptor: LsfJobDescriptorV1;
  if (job !== null) {
    descriptor = await loadJobDescriptorFile(job);
  } else {
    const parsed = parseBsubScriptV1(await fs.readFile(script ?? "", "utf8"));
    for (const w of parsed.warnings) io.stderr(`warning: ${w}\n`);
    descriptor = parsed.descriptor;
  }

  const result = await validateJobDescriptor(descriptor, {
    resolver,
    checkFilesystem: stringArg(args, "fs") !== "false"
  });

  for (const issue of result.issues) {
    io.stdout(`${issue.code}\t${issue.field}\t${issue.message}\n`);
  }
  io.stderr(result.ok ? `${descriptor.job_name}: ok\n` : `${descriptor.job_name}: ${result.issues.length} issue(s)\n`);
  return result.ok ? 0 : 1;
}
