import { promises as fs } from "fs";
import YAML from "yaml";
import { parseBsubScriptV1, renderBsubScriptV1 } from "../execution/lsf/bsubScriptV1.js";
import { loadJobDescriptorFile } from "../execution/lsf/descriptorFile.js";
import { parseCliArgs, stringArg, type CliIo } from "./args.js";

export function renderUsage(): string {
  return [
    "usage:",
    "  tsx scripts/lsf_render.ts --job <descriptor.yaml|.json> [--out <file>]",
    "  tsx scripts/lsf_render.ts --script <job.bsub> [--out <file>]",
    "",
    "notes:",
    "  - --job prints the bsub script for a descriptor",
    "  - --script reads a bsub script back and prints its descriptor as YAML",
    ""
  ].join("\n");
}

/** Returns the process exit code: 0 ok, 2 usage. Errors propagate. */
export async function runLsfRender(argv: string[], io: CliIo): Promise<number> {
  const args = parseCliArgs(argv);
  const job = stringArg(args, "job");
  const script = stringArg(args, "script");
  if (args.help || (job === null) === (script === null)) {
    io.stderr(renderUsage());
    return args.help ? 0 : 2;
  }

  let text: string;
  if (job !== null) {
    text = renderBsubScriptV1(await loadJobDescriptorFile(job));
  } else {
    const parsed = parseBsubScriptV1(await fs.readFile(script ?? "", "utf8"));
    for (const w of parsed.warnings) io.stderr(`warning: ${w}\n`);
    text = YAML.stringify(parsed.descriptor);
  }

  const out = stringArg(args, "out");
  if (out !== null) {
    await fs.writeFile(out, text, "utf8");
    io.stderr(`wrote ${out}\n`);
  } else {
    io.stdout(text);
  }
  return 0;
}
