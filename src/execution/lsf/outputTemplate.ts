import path from "path";
import { expandHome } from "./environment.js";

export type OutputPlaceholder = "%J" | "%I";

export interface OutputTemplateScan {
  placeholders: OutputPlaceholder[];
  unknown: string[];
}

export function scanOutputTemplate(template: string): OutputTemplateScan {
  const placeholders: OutputPlaceholder[] = [];
  const unknown: string[] = [];

  for (let i = 0; i < template.length; i++) {
    if (template.charAt(i) !== "%") continue;
    const next = template.charAt(i + 1);
    if (next === "J" || next === "I") {
      placeholders.push(`%${next}`);
      i++;
    } else if (next === "") {
      unknown.push("%");
    } else {
      unknown.push(`%${next}`);
      i++;
    }
  }

  return { placeholders, unknown };
}

/**
 * Resolves `%J` and `%I` the way LSF does when it opens the output file.
 * Jobs that are not part of an array use index 0.
 */
export function substituteOutputTemplate(template: string, ids: { jobId: string; arrayIndex: number }): string {
  const scan = scanOutputTemplate(template);
  if (scan.unknown.length > 0) {
    throw new Error(`unsupported placeholder(s) in output path ${template}: ${scan.unknown.join(", ")}`);
  }
  return template.replace(/%([JI])/g, (_match, key: string) => (key === "J" ? ids.jobId : String(ids.arrayIndex)));
}

/** Relative paths are taken from the job's working directory, where it is submitted from. */
export function resolveOutputPath(
  template: string,
  ids: { jobId: string; arrayIndex: number },
  opts: { workingDir: string; homeDir?: string }
): string {
  const substituted = expandHome(substituteOutputTemplate(template, ids), opts.homeDir);
  return path.resolve(expandHome(opts.workingDir, opts.homeDir), substituted);
}
