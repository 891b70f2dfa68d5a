// src/bin/check-skills.ts — `skill-toolkit check-skills [dir]`

import { basename } from "node:path";
import pc from "picocolors";
import { stdoutOutput, type Output } from "../renderer.js";
import { checkSkills } from "../skill-validator.js";

export const DEFAULT_SKILLS_DIR = "skills";

export interface CheckSkillsOptions {
  dir?: string;
  out?: Output;
  colors?: ReturnType<typeof pc.createColors>;
}

/**
 * Returns 1 if any package is invalid or none were found, else 0.
 */
export function runCheckSkills(options: CheckSkillsOptions = {}): number {
  const out = options.out ?? stdoutOutput;
  const c = options.colors ?? pc;
  const rootDir = options.dir ?? DEFAULT_SKILLS_DIR;

  const results = checkSkills(rootDir);
  if (results.length === 0) {
    out.write(`No skill packages found in ${rootDir}\n`);
    return 1;
  }

  let invalid = 0;
  for (const result of results) {
    const label = basename(result.dir);
    if (result.problems.length === 0) {
      const extras = result.skill
        ? ` (${result.skill.references.length} references, ${result.skill.templates.length} templates, ${result.skill.scripts.length} scripts)`
        : "";
      out.write(`${c.green("OK")}      ${label}${extras}\n`);
      continue;
    }
    invalid++;
    out.write(`${c.red("INVALID")} ${label}\n`);
    for (const problem of result.problems) {
      out.write(`  - ${problem}\n`);
    }
  }

  out.write(`Done: ${results.length - invalid} valid, ${invalid} invalid\n`);
  return invalid > 0 ? 1 : 0;
}
