// src/bin/java-deps.ts — `skill-toolkit java-deps`
// Exit code 1 when there is no build file or at least one compatibility issue.

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type pc from "picocolors";
import { ToolkitError } from "../errors.js";
import { formatJavaReport } from "../java-report.js";
import { analyzeJavaUpgrade, isAnalysisError } from "../java-upgrade.js";
import { generateUpgradeDiagram } from "../mermaid-generator.js";
import { stdoutOutput, type Output } from "../renderer.js";
import type { CompatibilityDatabase } from "../compatibility.js";
import type { Warning } from "../types.js";

export interface JavaDepsOptions {
  targetVersion?: string;
  sourceVersion?: string;
  projectDir?: string;
  json?: boolean;
  /** Write a Mermaid diagram of the dependencies to this path. */
  diagram?: string;
  db?: CompatibilityDatabase;
  colors?: ReturnType<typeof pc.createColors>;
  out?: Output;
  warnings?: Warning[];
}

export function runJavaDeps(options: JavaDepsOptions): number {
  const out = options.out ?? stdoutOutput;
  const warnings = options.warnings ?? [];

  if (!options.targetVersion) {
    throw new ToolkitError("ERROR: --target-version is required (e.g. 11, 17, 21)", 2);
  }

  const result = analyzeJavaUpgrade(
    {
      projectDir: options.projectDir ?? ".",
      targetVersion: options.targetVersion,
      sourceVersion: options.sourceVersion,
      db: options.db,
    },
    warnings,
  );

  if (isAnalysisError(result)) {
    out.write(options.json ? JSON.stringify(result, null, 2) + "\n" : `ERROR: ${result.error}\n`);
    return 1;
  }

  if (options.json) {
    out.write(JSON.stringify(result, null, 2) + "\n");
  } else {
    out.write(formatJavaReport(result, options.colors) + "\n");
  }

  if (options.diagram) {
    const diagramPath = resolve(options.diagram);
    const source = generateUpgradeDiagram(result);
    if (source) {
      mkdirSync(dirname(diagramPath), { recursive: true });
      writeFileSync(diagramPath, source);
      warnings.push({ level: "info", module: "java-deps", message: `Diagram written to ${diagramPath}` });
    } else {
      warnings.push({ level: "warn", module: "java-deps", message: "No dependencies found; diagram not written" });
    }
  }

  return result.compatibilityIssues.length > 0 ? 1 : 0;
}
