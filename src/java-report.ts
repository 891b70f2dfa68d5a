// src/java-report.ts — Console report for a Java upgrade analysis

import pc from "picocolors";
import type { JavaUpgradeReport } from "./types.js";

type Colors = ReturnType<typeof pc.createColors>;

const RULE = "-".repeat(70);

/**
 * Render the report as terminal text. Pass `pc.createColors(false)` for plain output.
 */
export function formatJavaReport(report: JavaUpgradeReport, colors: Colors = pc): string {
  const c = colors;
  const lines: string[] = [
    "",
    c.bold("Java Dependency Analysis Report"),
    "=".repeat(70),
    "",
    `Project Directory: ${report.projectDir}`,
    `Build Type: ${c.cyan(report.buildType)}`,
    `Current Java Version: ${c.yellow(report.currentVersion)}`,
    `Target Java Version: ${c.green(report.targetVersion)}`,
    "",
    `Found ${report.totalDependencies} dependencies`,
    "",
  ];

  const issues = report.compatibilityIssues;
  if (issues.length > 0) {
    lines.push(c.red(c.bold(`⚠ Compatibility Issues (${issues.length})`)), RULE);
    for (const issue of issues) {
      lines.push(`${c.red("✗")} ${issue.dependency}`);
      lines.push(`  Current: ${issue.currentVersion} | Required: ${issue.minVersion} or higher`);
    }
    lines.push("");
  } else {
    lines.push(c.green("✓ No compatibility issues found"), "");
  }

  const missing = report.missingModules;
  if (missing.length > 0) {
    lines.push(c.yellow(c.bold(`⚠ Missing Dependencies for Removed JDK Modules (${missing.length})`)), RULE);
    lines.push(`Java ${report.targetVersion} removed these modules from the JDK.`);
    lines.push("Add explicit dependencies if your code uses them:", "");
    for (const module of missing) {
      lines.push(`${c.yellow("!")} ${module}`);
    }
    lines.push("");
  }

  const recs = report.recommendations;
  if (recs.length > 0) {
    lines.push(c.cyan(c.bold(`💡 Recommendations (${recs.length})`)), RULE);
    for (const rec of recs) {
      lines.push(`${c.cyan("→")} ${rec.dependency}`);
      lines.push(`  Current: ${rec.currentVersion} | Recommended: ${rec.recommendedVersion}`);
      lines.push(`  Reason: ${rec.reason}`);
    }
    lines.push("");
  }

  lines.push(
    c.bold("Summary"),
    RULE,
    `Critical Issues: ${c.red(String(issues.length))}`,
    `Missing JDK Module Dependencies: ${c.yellow(String(missing.length))}`,
    `Upgrade Recommendations: ${c.cyan(String(recs.length))}`,
    "",
  );

  return lines.join("\n");
}
