// src/mermaid-generator.ts — Mermaid diagram of a Java upgrade report
// Project node on the left, one node per dependency, colored by upgrade status.
// The output is plain .mmd source that `render` turns into a PNG.

import { dependencyName } from "./build-file-parser.js";
import type { JavaUpgradeReport } from "./types.js";

type DependencyStatus = "issue" | "recommended" | "ok";

const STATUS_FILL: Record<DependencyStatus, string> = {
  issue: "#ffcdd2",
  recommended: "#fff3e0",
  ok: "#e8f5e9",
};

/**
 * Generate a `graph LR` diagram for the report. Returns "" when there are no dependencies.
 */
export function generateUpgradeDiagram(report: JavaUpgradeReport): string {
  if (report.dependencies.length === 0) return "";

  const issueNames = new Set(report.compatibilityIssues.map((i) => stripVersion(i.dependency)));
  const recommendedNames = new Set(report.recommendations.map((r) => r.dependency));

  const lines: string[] = ["graph LR"];
  lines.push(`  project["Java ${escapeLabel(report.currentVersion)} → ${escapeLabel(report.targetVersion)}"]`);

  const statuses = new Map<string, DependencyStatus>();
  for (const dep of report.dependencies) {
    const name = dependencyName(dep);
    const id = sanitizeId(name);
    const label = dep.version ? `${dep.artifactId}<br/>${dep.version}` : dep.artifactId;
    lines.push(`  project --> ${id}["${escapeLabel(label)}"]`);

    statuses.set(
      id,
      issueNames.has(name) ? "issue" : recommendedNames.has(name) ? "recommended" : "ok",
    );
  }

  for (const [id, status] of statuses) {
    lines.push(`  style ${id} fill:${STATUS_FILL[status]}`);
  }

  return lines.join("\n") + "\n";
}

/** `group:artifact:version` → `group:artifact` */
function stripVersion(coordinates: string): string {
  return coordinates.split(":").slice(0, 2).join(":");
}

/**
 * Sanitize a dependency name into a valid Mermaid node ID.
 */
export function sanitizeId(name: string): string {
  return "dep_" + name.replace(/[^a-zA-Z0-9]/g, "_");
}

function escapeLabel(label: string): string {
  return label.replace(/"/g, "#quot;");
}
