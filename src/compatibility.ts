// src/compatibility.ts — Java upgrade compatibility checks
// Rules per target Java version live in data/java-compatibility.json.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { dependencyName, formatDependency } from "./build-file-parser.js";
import type {
  CompatibilityIssue,
  CompatibilityRules,
  JavaDependency,
  UpgradeRecommendation,
} from "./types.js";

const DATA_FILE = fileURLToPath(new URL("../data/java-compatibility.json", import.meta.url));

const RulesSchema = z.object({
  removedModules: z.array(z.string()).default([]),
  minVersions: z.record(z.string()).default({}),
  recommendedVersions: z.record(z.string()).default({}),
});

const DatabaseSchema = z.record(RulesSchema);

export type CompatibilityDatabase = Record<string, CompatibilityRules>;

let cached: CompatibilityDatabase | undefined;

/**
 * Load the bundled compatibility database (cached after the first read).
 */
export function loadCompatibilityDatabase(): CompatibilityDatabase {
  if (!cached) {
    cached = DatabaseSchema.parse(JSON.parse(readFileSync(DATA_FILE, "utf-8")));
  }
  return cached;
}

/**
 * Rules for a target version, or null when the target is not in the database.
 */
export function rulesFor(
  targetVersion: string,
  db: CompatibilityDatabase = loadCompatibilityDatabase(),
): CompatibilityRules | null {
  return Object.hasOwn(db, targetVersion) ? db[targetVersion] : null;
}

/** True when the version contains at least one numeric component. */
export function isComparableVersion(version: string): boolean {
  return /\d/.test(version);
}

/**
 * Compare dotted versions by their numeric components.
 * Returns -1, 0 or 1. A shorter prefix sorts first: 5.3 < 5.3.0.
 */
export function compareVersions(v1: string, v2: string): -1 | 0 | 1 {
  const parts1 = numericParts(v1);
  const parts2 = numericParts(v2);

  const shared = Math.min(parts1.length, parts2.length);
  for (let i = 0; i < shared; i++) {
    if (parts1[i] < parts2[i]) return -1;
    if (parts1[i] > parts2[i]) return 1;
  }

  if (parts1.length < parts2.length) return -1;
  if (parts1.length > parts2.length) return 1;
  return 0;
}

function numericParts(version: string): number[] {
  return (version.match(/\d+/g) ?? []).map((p) => parseInt(p, 10));
}

/**
 * Dependencies whose known version is below the target's minimum.
 * Versions without digits (unresolved placeholders) are not judged.
 */
export function checkCompatibility(
  dependencies: JavaDependency[],
  rules: CompatibilityRules,
): CompatibilityIssue[] {
  const issues: CompatibilityIssue[] = [];
  for (const dep of dependencies) {
    const minVersion = rules.minVersions[dependencyName(dep)];
    if (minVersion === undefined || !dep.version || !isComparableVersion(dep.version)) continue;
    if (compareVersions(dep.version, minVersion) < 0) {
      issues.push({
        dependency: formatDependency(dep),
        currentVersion: dep.version,
        minVersion,
        severity: "high",
      });
    }
  }
  return issues;
}

/**
 * Modules removed from the JDK that the project does not declare explicitly.
 */
export function findMissingModules(
  dependencies: JavaDependency[],
  rules: CompatibilityRules,
): string[] {
  const declared = new Set(dependencies.map(dependencyName));
  return rules.removedModules.filter((module) => !declared.has(module));
}

/**
 * Suggested upgrades: listed dependencies with an unknown or older version.
 */
export function recommendUpgrades(
  dependencies: JavaDependency[],
  rules: CompatibilityRules,
  targetVersion: string,
): UpgradeRecommendation[] {
  const recommendations: UpgradeRecommendation[] = [];
  for (const dep of dependencies) {
    const name = dependencyName(dep);
    const recommendedVersion = rules.recommendedVersions[name];
    if (recommendedVersion === undefined) continue;

    const outdated = !dep.version
      || !isComparableVersion(dep.version)
      || compareVersions(dep.version, recommendedVersion) < 0;
    if (!outdated) continue;

    recommendations.push({
      dependency: name,
      currentVersion: dep.version ?? "unknown",
      recommendedVersion,
      reason: `Better Java ${targetVersion} support`,
    });
  }
  return recommendations;
}
