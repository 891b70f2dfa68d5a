// src/java-upgrade.ts — Java version upgrade analysis
// Reads the build file, then runs the compatibility checks for the target version.

import { resolve } from "node:path";
import { readBuildFile } from "./build-file-parser.js";
import {
  checkCompatibility,
  findMissingModules,
  loadCompatibilityDatabase,
  recommendUpgrades,
  rulesFor,
  type CompatibilityDatabase,
} from "./compatibility.js";
import type { JavaAnalysisResult, JavaUpgradeError, Warning } from "./types.js";

export const NO_BUILD_FILE = "No Maven (pom.xml) or Gradle (build.gradle) file found";

export interface JavaUpgradeOptions {
  projectDir: string;
  targetVersion: string;
  /** Overrides the version detected from the build file. */
  sourceVersion?: string;
  db?: CompatibilityDatabase;
}

export function analyzeJavaUpgrade(
  options: JavaUpgradeOptions,
  warnings: Warning[] = [],
): JavaAnalysisResult {
  const projectDir = resolve(options.projectDir);
  const build = readBuildFile(projectDir, warnings);
  if (!build) {
    return { projectDir, error: NO_BUILD_FILE };
  }

  const db = options.db ?? loadCompatibilityDatabase();
  const rules = rulesFor(options.targetVersion, db);
  if (!rules) {
    warnings.push({
      level: "info",
      module: "java-upgrade",
      message: `No compatibility rules for Java ${options.targetVersion}; known targets: ${Object.keys(db).join(", ")}`,
    });
  }

  const { dependencies } = build;
  return {
    projectDir,
    buildType: build.buildType,
    currentVersion: options.sourceVersion ?? build.javaVersion,
    targetVersion: options.targetVersion,
    totalDependencies: dependencies.length,
    dependencies,
    compatibilityIssues: rules ? checkCompatibility(dependencies, rules) : [],
    missingModules: rules ? findMissingModules(dependencies, rules) : [],
    recommendations: rules ? recommendUpgrades(dependencies, rules, options.targetVersion) : [],
  };
}

export function isAnalysisError(result: JavaAnalysisResult): result is JavaUpgradeError {
  return "error" in result;
}
