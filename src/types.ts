// src/types.ts — Shared types for skill-toolkit

export const TOOLKIT_VERSION = "1.0.0";

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Render ──────────────────────────────────────────────────────────────────

/** Passed to the renderer verbatim, so kept as the strings the user gave. */
export interface RenderSettings {
  width: string;
  height: string;
  scale: string;
  background: string;
}

export interface RenderConfig {
  /** Absolute path used for file system access. */
  diagramDir: string;
  /** The directory as the user gave it; used in messages. */
  displayDir: string;
  settings: RenderSettings;
  exclude: string[];
}

export type RenderStatus = "ok" | "failed";

export interface RenderResult {
  input: string;
  output: string;
  status: RenderStatus;
  /** Output size in bytes; only set on success. */
  sizeBytes?: number;
}

export interface RenderSummary {
  diagramDir: string;
  results: RenderResult[];
  succeeded: number;
  failed: number;
}

export const DIAGRAM_EXTENSION = ".mmd";
export const IMAGE_EXTENSION = ".png";
export const RENDERER_COMMAND = "mmdc";
export const RENDERER_PACKAGE = "@mermaid-js/mermaid-cli";

// ─── Java dependency analysis ────────────────────────────────────────────────

export type BuildType = "Maven" | "Gradle";

export interface JavaDependency {
  groupId: string;
  artifactId: string;
  version?: string;
}

export interface BuildFileInfo {
  buildType: BuildType;
  buildFile: string;
  javaVersion: string;
  dependencies: JavaDependency[];
}

export interface CompatibilityIssue {
  dependency: string;
  currentVersion: string;
  minVersion: string;
  severity: "high";
}

export interface UpgradeRecommendation {
  dependency: string;
  currentVersion: string;
  recommendedVersion: string;
  reason: string;
}

export interface CompatibilityRules {
  removedModules: string[];
  minVersions: Record<string, string>;
  recommendedVersions: Record<string, string>;
}

export interface JavaUpgradeReport {
  projectDir: string;
  buildType: BuildType;
  currentVersion: string;
  targetVersion: string;
  totalDependencies: number;
  dependencies: JavaDependency[];
  compatibilityIssues: CompatibilityIssue[];
  missingModules: string[];
  recommendations: UpgradeRecommendation[];
}

export interface JavaUpgradeError {
  projectDir: string;
  error: string;
}

export type JavaAnalysisResult = JavaUpgradeReport | JavaUpgradeError;

// ─── Skill packages ──────────────────────────────────────────────────────────

export interface SkillPackage {
  name: string;
  description: string;
  dir: string;
  references: string[];
  templates: string[];
  scripts: string[];
}

export interface SkillCheckResult {
  dir: string;
  skill?: SkillPackage;
  problems: string[];
}
