// src/index.ts — Library API

export type {
  Warning,
  RenderSettings,
  RenderConfig,
  RenderResult,
  RenderStatus,
  RenderSummary,
  BuildType,
  BuildFileInfo,
  JavaDependency,
  CompatibilityIssue,
  CompatibilityRules,
  UpgradeRecommendation,
  JavaUpgradeReport,
  JavaUpgradeError,
  JavaAnalysisResult,
  SkillPackage,
  SkillCheckResult,
} from "./types.js";
export { TOOLKIT_VERSION } from "./types.js";

export { ToolkitError, RendererUnavailableError, DirectoryNotFoundError } from "./errors.js";
export { createCommandRunner } from "./command-runner.js";
export type { CommandRunner, RunOptions } from "./command-runner.js";

export { resolveRenderConfig, parseCliArgs, DEFAULT_RENDER_SETTINGS } from "./config.js";
export type { ParsedArgs } from "./config.js";
export { discoverDiagrams } from "./diagram-discovery.js";
export { ensureRenderer, renderDiagram, renderDiagrams, formatSize, outputPathFor } from "./renderer.js";
export type { Output } from "./renderer.js";
export { runRender } from "./bin/render.js";

export { readBuildFile, parseMavenPom, parseGradleBuild } from "./build-file-parser.js";
export { compareVersions, loadCompatibilityDatabase } from "./compatibility.js";
export { analyzeJavaUpgrade, isAnalysisError } from "./java-upgrade.js";
export { formatJavaReport } from "./java-report.js";
export { generateUpgradeDiagram } from "./mermaid-generator.js";

export { checkSkills, checkSkillPackage, parseFrontmatter } from "./skill-validator.js";
