// src/bin/render.ts — `skill-toolkit render [dir]`
// Batch-renders every .mmd file in a directory to a .png beside it.

import { createCommandRunner, type CommandRunner } from "../command-runner.js";
import { resolveRenderConfig } from "../config.js";
import { assertDirectory, discoverDiagrams } from "../diagram-discovery.js";
import { ensureRenderer, renderDiagrams, stdoutOutput, type Output } from "../renderer.js";
import type { RenderSummary, Warning } from "../types.js";

export interface RenderCommandOptions {
  dir?: string;
  exclude?: string[];
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  runner?: CommandRunner;
  out?: Output;
  warnings?: Warning[];
}

/**
 * Run the render command. Returns the summary, or null when there was nothing to render.
 * Fatal problems (missing directory, renderer unavailable) throw a ToolkitError.
 */
export function runRender(options: RenderCommandOptions = {}): RenderSummary | null {
  const out = options.out ?? stdoutOutput;
  const runner = options.runner ?? createCommandRunner();
  const warnings = options.warnings ?? [];

  const config = resolveRenderConfig(
    options.dir,
    { env: options.env, configPath: options.configPath, cwd: options.cwd, exclude: options.exclude },
    warnings,
  );

  assertDirectory(config.diagramDir, config.displayDir);
  ensureRenderer(runner, out);

  const files = discoverDiagrams(config.diagramDir, config.exclude, warnings);
  if (files.length === 0) {
    out.write(`No .mmd files found in ${config.displayDir}\n`);
    return null;
  }

  return renderDiagrams(config, files, runner, out);
}
