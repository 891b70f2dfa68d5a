// src/renderer.ts — Mermaid → PNG batch rendering through the mmdc CLI
// Sequential: each file waits for the previous mmdc process to exit.

import { existsSync, statSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import type { CommandRunner } from "./command-runner.js";
import { RendererUnavailableError } from "./errors.js";
import {
  DIAGRAM_EXTENSION,
  IMAGE_EXTENSION,
  RENDERER_COMMAND,
  RENDERER_PACKAGE,
  type RenderConfig,
  type RenderResult,
  type RenderSettings,
  type RenderSummary,
} from "./types.js";

export interface Output {
  write(chunk: string): void;
}

export const stdoutOutput: Output = {
  write: (chunk) => {
    process.stdout.write(chunk);
  },
};

/**
 * Make sure mmdc is callable, installing the Mermaid CLI globally through npm if needed.
 * Throws RendererUnavailableError when that is not possible.
 */
export function ensureRenderer(runner: CommandRunner, out: Output = stdoutOutput): void {
  if (runner.exists(RENDERER_COMMAND)) return;

  out.write(`${RENDERER_COMMAND} not found. Installing ${RENDERER_PACKAGE}...\n`);
  if (!runner.exists("npm")) {
    throw new RendererUnavailableError(
      `ERROR: npm not found. Install Node.js first, or install ${RENDERER_COMMAND} manually:\n` +
      `  npm install -g ${RENDERER_PACKAGE}`,
    );
  }

  const status = runner.run("npm", ["install", "-g", RENDERER_PACKAGE]);
  if (status !== 0) {
    throw new RendererUnavailableError(
      `ERROR: npm install -g ${RENDERER_PACKAGE} failed with exit code ${status}`,
    );
  }
  if (!runner.exists(RENDERER_COMMAND)) {
    throw new RendererUnavailableError(
      `ERROR: ${RENDERER_COMMAND} is still not on PATH after installing ${RENDERER_PACKAGE}`,
    );
  }
}

/** `docs/diagrams/flow.mmd` → `docs/diagrams/flow.png` */
export function outputPathFor(input: string): string {
  return join(dirname(input), basename(input, DIAGRAM_EXTENSION) + IMAGE_EXTENSION);
}

/** mmdc arguments for one file. Settings are passed through untouched. */
export function rendererArgs(input: string, output: string, settings: RenderSettings): string[] {
  return [
    "-i", input,
    "-o", output,
    "--width", settings.width,
    "--height", settings.height,
    "--backgroundColor", settings.background,
    "--scale", settings.scale,
  ];
}

/**
 * Render one diagram. A non-zero exit, or a zero exit that left no output file, is a failure.
 */
export function renderDiagram(
  input: string,
  settings: RenderSettings,
  runner: CommandRunner,
): RenderResult {
  const output = outputPathFor(input);
  const status = runner.run(RENDERER_COMMAND, rendererArgs(input, output, settings), { quiet: true });

  if (status !== 0 || !existsSync(output)) {
    return { input, output, status: "failed" };
  }
  return { input, output, status: "ok", sizeBytes: statSync(output).size };
}

/**
 * Render every file in order, reporting progress per file. Failures are counted, never thrown.
 */
export function renderDiagrams(
  config: Pick<RenderConfig, "diagramDir" | "displayDir" | "settings">,
  files: string[],
  runner: CommandRunner,
  out: Output = stdoutOutput,
): RenderSummary {
  const { diagramDir, settings } = config;
  out.write(`Rendering ${files.length} diagrams from ${config.displayDir}\n`);
  out.write(`Settings: ${settings.width}x${settings.height} scale=${settings.scale} bg=${settings.background}\n`);
  out.write("---\n");

  const results: RenderResult[] = [];
  for (const file of files) {
    const name = basename(file, DIAGRAM_EXTENSION);
    out.write(`  ${name}${DIAGRAM_EXTENSION} → ${IMAGE_EXTENSION} ... `);

    const result = renderDiagram(file, settings, runner);
    results.push(result);
    out.write(
      result.status === "ok" && result.sizeBytes !== undefined
        ? `OK (${formatSize(result.sizeBytes)})\n`
        : "FAILED\n",
    );
  }

  const succeeded = results.filter((r) => r.status === "ok").length;
  const failed = results.length - succeeded;

  out.write("---\n");
  out.write(`Done: ${succeeded} succeeded, ${failed} failed\n`);

  return { diagramDir, results, succeeded, failed };
}

const SIZE_UNITS = ["K", "M", "G", "T"];

/**
 * Human-readable size the way `ls -lh` prints it: bytes below 1024,
 * one decimal below 10 units, always rounded up.
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return String(bytes);

  let value = bytes;
  for (let i = 0; i < SIZE_UNITS.length; i++) {
    value /= 1024;
    if (value < 10) {
      const tenths = Math.ceil(value * 10) / 10;
      if (tenths < 10) return `${tenths.toFixed(1)}${SIZE_UNITS[i]}`;
      return `10${SIZE_UNITS[i]}`;
    }
    const whole = Math.ceil(value);
    if (whole < 1024 || i === SIZE_UNITS.length - 1) return `${whole}${SIZE_UNITS[i]}`;
  }
  return String(bytes);
}
