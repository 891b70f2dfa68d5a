#!/usr/bin/env node
// CLI entry point for skill-toolkit

import { parseCliArgs, type ParsedArgs } from "../config.js";
import { ToolkitError, errorMessage } from "../errors.js";
import { TOOLKIT_VERSION, type Warning } from "../types.js";

const HELP_TEXT = `
skill-toolkit v${TOOLKIT_VERSION}

Usage:
  skill-toolkit render [dir]             Render every .mmd file in dir to .png (default: docs/diagrams)
  skill-toolkit java-deps                Analyze Java dependencies for a version upgrade
  skill-toolkit check-skills [dir]       Validate skill packages (default: skills)

Options:
  --exclude, -x <glob>   (render) Skip diagram files matching the glob; repeatable
  --config, -c <path>    (render) Config file (default: ./skill-toolkit.config.json)
  --target-version <v>   (java-deps) Target Java version, e.g. 11, 17, 21 (required)
  --source-version <v>   (java-deps) Current Java version (detected if omitted)
  --project-dir <dir>    (java-deps) Directory with pom.xml or build.gradle (default: .)
  --json                 (java-deps) Print the report as JSON
  --diagram <path>       (java-deps) Also write a Mermaid diagram of the dependencies
  --quiet, -q            Suppress warnings
  --version, -V          Print the version
  --help, -h             Show this help text

Environment Variables (render):
  RENDER_WIDTH           Page width passed to mmdc (default: 3200)
  RENDER_HEIGHT          Page height passed to mmdc (default: 2400)
  RENDER_SCALE           Puppeteer scale factor (default: 2)
  RENDER_BG              Background color (default: white)

Examples:
  skill-toolkit render docs/diagrams
  RENDER_BG=transparent skill-toolkit render
  skill-toolkit java-deps --target-version 21 --project-dir ./service --diagram docs/diagrams/deps.mmd
`.trim();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.version) {
    process.stdout.write(TOOLKIT_VERSION + "\n");
    return 0;
  }
  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT + "\n");
    return args.help ? 0 : 1;
  }

  const warnings: Warning[] = [];
  try {
    return await runCommand(args, warnings);
  } finally {
    printWarnings(warnings, args.quiet);
  }
}

async function runCommand(args: ParsedArgs, warnings: Warning[]): Promise<number> {
  switch (args.command) {
    case "render": {
      const { runRender } = await import("./render.js");
      runRender({
        dir: args.positionals[0],
        exclude: args.exclude,
        configPath: args.config,
        warnings,
      });
      // Per-file failures are reported in the summary, not the exit code
      return 0;
    }
    case "java-deps": {
      const { runJavaDeps } = await import("./java-deps.js");
      return runJavaDeps({
        targetVersion: args.targetVersion,
        sourceVersion: args.sourceVersion,
        projectDir: args.projectDir ?? args.positionals[0],
        json: args.json,
        diagram: args.diagram,
        warnings,
      });
    }
    case "check-skills": {
      const { runCheckSkills } = await import("./check-skills.js");
      return runCheckSkills({ dir: args.positionals[0] });
    }
    default:
      throw new ToolkitError(`Unknown command: ${args.command}\n\n${HELP_TEXT}`, 2);
  }
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}\n`);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ToolkitError) {
      process.stderr.write(err.message + "\n");
      process.exitCode = err.exitCode;
      return;
    }
    process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  },
);
