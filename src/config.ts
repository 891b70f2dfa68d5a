// src/config.ts — CLI args and render settings
// Precedence for render settings: defaults ← skill-toolkit.config.json ← environment ← CLI args.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { z } from "zod";
import type { RenderConfig, RenderSettings, Warning } from "./types.js";

export const CONFIG_FILENAME = "skill-toolkit.config.json";
export const DEFAULT_DIAGRAM_DIR = "docs/diagrams";

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  width: "3200",
  height: "2400",
  scale: "2",
  background: "white",
};

const SETTING_KEYS = ["width", "height", "scale", "background"] as const;

const ENV_KEYS: Record<keyof RenderSettings, string> = {
  width: "RENDER_WIDTH",
  height: "RENDER_HEIGHT",
  scale: "RENDER_SCALE",
  background: "RENDER_BG",
};

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  help: boolean;
  version: boolean;
  quiet: boolean;
  json: boolean;
  exclude: string[];
  config?: string;
  targetVersion?: string;
  sourceVersion?: string;
  projectDir?: string;
  diagram?: string;
}

const settingValue = z.union([z.string(), z.number()]).transform(String);

const FileConfigSchema = z.object({
  render: z
    .object({
      dir: z.string().optional(),
      width: settingValue.optional(),
      height: settingValue.optional(),
      scale: settingValue.optional(),
      background: z.string().optional(),
      exclude: z.array(z.string()).optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Resolve the render configuration for one run.
 * `dirArg` is the positional directory argument, if any.
 */
export function resolveRenderConfig(
  dirArg: string | undefined,
  options: {
    env?: NodeJS.ProcessEnv;
    configPath?: string;
    cwd?: string;
    exclude?: string[];
  } = {},
  warnings: Warning[] = [],
): RenderConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const fileConfig: NonNullable<FileConfig["render"]> =
    loadConfigFile(options.configPath, cwd, warnings)?.render ?? {};

  const settings: RenderSettings = { ...DEFAULT_RENDER_SETTINGS };
  for (const key of SETTING_KEYS) {
    const fromEnv = env[ENV_KEYS[key]];
    const useEnv = fromEnv !== undefined && fromEnv !== "";
    const raw = useEnv ? fromEnv : fileConfig[key];
    if (raw === undefined) continue;
    const source = useEnv ? ENV_KEYS[key] : `render.${key}`;

    settings[key] = raw;
    if (key !== "background" && !isPositiveNumber(raw)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `${source}="${raw}" is not a positive number; passing it to mmdc as given`,
      });
    }
  }

  const displayDir = dirArg ?? fileConfig.dir ?? DEFAULT_DIAGRAM_DIR;
  return {
    diagramDir: resolve(cwd, displayDir),
    displayDir,
    settings,
    exclude: [...(fileConfig.exclude ?? []), ...(options.exclude ?? [])],
  };
}

function isPositiveNumber(raw: string): boolean {
  if (raw.trim() === "") return false;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0;
}

/**
 * Load skill-toolkit.config.json from an explicit path or the working directory.
 * Returns null when there is none or it cannot be used.
 */
export function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  const filePath = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILENAME);
  if (!existsSync(filePath)) {
    if (configPath) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
    }
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }

  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    warnings.push({
      level: "warn",
      module: "config",
      message: `Invalid config file ${filePath}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown shape"}`,
    });
    return null;
  }
  return result.data;
}

/**
 * Parse CLI args using mri. The first positional is the command.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { h: "help", q: "quiet", c: "config", x: "exclude", V: "version" },
    boolean: ["help", "quiet", "json", "version"],
    string: ["config", "exclude", "target-version", "source-version", "project-dir", "diagram"],
  });

  const [command, ...positionals] = args._.map(String);

  return {
    command,
    positionals,
    help: args.help === true,
    version: args.version === true,
    quiet: args.quiet === true,
    json: args.json === true,
    exclude: stringList(args.exclude),
    config: optionalString(args.config),
    targetVersion: optionalString(args["target-version"]),
    sourceVersion: optionalString(args["source-version"]),
    projectDir: optionalString(args["project-dir"]),
    diagram: optionalString(args.diagram),
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function stringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string" && v !== "");
  const single = optionalString(value);
  return single ? [single] : [];
}
