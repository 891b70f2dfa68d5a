// src/skill-validator.ts — Skill package validation
// A skill package is a directory with a SKILL.md whose front matter names and describes it.

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { z } from "zod";
import { assertDirectory } from "./diagram-discovery.js";
import type { SkillCheckResult, SkillPackage } from "./types.js";

export const SKILL_FILE = "SKILL.md";

const NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const SkillFrontmatterSchema = z.object({
  name: z
    .string({ required_error: "name is required" })
    .min(1, "name is required")
    .max(64, "name must be at most 64 characters")
    .regex(NAME_PATTERN, "name must be kebab-case"),
  description: z
    .string({ required_error: "description is required" })
    .min(1, "description is required")
    .max(1024, "description must be at most 1024 characters"),
});

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;

export interface ParsedSkillFile {
  data: Record<string, string>;
  body: string;
}

/**
 * Split `---` delimited front matter from the markdown body.
 * Only flat `key: value` pairs are read; `>` and `|` block scalars fold their indented lines.
 * Returns null when the file does not open with front matter.
 */
export function parseFrontmatter(content: string): ParsedSkillFile | null {
  const lines = content.replace(/\r\n/g, "\n").split("\n");
  if (lines[0]?.trim() !== "---") return null;

  const end = lines.findIndex((line, i) => i > 0 && line.trim() === "---");
  if (end === -1) return null;

  const data: Record<string, string> = {};
  let blockKey: string | null = null;
  let blockStyle: ">" | "|" = ">";
  let blockLines: string[] = [];

  const flushBlock = () => {
    if (blockKey !== null) {
      data[blockKey] = blockLines.join(blockStyle === "|" ? "\n" : " ").trim();
    }
    blockKey = null;
    blockLines = [];
  };

  for (const line of lines.slice(1, end)) {
    if (blockKey !== null && (/^\s+\S/.test(line) || line.trim() === "")) {
      blockLines.push(line.trim());
      continue;
    }
    flushBlock();

    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const colon = trimmed.indexOf(":");
    if (colon <= 0) continue;

    const key = trimmed.slice(0, colon).trim();
    const value = trimmed.slice(colon + 1).trim();
    if (value === ">" || value === "|" || value === ">-" || value === "|-") {
      blockKey = key;
      blockStyle = value.startsWith("|") ? "|" : ">";
      continue;
    }
    data[key] = value.replace(/^(['"])(.*)\1$/, "$2");
  }
  flushBlock();

  return { data, body: lines.slice(end + 1).join("\n").trim() };
}

/**
 * Validate one skill package directory.
 */
export function checkSkillPackage(dir: string): SkillCheckResult {
  const absDir = resolve(dir);
  const problems: string[] = [];
  const skillPath = join(absDir, SKILL_FILE);

  if (!existsSync(skillPath)) {
    return { dir: absDir, problems: [`missing ${SKILL_FILE}`] };
  }

  const parsed = parseFrontmatter(readFileSync(skillPath, "utf-8"));
  if (!parsed) {
    return { dir: absDir, problems: [`${SKILL_FILE} has no front matter`] };
  }

  const frontmatter = SkillFrontmatterSchema.safeParse(parsed.data);
  if (!frontmatter.success) {
    for (const issue of frontmatter.error.issues) problems.push(issue.message);
  } else if (frontmatter.data.name !== basename(absDir)) {
    problems.push(`name "${frontmatter.data.name}" does not match directory "${basename(absDir)}"`);
  }

  if (parsed.body === "") {
    problems.push(`${SKILL_FILE} has no instructions after the front matter`);
  }

  if (!frontmatter.success) return { dir: absDir, problems };

  const skill: SkillPackage = {
    name: frontmatter.data.name,
    description: frontmatter.data.description,
    dir: absDir,
    references: listFiles(join(absDir, "references")),
    templates: listFiles(join(absDir, "templates")),
    scripts: listFiles(join(absDir, "scripts")),
  };
  return { dir: absDir, skill, problems };
}

/**
 * Validate every package directly inside `rootDir`. Dot-directories are skipped.
 */
export function checkSkills(rootDir: string): SkillCheckResult[] {
  const absRoot = resolve(rootDir);
  assertDirectory(absRoot);

  return readdirSync(absRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort()
    .map((name) => checkSkillPackage(join(absRoot, name)));
}

function listFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}
