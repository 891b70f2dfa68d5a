// src/build-file-parser.ts — Maven / Gradle build file parsing
// Extracts the configured Java version and declared dependencies.

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import type { BuildFileInfo, JavaDependency, Warning } from "./types.js";

export const UNKNOWN_VERSION = "unknown";

// Checked in this order; Kotlin DSL wins over Groovy when both exist.
const GRADLE_FILES = ["build.gradle.kts", "build.gradle"];

/**
 * Locate and parse the project's build file. Maven takes precedence over Gradle.
 * Returns null when the directory has neither.
 */
export function readBuildFile(projectDir: string, warnings: Warning[] = []): BuildFileInfo | null {
  const pomPath = join(projectDir, "pom.xml");
  if (existsSync(pomPath)) {
    const pom = parseMavenPom(readFileSync(pomPath, "utf-8"), warnings, pomPath);
    return { buildType: "Maven", buildFile: pomPath, ...pom };
  }

  for (const name of GRADLE_FILES) {
    const gradlePath = join(projectDir, name);
    if (existsSync(gradlePath)) {
      const gradle = parseGradleBuild(readFileSync(gradlePath, "utf-8"));
      return { buildType: "Gradle", buildFile: gradlePath, ...gradle };
    }
  }

  return null;
}

export function dependencyName(dep: JavaDependency): string {
  return `${dep.groupId}:${dep.artifactId}`;
}

/** `group:artifact:version`, or `group:artifact` when the version is unknown. */
export function formatDependency(dep: JavaDependency): string {
  return dep.version ? `${dependencyName(dep)}:${dep.version}` : dependencyName(dep);
}

// ─── Maven ───────────────────────────────────────────────────────────────────

// An empty element (<parent/>) parses to "".
function element<T extends z.ZodTypeAny>(schema: T) {
  return z.union([schema, z.literal("")]).optional();
}

const CoordinatesSchema = z.object({
  groupId: z.string().optional(),
  artifactId: z.string().optional(),
  version: z.string().optional(),
});

const PluginSchema = CoordinatesSchema.extend({
  configuration: element(
    z.object({
      source: z.string().optional(),
      release: z.string().optional(),
    }),
  ),
});

const PomSchema = z.object({
  project: z.object({
    version: z.string().optional(),
    parent: element(CoordinatesSchema),
    properties: element(z.record(z.unknown())),
    dependencies: element(z.object({ dependency: z.array(CoordinatesSchema).optional() })),
    build: element(
      z.object({
        plugins: element(z.object({ plugin: z.array(PluginSchema).optional() })),
      }),
    ),
  }),
});

type Pom = z.infer<typeof PomSchema>;

const ARRAY_PATHS = new Set([
  "project.dependencies.dependency",
  "project.build.plugins.plugin",
]);

const pomParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (_tagName, jPath) => ARRAY_PATHS.has(jPath),
});

/**
 * Parse pom.xml content. Unparseable input adds a warning and yields
 * an unknown Java version with no dependencies.
 */
export function parseMavenPom(
  content: string,
  warnings: Warning[] = [],
  file?: string,
): { javaVersion: string; dependencies: JavaDependency[] } {
  const empty = { javaVersion: UNKNOWN_VERSION, dependencies: [] };

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    warnings.push({
      level: "warn",
      module: "build-file-parser",
      message: `Could not parse pom.xml: ${validation.err.msg} (line ${validation.err.line})`,
      file,
    });
    return empty;
  }

  const result = PomSchema.safeParse(pomParser.parse(content));
  if (!result.success) {
    const issue = result.error.issues[0];
    warnings.push({
      level: "warn",
      module: "build-file-parser",
      message: `Could not parse pom.xml: unexpected structure${issue ? ` at ${issue.path.join(".")}` : ""}`,
      file,
    });
    return empty;
  }

  const project = result.data.project;
  const properties = collectProperties(project);
  const interpolate = (value: string | undefined) =>
    value === undefined ? undefined : resolveProperties(value, properties);

  return {
    javaVersion: mavenJavaVersion(result.data, interpolate),
    dependencies: mavenDependencies(result.data, interpolate),
  };
}

function collectProperties(project: Pom["project"]): Map<string, string> {
  const properties = new Map<string, string>();
  if (project.version) properties.set("project.version", project.version);
  if (project.properties) {
    for (const [key, value] of Object.entries(project.properties)) {
      if (typeof value === "string") properties.set(key, value);
    }
  }
  return properties;
}

/**
 * Replace `${name}` references with property values. Unknown names are left as written.
 * Nested references resolve up to a fixed depth.
 */
export function resolveProperties(value: string, properties: Map<string, string>): string {
  let current = value;
  for (let depth = 0; depth < 5 && current.includes("${"); depth++) {
    const next = current.replace(/\$\{([^}]+)\}/g, (match, name: string) => properties.get(name) ?? match);
    if (next === current) break;
    current = next;
  }
  return current;
}

function mavenJavaVersion(pom: Pom, interpolate: (v: string | undefined) => string | undefined): string {
  const props: Record<string, unknown> = pom.project.properties || {};
  for (const key of ["maven.compiler.source", "maven.compiler.release", "java.version"]) {
    const value = props[key];
    if (typeof value === "string" && value !== "") {
      return interpolate(value) ?? value;
    }
  }

  const plugins = (pom.project.build && pom.project.build.plugins && pom.project.build.plugins.plugin) || [];
  for (const plugin of plugins) {
    if (plugin.artifactId !== "maven-compiler-plugin" || !plugin.configuration) continue;
    const version = plugin.configuration.source || plugin.configuration.release;
    if (version) return interpolate(version) ?? version;
  }

  return UNKNOWN_VERSION;
}

function mavenDependencies(
  pom: Pom,
  interpolate: (v: string | undefined) => string | undefined,
): JavaDependency[] {
  const declared = (pom.project.dependencies && pom.project.dependencies.dependency) || [];
  const coordinates = pom.project.parent ? [...declared, pom.project.parent] : declared;

  const deps: JavaDependency[] = [];
  for (const c of coordinates) {
    if (!c.groupId || !c.artifactId) continue;
    const version = interpolate(c.version);
    deps.push({
      groupId: c.groupId,
      artifactId: c.artifactId,
      ...(version ? { version } : {}),
    });
  }
  return dedupe(deps);
}

// ─── Gradle ──────────────────────────────────────────────────────────────────

const GRADLE_CONFIGURATIONS = [
  "implementation",
  "api",
  "compile",
  "compileOnly",
  "runtimeOnly",
  "testImplementation",
  "testCompile",
  "testRuntimeOnly",
];

// implementation 'g:a:v' | implementation("g:a:v") | api "g:a"
const GRADLE_DEPENDENCY = new RegExp(
  `\\b(?:${GRADLE_CONFIGURATIONS.join("|")})\\s*\\(?\\s*['"]([^:'"\\s]+):([^:'"\\s]+)(?::([^'"\\s]+))?['"]`,
  "g",
);

/**
 * Parse build.gradle / build.gradle.kts content. String-notation dependencies only.
 */
export function parseGradleBuild(content: string): { javaVersion: string; dependencies: JavaDependency[] } {
  const deps: JavaDependency[] = [];
  for (const match of content.matchAll(GRADLE_DEPENDENCY)) {
    const [, groupId, artifactId, version] = match;
    if (!groupId || !artifactId) continue;
    deps.push({ groupId, artifactId, ...(version ? { version } : {}) });
  }

  return { javaVersion: gradleJavaVersion(content), dependencies: dedupe(deps) };
}

function gradleJavaVersion(content: string): string {
  const sourceCompat = content.match(/sourceCompatibility\s*=\s*['"]?(\d+(?:\.\d+)?)/);
  if (sourceCompat?.[1]) return sourceCompat[1];

  const javaVersion = content.match(/JavaVersion\.VERSION_(\d+(?:_\d+)?)/);
  if (javaVersion?.[1]) return javaVersion[1].replace("_", ".");

  const toolchain = content.match(/languageVersion\s*(?:=|\.set\()\s*JavaLanguageVersion\.of\((\d+)\)/);
  if (toolchain?.[1]) return toolchain[1];

  return UNKNOWN_VERSION;
}

/** Keep the first declaration of each group:artifact. */
function dedupe(deps: JavaDependency[]): JavaDependency[] {
  const seen = new Set<string>();
  return deps.filter((dep) => {
    const name = dependencyName(dep);
    if (seen.has(name)) return false;
    seen.add(name);
    return true;
  });
}
