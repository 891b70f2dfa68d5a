import { describe, it, expect } from "vitest";
import pc from "picocolors";
import { formatJavaReport } from "../src/java-report.js";
import type { JavaUpgradeReport } from "../src/types.js";

const plain = pc.createColors(false);
const RULE = "-".repeat(70);

function makeReport(overrides: Partial<JavaUpgradeReport> = {}): JavaUpgradeReport {
  return {
    projectDir: "/work/demo",
    buildType: "Maven",
    currentVersion: "11",
    targetVersion: "17",
    totalDependencies: 2,
    dependencies: [],
    compatibilityIssues: [],
    missingModules: [],
    recommendations: [],
    ...overrides,
  };
}

describe("formatJavaReport", () => {
  it("renders every section", () => {
    const text = formatJavaReport(
      makeReport({
        compatibilityIssues: [
          {
            dependency: "org.springframework:spring-core:5.2.0",
            currentVersion: "5.2.0",
            minVersion: "5.3.0",
            severity: "high",
          },
        ],
        missingModules: ["javax.xml.bind:jaxb-api"],
        recommendations: [
          {
            dependency: "jakarta.persistence:jakarta.persistence-api",
            currentVersion: "unknown",
            recommendedVersion: "3.0.0",
            reason: "Better Java 17 support",
          },
        ],
      }),
      plain,
    );

    expect(text).toBe(
      [
        "",
        "Java Dependency Analysis Report",
        "=".repeat(70),
        "",
        "Project Directory: /work/demo",
        "Build Type: Maven",
        "Current Java Version: 11",
        "Target Java Version: 17",
        "",
        "Found 2 dependencies",
        "",
        "⚠ Compatibility Issues (1)",
        RULE,
        "✗ org.springframework:spring-core:5.2.0",
        "  Current: 5.2.0 | Required: 5.3.0 or higher",
        "",
        "⚠ Missing Dependencies for Removed JDK Modules (1)",
        RULE,
        "Java 17 removed these modules from the JDK.",
        "Add explicit dependencies if your code uses them:",
        "",
        "! javax.xml.bind:jaxb-api",
        "",
        "💡 Recommendations (1)",
        RULE,
        "→ jakarta.persistence:jakarta.persistence-api",
        "  Current: unknown | Recommended: 3.0.0",
        "  Reason: Better Java 17 support",
        "",
        "Summary",
        RULE,
        "Critical Issues: 1",
        "Missing JDK Module Dependencies: 1",
        "Upgrade Recommendations: 1",
        "",
      ].join("\n"),
    );
  });

  it("omits empty sections and confirms a clean result", () => {
    const lines = formatJavaReport(makeReport(), plain).split("\n");
    expect(lines).toContain("✓ No compatibility issues found");
    expect(lines).not.toContain("Java 17 removed these modules from the JDK.");
    expect(lines.slice(-5)).toEqual([
      RULE,
      "Critical Issues: 0",
      "Missing JDK Module Dependencies: 0",
      "Upgrade Recommendations: 0",
      "",
    ]);
  });
});
