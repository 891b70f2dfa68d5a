import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runRender } from "../src/bin/render.js";
import { DirectoryNotFoundError, RendererUnavailableError } from "../src/errors.js";
import type { Warning } from "../src/types.js";
import { BufferOutput, FakeRunner } from "./helpers/fake-runner.js";

let dir: string;

function addDiagrams(...names: string[]): void {
  for (const name of names) {
    writeFileSync(join(dir, name), "graph TD\n  a --> b\n");
  }
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "render-test-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ─── Batch rendering ─────────────────────────────────────────────────────────

describe("runRender", () => {
  it("renders every diagram and reports the tally", () => {
    addDiagrams("b.mmd", "a.mmd", "c.mmd");
    const runner = new FakeRunner();
    const out = new BufferOutput();

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out });

    expect(summary?.succeeded).toBe(3);
    expect(summary?.failed).toBe(0);
    expect(runner.rendererCalls()).toHaveLength(3);
    expect(readdirSync(dir).filter((f) => f.endsWith(".png")).sort()).toEqual(["a.png", "b.png", "c.png"]);
    expect(out.text).toBe(
      [
        `Rendering 3 diagrams from ${dir}`,
        "Settings: 3200x2400 scale=2 bg=white",
        "---",
        "  a.mmd → .png ... OK (2.0K)",
        "  b.mmd → .png ... OK (2.0K)",
        "  c.mmd → .png ... OK (2.0K)",
        "---",
        "Done: 3 succeeded, 0 failed",
        "",
      ].join("\n"),
    );
  });

  it("keeps going after a failed file and counts it", () => {
    addDiagrams("a.mmd", "b.mmd", "c.mmd");
    const runner = new FakeRunner();
    runner.failOn.add("b.mmd");
    const out = new BufferOutput();

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out });

    expect(runner.rendererCalls()).toHaveLength(3);
    expect(summary?.succeeded).toBe(2);
    expect(summary?.failed).toBe(1);
    expect(existsSync(join(dir, "b.png"))).toBe(false);
    expect(out.text).toContain("  b.mmd → .png ... FAILED\n");
    expect(out.text.endsWith("Done: 2 succeeded, 1 failed\n")).toBe(true);
  });

  it("treats a zero exit without an output file as a failure", () => {
    addDiagrams("a.mmd");
    const runner = new FakeRunner();
    runner.silentOn.add("a.mmd");

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() });

    expect(summary?.results[0].status).toBe("failed");
    expect(summary?.failed).toBe(1);
  });

  it("throws for a missing directory without invoking anything", () => {
    const runner = new FakeRunner();
    const missing = join(dir, "nope");

    expect(() => runRender({ dir: missing, env: {}, cwd: dir, runner, out: new BufferOutput() }))
      .toThrow(DirectoryNotFoundError);
    expect(runner.calls).toHaveLength(0);
  });

  it("returns null when there is nothing to render", () => {
    writeFileSync(join(dir, "notes.txt"), "not a diagram");
    const runner = new FakeRunner();
    const out = new BufferOutput();

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out });

    expect(summary).toBeNull();
    expect(out.text).toBe(`No .mmd files found in ${dir}\n`);
    expect(runner.calls).toHaveLength(0);
  });

  it("names the directory as given in its messages", () => {
    mkdirSync(join(dir, "diagrams"));
    writeFileSync(join(dir, "diagrams", "flow.mmd"), "graph TD\n  a --> b\n");
    mkdirSync(join(dir, "empty"));
    const runner = new FakeRunner();

    const out = new BufferOutput();
    runRender({ dir: "diagrams", env: {}, cwd: dir, runner, out });
    expect(out.text.split("\n")[0]).toBe("Rendering 1 diagrams from diagrams");
    expect(runner.rendererCalls()[0].args[1]).toBe(join(dir, "diagrams", "flow.mmd"));

    const emptyOut = new BufferOutput();
    runRender({ dir: "empty", env: {}, cwd: dir, runner, out: emptyOut });
    expect(emptyOut.text).toBe("No .mmd files found in empty\n");

    expect(() => runRender({ dir: "nope", env: {}, cwd: dir, runner, out: new BufferOutput() }))
      .toThrow(new DirectoryNotFoundError("nope"));
  });

  it("passes a non-numeric width through to mmdc unchanged", () => {
    addDiagrams("a.mmd");
    const runner = new FakeRunner();
    const warnings: Warning[] = [];
    const out = new BufferOutput();

    runRender({ dir, env: { RENDER_WIDTH: "100px" }, cwd: dir, runner, out, warnings });

    const args = runner.rendererCalls()[0].args;
    expect(args[args.indexOf("--width") + 1]).toBe("100px");
    expect(out.text).toContain("Settings: 100pxx2400 scale=2 bg=white\n");
    expect(warnings.map((w) => w.message)).toEqual([
      'RENDER_WIDTH="100px" is not a positive number; passing it to mmdc as given',
    ]);
  });

  it("passes environment overrides verbatim to every invocation", () => {
    addDiagrams("a.mmd", "b.mmd");
    const runner = new FakeRunner();
    const env = { RENDER_WIDTH: "800", RENDER_HEIGHT: "600", RENDER_SCALE: "1.50", RENDER_BG: "transparent" };

    runRender({ dir, env, cwd: dir, runner, out: new BufferOutput() });

    const calls = runner.rendererCalls();
    expect(calls).toHaveLength(2);
    for (const call of calls) {
      const input = call.args[1];
      expect(call.args).toEqual([
        "-i", input,
        "-o", input.replace(/\.mmd$/, ".png"),
        "--width", "800",
        "--height", "600",
        "--backgroundColor", "transparent",
        "--scale", "1.50",
      ]);
      expect(call.options).toEqual({ quiet: true });
    }
  });

  it("regenerates the same outputs when run again", () => {
    addDiagrams("a.mmd", "b.mmd");
    const runner = new FakeRunner();

    runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() });
    const afterFirst = readdirSync(dir).sort();
    const second = runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() });

    expect(readdirSync(dir).sort()).toEqual(afterFirst);
    expect(afterFirst).toEqual(["a.mmd", "a.png", "b.mmd", "b.png"]);
    expect(second?.succeeded).toBe(2);
  });

  it("ignores .png files and subdirectories", () => {
    addDiagrams("a.mmd");
    writeFileSync(join(dir, "old.png"), "");
    mkdirSync(join(dir, "nested.mmd"));

    const runner = new FakeRunner();
    const summary = runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() });

    expect(summary?.results.map((r) => r.input)).toEqual([join(dir, "a.mmd")]);
  });

  it("skips files matching an exclude pattern", () => {
    addDiagrams("a.mmd", "draft-b.mmd");
    const runner = new FakeRunner();

    const summary = runRender({ dir, exclude: ["draft-*"], env: {}, cwd: dir, runner, out: new BufferOutput() });

    expect(summary?.results.map((r) => r.input)).toEqual([join(dir, "a.mmd")]);
  });
});

// ─── Renderer installation ───────────────────────────────────────────────────

describe("runRender renderer installation", () => {
  it("installs the Mermaid CLI through npm when mmdc is missing", () => {
    addDiagrams("a.mmd");
    const runner = new FakeRunner(["npm"]);
    const out = new BufferOutput();

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out });

    expect(runner.calls[0]).toEqual({
      command: "npm",
      args: ["install", "-g", "@mermaid-js/mermaid-cli"],
      options: undefined,
    });
    expect(out.text.startsWith("mmdc not found. Installing @mermaid-js/mermaid-cli...\n")).toBe(true);
    expect(summary?.succeeded).toBe(1);
  });

  it("fails when neither mmdc nor npm is available", () => {
    addDiagrams("a.mmd");
    const runner = new FakeRunner([]);

    expect(() => runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() }))
      .toThrow(RendererUnavailableError);
    expect(runner.calls).toHaveLength(0);
  });

  it("fails on an empty directory when mmdc cannot be installed", () => {
    const runner = new FakeRunner([]);
    const out = new BufferOutput();

    expect(() => runRender({ dir, env: {}, cwd: dir, runner, out })).toThrow(RendererUnavailableError);
    expect(out.text).toBe("mmdc not found. Installing @mermaid-js/mermaid-cli...\n");
  });

  it("installs mmdc before looking for diagrams", () => {
    const runner = new FakeRunner(["npm"]);
    const out = new BufferOutput();

    const summary = runRender({ dir, env: {}, cwd: dir, runner, out });

    expect(summary).toBeNull();
    expect(runner.calls.map((c) => c.command)).toEqual(["npm"]);
    expect(out.text).toBe(
      "mmdc not found. Installing @mermaid-js/mermaid-cli...\n" +
      `No .mmd files found in ${dir}\n`,
    );
  });

  it("fails when the npm install exits non-zero", () => {
    addDiagrams("a.mmd");
    const runner = new FakeRunner(["npm"]);
    runner.installStatus = 1;

    expect(() => runRender({ dir, env: {}, cwd: dir, runner, out: new BufferOutput() }))
      .toThrow("ERROR: npm install -g @mermaid-js/mermaid-cli failed with exit code 1");
    expect(runner.rendererCalls()).toHaveLength(0);
  });
});
