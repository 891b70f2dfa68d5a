// src/command-runner.ts — Thin seam over node:child_process
// Everything that shells out goes through a CommandRunner so tests can swap in a fake.

import { execFileSync, execSync, type StdioOptions } from "node:child_process";

export interface RunOptions {
  /** Discard the command's stderr; stdout still passes through. */
  quiet?: boolean;
  cwd?: string;
}

export interface CommandRunner {
  /** True when `command` resolves on PATH. */
  exists(command: string): boolean;
  /** Run to completion and return the exit status (127 when it could not start). */
  run(command: string, args: string[], options?: RunOptions): number;
}

const COMMAND_NAME = /^[A-Za-z0-9._-]+$/;

export function createCommandRunner(): CommandRunner {
  return {
    exists(command: string): boolean {
      // Only bare names reach the shell
      if (!COMMAND_NAME.test(command)) return false;
      try {
        execSync(`command -v ${command}`, {
          encoding: "utf-8",
          timeout: 5000,
          stdio: ["ignore", "pipe", "ignore"],
        });
        return true;
      } catch {
        return false;
      }
    },

    run(command: string, args: string[], options: RunOptions = {}): number {
      try {
        execFileSync(command, args, {
          cwd: options.cwd,
          stdio: stdioFor(options),
        });
        return 0;
      } catch (err: unknown) {
        return exitStatusOf(err);
      }
    },
  };
}

export function stdioFor(options: RunOptions): StdioOptions {
  return options.quiet ? ["ignore", "inherit", "ignore"] : "inherit";
}

function exitStatusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 127;
}
