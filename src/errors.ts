// src/errors.ts — Fatal errors that carry a process exit code

export class ToolkitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ToolkitError";
    this.exitCode = exitCode;
  }
}

/** The diagram renderer is missing and could not be installed. */
export class RendererUnavailableError extends ToolkitError {
  constructor(message: string) {
    super(message);
    this.name = "RendererUnavailableError";
  }
}

export class DirectoryNotFoundError extends ToolkitError {
  readonly dir: string;

  constructor(dir: string) {
    super(`ERROR: Directory not found: ${dir}`);
    this.name = "DirectoryNotFoundError";
    this.dir = dir;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
