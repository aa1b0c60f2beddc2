import type { CommandLine } from "./types";

export type GenerationErrorKind =
  | "configuration"
  | "hashing"
  | "cache-read"
  | "command"
  | "invocation"
  | "clean"
  | "commit"
  | "unexpected";

/**
 * Base class for every failure a generation run can report.
 * Jobs hand these back inside their result instead of crashing the run.
 */
export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required location could not be resolved. Nothing runs after this. */
export class ConfigurationError extends GenerationError {
  readonly kind = "configuration";
}

export class HashingError extends GenerationError {
  readonly kind = "hashing";

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`cannot read tracked input ${path}: ${describe(cause)}`, { cause });
  }
}

/** The persisted record exists but cannot be used; treated as a cache miss. */
export class CacheReadError extends GenerationError {
  readonly kind = "cache-read";

  constructor(
    readonly recordPath: string,
    reason: string
  ) {
    super(`unreadable cache record ${recordPath}: ${reason}`);
  }
}

export class CommandFailure extends GenerationError {
  readonly kind = "command";

  constructor(
    readonly label: string,
    readonly command: CommandLine,
    readonly cwd: string,
    readonly exitCode: number
  ) {
    super(`${label} failed (exit ${exitCode}) in ${cwd}`);
  }
}

/** The invoker itself failed, so no exit status is known. */
export class InvocationError extends GenerationError {
  readonly kind = "invocation";

  constructor(
    readonly label: string,
    readonly cwd: string,
    cause: unknown
  ) {
    super(`${label} could not be run in ${cwd}: ${describe(cause)}`, { cause });
  }
}

export class CleanError extends GenerationError {
  readonly kind = "clean";

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`cannot remove stale output ${path}: ${describe(cause)}`, { cause });
  }
}

export class CommitError extends GenerationError {
  readonly kind = "commit";

  constructor(
    readonly recordPath: string,
    cause: unknown
  ) {
    super(`cannot write cache record ${recordPath}: ${describe(cause)}`, {
      cause,
    });
  }
}

/** Anything a job raised that is not one of the failures above. */
export class UnexpectedError extends GenerationError {
  readonly kind = "unexpected";

  constructor(cause: unknown) {
    super(`unexpected failure: ${describe(cause)}`, { cause });
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
