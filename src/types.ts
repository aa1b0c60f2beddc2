import type { GenerationError } from "./errors";

/** Combined input digest in "sha256:<hex>" format. */
export type Fingerprint = string;

/** The host family a command line is built for. */
export type HostPlatform = "posix" | "windows";

/**
 * A program and its argument list, run without a shell.
 * `env` holds the only variables added on top of the parent environment.
 */
export interface CommandLine {
  program: string;
  args: string[];
  env?: Record<string, string>;
}

/** One external command of a generation job. */
export interface GenerationStep {
  /** Short description used in logs and failure messages. */
  label: string;
  command: CommandLine;
  /** Absolute working directory. */
  cwd: string;
}

/**
 * One unit of "check staleness, then regenerate".
 * The cache directory doubles as the cache key.
 */
export interface GenerationJob {
  name: string;
  cacheDir: string;
  /** Tracked input paths; enumeration order is irrelevant. */
  inputs: string[];
  /** Run in declared order, stopping at the first failure. */
  steps: GenerationStep[];
  /** Paths the job promises to produce. Trusted, never verified. */
  outputs: string[];
  /** Stale deliverables removed before the steps run. */
  clean: string[];
}

/**
 * The generation.lock file shape.
 * Records the last committed state of a single job.
 */
export interface CacheRecord {
  /** Record format version for future compatibility. */
  version: 1;
  key: string;
  fingerprint: Fingerprint;
  /** ISO 8601 timestamp of the committing run. */
  last_run: string;
  /** Map of input paths to their content hashes. */
  files: Record<string, string>;
  outputs: string[];
}

/** Per-file comparison between the current inputs and a committed record. */
export interface RecordDiff {
  changed_files: string[];
  removed_files: string[];
}

export type JobResult =
  | { job: string; status: "fresh"; outputs: string[] }
  | {
      job: string;
      status: "generated";
      outputs: string[];
      fingerprint: Fingerprint;
    }
  | { job: string; status: "failed"; error: GenerationError };

export interface RunSummary {
  results: JobResult[];
  ok: boolean;
}
