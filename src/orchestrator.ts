import { rm } from "node:fs/promises";
import { commitRecord, diffRecord, isStale, readRecord } from "./cache";
import type { RecordLookup } from "./cache";
import { formatCommand } from "./command";
import {
  CleanError,
  CommandFailure,
  CommitError,
  GenerationError,
  HashingError,
  InvocationError,
  UnexpectedError,
} from "./errors";
import { fingerprint } from "./hash";
import type { Logger } from "./log";
import { runStep } from "./runner";
import type { Invoker } from "./runner";
import type {
  Fingerprint,
  GenerationJob,
  JobResult,
  RecordDiff,
  RunSummary,
} from "./types";

export interface OrchestratorDeps {
  invoker: Invoker;
  logger: Logger;
  /** Regenerate even when the committed fingerprint matches. */
  force?: boolean;
  now?: () => Date;
}

export interface JobPlan {
  fingerprint: Fingerprint;
  files: Record<string, string>;
  lookup: RecordLookup;
  diff: RecordDiff;
  stale: boolean;
}

/**
 * Decide whether a job is stale without running anything.
 * Throws {@link HashingError} when a tracked input cannot be read.
 */
export async function planJob(job: GenerationJob): Promise<JobPlan> {
  const current = await fingerprint(job.inputs);
  const lookup = await readRecord(job.cacheDir);
  const record = lookup.kind === "found" ? lookup.record : undefined;

  return {
    fingerprint: current.fingerprint,
    files: current.files,
    lookup,
    diff: diffRecord(current.files, record),
    stale: isStale(record?.fingerprint ?? null, current.fingerprint),
  };
}

function logChanges(job: GenerationJob, plan: JobPlan, logger: Logger): void {
  const changed = plan.diff.changed_files;
  const removed = plan.diff.removed_files;

  if (plan.lookup.kind === "missing") {
    logger.info(`${job.name} — first run`);
  } else if (changed.length + removed.length > 0) {
    const list = changed.slice(0, 3).join(", ");
    const more = changed.length > 3 ? `, +${changed.length - 3} more` : "";
    const gone = removed.length > 0 ? `, ${removed.length} removed` : "";
    logger.info(
      `${job.name} — ${changed.length} files changed (${list}${more})${gone}`
    );
  } else if (!plan.stale) {
    logger.info(`${job.name} — forced run`);
  }
}

function failed(
  job: GenerationJob,
  error: GenerationError,
  logger: Logger
): JobResult {
  logger.error(`${job.name} — ${error.message}`);
  return { job: job.name, status: "failed", error };
}

/**
 * Regenerate a job if its inputs changed since the last committed run.
 *
 * Steps run one at a time in declared order and the first failure aborts
 * the rest. The record is only committed after every step succeeded, so a
 * failed run is retried in full next time.
 */
export async function runIfStale(
  job: GenerationJob,
  deps: OrchestratorDeps
): Promise<JobResult> {
  const { invoker, logger, force = false } = deps;
  const now = deps.now ?? (() => new Date());

  let plan: JobPlan;
  try {
    plan = await planJob(job);
  } catch (error) {
    if (error instanceof HashingError) {
      return failed(job, error, logger);
    }
    throw error;
  }

  if (plan.lookup.kind === "unreadable") {
    logger.error(`${job.name} — ${plan.lookup.error.message}, regenerating`);
  }

  if (!(plan.stale || force)) {
    logger.info(`${job.name} — no changes`);
    return { job: job.name, status: "fresh", outputs: job.outputs };
  }

  logChanges(job, plan, logger);

  for (const path of job.clean) {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      return failed(job, new CleanError(path, error), logger);
    }
  }

  const start = performance.now();
  for (const step of job.steps) {
    logger.info(`${job.name} — running: ${formatCommand(step.command)}`);
    try {
      await runStep(invoker, step);
    } catch (error) {
      const reason =
        error instanceof CommandFailure
          ? error
          : new InvocationError(step.label, step.cwd, error);
      return failed(job, reason, logger);
    }
  }
  const elapsed = ((performance.now() - start) / 1000).toFixed(1);

  try {
    await commitRecord(job.cacheDir, {
      version: 1,
      key: job.cacheDir,
      fingerprint: plan.fingerprint,
      last_run: now().toISOString(),
      files: plan.files,
      outputs: job.outputs,
    });
  } catch (error) {
    if (error instanceof CommitError) {
      return failed(job, error, logger);
    }
    throw error;
  }

  logger.success(`${job.name} — done (${elapsed}s)`);
  return {
    job: job.name,
    status: "generated",
    outputs: job.outputs,
    fingerprint: plan.fingerprint,
  };
}

/**
 * Run independent jobs strictly in declaration order.
 * A failing job never stops its siblings, whatever it throws.
 */
export async function runJobs(
  jobs: readonly GenerationJob[],
  deps: OrchestratorDeps
): Promise<RunSummary> {
  const results: JobResult[] = [];
  for (const job of jobs) {
    try {
      results.push(await runIfStale(job, deps));
    } catch (error) {
      const reason =
        error instanceof GenerationError ? error : new UnexpectedError(error);
      results.push(failed(job, reason, deps.logger));
    }
  }
  return {
    results,
    ok: results.every((result) => result.status !== "failed"),
  };
}
