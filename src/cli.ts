import { access, writeFile } from "node:fs/promises";
import { basename, dirname, resolve } from "node:path";
import { parseArgs } from "node:util";
import { prepareBootstrap, writeIntegrationDirs } from "./bootstrap";
import type { BootstrapContext } from "./bootstrap";
import { detectHost, formatCommand } from "./command";
import { discoverConfig, loadConfig } from "./config";
import type { BuildgenConfig } from "./config";
import { describe, GenerationError, HashingError } from "./errors";
import { prepareIntegrationsJob } from "./integrations";
import type { Logger } from "./log";
import { planJob, runJobs } from "./orchestrator";
import type { JobPlan } from "./orchestrator";
import type { Invoker } from "./runner";
import { resolveStaging, stagingSettingsFromEnv } from "./staging";
import type { StagingLayout } from "./staging";
import type { GenerationJob, HostPlatform } from "./types";

export const VERSION = "0.1.0";

const GROUPS = ["bootstrap", "integrations"] as const;
type Group = (typeof GROUPS)[number];

export const HELP = `buildgen ${VERSION}

Usage:
  buildgen                   Regenerate every stale job
  buildgen <group>           Only bootstrap or integrations
  buildgen --force [group]   Regenerate regardless of cache state
  buildgen --dry-run [group] Show what would run
  buildgen --status          Show per-job cache status
  buildgen --init            Write starter buildgen.jsonc
  buildgen --config <path>   Use specific config file
  buildgen --help            Print this help
  buildgen --version         Print version
`;

const STARTER_CONFIG = `{
  // Bump to regenerate every integration build
  "schemaVersion": "1.0",
  "tool": { "posix": "sbt", "windows": "sbt.bat" },
  "integrations": {
    "base": "build-integrations",
    "variants": ["sbt-1.0"],
    "inputs": ["*/build.sbt", "*/project/*.scala"],
    "tasks": ["bloopInstall", "buildIndex"]
  }
}
`;

export interface CliDeps {
  cwd: string;
  env: Record<string, string | undefined>;
  invoker: Invoker;
  logger: Logger;
  /** Raw output for --help and --version. */
  print: (text: string) => void;
  isWindows?: () => boolean;
}

interface Args {
  help: boolean;
  version: boolean;
  force: boolean;
  dryRun: boolean;
  status: boolean;
  init: boolean;
  configPath?: string;
  group?: string;
}

function parseCliArgs(argv: string[]): Args {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
      force: { type: "boolean", short: "f", default: false },
      "dry-run": { type: "boolean", short: "n", default: false },
      status: { type: "boolean", short: "s", default: false },
      init: { type: "boolean", default: false },
      config: { type: "string", short: "c" },
    },
    allowPositionals: true,
    strict: true,
  });

  return {
    help: values.help ?? false,
    version: values.version ?? false,
    force: values.force ?? false,
    dryRun: values["dry-run"] ?? false,
    status: values.status ?? false,
    init: values.init ?? false,
    configPath: values.config,
    group: positionals[0],
  };
}

function isGroup(value: string): value is Group {
  return (GROUPS as readonly string[]).includes(value);
}

async function handleInit(deps: CliDeps): Promise<number> {
  const configPath = resolve(deps.cwd, "buildgen.jsonc");
  try {
    await access(configPath);
    deps.logger.error("buildgen.jsonc already exists");
    return 1;
  } catch {
    // File doesn't exist, proceed
  }
  await writeFile(configPath, STARTER_CONFIG);
  deps.logger.info("created buildgen.jsonc");
  return 0;
}

interface PreparedRun {
  jobs: GenerationJob[];
  bootstrap?: BootstrapContext;
}

async function prepareJobs(
  config: BuildgenConfig,
  groups: Group[],
  layout: StagingLayout,
  host: HostPlatform
): Promise<PreparedRun> {
  const prepared: PreparedRun = { jobs: [] };
  const launcher = config.tool;

  for (const group of groups) {
    if (group === "bootstrap" && config.bootstrap) {
      const context = await prepareBootstrap(config.bootstrap, {
        launcher,
        layout,
        host,
      });
      prepared.bootstrap = context;
      if (context.cloneJob) {
        prepared.jobs.push(context.cloneJob);
      }
      prepared.jobs.push(...context.projectJobs);
    }
    if (group === "integrations" && config.integrations) {
      prepared.jobs.push(
        await prepareIntegrationsJob(config.integrations, {
          schemaVersion: config.schemaVersion,
          launcher,
          layout,
          host,
        })
      );
    }
  }

  return prepared;
}

async function reportJobs(
  jobs: GenerationJob[],
  args: Args,
  logger: Logger
): Promise<boolean> {
  let anyFailed = false;

  for (const job of jobs) {
    let plan: JobPlan;
    try {
      plan = await planJob(job);
    } catch (error) {
      if (!(error instanceof HashingError)) {
        throw error;
      }
      logger.error(`${job.name} — ${error.message}`);
      anyFailed = true;
      continue;
    }

    if (args.status) {
      if (plan.stale) {
        const count =
          plan.diff.changed_files.length + plan.diff.removed_files.length;
        logger.info(`${job.name} — changed (${count} files)`);
      } else {
        logger.info(`${job.name} — up to date`);
      }
      continue;
    }

    if (plan.stale || args.force) {
      for (const step of job.steps) {
        logger.info(`${job.name} — would run: ${formatCommand(step.command)}`);
      }
    } else {
      logger.info(`${job.name} — no changes, would skip`);
    }
  }

  return anyFailed;
}

/**
 * Entry point shared by the binary and the tests.
 * @returns process exit code
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { logger } = deps;

  let args: Args;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    logger.error(describe(error));
    return 1;
  }

  if (args.help) {
    deps.print(HELP);
    return 0;
  }
  if (args.version) {
    deps.print(VERSION);
    return 0;
  }
  if (args.init) {
    return handleInit(deps);
  }

  const configPath = args.configPath
    ? resolve(deps.cwd, args.configPath)
    : await discoverConfig(deps.cwd);
  if (!configPath) {
    logger.error(
      "no config file found (buildgen.jsonc, buildgen.json, buildgen.toml)"
    );
    return 2;
  }

  let config: BuildgenConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    logger.error(describe(error).replace(/^buildgen: /, ""));
    return 1;
  }

  const declared = GROUPS.filter((group) => config[group] !== undefined);
  const selected = args.group;
  if (
    selected !== undefined &&
    !(isGroup(selected) && declared.includes(selected))
  ) {
    logger.error(`unknown group: ${selected}`);
    return 1;
  }
  const groups: Group[] =
    selected !== undefined && isGroup(selected) ? [selected] : declared;

  try {
    const layout = resolveStaging(
      stagingSettingsFromEnv(dirname(configPath), config.schemaVersion, deps.env)
    );
    const prepared = await prepareJobs(
      config,
      groups,
      layout,
      detectHost(deps.isWindows)
    );
    logger.info(
      `loaded ${basename(configPath)} (${prepared.jobs.length} jobs)`
    );

    if (args.status || args.dryRun) {
      return (await reportJobs(prepared.jobs, args, logger)) ? 1 : 0;
    }

    const summary = await runJobs(prepared.jobs, {
      invoker: deps.invoker,
      logger,
      force: args.force,
    });

    const clone = prepared.bootstrap?.cloneJob;
    const cloneFailed = summary.results.some(
      (result) => result.job === clone?.name && result.status === "failed"
    );
    if (prepared.bootstrap && clone && !cloneFailed) {
      await writeIntegrationDirs(prepared.bootstrap, layout);
    }

    return summary.ok ? 0 : 1;
  } catch (error) {
    if (error instanceof GenerationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}
