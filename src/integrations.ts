import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { CommandBuilder, formatCommand } from "./command";
import type { ToolLauncher } from "./command";
import type { IntegrationsConfig, SetupCommand } from "./config";
import { resolveInputs } from "./hash";
import type { StagingLayout } from "./staging";
import type {
  CommandLine,
  GenerationJob,
  GenerationStep,
  HostPlatform,
} from "./types";

export interface IntegrationsOptions {
  schemaVersion: string;
  launcher: ToolLauncher;
  layout: StagingLayout;
  host: HostPlatform;
}

function setupStep(setup: SetupCommand, base: string): GenerationStep {
  const [program, ...args] = setup.command;
  const command: CommandLine = setup.env
    ? { program, args, env: setup.env }
    : { program, args };
  return {
    label: `setup ${formatCommand(command)}`,
    command,
    cwd: resolve(base, setup.cwd ?? "."),
  };
}

/**
 * Build the job that regenerates configuration for every integration
 * variant and the aggregate index.
 *
 * The schema version is written to a tracked file first, so bumping it
 * invalidates the cache like any other input change.
 */
export async function prepareIntegrationsJob(
  integrations: IntegrationsConfig,
  options: IntegrationsOptions
): Promise<GenerationJob> {
  const { schemaVersion, launcher, layout, host } = options;
  const base = resolve(layout.baseDir, integrations.base);

  await mkdir(dirname(layout.schemaVersionFile), { recursive: true });
  await writeFile(layout.schemaVersionFile, `${JSON.stringify(schemaVersion)}\n`);

  const inputs = [
    layout.schemaVersionFile,
    ...(await resolveInputs(base, integrations.inputs)),
  ];

  const globalPlugins = resolve(base, integrations.globalDir);
  const properties: Record<string, string> = {
    "sbt.global.staging": layout.stagingRoot,
    "integrations.index": layout.indexFile,
    "sbt.global.plugins": globalPlugins,
    "sbt.global.settings": join(globalPlugins, "settings"),
    "integrations.schemaVersion": schemaVersion,
    ...integrations.properties,
  };

  // Setup commands marked posixOnly have no Windows counterpart.
  const setup = integrations.setup
    .filter((s) => !(s.posixOnly && host === "windows"))
    .map((s) => setupStep(s, base));

  const variants = integrations.variants.map((variant) => ({
    label: `generate ${variant}`,
    command: new CommandBuilder(launcher, host)
      .properties(properties)
      .tasks(...integrations.tasks)
      .build(),
    cwd: resolve(base, variant),
  }));

  return {
    name: "integrations",
    cacheDir: layout.integrationsCacheDir,
    inputs,
    steps: [...setup, ...variants],
    outputs: [layout.indexFile],
    clean: [layout.indexFile],
  };
}
