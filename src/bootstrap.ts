import { mkdir, readdir, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { CommandBuilder } from "./command";
import type { ToolLauncher } from "./command";
import type { BootstrapConfig, RepositoryConfig } from "./config";
import { ConfigurationError } from "./errors";
import { collectFiles } from "./hash";
import type { StagingLayout } from "./staging";
import type { GenerationJob, HostPlatform } from "./types";

export interface BootstrapOptions {
  launcher: ToolLauncher;
  layout: StagingLayout;
  host: HostPlatform;
}

/**
 * Result of the discovery step, handed to every later step instead of
 * being stashed in shared state.
 */
export interface BootstrapContext {
  cloneJob?: GenerationJob;
  /** Checkouts the integration tests read from. */
  cloneDirs: string[];
  projectJobs: GenerationJob[];
}

export async function prepareCloneJob(
  repo: RepositoryConfig,
  layout: StagingLayout
): Promise<GenerationJob> {
  const dir = layout.cloneDir(repo.name, repo.ref);
  const descriptor = layout.descriptorFile(repo.name);

  // The pinned revision is tracked through this file.
  await mkdir(dirname(descriptor), { recursive: true });
  await writeFile(
    descriptor,
    `${JSON.stringify({ url: repo.url, ref: repo.ref }, null, 2)}\n`
  );
  await mkdir(layout.stagingRoot, { recursive: true });

  return {
    name: `clone ${repo.name}`,
    cacheDir: layout.cloneCacheDir(repo.name),
    inputs: [descriptor],
    steps: [
      {
        label: `clone ${repo.url}`,
        command: {
          program: "git",
          args: ["clone", "--no-checkout", repo.url, dir],
        },
        cwd: layout.stagingRoot,
      },
      {
        label: `checkout ${repo.ref}`,
        command: { program: "git", args: ["checkout", "--detach", repo.ref] },
        cwd: dir,
      },
    ],
    outputs: [dir],
    clean: [dir],
  };
}

async function listProjectDirs(root: string): Promise<string[]> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => join(root, entry.name))
      .sort();
  } catch (error) {
    throw new ConfigurationError(`cannot list projects in ${root}`, {
      cause: error,
    });
  }
}

/**
 * One job per project directory. Each tracks its own build files plus the
 * shared plugin sources and keeps its own cache, so projects never
 * invalidate each other.
 */
export async function discoverProjectJobs(
  bootstrap: BootstrapConfig,
  options: BootstrapOptions
): Promise<GenerationJob[]> {
  const { launcher, layout, host } = options;
  const root = resolve(layout.baseDir, bootstrap.projectsDir);

  const pluginFiles = bootstrap.pluginSources
    ? await collectFiles(
        resolve(layout.baseDir, bootstrap.pluginSources),
        bootstrap.pluginExtensions
      )
    : [];

  const jobs: GenerationJob[] = [];
  for (const projectDir of await listProjectDirs(root)) {
    const projectFiles = await collectFiles(projectDir, bootstrap.extensions, [
      "**/target/**",
    ]);
    jobs.push({
      name: `project ${basename(projectDir)}`,
      cacheDir: layout.projectCacheDir(projectDir),
      inputs: [...projectFiles, ...pluginFiles],
      steps: [
        {
          label: `generate ${basename(projectDir)}`,
          command: new CommandBuilder(launcher, host)
            .tasks(...bootstrap.tasks)
            .build(),
          cwd: projectDir,
        },
      ],
      outputs: [],
      clean: [],
    });
  }
  return jobs;
}

export async function prepareBootstrap(
  bootstrap: BootstrapConfig,
  options: BootstrapOptions
): Promise<BootstrapContext> {
  const cloneJob = bootstrap.repository
    ? await prepareCloneJob(bootstrap.repository, options.layout)
    : undefined;

  return {
    cloneJob,
    cloneDirs: cloneJob ? cloneJob.outputs : [],
    projectJobs: await discoverProjectJobs(bootstrap, options),
  };
}

/** Record where the checkouts live for the test suites that need them. */
export async function writeIntegrationDirs(
  context: BootstrapContext,
  layout: StagingLayout
): Promise<string> {
  const path = join(layout.stagingRoot, "integration-dirs.json");
  await mkdir(layout.stagingRoot, { recursive: true });
  await writeFile(
    path,
    `${JSON.stringify({ integrationDirs: context.cloneDirs }, null, 2)}\n`
  );
  return path;
}
