import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  discoverProjectJobs,
  prepareBootstrap,
  prepareCloneJob,
  writeIntegrationDirs,
} from "../src/bootstrap";
import { DEFAULT_LAUNCHER } from "../src/command";
import type { BootstrapConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";
import { runIfStale, runJobs } from "../src/orchestrator";
import { resolveStaging } from "../src/staging";
import type { StagingLayout } from "../src/staging";
import {
  makeTempDir,
  memoryLogger,
  recordingInvoker,
  removeDir,
  writeText,
} from "./helpers";

let tempDir: string;
let repo: string;
let layout: StagingLayout;

beforeEach(async () => {
  tempDir = await makeTempDir();
  repo = join(tempDir, "repo");
  layout = resolveStaging({
    baseDir: repo,
    globalBase: join(tempDir, "global-base"),
    schemaVersion: "1",
  });
});

afterEach(async () => {
  await removeDir(tempDir);
});

function bootstrap(overrides: Partial<BootstrapConfig> = {}): BootstrapConfig {
  return {
    projectsDir: "resources",
    pluginSources: "plugin/src",
    extensions: [".sbt", ".scala"],
    pluginExtensions: [".scala"],
    tasks: ["bloopInstall"],
    ...overrides,
  };
}

const options = () => ({ launcher: DEFAULT_LAUNCHER, layout, host: "posix" as const });

async function writeProjects(): Promise<void> {
  await writeText(join(repo, "resources/beta/build.sbt"), "beta");
  await writeText(join(repo, "resources/alpha/build.sbt"), "alpha");
  await writeText(join(repo, "resources/alpha/project/Deps.scala"), "deps");
  await writeText(join(repo, "resources/alpha/target/Generated.scala"), "gen");
  await writeText(join(repo, "resources/alpha/README.md"), "docs");
  await writeText(join(repo, "resources/not-a-project.txt"), "");
  await writeText(join(repo, "plugin/src/Plugin.scala"), "plugin");
}

describe("discoverProjectJobs", () => {
  it("creates one job per project directory in sorted order", async () => {
    await writeProjects();

    const jobs = await discoverProjectJobs(bootstrap(), options());

    expect(jobs.map((job) => job.name)).toEqual(["project alpha", "project beta"]);
    expect(jobs[0]).toEqual({
      name: "project alpha",
      cacheDir: join(repo, "resources/alpha/target/generation-cache"),
      inputs: [
        join(repo, "resources/alpha/build.sbt"),
        join(repo, "resources/alpha/project/Deps.scala"),
        join(repo, "plugin/src/Plugin.scala"),
      ],
      steps: [
        {
          label: "generate alpha",
          command: { program: "sbt", args: ["bloopInstall"] },
          cwd: join(repo, "resources/alpha"),
        },
      ],
      outputs: [],
      clean: [],
    });
  });

  it("fails with a configuration error when the projects root is missing", async () => {
    await expect(discoverProjectJobs(bootstrap(), options())).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it("keeps each project's staleness independent", async () => {
    await writeProjects();
    const invoker = recordingInvoker();
    const deps = { invoker, logger: memoryLogger() };

    await runJobs(await discoverProjectJobs(bootstrap(), options()), deps);
    await writeText(join(repo, "resources/beta/build.sbt"), "beta 2");
    const summary = await runJobs(
      await discoverProjectJobs(bootstrap(), options()),
      deps
    );

    expect(summary.results.map((r) => [r.job, r.status])).toEqual([
      ["project alpha", "fresh"],
      ["project beta", "generated"],
    ]);
    expect(invoker.calls.map((call) => call.cwd)).toEqual([
      join(repo, "resources/alpha"),
      join(repo, "resources/beta"),
      join(repo, "resources/beta"),
    ]);
  });

  it("regenerates every project when a shared plugin source changes", async () => {
    await writeProjects();
    const invoker = recordingInvoker();
    const deps = { invoker, logger: memoryLogger() };

    await runJobs(await discoverProjectJobs(bootstrap(), options()), deps);
    await writeText(join(repo, "plugin/src/Plugin.scala"), "plugin 2");
    const summary = await runJobs(
      await discoverProjectJobs(bootstrap(), options()),
      deps
    );

    expect(summary.results.map((r) => r.status)).toEqual(["generated", "generated"]);
  });

  it("continues with other projects after one fails", async () => {
    await writeProjects();
    const invoker = recordingInvoker((_command, cwd) =>
      cwd.endsWith("alpha") ? 1 : 0
    );

    const summary = await runJobs(
      await discoverProjectJobs(bootstrap(), options()),
      { invoker, logger: memoryLogger() }
    );

    expect(summary.ok).toBe(false);
    expect(summary.results.map((r) => r.status)).toEqual(["failed", "generated"]);
  });
});

describe("prepareCloneJob", () => {
  const repository = {
    name: "kafka",
    url: "https://example.com/kafka.git",
    ref: "0123456789abcdef0123",
  };

  it("clones the pinned revision into the staging area", async () => {
    const job = await prepareCloneJob(repository, layout);
    const dir = layout.cloneDir("kafka", repository.ref);

    expect(job).toEqual({
      name: "clone kafka",
      cacheDir: layout.cloneCacheDir("kafka"),
      inputs: [layout.descriptorFile("kafka")],
      steps: [
        {
          label: "clone https://example.com/kafka.git",
          command: {
            program: "git",
            args: ["clone", "--no-checkout", repository.url, dir],
          },
          cwd: layout.stagingRoot,
        },
        {
          label: "checkout 0123456789abcdef0123",
          command: {
            program: "git",
            args: ["checkout", "--detach", repository.ref],
          },
          cwd: dir,
        },
      ],
      outputs: [dir],
      clean: [dir],
    });
    expect(
      JSON.parse(await readFile(layout.descriptorFile("kafka"), "utf-8"))
    ).toEqual({ url: repository.url, ref: repository.ref });
  });

  it("clones again only when the pinned revision changes", async () => {
    const invoker = recordingInvoker();
    const deps = { invoker, logger: memoryLogger() };

    await runIfStale(await prepareCloneJob(repository, layout), deps);
    const same = await runIfStale(await prepareCloneJob(repository, layout), deps);
    const moved = await runIfStale(
      await prepareCloneJob({ ...repository, ref: "fedcba9876543210" }, layout),
      deps
    );

    expect(same.status).toBe("fresh");
    expect(moved.status).toBe("generated");
    expect(invoker.calls).toHaveLength(4);
  });
});

describe("prepareBootstrap", () => {
  it("returns the clone job, its checkout and the project jobs as one context", async () => {
    await writeProjects();
    const repository = { name: "kafka", url: "https://example.com/k.git", ref: "abc" };

    const context = await prepareBootstrap(bootstrap({ repository }), options());

    expect(context.cloneJob?.name).toBe("clone kafka");
    expect(context.cloneDirs).toEqual([layout.cloneDir("kafka", "abc")]);
    expect(context.projectJobs).toHaveLength(2);

    const path = await writeIntegrationDirs(context, layout);
    expect(path).toBe(join(layout.stagingRoot, "integration-dirs.json"));
    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual({
      integrationDirs: [layout.cloneDir("kafka", "abc")],
    });
  });

  it("has no clone job without a repository", async () => {
    await writeProjects();

    const context = await prepareBootstrap(bootstrap(), options());

    expect(context.cloneJob).toBeUndefined();
    expect(context.cloneDirs).toEqual([]);
  });
});
