import { isAbsolute, join, resolve } from "node:path";
import { ConfigurationError } from "./errors";

export interface StagingSettings {
  /** Absolute project base directory. */
  baseDir?: string;
  globalBase?: string;
  stagingDir?: string;
  home?: string;
  schemaVersion: string;
}

export interface StagingLayout {
  baseDir: string;
  globalBase: string;
  stagingRoot: string;
  integrationsCacheDir: string;
  indexFile: string;
  schemaVersionFile: string;
  projectCacheDir(projectDir: string): string;
  cloneDir(name: string, ref: string): string;
  cloneCacheDir(name: string): string;
  descriptorFile(name: string): string;
}

/**
 * Compute every location a generation run touches.
 * Pure: nothing is read from or written to disk.
 */
export function resolveStaging(settings: StagingSettings): StagingLayout {
  const { baseDir, schemaVersion } = settings;

  if (!baseDir) {
    throw new ConfigurationError("base directory is not configured");
  }
  if (!isAbsolute(baseDir)) {
    throw new ConfigurationError(
      `base directory must be absolute, got "${baseDir}"`
    );
  }

  let globalBase: string;
  if (settings.globalBase) {
    globalBase = resolve(baseDir, settings.globalBase);
  } else if (settings.home) {
    globalBase = join(settings.home, ".buildgen");
  } else {
    throw new ConfigurationError(
      "cannot locate the global base: set BUILDGEN_GLOBAL_BASE or HOME"
    );
  }

  const stagingRoot = settings.stagingDir
    ? resolve(baseDir, settings.stagingDir)
    : join(globalBase, "staging");
  const target = join(baseDir, "target");

  return {
    baseDir,
    globalBase,
    stagingRoot,
    integrationsCacheDir: join(stagingRoot, "integrations-cache"),
    indexFile: join(stagingRoot, `integrations-${schemaVersion}.csv`),
    schemaVersionFile: join(target, "schema-version.json"),
    projectCacheDir: (projectDir) =>
      join(projectDir, "target", "generation-cache"),
    cloneDir: (name, ref) =>
      join(stagingRoot, "clones", `${name}-${ref.slice(0, 12)}`),
    cloneCacheDir: (name) => join(stagingRoot, "clone-cache", name),
    descriptorFile: (name) => join(target, `clone-${name}.json`),
  };
}

export function stagingSettingsFromEnv(
  baseDir: string | undefined,
  schemaVersion: string,
  env: Record<string, string | undefined>
): StagingSettings {
  return {
    baseDir,
    schemaVersion,
    globalBase: env.BUILDGEN_GLOBAL_BASE || undefined,
    stagingDir: env.BUILDGEN_STAGING || undefined,
    home: env.HOME || env.USERPROFILE || undefined,
  };
}
