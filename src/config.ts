import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import stripJsonComments from "strip-json-comments";
import { z } from "zod";

const CONFIG_FILES = [
  "buildgen.jsonc",
  "buildgen.json",
  "buildgen.toml",
] as const;

const nonEmpty = (what: string) => z.string().min(1, `${what} must not be empty`);

const SetupCommandSchema = z.object({
  command: z.array(z.string()).min(1, "command must not be empty"),
  cwd: z.string().optional(),
  /** Added to the inherited environment of this command only. */
  env: z.record(z.string(), z.string()).optional(),
  posixOnly: z.boolean().default(false),
});

const IntegrationsSchema = z.object({
  base: nonEmpty("base"),
  variants: z.array(z.string()).min(1, "variants must not be empty"),
  inputs: z.array(z.string()).default([]),
  tasks: z.array(z.string()).min(1, "tasks must not be empty"),
  globalDir: z.string().default("global"),
  properties: z.record(z.string(), z.string()).default({}),
  setup: z.array(SetupCommandSchema).default([]),
});

const RepositorySchema = z.object({
  name: z
    .string()
    .regex(/^[\w.-]+$/, "name may only contain letters, digits, '.', '_' and '-'"),
  url: nonEmpty("url"),
  ref: nonEmpty("ref"),
});

const BootstrapSchema = z.object({
  repository: RepositorySchema.optional(),
  projectsDir: nonEmpty("projectsDir"),
  pluginSources: z.string().optional(),
  extensions: z.array(z.string()).default([".sbt", ".scala"]),
  pluginExtensions: z.array(z.string()).default([".scala"]),
  tasks: z.array(z.string()).min(1, "tasks must not be empty"),
});

const BuildgenConfigSchema = z
  .object({
    schemaVersion: nonEmpty("schemaVersion"),
    tool: z
      .object({ posix: nonEmpty("posix"), windows: nonEmpty("windows") })
      .default({ posix: "sbt", windows: "sbt.bat" }),
    integrations: IntegrationsSchema.optional(),
    bootstrap: BootstrapSchema.optional(),
  })
  .passthrough()
  .refine(
    (c) => c.integrations !== undefined || c.bootstrap !== undefined,
    "config must declare integrations or bootstrap"
  );

export type BuildgenConfig = z.infer<typeof BuildgenConfigSchema>;
export type IntegrationsConfig = z.infer<typeof IntegrationsSchema>;
export type BootstrapConfig = z.infer<typeof BootstrapSchema>;
export type RepositoryConfig = z.infer<typeof RepositorySchema>;
export type SetupCommand = z.infer<typeof SetupCommandSchema>;

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function discoverConfig(cwd?: string): Promise<string | null> {
  const dir = cwd ?? process.cwd();

  for (const filename of CONFIG_FILES) {
    const filepath = resolve(dir, filename);
    if (await fileExists(filepath)) {
      return filepath;
    }
  }

  return null;
}

export async function loadConfig(path: string): Promise<BuildgenConfig> {
  const ext = path.split(".").pop()?.toLowerCase();
  const text = await readFile(path, "utf-8");

  if (ext === "json" || ext === "jsonc") {
    return validateConfig(JSON.parse(stripJsonComments(text)));
  }

  if (ext === "toml") {
    return validateConfig(parseToml(text));
  }

  throw new Error(`buildgen: unsupported config format: ${ext}`);
}

export function validateConfig(raw: unknown): BuildgenConfig {
  const result = BuildgenConfigSchema.safeParse(raw);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? ` in "${issue.path.join(".")}"` : "";
    throw new Error(`buildgen: config error${path}: ${issue.message}`);
  }

  return result.data;
}
