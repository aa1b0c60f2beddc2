import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { resolve } from "node:path";
import { glob, hasMagic } from "glob";
import { HashingError } from "./errors";
import type { Fingerprint } from "./types";

/** Hash recorded for a tracked path that does not exist. */
export const ABSENT = "absent";

/**
 * Hash a file using SHA-256 streaming to avoid OOM on large files.
 * @returns "sha256:<hex>" format hash
 */
export async function hashFile(path: string): Promise<string> {
  const hasher = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hasher.update(chunk);
  }
  return `sha256:${hasher.digest("hex")}`;
}

/**
 * Compute Merkle root from file hashes.
 * Sorts paths lexicographically and hashes one JSON `[path, hash]` line per
 * entry; a newline inside a path stays escaped.
 */
export function computeMerkleRoot(
  fileHashes: Record<string, string>
): Fingerprint {
  const hasher = createHash("sha256");
  const sortedPaths = Object.keys(fileHashes).sort();
  for (const path of sortedPaths) {
    hasher.update(`${JSON.stringify([path, fileHashes[path]])}\n`);
  }
  return `sha256:${hasher.digest("hex")}`;
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Fingerprint a tracked input set.
 * Missing paths hash to {@link ABSENT}; any other read failure throws
 * {@link HashingError}.
 */
export async function fingerprint(
  paths: readonly string[]
): Promise<{ fingerprint: Fingerprint; files: Record<string, string> }> {
  const unique = [...new Set(paths.map((p) => resolve(p)))].sort();
  const files: Record<string, string> = {};

  for (const path of unique) {
    try {
      files[path] = await hashFile(path);
    } catch (error) {
      if (!isMissing(error)) {
        throw new HashingError(path, error);
      }
      files[path] = ABSENT;
    }
  }

  return { fingerprint: computeMerkleRoot(files), files };
}

/**
 * Resolve declared input entries relative to `base`.
 * Glob entries are expanded; literal entries are kept even when missing.
 */
export async function resolveInputs(
  base: string,
  entries: readonly string[]
): Promise<string[]> {
  const matched = new Set<string>();

  for (const entry of entries) {
    if (!hasMagic(entry)) {
      matched.add(resolve(base, entry));
      continue;
    }
    for (const path of await glob(entry, {
      cwd: base,
      absolute: true,
      nodir: true,
    })) {
      matched.add(path);
    }
  }

  return [...matched].sort();
}

/**
 * List every file under `dir` ending in one of `extensions`.
 * @param extensions - e.g. [".sbt", ".scala"]
 */
export async function collectFiles(
  dir: string,
  extensions: readonly string[],
  ignore: string[] = []
): Promise<string[]> {
  if (extensions.length === 0) {
    return [];
  }
  const names = extensions.map((ext) => ext.replace(/^\./, ""));
  const pattern =
    names.length === 1 ? `**/*.${names[0]}` : `**/*.{${names.join(",")}}`;
  const files = await glob(pattern, {
    cwd: dir,
    absolute: true,
    nodir: true,
    ignore,
  });
  return files.sort();
}
