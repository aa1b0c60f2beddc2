import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { CacheReadError, CommitError, describe } from "./errors";
import type { CacheRecord, Fingerprint, RecordDiff } from "./types";

export const RECORD_FILE = "generation.lock";

const CacheRecordSchema = z.object({
  version: z.literal(1),
  key: z.string(),
  fingerprint: z.string().min(1),
  last_run: z.string(),
  files: z.record(z.string(), z.string()),
  outputs: z.array(z.string()),
});

export type RecordLookup =
  | { kind: "found"; record: CacheRecord }
  | { kind: "missing" }
  | { kind: "unreadable"; error: CacheReadError };

export function recordPath(cacheDir: string): string {
  return join(cacheDir, RECORD_FILE);
}

/**
 * Read the record stored for a cache key.
 * A corrupt record is reported, never thrown: the caller regenerates.
 */
export async function readRecord(cacheDir: string): Promise<RecordLookup> {
  const path = recordPath(cacheDir);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { kind: "missing" };
    }
    return { kind: "unreadable", error: new CacheReadError(path, describe(error)) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { kind: "unreadable", error: new CacheReadError(path, describe(error)) };
  }

  const result = CacheRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    return {
      kind: "unreadable",
      error: new CacheReadError(path, `${issue.message}${at}`),
    };
  }
  return { kind: "found", record: result.data };
}

/** Last committed fingerprint for a cache key, or null on any miss. */
export async function lookup(cacheDir: string): Promise<Fingerprint | null> {
  const found = await readRecord(cacheDir);
  return found.kind === "found" ? found.record.fingerprint : null;
}

export function isStale(
  committed: Fingerprint | null,
  current: Fingerprint
): boolean {
  return committed !== current;
}

/**
 * Persist a record by writing a temp file and renaming it over the old one,
 * so readers never observe a partial write.
 */
export async function commitRecord(
  cacheDir: string,
  record: CacheRecord
): Promise<void> {
  const path = recordPath(cacheDir);
  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await mkdir(cacheDir, { recursive: true });
  } catch (error) {
    throw new CommitError(path, error);
  }
  try {
    await writeFile(tmpPath, `${JSON.stringify(record, null, 2)}\n`);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new CommitError(path, error);
  }
}

/**
 * Diff current input hashes against a committed record.
 * Only used to describe a change; staleness is decided by the fingerprint.
 */
export function diffRecord(
  currentFiles: Record<string, string>,
  record: CacheRecord | undefined
): RecordDiff {
  if (!record) {
    return { changed_files: Object.keys(currentFiles), removed_files: [] };
  }

  const changed: string[] = [];
  const removed: string[] = [];

  for (const [path, hash] of Object.entries(currentFiles)) {
    if (record.files[path] !== hash) {
      changed.push(path);
    }
  }

  for (const path of Object.keys(record.files)) {
    if (!(path in currentFiles)) {
      removed.push(path);
    }
  }

  return { changed_files: changed, removed_files: removed };
}
