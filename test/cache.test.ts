import { readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  commitRecord,
  diffRecord,
  isStale,
  lookup,
  readRecord,
  RECORD_FILE,
} from "../src/cache";
import { CacheReadError, CommitError } from "../src/errors";
import type { CacheRecord } from "../src/types";
import { makeTempDir, removeDir, writeText } from "./helpers";

let tempDir: string;

beforeEach(async () => {
  tempDir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(tempDir);
});

function record(overrides: Partial<CacheRecord> = {}): CacheRecord {
  return {
    version: 1,
    key: "cache",
    fingerprint: "sha256:abc",
    last_run: "2024-01-01T00:00:00.000Z",
    files: { "/inputs/x": "sha256:1" },
    outputs: ["/out/index.csv"],
    ...overrides,
  };
}

describe("readRecord", () => {
  it("reports a missing record on first run", async () => {
    expect(await readRecord(join(tempDir, "never-written"))).toEqual({
      kind: "missing",
    });
  });

  it("reports invalid JSON as unreadable", async () => {
    await writeText(join(tempDir, RECORD_FILE), "{ not json");

    const result = await readRecord(tempDir);

    expect(result.kind).toBe("unreadable");
    if (result.kind === "unreadable") {
      expect(result.error).toBeInstanceOf(CacheReadError);
      expect(result.error.recordPath).toBe(join(tempDir, RECORD_FILE));
    }
  });

  it("reports a record with the wrong shape as unreadable", async () => {
    await writeText(
      join(tempDir, RECORD_FILE),
      JSON.stringify({ ...record(), version: 2 })
    );

    const result = await readRecord(tempDir);

    expect(result.kind).toBe("unreadable");
    expect(await lookup(tempDir)).toBeNull();
  });
});

describe("commitRecord", () => {
  it("round-trips through lookup", async () => {
    const cacheDir = join(tempDir, "nested", "cache");
    await commitRecord(cacheDir, record({ fingerprint: "sha256:def" }));

    expect(await lookup(cacheDir)).toBe("sha256:def");
    expect(await readRecord(cacheDir)).toEqual({
      kind: "found",
      record: record({ fingerprint: "sha256:def" }),
    });
  });

  it("replaces the previous record and leaves no temp files", async () => {
    await commitRecord(tempDir, record({ fingerprint: "sha256:one" }));
    await commitRecord(tempDir, record({ fingerprint: "sha256:two" }));

    expect(await lookup(tempDir)).toBe("sha256:two");
    expect(await readdir(tempDir)).toEqual([RECORD_FILE]);
  });

  it("raises CommitError when the cache directory cannot be created", async () => {
    const blocker = join(tempDir, "blocker");
    await writeFile(blocker, "a file, not a directory");

    const error = await commitRecord(join(blocker, "cache"), record()).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(CommitError);
    expect(error).toMatchObject({
      kind: "commit",
      recordPath: join(blocker, "cache", RECORD_FILE),
    });
  });
});

describe("isStale", () => {
  it("treats a missing record as stale", () => {
    expect(isStale(null, "sha256:abc")).toBe(true);
  });

  it("compares fingerprints exactly", () => {
    expect(isStale("sha256:abc", "sha256:abc")).toBe(false);
    expect(isStale("sha256:abc", "sha256:abd")).toBe(true);
  });
});

describe("diffRecord", () => {
  it("lists every file as changed without a record", () => {
    expect(diffRecord({ a: "1", b: "2" }, undefined)).toEqual({
      changed_files: ["a", "b"],
      removed_files: [],
    });
  });

  it("lists changed, added and removed files", () => {
    const previous = record({ files: { a: "1", b: "2", gone: "3" } });
    expect(diffRecord({ a: "1", b: "changed", added: "4" }, previous)).toEqual({
      changed_files: ["b", "added"],
      removed_files: ["gone"],
    });
  });
});
