import { access, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Logger } from "../src/log";
import type { ExitStatus, Invoker } from "../src/runner";
import type { CommandLine } from "../src/types";

export interface Invocation {
  program: string;
  args: string[];
  cwd: string;
}

export type RecordingInvoker = Invoker & { calls: Invocation[] };

/**
 * Stand-in for external tools: records every call and lets the test decide
 * the exit code (and any side effect) per command.
 */
export function recordingInvoker(
  behavior: (command: CommandLine, cwd: string) => number | Promise<number> = () => 0
): RecordingInvoker {
  const calls: Invocation[] = [];
  return {
    calls,
    async run(command, cwd): Promise<ExitStatus> {
      calls.push({ program: command.program, args: command.args, cwd });
      return { code: await behavior(command, cwd), signal: null };
    },
  };
}

export type MemoryLogger = Logger & { lines: string[] };

export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    success: (message) => lines.push(`success ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "buildgen-test-"));
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

export async function writeText(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
