import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { Shescape } from "shescape";
import { CommandFailure } from "./errors";
import type { CommandLine, GenerationStep } from "./types";

export interface ExitStatus {
  code: number;
  signal: NodeJS.Signals | null;
}

/** Runs one external command to completion. */
export interface Invoker {
  run(command: CommandLine, cwd: string): Promise<ExitStatus>;
}

/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILED = 127;

/** Escapes arguments for the shell that will re-parse them. */
export type Escaper = (args: string[]) => string[];

export const cmdEscaper: Escaper = (args) =>
  new Shescape({ shell: "cmd.exe" }).escapeAll(args);

export function argsFor(command: CommandLine, escape: Escaper = cmdEscaper): string[] {
  // Everything after `cmd.exe /C` is re-parsed by cmd, so its metacharacters
  // must be escaped.
  if (command.program !== "cmd.exe") {
    return command.args;
  }
  const [flag, ...rest] = command.args;
  return flag === undefined ? [] : [flag, ...escape(rest)];
}

export const spawnInvoker: Invoker = {
  run(command, cwd) {
    return new Promise((resolve) => {
      let proc: ChildProcess;
      try {
        proc = spawn(command.program, argsFor(command), {
          cwd,
          stdio: "inherit",
          env: { ...process.env, ...command.env },
        });
      } catch {
        // No usable shell or program: same outcome as a failed exec.
        resolve({ code: SPAWN_FAILED, signal: null });
        return;
      }
      proc.on("error", () => {
        resolve({ code: SPAWN_FAILED, signal: null });
      });
      proc.on("close", (code, signal) => {
        resolve({ code: code ?? 1, signal });
      });
    });
  },
};

export async function runStep(
  invoker: Invoker,
  step: GenerationStep
): Promise<void> {
  const status = await invoker.run(step.command, step.cwd);
  if (status.code !== 0) {
    throw new CommandFailure(step.label, step.command, step.cwd, status.code);
  }
}
