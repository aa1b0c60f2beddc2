import { platform } from "node:os";
import type { CommandLine, HostPlatform } from "./types";

/** Name of the tool binary on each host family. */
export interface ToolLauncher {
  posix: string;
  windows: string;
}

export const DEFAULT_LAUNCHER: ToolLauncher = {
  posix: "sbt",
  windows: "sbt.bat",
};

export function isWindowsHost(): boolean {
  return platform() === "win32";
}

export function detectHost(
  isWindows: () => boolean = isWindowsHost
): HostPlatform {
  return isWindows() ? "windows" : "posix";
}

/**
 * Typed command line for a build tool.
 * The host only decides the prefix: `cmd.exe /C <launcher>` on Windows,
 * the launcher itself elsewhere.
 */
export class CommandBuilder {
  private readonly props: string[] = [];
  private readonly rest: string[] = [];

  constructor(
    private readonly launcher: ToolLauncher,
    private readonly host: HostPlatform
  ) {}

  /** Append a `-Dname=value` system property. */
  property(name: string, value: string): this {
    this.props.push(`-D${name}=${value}`);
    return this;
  }

  properties(values: Record<string, string>): this {
    for (const [name, value] of Object.entries(values)) {
      this.property(name, value);
    }
    return this;
  }

  args(...args: string[]): this {
    this.rest.push(...args);
    return this;
  }

  tasks(...tasks: string[]): this {
    return this.args(...tasks);
  }

  build(): CommandLine {
    const args = [...this.props, ...this.rest];
    if (this.host === "windows") {
      return { program: "cmd.exe", args: ["/C", this.launcher.windows, ...args] };
    }
    return { program: this.launcher.posix, args };
  }
}

export function formatCommand(command: CommandLine): string {
  return [command.program, ...command.args].join(" ");
}
