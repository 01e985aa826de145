import { spawn } from "node:child_process";
import type { ExecResult } from "../types/docker.ts";

export interface RunOptions {
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

/**
 * Runs an external program to completion
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;
}

/** Exit code reported when the program could not be spawned */
export const COMMAND_NOT_FOUND = 127;

/**
 * CommandRunner backed by child_process.spawn
 */
export class ProcessRunner implements CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
    return new Promise((resolve) => {
      const child = spawn(command, args, {
        stdio: options?.inherit ? "inherit" : ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        const exitCode = error.code === "ENOENT" ? COMMAND_NOT_FOUND : 1;
        resolve({ exitCode, stdout, stderr: stderr || error.message });
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        // null code means the process was killed by a signal
        resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
      });
    });
  }
}

// Default singleton instance
let defaultInstance: CommandRunner | null = null;

/**
 * Get the default CommandRunner instance
 */
export function getCommandRunner(): CommandRunner {
  if (defaultInstance === null) {
    defaultInstance = new ProcessRunner();
  }
  return defaultInstance;
}
