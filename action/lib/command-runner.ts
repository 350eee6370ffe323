/**
 * Subprocess Runner
 *
 * Runs an executable with an argument array (never through a shell) and
 * collects its output. Non-zero exits resolve normally; callers decide
 * whether a failure is fatal.
 */

import { spawn } from "node:child_process";

export interface CommandOptions {
  cwd?: string;
  /** Written to stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(executable: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export interface SpawnRunnerOptions {
  /** Receives output chunks as they arrive */
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

export function createSpawnRunner(streams: SpawnRunnerOptions = {}): CommandRunner {
  return {
    run(executable, args, options = {}) {
      return new Promise((resolve, reject) => {
        const child = spawn(executable, [...args], {
          cwd: options.cwd,
          shell: false,
          stdio: ["pipe", "pipe", "pipe"],
        });
        let stdout = "";
        let stderr = "";
        child.stdout?.setEncoding("utf8");
        child.stderr?.setEncoding("utf8");
        child.stdout?.on("data", (chunk: string) => {
          stdout += chunk;
          streams.onStdout?.(chunk);
        });
        child.stderr?.on("data", (chunk: string) => {
          stderr += chunk;
          streams.onStderr?.(chunk);
        });
        child.on("error", reject);
        child.on("close", (code: number | null) => resolve({ exitCode: code, stdout, stderr }));

        // flyctl may exit before draining stdin; the exit code reports that failure
        child.stdin?.on("error", (error: NodeJS.ErrnoException) => {
          if (error.code !== "EPIPE") {
            reject(error);
          }
        });

        if (options.input !== undefined) {
          child.stdin?.write(options.input);
        }
        child.stdin?.end();
      });
    },
  };
}
