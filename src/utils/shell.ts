/**
 * External process execution
 */

import { spawn } from "node:child_process";

export interface RunResult {
  exitCode: number;
  /** Set when the process was terminated by a signal */
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the child after this many milliseconds */
  timeoutMs?: number;
  /** Run `command` through the system shell instead of as an argument vector */
  shell?: boolean;
}

/**
 * Run a command to completion and collect its output.
 * A non-zero exit resolves; only a failure to start the process rejects.
 */
export function run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: options.shell ?? false,
      stdio: ["ignore", "pipe", "pipe"],
      timeout: options.timeoutMs,
    });

    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.once("error", reject);
    child.once("close", (code, signal) => {
      resolve({ exitCode: code ?? -1, signal, stdout, stderr });
    });
  });
}

export function describeFailure(result: RunResult): string {
  const detail = result.stderr.trim() || result.stdout.trim();
  const status = result.signal ? `killed by ${result.signal}` : `exit code ${result.exitCode}`;
  return detail ? `${status}: ${detail}` : status;
}
