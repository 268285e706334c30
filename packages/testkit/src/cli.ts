/**
 * CLI testing utilities
 */

import { execa, ExecaError } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory; tsx must be resolvable from it */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin (default: empty) */
  input?: string;
  /** Reject on non-zero exit (default: false) */
  reject?: boolean;
  /** Kill the process after this many ms (default: 15000) */
  timeout?: number;
}

/**
 * Execute a TypeScript CLI entry point with Node and the tsx loader
 * @param cliPath - Path to the CLI's .ts entry point
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input = "", reject = false, timeout = 15000 } = options;

  try {
    const result = await execa(process.execPath, ["--import", "tsx", cliPath, ...args], {
      cwd,
      env: { ...process.env, ...env },
      input,
      reject,
      timeout,
    });

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? null,
      signal: result.signal ?? null,
    };
  } catch (error) {
    // Spawn failures and timeouts still carry the captured output
    if (!reject && error instanceof ExecaError) {
      return {
        stdout: typeof error.stdout === "string" ? error.stdout : "",
        stderr: typeof error.stderr === "string" ? error.stderr : "",
        exitCode: error.exitCode ?? null,
        signal: error.signal ?? null,
      };
    }
    throw error;
  }
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
