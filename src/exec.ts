import * as exec from "@actions/exec";
import { ProcessError } from "./errors.js";

export interface RunOptions {
  /** Written to the process's standard input. */
  input?: string;
  /** Extra environment variables on top of the current environment. */
  env?: Record<string, string>;
  cwd?: string;
}

function environment(extra: Record<string, string> | undefined): Record<string, string> | undefined {
  if (extra === undefined) {
    return undefined;
  }
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...extra };
}

/**
 * Runs an external command with its output streamed through to ours.
 *
 * @throws ProcessError on a non-zero exit status, or when the command
 *   cannot be started
 */
export async function run(
  command: string,
  operation: string,
  args: string[],
  options: RunOptions = {},
): Promise<void> {
  let exitCode: number;
  try {
    exitCode = await exec.exec(command, args, {
      ignoreReturnCode: true,
      input: options.input === undefined ? undefined : Buffer.from(options.input),
      env: environment(options.env),
      cwd: options.cwd,
    });
  } catch (err) {
    throw new ProcessError(command, operation, undefined, { cause: err });
  }

  if (exitCode !== 0) {
    throw new ProcessError(command, operation, exitCode);
  }
}

/**
 * Runs an external command silently and returns its trimmed standard output.
 *
 * @throws ProcessError on a non-zero exit status, or when the command
 *   cannot be started
 */
export async function output(
  command: string,
  operation: string,
  args: string[],
  options: Pick<RunOptions, "cwd"> = {},
): Promise<string> {
  let result: exec.ExecOutput;
  try {
    result = await exec.getExecOutput(command, args, {
      ignoreReturnCode: true,
      silent: true,
      cwd: options.cwd,
    });
  } catch (err) {
    throw new ProcessError(command, operation, undefined, { cause: err });
  }

  if (result.exitCode !== 0) {
    throw new ProcessError(command, operation, result.exitCode);
  }
  return result.stdout.trim();
}
