/**
 * Subprocess execution shared by the SSH shell and the Terraform backend
 */

import { execa } from 'execa';

export interface ProcessOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  cwd?: string;
  input?: string;
  env?: Record<string, string>;
}

export interface ProcessOutcome {
  /** undefined when the process was killed before exiting */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
}

export type ProcessRunner = (file: string, args: string[], options: ProcessOptions) => Promise<ProcessOutcome>;

/**
 * Never rejects on exit status, timeout or cancellation
 */
export const runProcess: ProcessRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    reject: false,
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
    cwd: options.cwd,
    input: options.input,
    env: options.env
  });

  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    isCanceled: result.isCanceled
  };
};
