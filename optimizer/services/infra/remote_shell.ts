/**
 * Remote command execution over SSH
 */

import type { CloudtuneConfig } from '../../../src/types/common.js';
import { Logger } from '../../../src/utils/logger.js';
import { runProcess } from './process_runner.js';
import type { ProcessRunner } from './process_runner.js';

export interface CommandResult {
  /** -1 when the process never produced an exit code (timeout, cancel) */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Bastion for hosts on the private network */
  jumpHost?: string;
}

export interface RemoteShell {
  run(host: string, command: string, options: RunOptions): Promise<CommandResult>;
  writeFile(host: string, path: string, content: string, options: RunOptions): Promise<CommandResult>;
}

export function quotePath(path: string): string {
  return `'${path.replace(/'/g, `'\\''`)}'`;
}

export class SshShell implements RemoteShell {
  constructor(
    private settings: CloudtuneConfig['ssh'],
    private runner: ProcessRunner = runProcess
  ) {}

  sshArgs(host: string, jumpHost?: string): string[] {
    const { user, connect_timeout_s, identity_file, strict_host_key_checking } = this.settings;
    const args = [
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${connect_timeout_s}`,
      '-o', `StrictHostKeyChecking=${strict_host_key_checking ? 'yes' : 'no'}`
    ];
    if (!strict_host_key_checking) {
      args.push('-o', 'UserKnownHostsFile=/dev/null', '-o', 'LogLevel=ERROR');
    }
    if (identity_file) {
      args.push('-i', identity_file);
    }
    if (jumpHost && jumpHost !== host) {
      args.push('-J', `${user}@${jumpHost}`);
    }
    args.push(`${user}@${host}`);
    return args;
  }

  run(host: string, command: string, options: RunOptions): Promise<CommandResult> {
    Logger.debug('ssh run', { host, command: command.split('\n')[0] });
    return this.exec(['-n', ...this.sshArgs(host, options.jumpHost), command], options);
  }

  writeFile(host: string, path: string, content: string, options: RunOptions): Promise<CommandResult> {
    Logger.debug('ssh write', { host, path, bytes: content.length });
    const quoted = quotePath(path);
    const command = `mkdir -p "$(dirname ${quoted})" && cat > ${quoted}`;
    return this.exec([...this.sshArgs(host, options.jumpHost), command], options, content);
  }

  private async exec(args: string[], options: RunOptions, input?: string): Promise<CommandResult> {
    const result = await this.runner('ssh', args, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      input
    });

    return {
      exitCode: result.exitCode ?? -1,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut
    };
  }
}
