import { spawnSync } from 'node:child_process';
import type { CommandExecutor, CommandResult, ExecOptions } from '../core/context.js';
import { debug } from '../lib/utils/debug.js';

export const DEFAULT_COMMAND_TIMEOUT_SEC = 120;

export interface ShellExecutorOptions {
  /** Stream command output to the terminal instead of capturing it */
  verbose?: boolean;
}

/**
 * Run commands through /bin/sh, one at a time, blocking until each exits.
 */
export function createShellExecutor(options: ShellExecutorOptions = {}): CommandExecutor {
  return {
    async exec(cmd: string, execOptions: ExecOptions = {}): Promise<CommandResult> {
      const timeoutSec = execOptions.timeout_sec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
      const start = Date.now();
      debug('exec', cmd);

      const result = spawnSync(cmd, {
        shell: true,
        encoding: 'utf-8',
        timeout: timeoutSec * 1000,
        env: { ...process.env, ...execOptions.env },
        stdio: options.verbose ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
      });

      const duration_ms = Date.now() - start;
      const timedOut = result.error !== undefined && 'code' in result.error && result.error.code === 'ETIMEDOUT';

      if (result.error && !timedOut) {
        return {
          exit_code: 127,
          stdout: '',
          stderr: result.error.message,
          timed_out: false,
          duration_ms,
        };
      }

      return {
        exit_code: result.status ?? 1,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        timed_out: timedOut,
        duration_ms,
      };
    },
  };
}
