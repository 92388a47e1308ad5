import { maskSecrets, runChecks } from '../checks/index.js';
import type { ProvisionContext } from '../core/context.js';
import type { ApplyOutcome, Step } from '../core/step.js';
import { debug } from '../lib/utils/debug.js';
import { plural } from '../lib/utils/format.js';
import type { ShellStepDef } from '../plan/types.js';

export interface ShellDefaults {
  timeout_sec: number;
  env: Record<string, string>;
}

/** Tail of stderr worth showing in a one-line failure detail */
function stderrTail(stderr: string): string {
  const lines = stderr.trim().split('\n').filter(Boolean);
  return maskSecrets(lines.slice(-3).join(' | ')).slice(0, 500);
}

/**
 * A step made of shell commands.
 *
 * Satisfied when it declares checks and all of them pass; a step without
 * checks always applies. Apply stops at the first failing command, then
 * runs the `verify` checks.
 */
export function createShellStep(
  def: ShellStepDef,
  ctx: ProvisionContext,
  defaults: ShellDefaults,
): Step {
  const timeoutSec = def.timeout_sec ?? defaults.timeout_sec;
  const env = { ...defaults.env, ...def.env };

  return {
    name: def.name,
    description: def.description,

    async check(): Promise<boolean> {
      if (def.check.length === 0) return false;
      const result = await runChecks(def.check, ctx);
      debug('step:shell', def.name, 'check', result.results);
      return result.allPassed;
    },

    async apply(): Promise<ApplyOutcome> {
      for (const cmd of def.run) {
        debug('step:shell', def.name, '$', cmd);
        const result = await ctx.exec.exec(cmd, { timeout_sec: timeoutSec, env });

        if (result.timed_out) {
          return { ok: false, error: `command timed out after ${timeoutSec}s: ${cmd}` };
        }
        if (result.exit_code !== 0) {
          const tail = stderrTail(result.stderr);
          return {
            ok: false,
            error: `command exited ${result.exit_code}: ${cmd}${tail ? ` (${tail})` : ''}`,
          };
        }
      }

      if (def.verify.length > 0) {
        const verify = await runChecks(def.verify, ctx);
        if (!verify.allPassed) {
          return {
            ok: false,
            error: `verification failed: ${verify.failure?.detail ?? 'unknown check failure'}`,
          };
        }
      }

      return { ok: true, detail: `ran ${plural(def.run.length, 'command')}` };
    },
  };
}
