import { existsSync, readFileSync } from 'node:fs';
import type { ProvisionContext } from '../core/context.js';
import type { ApplyOutcome, Step } from '../core/step.js';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { writeFileAtomic } from '../lib/utils/fs.js';
import { expandHome } from '../lib/utils/paths.js';
import type { SshdConfigStepDef } from '../plan/types.js';
import { applyDirectives, directivesSatisfied } from './sshd-directives.js';

const RESTART_TIMEOUT_SEC = 60;

/**
 * Set sshd_config directives in place and restart the daemon when the
 * file changed. The config file is never created.
 */
export function createSshdConfigStep(def: SshdConfigStepDef, ctx: ProvisionContext): Step {
  const path = expandHome(def.path, ctx.homeDir);
  const keywords = Object.keys(def.directives);

  return {
    name: def.name,
    description: def.description,

    async check(): Promise<boolean> {
      if (!existsSync(path)) return false;
      return directivesSatisfied(readFileSync(path, 'utf-8'), def.directives);
    },

    async apply(): Promise<ApplyOutcome> {
      if (!existsSync(path)) {
        throw new ProvisionError(ErrorCode.SSHD_CONFIG_NOT_FOUND, `sshd config not found: ${path}`);
      }

      const content = readFileSync(path, 'utf-8');
      const updated = applyDirectives(content, def.directives);
      if (updated === content) {
        return { ok: true, detail: `${keywords.join(', ')} already set` };
      }

      writeFileAtomic(path, updated);
      debug('step:sshd', `updated ${path}`, def.directives);

      if (!def.restart) {
        return { ok: true, detail: `set ${keywords.join(', ')}` };
      }

      const result = await ctx.exec.exec(def.restart, { timeout_sec: RESTART_TIMEOUT_SEC });
      if (result.timed_out || result.exit_code !== 0) {
        const reason = result.timed_out ? 'timed out' : `exited ${result.exit_code}`;
        return {
          ok: false,
          error: `set ${keywords.join(', ')} but restart ${reason}: ${def.restart}`,
        };
      }
      return { ok: true, detail: `set ${keywords.join(', ')} and restarted sshd` };
    },
  };
}
