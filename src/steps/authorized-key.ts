import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ProvisionContext } from '../core/context.js';
import type { ApplyOutcome, Step } from '../core/step.js';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { expandHome } from '../lib/utils/paths.js';
import type { AuthorizedKeyStepDef } from '../plan/types.js';

function splitLines(content: string): string[] {
  return content.split('\n').map((line) => line.replace(/\r$/, ''));
}

export function hasKeyLine(path: string, key: string): boolean {
  return existsSync(path) && splitLines(readFileSync(path, 'utf-8')).includes(key);
}

/**
 * Append `key` as its own line unless an identical line exists.
 * Creates the parent directory (0700) and the file (0600) when missing.
 * Returns whether the file changed.
 */
export function appendKeyLine(path: string, key: string): boolean {
  mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
  if (!existsSync(path)) {
    writeFileSync(path, '', { mode: 0o600 });
  }

  const content = readFileSync(path, 'utf-8');
  if (splitLines(content).includes(key)) return false;

  const separator = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
  appendFileSync(path, `${separator}${key}\n`);
  return true;
}

function normalizeKey(raw: string): string {
  const key = raw.trim();
  if (!key) {
    throw new ProvisionError(ErrorCode.EMPTY_SSH_KEY, 'no SSH key given');
  }
  if (/[\r\n]/.test(key)) {
    throw new ProvisionError(ErrorCode.INVALID_SSH_KEY, 'SSH key must be a single line');
  }
  return key;
}

/**
 * Ensure an SSH public key is listed in an authorized_keys file.
 *
 * The key comes from the plan or, failing that, from the context's input
 * provider; it is asked for at most once. No key format validation.
 */
export function createAuthorizedKeyStep(def: AuthorizedKeyStepDef, ctx: ProvisionContext): Step {
  const path = expandHome(def.path, ctx.homeDir);
  let pendingKey: Promise<string> | null = null;

  function resolveKey(): Promise<string> {
    if (!pendingKey) {
      pendingKey = (def.key !== undefined ? Promise.resolve(def.key) : ctx.input.ask(def.prompt))
        .then(normalizeKey);
    }
    return pendingKey;
  }

  return {
    name: def.name,
    description: def.description,

    async check(): Promise<boolean> {
      const key = await resolveKey();
      return hasKeyLine(path, key);
    },

    async apply(): Promise<ApplyOutcome> {
      const key = await resolveKey();
      const changed = appendKeyLine(path, key);
      return {
        ok: true,
        detail: changed ? `key added to ${path}` : `key already present in ${path}`,
      };
    },
  };
}
