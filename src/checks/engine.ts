import { existsSync, readFileSync } from 'node:fs';
import type { ProvisionContext } from '../core/context.js';
import { expandHome } from '../lib/utils/paths.js';
import type { CheckSpec } from '../plan/types.js';
import { CHECK_DEFAULTS } from '../plan/types.js';

/** What a check needs from the host */
export type CheckContext = Pick<ProvisionContext, 'exec' | 'homeDir'>;

// ── Check output ──

export interface CheckOutput {
  status: 'passed' | 'failed';
  detail: string | null;
  duration_ms: number;
}

export interface CheckResult {
  type: CheckSpec['type'];
  status: 'passed' | 'failed' | 'waiting';
  detail: string | null;
}

export interface CheckRunResult {
  allPassed: boolean;
  results: CheckResult[];
  /** First failing check, if any */
  failure: { index: number; detail: string } | null;
}

// ── Secret masking ──

export function maskSecrets(text: string): string {
  return text
    .replace(/(?:sk-|pk-|token_|ghp_)[a-zA-Z0-9]{20,}/g, '***')
    .replace(/(?:Bearer|Basic)\s+\S{20,}/g, 'Bearer ***')
    .replace(/(?:password|secret|key|token)=\S+/gi, (m) => m.split('=')[0] + '=***');
}

// ── Individual check executors ──

export async function checkCommandExists(
  spec: { name: string },
  ctx: CheckContext,
): Promise<CheckOutput> {
  const result = await ctx.exec.exec(`command -v ${spec.name}`, { timeout_sec: 10 });
  return {
    status: result.exit_code === 0 ? 'passed' : 'failed',
    detail: result.exit_code === 0 ? null : `command not found: ${spec.name}`,
    duration_ms: result.duration_ms,
  };
}

export async function checkCmdSucceeds(
  spec: { cmd: string; timeout_sec?: number },
  ctx: CheckContext,
): Promise<CheckOutput> {
  const timeoutSec = spec.timeout_sec ?? CHECK_DEFAULTS.cmd_timeout_sec;
  const result = await ctx.exec.exec(spec.cmd, { timeout_sec: timeoutSec });

  if (result.timed_out) {
    return {
      status: 'failed',
      detail: `command timed out after ${timeoutSec}s: ${spec.cmd}`,
      duration_ms: result.duration_ms,
    };
  }

  if (result.exit_code !== 0) {
    const stderr = maskSecrets(result.stderr.slice(0, 500));
    return {
      status: 'failed',
      detail: `exit ${result.exit_code}: ${stderr}`.trim(),
      duration_ms: result.duration_ms,
    };
  }

  return { status: 'passed', detail: null, duration_ms: result.duration_ms };
}

export async function checkFileExists(
  spec: { path: string },
  ctx: CheckContext,
): Promise<CheckOutput> {
  const exists = existsSync(expandHome(spec.path, ctx.homeDir));
  return {
    status: exists ? 'passed' : 'failed',
    detail: exists ? null : `file not found: ${spec.path}`,
    duration_ms: 0,
  };
}

export async function checkFileContains(
  spec: { path: string; pattern: string },
  ctx: CheckContext,
): Promise<CheckOutput> {
  const fullPath = expandHome(spec.path, ctx.homeDir);
  if (!existsSync(fullPath)) {
    return {
      status: 'failed',
      detail: `file not found: ${spec.path}`,
      duration_ms: 0,
    };
  }
  const found = readFileSync(fullPath, 'utf-8').includes(spec.pattern);
  return {
    status: found ? 'passed' : 'failed',
    detail: found ? null : `pattern not found in ${spec.path}: "${spec.pattern}"`,
    duration_ms: 0,
  };
}

export function runCheck(spec: CheckSpec, ctx: CheckContext): Promise<CheckOutput> {
  switch (spec.type) {
    case 'command_exists':
      return checkCommandExists(spec, ctx);
    case 'cmd_succeeds':
      return checkCmdSucceeds(spec, ctx);
    case 'file_exists':
      return checkFileExists(spec, ctx);
    case 'file_contains':
      return checkFileContains(spec, ctx);
  }
}

// ── Batch runner (short-circuit on first failure) ──

export async function runChecks(
  checks: readonly CheckSpec[],
  ctx: CheckContext,
): Promise<CheckRunResult> {
  const results: CheckResult[] = [];

  for (const [i, spec] of checks.entries()) {
    const output = await runCheck(spec, ctx);
    results.push({ type: spec.type, status: output.status, detail: output.detail });

    if (output.status === 'failed') {
      // Short-circuit: mark remaining checks as waiting
      for (const rest of checks.slice(i + 1)) {
        results.push({ type: rest.type, status: 'waiting', detail: null });
      }
      return {
        allPassed: false,
        results,
        failure: { index: i, detail: output.detail ?? `check "${spec.type}" failed` },
      };
    }
  }

  return { allPassed: true, results, failure: null };
}
