import type { ProvisionError } from '../lib/errors.js';
import type { StepResult } from './step.js';

/**
 * clean:    every step skipped or succeeded
 * degraded: at least one step failed; the remaining steps still ran
 * refused:  the privilege precondition failed and no step ran
 */
export type RunStatus = 'clean' | 'degraded' | 'refused';

export interface RunReport {
  readonly status: RunStatus;
  readonly results: readonly StepResult[];
  readonly error: ProvisionError | null;
  readonly started_at: string;
  readonly completed_at: string;
  readonly duration_ms: number;
}

export const EXIT_CODES: Record<RunStatus, number> = {
  clean: 0,
  degraded: 1,
  refused: 2,
};

export function exitCodeFor(report: RunReport): number {
  return EXIT_CODES[report.status];
}

export function deriveRunStatus(results: readonly StepResult[]): RunStatus {
  return results.some((r) => r.outcome === 'failed') ? 'degraded' : 'clean';
}

export function countOutcomes(report: RunReport): Record<StepResult['outcome'], number> {
  const counts = { skipped: 0, succeeded: 0, failed: 0 };
  for (const result of report.results) {
    counts[result.outcome]++;
  }
  return counts;
}

/** Plain JSON shape of a report (errors reduced to code + message) */
export function serializeReport(report: RunReport, planName?: string): Record<string, unknown> {
  return {
    plan: planName,
    status: report.status,
    exit_code: exitCodeFor(report),
    started_at: report.started_at,
    completed_at: report.completed_at,
    duration_ms: report.duration_ms,
    error: report.error ? { code: report.error.code, message: report.error.message } : null,
    steps: report.results.map((r) => ({
      name: r.step_name,
      outcome: r.outcome,
      detail: r.detail,
      duration_ms: r.duration_ms,
    })),
  };
}
