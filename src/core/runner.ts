import { PrivilegeError, errorMessage } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import type { Reporter } from '../lib/ui/reporter.js';
import type { ProvisionContext } from './context.js';
import { deriveRunStatus, type RunReport, type RunStatus } from './report.js';
import { createStepResult, type Step, type StepResult } from './step.js';

export interface RunnerOptions {
  context: Pick<ProvisionContext, 'privilege'>;
  reporter: Reporter;
  /** Consult the privilege probe before running (default: true) */
  requirePrivilege?: boolean;
}

/**
 * Executes steps in order: skip what is already satisfied, apply the rest,
 * and keep going after failures. A step failure never escapes `run`.
 */
export class Runner {
  constructor(private readonly options: RunnerOptions) {}

  async run(steps: readonly Step[]): Promise<RunReport> {
    const { reporter } = this.options;
    const startedAt = new Date();

    // 1. Privilege gate: the only condition that stops a run
    if (this.options.requirePrivilege !== false) {
      const privilege = this.options.context.privilege.check();
      debug('runner', 'privilege check', privilege);
      if (!privilege.ok) {
        const error = new PrivilegeError(
          `root privileges required (running as ${privilege.user})`,
        );
        const report = finalize('refused', [], error, startedAt);
        reporter.summary(report);
        return report;
      }
    }

    // 2. Step loop
    const results: StepResult[] = [];
    for (const step of steps) {
      reporter.info(`→ ${step.name}${step.description ? ` — ${step.description}` : ''}`);
      const result = await this.runStep(step);
      results.push(result);
      reporter.report(result);
    }

    // 3. Aggregate
    const report = finalize(deriveRunStatus(results), results, null, startedAt);
    reporter.summary(report);
    return report;
  }

  private async runStep(step: Step): Promise<StepResult> {
    const start = Date.now();
    const elapsed = () => Date.now() - start;

    let satisfied: boolean;
    try {
      satisfied = await step.check();
    } catch (err) {
      debug('runner', `check for "${step.name}" threw`, err);
      return createStepResult(step.name, 'failed', `check failed: ${errorMessage(err)}`, elapsed());
    }

    if (satisfied) {
      return createStepResult(step.name, 'skipped', 'already satisfied', elapsed());
    }

    try {
      const outcome = await step.apply();
      return outcome.ok
        ? createStepResult(step.name, 'succeeded', outcome.detail ?? 'applied', elapsed())
        : createStepResult(step.name, 'failed', outcome.error, elapsed());
    } catch (err) {
      debug('runner', `apply for "${step.name}" threw`, err);
      return createStepResult(step.name, 'failed', errorMessage(err), elapsed());
    }
  }
}

function finalize(
  status: RunStatus,
  results: StepResult[],
  error: PrivilegeError | null,
  startedAt: Date,
): RunReport {
  const completedAt = new Date();
  return Object.freeze({
    status,
    results: Object.freeze([...results]),
    error,
    started_at: startedAt.toISOString(),
    completed_at: completedAt.toISOString(),
    duration_ms: completedAt.getTime() - startedAt.getTime(),
  });
}
