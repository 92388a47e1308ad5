import {
  Runner,
  type ProvisionContext,
  type RunReport,
  type Step,
  type StepSelection,
} from './core/index.js';
import { ProvisionError, ErrorCode, errorMessage } from './lib/errors.js';
import type { Reporter } from './lib/ui/reporter.js';
import type { Plan } from './plan/index.js';
import { buildRegistry } from './steps/index.js';

/** Build the plan's steps once and pick the ones selected for this run */
export function selectSteps(
  plan: Plan,
  context: ProvisionContext,
  selection: StepSelection = {},
): Step[] {
  return buildRegistry(plan, context).select({ only: selection.only, skip: selection.skip });
}

export interface ProvisionOptions {
  steps: readonly Step[];
  context: ProvisionContext;
  reporter: Reporter;
  requirePrivilege?: boolean;
}

/** Run already-selected steps through the Runner */
export async function provision(options: ProvisionOptions): Promise<RunReport> {
  const runner = new Runner({
    context: options.context,
    reporter: options.reporter,
    requirePrivilege: options.requirePrivilege,
  });
  return runner.run(options.steps);
}

// ── Read-only inspection ──

export type StepState = 'satisfied' | 'pending' | 'unknown' | 'error';

export interface StepStatus {
  name: string;
  description?: string;
  state: StepState;
  detail: string | null;
}

/**
 * Evaluate every step's check without applying anything.
 * Steps that would need operator input report `unknown`.
 */
export async function inspect(steps: readonly Step[]): Promise<StepStatus[]> {
  const statuses: StepStatus[] = [];
  for (const step of steps) {
    const base = { name: step.name, description: step.description };
    try {
      const satisfied = await step.check();
      statuses.push({ ...base, state: satisfied ? 'satisfied' : 'pending', detail: null });
    } catch (err) {
      const needsInput = err instanceof ProvisionError && err.code === ErrorCode.INTERACTIVE_REQUIRED;
      statuses.push({
        ...base,
        state: needsInput ? 'unknown' : 'error',
        detail: needsInput ? 'needs operator input' : errorMessage(err),
      });
    }
  }
  return statuses;
}
