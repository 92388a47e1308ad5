// ── Step ──

/** Outcome of a step's apply action */
export type ApplyOutcome =
  | { ok: true; detail?: string }
  | { ok: false; error: string };

/**
 * A named, idempotent unit of provisioning work.
 *
 * `check` must not change the host and may be called any number of times.
 * `apply` must be safe to call on a host where a previous apply stopped
 * half-way. Throwing from either is treated the same as a failed outcome.
 */
export interface Step {
  readonly name: string;
  readonly description?: string;
  check(): Promise<boolean>;
  apply(): Promise<ApplyOutcome>;
}

// ── Results ──

export type StepOutcome = 'skipped' | 'succeeded' | 'failed';

export interface StepResult {
  readonly step_name: string;
  readonly outcome: StepOutcome;
  readonly detail: string;
  readonly duration_ms: number;
}

export function createStepResult(
  stepName: string,
  outcome: StepOutcome,
  detail: string,
  durationMs: number,
): StepResult {
  return Object.freeze({
    step_name: stepName,
    outcome,
    detail,
    duration_ms: durationMs,
  });
}
