import { DuplicateStepNameError, ProvisionError, ErrorCode } from '../lib/errors.js';
import type { Step } from './step.js';

export interface StepSelection {
  only?: string[];
  skip?: string[];
}

/**
 * Ordered, name-unique list of the steps for one run.
 *
 * Registration order is execution order; nothing is inferred about
 * prerequisites between steps.
 */
export class StepRegistry {
  private readonly steps: Step[] = [];
  private readonly names = new Set<string>();

  register(step: Step): this {
    if (this.names.has(step.name)) {
      throw new DuplicateStepNameError(step.name);
    }
    this.names.add(step.name);
    this.steps.push(step);
    return this;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.steps.length;
  }

  sequence(): Step[] {
    return [...this.steps];
  }

  /** Registration-ordered subset; unknown names are rejected */
  select(selection: StepSelection = {}): Step[] {
    const { only, skip = [] } = selection;

    for (const name of [...(only ?? []), ...skip]) {
      if (!this.names.has(name)) {
        throw new ProvisionError(
          ErrorCode.STEP_NOT_FOUND,
          `unknown step: "${name}"`,
          `Available steps: ${[...this.names].join(', ')}`,
        );
      }
    }

    return this.steps.filter(
      (step) => (only === undefined || only.includes(step.name)) && !skip.includes(step.name),
    );
  }
}
