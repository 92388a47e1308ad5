import type { ProvisionContext } from '../core/context.js';
import { StepRegistry } from '../core/registry.js';
import type { Step } from '../core/step.js';
import type { Plan, StepDef } from '../plan/types.js';
import { createAuthorizedKeyStep } from './authorized-key.js';
import { createShellStep, type ShellDefaults } from './shell.js';
import { createSshdConfigStep } from './sshd-config.js';

export function createStep(def: StepDef, ctx: ProvisionContext, defaults: ShellDefaults): Step {
  switch (def.kind) {
    case 'shell':
      return createShellStep(def, ctx, defaults);
    case 'authorized_key':
      return createAuthorizedKeyStep(def, ctx);
    case 'sshd_config':
      return createSshdConfigStep(def, ctx);
  }
}

/** Register every plan step, in plan order */
export function buildRegistry(plan: Plan, ctx: ProvisionContext): StepRegistry {
  const defaults: ShellDefaults = { timeout_sec: plan.timeout_sec, env: plan.env };
  const registry = new StepRegistry();
  for (const def of plan.steps) {
    registry.register(createStep(def, ctx, defaults));
  }
  return registry;
}
