export { Runner, type RunnerOptions } from './runner.js';
export { StepRegistry, type StepSelection } from './registry.js';
export { createStepResult } from './step.js';
export type { Step, StepResult, StepOutcome, ApplyOutcome } from './step.js';
export {
  exitCodeFor,
  deriveRunStatus,
  countOutcomes,
  serializeReport,
  EXIT_CODES,
} from './report.js';
export type { RunReport, RunStatus } from './report.js';
export type {
  ProvisionContext,
  PrivilegeProbe,
  PrivilegeStatus,
  CommandExecutor,
  CommandResult,
  ExecOptions,
  InputProvider,
} from './context.js';
