export { parsePlanYaml, loadPlanFile, expandVariables, formatPlanError } from './parser.js';
export type {
  Plan,
  StepDef,
  ShellStepDef,
  AuthorizedKeyStepDef,
  SshdConfigStepDef,
  CheckSpec,
} from './types.js';
export { planSchema, stepSchema, checkSchema, normalizeCheck, PLAN_DEFAULTS, CHECK_DEFAULTS } from './types.js';
