export {
  runCheck,
  runChecks,
  checkCommandExists,
  checkCmdSucceeds,
  checkFileExists,
  checkFileContains,
  maskSecrets,
} from './engine.js';
export type { CheckOutput, CheckResult, CheckRunResult, CheckContext } from './engine.js';
