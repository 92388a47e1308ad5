export { buildRegistry, createStep } from './build.js';
export { createShellStep, type ShellDefaults } from './shell.js';
export { createAuthorizedKeyStep, appendKeyLine, hasKeyLine } from './authorized-key.js';
export { createSshdConfigStep } from './sshd-config.js';
export {
  applyDirectives,
  directivesSatisfied,
  readDirective,
  parseDirectiveLine,
  type DirectiveLine,
} from './sshd-directives.js';
