import { homedir } from 'node:os';
import type { ProvisionContext } from '../core/context.js';
import { createShellExecutor } from './exec.js';
import { createInputProvider } from './input.js';
import { processPrivilege } from './privilege.js';

export interface HostContextOptions {
  verbose?: boolean;
  /** Pre-supplied answer for the SSH key prompt */
  key?: string;
  nonInteractive?: boolean;
  homeDir?: string;
}

/** The real machine: /bin/sh, the terminal, the process uid */
export function createHostContext(options: HostContextOptions = {}): ProvisionContext {
  return {
    privilege: processPrivilege,
    exec: createShellExecutor({ verbose: options.verbose }),
    input: createInputProvider({ answer: options.key, nonInteractive: options.nonInteractive }),
    homeDir: options.homeDir ?? homedir(),
  };
}
