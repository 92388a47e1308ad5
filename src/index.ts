import { Command } from 'commander';
import { runCommand } from './commands/run/index.js';
import { statusCommand } from './commands/status/index.js';

const program = new Command();

program
  .name('hostprep')
  .description('hostprep — idempotent provisioning for fresh servers')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(statusCommand);

await program.parseAsync();
