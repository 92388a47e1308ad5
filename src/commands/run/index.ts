import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { ConsoleReporter, JsonReporter } from '../../lib/ui/reporter.js';
import { exitCodeFor } from '../../core/index.js';
import { createHostContext } from '../../host/context.js';
import { loadPlanFile } from '../../plan/index.js';
import { provision, selectSteps } from '../../provision.js';

interface RunOptions {
  dryRun?: boolean;
  json?: boolean;
  only?: string[];
  skip?: string[];
  key?: string;
  nonInteractive?: boolean;
  verbose?: boolean;
  requireRoot: boolean;
}

export const runCommand = new Command('run')
  .description('Provision this host from a plan file')
  .argument('<plan-file>', 'Path to plan YAML file')
  .option('--dry-run', 'Parse and validate only, do not execute')
  .option('--json', 'Output the run report as JSON')
  .option('--only <steps...>', 'Run only these steps')
  .option('--skip <steps...>', 'Leave these steps out')
  .option('--key <ssh-key>', 'SSH public key to use instead of prompting')
  .option('--non-interactive', 'Fail steps that need input instead of prompting')
  .option('--verbose', 'Show command output')
  .option('--no-require-root', 'Do not refuse to run without root privileges')
  .action(
    withErrorHandler(async (planFile: string, options: RunOptions) => {
      const plan = loadPlanFile(resolve(planFile));
      const context = createHostContext({
        verbose: options.verbose && !options.json,
        key: options.key,
        nonInteractive: options.nonInteractive,
      });
      const steps = selectSteps(plan, context, { only: options.only, skip: options.skip });

      // --dry-run: validate only
      if (options.dryRun) {
        if (options.json) {
          console.log(JSON.stringify({
            plan: plan.name,
            steps: steps.map((s) => s.name),
            valid: true,
          }));
        } else {
          console.log(chalk.green(`✓ Plan "${plan.name}" is valid`));
          console.log(`  ${steps.length} steps: ${steps.map((s) => s.name).join(' → ')}`);
        }
        return;
      }

      // Print overview
      if (!options.json) {
        console.log(`Plan: ${chalk.bold(plan.name)}`);
        if (plan.description) console.log(chalk.dim(`  ${plan.description}`));
        console.log(`  ${steps.length} steps`);
        console.log('');
      }

      const reporter = options.json ? new JsonReporter(plan.name) : new ConsoleReporter();
      const report = await provision({
        steps,
        context,
        reporter,
        requirePrivilege: options.requireRoot,
      });

      process.exit(exitCodeFor(report));
    }),
  );
