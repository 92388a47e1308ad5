import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { createHostContext } from '../../host/context.js';
import { loadPlanFile } from '../../plan/index.js';
import { buildRegistry } from '../../steps/index.js';
import { inspect, type StepState, type StepStatus } from '../../provision.js';

function statusIcon(state: StepState): string {
  switch (state) {
    case 'satisfied': return chalk.green('✅');
    case 'pending': return chalk.yellow('○');
    case 'unknown': return chalk.dim('?');
    case 'error': return chalk.red('✗');
  }
}

function printStatus(planName: string, statuses: StepStatus[]): void {
  const done = statuses.filter((s) => s.state === 'satisfied').length;
  console.log(`Plan: ${chalk.bold(planName)} (${done}/${statuses.length} satisfied)`);
  console.log('');

  const nameWidth = Math.max(4, ...statuses.map((s) => s.name.length));
  for (const s of statuses) {
    console.log(`  ${statusIcon(s.state)} ${s.name.padEnd(nameWidth)}  ${s.state.padEnd(9)}  ${chalk.dim(s.description ?? '')}`);
    if (s.detail) console.log(`    ${s.state === 'error' ? chalk.red(s.detail) : chalk.dim(s.detail)}`);
  }
}

export const statusCommand = new Command('status')
  .description('Show which plan steps are already satisfied (runs checks only)')
  .argument('<plan-file>', 'Path to plan YAML file')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (planFile: string, options: { json?: boolean }) => {
      const plan = loadPlanFile(resolve(planFile));
      const context = createHostContext({ nonInteractive: true });
      const statuses = await inspect(buildRegistry(plan, context).sequence());

      if (options.json) {
        console.log(JSON.stringify({ plan: plan.name, steps: statuses }));
        return;
      }

      printStatus(plan.name, statuses);
    }),
  );
