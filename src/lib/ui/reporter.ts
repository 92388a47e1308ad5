import chalk from 'chalk';
import { countOutcomes, serializeReport, type RunReport } from '../../core/report.js';
import type { StepResult } from '../../core/step.js';
import { debug } from '../utils/debug.js';
import { formatDuration, plural } from '../utils/format.js';

/**
 * Operator-facing output for a run. Every method is fire-and-forget:
 * implementations must never throw into the runner.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  error(message: string): void;
  /** Called once per step, as soon as its result exists */
  report(result: StepResult): void;
  /** Called once when the run ends (including refused runs) */
  summary(report: RunReport): void;
}

type Write = (line: string) => void;

const stdout: Write = (line) => console.log(line);
const stderr: Write = (line) => console.error(line);

/** Leveled, coloured lines on stdout/stderr */
export class ConsoleReporter implements Reporter {
  constructor(
    private readonly out: Write = stdout,
    private readonly err: Write = stderr,
  ) {}

  info(message: string): void {
    this.write(this.out, chalk.yellow(message));
  }

  success(message: string): void {
    this.write(this.out, chalk.green(message));
  }

  error(message: string): void {
    this.write(this.err, chalk.red(message));
  }

  report(result: StepResult): void {
    const duration = chalk.dim(`(${formatDuration(result.duration_ms)})`);
    switch (result.outcome) {
      case 'skipped':
        this.write(this.out, chalk.dim(`  ⏭ ${result.step_name}: ${result.detail}`));
        break;
      case 'succeeded':
        this.write(this.out, `${chalk.green(`  ✓ ${result.step_name}: ${result.detail}`)} ${duration}`);
        break;
      case 'failed':
        this.write(this.err, `${chalk.red(`  ✗ ${result.step_name}: ${result.detail}`)} ${duration}`);
        break;
    }
  }

  summary(report: RunReport): void {
    if (report.status === 'refused') {
      this.error(`✗ ${report.error?.message ?? 'run refused'}`);
      if (report.error?.hint) {
        this.write(this.err, chalk.dim(`  ${report.error.hint}`));
      }
      return;
    }

    const counts = countOutcomes(report);
    const parts = [`${counts.succeeded} applied`, `${counts.skipped} skipped`];
    if (counts.failed > 0) parts.push(`${counts.failed} failed`);
    const tally = `${parts.join(', ')} in ${formatDuration(report.duration_ms)}`;

    this.write(this.out, '');
    if (report.status === 'clean') {
      this.success(`✓ Provisioning completed (${tally})`);
      return;
    }

    const failed = report.results
      .filter((r) => r.outcome === 'failed')
      .map((r) => r.step_name);
    this.error(`✗ Provisioning finished with ${plural(counts.failed, 'failed step')} (${tally})`);
    this.write(this.err, chalk.dim(`  Failed: ${failed.join(', ')}`));
    this.write(this.err, chalk.dim('  Fix the cause and run again; completed steps will be skipped.'));
  }

  private write(sink: Write, line: string): void {
    try {
      sink(line);
    } catch (err) {
      debug('reporter', 'dropped output line:', err);
    }
  }
}

/** Prints nothing until the end, then the whole report as one JSON object */
export class JsonReporter implements Reporter {
  constructor(
    private readonly planName?: string,
    private readonly out: Write = stdout,
  ) {}

  info(_message: string): void {}
  success(_message: string): void {}
  error(_message: string): void {}
  report(_result: StepResult): void {}

  summary(report: RunReport): void {
    try {
      this.out(JSON.stringify(serializeReport(report, this.planName)));
    } catch (err) {
      debug('reporter', 'failed to write JSON report:', err);
    }
  }
}

export class SilentReporter implements Reporter {
  info(_message: string): void {}
  success(_message: string): void {}
  error(_message: string): void {}
  report(_result: StepResult): void {}
  summary(_report: RunReport): void {}
}
