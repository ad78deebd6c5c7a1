import { Command } from 'commander';
import chalk from 'chalk';
import { dirname, resolve } from 'node:path';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { DeployError, ErrorCode } from '../../lib/errors.js';
import { formatDuration } from '../../lib/utils/format.js';
import { DEFAULT_CONFIG_FILE } from '../../config/types.js';
import { STEP_NAMES } from '../../deploy/steps.js';
import { lastRunPath, loadLastRun, type LastRun } from '../../deploy/state.js';

function stepIcon(run: LastRun, step: string): string {
  if (run.completed_steps.includes(step)) return chalk.green('✓');
  if (run.failed_step === step) return chalk.red('✗');
  if (run.tolerated.some((t) => t.step === step)) return chalk.yellow('!');
  return chalk.dim('○');
}

function printLastRun(run: LastRun): void {
  const status = run.status === 'succeeded' ? chalk.green(run.status) : chalk.red(run.status);
  console.log(`Service: ${chalk.bold(run.service)} (${status}${run.dry_run ? ', dry run' : ''})`);
  console.log(`Finished: ${new Date(run.completed_at).toLocaleString()} (${formatDuration(run.duration_ms)})`);
  console.log('');

  for (const step of STEP_NAMES) {
    console.log(`  ${stepIcon(run, step)} ${step}`);
  }
  if (run.error) {
    console.log(chalk.red(`\n  ${run.error}`));
  }
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the result of the last deploy run')
    .option('-c, --config <path>', 'Path to deploy config', DEFAULT_CONFIG_FILE)
    .option('--json', 'Output result as JSON')
    .action(
      withErrorHandler(async (options: { config: string; json?: boolean }) => {
        const path = lastRunPath(dirname(resolve(options.config)));
        const run = loadLastRun(path);
        if (!run) {
          throw new DeployError(
            ErrorCode.STATE_NOT_FOUND,
            `No deploy run recorded at ${path}`,
            'Run: deploy-sync run',
          );
        }

        if (options.json) {
          console.log(JSON.stringify(run));
          return;
        }

        printLastRun(run);
      }),
    );
}
