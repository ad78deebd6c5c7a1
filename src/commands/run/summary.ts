import chalk from 'chalk';
import type { SyncReport } from '../../collaborators/file-sync.js';
import { formatDuration, plural } from '../../lib/utils/format.js';
import { isSuccess } from '../../sequencer/sequencer.js';
import type { RunResult } from '../../sequencer/types.js';

export interface RunSummaryInput {
  service: string;
  result: RunResult;
  report: SyncReport | null;
  dryRun?: boolean;
  /** List copied and excluded paths; always on for a dry run */
  verbose?: boolean;
}

export interface RunSummary {
  lines: string[];
  exitCode: 0 | 1;
}

/** True when the run stopped the service and never started it again */
export function leftStopped(result: RunResult): boolean {
  return result.completed_steps.includes('stop') && !result.completed_steps.includes('start');
}

/** Closing lines of `deploy-sync run` and the process exit code */
export function summarizeRun(input: RunSummaryInput): RunSummary {
  const { service, result, report } = input;
  const lines: string[] = [];

  if (report && (input.verbose || input.dryRun)) {
    for (const file of report.copied) {
      lines.push(chalk.dim(`    ${input.dryRun ? 'would copy' : 'copied'} ${file}`));
    }
    for (const path of report.excluded) {
      lines.push(chalk.dim(`    excluded ${path}`));
    }
  }

  lines.push('');

  if (isSuccess(result)) {
    lines.push(chalk.green(
      `✓ Deploy of "${service}" completed (${formatDuration(result.duration_ms)}, ${plural(result.completed_steps.length, 'step')})`,
    ));
    return { lines, exitCode: 0 };
  }

  lines.push(chalk.red(`✗ Deploy of "${service}" failed at step "${result.failed_step}" [${result.error_code}]`));
  if (result.error) lines.push(`  ${result.error}`);
  if (leftStopped(result)) {
    lines.push(chalk.yellow(`  Service "${service}" was left stopped. Fix the problem, then start it or re-run deploy-sync.`));
  }
  return { lines, exitCode: 1 };
}
