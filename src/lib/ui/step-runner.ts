import chalk from 'chalk';
import type { SequenceReporter } from '../../sequencer/types.js';

type Writer = (line: string) => void;

/**
 * Console progress for a step sequence:
 *
 *   [1/3] stopping service web...
 *     ✓ done
 */
export function createStepReporter(write: Writer = (line) => console.log(line)): SequenceReporter {
  return {
    onStart(step, index, total) {
      write(`[${index + 1}/${total}] ${step.label ?? step.name}...`);
    },
    onSuccess(_step, _index, _total, outcome) {
      const detail = outcome.ok && outcome.detail ? ` (${outcome.detail})` : '';
      write(chalk.green(`  ✓ done${detail}`));
    },
    onFailure(_step, _index, _total, error, tolerated) {
      if (tolerated) {
        write(chalk.yellow(`  ! ${error} (continuing)`));
      } else {
        write(chalk.red(`  ✗ ${error}`));
      }
    },
  };
}
